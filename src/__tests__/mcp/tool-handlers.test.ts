import { MetavaultClient } from '../../client/metavault.client';
import { ServiceContainer } from '../../services/core/service-container';
import { toolHandlers } from '../../mcp/tool-handlers';
import { METAVAULT_MCP_TOOLS } from '../../mcp/tools';
import { toToolErrorResult } from '../../mcp/utils/error-utils';
import { NotFoundError } from '../../utils/errors';
import { testContext } from '../helpers/context';
import { FakeTransport } from '../helpers/fake-transport';
import { BASE_URL, PROJECT_ID, PROJECT_PATH, TABLE_ID, page } from '../helpers/fixtures';

const NAMED_TABLE_PATH = `${PROJECT_PATH}/metavault/sourcesystems/crm/datapackages/daily/tables`;

describe('toolHandlers', () => {
  let transport: FakeTransport;
  let services: ServiceContainer;

  beforeEach(() => {
    transport = new FakeTransport();
    services = new ServiceContainer(new MetavaultClient(BASE_URL, transport));
  });

  it('has one handler per registered tool', () => {
    expect(Object.keys(toolHandlers).sort()).toEqual(METAVAULT_MCP_TOOLS.map((tool) => tool.name).sort());
  });

  it('reports every missing parameter before calling the service', async () => {
    const params = { projectName: 'P1', sourceSystemIdOrName: 'crm', dataPackageIdOrName: 'daily' };

    await expect(toolHandlers.delete_staging_table_mapping(params, testContext(), services)).rejects.toThrow(
      'tableIdOrName is required; mappingIdOrName is required',
    );
    expect(transport.calls).toHaveLength(0);
  });

  it('rejects blank parameters', async () => {
    await expect(
      toolHandlers.get_staging_table(
        { projectName: 'P1', sourceSystemIdOrName: ' ', dataPackageIdOrName: 'daily', tableIdOrName: 't' },
        testContext(),
        services,
      ),
    ).rejects.toThrow('sourceSystemIdOrName is required');
  });

  it('returns the staging table without absent fields', async () => {
    transport
      .on('GET', `${NAMED_TABLE_PATH}/stg_customers`, {
        id: TABLE_ID,
        tableName: 'stg_customers',
        targetTableName: null,
        dataPackageId: 'DP1',
        isQueryBased: false,
        _embedded: { columns: [{ id: 'C1', name: 'customer_id', dataType: 'varchar', length: null }] },
      })
      .on('GET', `${NAMED_TABLE_PATH}/${TABLE_ID}/mappings?index=0&limit=1000000`, page('mappings', []));

    const result = await toolHandlers.get_staging_table(
      {
        projectName: PROJECT_ID,
        sourceSystemIdOrName: 'crm',
        dataPackageIdOrName: 'daily',
        tableIdOrName: 'stg_customers',
      },
      testContext(),
      services,
    );

    expect(result).toStrictEqual({
      id: TABLE_ID,
      tableName: 'stg_customers',
      dataPackageId: 'DP1',
      isQueryBased: false,
      columns: [{ id: 'C1', name: 'customer_id', dataType: 'varchar', nullable: true, primaryKey: false }],
      mappings: [],
    });
  });

  it('rejects a page size below one', async () => {
    await expect(
      toolHandlers.get_snapshots({ projectName: PROJECT_ID, limit: 0 }, testContext(), services),
    ).rejects.toThrow('limit must be at least 1');
    expect(transport.calls).toHaveLength(0);
  });

  it('returns model search results without absent fields', async () => {
    transport.on(
      'GET',
      `${PROJECT_PATH}/model?index=0&limit=10&includeHubs=true&includeLinks=false&includeSatellites=true&includeReferenceTables=true`,
      page('entities', [{ id: 'RT1', name: 'country_codes', entityType: 'ReferenceTable', tableName: null }]),
    );

    await expect(
      toolHandlers.search_model({ projectName: PROJECT_ID, includeLinks: false }, testContext(), services),
    ).resolves.toStrictEqual({
      paging: { index: 0, limit: 1, total: 1 },
      entities: [{ id: 'RT1', name: 'country_codes', entityType: 'ReferenceTable' }],
    });
  });

  it('wraps the project list', async () => {
    transport.on(
      'GET',
      '/metavault/api/projects?onlyAffected=true',
      page('projects', [{ id: PROJECT_ID, name: 'Sales', technicalName: 'sales', description: null }]),
    );

    await expect(toolHandlers.get_projects({}, testContext(), services)).resolves.toStrictEqual({
      projects: [{ id: PROJECT_ID, name: 'Sales', technicalName: 'sales' }],
    });
  });
});

describe('toToolErrorResult', () => {
  it('prefixes known errors with their code', () => {
    expect(toToolErrorResult(new NotFoundError('Hub', 'Customer'))).toEqual({
      content: [{ type: 'text', text: "NOT_FOUND: Hub 'Customer' not found" }],
      isError: true,
    });
  });

  it('reports other errors by message', () => {
    expect(toToolErrorResult(new Error('boom'))).toEqual({
      content: [{ type: 'text', text: 'boom' }],
      isError: true,
    });
  });
});
