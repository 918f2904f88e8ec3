import { MetavaultClient } from '../../client/metavault.client';
import { ServiceContainer } from '../../services/core/service-container';
import { testContext } from '../helpers/context';
import { FakeTransport } from '../helpers/fake-transport';
import { BASE_URL, PROJECT_ID, PROJECT_PATH, TABLE_ID, hubRecord, page } from '../helpers/fixtures';

const NAMED_TABLE_PATH = `${PROJECT_PATH}/metavault/sourcesystems/crm/datapackages/daily/tables`;

describe('StagingTableService', () => {
  let transport: FakeTransport;
  let services: ServiceContainer;

  beforeEach(() => {
    transport = new FakeTransport();
    services = new ServiceContainer(new MetavaultClient(BASE_URL, transport));
    transport
      .on('GET', '/metavault/api/projects?filter=name+eq+P1', page('projects', [{ id: PROJECT_ID, name: 'P1' }]))
      .on('GET', `${NAMED_TABLE_PATH}/stg_customers`, {
        id: TABLE_ID,
        tableName: 'stg_customers',
        targetTableName: null,
        dataPackageId: 'DP1',
        isQueryBased: false,
        _embedded: {
          columns: [
            { id: 'C1', name: 'customer_id', dataType: 'varchar', length: 50, primaryKey: true, nullable: false },
            { id: 'C2', name: 'signup_date', dataType: 'date', hardRuleDefinition: '{{signup_date}}::date' },
          ],
        },
      })
      .on(
        'GET',
        `${NAMED_TABLE_PATH}/${TABLE_ID}/mappings?index=0&limit=1000000`,
        page('mappings', [hubRecord('M1', 'A', 'H1', 'C1')]),
      );
  });

  it('describes a staging table with its columns and reconstructed mappings', async () => {
    const view = await services.stagingTables.describe(testContext(), {
      projectName: 'P1',
      sourceSystemIdOrName: 'crm',
      dataPackageIdOrName: 'daily',
      stagingTableIdOrName: 'stg_customers',
    });

    expect(view.id).toBe(TABLE_ID);
    expect(view.isQueryBased).toBe(false);
    expect(view.columns).toEqual([
      { id: 'C1', name: 'customer_id', dataType: 'varchar', length: 50, nullable: false, primaryKey: true },
      {
        id: 'C2',
        name: 'signup_date',
        dataType: 'date',
        nullable: true,
        primaryKey: false,
        hardRuleDefinition: '{{signup_date}}::date',
      },
    ]);
    expect(view.mappings).toEqual([
      {
        id: 'M1',
        name: 'A',
        parentName: 'hub_A',
        mappingType: 'Hub',
        columnMappings: [
          {
            sourceColumnName: 'customer_id',
            destinationId: 'bk_M1',
            destinationType: 'businessKey',
            destinationColumnName: 'bk',
          },
        ],
        isFullLoad: false,
      },
    ]);
  });

  it('only resolves the project before fetching the table', async () => {
    await services.stagingTables.describe(testContext(), {
      projectName: 'P1',
      sourceSystemIdOrName: 'crm',
      dataPackageIdOrName: 'daily',
      stagingTableIdOrName: 'stg_customers',
    });

    expect(transport.calls.map((call) => call.path)).toEqual([
      '/metavault/api/projects?filter=name+eq+P1',
      `${NAMED_TABLE_PATH}/stg_customers`,
      `${NAMED_TABLE_PATH}/${TABLE_ID}/mappings?index=0&limit=1000000`,
    ]);
  });
});
