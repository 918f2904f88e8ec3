import { apiPaths } from '../../client/api-paths';
import { ReferenceBuilder } from '../../services/core/reference-builder';
import { InvalidArgumentError } from '../../utils/errors';

const scope = { projectId: 'P', sourceSystemId: 'crm', dataPackageId: 'daily', tableId: 'stg customers' };

describe('apiPaths', () => {
  it('nests staging tables under their source system and data package', () => {
    expect(apiPaths.stagingTable(scope)).toBe(
      '/metavault/api/projects/P/metavault/sourcesystems/crm/datapackages/daily/tables/stg%20customers',
    );
    expect(apiPaths.stagingTableMappings(scope)).toBe(
      '/metavault/api/projects/P/metavault/sourcesystems/crm/datapackages/daily/tables/stg%20customers/mappings',
    );
  });

  it('addresses satellite mappings under their parent', () => {
    expect(apiPaths.satelliteMappings('P', 'link', 'LM1')).toBe('/metavault/api/projects/P/mappings/links/LM1/satellites');
    expect(apiPaths.satelliteMapping('P', 'hub', 'H1', 'S1')).toBe(
      '/metavault/api/projects/P/mappings/hubs/H1/satellites/S1',
    );
  });

  it('addresses satellites of the model under their parent entity', () => {
    expect(apiPaths.satellite('P', 'hub', 'H1', 'customer_details')).toBe(
      '/metavault/api/projects/P/model/hubs/H1/satellites/customer_details',
    );
  });

  it('rejects empty components', () => {
    expect(() => apiPaths.hub('P', ' ')).toThrow(InvalidArgumentError);
    expect(() => apiPaths.hub('P', '')).toThrow('hub must not be empty');
  });
});

describe('ReferenceBuilder', () => {
  const references = new ReferenceBuilder('https://metavault.test/');

  it('prefixes entity paths with the base URL', () => {
    expect(references.hub('P', 'Customer')).toBe('https://metavault.test/metavault/api/projects/P/model/hubs/Customer');
    expect(references.link('P', 'L1')).toBe('https://metavault.test/metavault/api/projects/P/model/links/L1');
    expect(references.hubReference('P', 'L1', 'R1')).toBe(
      'https://metavault.test/metavault/api/projects/P/model/links/L1/hubreferences/R1',
    );
    expect(references.hubMapping('P', 'M1')).toBe('https://metavault.test/metavault/api/projects/P/mappings/hubs/M1');
  });

  it('builds staging table and column references', () => {
    const table = 'https://metavault.test/metavault/api/projects/P/metavault/sourcesystems/crm/datapackages/daily/tables/stg%20customers';
    expect(references.stagingTable(scope)).toBe(table);
    expect(references.stagingColumn(scope, 'cust_id')).toBe(`${table}/columns/cust_id`);
  });

  it('requires a base URL', () => {
    expect(() => new ReferenceBuilder('')).toThrow('baseUrl must not be empty');
  });

  it('rejects an empty column', () => {
    expect(() => references.stagingColumn(scope, '')).toThrow('column must not be empty');
  });
});
