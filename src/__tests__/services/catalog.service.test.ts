import { MetavaultClient } from '../../client/metavault.client';
import { ServiceContainer } from '../../services/core/service-container';
import { InvalidArgumentError, NotFoundError } from '../../utils/errors';
import { testContext } from '../helpers/context';
import { FakeTransport } from '../helpers/fake-transport';
import { BASE_URL, HUB_ID, LINK_ID, PROJECT_ID, PROJECT_PATH, page } from '../helpers/fixtures';

describe('CatalogService', () => {
  let transport: FakeTransport;
  let services: ServiceContainer;

  beforeEach(() => {
    transport = new FakeTransport();
    services = new ServiceContainer(new MetavaultClient(BASE_URL, transport));
  });

  it('lists projects', async () => {
    transport.on('GET', '/metavault/api/projects?onlyAffected=true', page('projects', [{ id: PROJECT_ID, name: 'P1' }]));

    await expect(services.catalog.listProjects(testContext())).resolves.toEqual([{ id: PROJECT_ID, name: 'P1' }]);
  });

  it('resolves the parent hub by name before fetching the satellite', async () => {
    transport
      .on('GET', `${PROJECT_PATH}/model/hubs/Customer`, { id: HUB_ID, name: 'Customer' })
      .on('GET', `${PROJECT_PATH}/model/hubs/${HUB_ID}/satellites/customer_details?expand=parent`, {
        id: 'S1',
        name: 'customer_details',
        _embedded: { columns: [], parent: { id: HUB_ID, name: 'Customer' } },
      });

    const satellite = await services.catalog.getSatellite(testContext(), {
      projectName: PROJECT_ID,
      parentType: 'hub',
      parentIdOrName: 'Customer',
      satelliteIdOrName: 'customer_details',
    });

    expect(satellite.id).toBe('S1');
    expect(satellite.parent?.id).toBe(HUB_ID);
  });

  it('rejects an unknown parent type before any call', async () => {
    await expect(
      services.catalog.getSatellite(testContext(), {
        projectName: 'P1',
        parentType: 'satellite',
        parentIdOrName: 'Customer',
        satelliteIdOrName: 'x',
      }),
    ).rejects.toThrow(new InvalidArgumentError("Invalid parentType 'satellite'. Must be 'hub' or 'link'"));
    expect(transport.calls).toHaveLength(0);
  });

  it('fetches a link by name within the resolved project', async () => {
    transport.on('GET', `${PROJECT_PATH}/model/links/Order_Customer`, {
      id: LINK_ID,
      name: 'Order_Customer',
      _embedded: { hubReferences: [{ id: 'R1', columnName: 'order_hk' }] },
    });

    const link = await services.catalog.getLink(testContext(), PROJECT_ID, 'Order_Customer');

    expect(link).toMatchObject({ id: LINK_ID, entityType: 'Link', dependentChildColumns: [], dataColumns: [] });
    expect(link.hubReferences).toEqual([{ id: 'R1', columnName: 'order_hk', order: 0 }]);
  });

  describe('searchModel', () => {
    const SEARCH_PATH =
      `${PROJECT_PATH}/model?index=0&limit=10&searchString=cust` +
      '&includeHubs=true&includeLinks=true&includeSatellites=true&includeReferenceTables=false';

    it('summarizes each entity and names satellite parents', async () => {
      transport
        .on(
          'GET',
          SEARCH_PATH,
          page('entities', [
            { id: HUB_ID, name: 'Customer', entityType: 'Hub', satelliteCount: 2, businessKey: { length: 50 } },
            { id: 'S1', name: 'customer_details', entityType: 'Satellite', parentType: 'Hub', parentId: HUB_ID },
            {
              id: 'S2',
              name: 'order_customer_status',
              entityType: 'Satellite',
              parentType: 'Link',
              parentId: LINK_ID,
              isMultiActive: false,
            },
            { id: 'S3', name: 'order_customer_history', entityType: 'Satellite', parentType: 'Link', parentId: LINK_ID },
          ]),
        )
        .on('GET', `${PROJECT_PATH}/model/links/${LINK_ID}`, { id: LINK_ID, name: 'Order_Customer' });

      const result = await services.catalog.searchModel(testContext(), PROJECT_ID, {
        searchString: 'cust',
        includeReferenceTables: false,
      });

      expect(result.paging).toEqual({ index: 0, limit: 4, total: 4 });
      expect(result.entities).toEqual([
        { id: HUB_ID, name: 'Customer', entityType: 'Hub', satelliteCount: 2, businessKeyLength: 50 },
        { id: 'S1', name: 'customer_details', entityType: 'Satellite', parentType: 'Hub', parentName: 'Customer' },
        {
          id: 'S2',
          name: 'order_customer_status',
          entityType: 'Satellite',
          parentType: 'Link',
          parentName: 'Order_Customer',
          isMultiActive: false,
        },
        {
          id: 'S3',
          name: 'order_customer_history',
          entityType: 'Satellite',
          parentType: 'Link',
          parentName: 'Order_Customer',
        },
      ]);
      expect(transport.calls.map((call) => call.path)).toEqual([SEARCH_PATH, `${PROJECT_PATH}/model/links/${LINK_ID}`]);
    });

    it('leaves the parent name empty when the parent cannot be fetched', async () => {
      transport.on(
        'GET',
        SEARCH_PATH,
        page('entities', [
          { id: 'S1', name: 'customer_details', entityType: 'Satellite', parentType: 'Hub', parentId: 'H-GONE' },
          { id: 'RT1', name: 'country_codes', entityType: 'ReferenceTable', mappingCount: 3 },
        ]),
      );

      const result = await services.catalog.searchModel(testContext(), PROJECT_ID, {
        searchString: 'cust',
        includeReferenceTables: false,
      });

      expect(result.entities).toEqual([
        { id: 'S1', name: 'customer_details', entityType: 'Satellite', parentType: 'Hub', parentName: null },
        { id: 'RT1', name: 'country_codes', entityType: 'ReferenceTable', mappingCount: 3 },
      ]);
    });

    it('rejects entities of an unknown type', async () => {
      transport.on('GET', SEARCH_PATH, page('entities', [{ id: 'X1', name: 'x', entityType: 'Dashboard' }]));

      await expect(
        services.catalog.searchModel(testContext(), PROJECT_ID, { searchString: 'cust', includeReferenceTables: false }),
      ).rejects.toThrow();
    });
  });

  it('lists every snapshot by default', async () => {
    transport.on(
      'GET',
      `${PROJECT_PATH}/model/snapshots?index=0&limit=1000000`,
      page('snapshots', [{ id: 'SN1', name: 'release-1', type: 'Manual' }]),
    );

    await expect(services.catalog.listSnapshots(testContext(), PROJECT_ID, {})).resolves.toEqual({
      paging: { index: 0, limit: 1, total: 1 },
      snapshots: [{ id: 'SN1', name: 'release-1', type: 'Manual' }],
    });
  });

  describe('information marts', () => {
    it('searches by name and keeps only the script summary', async () => {
      transport.on(
        'GET',
        `${PROJECT_PATH}/informationmarts?index=0&limit=10&filter=name+contains+sales`,
        page('informationMarts', [
          {
            id: 'IM1',
            name: 'sales',
            schema: 'im_sales',
            scriptsCount: 1,
            _embedded: {
              informationMartScripts: [
                { id: 'SC1', name: 'dim_customer', order: 2, code: 'select 1', businessDescription: 'Customers' },
              ],
            },
          },
        ]),
      );

      const result = await services.catalog.searchInformationMarts(testContext(), PROJECT_ID, { searchName: 'sales' });

      expect(result).toEqual({
        paging: { index: 0, limit: 1, total: 1 },
        informationMarts: [
          {
            id: 'IM1',
            name: 'sales',
            schema: 'im_sales',
            scriptsCount: 1,
            scripts: [{ id: 'SC1', name: 'dim_customer', order: 2, businessDescription: 'Customers' }],
          },
        ],
      });
    });

    it('lists every mart without a name filter', async () => {
      transport.on('GET', `${PROJECT_PATH}/informationmarts?index=1&limit=5`, page('informationMarts', []));

      const result = await services.catalog.searchInformationMarts(testContext(), PROJECT_ID, { index: 1, limit: 5 });

      expect(result.informationMarts).toEqual([]);
    });

    it('resolves the mart and the script by name before fetching the script', async () => {
      transport
        .on(
          'GET',
          `${PROJECT_PATH}/informationmarts?index=0&limit=1000&filter=name+contains+sales`,
          page('informationMarts', [{ id: 'IM1', name: 'sales' }]),
        )
        .on('GET', `${PROJECT_PATH}/informationmarts/IM1`, {
          id: 'IM1',
          name: 'sales',
          _embedded: { informationMartScripts: [{ id: 'SC1', name: 'dim_customer' }] },
        })
        .on('GET', `${PROJECT_PATH}/informationmarts/IM1/scripts/SC1`, {
          id: 'SC1',
          name: 'dim_customer',
          informationMartId: 'IM1',
          code: 'select customer_id from dv.h_customer',
          _embedded: {
            columns: {
              _embedded: {
                columns: [
                  {
                    id: 'COL1',
                    name: 'customer_id',
                    sourceColumns: [
                      { id: 'SRC1', entityType: 'Hub', entityName: 'Customer', columnName: 'customer_id' },
                    ],
                  },
                ],
              },
            },
          },
        });

      const script = await services.catalog.getInformationMartScript(testContext(), PROJECT_ID, 'sales', 'dim_customer');

      expect(script).toEqual({
        id: 'SC1',
        name: 'dim_customer',
        informationMartId: 'IM1',
        code: 'select customer_id from dv.h_customer',
        order: 0,
        timeout: 0,
        columns: [
          {
            id: 'COL1',
            name: 'customer_id',
            sourceColumns: [{ id: 'SRC1', entityType: 'Hub', entityName: 'Customer', columnName: 'customer_id' }],
          },
        ],
      });
    });

    it('reports a script the mart does not have', async () => {
      transport.on('GET', `${PROJECT_PATH}/informationmarts/${HUB_ID}`, {
        id: HUB_ID,
        name: 'sales',
        _embedded: { informationMartScripts: [] },
      });

      const error = await services.catalog
        .getInformationMartScript(testContext(), PROJECT_ID, HUB_ID, 'dim_product')
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toHaveProperty('message', `Script 'dim_product' not found in information mart '${HUB_ID}'`);
    });
  });
});
