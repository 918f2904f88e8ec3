import { RawMappingRecord, RawMappingRecordSchema, StagingTableColumn, StagingTableColumnSchema } from '../../types/source-system';
import { StagingTableScope } from '../../types/scope';

export const BASE_URL = 'https://metavault.test';

export const PROJECT_ID = 'aaaaaaaa-0000-0000-0000-000000000001';
export const SOURCE_SYSTEM_ID = 'aaaaaaaa-0000-0000-0000-000000000002';
export const DATA_PACKAGE_ID = 'aaaaaaaa-0000-0000-0000-000000000003';
export const TABLE_ID = 'aaaaaaaa-0000-0000-0000-000000000004';
export const LINK_ID = 'bbbbbbbb-0000-0000-0000-000000000001';
export const HUB_ID = 'bbbbbbbb-0000-0000-0000-000000000002';

export const SCOPE: StagingTableScope = {
  projectId: PROJECT_ID,
  sourceSystemId: SOURCE_SYSTEM_ID,
  dataPackageId: DATA_PACKAGE_ID,
  tableId: TABLE_ID,
};

export const PROJECT_PATH = `/metavault/api/projects/${PROJECT_ID}`;
export const TABLE_PATH = `${PROJECT_PATH}/metavault/sourcesystems/${SOURCE_SYSTEM_ID}/datapackages/${DATA_PACKAGE_ID}/tables/${TABLE_ID}`;
export const TABLE_URL = `${BASE_URL}${TABLE_PATH}`;
export const MAPPINGS_LIST_PATH = `${TABLE_PATH}/mappings?index=0&limit=1000000`;

export function hubRecord(id: string, name: string, hubId: string, columnId: string): Record<string, unknown> {
  return {
    id,
    name,
    parentName: `hub_${name}`,
    dataPackageTableId: TABLE_ID,
    mappingType: 'Hub',
    hubId,
    isFullLoad: false,
    expectNullBusinessKey: false,
    businessKeyMapping: { businessKeyId: `bk_${id}`, columnId },
  };
}

export function linkRecord(
  id: string,
  name: string,
  linkId: string,
  fields: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    id,
    name,
    parentName: `link_${name}`,
    dataPackageTableId: TABLE_ID,
    mappingType: 'Link',
    linkId,
    isFullLoad: true,
    ...fields,
  };
}

export function satelliteRecord(
  id: string,
  name: string,
  parentMappingId: string,
  parent: { hubId?: string; linkId?: string },
  columns: { satelliteColumnId: string; stagingTableColumnId: string }[] = [],
): Record<string, unknown> {
  return {
    id,
    name,
    parentName: `sat_${name}`,
    dataPackageTableId: TABLE_ID,
    mappingType: 'Satellite',
    ...parent,
    satelliteId: `satellite_${id}`,
    satelliteParentMappingId: parentMappingId,
    satelliteColumnMappings: columns,
  };
}

export function raw(record: Record<string, unknown>): RawMappingRecord {
  return RawMappingRecordSchema.parse(record);
}

export function column(id: string, name: string): StagingTableColumn {
  return StagingTableColumnSchema.parse({ id, name, dataType: 'varchar' });
}

export function page(key: string, items: unknown[]): Record<string, unknown> {
  return { index: 0, limit: items.length, total: items.length, _embedded: { [key]: items } };
}
