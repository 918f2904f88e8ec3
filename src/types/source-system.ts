import { z } from 'zod';
import { embeddedList, isRecord } from './common';

export const SourceSystemSchema = z.object({
  id: z.string(),
  name: z.string(),
  code: z.string().nullish(),
  version: z.string().nullish(),
  qualityType: z.string().nullish(),
  dataSteward: z.string().nullish(),
  systemAdministrator: z.string().nullish(),
  technicalDescription: z.string().nullish(),
  businessDescription: z.string().nullish(),
});
export type SourceSystem = z.infer<typeof SourceSystemSchema>;

export const DataPackageSchema = z.object({
  id: z.string(),
  name: z.string(),
  deliverySchedule: z.string().nullish(),
  technicalDescription: z.string().nullish(),
  businessDescription: z.string().nullish(),
  refreshType: z.string().nullish(),
  formatInfo: z.string().nullish(),
  expectedQuality: z.string().nullish(),
});
export type DataPackage = z.infer<typeof DataPackageSchema>;

/**
 * Source-side type of a staging column, before any hard rule casts it.
 */
export const BaseTypeSchema = z.object({
  isText: z.boolean().default(false),
  isBinary: z.boolean().default(false),
  type: z.string().nullish(),
  dataType: z.string(),
  length: z.number().nullish(),
  scale: z.number().nullish(),
  precision: z.number().nullish(),
  autoIncrement: z.boolean().default(false),
});
export type BaseType = z.infer<typeof BaseTypeSchema>;

/**
 * `hardRuleDefinition` is templated SQL such as `{{contract_number}}::int`;
 * `dataType` is the type after that cast.
 */
export const StagingTableColumnSchema = z.object({
  id: z.string(),
  name: z.string(),
  dataType: z.string(),
  length: z.number().nullish(),
  scale: z.number().nullish(),
  precision: z.number().nullish(),
  baseType: BaseTypeSchema.nullish(),
  nullable: z.boolean().default(true),
  technicalDescription: z.string().nullish(),
  businessDescription: z.string().nullish(),
  businessName: z.string().nullish(),
  primaryKey: z.boolean().default(false),
  typeFullName: z.string().nullish(),
  hardRuleDefinition: z.string().nullish(),
});
export type StagingTableColumn = z.infer<typeof StagingTableColumnSchema>;

export const StagingTableSummarySchema = z.object({
  id: z.string(),
  tableName: z.string(),
  targetTableName: z.string().nullish(),
  targetSchemaName: z.string().nullish(),
  dataPackageId: z.string().nullish(),
  query: z.string().nullish(),
  queryType: z.string().nullish(),
  isQueryBased: z.boolean().nullish(),
});
export type StagingTableSummary = z.infer<typeof StagingTableSummarySchema>;

export const StagingTableSchema = z.preprocess(
  (value) => (isRecord(value) ? { ...value, columns: embeddedList(value, 'columns') } : value),
  StagingTableSummarySchema.extend({
    columns: z.array(StagingTableColumnSchema),
  }),
);
export type StagingTable = z.infer<typeof StagingTableSchema>;

/**
 * Mapping records are kept untyped until the mapping model decodes them.
 */
export const RawMappingRecordSchema = z
  .object({
    id: z.string(),
    name: z.string().default(''),
    mappingType: z.string().default(''),
  })
  .passthrough();
export type RawMappingRecord = z.infer<typeof RawMappingRecordSchema>;
