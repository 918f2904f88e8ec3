import { z } from 'zod';
import { embeddedList, isRecord } from './common';

export const SourceColumnSchema = z.object({
  id: z.string(),
  entityType: z.string(),
  entityName: z.string(),
  columnName: z.string(),
  informationMartId: z.string().nullish(),
  informationMartScriptId: z.string().nullish(),
  informationMartScriptColumnId: z.string().nullish(),
});
export type SourceColumn = z.infer<typeof SourceColumnSchema>;

export const InformationMartScriptColumnSchema = z.object({
  id: z.string(),
  name: z.string(),
  comment: z.string().nullish(),
  softRule: z.string().nullish(),
  informationMartId: z.string().nullish(),
  informationMartScriptId: z.string().nullish(),
  sourceColumns: z.array(SourceColumnSchema).nullish().transform((v) => v ?? []),
});
export type InformationMartScriptColumn = z.infer<typeof InformationMartScriptColumnSchema>;

/**
 * Columns arrive as `_embedded.columns._embedded.columns` on a single script
 * and are absent from the scripts listed inside a mart.
 */
export const InformationMartScriptSchema = z.preprocess(
  (value) => (isRecord(value) ? { ...value, columns: embeddedList(value, 'columns') } : value),
  z.object({
    id: z.string(),
    name: z.string(),
    informationMartId: z.string().nullish(),
    businessDescription: z.string().nullish(),
    technicalDescription: z.string().nullish(),
    tableName: z.string().nullish(),
    typeTag: z.string().nullish(),
    order: z.number().default(0),
    timeout: z.number().default(0),
    code: z.string().nullish(),
    columns: z.array(InformationMartScriptColumnSchema),
  }),
);
export type InformationMartScript = z.infer<typeof InformationMartScriptSchema>;

const InformationMartFieldsSchema = z.object({
  id: z.string(),
  name: z.string(),
  businessDescription: z.string().nullish(),
  technicalDescription: z.string().nullish(),
  schema: z.string().nullish(),
  prefix: z.string().nullish(),
  scriptsCount: z.number().nullish(),
  snapshotId: z.string().nullish(),
});

export const InformationMartSchema = z.preprocess(
  (value) =>
    isRecord(value) ? { ...value, scripts: embeddedList(value, 'informationMartScripts') } : value,
  InformationMartFieldsSchema.extend({
    scripts: z.array(InformationMartScriptSchema),
  }),
);
export type InformationMart = z.infer<typeof InformationMartSchema>;
