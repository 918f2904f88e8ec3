import { z } from 'zod';
import { embeddedList, isRecord } from './common';

export const BusinessKeySchema = z.object({
  id: z.string().nullish(),
  name: z.string().nullish(),
  type: z.string().nullish(),
  length: z.number().nullish(),
});

const ModelEntityShape = {
  id: z.string(),
  name: z.string(),
  tableName: z.string().nullish(),
  businessDescription: z.string().nullish(),
  technicalDescription: z.string().nullish(),
};

export const HubSchema = z.object({
  ...ModelEntityShape,
  entityType: z.literal('Hub').default('Hub'),
  satelliteCount: z.number().nullish(),
  dependentLinkCount: z.number().nullish(),
  businessKey: BusinessKeySchema.nullish(),
});
export type Hub = z.infer<typeof HubSchema>;

export const HubReferenceSchema = z.object({
  id: z.string(),
  columnName: z.string(),
  order: z.number().default(0),
  hubId: z.string().nullish(),
  linkId: z.string().nullish(),
});
export type HubReference = z.infer<typeof HubReferenceSchema>;

export const DependentChildColumnSchema = z.object({
  id: z.string(),
  columnName: z.string(),
  dataType: z.string().nullish(),
  typeFullName: z.string().nullish(),
});
export type DependentChildColumn = z.infer<typeof DependentChildColumnSchema>;

export const DataColumnSchema = z.object({
  id: z.string(),
  columnName: z.string(),
  dataType: z.string().nullish(),
  length: z.number().nullish(),
  precision: z.number().nullish(),
  scale: z.number().nullish(),
  typeFullName: z.string().nullish(),
});
export type DataColumn = z.infer<typeof DataColumnSchema>;

/**
 * Hub references arrive as `_embedded.hubReferences._embedded.hubReferences`;
 * dependent children and data columns sit on the link itself.
 */
export const LinkSchema = z.preprocess(
  (value) =>
    isRecord(value) ? { ...value, hubReferences: embeddedList(value, 'hubReferences') } : value,
  z.object({
    ...ModelEntityShape,
    entityType: z.literal('Link').default('Link'),
    linkType: z.string().nullish(),
    dependentLinkCount: z.number().nullish(),
    hubReferences: z.array(HubReferenceSchema),
    dependentChildColumns: z.array(DependentChildColumnSchema).nullish().transform((v) => v ?? []),
    dataColumns: z.array(DataColumnSchema).nullish().transform((v) => v ?? []),
  }),
);
export type Link = z.infer<typeof LinkSchema>;

export const SatelliteColumnSchema = z.object({
  id: z.string(),
  columnName: z.string(),
  dataType: z.string().nullish(),
  typeFullName: z.string().nullish(),
  order: z.number().default(0),
  length: z.number().nullish(),
  precision: z.number().nullish(),
  scale: z.number().nullish(),
  businessName: z.string().nullish(),
  description: z.string().nullish(),
});
export type SatelliteColumn = z.infer<typeof SatelliteColumnSchema>;

export const SATELLITE_PARENT_TYPES = ['hub', 'link'] as const;
export type SatelliteParentType = (typeof SATELLITE_PARENT_TYPES)[number];

export function isSatelliteParentType(value: string): value is SatelliteParentType {
  return value === 'hub' || value === 'link';
}

/**
 * Accepts only values tagged with `entityType === tag`, then parses them with `schema`.
 * Hubs and links share their required fields, so the tag alone tells them apart.
 */
function taggedEntity<T extends z.ZodTypeAny>(tag: string, schema: T) {
  return z
    .custom<Record<string, unknown>>((value) => isRecord(value) && value.entityType === tag, {
      message: `Expected entityType '${tag}'`,
    })
    .pipe(schema);
}

export const SatelliteParentSchema = z.union([taggedEntity('Hub', HubSchema), taggedEntity('Link', LinkSchema)]);

const PARENT_TAGS: Partial<Record<string, 'Hub' | 'Link'>> = { hub: 'Hub', link: 'Link' };

// An expanded parent may come without its tag: take it from the satellite, else from its hub references.
function tagParent(parent: unknown, parentType: unknown): unknown {
  if (!isRecord(parent) || typeof parent.entityType === 'string') {
    return parent;
  }
  const fromSatellite = typeof parentType === 'string' ? PARENT_TAGS[parentType.toLowerCase()] : undefined;
  const entityType = fromSatellite ?? (embeddedList(parent, 'hubReferences').length > 0 ? 'Link' : 'Hub');
  return { ...parent, entityType };
}

function liftSatelliteEmbedded(value: unknown): unknown {
  if (!isRecord(value)) {
    return value;
  }
  const parent = isRecord(value._embedded) ? value._embedded.parent : undefined;
  return { ...value, columns: embeddedList(value, 'columns'), parent: tagParent(parent, value.parentType) };
}

export const SatelliteSchema = z.preprocess(
  liftSatelliteEmbedded,
  z.object({
    ...ModelEntityShape,
    entityType: z.literal('Satellite').default('Satellite'),
    parentType: z.string().nullish(),
    parentId: z.string().nullish(),
    isMultiActive: z.boolean().nullish(),
    mappingCount: z.number().nullish(),
    displayName: z.string().nullish(),
    subSequenceColumn: SatelliteColumnSchema.nullish(),
    columns: z.array(SatelliteColumnSchema),
    parent: SatelliteParentSchema.nullish(),
  }),
);
export type Satellite = z.infer<typeof SatelliteSchema>;

export const ReferenceTableSchema = z.object({
  ...ModelEntityShape,
  entityType: z.literal('ReferenceTable').default('ReferenceTable'),
  mappingCount: z.number().nullish(),
});
export type ReferenceTable = z.infer<typeof ReferenceTableSchema>;

/**
 * Any entity of the model, dispatched on its `entityType` tag.
 */
export const ModelEntitySchema = z.union([
  taggedEntity('Hub', HubSchema),
  taggedEntity('Link', LinkSchema),
  taggedEntity('Satellite', SatelliteSchema),
  taggedEntity('ReferenceTable', ReferenceTableSchema),
]);
export type ModelEntity = z.infer<typeof ModelEntitySchema>;

export const SnapshotSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  type: z.string().nullish(),
});
export type Snapshot = z.infer<typeof SnapshotSchema>;
