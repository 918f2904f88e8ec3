import { z } from 'zod';
import { MappingDecodeError } from '../utils/errors';
import { isRecord, renameKeys } from './common';

export const MAPPING_TYPES = ['Hub', 'Link', 'Satellite'] as const;
export type MappingType = (typeof MAPPING_TYPES)[number];

export function isMappingType(value: unknown): value is MappingType {
  return value === 'Hub' || value === 'Link' || value === 'Satellite';
}

const BaseMappingShape = {
  id: z.string(),
  name: z.string(),
  parentName: z.string(),
  dataPackageTableId: z.string(),
  sourceSystemName: z.string().nullish(),
  dataPackageName: z.string().nullish(),
  dataPackageTableName: z.string().nullish(),
};

export const BusinessKeyMappingSchema = z.object({
  businessKeyId: z.string(),
  columnId: z.string(),
});

export const HubReferenceColumnMappingSchema = z.object({
  hubReferenceId: z.string(),
  mappingId: z.string(),
});

// The service names both link-column ids `linkColumnId` / `tableColumnId` on the wire.
export const DependentChildColumnMappingSchema = z.preprocess(
  renameKeys({ linkColumnId: 'dependentChildId', tableColumnId: 'stagingTableColumnId' }),
  z.object({
    dependentChildId: z.string(),
    stagingTableColumnId: z.string(),
  }),
);

export const DataColumnMappingSchema = z.preprocess(
  renameKeys({ linkColumnId: 'dataColumnId', tableColumnId: 'stagingTableColumnId' }),
  z.object({
    dataColumnId: z.string(),
    stagingTableColumnId: z.string(),
  }),
);

export const SatelliteColumnMappingSchema = z.object({
  satelliteColumnId: z.string(),
  stagingTableColumnId: z.string(),
});

export const HubMappingSchema = z.object({
  ...BaseMappingShape,
  mappingType: z.literal('Hub'),
  hubId: z.string(),
  isFullLoad: z.boolean(),
  expectNullBusinessKey: z.boolean(),
  businessKeyMapping: BusinessKeyMappingSchema,
});

export const LinkMappingSchema = z.object({
  ...BaseMappingShape,
  mappingType: z.literal('Link'),
  linkId: z.string(),
  isFullLoad: z.boolean(),
  hubReferenceColumnMappings: z.array(HubReferenceColumnMappingSchema).default([]),
  dependentChildColumnMappings: z.array(DependentChildColumnMappingSchema).default([]),
  dataColumnMappings: z.array(DataColumnMappingSchema).default([]),
});

/**
 * A satellite hangs off a hub or a link. At least one parent id is required;
 * a record carrying both is accepted.
 */
export const SatelliteMappingSchema = z
  .object({
    ...BaseMappingShape,
    mappingType: z.literal('Satellite'),
    hubId: z.string().nullish(),
    linkId: z.string().nullish(),
    satelliteId: z.string(),
    satelliteParentMappingId: z.string(),
    satelliteColumnMappings: z.array(SatelliteColumnMappingSchema).default([]),
    subSequenceColumnId: z.string().nullish(),
  })
  .refine((mapping) => Boolean(mapping.hubId) || Boolean(mapping.linkId), {
    message: 'SatelliteMapping must have either hubId or linkId',
  });

export type BusinessKeyMapping = z.infer<typeof BusinessKeyMappingSchema>;
export type HubReferenceColumnMapping = z.infer<typeof HubReferenceColumnMappingSchema>;
export type DependentChildColumnMapping = z.infer<typeof DependentChildColumnMappingSchema>;
export type DataColumnMapping = z.infer<typeof DataColumnMappingSchema>;
export type SatelliteColumnMapping = z.infer<typeof SatelliteColumnMappingSchema>;

export type HubMapping = z.infer<typeof HubMappingSchema>;
export type LinkMapping = z.infer<typeof LinkMappingSchema>;
export type SatelliteMapping = z.infer<typeof SatelliteMappingSchema>;
export type StagingTableMapping = HubMapping | LinkMapping | SatelliteMapping;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function decodeVariant<T extends z.ZodTypeAny>(schema: T, record: unknown, label: string): z.output<T> {
  const result = schema.safeParse(record);
  if (!result.success) {
    throw new MappingDecodeError(`Invalid ${label} mapping: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function decodeHubMapping(record: unknown): HubMapping {
  return decodeVariant(HubMappingSchema, record, 'Hub');
}

export function decodeLinkMapping(record: unknown): LinkMapping {
  return decodeVariant(LinkMappingSchema, record, 'Link');
}

export function decodeSatelliteMapping(record: unknown): SatelliteMapping {
  return decodeVariant(SatelliteMappingSchema, record, 'Satellite');
}

/**
 * Decodes a remote mapping record by reading its `mappingType` tag first and
 * validating the fields of the matching variant. Unknown tags are rejected.
 */
export function decodeMapping(record: unknown): StagingTableMapping {
  const tag = isRecord(record) ? record.mappingType : undefined;
  switch (tag) {
    case 'Hub':
      return decodeHubMapping(record);
    case 'Link':
      return decodeLinkMapping(record);
    case 'Satellite':
      return decodeSatelliteMapping(record);
    default:
      throw new MappingDecodeError(`Unknown mapping type '${String(tag)}'`);
  }
}

// Request bodies sent to the mapping endpoints.

export interface HubMappingPayload {
  hub: string;
  isFullLoad: boolean;
  expectNullBusinessKey: boolean;
  dataPackageTable: string;
  dataPackageColumn: string;
}

export interface HubReferenceDetail {
  hubMapping: string;
  hubReference: string;
}

export interface LinkColumnMappingPayload {
  linkColumnId: string;
  dataPackageTableColumn: string;
}

export interface LinkMappingPayload {
  link: string;
  isFullLoad: boolean;
  dataPackageTable: string;
  hubReferencesDetails?: HubReferenceDetail[];
  linkMappingDependentChildColumns?: LinkColumnMappingPayload[];
  linkMappingDataColumns?: LinkColumnMappingPayload[];
}

export interface SatelliteMappingPayload {
  satelliteColumns: string[];
  satelliteName: string;
  stagingTable: string;
  isMultiActive: boolean;
  subSequenceColumn?: string;
}

// Read-side view produced by the reconstructor.

export type DestinationType = 'businessKey' | 'hubReference' | 'dependentChild' | 'dataColumn' | 'satelliteColumn';

export interface ColumnMapping {
  sourceColumnName: string;
  destinationId: string;
  destinationType: DestinationType;
  destinationColumnName: string;
}

export interface FormattedMapping {
  id: string;
  name: string;
  parentName: string;
  mappingType: MappingType;
  columnMappings: ColumnMapping[];
  isFullLoad?: boolean;
}

/**
 * Emitted for mapping kinds this layer does not know about.
 */
export interface DegradedMapping {
  id: string;
  name: string;
  parentName: string;
  mappingType: string;
}

export type MappingView = FormattedMapping | DegradedMapping;
