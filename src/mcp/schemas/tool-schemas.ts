import { z } from 'zod';

const text = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .refine((value) => value.trim().length > 0, `${field} is required`);

const flag = (field: string) => z.boolean({ invalid_type_error: `${field} must be a boolean` }).optional();

const optionalText = (field: string) =>
  z.string({ invalid_type_error: `${field} must be a string` }).optional();

const PageShape = {
  index: z
    .number({ invalid_type_error: 'index must be a number' })
    .int('index must be an integer')
    .min(0, 'index must not be negative')
    .optional(),
  limit: z
    .number({ invalid_type_error: 'limit must be a number' })
    .int('limit must be an integer')
    .min(1, 'limit must be at least 1')
    .optional(),
};

const StagingTableLocatorShape = {
  projectName: text('projectName'),
  sourceSystemIdOrName: text('sourceSystemIdOrName'),
  dataPackageIdOrName: text('dataPackageIdOrName'),
};

// ============================================
// Read tools
// ============================================

export const GetProjectsInputSchema = z.object({});

export const GetStagingTableInputSchema = z.object({
  ...StagingTableLocatorShape,
  tableIdOrName: text('tableIdOrName'),
});
export type GetStagingTableInput = z.infer<typeof GetStagingTableInputSchema>;

export const GetSatelliteInputSchema = z.object({
  projectName: text('projectName'),
  parentType: text('parentType'),
  parentIdOrName: text('parentIdOrName'),
  satelliteIdOrName: text('satelliteIdOrName'),
});
export type GetSatelliteInput = z.infer<typeof GetSatelliteInputSchema>;

export const GetLinkInputSchema = z.object({
  projectName: text('projectName'),
  linkIdOrName: text('linkIdOrName'),
});
export type GetLinkInput = z.infer<typeof GetLinkInputSchema>;

export const SearchModelInputSchema = z.object({
  projectName: text('projectName'),
  searchString: optionalText('searchString'),
  ...PageShape,
  includeHubs: flag('includeHubs'),
  includeLinks: flag('includeLinks'),
  includeSatellites: flag('includeSatellites'),
  includeReferenceTables: flag('includeReferenceTables'),
});
export type SearchModelInput = z.infer<typeof SearchModelInputSchema>;

export const GetSnapshotsInputSchema = z.object({
  projectName: text('projectName'),
  ...PageShape,
});
export type GetSnapshotsInput = z.infer<typeof GetSnapshotsInputSchema>;

export const SearchInformationMartsInputSchema = z.object({
  projectName: text('projectName'),
  searchName: optionalText('searchName'),
  ...PageShape,
});
export type SearchInformationMartsInput = z.infer<typeof SearchInformationMartsInputSchema>;

export const GetInformationMartScriptInputSchema = z.object({
  projectName: text('projectName'),
  informationMartIdOrName: text('informationMartIdOrName'),
  scriptIdOrName: text('scriptIdOrName'),
});
export type GetInformationMartScriptInput = z.infer<typeof GetInformationMartScriptInputSchema>;

// ============================================
// Mapping tools
// ============================================

export const MapColumnToHubInputSchema = z.object({
  ...StagingTableLocatorShape,
  stagingTableIdOrName: text('stagingTableIdOrName'),
  columnNameOrId: text('columnNameOrId'),
  hubIdOrName: text('hubIdOrName'),
  isFullLoad: flag('isFullLoad'),
  expectNullBusinessKey: flag('expectNullBusinessKey'),
});
export type MapColumnToHubInput = z.infer<typeof MapColumnToHubInputSchema>;

const LinkColumnInputSchema = z.object({
  linkColumnNameOrId: text('linkColumnNameOrId'),
  stagingColumnNameOrId: text('stagingColumnNameOrId'),
});

export const MapColumnsToLinkInputSchema = z.object({
  ...StagingTableLocatorShape,
  stagingTableIdOrName: text('stagingTableIdOrName'),
  linkIdOrName: text('linkIdOrName'),
  hubReferences: z.array(
    z.object({
      hubMappingIdOrName: text('hubMappingIdOrName'),
      hubReferenceNameOrId: text('hubReferenceNameOrId'),
    }),
    { required_error: 'hubReferences is required' },
  ),
  dependentChildren: z.array(LinkColumnInputSchema).optional(),
  dataColumns: z.array(LinkColumnInputSchema).optional(),
  isFullLoad: flag('isFullLoad'),
});
export type MapColumnsToLinkInput = z.infer<typeof MapColumnsToLinkInputSchema>;

const SatelliteContentShape = {
  satelliteName: text('satelliteName'),
  columnNames: z.array(text('columnNames[]'), { required_error: 'columnNames is required' }),
  isMultiActive: flag('isMultiActive'),
  subSequenceColumn: z.string().optional(),
};

export const MapColumnsToSatelliteInputSchema = z.object({
  ...StagingTableLocatorShape,
  stagingTableIdOrName: text('stagingTableIdOrName'),
  ...SatelliteContentShape,
  parentMappingId: text('parentMappingId'),
  parentType: text('parentType'),
});
export type MapColumnsToSatelliteInput = z.infer<typeof MapColumnsToSatelliteInputSchema>;

export const UpdateSatelliteMappingInputSchema = z.object({
  ...StagingTableLocatorShape,
  stagingTableIdOrName: text('stagingTableIdOrName'),
  ...SatelliteContentShape,
  satelliteMappingIdOrName: text('satelliteMappingIdOrName'),
});
export type UpdateSatelliteMappingInput = z.infer<typeof UpdateSatelliteMappingInputSchema>;

export const DeleteMappingInputSchema = z.object({
  ...StagingTableLocatorShape,
  tableIdOrName: text('tableIdOrName'),
  mappingIdOrName: text('mappingIdOrName'),
});
export type DeleteMappingInput = z.infer<typeof DeleteMappingInputSchema>;
