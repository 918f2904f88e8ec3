import { McpParameterSchema } from '../types';

// Shared by every tool that addresses a staging table. The table parameter itself varies per tool.
export const stagingTableLocatorParameters: Record<string, McpParameterSchema> = {
  projectName: {
    type: 'string',
    description: 'Technical name of the project (use technicalName from get_projects)',
  },
  sourceSystemIdOrName: {
    type: 'string',
    description: 'ID (GUID) or name of the source system',
  },
  dataPackageIdOrName: {
    type: 'string',
    description: 'ID (GUID) or name of the data package',
  },
};

export const stagingTableParameter: McpParameterSchema = {
  type: 'string',
  description: 'ID (GUID) or name of the staging table',
};

export const LOCATOR_REQUIRED = [
  'projectName',
  'sourceSystemIdOrName',
  'dataPackageIdOrName',
  'stagingTableIdOrName',
];

export const satelliteContentParameters: Record<string, McpParameterSchema> = {
  satelliteName: {
    type: 'string',
    description: 'Name of the satellite, without the parent name prefix',
  },
  columnNames: {
    type: 'array',
    description: 'Staging table columns to include in the satellite',
    items: { type: 'string' },
  },
  isMultiActive: {
    type: 'boolean',
    description: 'Whether the satellite is multi-active (default: false). Leave false unless asked otherwise.',
  },
  subSequenceColumn: {
    type: 'string',
    description:
      'Column ordering the rows of one business key in a delta-driven multi-active satellite. Omit for a standard multi-active satellite.',
  },
};
