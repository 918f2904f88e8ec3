import { McpParameterSchema, McpTool } from '../types';
import { LOCATOR_REQUIRED, stagingTableLocatorParameters, stagingTableParameter } from './locator-parameters';

const linkColumnItem: McpParameterSchema = {
  type: 'object',
  properties: {
    linkColumnNameOrId: { type: 'string', description: 'Name or ID of the link column' },
    stagingColumnNameOrId: { type: 'string', description: 'Name or ID of the staging table column' },
  },
  required: ['linkColumnNameOrId', 'stagingColumnNameOrId'],
};

export const mapColumnsToLinkTool: McpTool = {
  name: 'map_columns_to_link',
  description: `Map staging table columns to a link.

Every hub reference of the link must be mapped to a hub mapping of the same staging table, so map the hubs first.
When dependent children or data columns are given, every one of them must be mapped.`,
  parameters: {
    type: 'object',
    properties: {
      ...stagingTableLocatorParameters,
      stagingTableIdOrName: stagingTableParameter,
      linkIdOrName: {
        type: 'string',
        description: 'ID (GUID) or name of the link',
      },
      hubReferences: {
        type: 'array',
        description: 'One entry per hub reference of the link',
        items: {
          type: 'object',
          properties: {
            hubMappingIdOrName: { type: 'string', description: 'ID or name of the hub mapping' },
            hubReferenceNameOrId: { type: 'string', description: 'Column name or ID of the hub reference' },
          },
          required: ['hubMappingIdOrName', 'hubReferenceNameOrId'],
        },
      },
      dependentChildren: {
        type: 'array',
        description: 'Dependent child columns of the link (optional)',
        items: linkColumnItem,
      },
      dataColumns: {
        type: 'array',
        description: 'Data columns of the link (optional)',
        items: linkColumnItem,
      },
      isFullLoad: {
        type: 'boolean',
        description:
          'The staging table holds the complete set of relationships on every load, so missing ones are detected as removals (default: true)',
      },
    },
    required: [...LOCATOR_REQUIRED, 'linkIdOrName', 'hubReferences'],
  },
  returns: {
    type: 'object',
    description: 'The created link mapping',
  },
  annotations: {
    title: 'Map Columns To Link',
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: false,
    openWorldHint: true,
  },
};
