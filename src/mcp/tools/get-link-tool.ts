import { McpTool } from '../types';

export const getLinkTool: McpTool = {
  name: 'get_link',
  description: `Get a link with its hub references, dependent child columns and data columns.

Use the hub reference column names as hubReferenceNameOrId in map_columns_to_link.`,
  parameters: {
    type: 'object',
    properties: {
      projectName: {
        type: 'string',
        description: 'Technical name of the project (use technicalName from get_projects)',
      },
      linkIdOrName: {
        type: 'string',
        description: 'ID (GUID) or name of the link',
      },
    },
    required: ['projectName', 'linkIdOrName'],
  },
  returns: {
    type: 'object',
    description: 'Link entity including hubReferences, dependentChildColumns and dataColumns',
  },
  annotations: {
    title: 'Get Link',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },
};
