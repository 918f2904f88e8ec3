import { McpTool } from '../types';

export const getSatelliteTool: McpTool = {
  name: 'get_satellite',
  description: `Get a satellite of a hub or a link, with its columns and its parent entity.`,
  parameters: {
    type: 'object',
    properties: {
      projectName: {
        type: 'string',
        description: 'Technical name of the project (use technicalName from get_projects)',
      },
      parentType: {
        type: 'string',
        description: 'Type of the parent: "hub" or "link"',
      },
      parentIdOrName: {
        type: 'string',
        description: 'ID (GUID) or name of the parent hub or link',
      },
      satelliteIdOrName: {
        type: 'string',
        description: 'ID (GUID) or name of the satellite',
      },
    },
    required: ['projectName', 'parentType', 'parentIdOrName', 'satelliteIdOrName'],
  },
  returns: {
    type: 'object',
    description: 'Satellite entity including columns and parent',
  },
  annotations: {
    title: 'Get Satellite',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },
};
