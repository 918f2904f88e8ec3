import { McpTool } from '../types';

export const getSnapshotsTool: McpTool = {
  name: 'get_snapshots',
  description: `List the snapshots of a project. Every snapshot is returned unless a page is asked for.`,
  parameters: {
    type: 'object',
    properties: {
      projectName: {
        type: 'string',
        description: 'Technical name of the project (use technicalName from get_projects)',
      },
      index: { type: 'integer', description: 'Page index (default: 0)' },
      limit: { type: 'integer', description: 'Page size (default: all snapshots)' },
    },
    required: ['projectName'],
  },
  returns: {
    type: 'object',
    properties: {
      paging: { type: 'object', description: 'index, limit and total of the page' },
      snapshots: { type: 'array', description: 'Snapshots with id, name, description and type', items: { type: 'object' } },
    },
  },
  annotations: {
    title: 'Get Snapshots',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },
};
