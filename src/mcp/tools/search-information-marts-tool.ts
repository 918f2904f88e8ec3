import { McpTool } from '../types';

export const searchInformationMartsTool: McpTool = {
  name: 'search_information_marts',
  description: `Search the information marts of a project, each with the id, name, order and description of its scripts.`,
  parameters: {
    type: 'object',
    properties: {
      projectName: {
        type: 'string',
        description: 'Technical name of the project (use technicalName from get_projects)',
      },
      searchName: {
        type: 'string',
        description: 'Only information marts whose name contains this text. Omit to list all.',
      },
      index: { type: 'integer', description: 'Page index (default: 0)' },
      limit: { type: 'integer', description: 'Page size (default: 10)' },
    },
    required: ['projectName'],
  },
  returns: {
    type: 'object',
    properties: {
      paging: { type: 'object', description: 'index, limit and total of the page' },
      informationMarts: { type: 'array', description: 'Information marts with their scripts', items: { type: 'object' } },
    },
  },
  annotations: {
    title: 'Search Information Marts',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },
};
