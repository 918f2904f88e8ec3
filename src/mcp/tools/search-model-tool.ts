import { McpTool } from '../types';

export const searchModelTool: McpTool = {
  name: 'search_model',
  description: `Search the hubs, links, satellites and reference tables of a project.

Results are paged and trimmed to summary fields. Satellites show the name of their parent hub or link.`,
  parameters: {
    type: 'object',
    properties: {
      projectName: {
        type: 'string',
        description: 'Technical name of the project (use technicalName from get_projects)',
      },
      searchString: {
        type: 'string',
        description: 'Text to look for in entity names. Omit to list everything.',
      },
      index: {
        type: 'integer',
        description: 'Page index (default: 0)',
      },
      limit: {
        type: 'integer',
        description: 'Page size (default: 10)',
      },
      includeHubs: { type: 'boolean', description: 'Include hubs (default: true)' },
      includeLinks: { type: 'boolean', description: 'Include links (default: true)' },
      includeSatellites: { type: 'boolean', description: 'Include satellites (default: true)' },
      includeReferenceTables: { type: 'boolean', description: 'Include reference tables (default: true)' },
    },
    required: ['projectName'],
  },
  returns: {
    type: 'object',
    properties: {
      paging: { type: 'object', description: 'index, limit and total of the page' },
      entities: {
        type: 'array',
        description: 'Entities tagged by entityType: Hub, Link, Satellite or ReferenceTable',
        items: { type: 'object' },
      },
    },
  },
  annotations: {
    title: 'Search Model',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },
};
