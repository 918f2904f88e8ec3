import { McpTool } from '../types';
import { stagingTableLocatorParameters } from './locator-parameters';

/**
 * Staging table with its columns and a readable view of every mapping on it
 */
export const getStagingTableTool: McpTool = {
  name: 'get_staging_table',
  description: `Get a staging table with its columns and its mappings.

Each mapping is listed with its column mappings as "source column -> destination" pairs:
- Hub mappings map one column to the business key (bk) of the hub
- Link mappings map hub mappings to hub references, and columns to dependent children and data columns
- Satellite mappings map columns to satellite columns of the same name

Mapping types the server does not know are listed without column mappings.`,
  parameters: {
    type: 'object',
    properties: {
      ...stagingTableLocatorParameters,
      tableIdOrName: {
        type: 'string',
        description: 'ID (GUID) or name of the staging table',
      },
    },
    required: ['projectName', 'sourceSystemIdOrName', 'dataPackageIdOrName', 'tableIdOrName'],
  },
  returns: {
    type: 'object',
    properties: {
      id: { type: 'string', description: 'Staging table ID' },
      tableName: { type: 'string', description: 'Staging table name' },
      columns: { type: 'array', description: 'Column catalogue', items: { type: 'object' } },
      mappings: { type: 'array', description: 'Reconstructed mappings', items: { type: 'object' } },
    },
  },
  annotations: {
    title: 'Get Staging Table',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },
};
