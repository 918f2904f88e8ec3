import { McpTool } from '../types';
import { stagingTableLocatorParameters } from './locator-parameters';

export const deleteMappingTool: McpTool = {
  name: 'delete_staging_table_mapping',
  description: `Delete a mapping of a staging table.

The mapping type is read from the mapping itself. Satellite mappings are deleted under their parent hub or link.
Call get_staging_table first to find the mapping IDs.`,
  parameters: {
    type: 'object',
    properties: {
      ...stagingTableLocatorParameters,
      tableIdOrName: {
        type: 'string',
        description: 'ID (GUID) or name of the staging table',
      },
      mappingIdOrName: {
        type: 'string',
        description: 'ID (GUID) or name of the mapping to delete',
      },
    },
    required: ['projectName', 'sourceSystemIdOrName', 'dataPackageIdOrName', 'tableIdOrName', 'mappingIdOrName'],
  },
  returns: {
    type: 'object',
    properties: {
      message: { type: 'string', description: 'Confirmation message' },
    },
  },
  annotations: {
    title: 'Delete Staging Table Mapping',
    readOnlyHint: false,
    destructiveHint: true,
    idempotentHint: false,
    openWorldHint: true,
  },
};
