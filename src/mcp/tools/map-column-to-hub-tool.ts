import { McpTool } from '../types';
import { LOCATOR_REQUIRED, stagingTableLocatorParameters, stagingTableParameter } from './locator-parameters';

export const mapColumnToHubTool: McpTool = {
  name: 'map_column_to_hub',
  description: `Map a staging table column to the business key of a hub.

Map the hubs of a staging table before mapping its links.`,
  parameters: {
    type: 'object',
    properties: {
      ...stagingTableLocatorParameters,
      stagingTableIdOrName: stagingTableParameter,
      columnNameOrId: {
        type: 'string',
        description: 'Name or ID (GUID) of the staging table column',
      },
      hubIdOrName: {
        type: 'string',
        description: 'ID (GUID) or name of the hub',
      },
      isFullLoad: {
        type: 'boolean',
        description:
          'The staging table holds the complete set of business keys on every load, so missing keys are detected as removals (default: false)',
      },
      expectNullBusinessKey: {
        type: 'boolean',
        description:
          'Whether a null business key is expected in this staging table. Selects the ghost record used for nulls (default: false)',
      },
    },
    required: [...LOCATOR_REQUIRED, 'columnNameOrId', 'hubIdOrName'],
  },
  returns: {
    type: 'object',
    description: 'The created hub mapping',
  },
  annotations: {
    title: 'Map Column To Hub',
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: false,
    openWorldHint: true,
  },
};
