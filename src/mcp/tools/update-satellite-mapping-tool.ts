import { McpTool } from '../types';
import {
  LOCATOR_REQUIRED,
  satelliteContentParameters,
  stagingTableLocatorParameters,
  stagingTableParameter,
} from './locator-parameters';

export const updateSatelliteMappingTool: McpTool = {
  name: 'update_staging_table_satellite_mapping',
  description: `Replace the content of a satellite mapping of a staging table.

The parent hub or link mapping is found from the satellite mapping itself.`,
  parameters: {
    type: 'object',
    properties: {
      ...stagingTableLocatorParameters,
      stagingTableIdOrName: stagingTableParameter,
      satelliteMappingIdOrName: {
        type: 'string',
        description: 'ID (GUID) or name of the satellite mapping. Use the ID when known.',
      },
      ...satelliteContentParameters,
    },
    required: [...LOCATOR_REQUIRED, 'satelliteMappingIdOrName', 'satelliteName', 'columnNames'],
  },
  returns: {
    type: 'object',
    description: 'The updated satellite mapping',
  },
  annotations: {
    title: 'Update Satellite Mapping',
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },
};
