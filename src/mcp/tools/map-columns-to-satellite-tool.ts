import { McpTool } from '../types';
import {
  LOCATOR_REQUIRED,
  satelliteContentParameters,
  stagingTableLocatorParameters,
  stagingTableParameter,
} from './locator-parameters';

export const mapColumnsToSatelliteTool: McpTool = {
  name: 'map_columns_to_satellite',
  description: `Map staging table columns to a satellite attached to a hub mapping or a link mapping of the same staging table.`,
  parameters: {
    type: 'object',
    properties: {
      ...stagingTableLocatorParameters,
      stagingTableIdOrName: stagingTableParameter,
      ...satelliteContentParameters,
      parentMappingId: {
        type: 'string',
        description: 'ID (GUID) or name of the hub or link mapping the satellite is attached to',
      },
      parentType: {
        type: 'string',
        description: 'Type of the parent mapping: "hub" or "link"',
      },
    },
    required: [...LOCATOR_REQUIRED, 'satelliteName', 'columnNames', 'parentMappingId', 'parentType'],
  },
  returns: {
    type: 'object',
    description: 'The created satellite mapping',
  },
  annotations: {
    title: 'Map Columns To Satellite',
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: false,
    openWorldHint: true,
  },
};
