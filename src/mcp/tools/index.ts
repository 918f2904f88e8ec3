/**
 * MCP Tools - Index File
 */

import { McpTool } from '../types';
import { deleteMappingTool } from './delete-mapping-tool';
import { getInformationMartScriptTool } from './get-information-mart-script-tool';
import { getLinkTool } from './get-link-tool';
import { getProjectsTool } from './get-projects-tool';
import { getSatelliteTool } from './get-satellite-tool';
import { getSnapshotsTool } from './get-snapshots-tool';
import { getStagingTableTool } from './get-staging-table-tool';
import { mapColumnToHubTool } from './map-column-to-hub-tool';
import { mapColumnsToLinkTool } from './map-columns-to-link-tool';
import { mapColumnsToSatelliteTool } from './map-columns-to-satellite-tool';
import { searchInformationMartsTool } from './search-information-marts-tool';
import { searchModelTool } from './search-model-tool';
import { updateSatelliteMappingTool } from './update-satellite-mapping-tool';

export {
  deleteMappingTool,
  getInformationMartScriptTool,
  getLinkTool,
  getProjectsTool,
  getSatelliteTool,
  getSnapshotsTool,
  getStagingTableTool,
  mapColumnToHubTool,
  mapColumnsToLinkTool,
  mapColumnsToSatelliteTool,
  searchInformationMartsTool,
  searchModelTool,
  updateSatelliteMappingTool,
};

/**
 * Tools broadcast by the MCP server
 */
export const METAVAULT_MCP_TOOLS: McpTool[] = [
  getProjectsTool,
  getStagingTableTool,
  getSatelliteTool,
  getLinkTool,
  searchModelTool,
  getSnapshotsTool,
  searchInformationMartsTool,
  getInformationMartScriptTool,
  mapColumnToHubTool,
  mapColumnsToLinkTool,
  mapColumnsToSatelliteTool,
  updateSatelliteMappingTool,
  deleteMappingTool,
];
