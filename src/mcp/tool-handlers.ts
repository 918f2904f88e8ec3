import { IServiceContainer } from '../services/core/service-container.interface';
import { ToolHandlerContext } from './types/sdk-custom';

import {
  deleteMappingHandler,
  mapColumnToHubHandler,
  mapColumnsToLinkHandler,
  mapColumnsToSatelliteHandler,
  updateSatelliteMappingHandler,
} from './services/handlers/mapping-handlers';
import {
  getInformationMartScriptHandler,
  getLinkHandler,
  getProjectsHandler,
  getSatelliteHandler,
  getSnapshotsHandler,
  getStagingTableHandler,
  searchInformationMartsHandler,
  searchModelHandler,
} from './services/handlers/read-handlers';

export type SdkToolHandler<TParams = Record<string, unknown>, TResult = unknown> = (
  params: TParams,
  context: ToolHandlerContext,
  services: IServiceContainer,
) => Promise<TResult>;

/**
 * Tool handlers keyed by tool name
 */
export const toolHandlers: Record<string, SdkToolHandler> = {
  get_projects: getProjectsHandler,
  get_staging_table: getStagingTableHandler,
  get_satellite: getSatelliteHandler,
  get_link: getLinkHandler,
  search_model: searchModelHandler,
  get_snapshots: getSnapshotsHandler,
  search_information_marts: searchInformationMartsHandler,
  get_information_mart_script: getInformationMartScriptHandler,
  map_column_to_hub: mapColumnToHubHandler,
  map_columns_to_link: mapColumnsToLinkHandler,
  map_columns_to_satellite: mapColumnsToSatelliteHandler,
  update_staging_table_satellite_mapping: updateSatelliteMappingHandler,
  delete_staging_table_mapping: deleteMappingHandler,
};
