import { compactJson } from '../../../utils/json.utils';
import { SdkToolHandler } from '../../tool-handlers';
import {
  DeleteMappingInputSchema,
  MapColumnToHubInputSchema,
  MapColumnsToLinkInputSchema,
  MapColumnsToSatelliteInputSchema,
  UpdateSatelliteMappingInputSchema,
} from '../../schemas/tool-schemas';
import { logToolExecution, parseToolParams } from '../../utils/error-utils';

/**
 * Handlers for the mapping write tools. Each validates its arguments, then
 * hands the request to the mapping assembler.
 */

export const mapColumnToHubHandler: SdkToolHandler = async (params, context, services) => {
  const request = parseToolParams(MapColumnToHubInputSchema, params);
  logToolExecution(context, 'map_column_to_hub', request);
  const mapping = await services.assembler.createHubMapping(context, request);
  return compactJson(mapping);
};

export const mapColumnsToLinkHandler: SdkToolHandler = async (params, context, services) => {
  const request = parseToolParams(MapColumnsToLinkInputSchema, params);
  logToolExecution(context, 'map_columns_to_link', {
    projectName: request.projectName,
    stagingTableIdOrName: request.stagingTableIdOrName,
    linkIdOrName: request.linkIdOrName,
    isFullLoad: request.isFullLoad,
  });
  const mapping = await services.assembler.createLinkMapping(context, request);
  return compactJson(mapping);
};

export const mapColumnsToSatelliteHandler: SdkToolHandler = async (params, context, services) => {
  const { parentMappingId, ...request } = parseToolParams(MapColumnsToSatelliteInputSchema, params);
  logToolExecution(context, 'map_columns_to_satellite', {
    projectName: request.projectName,
    stagingTableIdOrName: request.stagingTableIdOrName,
    satelliteName: request.satelliteName,
    parentMappingId,
    parentType: request.parentType,
  });
  const mapping = await services.assembler.createSatelliteMapping(context, {
    ...request,
    parentMappingIdOrName: parentMappingId,
  });
  return compactJson(mapping);
};

export const updateSatelliteMappingHandler: SdkToolHandler = async (params, context, services) => {
  const request = parseToolParams(UpdateSatelliteMappingInputSchema, params);
  logToolExecution(context, 'update_staging_table_satellite_mapping', {
    projectName: request.projectName,
    stagingTableIdOrName: request.stagingTableIdOrName,
    satelliteMappingIdOrName: request.satelliteMappingIdOrName,
  });
  const mapping = await services.assembler.updateSatelliteMapping(context, request);
  return compactJson(mapping);
};

export const deleteMappingHandler: SdkToolHandler = async (params, context, services) => {
  const { tableIdOrName, ...request } = parseToolParams(DeleteMappingInputSchema, params);
  logToolExecution(context, 'delete_staging_table_mapping', { ...request, tableIdOrName });
  return services.assembler.deleteMapping(context, { ...request, stagingTableIdOrName: tableIdOrName });
};
