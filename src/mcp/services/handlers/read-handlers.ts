import { compactJson } from '../../../utils/json.utils';
import { SdkToolHandler } from '../../tool-handlers';
import {
  GetInformationMartScriptInputSchema,
  GetLinkInputSchema,
  GetSatelliteInputSchema,
  GetSnapshotsInputSchema,
  GetStagingTableInputSchema,
  SearchInformationMartsInputSchema,
  SearchModelInputSchema,
} from '../../schemas/tool-schemas';
import { logToolExecution, parseToolParams } from '../../utils/error-utils';

export const getProjectsHandler: SdkToolHandler = async (_params, context, services) => {
  logToolExecution(context, 'get_projects', {});
  const projects = await services.catalog.listProjects(context);
  return compactJson({ projects });
};

export const getStagingTableHandler: SdkToolHandler = async (params, context, services) => {
  const { projectName, sourceSystemIdOrName, dataPackageIdOrName, tableIdOrName } = parseToolParams(
    GetStagingTableInputSchema,
    params,
  );
  logToolExecution(context, 'get_staging_table', {
    projectName,
    sourceSystemIdOrName,
    dataPackageIdOrName,
    tableIdOrName,
  });

  const view = await services.stagingTables.describe(context, {
    projectName,
    sourceSystemIdOrName,
    dataPackageIdOrName,
    stagingTableIdOrName: tableIdOrName,
  });
  return compactJson(view);
};

export const getSatelliteHandler: SdkToolHandler = async (params, context, services) => {
  const locator = parseToolParams(GetSatelliteInputSchema, params);
  logToolExecution(context, 'get_satellite', locator);
  const satellite = await services.catalog.getSatellite(context, locator);
  return compactJson(satellite);
};

export const getLinkHandler: SdkToolHandler = async (params, context, services) => {
  const { projectName, linkIdOrName } = parseToolParams(GetLinkInputSchema, params);
  logToolExecution(context, 'get_link', { projectName, linkIdOrName });
  const link = await services.catalog.getLink(context, projectName, linkIdOrName);
  return compactJson(link);
};

export const searchModelHandler: SdkToolHandler = async (params, context, services) => {
  const { projectName, ...search } = parseToolParams(SearchModelInputSchema, params);
  logToolExecution(context, 'search_model', { projectName, searchString: search.searchString });
  const result = await services.catalog.searchModel(context, projectName, search);
  return compactJson(result);
};

export const getSnapshotsHandler: SdkToolHandler = async (params, context, services) => {
  const { projectName, index, limit } = parseToolParams(GetSnapshotsInputSchema, params);
  logToolExecution(context, 'get_snapshots', { projectName, index, limit });
  const result = await services.catalog.listSnapshots(context, projectName, { index, limit });
  return compactJson(result);
};

// ============================================
// Information marts
// ============================================

export const searchInformationMartsHandler: SdkToolHandler = async (params, context, services) => {
  const { projectName, searchName, index, limit } = parseToolParams(SearchInformationMartsInputSchema, params);
  logToolExecution(context, 'search_information_marts', { projectName, searchName });
  const result = await services.catalog.searchInformationMarts(context, projectName, { searchName, index, limit });
  return compactJson(result);
};

export const getInformationMartScriptHandler: SdkToolHandler = async (params, context, services) => {
  const input = parseToolParams(GetInformationMartScriptInputSchema, params);
  logToolExecution(context, 'get_information_mart_script', input);
  const script = await services.catalog.getInformationMartScript(
    context,
    input.projectName,
    input.informationMartIdOrName,
    input.scriptIdOrName,
  );
  return compactJson(script);
};
