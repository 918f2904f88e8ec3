import { SatelliteParentType } from '../types/model';
import { StagingTableScope } from '../types/scope';
import { InvalidArgumentError } from '../utils/errors';

const PROJECTS_ROOT = '/metavault/api/projects';

function segment(value: string, label: string): string {
  if (!value || !value.trim()) {
    throw new InvalidArgumentError(`${label} must not be empty`);
  }
  return encodeURIComponent(value);
}

/**
 * Resource paths relative to the service base URL. Each component is
 * required to be non-empty and is percent-encoded.
 */
export const apiPaths = {
  projects: (): string => PROJECTS_ROOT,

  project: (projectId: string): string => `${PROJECTS_ROOT}/${segment(projectId, 'projectId')}`,

  sourceSystem: (projectId: string, sourceSystemIdOrName: string): string =>
    `${apiPaths.project(projectId)}/metavault/sourcesystems/${segment(sourceSystemIdOrName, 'sourceSystem')}`,

  dataPackage: (projectId: string, sourceSystemIdOrName: string, dataPackageIdOrName: string): string =>
    `${apiPaths.sourceSystem(projectId, sourceSystemIdOrName)}/datapackages/${segment(dataPackageIdOrName, 'dataPackage')}`,

  stagingTables: (projectId: string, sourceSystemIdOrName: string, dataPackageIdOrName: string): string =>
    `${apiPaths.dataPackage(projectId, sourceSystemIdOrName, dataPackageIdOrName)}/tables`,

  stagingTable: (scope: StagingTableScope): string =>
    `${apiPaths.stagingTables(scope.projectId, scope.sourceSystemId, scope.dataPackageId)}/${segment(scope.tableId, 'stagingTable')}`,

  stagingTableColumn: (scope: StagingTableScope, columnNameOrId: string): string =>
    `${apiPaths.stagingTable(scope)}/columns/${segment(columnNameOrId, 'column')}`,

  stagingTableMappings: (scope: StagingTableScope): string => `${apiPaths.stagingTable(scope)}/mappings`,

  model: (projectId: string): string => `${apiPaths.project(projectId)}/model`,

  hub: (projectId: string, hubIdOrName: string): string =>
    `${apiPaths.project(projectId)}/model/hubs/${segment(hubIdOrName, 'hub')}`,

  link: (projectId: string, linkIdOrName: string): string =>
    `${apiPaths.project(projectId)}/model/links/${segment(linkIdOrName, 'link')}`,

  hubReference: (projectId: string, linkId: string, hubReferenceId: string): string =>
    `${apiPaths.link(projectId, linkId)}/hubreferences/${segment(hubReferenceId, 'hubReference')}`,

  satellite: (
    projectId: string,
    parentType: SatelliteParentType,
    parentId: string,
    satelliteIdOrName: string,
  ): string =>
    `${apiPaths.project(projectId)}/model/${parentType}s/${segment(parentId, 'parent')}/satellites/${segment(satelliteIdOrName, 'satellite')}`,

  snapshots: (projectId: string): string => `${apiPaths.project(projectId)}/model/snapshots`,

  informationMarts: (projectId: string): string => `${apiPaths.project(projectId)}/informationmarts`,

  informationMart: (projectId: string, informationMartId: string): string =>
    `${apiPaths.informationMarts(projectId)}/${segment(informationMartId, 'informationMart')}`,

  informationMartScript: (projectId: string, informationMartId: string, scriptId: string): string =>
    `${apiPaths.informationMart(projectId, informationMartId)}/scripts/${segment(scriptId, 'script')}`,

  mappings: (projectId: string, kind: SatelliteParentType): string =>
    `${apiPaths.project(projectId)}/mappings/${kind}s`,

  mapping: (projectId: string, kind: SatelliteParentType, mappingId: string): string =>
    `${apiPaths.mappings(projectId, kind)}/${segment(mappingId, 'mapping')}`,

  satelliteMappings: (projectId: string, parentType: SatelliteParentType, parentId: string): string =>
    `${apiPaths.mapping(projectId, parentType, parentId)}/satellites`,

  satelliteMapping: (
    projectId: string,
    parentType: SatelliteParentType,
    parentId: string,
    satelliteMappingId: string,
  ): string =>
    `${apiPaths.satelliteMappings(projectId, parentType, parentId)}/${segment(satelliteMappingId, 'satelliteMapping')}`,
};
