import { MetavaultClient } from '../../client/metavault.client';
import { ToolHandlerContext } from '../../mcp/types/sdk-custom';
import { decodeMapping } from '../../types/mapping';
import { SatelliteParentType } from '../../types/model';
import { StagingTableLocator, StagingTableScope } from '../../types/scope';
import { InvalidArgumentError, NotFoundError } from '../../utils/errors';
import { isCanonicalId } from '../../utils/id.utils';
import { LookupIndex, findFirstByName } from '../core/lookup-index';

export type EntityKind =
  | 'Project'
  | 'Source system'
  | 'Data package'
  | 'Staging table'
  | 'Hub'
  | 'Link'
  | 'Snapshot'
  | 'Information mart'
  | 'Script'
  | 'Hub mapping'
  | 'Link mapping';

/**
 * Name-to-id lookup for one entity kind. `undefined` means no entity has that name.
 */
export type IdLookup = (name: string) => Promise<string | undefined>;

/**
 * Canonical identifiers pass through untouched, without a remote call and
 * without an existence check. Names go through `lookup`.
 */
export async function resolveIdOrName(
  context: ToolHandlerContext,
  kind: EntityKind,
  idOrName: string,
  lookup: IdLookup,
  scope?: string,
): Promise<string> {
  if (!idOrName || !idOrName.trim()) {
    throw new InvalidArgumentError(`${kind} identifier must not be empty`);
  }
  if (isCanonicalId(idOrName)) {
    return idOrName;
  }
  const id = await lookup(idOrName);
  if (id === undefined) {
    throw new NotFoundError(kind, idOrName, scope);
  }
  context.logger.debug({ kind, name: idOrName, id }, `Resolved ${kind} name to id`);
  return id;
}

const MART_LOOKUP_LIMIT = 1000;

export class EntityResolverService {
  constructor(private readonly client: MetavaultClient) {}

  async resolveProject(context: ToolHandlerContext, projectIdOrName: string): Promise<string> {
    return resolveIdOrName(context, 'Project', projectIdOrName, async (name) => {
      const project = await this.client.projects.findByName(name);
      return project.id;
    });
  }

  async resolveSourceSystem(
    context: ToolHandlerContext,
    projectId: string,
    sourceSystemIdOrName: string,
  ): Promise<string> {
    return resolveIdOrName(context, 'Source system', sourceSystemIdOrName, async (name) => {
      const sourceSystem = await this.client.sourceSystems.getSourceSystem(projectId, name);
      return sourceSystem.id;
    });
  }

  async resolveDataPackage(
    context: ToolHandlerContext,
    projectId: string,
    sourceSystemId: string,
    dataPackageIdOrName: string,
  ): Promise<string> {
    return resolveIdOrName(context, 'Data package', dataPackageIdOrName, async (name) => {
      const dataPackage = await this.client.sourceSystems.getDataPackage(projectId, sourceSystemId, name);
      return dataPackage.id;
    });
  }

  async resolveStagingTableId(
    context: ToolHandlerContext,
    projectId: string,
    sourceSystemId: string,
    dataPackageId: string,
    stagingTableIdOrName: string,
  ): Promise<string> {
    return resolveIdOrName(
      context,
      'Staging table',
      stagingTableIdOrName,
      async (name) => {
        const page = await this.client.sourceSystems.listStagingTables(projectId, sourceSystemId, dataPackageId);
        return findFirstByName(page.items, name, (table) => table.tableName, context.logger, 'staging table')?.id;
      },
      `data package '${dataPackageId}'`,
    );
  }

  /**
   * Chained resolution: each level needs the resolved id of the level above it.
   */
  async resolveStagingTable(
    context: ToolHandlerContext,
    locator: StagingTableLocator,
  ): Promise<StagingTableScope> {
    const projectId = await this.resolveProject(context, locator.projectName);
    const sourceSystemId = await this.resolveSourceSystem(context, projectId, locator.sourceSystemIdOrName);
    const dataPackageId = await this.resolveDataPackage(
      context,
      projectId,
      sourceSystemId,
      locator.dataPackageIdOrName,
    );
    const tableId = await this.resolveStagingTableId(
      context,
      projectId,
      sourceSystemId,
      dataPackageId,
      locator.stagingTableIdOrName,
    );
    return { projectId, sourceSystemId, dataPackageId, tableId };
  }

  async resolveHub(context: ToolHandlerContext, projectId: string, hubIdOrName: string): Promise<string> {
    return resolveIdOrName(context, 'Hub', hubIdOrName, async (name) => {
      const hub = await this.client.model.getHub(projectId, name);
      return hub.id;
    });
  }

  async resolveLink(context: ToolHandlerContext, projectId: string, linkIdOrName: string): Promise<string> {
    return resolveIdOrName(context, 'Link', linkIdOrName, async (name) => {
      const link = await this.client.model.getLink(projectId, name);
      return link.id;
    });
  }

  async resolveSnapshot(context: ToolHandlerContext, projectId: string, snapshotIdOrName: string): Promise<string> {
    return resolveIdOrName(
      context,
      'Snapshot',
      snapshotIdOrName,
      async (name) => {
        const page = await this.client.model.listSnapshots(projectId);
        return findFirstByName(page.items, name, (snapshot) => snapshot.name, context.logger, 'snapshot')?.id;
      },
      `project '${projectId}'`,
    );
  }

  async resolveInformationMart(
    context: ToolHandlerContext,
    projectId: string,
    informationMartIdOrName: string,
  ): Promise<string> {
    return resolveIdOrName(
      context,
      'Information mart',
      informationMartIdOrName,
      async (name) => {
        const page = await this.client.informationMarts.search(projectId, {
          nameContains: name,
          limit: MART_LOOKUP_LIMIT,
        });
        return findFirstByName(page.items, name, (mart) => mart.name, context.logger, 'information mart')?.id;
      },
      `project '${projectId}'`,
    );
  }

  async resolveScript(
    context: ToolHandlerContext,
    projectId: string,
    informationMartId: string,
    scriptIdOrName: string,
  ): Promise<string> {
    return resolveIdOrName(
      context,
      'Script',
      scriptIdOrName,
      async (name) => {
        const mart = await this.client.informationMarts.get(projectId, informationMartId);
        return findFirstByName(mart.scripts, name, (script) => script.name, context.logger, 'script')?.id;
      },
      `information mart '${informationMartId}'`,
    );
  }

  /**
   * Resolves the hub or link mapping a satellite mapping attaches to, among
   * the mappings of the staging table.
   */
  async resolveParentMapping(
    context: ToolHandlerContext,
    scope: StagingTableScope,
    parentType: SatelliteParentType,
    parentMappingIdOrName: string,
  ): Promise<string> {
    const kind: EntityKind = parentType === 'hub' ? 'Hub mapping' : 'Link mapping';
    const tag = parentType === 'hub' ? 'Hub' : 'Link';
    return resolveIdOrName(
      context,
      kind,
      parentMappingIdOrName,
      async (name) => {
        const page = await this.client.sourceSystems.listStagingTableMappings(scope);
        const parents = page.items.filter((record) => record.mappingType === tag).map(decodeMapping);
        return LookupIndex.byEntityName(parents).resolve(name)?.id;
      },
      `staging table '${scope.tableId}'`,
    );
  }
}
