import { MetavaultClient } from '../../client/metavault.client';
import { ModelSearch } from '../../client/model.client';
import { ToolHandlerContext } from '../../mcp/types/sdk-custom';
import { Page } from '../../types/common';
import { InformationMart, InformationMartScript } from '../../types/information-mart';
import { isSatelliteParentType, Link, ModelEntity, Satellite, Snapshot } from '../../types/model';
import { Project } from '../../types/project';
import { errorMessage, InvalidArgumentError, isMetavaultError } from '../../utils/errors';
import { EntityResolverService } from './entity-resolver.service';

export interface SatelliteLocator {
  projectName: string;
  parentType: string;
  parentIdOrName: string;
  satelliteIdOrName: string;
}

export interface Paging {
  index: number;
  limit: number;
  total: number;
}

export interface PageRequest {
  index?: number;
  limit?: number;
}

interface EntitySummaryBase {
  id: string;
  name: string;
  tableName?: string | null;
  businessDescription?: string | null;
  technicalDescription?: string | null;
}

export type ModelEntitySummary =
  | (EntitySummaryBase & {
      entityType: 'Hub';
      satelliteCount?: number | null;
      dependentLinkCount?: number | null;
      businessKeyLength?: number | null;
    })
  | (EntitySummaryBase & { entityType: 'Link'; linkType?: string | null; dependentLinkCount?: number | null })
  | (EntitySummaryBase & {
      entityType: 'Satellite';
      parentType?: string | null;
      parentName: string | null;
      isMultiActive?: boolean | null;
      mappingCount?: number | null;
    })
  | (EntitySummaryBase & { entityType: 'ReferenceTable'; mappingCount?: number | null });

export interface ModelSearchResult {
  paging: Paging;
  entities: ModelEntitySummary[];
}

export interface InformationMartSummary {
  id: string;
  name: string;
  businessDescription?: string | null;
  technicalDescription?: string | null;
  schema?: string | null;
  prefix?: string | null;
  scriptsCount?: number | null;
  snapshotId?: string | null;
  scripts: Array<Pick<InformationMartScript, 'id' | 'name' | 'order' | 'businessDescription'>>;
}

export interface InformationMartSearchResult {
  paging: Paging;
  informationMarts: InformationMartSummary[];
}

function pagingOf<T>(page: Page<T>): Paging {
  return { index: page.index, limit: page.limit, total: page.total };
}

function summarizeMart(mart: InformationMart): InformationMartSummary {
  return {
    id: mart.id,
    name: mart.name,
    businessDescription: mart.businessDescription,
    technicalDescription: mart.technicalDescription,
    schema: mart.schema,
    prefix: mart.prefix,
    scriptsCount: mart.scriptsCount,
    snapshotId: mart.snapshotId,
    scripts: mart.scripts.map(({ id, name, order, businessDescription }) => ({
      id,
      name,
      order,
      businessDescription,
    })),
  };
}

/**
 * Read-only lookups over projects and model entities.
 */
export class CatalogService {
  constructor(
    private readonly client: MetavaultClient,
    private readonly resolver: EntityResolverService,
  ) {}

  async listProjects(context: ToolHandlerContext): Promise<Project[]> {
    const page = await this.client.projects.list();
    context.logger.debug({ total: page.total }, 'Listed projects');
    return page.items;
  }

  async getSatellite(context: ToolHandlerContext, locator: SatelliteLocator): Promise<Satellite> {
    const { parentType } = locator;
    if (!isSatelliteParentType(parentType)) {
      throw new InvalidArgumentError(`Invalid parentType '${parentType}'. Must be 'hub' or 'link'`);
    }
    const projectId = await this.resolver.resolveProject(context, locator.projectName);
    const parentId =
      parentType === 'hub'
        ? await this.resolver.resolveHub(context, projectId, locator.parentIdOrName)
        : await this.resolver.resolveLink(context, projectId, locator.parentIdOrName);
    return this.client.model.getSatellite(projectId, parentType, parentId, locator.satelliteIdOrName);
  }

  async getLink(context: ToolHandlerContext, projectName: string, linkIdOrName: string): Promise<Link> {
    const projectId = await this.resolver.resolveProject(context, projectName);
    return this.client.model.getLink(projectId, linkIdOrName);
  }

  /**
   * Searches the model and trims every entity to its summary fields. Satellites
   * carry their parent's name instead of its id.
   */
  async searchModel(
    context: ToolHandlerContext,
    projectName: string,
    search: ModelSearch,
  ): Promise<ModelSearchResult> {
    const projectId = await this.resolver.resolveProject(context, projectName);
    const page = await this.client.model.search(projectId, search);

    const parentNames = new Map<string, string | null>();
    for (const entity of page.items) {
      if (entity.entityType === 'Hub' || entity.entityType === 'Link') {
        parentNames.set(entity.id, entity.name);
      }
    }
    context.logger.debug({ total: page.total, parents: parentNames.size }, 'Searched model');

    const entities: ModelEntitySummary[] = [];
    for (const entity of page.items) {
      entities.push(await this.summarizeEntity(context, projectId, entity, parentNames));
    }
    return { paging: pagingOf(page), entities };
  }

  async listSnapshots(
    context: ToolHandlerContext,
    projectName: string,
    request: PageRequest,
  ): Promise<{ paging: Paging; snapshots: Snapshot[] }> {
    const projectId = await this.resolver.resolveProject(context, projectName);
    const page = await this.client.model.listSnapshots(projectId, request.index, request.limit);
    return { paging: pagingOf(page), snapshots: page.items };
  }

  async searchInformationMarts(
    context: ToolHandlerContext,
    projectName: string,
    request: PageRequest & { searchName?: string },
  ): Promise<InformationMartSearchResult> {
    const projectId = await this.resolver.resolveProject(context, projectName);
    const page = await this.client.informationMarts.search(projectId, {
      nameContains: request.searchName,
      index: request.index,
      limit: request.limit,
    });
    return { paging: pagingOf(page), informationMarts: page.items.map(summarizeMart) };
  }

  async getInformationMartScript(
    context: ToolHandlerContext,
    projectName: string,
    informationMartIdOrName: string,
    scriptIdOrName: string,
  ): Promise<InformationMartScript> {
    const projectId = await this.resolver.resolveProject(context, projectName);
    const martId = await this.resolver.resolveInformationMart(context, projectId, informationMartIdOrName);
    const scriptId = await this.resolver.resolveScript(context, projectId, martId, scriptIdOrName);
    return this.client.informationMarts.getScript(projectId, martId, scriptId);
  }

  private async summarizeEntity(
    context: ToolHandlerContext,
    projectId: string,
    entity: ModelEntity,
    parentNames: Map<string, string | null>,
  ): Promise<ModelEntitySummary> {
    const base: EntitySummaryBase = {
      id: entity.id,
      name: entity.name,
      tableName: entity.tableName,
      businessDescription: entity.businessDescription,
      technicalDescription: entity.technicalDescription,
    };
    switch (entity.entityType) {
      case 'Hub':
        return {
          ...base,
          entityType: 'Hub',
          satelliteCount: entity.satelliteCount,
          dependentLinkCount: entity.dependentLinkCount,
          businessKeyLength: entity.businessKey?.length,
        };
      case 'Link':
        return {
          ...base,
          entityType: 'Link',
          linkType: entity.linkType,
          dependentLinkCount: entity.dependentLinkCount,
        };
      case 'Satellite':
        return {
          ...base,
          entityType: 'Satellite',
          parentType: entity.parentType,
          parentName: await this.parentName(context, projectId, entity, parentNames),
          isMultiActive: entity.isMultiActive,
          mappingCount: entity.mappingCount,
        };
      case 'ReferenceTable':
        return { ...base, entityType: 'ReferenceTable', mappingCount: entity.mappingCount };
    }
  }

  /**
   * Parents outside the search results are fetched once each. A parent that
   * cannot be fetched leaves the name empty.
   */
  private async parentName(
    context: ToolHandlerContext,
    projectId: string,
    satellite: Satellite,
    parentNames: Map<string, string | null>,
  ): Promise<string | null> {
    const { parentId, parentType } = satellite;
    if (!parentId || !parentType) {
      return null;
    }
    const known = parentNames.get(parentId);
    if (known !== undefined) {
      return known;
    }

    let name: string | null = null;
    try {
      if (parentType === 'Hub') {
        name = (await this.client.model.getHub(projectId, parentId)).name;
      } else if (parentType === 'Link') {
        name = (await this.client.model.getLink(projectId, parentId)).name;
      }
    } catch (error) {
      if (!isMetavaultError(error)) {
        throw error;
      }
      context.logger.warn(
        { parentType, parentId, satellite: satellite.name, error: errorMessage(error) },
        'Could not fetch satellite parent',
      );
    }
    parentNames.set(parentId, name);
    return name;
  }
}
