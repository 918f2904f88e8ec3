import { Page, parsePage } from '../types/common';
import {
  Hub,
  HubSchema,
  Link,
  LinkSchema,
  ModelEntity,
  ModelEntitySchema,
  Satellite,
  SatelliteParentType,
  SatelliteSchema,
  Snapshot,
  SnapshotSchema,
} from '../types/model';
import { apiPaths } from './api-paths';
import { BaseClient, MAX_PAGE_LIMIT } from './base.client';

export interface ModelSearch {
  searchString?: string;
  index?: number;
  limit?: number;
  includeHubs?: boolean;
  includeLinks?: boolean;
  includeSatellites?: boolean;
  includeReferenceTables?: boolean;
}

export const DEFAULT_MODEL_SEARCH_LIMIT = 10;

/**
 * Raw-vault model entities: hubs, links, satellites and snapshots
 */
export class ModelClient extends BaseClient {
  /**
   * Searches hubs, links, satellites and reference tables. Every kind is included unless switched off.
   */
  async search(projectId: string, search: ModelSearch = {}): Promise<Page<ModelEntity>> {
    const body = await this.transport.get(apiPaths.model(projectId), {
      index: search.index ?? 0,
      limit: search.limit ?? DEFAULT_MODEL_SEARCH_LIMIT,
      searchString: search.searchString,
      includeHubs: search.includeHubs ?? true,
      includeLinks: search.includeLinks ?? true,
      includeSatellites: search.includeSatellites ?? true,
      includeReferenceTables: search.includeReferenceTables ?? true,
    });
    return parsePage(body, 'entities', ModelEntitySchema);
  }

  async getHub(projectId: string, hubIdOrName: string): Promise<Hub> {
    return this.getEntity(HubSchema, apiPaths.hub(projectId, hubIdOrName), {
      kind: 'Hub',
      value: hubIdOrName,
      scope: `project '${projectId}'`,
    });
  }

  /**
   * Link with its hub references, dependent child columns and data columns
   */
  async getLink(projectId: string, linkIdOrName: string): Promise<Link> {
    return this.getEntity(LinkSchema, apiPaths.link(projectId, linkIdOrName), {
      kind: 'Link',
      value: linkIdOrName,
      scope: `project '${projectId}'`,
    });
  }

  async getSatellite(
    projectId: string,
    parentType: SatelliteParentType,
    parentId: string,
    satelliteIdOrName: string,
  ): Promise<Satellite> {
    return this.getEntity(
      SatelliteSchema,
      apiPaths.satellite(projectId, parentType, parentId, satelliteIdOrName),
      { kind: 'Satellite', value: satelliteIdOrName, scope: `${parentType} '${parentId}'` },
      { expand: 'parent' },
    );
  }

  async listSnapshots(projectId: string, index = 0, limit = MAX_PAGE_LIMIT): Promise<Page<Snapshot>> {
    const body = await this.transport.get(apiPaths.snapshots(projectId), { index, limit });
    return parsePage(body, 'snapshots', SnapshotSchema);
  }
}
