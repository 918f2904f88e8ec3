import { SatelliteParentType } from '../types/model';
import {
  HubMapping,
  HubMappingPayload,
  LinkMapping,
  LinkMappingPayload,
  SatelliteMapping,
  SatelliteMappingPayload,
  decodeHubMapping,
  decodeLinkMapping,
  decodeSatelliteMapping,
} from '../types/mapping';
import { apiPaths } from './api-paths';
import { BaseClient } from './base.client';

/**
 * Write side of the mapping endpoints. Every answer is decoded through the mapping model.
 */
export class MappingsClient extends BaseClient {
  async createHubMapping(projectId: string, payload: HubMappingPayload): Promise<HubMapping> {
    const body = await this.transport.post(apiPaths.mappings(projectId, 'hub'), payload);
    return decodeHubMapping(body);
  }

  async createLinkMapping(projectId: string, payload: LinkMappingPayload): Promise<LinkMapping> {
    const body = await this.transport.post(apiPaths.mappings(projectId, 'link'), payload);
    return decodeLinkMapping(body);
  }

  async createSatelliteMapping(
    projectId: string,
    parentType: SatelliteParentType,
    parentMappingId: string,
    payload: SatelliteMappingPayload,
  ): Promise<SatelliteMapping> {
    const body = await this.transport.post(
      apiPaths.satelliteMappings(projectId, parentType, parentMappingId),
      payload,
    );
    return decodeSatelliteMapping(body);
  }

  async updateSatelliteMapping(
    projectId: string,
    parentType: SatelliteParentType,
    parentMappingId: string,
    satelliteMappingId: string,
    payload: SatelliteMappingPayload,
  ): Promise<SatelliteMapping> {
    const body = await this.transport.put(
      apiPaths.satelliteMapping(projectId, parentType, parentMappingId, satelliteMappingId),
      payload,
    );
    return decodeSatelliteMapping(body);
  }

  /**
   * Deletes whatever mapping lives at `path`; callers derive the path from the mapping graph.
   */
  async deleteMapping(path: string): Promise<void> {
    this.logger.debug({ path }, 'Deleting mapping');
    await this.transport.delete(path);
  }
}
