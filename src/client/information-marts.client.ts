import { Page, parsePage } from '../types/common';
import {
  InformationMart,
  InformationMartSchema,
  InformationMartScript,
  InformationMartScriptSchema,
} from '../types/information-mart';
import { apiPaths } from './api-paths';
import { BaseClient } from './base.client';

export interface InformationMartSearch {
  nameContains?: string;
  index?: number;
  limit?: number;
}

export const DEFAULT_SEARCH_LIMIT = 10;

export class InformationMartsClient extends BaseClient {
  /**
   * Substring search on the mart name; without `nameContains` every mart is listed.
   * Callers filter for exact matches.
   */
  async search(projectId: string, search: InformationMartSearch = {}): Promise<Page<InformationMart>> {
    const body = await this.transport.get(apiPaths.informationMarts(projectId), {
      index: search.index ?? 0,
      limit: search.limit ?? DEFAULT_SEARCH_LIMIT,
      filter: search.nameContains ? `name contains ${search.nameContains}` : undefined,
    });
    return parsePage(body, 'informationMarts', InformationMartSchema);
  }

  /**
   * Information mart with its scripts
   */
  async get(projectId: string, informationMartId: string): Promise<InformationMart> {
    return this.getEntity(InformationMartSchema, apiPaths.informationMart(projectId, informationMartId), {
      kind: 'Information mart',
      value: informationMartId,
      scope: `project '${projectId}'`,
    });
  }

  /**
   * Script with its columns and their source columns
   */
  async getScript(projectId: string, informationMartId: string, scriptId: string): Promise<InformationMartScript> {
    return this.getEntity(
      InformationMartScriptSchema,
      apiPaths.informationMartScript(projectId, informationMartId, scriptId),
      { kind: 'Script', value: scriptId, scope: `information mart '${informationMartId}'` },
    );
  }
}
