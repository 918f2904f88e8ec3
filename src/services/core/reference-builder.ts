import { apiPaths } from '../../client/api-paths';
import { StagingTableScope } from '../../types/scope';
import { InvalidArgumentError } from '../../utils/errors';

/**
 * Builds the absolute entity URLs the mapping endpoints take as payload values.
 * No network calls; empty components are rejected.
 */
export class ReferenceBuilder {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    if (!baseUrl || !baseUrl.trim()) {
      throw new InvalidArgumentError('baseUrl must not be empty');
    }
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  hub(projectId: string, hubIdOrName: string): string {
    return this.baseUrl + apiPaths.hub(projectId, hubIdOrName);
  }

  link(projectId: string, linkId: string): string {
    return this.baseUrl + apiPaths.link(projectId, linkId);
  }

  hubReference(projectId: string, linkId: string, hubReferenceId: string): string {
    return this.baseUrl + apiPaths.hubReference(projectId, linkId, hubReferenceId);
  }

  stagingTable(scope: StagingTableScope): string {
    return this.baseUrl + apiPaths.stagingTable(scope);
  }

  /**
   * The service takes a column name or id here, so the value is not resolved.
   */
  stagingColumn(scope: StagingTableScope, columnNameOrId: string): string {
    return this.baseUrl + apiPaths.stagingTableColumn(scope, columnNameOrId);
  }

  hubMapping(projectId: string, hubMappingId: string): string {
    return this.baseUrl + apiPaths.mapping(projectId, 'hub', hubMappingId);
  }
}
