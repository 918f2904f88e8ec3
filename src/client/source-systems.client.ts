import { Page, parsePage } from '../types/common';
import { StagingTableScope } from '../types/scope';
import {
  DataPackage,
  DataPackageSchema,
  RawMappingRecord,
  RawMappingRecordSchema,
  SourceSystem,
  SourceSystemSchema,
  StagingTable,
  StagingTableSchema,
  StagingTableSummary,
  StagingTableSummarySchema,
} from '../types/source-system';
import { apiPaths } from './api-paths';
import { BaseClient, MAX_PAGE_LIMIT } from './base.client';

/**
 * Source systems, their data packages and the staging tables inside them.
 * The service accepts a name or an id in every path segment.
 */
export class SourceSystemsClient extends BaseClient {
  async getSourceSystem(projectId: string, sourceSystemIdOrName: string): Promise<SourceSystem> {
    return this.getEntity(SourceSystemSchema, apiPaths.sourceSystem(projectId, sourceSystemIdOrName), {
      kind: 'Source system',
      value: sourceSystemIdOrName,
      scope: `project '${projectId}'`,
    });
  }

  async getDataPackage(
    projectId: string,
    sourceSystemId: string,
    dataPackageIdOrName: string,
  ): Promise<DataPackage> {
    return this.getEntity(
      DataPackageSchema,
      apiPaths.dataPackage(projectId, sourceSystemId, dataPackageIdOrName),
      { kind: 'Data package', value: dataPackageIdOrName, scope: `source system '${sourceSystemId}'` },
    );
  }

  async listStagingTables(
    projectId: string,
    sourceSystemId: string,
    dataPackageId: string,
    index = 0,
    limit = MAX_PAGE_LIMIT,
  ): Promise<Page<StagingTableSummary>> {
    const body = await this.transport.get(apiPaths.stagingTables(projectId, sourceSystemId, dataPackageId), {
      index,
      limit,
    });
    return parsePage(body, 'dataPackageTables', StagingTableSummarySchema);
  }

  /**
   * Staging table with its column catalogue. `scope.tableId` may be a name.
   */
  async getStagingTable(scope: StagingTableScope): Promise<StagingTable> {
    return this.getEntity(StagingTableSchema, apiPaths.stagingTable(scope), {
      kind: 'Staging table',
      value: scope.tableId,
      scope: `data package '${scope.dataPackageId}'`,
    });
  }

  /**
   * Raw mapping records attached to a staging table, left undecoded.
   */
  async listStagingTableMappings(
    scope: StagingTableScope,
    index = 0,
    limit = MAX_PAGE_LIMIT,
  ): Promise<Page<RawMappingRecord>> {
    const body = await this.transport.get(apiPaths.stagingTableMappings(scope), { index, limit });
    return parsePage(body, 'mappings', RawMappingRecordSchema);
  }
}
