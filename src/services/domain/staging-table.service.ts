import { MetavaultClient } from '../../client/metavault.client';
import { ToolHandlerContext } from '../../mcp/types/sdk-custom';
import { MappingView } from '../../types/mapping';
import { StagingTableLocator, StagingTableScope } from '../../types/scope';
import { StagingTableColumn } from '../../types/source-system';
import { EntityResolverService } from './entity-resolver.service';
import { MappingReconstructorService } from './mapping-reconstructor.service';

export interface StagingTableColumnView {
  id: string;
  name: string;
  dataType: string;
  length?: number | null;
  scale?: number | null;
  precision?: number | null;
  nullable: boolean;
  primaryKey: boolean;
  hardRuleDefinition?: string | null;
}

export interface StagingTableView {
  id: string;
  tableName: string;
  targetTableName?: string | null;
  targetSchemaName?: string | null;
  dataPackageId?: string | null;
  query?: string | null;
  queryType?: string | null;
  isQueryBased?: boolean | null;
  columns: StagingTableColumnView[];
  mappings: MappingView[];
}

function columnView(column: StagingTableColumn): StagingTableColumnView {
  return {
    id: column.id,
    name: column.name,
    dataType: column.dataType,
    length: column.length,
    scale: column.scale,
    precision: column.precision,
    nullable: column.nullable,
    primaryKey: column.primaryKey,
    hardRuleDefinition: column.hardRuleDefinition,
  };
}

/**
 * Read side of a staging table: its columns plus the reconstructed mappings.
 */
export class StagingTableService {
  constructor(
    private readonly client: MetavaultClient,
    private readonly resolver: EntityResolverService,
    private readonly reconstructor: MappingReconstructorService,
  ) {}

  async describe(context: ToolHandlerContext, locator: StagingTableLocator): Promise<StagingTableView> {
    const projectId = await this.resolver.resolveProject(context, locator.projectName);
    // The service takes names in the nested path segments, so only the project is resolved.
    const lookupScope: StagingTableScope = {
      projectId,
      sourceSystemId: locator.sourceSystemIdOrName,
      dataPackageId: locator.dataPackageIdOrName,
      tableId: locator.stagingTableIdOrName,
    };

    const table = await this.client.sourceSystems.getStagingTable(lookupScope);
    const scope: StagingTableScope = { ...lookupScope, tableId: table.id };
    const records = await this.client.sourceSystems.listStagingTableMappings(scope);

    const mappings = await this.reconstructor.reconstruct(context, {
      columns: table.columns,
      records: records.items,
      fetchLink: (linkId) => this.client.model.getLink(projectId, linkId),
    });

    context.logger.debug(
      { tableId: table.id, columns: table.columns.length, mappings: mappings.length },
      'Described staging table',
    );

    return {
      id: table.id,
      tableName: table.tableName,
      targetTableName: table.targetTableName,
      targetSchemaName: table.targetSchemaName,
      dataPackageId: table.dataPackageId,
      query: table.query,
      queryType: table.queryType,
      isQueryBased: table.isQueryBased,
      columns: table.columns.map(columnView),
      mappings,
    };
  }
}
