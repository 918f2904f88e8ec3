import { ToolHandlerContext } from '../../mcp/types/sdk-custom';
import {
  ColumnMapping,
  HubMapping,
  LinkMapping,
  MappingView,
  SatelliteMapping,
  StagingTableMapping,
  decodeMapping,
  isMappingType,
} from '../../types/mapping';
import { Link } from '../../types/model';
import { RawMappingRecord, StagingTableColumn } from '../../types/source-system';
import { errorMessage } from '../../utils/errors';

// Downstream storage column of every hub business key.
const BUSINESS_KEY_COLUMN = 'bk';

export type LinkFetcher = (linkId: string) => Promise<Link>;

export interface ReconstructionInput {
  columns: readonly StagingTableColumn[];
  records: readonly RawMappingRecord[];
  fetchLink: LinkFetcher;
}

interface LinkCatalogue {
  hubReferences: Map<string, string>;
  dependentChildren: Map<string, string>;
  dataColumns: Map<string, string>;
}

type DecodedRecord =
  | { known: true; mapping: StagingTableMapping }
  | { known: false; record: RawMappingRecord };

function catalogueOf(link: Link | null): LinkCatalogue {
  const byId = (entries: readonly { id: string; columnName: string }[]) =>
    new Map(entries.map((entry) => [entry.id, entry.columnName]));
  return {
    hubReferences: byId(link?.hubReferences ?? []),
    dependentChildren: byId(link?.dependentChildColumns ?? []),
    dataColumns: byId(link?.dataColumns ?? []),
  };
}

/**
 * Rebuilds a readable `source column -> destination` view of the mappings of
 * one staging table. Links are fetched lazily and cached for one pass only.
 */
export class MappingReconstructorService {
  async reconstruct(context: ToolHandlerContext, input: ReconstructionInput): Promise<MappingView[]> {
    const columnNames = new Map(input.columns.map((column) => [column.id, column.name]));
    const sourceName = (columnId: string): string => columnNames.get(columnId) ?? columnId;

    const decoded: DecodedRecord[] = input.records.map((record) =>
      isMappingType(record.mappingType)
        ? { known: true, mapping: decodeMapping(record) }
        : { known: false, record },
    );

    // Business-key column feeding each hub mapping, for the link hub references.
    const hubSourceColumns = new Map<string, string>();
    for (const entry of decoded) {
      if (entry.known && entry.mapping.mappingType === 'Hub') {
        hubSourceColumns.set(entry.mapping.id, sourceName(entry.mapping.businessKeyMapping.columnId));
      }
    }

    const links = new Map<string, LinkCatalogue>();
    for (const entry of decoded) {
      if (entry.known && entry.mapping.mappingType === 'Link' && !links.has(entry.mapping.linkId)) {
        links.set(entry.mapping.linkId, await this.loadLink(context, entry.mapping.linkId, input.fetchLink));
      }
    }

    return decoded.map((entry): MappingView => {
      if (!entry.known) {
        context.logger.debug({ mappingType: entry.record.mappingType }, 'Unknown mapping type, degrading');
        return {
          id: entry.record.id,
          name: entry.record.name,
          parentName: typeof entry.record.parentName === 'string' ? entry.record.parentName : '',
          mappingType: entry.record.mappingType,
        };
      }
      const mapping = entry.mapping;
      switch (mapping.mappingType) {
        case 'Hub':
          return {
            ...this.header(mapping),
            columnMappings: [this.hubColumn(mapping, hubSourceColumns)],
            isFullLoad: mapping.isFullLoad,
          };
        case 'Link':
          return {
            ...this.header(mapping),
            columnMappings: this.linkColumns(
              mapping,
              links.get(mapping.linkId) ?? catalogueOf(null),
              hubSourceColumns,
              sourceName,
            ),
            isFullLoad: mapping.isFullLoad,
          };
        case 'Satellite':
          return {
            ...this.header(mapping),
            columnMappings: this.satelliteColumns(mapping, sourceName),
          };
      }
    });
  }

  /**
   * A failed link fetch yields an empty catalogue: destination names then fall back to ids.
   */
  private async loadLink(context: ToolHandlerContext, linkId: string, fetchLink: LinkFetcher): Promise<LinkCatalogue> {
    try {
      return catalogueOf(await fetchLink(linkId));
    } catch (error) {
      context.logger.warn({ linkId, error: errorMessage(error) }, `Failed to fetch link ${linkId}`);
      return catalogueOf(null);
    }
  }

  private header(mapping: StagingTableMapping) {
    return {
      id: mapping.id,
      name: mapping.name,
      parentName: mapping.parentName,
      mappingType: mapping.mappingType,
    };
  }

  private hubColumn(mapping: HubMapping, hubSourceColumns: Map<string, string>): ColumnMapping {
    return {
      sourceColumnName: hubSourceColumns.get(mapping.id) ?? '',
      destinationId: mapping.businessKeyMapping.businessKeyId,
      destinationType: 'businessKey',
      destinationColumnName: BUSINESS_KEY_COLUMN,
    };
  }

  private linkColumns(
    mapping: LinkMapping,
    catalogue: LinkCatalogue,
    hubSourceColumns: Map<string, string>,
    sourceName: (columnId: string) => string,
  ): ColumnMapping[] {
    const hubReferences = mapping.hubReferenceColumnMappings.map(
      (ref): ColumnMapping => ({
        sourceColumnName: hubSourceColumns.get(ref.mappingId) ?? '',
        destinationId: ref.hubReferenceId,
        destinationType: 'hubReference',
        destinationColumnName: catalogue.hubReferences.get(ref.hubReferenceId) ?? ref.hubReferenceId,
      }),
    );
    const dependentChildren = mapping.dependentChildColumnMappings.map(
      (child): ColumnMapping => ({
        sourceColumnName: sourceName(child.stagingTableColumnId),
        destinationId: child.dependentChildId,
        destinationType: 'dependentChild',
        destinationColumnName: catalogue.dependentChildren.get(child.dependentChildId) ?? child.dependentChildId,
      }),
    );
    const dataColumns = mapping.dataColumnMappings.map(
      (column): ColumnMapping => ({
        sourceColumnName: sourceName(column.stagingTableColumnId),
        destinationId: column.dataColumnId,
        destinationType: 'dataColumn',
        destinationColumnName: catalogue.dataColumns.get(column.dataColumnId) ?? column.dataColumnId,
      }),
    );
    return [...hubReferences, ...dependentChildren, ...dataColumns];
  }

  // Satellite columns keep the staging column name.
  private satelliteColumns(mapping: SatelliteMapping, sourceName: (columnId: string) => string): ColumnMapping[] {
    return mapping.satelliteColumnMappings.map((column): ColumnMapping => {
      const name = sourceName(column.stagingTableColumnId);
      return {
        sourceColumnName: name,
        destinationId: column.satelliteColumnId,
        destinationType: 'satelliteColumn',
        destinationColumnName: name,
      };
    });
  }
}
