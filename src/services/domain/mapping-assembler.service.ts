import { apiPaths } from '../../client/api-paths';
import { MetavaultClient } from '../../client/metavault.client';
import { ToolHandlerContext } from '../../mcp/types/sdk-custom';
import {
  HubMapping,
  HubMappingPayload,
  HubReferenceDetail,
  LinkColumnMappingPayload,
  LinkMapping,
  LinkMappingPayload,
  SatelliteMapping,
  SatelliteMappingPayload,
  decodeHubMapping,
  decodeLinkMapping,
  decodeSatelliteMapping,
} from '../../types/mapping';
import { Link, SatelliteParentType, isSatelliteParentType } from '../../types/model';
import { StagingTableLocator, StagingTableScope } from '../../types/scope';
import { RawMappingRecord } from '../../types/source-system';
import { InvalidArgumentError, MappingDecodeError, NotFoundError } from '../../utils/errors';
import { LookupIndex } from '../core/lookup-index';
import { ReferenceBuilder } from '../core/reference-builder';
import { EntityResolverService } from './entity-resolver.service';

export interface HubMappingRequest extends StagingTableLocator {
  hubIdOrName: string;
  columnNameOrId: string;
  isFullLoad?: boolean;
  expectNullBusinessKey?: boolean;
}

export interface HubReferenceInput {
  hubMappingIdOrName: string;
  hubReferenceNameOrId: string;
}

export interface LinkColumnInput {
  linkColumnNameOrId: string;
  stagingColumnNameOrId: string;
}

export interface LinkMappingRequest extends StagingTableLocator {
  linkIdOrName: string;
  hubReferences: HubReferenceInput[];
  dependentChildren?: LinkColumnInput[];
  dataColumns?: LinkColumnInput[];
  isFullLoad?: boolean;
}

interface SatelliteContent {
  satelliteName: string;
  columnNames: string[];
  isMultiActive?: boolean;
  subSequenceColumn?: string;
}

export interface SatelliteMappingRequest extends StagingTableLocator, SatelliteContent {
  parentType: string;
  parentMappingIdOrName: string;
}

export interface SatelliteMappingUpdateRequest extends StagingTableLocator, SatelliteContent {
  satelliteMappingIdOrName: string;
}

export interface DeleteMappingRequest extends StagingTableLocator {
  mappingIdOrName: string;
}

export interface DeleteMappingResult {
  message: string;
}

function requireText(value: string | undefined, field: string): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new InvalidArgumentError(`${field} is required`);
  }
  return value;
}

function requireColumns(columnNames: string[] | undefined): string[] {
  if (!Array.isArray(columnNames) || columnNames.length === 0) {
    throw new InvalidArgumentError('columnNames must contain at least one column');
  }
  columnNames.forEach((name, index) => requireText(name, `columnNames[${index}]`));
  return columnNames;
}

function mappingIndex(records: readonly RawMappingRecord[]): LookupIndex<RawMappingRecord> {
  return LookupIndex.byEntityName(records);
}

function tableScopeLabel(scope: StagingTableScope): string {
  return `staging table '${scope.tableId}'`;
}

/**
 * Finds the record a satellite mapping hangs off. Its own record only names
 * the parent mapping, not the hub or link behind it.
 */
function findSatelliteParent(
  satellite: SatelliteMapping,
  records: readonly RawMappingRecord[],
  scope: StagingTableScope,
): { parentType: SatelliteParentType; record: RawMappingRecord } {
  const record = records.find((candidate) => candidate.id === satellite.satelliteParentMappingId);
  if (!record) {
    throw new NotFoundError('Parent mapping', satellite.satelliteParentMappingId, tableScopeLabel(scope));
  }
  const parentType = record.mappingType.toLowerCase();
  if (!isSatelliteParentType(parentType)) {
    throw new MappingDecodeError(
      `Invalid parent mapping type '${record.mappingType}' for satellite mapping '${satellite.id}'`,
    );
  }
  return { parentType, record };
}

/**
 * DELETE path for a mapping record. Hub and link mappings are addressed by
 * their own id; a satellite mapping is addressed under the hub or link that
 * owns its parent mapping.
 */
export function deletionPath(
  scope: StagingTableScope,
  target: RawMappingRecord,
  records: readonly RawMappingRecord[],
): string {
  switch (target.mappingType) {
    case 'Hub':
      return apiPaths.mapping(scope.projectId, 'hub', target.id);
    case 'Link':
      return apiPaths.mapping(scope.projectId, 'link', target.id);
    case 'Satellite': {
      const satellite = decodeSatelliteMapping(target);
      const parent = findSatelliteParent(satellite, records, scope);
      const ownerId =
        parent.parentType === 'hub'
          ? decodeHubMapping(parent.record).hubId
          : decodeLinkMapping(parent.record).linkId;
      return apiPaths.satelliteMapping(scope.projectId, parent.parentType, ownerId, target.id);
    }
    default:
      throw new MappingDecodeError(`Unknown mapping type '${target.mappingType}'`);
  }
}

/**
 * Every catalogue entry must be covered by the caller's entries.
 */
function assertComplete<T extends { id: string; columnName: string }>(
  catalogue: readonly T[],
  mappedIds: ReadonlySet<string>,
  what: string,
  link: Link,
): void {
  const missing = catalogue.filter((entry) => !mappedIds.has(entry.id)).map((entry) => entry.columnName);
  if (missing.length > 0) {
    throw new InvalidArgumentError(
      `All ${what} of link '${link.name}' must be mapped; missing: ${missing.join(', ')}`,
    );
  }
}

/**
 * Turns name-level mapping requests into the reference payloads the mapping
 * endpoints expect. Nothing is cached between calls.
 */
export class MappingAssemblerService {
  constructor(
    private readonly client: MetavaultClient,
    private readonly resolver: EntityResolverService,
    private readonly references: ReferenceBuilder,
  ) {}

  async createHubMapping(context: ToolHandlerContext, request: HubMappingRequest): Promise<HubMapping> {
    const hubIdOrName = requireText(request.hubIdOrName, 'hubIdOrName');
    const columnNameOrId = requireText(request.columnNameOrId, 'columnNameOrId');

    const scope = await this.resolver.resolveStagingTable(context, request);
    const payload: HubMappingPayload = {
      hub: this.references.hub(scope.projectId, hubIdOrName),
      isFullLoad: request.isFullLoad ?? false,
      expectNullBusinessKey: request.expectNullBusinessKey ?? false,
      dataPackageTable: this.references.stagingTable(scope),
      dataPackageColumn: this.references.stagingColumn(scope, columnNameOrId),
    };

    context.logger.debug({ payload }, 'Submitting hub mapping');
    return this.client.mappings.createHubMapping(scope.projectId, payload);
  }

  async createLinkMapping(context: ToolHandlerContext, request: LinkMappingRequest): Promise<LinkMapping> {
    const linkIdOrName = requireText(request.linkIdOrName, 'linkIdOrName');
    if (!Array.isArray(request.hubReferences) || request.hubReferences.length === 0) {
      throw new InvalidArgumentError('hubReferences must contain at least one entry');
    }
    request.hubReferences.forEach((entry, index) => {
      requireText(entry.hubMappingIdOrName, `hubReferences[${index}].hubMappingIdOrName`);
      requireText(entry.hubReferenceNameOrId, `hubReferences[${index}].hubReferenceNameOrId`);
    });
    const dependentChildren = request.dependentChildren ?? [];
    const dataColumns = request.dataColumns ?? [];
    this.validateLinkColumns(dependentChildren, 'dependentChildren');
    this.validateLinkColumns(dataColumns, 'dataColumns');

    const scope = await this.resolver.resolveStagingTable(context, request);
    const link = await this.client.model.getLink(scope.projectId, linkIdOrName);
    const mappings = await this.client.sourceSystems.listStagingTableMappings(scope);
    await context.sendProgress({ status: 'in-progress', message: `Resolved link '${link.name}'` });

    const hubMappings = LookupIndex.byEntityName(
      mappings.items.filter((record) => record.mappingType === 'Hub').map(decodeHubMapping),
    );
    const hubReferences = LookupIndex.byColumnName(link.hubReferences);

    const hubReferencesDetails: HubReferenceDetail[] = [];
    const mappedHubReferences = new Set<string>();
    for (const entry of request.hubReferences) {
      const hubMapping = hubMappings.resolve(entry.hubMappingIdOrName);
      if (!hubMapping) {
        throw new NotFoundError('Hub mapping', entry.hubMappingIdOrName, tableScopeLabel(scope));
      }
      const hubReference = hubReferences.resolve(entry.hubReferenceNameOrId);
      if (!hubReference) {
        throw new NotFoundError('Hub reference', entry.hubReferenceNameOrId, `link '${link.name}'`);
      }
      if (mappedHubReferences.has(hubReference.id)) {
        throw new InvalidArgumentError(
          `Hub reference '${hubReference.columnName}' of link '${link.name}' is mapped more than once`,
        );
      }
      mappedHubReferences.add(hubReference.id);
      hubReferencesDetails.push({
        hubMapping: this.references.hubMapping(scope.projectId, hubMapping.id),
        hubReference: this.references.hubReference(scope.projectId, link.id, hubReference.id),
      });
    }
    assertComplete(link.hubReferences, mappedHubReferences, 'hub references', link);

    const dependentChildColumns = this.resolveLinkColumns(
      scope,
      link,
      dependentChildren,
      LookupIndex.byColumnName(link.dependentChildColumns),
      'Dependent child column',
    );
    if (dependentChildren.length > 0) {
      assertComplete(link.dependentChildColumns, dependentChildColumns.ids, 'dependent child columns', link);
    }

    const dataColumnMappings = this.resolveLinkColumns(
      scope,
      link,
      dataColumns,
      LookupIndex.byColumnName(link.dataColumns),
      'Data column',
    );
    if (dataColumns.length > 0) {
      assertComplete(link.dataColumns, dataColumnMappings.ids, 'data columns', link);
    }

    const payload: LinkMappingPayload = {
      link: this.references.link(scope.projectId, link.id),
      isFullLoad: request.isFullLoad ?? true,
      dataPackageTable: this.references.stagingTable(scope),
      ...(hubReferencesDetails.length > 0 ? { hubReferencesDetails } : {}),
      ...(dependentChildColumns.entries.length > 0
        ? { linkMappingDependentChildColumns: dependentChildColumns.entries }
        : {}),
      ...(dataColumnMappings.entries.length > 0 ? { linkMappingDataColumns: dataColumnMappings.entries } : {}),
    };

    context.logger.debug(
      {
        link: payload.link,
        hubReferences: hubReferencesDetails.length,
        dependentChildren: dependentChildColumns.entries.length,
        dataColumns: dataColumnMappings.entries.length,
      },
      'Submitting link mapping',
    );
    return this.client.mappings.createLinkMapping(scope.projectId, payload);
  }

  async createSatelliteMapping(
    context: ToolHandlerContext,
    request: SatelliteMappingRequest,
  ): Promise<SatelliteMapping> {
    const parentType = request.parentType;
    if (!isSatelliteParentType(parentType)) {
      throw new InvalidArgumentError(`Invalid parentType '${parentType}'. Must be 'hub' or 'link'`);
    }
    const parentMappingIdOrName = requireText(request.parentMappingIdOrName, 'parentMappingId');
    this.validateSatelliteContent(request);

    const scope = await this.resolver.resolveStagingTable(context, request);
    const parentMappingId = await this.resolver.resolveParentMapping(
      context,
      scope,
      parentType,
      parentMappingIdOrName,
    );
    const payload = this.satellitePayload(scope, request);

    context.logger.debug({ parentType, parentMappingId, payload }, 'Submitting satellite mapping');
    return this.client.mappings.createSatelliteMapping(scope.projectId, parentType, parentMappingId, payload);
  }

  /**
   * The parent kind is not supplied by the caller: it is read from the
   * satellite's parent mapping in the staging table's mapping list.
   */
  async updateSatelliteMapping(
    context: ToolHandlerContext,
    request: SatelliteMappingUpdateRequest,
  ): Promise<SatelliteMapping> {
    const satelliteMappingIdOrName = requireText(request.satelliteMappingIdOrName, 'satelliteMappingIdOrName');
    this.validateSatelliteContent(request);

    const scope = await this.resolver.resolveStagingTable(context, request);
    const { items: records } = await this.client.sourceSystems.listStagingTableMappings(scope);
    const target = mappingIndex(records.filter((record) => record.mappingType === 'Satellite')).resolve(
      satelliteMappingIdOrName,
    );
    if (!target) {
      throw new NotFoundError('Satellite mapping', satelliteMappingIdOrName, tableScopeLabel(scope));
    }
    const satellite = decodeSatelliteMapping(target);
    const parent = findSatelliteParent(satellite, records, scope);
    const payload = this.satellitePayload(scope, request);

    context.logger.debug(
      { parentType: parent.parentType, parentMappingId: parent.record.id, satelliteMappingId: satellite.id },
      'Submitting satellite mapping update',
    );
    return this.client.mappings.updateSatelliteMapping(
      scope.projectId,
      parent.parentType,
      parent.record.id,
      satellite.id,
      payload,
    );
  }

  async deleteMapping(context: ToolHandlerContext, request: DeleteMappingRequest): Promise<DeleteMappingResult> {
    const mappingIdOrName = requireText(request.mappingIdOrName, 'mappingIdOrName');

    const scope = await this.resolver.resolveStagingTable(context, request);
    const { items: records } = await this.client.sourceSystems.listStagingTableMappings(scope);
    const target = mappingIndex(records).resolve(mappingIdOrName);
    if (!target) {
      throw new NotFoundError('Mapping', mappingIdOrName, tableScopeLabel(scope));
    }

    const path = deletionPath(scope, target, records);
    context.logger.debug({ path, mappingType: target.mappingType }, 'Deleting mapping');
    await this.client.mappings.deleteMapping(path);

    return { message: `Mapping '${mappingIdOrName}' (${target.mappingType}) deleted successfully` };
  }

  private validateLinkColumns(entries: LinkColumnInput[], field: string): void {
    if (!Array.isArray(entries)) {
      throw new InvalidArgumentError(`${field} must be a list`);
    }
    entries.forEach((entry, index) => {
      requireText(entry.linkColumnNameOrId, `${field}[${index}].linkColumnNameOrId`);
      requireText(entry.stagingColumnNameOrId, `${field}[${index}].stagingColumnNameOrId`);
    });
  }

  private validateSatelliteContent(content: SatelliteContent): void {
    requireText(content.satelliteName, 'satelliteName');
    requireColumns(content.columnNames);
    if (content.subSequenceColumn !== undefined && !content.subSequenceColumn.trim()) {
      throw new InvalidArgumentError('subSequenceColumn must not be empty when given');
    }
  }

  /**
   * Staging columns are addressed by the caller's name or id as-is.
   */
  private resolveLinkColumns<T extends { id: string; columnName: string }>(
    scope: StagingTableScope,
    link: Link,
    entries: LinkColumnInput[],
    catalogue: LookupIndex<T>,
    kind: string,
  ): { entries: LinkColumnMappingPayload[]; ids: Set<string> } {
    const resolved: LinkColumnMappingPayload[] = [];
    const ids = new Set<string>();
    for (const entry of entries) {
      const column = catalogue.resolve(entry.linkColumnNameOrId);
      if (!column) {
        throw new NotFoundError(kind, entry.linkColumnNameOrId, `link '${link.name}'`);
      }
      ids.add(column.id);
      resolved.push({
        linkColumnId: column.id,
        dataPackageTableColumn: this.references.stagingColumn(scope, entry.stagingColumnNameOrId),
      });
    }
    return { entries: resolved, ids };
  }

  private satellitePayload(scope: StagingTableScope, content: SatelliteContent): SatelliteMappingPayload {
    return {
      satelliteColumns: content.columnNames.map((column) => this.references.stagingColumn(scope, column)),
      satelliteName: content.satelliteName,
      stagingTable: this.references.stagingTable(scope),
      isMultiActive: content.isMultiActive ?? false,
      ...(content.subSequenceColumn
        ? { subSequenceColumn: this.references.stagingColumn(scope, content.subSequenceColumn) }
        : {}),
    };
  }
}
