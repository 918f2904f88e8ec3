import { MetavaultClient } from '../../client/metavault.client';
import { CatalogService } from '../domain/catalog.service';
import { EntityResolverService } from '../domain/entity-resolver.service';
import { MappingAssemblerService } from '../domain/mapping-assembler.service';
import { MappingReconstructorService } from '../domain/mapping-reconstructor.service';
import { StagingTableService } from '../domain/staging-table.service';
import { ReferenceBuilder } from './reference-builder';

/**
 * Services a tool handler can reach. Every service shares the same client,
 * and through it the same transport.
 */
export interface IServiceContainer {
  readonly client: MetavaultClient;
  readonly references: ReferenceBuilder;
  readonly resolver: EntityResolverService;
  readonly assembler: MappingAssemblerService;
  readonly reconstructor: MappingReconstructorService;
  readonly stagingTables: StagingTableService;
  readonly catalog: CatalogService;
}
