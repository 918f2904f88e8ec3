import { MetavaultClient } from '../../client/metavault.client';
import { Settings } from '../../config';
import { CatalogService } from '../domain/catalog.service';
import { EntityResolverService } from '../domain/entity-resolver.service';
import { MappingAssemblerService } from '../domain/mapping-assembler.service';
import { MappingReconstructorService } from '../domain/mapping-reconstructor.service';
import { StagingTableService } from '../domain/staging-table.service';
import { ReferenceBuilder } from './reference-builder';
import { IServiceContainer } from './service-container.interface';

/**
 * Wires the domain services around one client. Built once per process by the
 * entry points and passed down explicitly.
 */
export class ServiceContainer implements IServiceContainer {
  readonly references: ReferenceBuilder;
  readonly resolver: EntityResolverService;
  readonly assembler: MappingAssemblerService;
  readonly reconstructor: MappingReconstructorService;
  readonly stagingTables: StagingTableService;
  readonly catalog: CatalogService;

  constructor(readonly client: MetavaultClient) {
    this.references = new ReferenceBuilder(client.baseUrl);
    this.resolver = new EntityResolverService(client);
    this.assembler = new MappingAssemblerService(client, this.resolver, this.references);
    this.reconstructor = new MappingReconstructorService();
    this.stagingTables = new StagingTableService(client, this.resolver, this.reconstructor);
    this.catalog = new CatalogService(client, this.resolver);
  }

  static fromSettings(settings: Settings): ServiceContainer {
    return new ServiceContainer(MetavaultClient.fromSettings(settings));
  }
}
