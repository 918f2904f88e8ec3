import { Settings } from '../config';
import { HttpTransport, Transport } from './http-transport';
import { InformationMartsClient } from './information-marts.client';
import { MappingsClient } from './mappings.client';
import { ModelClient } from './model.client';
import { ProjectsClient } from './projects.client';
import { SourceSystemsClient } from './source-systems.client';

/**
 * Facade over the per-resource clients. All of them share one injected transport.
 */
export class MetavaultClient {
  readonly projects: ProjectsClient;
  readonly sourceSystems: SourceSystemsClient;
  readonly model: ModelClient;
  readonly informationMarts: InformationMartsClient;
  readonly mappings: MappingsClient;

  constructor(
    readonly baseUrl: string,
    transport: Transport,
  ) {
    this.projects = new ProjectsClient(transport);
    this.sourceSystems = new SourceSystemsClient(transport);
    this.model = new ModelClient(transport);
    this.informationMarts = new InformationMartsClient(transport);
    this.mappings = new MappingsClient(transport);
  }

  static fromSettings(settings: Settings): MetavaultClient {
    return new MetavaultClient(settings.baseUrl, new HttpTransport(settings));
  }
}
