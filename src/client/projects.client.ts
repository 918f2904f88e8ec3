import { Page, parsePage } from '../types/common';
import { Project, ProjectSchema } from '../types/project';
import { NotFoundError } from '../utils/errors';
import { apiPaths } from './api-paths';
import { BaseClient } from './base.client';

export class ProjectsClient extends BaseClient {
  /**
   * Projects the caller has explicit read rights on
   */
  async list(): Promise<Page<Project>> {
    const body = await this.transport.get(apiPaths.projects(), { onlyAffected: true });
    return parsePage(body, 'projects', ProjectSchema);
  }

  /**
   * Exact-name project lookup. Several matches resolve to the first one.
   */
  async findByName(name: string): Promise<Project> {
    const body = await this.transport.get(apiPaths.projects(), { filter: `name eq ${name}` });
    const page = parsePage(body, 'projects', ProjectSchema);
    const [first] = page.items;
    if (page.total === 0 || !first) {
      throw new NotFoundError('Project', name);
    }
    if (page.total > 1) {
      this.logger.warn({ name, total: page.total }, `Multiple projects named '${name}', using the first one`);
    }
    return first;
  }
}
