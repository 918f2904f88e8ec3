import { Logger } from 'pino';
import { z } from 'zod';
import { NotFoundError, RemoteRejectedError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { QueryParams, Transport } from './http-transport';

// Page size used wherever a listing stands in for "fetch everything".
export const MAX_PAGE_LIMIT = 1_000_000;

/**
 * Base class for resource clients. Holds the shared transport and converts
 * name-keyed 404 answers into NotFoundError.
 */
export abstract class BaseClient {
  protected readonly logger: Logger;

  constructor(protected readonly transport: Transport) {
    this.logger = createLogger(this.constructor.name);
  }

  protected async getEntity<T extends z.ZodTypeAny>(
    schema: T,
    path: string,
    notFound: { kind: string; value: string; scope?: string },
    query?: QueryParams,
  ): Promise<z.output<T>> {
    try {
      const body = await this.transport.get(path, query);
      return schema.parse(body);
    } catch (error) {
      if (error instanceof RemoteRejectedError && error.status === 404) {
        throw new NotFoundError(notFound.kind, notFound.value, notFound.scope);
      }
      throw error;
    }
  }
}
