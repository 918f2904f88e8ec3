/**
 * Error taxonomy shared by the resolver, the mapping assembler and the transport.
 * Every error carries a stable `code` so the MCP layer can report it without
 * inspecting class names.
 */

export type MetavaultErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'MAPPING_DECODE'
  | 'TRANSPORT_TRANSIENT'
  | 'REMOTE_REJECTED'
  | 'CONFIGURATION';

export abstract class MetavaultError extends Error {
  abstract readonly code: MetavaultErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A name-based lookup found nothing. Never retried.
 */
export class NotFoundError extends MetavaultError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly kind: string,
    readonly value: string,
    readonly scope?: string,
  ) {
    super(scope ? `${kind} '${value}' not found in ${scope}` : `${kind} '${value}' not found`);
  }
}

export class InvalidArgumentError extends MetavaultError {
  readonly code = 'INVALID_ARGUMENT';
}

/**
 * A remote mapping record could not be turned into one of the known mapping variants.
 */
export class MappingDecodeError extends MetavaultError {
  readonly code = 'MAPPING_DECODE';
}

/**
 * Connection failures and timeouts that survived every retry attempt.
 */
export class TransportError extends MetavaultError {
  readonly code = 'TRANSPORT_TRANSIENT';

  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The remote service answered a well-formed request with a non-success status.
 */
export class RemoteRejectedError extends MetavaultError {
  readonly code = 'REMOTE_REJECTED';

  constructor(
    readonly method: string,
    readonly path: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${method} ${path} failed with status ${status}${body ? `: ${body}` : ''}`);
  }
}

export class ConfigurationError extends MetavaultError {
  readonly code = 'CONFIGURATION';
}

export function isMetavaultError(error: unknown): error is MetavaultError {
  return error instanceof MetavaultError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
