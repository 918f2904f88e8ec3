import pino, { Logger } from 'pino';
import { loadEnvironment } from '../config';

/**
 * Structured logging context attached to child loggers
 */
export interface LogContext {
  component?: string;
  operation?: string;
  requestId?: string;
  [key: string]: unknown;
}

function resolveLevel(): string {
  loadEnvironment();
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  const isTest = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
  return isTest ? 'silent' : 'info';
}

/**
 * Root logger. Always writes to stderr: stdout carries the MCP protocol.
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: resolveLevel(),
      formatters: {
        level: (label: string) => ({ level: label }),
      },
      redact: ['password', 'token', 'secret', 'apiKey', 'authorization', 'headers.Authorization'],
    },
    process.stderr,
  );
}

let rootLogger: Logger | undefined;

export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

/**
 * Create a child logger with component-specific context
 */
export function createLogger(componentName: string, baseContext: LogContext = {}): Logger {
  return getRootLogger().child({ component: componentName, ...baseContext });
}

export const loggers = {
  transport: () => createLogger('HttpTransport'),
  mcpStdio: () => createLogger('MCP-Stdio'),
  cli: () => createLogger('CLI'),
} as const;

/**
 * Times a single operation and logs its outcome
 */
export class PerformanceLogger {
  private readonly startTime = Date.now();

  constructor(
    private readonly logger: Logger,
    private readonly operation: string,
  ) {}

  complete(context: Record<string, unknown> = {}): void {
    const duration = Date.now() - this.startTime;
    this.logger.info({ operation: this.operation, duration, ...context }, 'Operation completed');
  }

  fail(error: Error, context: Record<string, unknown> = {}): void {
    const duration = Date.now() - this.startTime;
    this.logger.error(
      { operation: this.operation, duration, error: error.message, ...context },
      'Operation failed',
    );
  }
}

export function createPerformanceLogger(logger: Logger, operation: string): PerformanceLogger {
  return new PerformanceLogger(logger, operation);
}

export function logError(logger: Logger, error: Error, context: Record<string, unknown> = {}): void {
  logger.error({ error: error.message, stack: error.stack, ...context }, 'Error occurred');
}

/**
 * Redirects console.log to stderr so stray output cannot corrupt the stdio protocol stream.
 */
export function enforceStdioCompliance(): void {
  console.log = (...args: unknown[]): void => {
    console.error(...args);
  };
}
