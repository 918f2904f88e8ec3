import { Logger } from 'pino';

/**
 * Progress payload for multi-step tool operations.
 */
export interface ProgressNotification {
  status: 'in-progress' | 'complete';
  message?: string;
  toolName?: string;
}

/**
 * Per-call context handed to tool handlers and the services they drive.
 */
export interface ToolHandlerContext {
  logger: Logger;
  requestId: string;
  sendProgress: (progress: ProgressNotification) => Promise<void>;
  signal?: AbortSignal;
}
