#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { randomUUID } from 'node:crypto';
import { SERVER_NAME, SERVER_VERSION, loadSettings } from './config';
import { toolHandlers } from './mcp/tool-handlers';
import { METAVAULT_MCP_TOOLS } from './mcp/tools';
import { ToolHandlerContext } from './mcp/types/sdk-custom';
import { toToolErrorResult } from './mcp/utils/error-utils';
import { createZodRawShape } from './mcp/utils/schema-utils';
import { IServiceContainer } from './services/core/service-container.interface';
import { ServiceContainer } from './services/core/service-container';
import { errorMessage } from './utils/errors';
import {
  createPerformanceLogger,
  enforceStdioCompliance,
  logError,
  loggers,
} from './utils/logger';

const mcpStdioLogger = loggers.mcpStdio();

export type ToolArguments = Record<string, unknown>;

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

/**
 * Builds the MCP server and registers every tool against the given services.
 */
export function createMcpServer(services: IServiceContainer): McpServer {
  const mcpServer = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  for (const tool of METAVAULT_MCP_TOOLS) {
    const handler = toolHandlers[tool.name];
    if (!handler) {
      throw new Error(`No handler found for tool: ${tool.name}`);
    }
    mcpStdioLogger.debug({ toolName: tool.name }, `Registering tool: ${tool.name}`);

    mcpServer.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: createZodRawShape(tool),
        annotations: tool.annotations,
      },
      async (args: ToolArguments, extra): Promise<CallToolResult> => {
        const requestId = randomUUID();
        const toolPerfLogger = createPerformanceLogger(mcpStdioLogger, `tool-${tool.name}`);
        const toolLogger = mcpStdioLogger.child({ tool: tool.name, requestId });

        const handlerContext: ToolHandlerContext = {
          logger: toolLogger,
          requestId,
          // stdio clients get no progress notifications; keep a trace in the log
          sendProgress: async (progress) => {
            toolLogger.debug({ progress }, 'Progress notification (stdio no-op)');
          },
          signal: extra.signal,
        };

        try {
          toolLogger.debug({ params: args }, 'Tool execution started');
          const result = await handler(args, handlerContext, services);
          toolPerfLogger.complete({ success: true });
          return {
            content: [{ type: 'text', text: JSON.stringify(result ?? {}) }],
          };
        } catch (error) {
          toolPerfLogger.fail(asError(error));
          logError(toolLogger, asError(error), { operation: 'tool-execution' });
          return toToolErrorResult(error);
        }
      },
    );
  }

  mcpStdioLogger.info(
    { toolCount: METAVAULT_MCP_TOOLS.length },
    `Registered ${METAVAULT_MCP_TOOLS.length} tools`,
  );
  return mcpServer;
}

let isShuttingDown = false;

async function gracefulShutdown(server: McpServer, signal: string): Promise<void> {
  if (isShuttingDown) {
    mcpStdioLogger.debug({ signal }, 'Shutdown already in progress, ignoring subsequent signal.');
    return;
  }
  isShuttingDown = true;
  mcpStdioLogger.info({ signal }, `Received ${signal}, starting graceful shutdown`);

  const timeout = setTimeout(() => {
    mcpStdioLogger.error('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, 10000);

  try {
    await server.close();
    clearTimeout(timeout);
    mcpStdioLogger.info('Graceful shutdown completed successfully.');
    process.exit(0);
  } catch (error) {
    clearTimeout(timeout);
    logError(mcpStdioLogger, asError(error), { operation: 'graceful-shutdown-failure' });
    process.exit(1);
  }
}

/**
 * Loads the settings, wires the services and serves the tools over stdio.
 */
export async function main(): Promise<void> {
  if (process.env.NODE_ENV !== 'test' && !process.env.JEST_WORKER_ID) {
    process.env.NODE_ENV = 'production';
  }
  // stdout carries the protocol from here on
  enforceStdioCompliance();
  mcpStdioLogger.info('MCP Stdio Server initializing...');

  const settings = loadSettings();
  const services = ServiceContainer.fromSettings(settings);
  const server = createMcpServer(services);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      gracefulShutdown(server, signal).catch((err: unknown) => {
        logError(mcpStdioLogger, asError(err), { operation: 'unhandled-shutdown-error' });
        process.exit(1);
      });
    });
  }

  await server.connect(new StdioServerTransport());
  mcpStdioLogger.info({ baseUrl: settings.baseUrl }, 'MCP Server (stdio) initialized and listening');
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logError(mcpStdioLogger, asError(err), { operation: 'main-execution-error' });
    process.exit(1);
  });
}
