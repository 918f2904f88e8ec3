#!/usr/bin/env node
import { Command } from 'commander';
import { randomUUID } from 'node:crypto';
import { SERVER_VERSION, loadSettings } from '../config';
import { main as serveStdio } from '../mcp-stdio-server';
import { ToolHandlerContext } from '../mcp/types/sdk-custom';
import { ServiceContainer } from '../services/core/service-container';
import { errorMessage, isMetavaultError } from '../utils/errors';
import { compactJson } from '../utils/json.utils';
import { loggers } from '../utils/logger';

const cliLogger = loggers.cli();

function cliContext(): ToolHandlerContext {
  const requestId = randomUUID();
  return {
    logger: cliLogger.child({ requestId }),
    requestId,
    sendProgress: async (progress) => {
      cliLogger.debug({ progress }, 'Progress');
    },
  };
}

function fail(error: unknown): never {
  const message = isMetavaultError(error) ? `${error.code}: ${error.message}` : errorMessage(error);
  process.stderr.write(`❌ ${message}\n`);
  process.exit(1);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('metavault-cli')
    .description('Command line access to the staging table mappings of a metavault project')
    .version(SERVER_VERSION);

  program
    .command('serve')
    .description('Run the MCP server over stdio')
    .action(async () => {
      await serveStdio().catch(fail);
    });

  program
    .command('staging-table')
    .description('Print a staging table with its columns and reconstructed mappings as JSON')
    .argument('<projectName>', 'Technical name of the project')
    .argument('<sourceSystem>', 'ID or name of the source system')
    .argument('<dataPackage>', 'ID or name of the data package')
    .argument('<stagingTable>', 'ID or name of the staging table')
    .option('--compact', 'Print on a single line')
    .action(
      async (
        projectName: string,
        sourceSystem: string,
        dataPackage: string,
        stagingTable: string,
        options: { compact?: boolean },
      ) => {
        try {
          const services = ServiceContainer.fromSettings(loadSettings());
          const view = await services.stagingTables.describe(cliContext(), {
            projectName,
            sourceSystemIdOrName: sourceSystem,
            dataPackageIdOrName: dataPackage,
            stagingTableIdOrName: stagingTable,
          });
          const json = JSON.stringify(compactJson(view), null, options.compact ? undefined : 2);
          process.stdout.write(`${json}\n`);
        } catch (error) {
          fail(error);
        }
      },
    );

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch(fail);
}
