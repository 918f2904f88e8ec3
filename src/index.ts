/**
 * Metavault mapping MCP - library entry point
 *
 * Servers and tools:
 * - STDIO Server: `metavault-mapping-mcp` (or `metavault-cli serve`)
 * - CLI Tool: `metavault-cli staging-table <project> <sourceSystem> <dataPackage> <table>`
 */

export * from './client/http-transport';
export { MetavaultClient } from './client/metavault.client';
export { apiPaths } from './client/api-paths';
export { loadSettings, Settings } from './config';
export { createMcpServer } from './mcp-stdio-server';
export { METAVAULT_MCP_TOOLS } from './mcp/tools';
export { ToolHandlerContext } from './mcp/types/sdk-custom';
export { LookupIndex } from './services/core/lookup-index';
export { ReferenceBuilder } from './services/core/reference-builder';
export { ServiceContainer } from './services/core/service-container';
export { EntityResolverService, resolveIdOrName } from './services/domain/entity-resolver.service';
export { MappingAssemblerService, deletionPath } from './services/domain/mapping-assembler.service';
export { MappingReconstructorService } from './services/domain/mapping-reconstructor.service';
export { StagingTableService } from './services/domain/staging-table.service';
export { CatalogService } from './services/domain/catalog.service';
export * from './types';
export * from './utils/errors';
export { isCanonicalId } from './utils/id.utils';
