/**
 * Caller-facing address of a staging table: every level may be a name or a canonical id.
 */
export interface StagingTableLocator {
  projectName: string;
  sourceSystemIdOrName: string;
  dataPackageIdOrName: string;
  stagingTableIdOrName: string;
}

/**
 * A staging table address after chained resolution.
 */
export interface StagingTableScope {
  projectId: string;
  sourceSystemId: string;
  dataPackageId: string;
  tableId: string;
}
