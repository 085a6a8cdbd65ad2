/**
 * Audit Log Export Job
 *
 * Weekly export of Cloud Foundry audit events.
 *
 * Workflow:
 * 1. Authenticate with the cf CLI
 * 2. Fetch audit events for the trailing window
 * 3. Write Events_<date>.csv and Events_<date>_processed.csv
 * 4. Verify the raw export exists
 * 5. Upload the CSVs as artifacts (when ARTIFACT_BUCKET is set)
 * 6. Delete every CSV in the export directory, even when a step failed
 */

import type { Logger } from 'pino';
import { CfAuthenticator, type CfSession } from '../pipeline/authenticator.js';
import { CfAuditEventSource } from '../pipeline/fetcher.js';
import { ExportPipeline, type ExportResult } from '../pipeline/exportPipeline.js';
import { CfCli } from '../lib/cfCli.js';
import { createExecFileRunner, type CommandRunner } from '../lib/commandRunner.js';
import { loadConfig, type Config } from '../lib/config.js';
import { CleanupError, cleanupExports, listExportFiles, verifyRawExport } from '../lib/exportFiles.js';
import { getLogger } from '../lib/logger.js';
import {
  createArtifactStoreFromConfig,
  getArtifactName,
  uploadArtifacts,
  type ArtifactStore,
  type UploadedArtifact,
} from '../lib/objectStore.js';
import { getTransform } from '../lib/transforms.js';

export interface AuditLogExportDeps {
  config: Config;
  logger: Logger;
  runner?: CommandRunner;
  /** Defaults to the store built from config; null disables uploads */
  artifactStore?: ArtifactStore | null;
  /** Environment handed to the cf CLI; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
}

export interface AuditLogExportOutcome {
  result: ExportResult;
  artifacts: UploadedArtifact[];
  removedFiles: string[];
}

export function createExportPipeline(deps: AuditLogExportDeps): ExportPipeline<CfSession> {
  const { config, logger } = deps;

  const cli = new CfCli(deps.runner ?? createExecFileRunner(), {
    binary: config.cfBinary,
    timeoutMs: config.cfCommandTimeoutSeconds * 1000,
    env: deps.env ?? process.env,
  });

  return new ExportPipeline(
    new CfAuthenticator(cli, config.cfApiEndpoint, logger),
    (session) =>
      new CfAuditEventSource(
        session,
        { pageSize: config.exportPageSize, maxPages: config.exportMaxPages },
        logger
      ),
    {
      credentials: { username: config.cfUsername, password: config.cfPassword },
      exportDir: config.exportDir,
      windowDays: config.exportWindowDays,
      separatorHint: config.exportSeparatorHint,
      transform: getTransform(config.processTransform),
      now: deps.now,
    },
    logger
  );
}

/**
 * Run the pipeline and check the raw export exists. Files are left in
 * place for an external artifact step.
 */
export async function runExport(deps: AuditLogExportDeps): Promise<ExportResult> {
  const result = await createExportPipeline(deps).run();
  await verifyRawExport(deps.config.exportDir, result.runDate);
  return result;
}

/**
 * Delete exported CSVs. Failures are logged and do not affect the outcome
 * of the run.
 */
export async function runCleanup(deps: Pick<AuditLogExportDeps, 'config' | 'logger'>): Promise<string[]> {
  const { config, logger } = deps;
  try {
    const removed = await cleanupExports(config.exportDir);
    logger.info({ exportDir: config.exportDir, removed: removed.length }, 'Export directory cleaned up');
    return removed;
  } catch (error: unknown) {
    logger.error({ err: error, exportDir: config.exportDir }, 'Failed to clean up export directory');
    return error instanceof CleanupError ? error.removed : [];
  }
}

export async function runAuditLogExport(deps: AuditLogExportDeps): Promise<AuditLogExportOutcome> {
  const { config, logger } = deps;
  const store =
    deps.artifactStore === undefined ? createArtifactStoreFromConfig(config) : deps.artifactStore;

  let result: ExportResult;
  let artifacts: UploadedArtifact[] = [];
  let removedFiles: string[];
  try {
    result = await runExport(deps);

    if (store) {
      const files = await listExportFiles(config.exportDir);
      artifacts = await uploadArtifacts(
        store,
        files,
        { prefix: config.artifactPrefix, artifactName: getArtifactName(config.runId, result.runDate) },
        logger
      );
    } else {
      logger.debug('ARTIFACT_BUCKET not set, skipping artifact upload');
    }
  } finally {
    removedFiles = await runCleanup(deps);
  }

  return { result, artifacts, removedFiles };
}

export const auditLogExportJob = {
  name: 'audit-log-export',
  description: 'Export Cloud Foundry audit events to CSV artifacts',
  schedule: '0 0 * * 1', // Mondays at midnight

  async process(): Promise<AuditLogExportOutcome> {
    return runAuditLogExport({ config: loadConfig(), logger: getLogger() });
  },
};
