#!/usr/bin/env node
/**
 * Audit Log Exporter
 *
 * Usage: audit-log-exporter [run|export|cleanup]
 *
 *   run      export, verify, upload artifacts, then clean up (default)
 *   export   export and verify, leaving the CSVs for an external artifact step
 *   cleanup  delete exported CSVs
 */

import { getLogger } from './lib/logger.js';
import { loadConfig } from './lib/config.js';
import { runCli } from './cli.js';
import { auditLogExportJob, runCleanup, runExport } from './jobs/auditLogExportJob.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = getLogger();

  process.exitCode = await runCli(
    process.argv.slice(2),
    {
      run: () => auditLogExportJob.process(),
      export: () => runExport({ config, logger }),
      cleanup: () => runCleanup({ config, logger }),
    },
    logger
  );
}

main().catch((err: unknown) => {
  // Configuration errors surface before the logger exists
  console.error(err);
  process.exitCode = 1;
});
