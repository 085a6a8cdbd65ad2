import { access, readdir, rm } from 'fs/promises';
import { join } from 'path';
import { formatDateStamp } from './exportWindow.js';
import { PostConditionError } from './errors.js';

export function rawFileName(date: Date): string {
  return `Events_${formatDateStamp(date)}.csv`;
}

export function rawFilePath(exportDir: string, date: Date): string {
  return join(exportDir, rawFileName(date));
}

/**
 * The raw export for `date` must exist once a run reports success.
 */
export async function verifyRawExport(exportDir: string, date: Date): Promise<string> {
  const path = rawFilePath(exportDir, date);
  try {
    await access(path);
  } catch {
    throw new PostConditionError(path);
  }
  return path;
}

export async function listExportFiles(exportDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(exportDir);
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  return entries
    .filter((name) => name.toLowerCase().endsWith('.csv'))
    .sort()
    .map((name) => join(exportDir, name));
}

export type RemoveFile = (path: string) => Promise<void>;

const removeEntry: RemoveFile = (path) => rm(path, { recursive: true, force: true });

/**
 * Some CSVs in the export directory could not be deleted. `removed` lists
 * the ones that were.
 */
export class CleanupError extends Error {
  constructor(
    public readonly removed: string[],
    public readonly failures: Array<{ path: string; error: unknown }>
  ) {
    super(
      `Failed to delete ${failures.length} export file(s): ${failures.map((f) => f.path).join(', ')}`
    );
    this.name = 'CleanupError';
  }
}

/**
 * Delete every CSV in the export directory. A missing directory is not an
 * error. Every entry is attempted; failures are reported together at the end.
 */
export async function cleanupExports(
  exportDir: string,
  remove: RemoveFile = removeEntry
): Promise<string[]> {
  const files = await listExportFiles(exportDir);
  const results = await Promise.allSettled(files.map((file) => remove(file)));

  const removed: string[] = [];
  const failures: Array<{ path: string; error: unknown }> = [];
  results.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      removed.push(files[index]);
    } else {
      failures.push({ path: files[index], error: result.reason });
    }
  });

  if (failures.length > 0) {
    throw new CleanupError(removed, failures);
  }
  return removed;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
