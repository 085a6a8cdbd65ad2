import { mkdir, readFile, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { ExportBatch } from '../lib/auditEvent.js';
import { formatCsv, parseCsv, type CsvTable } from '../lib/csv.js';
import { WriteError, errorMessage } from '../lib/errors.js';
import { rawFilePath } from '../lib/exportFiles.js';
import type { CsvTransform } from '../lib/transforms.js';

export const RAW_CSV_COLUMNS = Object.freeze(['timestamp', 'actor', 'action', 'target', 'detail'] as const);

export interface RawCsvOptions {
  exportDir: string;
  /** Run date, used for the file name */
  date: Date;
  /** Prefix the file with Excel's `sep=,` line */
  separatorHint?: boolean;
}

export interface ProcessedCsv {
  path: string;
  rowCount: number;
}

export function toRawTable(batch: ExportBatch): CsvTable {
  return {
    columns: [...RAW_CSV_COLUMNS],
    rows: batch.map((event) => [event.timestamp, event.actor, event.action, event.target, event.detail]),
  };
}

async function writeCsvFile(path: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  } catch (error: unknown) {
    throw new WriteError(path, `Failed to write ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Write the batch to `Events_<YYYY-MM-DD>.csv` in the export directory and
 * return its path.
 */
export async function writeRawCsv(batch: ExportBatch, options: RawCsvOptions): Promise<string> {
  const path = rawFilePath(options.exportDir, options.date);
  const content = formatCsv(toRawTable(batch), { separatorHint: options.separatorHint });
  await writeCsvFile(path, content);
  return path;
}

export function processedPathFor(rawPath: string): string {
  return join(dirname(rawPath), basename(rawPath).replace(/\.csv$/i, '_processed.csv'));
}

/**
 * Read a raw export back, apply the transformation and write the result
 * beside it with a `_processed` suffix.
 */
export async function processRawCsv(rawPath: string, transform: CsvTransform): Promise<ProcessedCsv> {
  let text: string;
  try {
    text = await readFile(rawPath, 'utf-8');
  } catch (error: unknown) {
    throw new WriteError(rawPath, `Failed to read ${rawPath}: ${errorMessage(error)}`, { cause: error });
  }

  const path = processedPathFor(rawPath);

  let processed: CsvTable;
  try {
    processed = transform.apply(parseCsv(text));
  } catch (error: unknown) {
    throw new WriteError(
      path,
      `Failed to apply ${transform.name} transform to ${rawPath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  await writeCsvFile(path, formatCsv(processed));
  return { path, rowCount: processed.rows.length };
}
