/**
 * Minimal RFC 4180 CSV encoding and decoding for export files.
 *
 * Fields are quoted only when they contain a delimiter, a quote or a line
 * break. Records are separated by `\n` and every file ends with one.
 */

/** Excel's delimiter hint, written as the first line when requested. */
export const CSV_SEPARATOR_HINT = 'sep=,';

export interface CsvTable {
  columns: string[];
  rows: string[][];
}

export function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(values: readonly string[]): string {
  return values.map(escapeCsvValue).join(',');
}

export function formatCsv(
  table: CsvTable,
  options: { separatorHint?: boolean } = {}
): string {
  const lines: string[] = [];
  if (options.separatorHint) {
    lines.push(CSV_SEPARATOR_HINT);
  }
  lines.push(formatCsvRow(table.columns));
  for (const row of table.rows) {
    lines.push(formatCsvRow(row));
  }
  return lines.join('\n') + '\n';
}

function parseRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (inQuotes) {
      if (ch === '"') {
        if (text.charAt(i + 1) === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\r' || ch === '\n') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
      if (ch === '\r' && text.charAt(i + 1) === '\n') {
        i++;
      }
    } else {
      field += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new Error('Unterminated quoted field');
  }

  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  // Blank lines decode to a single empty field
  return records.filter((r) => !(r.length === 1 && r[0] === ''));
}

/**
 * Parse CSV text into a header and rows. A leading `sep=` line is skipped.
 * Throws if there is no header or a row has the wrong number of fields.
 */
export function parseCsv(text: string): CsvTable {
  let body = text;
  if (body.startsWith('sep=')) {
    const newline = body.indexOf('\n');
    body = newline === -1 ? '' : body.slice(newline + 1);
  }

  const records = parseRecords(body);
  const [columns, ...rows] = records;

  if (!columns) {
    throw new Error('CSV has no header row');
  }

  rows.forEach((row, index) => {
    if (row.length !== columns.length) {
      throw new Error(
        `CSV row ${index + 1} has ${row.length} fields, expected ${columns.length}`
      );
    }
  });

  return { columns, rows };
}
