import type { CsvTable } from './csv.js';
import type { TransformName } from './config.js';

/**
 * Field-level transformation that turns the raw export table into the
 * processed one. Selected by name through PROCESS_TRANSFORM.
 */
export interface CsvTransform {
  readonly name: TransformName;
  readonly description: string;
  apply(table: CsvTable): CsvTable;
}

const passthrough: CsvTransform = {
  name: 'passthrough',
  description: 'Copy the raw export unchanged',
  apply(table) {
    return {
      columns: [...table.columns],
      rows: table.rows.map((row) => [...row]),
    };
  },
};

// First match wins
const SECURITY_CATEGORIES: ReadonlyArray<{ category: string; pattern: RegExp }> = [
  { category: 'authentication', pattern: /(^|\.)(login|logout|auth)$/ },
  { category: 'access', pattern: /ssh-(authorized|unauthorized)$|environment(_variables)?\.show$/ },
  { category: 'credential', pattern: /^audit\.(service_key|service_binding|service_credential_binding)\./ },
  { category: 'role', pattern: /^audit\.user\.|^audit\.role\./ },
  { category: 'deletion', pattern: /(^|\.)delete(-request)?$/ },
];

export function securityCategory(action: string): string | undefined {
  return SECURITY_CATEGORIES.find(({ pattern }) => pattern.test(action))?.category;
}

const security: CsvTransform = {
  name: 'security',
  description: 'Keep security-relevant actions and tag each with a category',
  apply(table) {
    const actionIndex = table.columns.indexOf('action');
    if (actionIndex === -1) {
      throw new Error('Cannot apply security transform: column "action" is missing');
    }

    const rows: string[][] = [];
    for (const row of table.rows) {
      const category = securityCategory(row[actionIndex]);
      if (category) {
        rows.push([...row, category]);
      }
    }

    return { columns: [...table.columns, 'category'], rows };
  },
};

const TRANSFORMS: Record<TransformName, CsvTransform> = {
  passthrough,
  security,
};

export function getTransform(name: TransformName): CsvTransform {
  return TRANSFORMS[name];
}
