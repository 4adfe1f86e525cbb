/**
 * Schema Catalog.
 *
 * Static allow-list of datasets, the physical schema each maps to, and the
 * tables and columns that may be queried through it. Loaded once at startup
 * from YAML; a catalog that fails to load stops the process. There is no
 * mutation API after construction.
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';

import { CatalogLoadError } from '../errors';

// ---------------------------------------------------------------------------
// File format
// ---------------------------------------------------------------------------

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;
const identifier = z.string().regex(IDENTIFIER, 'must be a lower-case SQL identifier');

const tableSchema = z.object({
  description: z.string().optional(),
  columns: z
    .record(identifier, z.string().nullable())
    .refine((columns) => Object.keys(columns).length > 0, 'a table needs at least one column'),
});

const datasetSchema = z.object({
  schema: identifier,
  description: z.string().optional(),
  tables: z
    .record(identifier, tableSchema)
    .refine((tables) => Object.keys(tables).length > 0, 'a dataset needs at least one table'),
});

const catalogFileSchema = z.object({
  datasets: z
    .record(identifier, datasetSchema)
    .refine((datasets) => Object.keys(datasets).length > 0, 'the catalog needs at least one dataset'),
});

export type CatalogDefinition = z.input<typeof catalogFileSchema>;

// ---------------------------------------------------------------------------
// Runtime model
// ---------------------------------------------------------------------------

export interface ColumnSpec {
  readonly name: string;
  /** Semantic type for prompt hints; not used by the safety policy. */
  readonly type?: string;
}

export interface TableSpec {
  readonly name: string;
  readonly qualifiedName: string;
  readonly description?: string;
  readonly columns: readonly ColumnSpec[];
  readonly columnNames: ReadonlySet<string>;
}

export interface DatasetSpec {
  readonly name: string;
  readonly schema: string;
  readonly description?: string;
  readonly tables: ReadonlyMap<string, TableSpec>;
}

export class SchemaCatalog {
  private constructor(private readonly datasets: ReadonlyMap<string, DatasetSpec>) {}

  /** Build a catalog from an already-parsed definition object. */
  static fromDefinition(definition: unknown, source = 'catalog'): SchemaCatalog {
    const parsed = catalogFileSchema.safeParse(definition);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'root';
      throw new CatalogLoadError(
        `Invalid schema catalog in ${source} at ${where}: ${issue?.message ?? 'unknown error'}`,
      );
    }

    const datasets = new Map<string, DatasetSpec>();
    for (const [name, dataset] of Object.entries(parsed.data.datasets)) {
      const tables = new Map<string, TableSpec>();
      for (const [tableName, table] of Object.entries(dataset.tables)) {
        const columns = Object.entries(table.columns).map(([column, type]) =>
          Object.freeze(type ? { name: column, type } : { name: column }),
        );
        tables.set(
          tableName,
          Object.freeze({
            name: tableName,
            qualifiedName: `${dataset.schema}.${tableName}`,
            description: table.description,
            columns: Object.freeze(columns),
            columnNames: new Set(columns.map((c) => c.name)),
          }),
        );
      }
      datasets.set(
        name,
        Object.freeze({ name, schema: dataset.schema, description: dataset.description, tables }),
      );
    }

    return new SchemaCatalog(datasets);
  }

  /** Physical schema behind a dataset, or undefined when it is not catalogued. */
  resolve(dataset: string): string | undefined {
    return this.datasets.get(dataset.toLowerCase())?.schema;
  }

  hasDataset(dataset: string): boolean {
    return this.datasets.has(dataset.toLowerCase());
  }

  datasetNames(): string[] {
    return Array.from(this.datasets.keys());
  }

  describe(dataset: string): DatasetSpec | undefined {
    return this.datasets.get(dataset.toLowerCase());
  }

  /**
   * Look up a table by bare (`stg_res_partner`) or schema-qualified
   * (`odoo_replica.stg_res_partner`) name. A qualifier other than the
   * dataset's own schema does not resolve.
   */
  table(dataset: string, table: string): TableSpec | undefined {
    const spec = this.describe(dataset);
    if (!spec) return undefined;

    const parts = table.toLowerCase().split('.');
    if (parts.length === 2) {
      const [schema, name] = parts;
      return schema === spec.schema ? spec.tables.get(name) : undefined;
    }
    if (parts.length === 1) {
      return spec.tables.get(parts[0]);
    }
    return undefined;
  }

  columnsOf(dataset: string, table: string): ReadonlySet<string> | undefined {
    return this.table(dataset, table)?.columnNames;
  }
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/** Parse catalog YAML text. Any syntax or shape error is a CatalogLoadError. */
export function parseCatalog(text: string, source = 'catalog'): SchemaCatalog {
  let definition: unknown;
  try {
    definition = yaml.load(text);
  } catch (error) {
    throw new CatalogLoadError(`Failed to parse ${source} as YAML`, { cause: error });
  }
  return SchemaCatalog.fromDefinition(definition, source);
}

/** Read and parse the catalog file at `filePath`. */
export function loadCatalog(filePath: string): SchemaCatalog {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new CatalogLoadError(`Failed to read schema catalog at ${filePath}`, { cause: error });
  }
  return parseCatalog(text, filePath);
}
