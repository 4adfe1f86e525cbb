/**
 * Schema hints for the SQL generator.
 *
 * One line per catalogued table, `schema.table(col:type, ...)`, listing only
 * allowed columns. Live column types come from introspection; when that
 * fails the catalog's declared types are used and the result is not cached,
 * so the next request tries the database again.
 */

import { errorMessage } from '../errors';
import type { TtlCache } from '../lib/ttl-cache';
import type { SchemaCatalog } from './schema-catalog';

/** Live column types keyed by table, then column. */
export type ColumnTypeIntrospector = (schema: string) => Promise<Map<string, Map<string, string>>>;

export class SchemaHintProvider {
  constructor(
    private readonly catalog: SchemaCatalog,
    private readonly cache: TtlCache<string>,
    private readonly introspect?: ColumnTypeIntrospector,
  ) {}

  async get(dataset: string): Promise<string> {
    const cached = this.cache.get(dataset);
    if (cached !== undefined) return cached;

    const spec = this.catalog.describe(dataset);
    if (!spec) return '';

    if (!this.introspect) {
      const hint = this.render(dataset);
      this.cache.set(dataset, hint);
      return hint;
    }

    let live: Map<string, Map<string, string>>;
    try {
      live = await this.introspect(spec.schema);
    } catch (error) {
      console.warn(`[schema-hints] Introspection of ${spec.schema} failed, using catalog types:`, errorMessage(error));
      return this.render(dataset);
    }

    const hint = this.render(dataset, live);
    this.cache.set(dataset, hint);
    return hint;
  }

  /** Drop the cached hint for one dataset, e.g. after a schema migration. */
  invalidate(dataset: string): void {
    this.cache.invalidate(dataset);
  }

  private render(dataset: string, live?: Map<string, Map<string, string>>): string {
    const spec = this.catalog.describe(dataset);
    if (!spec) return '';

    const lines: string[] = [];
    for (const table of spec.tables.values()) {
      const liveColumns = live?.get(table.name);
      const columns = table.columns.map((column) => {
        const type = liveColumns?.get(column.name) ?? column.type;
        return type ? `${column.name}:${type}` : column.name;
      });
      lines.push(`${table.qualifiedName}(${columns.join(', ')})`);
    }
    return lines.join('\n');
  }
}
