/**
 * WHERE-clause assembly for the SQL templates.
 *
 * Every value goes through `ParamBuilder.add` and comes back as a `$N`
 * placeholder; column names are fixed by the template, never taken from the
 * request. Each condition helper returns `undefined` when its input is absent
 * so the template can list all filters unconditionally.
 */
export class ParamBuilder {
  readonly params: unknown[] = [];

  /** Bind a value and return its `$N` placeholder. */
  add(value: unknown): string {
    this.params.push(value);
    return `$${this.params.length}`;
  }

  /** `column = $N`, or nothing when the value is absent. */
  equals(column: string, value: unknown): string | undefined {
    return value === undefined ? undefined : `${column} = ${this.add(value)}`;
  }

  /** `column BETWEEN $N AND $M`, or nothing unless both bounds are given. */
  between(column: string, low: unknown, high: unknown): string | undefined {
    if (low === undefined || high === undefined) return undefined;
    return `${column} BETWEEN ${this.add(low)} AND ${this.add(high)}`;
  }

  /**
   * Case-insensitive substring match across several columns, sharing one
   * placeholder: `(a ILIKE $N OR b ILIKE $N)`.
   */
  search(columns: readonly string[], term: string | undefined): string | undefined {
    if (!term) return undefined;
    const placeholder = this.add(`%${term}%`);
    return `(${columns.map((c) => `${c} ILIKE ${placeholder}`).join(' OR ')})`;
  }
}

/** Join the present conditions into a WHERE clause, or nothing when there are none. */
export function buildWhere(conditions: readonly (string | undefined)[]): string {
  const present = conditions.filter((c): c is string => Boolean(c));
  return present.length > 0 ? `WHERE ${present.join(' AND ')}` : '';
}
