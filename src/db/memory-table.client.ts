import { RowFilters, SelectOptions, TableClient, TableRow } from "./table.client";

/**
 * Process-local table store with the same contract as the PostgREST client.
 * Used when Supabase is not configured and by the tests.
 */
export class InMemoryTableClient implements TableClient {
  readonly kind = "memory" as const;
  private readonly tables = new Map<string, TableRow[]>();

  async insert(table: string, row: TableRow): Promise<void> {
    const rows = this.rowsOf(table);
    if (typeof row.id === "string" && rows.some((existing) => existing.id === row.id)) {
      throw new Error(`Duplicate key value violates unique constraint (${table}.id=${row.id})`);
    }
    rows.push(structuredClone(row));
  }

  async selectOne(
    table: string,
    filters: RowFilters,
    options?: SelectOptions,
  ): Promise<TableRow | null> {
    const rows = await this.selectMany(table, filters, { ...options, limit: 1 });
    return rows[0] ?? null;
  }

  async selectMany(
    table: string,
    filters: RowFilters,
    options?: SelectOptions,
  ): Promise<TableRow[]> {
    let rows = this.rowsOf(table).filter((row) => matches(row, filters));
    const orderBy = options?.orderBy;
    if (orderBy) {
      const direction = orderBy.ascending === false ? -1 : 1;
      rows = [...rows].sort((a, b) => direction * compareValues(a[orderBy.column], b[orderBy.column]));
    }
    if (typeof options?.limit === "number") {
      rows = rows.slice(0, options.limit);
    }
    return rows.map((row) => project(row, options?.columns));
  }

  async update(table: string, filters: RowFilters, patch: TableRow): Promise<TableRow[]> {
    const updated: TableRow[] = [];
    for (const row of this.rowsOf(table)) {
      if (!matches(row, filters)) {
        continue;
      }
      Object.assign(row, structuredClone(patch));
      updated.push(structuredClone(row));
    }
    return updated;
  }

  async deleteMany(table: string, filters: RowFilters): Promise<void> {
    const remaining = this.rowsOf(table).filter((row) => !matches(row, filters));
    this.tables.set(table, remaining);
  }

  private rowsOf(table: string): TableRow[] {
    const existing = this.tables.get(table);
    if (existing) {
      return existing;
    }
    const created: TableRow[] = [];
    this.tables.set(table, created);
    return created;
  }
}

function matches(row: TableRow, filters: RowFilters): boolean {
  return Object.entries(filters).every(([key, value]) => {
    const current = row[key] ?? null;
    if (value === null) {
      return current === null;
    }
    return String(current) === String(value);
  });
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  return String(a ?? "").localeCompare(String(b ?? ""));
}

function project(row: TableRow, columns?: string): TableRow {
  const copy = structuredClone(row);
  if (!columns || columns.trim() === "*") {
    return copy;
  }
  const output: TableRow = {};
  for (const column of columns.split(",").map((item) => item.trim())) {
    if (column in copy) {
      output[column] = copy[column];
    }
  }
  return output;
}
