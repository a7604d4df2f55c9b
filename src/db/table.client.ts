export type TableRow = Record<string, unknown>;

export type FilterValue = string | number | boolean | null;

export type RowFilters = Record<string, FilterValue>;

export interface SelectOptions {
  columns?: string;
  orderBy?: {
    column: string;
    ascending?: boolean;
  };
  limit?: number;
}

/**
 * Row-level access to a relational table. Rows come back as plain records;
 * repositories own the mapping into domain types.
 */
export interface TableClient {
  readonly kind: "supabase" | "memory";
  insert(table: string, row: TableRow): Promise<void>;
  selectOne(table: string, filters: RowFilters, options?: SelectOptions): Promise<TableRow | null>;
  selectMany(table: string, filters: RowFilters, options?: SelectOptions): Promise<TableRow[]>;
  update(table: string, filters: RowFilters, patch: TableRow): Promise<TableRow[]>;
  deleteMany(table: string, filters: RowFilters): Promise<void>;
}

export function isTableRow(value: unknown): value is TableRow {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
