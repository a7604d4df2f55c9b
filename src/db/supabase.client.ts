import fetch from "node-fetch";
import { isTableRow, RowFilters, SelectOptions, TableClient, TableRow } from "./table.client";

export interface SupabaseRestClientConfig {
  url: string;
  serviceRoleKey: string;
}

export class SupabaseRestClient implements TableClient {
  readonly kind = "supabase" as const;

  constructor(private readonly config: SupabaseRestClientConfig) {}

  async insert(table: string, row: TableRow): Promise<void> {
    const response = await fetch(`${this.config.url}/rest/v1/${table}`, {
      method: "POST",
      headers: this.baseHeaders({
        prefer: "return=minimal",
      }),
      body: JSON.stringify(row),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase insert failed (${table}): HTTP ${response.status} - ${body}`);
    }
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
    const query = buildFilterQuery(filters);
    query.set("select", options?.columns ?? "*");
    if (options?.orderBy) {
      const direction = options.orderBy.ascending === false ? "desc" : "asc";
      query.set("order", `${options.orderBy.column}.${direction}`);
    }
    if (typeof options?.limit === "number") {
      query.set("limit", String(options.limit));
    }

    const response = await fetch(`${this.config.url}/rest/v1/${table}?${query.toString()}`, {
      method: "GET",
      headers: this.baseHeaders({
        accept: "application/json",
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase select failed (${table}): HTTP ${response.status} - ${body}`);
    }

    return readRows(await response.json());
  }

  async update(table: string, filters: RowFilters, patch: TableRow): Promise<TableRow[]> {
    const query = buildFilterQuery(filters);
    const response = await fetch(`${this.config.url}/rest/v1/${table}?${query.toString()}`, {
      method: "PATCH",
      headers: this.baseHeaders({
        accept: "application/json",
        prefer: "return=representation",
      }),
      body: JSON.stringify(patch),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase update failed (${table}): HTTP ${response.status} - ${body}`);
    }

    return readRows(await response.json());
  }

  async deleteMany(table: string, filters: RowFilters): Promise<void> {
    const query = buildFilterQuery(filters);
    const response = await fetch(`${this.config.url}/rest/v1/${table}?${query.toString()}`, {
      method: "DELETE",
      headers: this.baseHeaders({
        prefer: "return=minimal",
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase delete failed (${table}): HTTP ${response.status} - ${body}`);
    }
  }

  private baseHeaders(extraHeaders?: Record<string, string>): Record<string, string> {
    return {
      apikey: this.config.serviceRoleKey,
      authorization: `Bearer ${this.config.serviceRoleKey}`,
      "content-type": "application/json",
      ...(extraHeaders ?? {}),
    };
  }
}

export function buildFilterQuery(filters: RowFilters): URLSearchParams {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(filters)) {
    query.set(key, value === null ? "is.null" : `eq.${value}`);
  }
  return query;
}

function readRows(payload: unknown): TableRow[] {
  if (!Array.isArray(payload)) {
    return [];
  }
  return payload.filter(isTableRow);
}
