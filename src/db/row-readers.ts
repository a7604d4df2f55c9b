import { TableRow } from "./table.client";

export function readString(row: TableRow, key: string, fallback = ""): string {
  const value = row[key];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return fallback;
}

export function readNullableString(row: TableRow, key: string): string | null {
  const value = row[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

export function readNumber(row: TableRow, key: string, fallback = 0): number {
  const value = row[key];
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return fallback;
}

/** JSON columns arrive decoded from PostgREST, but rows written as text still parse. */
export function readJson(row: TableRow, key: string): unknown {
  const value = row[key];
  if (typeof value !== "string") {
    return value ?? null;
  }
  try {
    return JSON.parse(value);
  } catch {
    return null;
  }
}

export function readStringArray(row: TableRow, key: string): string[] {
  const value = readJson(row, key);
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === "string");
}

export function readRecord(row: TableRow, key: string): Record<string, unknown> {
  const value = readJson(row, key);
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

export function readOneOf<T extends string>(
  row: TableRow,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const value = row[key];
  const match = allowed.find((item) => item === value);
  return match ?? fallback;
}
