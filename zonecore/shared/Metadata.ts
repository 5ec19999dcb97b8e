// zonecore/shared/Metadata.ts
//
// Readers for the free-form metadata bag stored on every entity.
// Stored metadata may be historical or hand-edited, so every reader takes a
// fallback instead of throwing.

export type Metadata = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Shallow copy of a record value, or an empty record. */
export function readRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? { ...value } : {};
}

/** Shallow copy of a list value, or an empty list. */
export function readList(value: unknown): unknown[] {
  return Array.isArray(value) ? [...value] : [];
}

/** Truthiness of a stored value: empty strings, lists, records and zero are false. */
export function truthy(value: unknown): boolean {
  if (value === null || value === undefined || value === false) return false;
  if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
  if (typeof value === "string") return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return true;
}

const INT_PATTERN = /^\s*[+-]?\d+\s*$/;

/** Integer reader: numbers truncate toward zero, strings must be integral. */
export function readInt(value: unknown, fallback: number): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : fallback;
  }
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string" && INT_PATTERN.test(value)) {
    return Number(value.trim());
  }
  return fallback;
}

export function readFloat(value: unknown, fallback: number): number {
  if (typeof value === "number") {
    return Number.isNaN(value) ? fallback : value;
  }
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isNaN(n) ? fallback : n;
  }
  return fallback;
}

/** Non-empty string form of a scalar, else null. */
export function readString(value: unknown): string | null {
  if (typeof value === "string") return value.length > 0 ? value : null;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

/** Truthy entries of a list, stringified. */
export function readStringList(value: unknown): string[] {
  const out: string[] = [];
  for (const entry of readList(value)) {
    if (!truthy(entry)) continue;
    out.push(String(entry));
  }
  return out;
}

export function normalizeSkillKey(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).trim().toLowerCase().replace(/ /g, "_");
}

export function normalizeGoodTypeKey(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).trim().toLowerCase().replace(/ /g, "_");
}

// Timestamps without a zone designator were written in UTC.
const ZONED = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

export function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== "string" || value.length === 0) return null;
  const ms = Date.parse(ZONED.test(value) ? value : `${value}Z`);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/** Boolean flag; absent or null reads as `fallback`, anything else by truthiness. */
export function readBool(value: unknown, fallback = false): boolean {
  if (value === undefined || value === null) return fallback;
  return truthy(value);
}
