import type { Attributes, SqlValue } from "./provider.js";

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/** Integers read as bigint stay bigint only when a number would round them. */
function narrowInteger(value: bigint): number | bigint {
  return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value;
}

/**
 * Coerce whatever a driver returned for a cell into a SqlValue.
 * MySQL JSON columns arrive parsed; they are handed back as JSON text.
 */
export function normalizeValue(value: unknown): SqlValue {
  if (value === undefined || value === null) return null;
  if (typeof value === "bigint") return narrowInteger(value);
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (value instanceof Date || Buffer.isBuffer(value)) return value;
  if (value instanceof Uint8Array) return Buffer.from(value);
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

export function normalizeRow(cells: readonly unknown[]): SqlValue[] {
  return cells.map(normalizeValue);
}

/** Render a bind value for `lastSql()`. */
export function formatValue(value: SqlValue): string {
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return `<Buffer ${value.length} bytes>`;
  return String(value);
}

function isMap(attributes: Attributes): attributes is ReadonlyMap<string, SqlValue> {
  return attributes instanceof Map;
}

/** Column/value pairs in insertion order. */
export function attributeEntries(attributes: Attributes): Array<[string, SqlValue]> {
  if (isMap(attributes)) return [...attributes.entries()];
  return Object.entries(attributes);
}
