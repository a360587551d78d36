import type { Dialect } from "./provider.js";

/**
 * Both drivers bind positionally with `?`, so `%s` markers written for
 * other clients are mapped onto it. Plain text substitution: a `%s` inside a
 * string literal is rewritten too.
 */
export function mapPlaceholders(sql: string): string {
  return sql.replace(/%s/g, "?");
}

/**
 * Replace `unix_timestamp()` with the current Unix time in seconds.
 * `now` (epoch milliseconds) lets callers pin the clock.
 */
export function inlineUnixTimestamp(sql: string, now: number = Date.now()): string {
  const seconds = Math.floor(now / 1000);
  return sql.replace(/unix_timestamp\(\)/gi, () => String(seconds));
}

/**
 * Rewrites SQL into what the target driver accepts.
 * MySQL has UNIX_TIMESTAMP() natively; SQLite gets a literal.
 */
export function toDialect(sql: string, dialect: Dialect): string {
  const text = mapPlaceholders(sql);
  if (dialect === "sqlite") return inlineUnixTimestamp(text);
  return text;
}
