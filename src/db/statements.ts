import type { Attributes, Statement } from "./provider.js";
import { attributeEntries } from "./values.js";

/**
 * Backtick-quote an identifier. Dotted names (`schema.table`) are quoted per
 * part; embedded backticks are doubled. Both SQLite and MySQL accept this.
 */
export function quoteIdentifier(name: string): string {
  return name
    .split(".")
    .map((part) => "`" + part.replace(/`/g, "``") + "`")
    .join(".");
}

export function buildInsert(table: string, attributes: Attributes): Statement {
  const entries = attributeEntries(attributes);
  const fields = entries.map(([name]) => quoteIdentifier(name)).join(",");
  const placeholders = entries.map(() => "?").join(",");
  return {
    sql: `INSERT INTO ${quoteIdentifier(table)}(${fields}) VALUES(${placeholders})`,
    bind: entries.map(([, value]) => value),
  };
}

/**
 * Filters are ANDed equality predicates; nothing else is expressible.
 * Returns undefined when there is nothing to set.
 */
export function buildUpdate(
  table: string,
  attributes: Attributes,
  filters: Attributes
): Statement | undefined {
  const sets = attributeEntries(attributes);
  if (sets.length === 0) return undefined;

  const where = attributeEntries(filters);
  const setClause = sets.map(([name]) => `${quoteIdentifier(name)}=?`).join(", ");
  const whereClause =
    where.length > 0
      ? " WHERE " + where.map(([name]) => `${quoteIdentifier(name)}=?`).join(" AND ")
      : "";

  return {
    sql: `UPDATE ${quoteIdentifier(table)} SET ${setClause}${whereClause}`,
    bind: [...sets, ...where].map(([, value]) => value),
  };
}
