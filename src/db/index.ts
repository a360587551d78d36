/**
 * src/db/index.ts
 *
 * URL/env driven executor selection.
 * - Picks the provider from the URL scheme (sqlite/sqlite3 -> sqlite, mysql/mariadb -> mysql).
 * - executorFromEnv(): DATABASE_URL, else SQLITE_PATH, else error.
 */

import { ConfigurationError } from "./errors.js";
import type { QueryExecutor } from "./executor.js";
import type { Dialect, ExecutorOptions } from "./provider.js";
import { MysqlExecutor } from "./providers/mysql.js";
import { SqliteExecutor } from "./providers/sqlite.js";

/** Either provider, for callers that pick one from a URL. */
export type AnyExecutor = QueryExecutor<unknown>;

/** Executor options that do not depend on the backend. */
export type CommonExecutorOptions = Omit<ExecutorOptions<never>, "url" | "connection">;

const DIALECT_SYNONYMS: Record<string, Dialect> = {
  sqlite: "sqlite",
  sqlite3: "sqlite",

  mysql: "mysql",
  mariadb: "mysql",
};

export function canonicalizeDialect(input?: string | null): Dialect | undefined {
  if (!input) return undefined;
  return DIALECT_SYNONYMS[input.trim().toLowerCase()];
}

export function dialectFromUrl(url: string): Dialect | undefined {
  // Not new URL(): "sqlite://:memory:" is not a valid WHATWG URL.
  const m = /^([a-z][a-z0-9+.-]*):\/\//i.exec(url.trim());
  return m ? canonicalizeDialect(m[1]) : undefined;
}

export function createExecutor(url: string, options: CommonExecutorOptions = {}): AnyExecutor {
  const dialect = dialectFromUrl(url);
  switch (dialect) {
    case "sqlite":
      return new SqliteExecutor({ ...options, url });
    case "mysql":
      return new MysqlExecutor({ ...options, url });
    default:
      throw new ConfigurationError(
        `Unsupported database URL '${url}'. Expected a sqlite://, sqlite3://, mysql:// or mariadb:// URL.`
      );
  }
}

export function executorFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: CommonExecutorOptions = {}
): AnyExecutor {
  const url = env.DATABASE_URL?.trim();
  if (url) return createExecutor(url, options);

  const sqlitePath = env.SQLITE_PATH?.trim();
  if (sqlitePath) return createExecutor(`sqlite://${sqlitePath}`, options);

  throw new ConfigurationError(
    "Unable to resolve a database from env. Please set DATABASE_URL or SQLITE_PATH."
  );
}
