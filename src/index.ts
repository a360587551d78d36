/**
 * dialect-sql: row/rows/value/column/insert/update helpers over
 * better-sqlite3 and mysql2, with light dialect normalization.
 */
export { QueryExecutor } from "./db/executor.js";
export { ResultCursor } from "./db/cursor.js";
export { SqliteExecutor } from "./db/providers/sqlite.js";
export { MysqlExecutor } from "./db/providers/mysql.js";
export type { MysqlConnection } from "./db/providers/mysql.js";
export {
  createExecutor,
  executorFromEnv,
  canonicalizeDialect,
  dialectFromUrl,
} from "./db/index.js";
export type { AnyExecutor, CommonExecutorOptions } from "./db/index.js";
export { loadExecutorRegistryFromYaml, expandEnvInString, describeUrl } from "./db/registry.js";
export type { DbAliasMeta, ExecutorRegistry, RegistryOptions } from "./db/registry.js";
export { AmbiguousResultError, ConfigurationError, QueryExecutorError } from "./db/errors.js";
export { mapPlaceholders, inlineUnixTimestamp, toDialect } from "./db/paramMap.js";
export { buildInsert, buildUpdate, quoteIdentifier } from "./db/statements.js";
export { parseMysqlUrl, parseSqliteUrl } from "./db/url.js";
export type { MysqlTarget, SqliteTarget } from "./db/url.js";
export type {
  Attributes,
  Bind,
  Cursor,
  Dialect,
  DictOptions,
  DictRow,
  ExecuteOptions,
  ExecutorOptions,
  Logger,
  NamedRowsOptions,
  RawResult,
  Row,
  RowType,
  SqlValue,
  Statement,
  TupleOptions,
  TupleRow,
} from "./db/provider.js";
