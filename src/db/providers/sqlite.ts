import Database from "better-sqlite3";
import { ConfigurationError } from "../errors.js";
import { QueryExecutor } from "../executor.js";
import { toDialect } from "../paramMap.js";
import type { Bind, ExecutorOptions, RawResult, SqlValue } from "../provider.js";
import { parseSqliteUrl } from "../url.js";
import { normalizeRow } from "../values.js";

type SqliteParam = string | number | bigint | Buffer | null;

/** better-sqlite3 rejects booleans and Dates. */
function toSqliteParam(value: SqlValue): SqliteParam {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  return value;
}

export class SqliteExecutor extends QueryExecutor<Database.Database> {
  readonly dialect = "sqlite";

  constructor(options: ExecutorOptions<Database.Database> = {}) {
    super(options);
  }

  async connect(): Promise<Database.Database> {
    if (this.url === undefined) {
      throw new ConfigurationError("SqliteExecutor needs a url or a connection");
    }
    const target = parseSqliteUrl(this.url);
    return new Database(target.filename, {
      readonly: target.readonly,
      fileMustExist: target.fileMustExist,
    });
  }

  toNativeSql(sql: string): string {
    return toDialect(sql, "sqlite");
  }

  protected async run(db: Database.Database, sql: string, bind: Bind): Promise<RawResult> {
    const stmt = db.prepare(sql);
    const params = bind.map(toSqliteParam);

    if (!stmt.reader) {
      const info = stmt.run(...params);
      return { columns: [], rows: [], rowCount: info.changes, lastInsertId: info.lastInsertRowid };
    }

    // Raw mode and safe integers are per-statement switches; the connection is left as it was.
    const columns = stmt.columns().map((c) => c.name);
    const rows: SqlValue[][] = [];
    for (const cells of stmt.safeIntegers(true).raw(true).all(...params)) {
      if (Array.isArray(cells)) rows.push(normalizeRow(cells));
    }
    return { columns, rows, rowCount: rows.length };
  }

  protected async disconnect(db: Database.Database): Promise<void> {
    db.close();
  }
}
