import mysql from "mysql2/promise";
import type { Connection, ResultSetHeader, RowDataPacket } from "mysql2/promise";
import { ConfigurationError } from "../errors.js";
import { QueryExecutor } from "../executor.js";
import { toDialect } from "../paramMap.js";
import type { Bind, ExecutorOptions, RawResult, SqlValue } from "../provider.js";
import { parseMysqlUrl } from "../url.js";
import { normalizeRow, normalizeValue } from "../values.js";

/** The part of a mysql2 promise connection the executor talks to. */
export type MysqlConnection = Pick<Connection, "query" | "end">;

export class MysqlExecutor extends QueryExecutor<MysqlConnection> {
  readonly dialect = "mysql";

  constructor(options: ExecutorOptions<MysqlConnection> = {}) {
    super(options);
  }

  async connect(): Promise<MysqlConnection> {
    if (this.url === undefined) {
      throw new ConfigurationError("MysqlExecutor needs a url or a connection");
    }
    const target = parseMysqlUrl(this.url);
    return mysql.createConnection({
      host: target.host,
      port: target.port,
      user: target.user,
      password: target.password,
      database: target.database,
      charset: target.charset,
      timezone: target.timezone,
      // BIGINTs past 2^53 arrive as decimal strings instead of rounded numbers.
      supportBigNumbers: true,
    });
  }

  toNativeSql(sql: string): string {
    return toDialect(sql, "mysql");
  }

  protected async run(connection: MysqlConnection, sql: string, bind: Bind): Promise<RawResult> {
    // rowsAsArray is per query, so the connection's own defaults stay untouched.
    const [result, fields] = await connection.query<RowDataPacket[] | ResultSetHeader>(
      { sql, rowsAsArray: true },
      [...bind]
    );

    if (!Array.isArray(result)) {
      return {
        columns: [],
        rows: [],
        rowCount: result.affectedRows,
        lastInsertId: result.insertId,
      };
    }

    const columns = (fields ?? []).map((f) => f.name);
    const rows: SqlValue[][] = result.map((row) =>
      Array.isArray(row) ? normalizeRow(row) : columns.map((name) => normalizeValue(row[name]))
    );
    return { columns, rows, rowCount: rows.length };
  }

  protected async disconnect(connection: MysqlConnection): Promise<void> {
    await connection.end();
  }
}
