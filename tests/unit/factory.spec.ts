import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../src/db/errors.js";
import {
  canonicalizeDialect,
  createExecutor,
  dialectFromUrl,
  executorFromEnv,
} from "../../src/index.js";
import { MysqlExecutor } from "../../src/db/providers/mysql.js";
import { SqliteExecutor } from "../../src/db/providers/sqlite.js";

describe("canonicalizeDialect", () => {
  it("maps synonyms", () => {
    expect(canonicalizeDialect(" SQLite3 ")).toBe("sqlite");
    expect(canonicalizeDialect("mariadb")).toBe("mysql");
  });

  it("returns undefined for unknown or missing input", () => {
    expect(canonicalizeDialect("oracle")).toBeUndefined();
    expect(canonicalizeDialect(undefined)).toBeUndefined();
  });
});

describe("dialectFromUrl", () => {
  it("reads the scheme, including the in-memory sqlite form", () => {
    expect(dialectFromUrl("sqlite://:memory:")).toBe("sqlite");
    expect(dialectFromUrl("MariaDB://h/db")).toBe("mysql");
    expect(dialectFromUrl("/just/a/path.db")).toBeUndefined();
  });
});

describe("createExecutor", () => {
  it("builds a SQLite executor", async () => {
    const db = createExecutor("sqlite://:memory:");
    expect(db).toBeInstanceOf(SqliteExecutor);
    expect(db.dialect).toBe("sqlite");
    expect(await db.value("SELECT %s", [2])).toBe(2);
    await db.close();
  });

  it("builds a MySQL executor without connecting", () => {
    const db = createExecutor("mariadb://app@db.local/shop");
    expect(db).toBeInstanceOf(MysqlExecutor);
    expect(db.url).toBe("mariadb://app@db.local/shop");
  });

  it("fails to connect with a configuration error on a malformed path", async () => {
    const db = createExecutor("sqlite://100%.db");
    await expect(db.value("SELECT 1")).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("rejects unsupported schemes", () => {
    expect(() => createExecutor("postgres://h/db")).toThrow(ConfigurationError);
  });
});

describe("executorFromEnv", () => {
  it("prefers DATABASE_URL", () => {
    const db = executorFromEnv({ DATABASE_URL: "mysql://u@h/db", SQLITE_PATH: "x.db" });
    expect(db).toBeInstanceOf(MysqlExecutor);
    expect(db.url).toBe("mysql://u@h/db");
  });

  it("falls back to SQLITE_PATH", () => {
    const db = executorFromEnv({ SQLITE_PATH: "/tmp/app.db" });
    expect(db).toBeInstanceOf(SqliteExecutor);
    expect(db.url).toBe("sqlite:///tmp/app.db");
  });

  it("fails when neither is set", () => {
    expect(() => executorFromEnv({})).toThrow(ConfigurationError);
  });
});
