// src/db/registry.ts
import fs from "node:fs";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { canonicalizeDialect, createExecutor, dialectFromUrl } from "./index.js";
import type { AnyExecutor, CommonExecutorOptions } from "./index.js";
import type { Dialect, Logger } from "./provider.js";
import { parseMysqlUrl, parseSqliteUrl } from "./url.js";

/**
 * Loads named executors from a YAML file:
 *
 *   databases:
 *     - alias: app
 *       url: ${DATABASE_URL}
 *     - alias: reporting
 *       dialect: mysql
 *       host: ${REPORT_HOST:127.0.0.1}
 *       user: report
 *       password: ${REPORT_PASSWORD}
 *       database: reports
 *     - alias: scratch
 *       dialect: sqlite
 *       file: ":memory:"
 *
 * Strings get ${ENV} / ${ENV:default} expansion. Entries with enabled: false,
 * or left incomplete by a blank env var, are skipped with a warning.
 */

export interface DbAliasMeta {
  alias: string;
  dialect: Dialect;
  databaseName: string; // what to show for the alias
  host?: string;
  port?: number;
  file?: string;
}

export interface ExecutorRegistry {
  registry: Map<string, AnyExecutor>;
  meta: Map<string, DbAliasMeta>;
  closeAll: () => Promise<void>;
}

export interface RegistryOptions extends CommonExecutorOptions {
  env?: NodeJS.ProcessEnv;
}

const nonEmpty = z.string().trim().min(1);

const base = {
  alias: nonEmpty,
  enabled: z.boolean().optional(),
};

const UrlEntrySchema = z.object({ ...base, url: nonEmpty });

const MysqlEntrySchema = z.object({
  ...base,
  host: nonEmpty,
  // "${PORT:}" expands to "" - treat it as unset.
  port: z.preprocess(
    (v) => (v === "" || v === null ? undefined : v),
    z.coerce.number().int().positive().optional()
  ),
  user: nonEmpty,
  password: z.string().optional(),
  database: nonEmpty,
});

const SqliteEntrySchema = z.object({ ...base, file: nonEmpty });

const ConfigFileSchema = z.object({
  databases: z.array(z.unknown()).default([]),
});

/** ------------------------------------------------------------------ */
/** ENV EXPANSION HELPERS: ${NAME} or ${NAME:default} in YAML strings. */
/** ------------------------------------------------------------------ */

export function expandEnvInString(str: string, env: NodeJS.ProcessEnv = process.env): string {
  return str.replace(/\$\{([A-Z0-9_]+)(?::([^}]*))?\}/gi, (_m, name: string, def?: string) => {
    const v = env[name];
    if (v === undefined || v === "") {
      // No value: use the default, else leave it blank so validation skips the entry.
      return def ?? "";
    }
    return v;
  });
}

function deepExpand(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") return expandEnvInString(value, env);
  if (Array.isArray(value)) return value.map((v) => deepExpand(v, env));
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = deepExpand(v, env);
    return out;
  }
  return value;
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function aliasOf(entry: unknown): string {
  return isRecord(entry) && typeof entry.alias === "string" && entry.alias ? entry.alias : "?";
}

type ResolvedEntry = { alias: string; url: string } | { alias: string; missing: string[] };

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => i.path.join(".") || i.message);
}

/** Validate one expanded entry and turn it into a connection URL. */
function resolveEntry(entry: unknown): ResolvedEntry {
  const alias = aliasOf(entry);
  if (!isRecord(entry)) return { alias, missing: ["(entry is not a mapping)"] };

  if (entry.url !== undefined) {
    const parsed = UrlEntrySchema.safeParse(entry);
    if (!parsed.success) return { alias, missing: describeIssues(parsed.error) };
    return { alias: parsed.data.alias, url: parsed.data.url };
  }

  const dialect = typeof entry.dialect === "string" ? canonicalizeDialect(entry.dialect) : undefined;
  switch (dialect) {
    case "mysql": {
      const parsed = MysqlEntrySchema.safeParse(entry);
      if (!parsed.success) return { alias, missing: describeIssues(parsed.error) };
      const e = parsed.data;
      const user = encodeURIComponent(e.user);
      const password = e.password ? `:${encodeURIComponent(e.password)}` : "";
      const port = e.port ?? 3306;
      return {
        alias: e.alias,
        url: `mysql://${user}${password}@${e.host}:${port}/${encodeURIComponent(e.database)}`,
      };
    }
    case "sqlite": {
      const parsed = SqliteEntrySchema.safeParse(entry);
      if (!parsed.success) return { alias, missing: describeIssues(parsed.error) };
      // parseSqliteUrl decodes the path after splitting off the query.
      const file = parsed.data.file.replace(/%/g, "%25").replace(/\?/g, "%3F");
      return { alias: parsed.data.alias, url: `sqlite://${file}` };
    }
    default:
      return { alias, missing: ["dialect"] };
  }
}

// works on Windows and POSIX
const basename = (p: string) => p.split(/[\\/]/).filter(Boolean).pop() ?? p;

export function describeUrl(alias: string, url: string): DbAliasMeta {
  const dialect = dialectFromUrl(url);
  if (dialect === "sqlite") {
    const { filename } = parseSqliteUrl(url);
    const databaseName =
      filename === "" ? "(temporary)" : filename === ":memory:" ? filename : basename(filename);
    return { alias, dialect, databaseName, file: filename };
  }
  if (dialect === "mysql") {
    const target = parseMysqlUrl(url);
    return {
      alias,
      dialect,
      databaseName: target.database ?? "(none)",
      host: target.host,
      port: target.port,
    };
  }
  throw new ConfigurationError(`Unsupported database URL for alias '${alias}': ${url}`);
}

export function loadExecutorRegistryFromYaml(
  path: string,
  options: RegistryOptions = {}
): ExecutorRegistry {
  const { env = process.env, ...executorOptions } = options;
  const logger: Logger = executorOptions.logger ?? console;

  const raw = fs.readFileSync(path, "utf8");
  const file = ConfigFileSchema.safeParse(yaml.load(raw) ?? {});
  if (!file.success) {
    throw new ConfigurationError(`Malformed database config ${path}: ${file.error.message}`);
  }

  const list = file.data.databases;
  if (!list.length) throw new ConfigurationError(`No databases in ${path}`);

  const registry = new Map<string, AnyExecutor>();
  const meta = new Map<string, DbAliasMeta>();

  for (const rawEntry of list) {
    const entry = deepExpand(rawEntry, env);

    if (isRecord(entry) && entry.enabled === false) {
      logger.warn(`[db] Skipping '${aliasOf(entry)}' (enabled=false).`);
      continue;
    }

    const resolved = resolveEntry(entry);
    if ("missing" in resolved) {
      logger.warn(
        `[db] Skipping alias='${resolved.alias}': missing env/fields: ${resolved.missing.join(", ")}`
      );
      continue;
    }

    let executor: AnyExecutor;
    let info: DbAliasMeta;
    try {
      info = describeUrl(resolved.alias, resolved.url);
      executor = createExecutor(resolved.url, executorOptions);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      logger.warn(`[db] Skipping alias='${resolved.alias}': ${err.message}`);
      continue;
    }

    if (registry.has(resolved.alias)) {
      logger.error(`[db] Duplicate alias '${resolved.alias}' - previous entry will be overwritten.`);
    }
    registry.set(resolved.alias, executor);
    meta.set(resolved.alias, info);
  }

  if (registry.size === 0) {
    logger.warn(`[db] No usable database entries after validation from ${path}.`);
  }

  async function closeAll() {
    for (const executor of registry.values()) {
      await executor.close();
    }
  }

  return { registry, meta, closeAll };
}
