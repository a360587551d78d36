import type { Statement } from "./provider.js";

export class QueryExecutorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QueryExecutorError";
  }
}

/** A single-row query came back with more than one row. */
export class AmbiguousResultError extends QueryExecutorError {
  readonly statement: Statement;

  constructor(statement: Statement, rendered: string) {
    super(`Multiple rows returned from ${rendered}`);
    this.name = "AmbiguousResultError";
    this.statement = statement;
  }
}

export class ConfigurationError extends QueryExecutorError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
