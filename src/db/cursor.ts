import type { Cursor, DictRow, RawResult, Row, RowType, SqlValue, TupleRow } from "./provider.js";

function toTuple(cells: SqlValue[]): TupleRow {
  return Object.freeze([...cells]);
}

function toDict(columns: readonly string[], cells: SqlValue[]): DictRow {
  const out: Record<string, SqlValue> = {};
  columns.forEach((name, i) => {
    out[name] = cells[i] ?? null;
  });
  return Object.freeze(out);
}

/**
 * Cursor over a buffered result. Rows are shaped when fetched, so the same
 * raw result can be read positionally or by column name.
 */
export class ResultCursor implements Cursor<Row> {
  readonly columns: readonly string[];
  readonly rowCount: number;
  readonly lastInsertId: number | bigint | undefined;

  private readonly rows: SqlValue[][];
  private readonly rowType: RowType;
  private position = 0;

  constructor(result: RawResult, rowType: RowType) {
    this.columns = Object.freeze([...result.columns]);
    this.rows = result.rows;
    this.rowCount = result.rowCount;
    this.lastInsertId = result.lastInsertId;
    this.rowType = rowType === "Dict" ? "Dict" : "Tuple";
  }

  fetchOne(): Row | undefined {
    if (this.position >= this.rows.length) return undefined;
    return this.shape(this.rows[this.position++]);
  }

  fetchMany(size = 1): Row[] {
    const end = Math.min(this.position + Math.max(size, 0), this.rows.length);
    const out = this.rows.slice(this.position, end).map((cells) => this.shape(cells));
    this.position = end;
    return out;
  }

  fetchAll(): Row[] {
    return this.fetchMany(this.rows.length - this.position);
  }

  private shape(cells: SqlValue[]): Row {
    return this.rowType === "Dict" ? toDict(this.columns, cells) : toTuple(cells);
  }
}
