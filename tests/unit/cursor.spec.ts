import { describe, expect, it } from "vitest";
import { ResultCursor } from "../../src/db/cursor.js";

const result = () => ({
  columns: ["Id", "Value"],
  rows: [
    [1, "a"],
    [2, "b"],
    [3, "c"],
  ],
  rowCount: 3,
});

describe("ResultCursor", () => {
  it("shares one position across fetches", () => {
    const cursor = new ResultCursor(result(), "Tuple");
    expect(cursor.fetchOne()).toEqual([1, "a"]);
    expect(cursor.fetchMany(1)).toEqual([[2, "b"]]);
    expect(cursor.fetchAll()).toEqual([[3, "c"]]);
    expect(cursor.fetchOne()).toBeUndefined();
    expect(cursor.fetchAll()).toEqual([]);
  });

  it("stops fetchMany at the end of the result", () => {
    const cursor = new ResultCursor(result(), "Tuple");
    expect(cursor.fetchMany(10)).toHaveLength(3);
    expect(cursor.fetchMany(10)).toEqual([]);
  });

  it("builds named rows from the column list", () => {
    const cursor = new ResultCursor(result(), "Dict");
    expect(cursor.fetchOne()).toEqual({ Id: 1, Value: "a" });
  });

  it("keeps the last value for a repeated column name", () => {
    const cursor = new ResultCursor({ columns: ["x", "x"], rows: [[1, 2]], rowCount: 1 }, "Dict");
    expect(cursor.fetchOne()).toEqual({ x: 2 });
  });

  it("hands out frozen rows", () => {
    const cursor = new ResultCursor(result(), "Tuple");
    expect(Object.isFrozen(cursor.fetchOne())).toBe(true);
  });

  it("exposes counts and ids from the raw result", () => {
    const cursor = new ResultCursor({ columns: [], rows: [], rowCount: 4, lastInsertId: 9n }, "Tuple");
    expect(cursor.rowCount).toBe(4);
    expect(cursor.lastInsertId).toBe(9n);
    expect(cursor.columns).toEqual([]);
  });
});
