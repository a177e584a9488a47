/**
 * Tests for the cleaning pipeline
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { clean, runCleaning, runRound, summarize } from "./pipeline.js";
import { computeStats } from "./statistics.js";
import {
  Cell,
  MISSING,
  Table,
  dateCell,
  getRows,
  numberCell,
  tableFromRows,
  tablesEqual,
  textCell
} from "./table.js";

const t = textCell;
const n = numberCell;
const utc = (year: number, month: number, day: number) => dateCell(new Date(Date.UTC(year, month - 1, day)));

describe("runCleaning", () => {
  const raw = tableFromRows(["Name", "Date", "Price", "Empty"], [
    [t(" Alice "), t("2024-01-15"), t("$1"), MISSING],
    [MISSING, MISSING, MISSING, MISSING],
    [t("Bob"), t("2024-02-20"), t("$2"), MISSING],
    [t("Alice"), t("2024-01-15"), t("$1"), MISSING],
    [t("Carol"), t("not a date"), t("$3"), MISSING],
    [t("Dan"), t("2024-03-01"), t(""), MISSING]
  ]);

  it("should clean a messy table end to end", () => {
    const result = runCleaning(raw);

    expect(result.table.columns.map(c => c.name)).toEqual(["Name", "Date", "Price"]);
    expect(getRows(result.table)).toEqual([
      [t("Alice"), utc(2024, 1, 15), n(1)],
      [t("Bob"), utc(2024, 2, 20), n(2)],
      [t("Carol"), MISSING, n(3)],
      [t("Dan"), utc(2024, 3, 1), MISSING]
    ]);
  });

  it("should record every pass of every round", () => {
    const result = runCleaning(raw);

    expect(result.rounds).toBe(2);
    expect(result.passes).toHaveLength(10);
    expect(result.passes.slice(0, 5)).toEqual([
      {
        pass: "structural-pruning",
        round: 1,
        shapeBefore: [6, 4],
        shapeAfter: [5, 3],
        rowsRemoved: 1,
        columnsRemoved: ["Empty"]
      },
      { pass: "text-normalization", round: 1, columns: ["Name", "Date", "Price"], cellsCleared: 1 },
      { pass: "date-standardization", round: 1, columns: ["Date"], cellsCleared: 1 },
      { pass: "duplicate-elimination", round: 1, rowsRemoved: 1 },
      { pass: "numeric-coercion", round: 1, columns: ["Price"] }
    ]);
  });

  it("should capture statistics before and after", () => {
    const result = runCleaning(raw);

    expect(result.original.totalRows).toBe(6);
    expect(result.original.emptyRows).toBe(1);
    expect(result.original.emptyColumns).toBe(1);
    // " Alice " and "Alice" only match after trimming
    expect(result.original.duplicateRows).toBe(0);
    expect(result.original.totalEmptyCells).toBe(9);

    expect(result.cleaned.totalRows).toBe(4);
    expect(result.cleaned.totalColumns).toBe(3);
    expect(result.cleaned.totalEmptyCells).toBe(2);
    expect(result.cleaned.columns.Date.dataType).toBe("date");
    expect(result.cleaned.columns.Price.dataType).toBe("numeric");
  });

  it("should not modify its input", () => {
    const before = getRows(raw);
    runCleaning(raw);
    expect(getRows(raw)).toEqual(before);
  });

  it("should drop rows that become empty after coercion", () => {
    const table = tableFromRows(["code"], [[t("1")], [t("2")], [t("abc")]]);

    const result = runCleaning(table);

    expect(result.table.columns[0].cells).toEqual([n(1), n(2)]);
    expect(result.rounds).toBe(3);
  });

  it("should drop rows that become equal after coercion", () => {
    const table = tableFromRows(["v", "w"], [[t("1"), t("a")], [t("1.0"), t("a")]]);

    const result = runCleaning(table);

    expect(getRows(result.table)).toEqual([[n(1), t("a")]]);
  });

  it("should not convert a column where half or fewer values parse", () => {
    const table = tableFromRows(["code"], [[t("1")], [t("A")], [t("B")], [t("2")]]);

    expect(clean(table).columns[0].cells).toEqual([t("1"), t("A"), t("B"), t("2")]);
  });

  it("should reduce an all-empty table to nothing", () => {
    const table = tableFromRows(["a", "b"], [[MISSING, t("  ")], [t("nan"), MISSING]]);

    const result = runCleaning(table);

    expect(result.table).toEqual({ columns: [], rowCount: 0 });
    expect(summarize(result)[1]).toEqual(["Total Rows", 2, 0, -2]);
  });
});

describe("threshold and sampling cases", () => {
  it("should clean five rows with an empty row, a duplicate pair and a bad date", () => {
    const table = tableFromRows(["Date", "Price"], [
      [t("2024-01-01"), t("$1")],
      [t("2024-01-02"), t("$2")],
      [MISSING, MISSING],
      [t("2024-01-02"), t("$2")],
      [t("2024-13-45"), t("$3")]
    ]);

    const result = runCleaning(table);

    expect(result.table.rowCount).toBe(3);
    expect(result.table.columns[0].cells).toEqual([utc(2024, 1, 1), utc(2024, 1, 2), MISSING]);
    expect(result.table.columns[1].cells).toEqual([n(1), n(2), n(3)]);
    expect(result.cleaned.columns.Price.dataType).toBe("numeric");
  });

  it("should keep a column where only half the values parse as numbers", () => {
    const table = tableFromRows(["id", "amount"], [
      [t("a"), t("$5")], [t("b"), t("$10")], [t("c"), t("n/a")], [t("d"), t("x")]
    ]);

    expect(clean(table).columns[1].cells).toEqual([t("$5"), t("$10"), t("n/a"), t("x")]);
  });

  it("should convert a column where three of four values parse as numbers", () => {
    const table = tableFromRows(["id", "amount"], [
      [t("a"), t("$5")], [t("b"), t("$10")], [t("c"), t("$15")], [t("d"), t("x")]
    ]);

    expect(clean(table).columns[1].cells).toEqual([n(5), n(10), n(15), MISSING]);
  });

  it("should parse a column whose sampled values mostly look like dates", () => {
    const events = ["2024-01-01", "2024-02-15", "hello", "2024-03-01", "2024-04-01",
      "2024-05-01", "2024-06-01", "2024-07-01", "2024-08-01", "world"];
    const table = tableFromRows(["id", "event"], events.map((value, i) => [t(`r${i}`), t(value)]));

    const cells = clean(table).columns[1].cells;

    expect(cells[1]).toEqual(utc(2024, 2, 15));
    expect(cells[2]).toEqual(MISSING);
    expect(cells[9]).toEqual(MISSING);
  });
});

describe("runRound", () => {
  it("should tag every report with the round number", () => {
    const { passes } = runRound(tableFromRows(["a"], [[t("x")]]), 4);
    expect(passes.map(p => p.round)).toEqual([4, 4, 4, 4, 4]);
  });
});

describe("cleaning properties", () => {
  const valueArb: fc.Arbitrary<Cell> = fc.oneof(
    fc.constant(MISSING),
    fc.constantFrom("", "  ", "nan", "a", " a", "b ", "1", " 2", "$3", "4%", "1,000", "x y", "2024-01-05", "05/01/2024")
      .map(textCell),
    fc.integer({ min: -5, max: 5 }).map(numberCell)
  );

  const tableArb: fc.Arbitrary<Table> = fc.integer({ min: 1, max: 4 }).chain(columnCount =>
    fc.array(fc.array(valueArb, { minLength: columnCount, maxLength: columnCount }), { maxLength: 8 })
      .map(rows => tableFromRows(Array.from({ length: columnCount }, (_, i) => `c${i}`), rows))
  );

  it("should be idempotent", () => {
    fc.assert(
      fc.property(tableArb, table => {
        const once = clean(table);
        expect(tablesEqual(clean(once), once)).toBe(true);
      }),
      { numRuns: 200 }
    );
  });

  it("should leave no empty rows, empty columns or duplicate rows", () => {
    fc.assert(
      fc.property(tableArb, table => {
        const stats = computeStats(clean(table));
        expect(stats.emptyRows).toBe(0);
        expect(stats.emptyColumns).toBe(0);
        expect(stats.duplicateRows).toBe(0);
      }),
      { numRuns: 200 }
    );
  });

  it("should never add rows or columns", () => {
    fc.assert(
      fc.property(tableArb, table => {
        const cleaned = clean(table);
        expect(cleaned.rowCount).toBeLessThanOrEqual(table.rowCount);
        expect(cleaned.columns.length).toBeLessThanOrEqual(table.columns.length);
      }),
      { numRuns: 200 }
    );
  });
});
