import { describe, it, expect } from "@effect/vitest";
import { Option } from "effect";
import * as XLSX from "xlsx";
import { locateHeaderRow } from "../../../table/header.js";
import { parseWorkbook } from "../../../table-reader/xlsx.reader.js";
import { expectRight } from "../helpers.js";

const workbookBytes = (rows: unknown[][]): Uint8Array => {
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(rows), "Usage");
  return new Uint8Array(XLSX.write(book, { type: "array", bookType: "xlsx" }));
};

describe("parseWorkbook", () => {
  it("should read the first sheet with its first row as labels", () => {
    const table = expectRight(parseWorkbook("usage.xlsx", workbookBytes([
      ["timestamp", "kW"],
      ["2024-01-01 01:00", 5],
    ])));

    expect(table).toEqual({
      columns: ["timestamp", "kW"],
      rows: [["2024-01-01 01:00", 5]],
    });
  });

  it("should keep a title row so the header scan can find the real header", () => {
    const table = expectRight(parseWorkbook("usage.xlsx", workbookBytes([
      ["Meter export", null, null],
      ["Date", "0:00", "1:00"],
      ["2024-01-01", 1, 2],
    ])));

    expect(table.columns[0]).toBe("Meter export");
    expect(table.rows).toEqual([
      ["Date", "0:00", "1:00"],
      ["2024-01-01", 1, 2],
    ]);
    expect(locateHeaderRow(table)).toEqual(Option.some(0));
  });
});
