import { describe, it, expect } from "@effect/vitest";
import { parseCsvTable } from "../../../table-reader/csv.reader.js";
import { expectLeft, expectRight } from "../helpers.js";

describe("parseCsvTable", () => {
  it("should take the first line as labels and skip blank lines", () => {
    const table = expectRight(parseCsvTable("usage.csv", "timestamp,kW\n2024-01-01 01:00,5\n\n2024-01-01 02:00,6\n"));

    expect(table).toEqual({
      columns: ["timestamp", "kW"],
      rows: [
        ["2024-01-01 01:00", "5"],
        ["2024-01-01 02:00", "6"],
      ],
    });
  });

  it("should strip a byte order mark", () => {
    const table = expectRight(parseCsvTable("usage.csv", "\uFEFFDate,Time,kW\n2024-01-01,0:15,2"));

    expect(table.columns).toEqual(["Date", "Time", "kW"]);
  });

  it("should keep ragged rows as they are", () => {
    const table = expectRight(parseCsvTable("usage.csv", "Report\nDate,0:00,1:00\n2024-01-01,1,2"));

    expect(table.columns).toEqual(["Report"]);
    expect(table.rows).toEqual([
      ["Date", "0:00", "1:00"],
      ["2024-01-01", "1", "2"],
    ]);
  });

  it("should fail on an empty file", () => {
    const error = expectLeft(parseCsvTable("empty.csv", ""));

    expect(error._tag).toBe("TableReadError");
    expect(error.path).toBe("empty.csv");
    expect(error.message).toBe("File is empty");
  });

  it("should fail on an unterminated quote", () => {
    const error = expectLeft(parseCsvTable("bad.csv", "timestamp,kW\n\"2024-01-01 01:00,5"));

    expect(error.message.startsWith("CSV parsing failed")).toBe(true);
  });
});
