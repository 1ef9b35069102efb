import { describe, it, expect } from "@effect/vitest";
import {
  MISSING_POWER_MESSAGE,
  MISSING_TIMESTAMP_MESSAGE,
  normalizeTall,
} from "../../../normalizer/tall.normalizer.js";
import type { RawTable } from "../../../table/types.js";
import { expectLeft, expectRight } from "../helpers.js";

describe("normalizeTall", () => {
  it("should read a timestamp column and the power column", () => {
    const table: RawTable = {
      columns: ["timestamp", "Power (kW)"],
      rows: [
        ["2024-01-01 05:00", "3.0"],
        ["2024-01-02 05:15", "7.5"],
        ["2024-01-03 05:30", 2],
      ],
    };

    const { readings, intervalHours, warnings } = expectRight(normalizeTall(table));

    expect(readings.map((reading) => reading.powerKw)).toEqual([3, 7.5, 2]);
    expect(readings.map((reading) => reading.timestamp.hour)).toEqual([5, 5, 5]);
    expect(intervalHours).toBeNull();
    expect(warnings).toEqual([]);
  });

  it("should combine date and time columns", () => {
    const table: RawTable = {
      columns: ["Date", "Time", "kW"],
      rows: [["2024-01-01", "13:00", "4"]],
    };

    const [reading] = expectRight(normalizeTall(table)).readings;

    expect(reading?.timestamp.hour).toBe(13);
    expect(reading?.timestamp.day).toBe(1);
    expect(reading?.powerKw).toBe(4);
  });

  it("should drop a time whose date cell is blank", () => {
    const table: RawTable = {
      columns: ["Date", "Time", "kW"],
      rows: [
        ["", "13:00", "500"],
        ["2024-01-01", "14:00", "5"],
      ],
    };

    const { readings } = expectRight(normalizeTall(table));

    expect(readings.map((reading) => [reading.timestamp.hour, reading.powerKw])).toEqual([[14, 5]]);
  });

  it("should read spreadsheet date cells in the timestamp column", () => {
    const table: RawTable = {
      columns: ["timestamp", "kW"],
      rows: [[new Date(2024, 5, 1, 18, 45), 3]],
    };

    const [reading] = expectRight(normalizeTall(table)).readings;

    expect([reading?.timestamp.month, reading?.timestamp.day, reading?.timestamp.hour]).toEqual([6, 1, 18]);
    expect(reading?.powerKw).toBe(3);
  });

  it("should lower-case and trim labels", () => {
    const table: RawTable = {
      columns: [" TIMESTAMP ", " Demand KW "],
      rows: [["2024-01-01 02:00", "9"]],
    };

    expect(expectRight(normalizeTall(table)).readings).toHaveLength(1);
  });

  it("should take the leftmost column containing kw", () => {
    const table: RawTable = {
      columns: ["timestamp", "kWh", "kW"],
      rows: [["2024-01-01 01:00", "10", "40"]],
    };

    expect(expectRight(normalizeTall(table)).readings[0]?.powerKw).toBe(10);
  });

  it("should drop rows with a bad timestamp or a non-numeric value", () => {
    const table: RawTable = {
      columns: ["timestamp", "kW"],
      rows: [
        ["2024-01-01 01:00", "5"],
        ["yesterday", "6"],
        ["2024-01-01 02:00", "n/a"],
        ["2024-01-01 03:00"],
      ],
    };

    const { readings } = expectRight(normalizeTall(table));

    expect(readings).toHaveLength(1);
    expect(readings[0]?.powerKw).toBe(5);
  });

  it("should return no readings rather than fail when every row is invalid", () => {
    const table: RawTable = {
      columns: ["timestamp", "kW"],
      rows: [["never", "x"]],
    };

    expect(expectRight(normalizeTall(table)).readings).toEqual([]);
  });

  it("should promote a header embedded in the first row", () => {
    const table: RawTable = {
      columns: ["Usage export", "", ""],
      rows: [
        ["DATE", "TIME", "KW"],
        ["2024-01-01", "2:00", "5"],
      ],
    };

    const { readings } = expectRight(normalizeTall(table));

    expect(readings).toHaveLength(1);
    expect(readings[0]?.timestamp.hour).toBe(2);
    expect(readings[0]?.powerKw).toBe(5);
  });

  it("should report a missing timestamp axis", () => {
    const table: RawTable = { columns: ["when", "kW"], rows: [] };

    const error = expectLeft(normalizeTall(table));

    expect(error._tag).toBe("StructuralError");
    expect(error.message).toBe(MISSING_TIMESTAMP_MESSAGE);
  });

  it("should report a date column without a time column as a missing timestamp axis", () => {
    const table: RawTable = { columns: ["Date", "Total kWh"], rows: [["2024-01-01", "48"]] };

    expect(expectLeft(normalizeTall(table)).message).toBe(MISSING_TIMESTAMP_MESSAGE);
  });

  it("should report a missing power column", () => {
    const table: RawTable = { columns: ["timestamp", "usage"], rows: [["2024-01-01 00:00", "1"]] };

    expect(expectLeft(normalizeTall(table)).message).toBe(MISSING_POWER_MESSAGE);
  });
});
