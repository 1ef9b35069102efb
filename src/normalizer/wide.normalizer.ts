import { Either, Option } from "effect";
import { cellText, containsToken, parseDate, parseTimestamp, toNumber } from "../table/cells.js";
import { promoteHeaderRow } from "../table/header.js";
import type { RawTable } from "../table/types.js";
import { StructuralError } from "../errors/structural.error.js";
import { HOURS_OF_DAY } from "../profile/types.js";
import { isTimeOfDayLabel } from "./shape-classifier.js";
import { DataQualityWarning, type NormalizedReadings, type Reading } from "./types.js";

export const FIFTEEN_MINUTE_COLUMN_COUNT = 96;
export const DAILY_TOTAL_INTERVAL_HOURS = 24;

export const DAILY_TOTAL_WARNING = "Daily kWh file detected: assuming uniform 24-hour usage.";
export const NO_TIME_AXIS_MESSAGE = "Unsupported format: no valid time columns or total kWh column found.";

type IndexedLabel = {
  readonly label: string;
  readonly index: number;
};

// Anything short of a full 15-minute day is read as hourly.
export const inferIntervalHours = (timeColumnCount: number): number =>
  timeColumnCount >= FIFTEEN_MINUTE_COLUMN_COUNT ? 0.25 : 1.0;

const promoteDateRow = (table: RawTable): RawTable => {
  const firstRow = table.rows[0];

  return firstRow !== undefined && firstRow.some((cell) => containsToken(cell, "date"))
    ? promoteHeaderRow(table, 0)
    : table;
};

const fromIntervalColumns = (table: RawTable, timeColumns: readonly IndexedLabel[]): NormalizedReadings => {
  const intervalHours = inferIntervalHours(timeColumns.length);

  const readings = table.rows.flatMap((row) => {
    const date = cellText(row[0]);

    // Summary and footer rows carry no date.
    if (date === "") {
      return [];
    }

    return timeColumns.flatMap(({ label, index }): Reading[] => {
      const timestamp = parseTimestamp(`${date} ${label}`);
      const energyKwh = toNumber(row[index]);

      return Option.isSome(timestamp) && Option.isSome(energyKwh)
        ? [{ timestamp: timestamp.value, powerKw: energyKwh.value / intervalHours }]
        : [];
    });
  });

  return { readings, intervalHours, warnings: [] };
};

const fromDailyTotals = (table: RawTable, totalIndex: number): NormalizedReadings => {
  const readings = table.rows.flatMap((row): Reading[] => {
    const date = parseDate(cellText(row[0]));
    const totalKwh = toNumber(row[totalIndex]);

    if (Option.isNone(date) || Option.isNone(totalKwh)) {
      return [];
    }

    const averageKw = totalKwh.value / DAILY_TOTAL_INTERVAL_HOURS;

    return HOURS_OF_DAY.map((hour) => ({
      timestamp: date.value.set({ hour }),
      powerKw: averageKw,
    }));
  });

  return {
    readings,
    intervalHours: DAILY_TOTAL_INTERVAL_HOURS,
    warnings: [new DataQualityWarning({ message: DAILY_TOTAL_WARNING })],
  };
};

/**
 * One row per day. Intraday kWh columns win over a daily total column; with
 * only a total the day is spread evenly over 24 hours and flagged.
 */
export const normalizeWide = (input: RawTable): Either.Either<NormalizedReadings, StructuralError> => {
  const table = promoteDateRow(input);
  const labels = table.columns.map((label, index) => (index === 0 ? "date" : label.trim()));

  const timeColumns = labels.flatMap((label, index) =>
    isTimeOfDayLabel(label) ? [{ label, index }] : []
  );

  if (timeColumns.length > 0) {
    return Either.right(fromIntervalColumns(table, timeColumns));
  }

  const totalIndex = labels.findIndex((label) => {
    const lower = label.toLowerCase();
    return lower.includes("total") || lower.includes("kwh");
  });

  if (totalIndex !== -1) {
    return Either.right(fromDailyTotals(table, totalIndex));
  }

  return Either.left(new StructuralError({ message: NO_TIME_AXIS_MESSAGE }));
};
