import { Either, Option } from "effect";
import type { DateTime } from "luxon";
import { cellText, containsToken, parseTimestamp, parseTimestampCell, toNumber } from "../table/cells.js";
import { promoteHeaderRow } from "../table/header.js";
import type { RawTable, Row } from "../table/types.js";
import { StructuralError } from "../errors/structural.error.js";
import type { NormalizedReadings, Reading } from "./types.js";

export const MISSING_TIMESTAMP_MESSAGE = "Missing 'timestamp' or 'date' + 'time' columns.";
export const MISSING_POWER_MESSAGE = "No 'kW' column found.";

// Placeholder labels readers give to blank header cells.
const PLACEHOLDER_LABEL = /^(unnamed: ?\d+)?$/i;

const promoteEmbeddedHeader = (table: RawTable): RawTable => {
  const hasPlaceholder = table.columns.some((label) => PLACEHOLDER_LABEL.test(label.trim()));
  const firstRow = table.rows[0];

  if (hasPlaceholder && firstRow !== undefined && firstRow.some((cell) => containsToken(cell, "date"))) {
    return promoteHeaderRow(table, 0);
  }

  return table;
};

const timestampReader = (
  labels: readonly string[]
): Option.Option<(row: Row) => Option.Option<DateTime>> => {
  const timestampIndex = labels.indexOf("timestamp");

  if (timestampIndex !== -1) {
    return Option.some((row) => parseTimestampCell(row[timestampIndex]));
  }

  const dateIndex = labels.indexOf("date");
  const timeIndex = labels.indexOf("time");

  if (dateIndex !== -1 && timeIndex !== -1) {
    return Option.some((row) => {
      const date = cellText(row[dateIndex]);
      return date === "" ? Option.none() : parseTimestamp(`${date} ${cellText(row[timeIndex])}`);
    });
  }

  return Option.none();
};

/**
 * One row per reading. The power source is the leftmost label containing
 * "kw", so a "kWh" column left of a "kW" column wins.
 */
export const normalizeTall = (input: RawTable): Either.Either<NormalizedReadings, StructuralError> => {
  const table = promoteEmbeddedHeader(input);
  const labels = table.columns.map((label) => label.trim().toLowerCase());

  const readTimestamp = timestampReader(labels);

  if (Option.isNone(readTimestamp)) {
    return Either.left(new StructuralError({ message: MISSING_TIMESTAMP_MESSAGE }));
  }

  const powerIndex = labels.findIndex((label) => label.includes("kw"));

  if (powerIndex === -1) {
    return Either.left(new StructuralError({ message: MISSING_POWER_MESSAGE }));
  }

  const readings = table.rows.flatMap((row): Reading[] => {
    const timestamp = readTimestamp.value(row);
    const powerKw = toNumber(row[powerIndex]);

    return Option.isSome(timestamp) && Option.isSome(powerKw)
      ? [{ timestamp: timestamp.value, powerKw: powerKw.value }]
      : [];
  });

  return Either.right({ readings, intervalHours: null, warnings: [] });
};
