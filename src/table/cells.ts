import { Option } from "effect";
import { DateTime } from "luxon";
import type { Cell } from "./types.js";

// Every parse happens in UTC so that DST gaps never shift a wall-clock hour.
const PARSE_OPTIONS = { zone: "utc", locale: "en-US" } as const;

const TIMESTAMP_FORMATS = [
  "yyyy-M-d H:mm",
  "yyyy-M-d H:mm:ss",
  "yyyy/M/d H:mm",
  "yyyy/M/d H:mm:ss",
  "M/d/yyyy H:mm",
  "M/d/yyyy H:mm:ss",
  "M/d/yyyy h:mm a",
  "M/d/yyyy h:mm:ss a",
  "M/d/yy H:mm",
  "M/d/yy H:mm:ss",
  "M/d/yy h:mm a",
  "d.M.yyyy H:mm",
  "d.M.yyyy H:mm:ss",
] as const;

const DATE_FORMATS = ["yyyy-M-d", "yyyy/M/d", "M/d/yyyy", "M/d/yy", "d.M.yyyy"] as const;

// A time with no date would otherwise be dated today by the ISO parser.
const TIME_ONLY = /^T?\d{1,2}(?::?\d{2}){0,2}(?:[.,]\d+)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

// Hour-ending "24:00" is not rolled into the next day.
const HOUR_24 = /(?:^|[\sT])24:\d{2}/;

// Spreadsheet time-only cells come back as dates on the 1899/1900 epoch.
const SPREADSHEET_EPOCH_YEAR = 1900;

const fromJsDate = (date: Date): DateTime =>
  DateTime.fromObject(
    {
      year: date.getFullYear(),
      month: date.getMonth() + 1,
      day: date.getDate(),
      hour: date.getHours(),
      minute: date.getMinutes(),
      second: date.getSeconds(),
    },
    PARSE_OPTIONS
  );

export const cellText = (cell: Cell): string => {
  if (cell === null || cell === undefined) {
    return "";
  }

  if (cell instanceof Date) {
    if (Number.isNaN(cell.getTime())) {
      return "";
    }

    const dateTime = fromJsDate(cell);

    if (dateTime.year <= SPREADSHEET_EPOCH_YEAR) {
      return dateTime.toFormat(dateTime.second === 0 ? "H:mm" : "H:mm:ss");
    }

    return dateTime.hour === 0 && dateTime.minute === 0 && dateTime.second === 0
      ? dateTime.toFormat("yyyy-MM-dd")
      : dateTime.toFormat("yyyy-MM-dd HH:mm:ss");
  }

  return String(cell).trim();
};

export const containsToken = (cell: Cell, token: string): boolean =>
  cellText(cell).toLowerCase().includes(token.toLowerCase());

/**
 * Strict numeric coercion: finite numbers pass, numeric strings are parsed,
 * everything else (blank, text, thousands separators, booleans) is `None`.
 */
export const toNumber = (cell: Cell): Option.Option<number> => {
  if (typeof cell === "number") {
    return Number.isFinite(cell) ? Option.some(cell) : Option.none();
  }

  if (typeof cell !== "string") {
    return Option.none();
  }

  const text = cell.trim();

  if (text === "") {
    return Option.none();
  }

  const value = Number(text);

  return Number.isFinite(value) ? Option.some(value) : Option.none();
};

const firstValid = (
  text: string,
  formats: readonly string[]
): Option.Option<DateTime> => {
  for (const format of formats) {
    const parsed = DateTime.fromFormat(text, format, PARSE_OPTIONS);

    if (parsed.isValid) {
      return Option.some(parsed);
    }
  }

  return Option.none();
};

/**
 * Parses a combined date-time into a naive wall-clock `DateTime`. An explicit
 * offset is kept as written, so the hour is always the hour in the text.
 * Text without a date part, or at hour 24, is `None`.
 */
export const parseTimestamp = (text: string): Option.Option<DateTime> => {
  const trimmed = text.trim();

  if (trimmed === "" || TIME_ONLY.test(trimmed) || HOUR_24.test(trimmed)) {
    return Option.none();
  }

  const iso = DateTime.fromISO(trimmed, { ...PARSE_OPTIONS, setZone: true });

  if (iso.isValid) {
    return Option.some(iso);
  }

  const sql = DateTime.fromSQL(trimmed, { ...PARSE_OPTIONS, setZone: true });

  if (sql.isValid) {
    return Option.some(sql);
  }

  return firstValid(trimmed, TIMESTAMP_FORMATS);
};

export const parseDate = (text: string): Option.Option<DateTime> => {
  const trimmed = text.trim();

  if (trimmed === "") {
    return Option.none();
  }

  return firstValid(trimmed, DATE_FORMATS).pipe(
    Option.orElse(() => parseTimestamp(trimmed)),
    Option.map((dateTime) => dateTime.startOf("day"))
  );
};

/** Spreadsheet date cells are read by their fields; a bare time of day has no date. */
export const parseTimestampCell = (cell: Cell): Option.Option<DateTime> => {
  if (!(cell instanceof Date)) {
    return parseTimestamp(cellText(cell));
  }

  if (Number.isNaN(cell.getTime())) {
    return Option.none();
  }

  const dateTime = fromJsDate(cell);

  return dateTime.year <= SPREADSHEET_EPOCH_YEAR ? Option.none() : Option.some(dateTime);
};
