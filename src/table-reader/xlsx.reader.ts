import { Either } from "effect";
import * as XLSX from "xlsx";
import { TableReadError } from "../errors/table-read.error.js";
import { cellText } from "../table/cells.js";
import type { Cell, RawTable } from "../table/types.js";

const toCell = (value: unknown): Cell =>
  typeof value === "string"
    || typeof value === "number"
    || typeof value === "boolean"
    || value instanceof Date
    ? value
    : null;

/** Reads the first worksheet; its first row becomes the column labels. */
export const parseWorkbook = (path: string, data: Uint8Array): Either.Either<RawTable, TableReadError> => {
  let workbook: XLSX.WorkBook;

  try {
    workbook = XLSX.read(data, { type: "array", cellDates: true });
  } catch (error) {
    return Either.left(new TableReadError({ path, message: "Unreadable spreadsheet", cause: error }));
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];

  if (sheet === undefined) {
    return Either.left(new TableReadError({ path, message: "Workbook has no sheets" }));
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });

  const [header, ...rows] = matrix.map((row) => row.map(toCell));

  if (header === undefined) {
    return Either.left(new TableReadError({ path, message: "File is empty" }));
  }

  return Either.right({ columns: header.map(cellText), rows });
};
