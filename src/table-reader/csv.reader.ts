import { Either } from "effect";
import Papa from "papaparse";
import { TableReadError } from "../errors/table-read.error.js";
import { cellText } from "../table/cells.js";
import type { RawTable } from "../table/types.js";

// A single-column file has no delimiter to detect; that is not a parse failure.
const IGNORED_ERROR_TYPES: readonly string[] = ["Delimiter"];

/** The first line becomes the column labels; cells stay as text. */
export const parseCsvTable = (path: string, text: string): Either.Either<RawTable, TableReadError> => {
  const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ""), {
    header: false,
    skipEmptyLines: "greedy",
  });

  const fatal = parsed.errors.find((error) => !IGNORED_ERROR_TYPES.includes(error.type));

  if (fatal !== undefined) {
    return Either.left(new TableReadError({
      path,
      message: `CSV parsing failed at row ${fatal.row ?? "?"}: ${fatal.message}`,
      cause: fatal,
    }));
  }

  const [header, ...rows] = parsed.data;

  if (header === undefined) {
    return Either.left(new TableReadError({ path, message: "File is empty" }));
  }

  return Either.right({ columns: header.map(cellText), rows });
};
