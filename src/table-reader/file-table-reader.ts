import { Effect, Layer } from "effect";
import { FileSystem } from "@effect/platform";
import { TableReadError } from "../errors/table-read.error.js";
import { parseCsvTable } from "./csv.reader.js";
import { TableReader } from "./types.js";
import { parseWorkbook } from "./xlsx.reader.js";

const SPREADSHEET_EXTENSIONS = [".xlsx", ".xls"];

export const FileTableReaderLayer = Layer.effect(
  TableReader,
  Effect.gen(function* () {
    const fileSystem = yield* FileSystem.FileSystem;

    const read = (path: string) => {
      const lower = path.toLowerCase();
      const readFailed = (cause: unknown) =>
        new TableReadError({ path, message: `Could not read ${path}`, cause });

      if (lower.endsWith(".csv")) {
        return fileSystem.readFileString(path).pipe(
          Effect.mapError(readFailed),
          Effect.flatMap((text) => parseCsvTable(path, text)),
        );
      }

      if (SPREADSHEET_EXTENSIONS.some((extension) => lower.endsWith(extension))) {
        return fileSystem.readFile(path).pipe(
          Effect.mapError(readFailed),
          Effect.flatMap((data) => parseWorkbook(path, data)),
        );
      }

      return Effect.fail(new TableReadError({ path, message: "Unsupported file type; expected .csv, .xlsx or .xls" }));
    };

    return { read };
  })
);
