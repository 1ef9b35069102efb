import { Either } from "effect";
import { HOURS_OF_DAY } from "../../profile/types.js";
import type { Cell, RawTable } from "../../table/types.js";

export const hourlyLabels: readonly string[] = HOURS_OF_DAY.map((hour) => `${hour}:00`);

export const quarterHourLabels: readonly string[] = Array.from({ length: 96 }, (_, slot) => {
  const minutes = slot * 15;
  return `${Math.floor(minutes / 60)}:${String(minutes % 60).padStart(2, "0")}`;
});

export const wideTable = (
  timeLabels: readonly string[],
  days: readonly { readonly date: string; readonly value: Cell }[]
): RawTable => ({
  columns: ["Date", ...timeLabels],
  rows: days.map(({ date, value }) => [date, ...timeLabels.map(() => value)]),
});

export const expectRight = <R, L>(either: Either.Either<R, L>): R => {
  if (Either.isLeft(either)) {
    throw new Error(`expected success, got ${String(either.left)}`);
  }
  return either.right;
};

export const expectLeft = <R, L>(either: Either.Either<R, L>): L => {
  if (Either.isRight(either)) {
    throw new Error("expected failure, got success");
  }
  return either.left;
};
