import Papa from "papaparse";
import type { AllocationStrategy } from "../analysis-config.js";
import type { CapacityEvaluation } from "../capacity/types.js";
import type { ChargerMixRow } from "../charger-mix/types.js";

export type RecordValue = string | number | boolean;

export type RecordSet = {
  readonly columns: readonly string[];
  readonly records: readonly Readonly<Record<string, RecordValue>>[];
};

const strategyColumns: Record<AllocationStrategy, readonly [string, "level2Count" | "level3Count"][]> = {
  auto: [["Level2_Count", "level2Count"], ["Level3_Count", "level3Count"]],
  fixed_l3: [["Level3_Count (fixed)", "level3Count"], ["Level2_Count", "level2Count"]],
  fixed_l2: [["Level2_Count (fixed)", "level2Count"], ["Level3_Count", "level3Count"]],
};

export const evaluationRecords = (evaluation: CapacityEvaluation): RecordSet => {
  const countColumns = strategyColumns[evaluation.strategy];
  const customColumns = evaluation.customLoadActive ? ["Custom_Load_kW", "Total_Load_kW"] : [];

  const columns = [
    "Hour",
    "Max_Power_kW",
    "Capacity_kW",
    "Excess_Power_kW",
    ...countColumns.map(([column]) => column),
    ...customColumns,
    "Exceeds_Capacity",
  ];

  const records = evaluation.rows.map((row) => {
    const record: Record<string, RecordValue> = {
      Hour: row.hour,
      Max_Power_kW: row.maxPowerKw,
      Capacity_kW: row.capacityKw,
      Excess_Power_kW: row.excessKw,
    };

    for (const [column, field] of countColumns) {
      record[column] = row[field];
    }

    if (evaluation.customLoadActive) {
      record["Custom_Load_kW"] = row.customLoadKw;
      record["Total_Load_kW"] = row.totalLoadKw;
    }

    record["Exceeds_Capacity"] = row.exceedsCapacity;

    return record;
  });

  return { columns, records };
};

export const ratingColumn = (ratingKw: number): string => `${ratingKw}kW_Count`;

export const chargerMixRecords = (rows: readonly ChargerMixRow[]): RecordSet => {
  const ratings = rows[0]?.counts.map(({ ratingKw }) => ratingKw) ?? [];

  const columns = ["Hour", ...ratings.map(ratingColumn), "Used_kW", "Remaining_kW"];

  const records = rows.map((row) => {
    const record: Record<string, RecordValue> = { Hour: row.hour };

    for (const { ratingKw, count } of row.counts) {
      record[ratingColumn(ratingKw)] = count;
    }

    record["Used_kW"] = row.usedKw;
    record["Remaining_kW"] = row.remainingKw;

    return record;
  });

  return { columns, records };
};

export const toCsv = ({ columns, records }: RecordSet): string =>
  Papa.unparse(
    {
      fields: [...columns],
      data: records.map((record) => columns.map((column) => record[column] ?? "")),
    },
    { newline: "\n" }
  );
