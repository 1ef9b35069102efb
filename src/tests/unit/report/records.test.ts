import { describe, it, expect } from "@effect/vitest";
import { evaluateCapacity, type CapacityParams } from "../../../capacity/capacity-evaluator.js";
import { optimizeChargerMix } from "../../../charger-mix/charger-mix-optimizer.js";
import { chargerMixRecords, evaluationRecords, ratingColumn, toCsv } from "../../../report/records.js";
import type { HourlyProfile } from "../../../profile/types.js";

const profile: HourlyProfile = Array.from({ length: 24 }, (_, hour) =>
  hour === 0 ? 40 : hour === 1 ? 120 : undefined
);

const params: CapacityParams = {
  capacityKw: 100,
  level2Kw: 10,
  level3Kw: 50,
  allocationStrategy: "auto",
  fixedCount: 0,
  customChargers: [],
};

describe("records", () => {
  it("should lay out auto strategy records", () => {
    const csv = toCsv(evaluationRecords(evaluateCapacity(profile, params)));

    expect(csv).toBe([
      "Hour,Max_Power_kW,Capacity_kW,Excess_Power_kW,Level2_Count,Level3_Count,Exceeds_Capacity",
      "0,40,100,60,6,1,false",
      "1,120,100,-20,0,0,true",
    ].join("\n"));
  });

  it("should name the fixed count column first for fixed strategies", () => {
    const { columns, records } = evaluationRecords(
      evaluateCapacity(profile, { ...params, allocationStrategy: "fixed_l3", fixedCount: 1 })
    );

    expect(columns).toEqual([
      "Hour",
      "Max_Power_kW",
      "Capacity_kW",
      "Excess_Power_kW",
      "Level3_Count (fixed)",
      "Level2_Count",
      "Exceeds_Capacity",
    ]);
    expect(records[0]).toEqual({
      Hour: 0,
      Max_Power_kW: 40,
      Capacity_kW: 100,
      Excess_Power_kW: 60,
      "Level3_Count (fixed)": 1,
      Level2_Count: 1,
      Exceeds_Capacity: false,
    });
  });

  it("should add custom load columns when custom chargers are set", () => {
    const { columns, records } = evaluationRecords(
      evaluateCapacity(profile, { ...params, customChargers: [{ name: "DC", powerKw: 25, quantity: 2 }] })
    );

    expect(columns.slice(-3)).toEqual(["Custom_Load_kW", "Total_Load_kW", "Exceeds_Capacity"]);
    expect(records[1]).toMatchObject({ Custom_Load_kW: 50, Total_Load_kW: 170, Exceeds_Capacity: true });
  });

  it("should lay out charger mix records with one column per rating", () => {
    const rows = optimizeChargerMix([{ hour: 7, excessKw: 320 }], [150, 250]);

    expect(toCsv(chargerMixRecords(rows))).toBe([
      "Hour,250kW_Count,150kW_Count,Used_kW,Remaining_kW",
      "7,1,0,250,70",
    ].join("\n"));
  });

  it("should keep fractional ratings in the column name", () => {
    expect(ratingColumn(7.2)).toBe("7.2kW_Count");
  });
});
