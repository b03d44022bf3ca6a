import { describe, expect, it } from "vitest";

import type { RawPriceRecord } from "@spotwindow/domain";

import { runSchedulePipeline, scheduleHours } from "../src/schedule/schedule-pipeline";
import { clock, defaultParams, hoursFrom, ZONE } from "./support/hours";

const DAY = "2025-06-10";

describe("scheduleHours", () => {
  it("charges through the cheap morning and sells the expensive hours after it", () => {
    const hours = hoursFrom(DAY, 0, [10, 10, 10, 50, 50]);

    const result = scheduleHours(hours, defaultParams);

    expect(result.day).toBe(DAY);
    expect(result.lines).toEqual(["00:00-03:00/1234567/+", "03:00-05:00/1234567/-"]);
    expect(result.assignments).toHaveLength(1);
    expect(clock(result.assignments[0]?.discharge ?? [])).toEqual(["03:00", "04:00"]);
  });

  it("schedules nothing on a flat price curve", () => {
    const result = scheduleHours(hoursFrom(DAY, 0, [20, 20, 20, 20]), defaultParams);

    expect(result.assignments).toEqual([]);
    expect(result.lines).toEqual([]);
  });

  it("can discharge more hours under a stricter margin", () => {
    const hours = hoursFrom(DAY, 0, [77, 50, 91, 38, 58, 88, 46, 33, 74, 89, 87]);
    const params = {maxChargeHours: 1, capacityRatio: 1, chargeWindows: null};
    const dischargeClock = (requiredMargin: number): string[] =>
      scheduleHours(hours, {...params, requiredMargin}).assignments.flatMap((entry) => clock(entry.discharge));

    // At 25 the 03:00 block no longer qualifies 04:00, so its best run moves from the taken 08:00 to 05:00.
    expect(dischargeClock(20)).toEqual(["08:00", "02:00", "09:00"]);
    expect(dischargeClock(25)).toEqual(["08:00", "05:00", "02:00", "09:00"]);
  });

  it("never pairs hours across midnight", () => {
    const result = scheduleHours(hoursFrom(DAY, 21, [50, 10, 10, 100, 100]), defaultParams);

    expect(result.lines).toEqual([]);
  });

  it("gives the same answer on repeated runs", () => {
    const hours = hoursFrom(DAY, 0, [30, 12, 14, 60, 70, 20, 18, 90, 95, 40]);

    expect(scheduleHours(hours, defaultParams).lines).toEqual(scheduleHours(hours, defaultParams).lines);
  });

  it("uses one assignment per profitable valley", () => {
    const hours = hoursFrom(DAY, 0, [10, 70, 10, 60]);

    const result = scheduleHours(hours, {...defaultParams, maxChargeHours: 1});

    expect(result.lines).toEqual([
      "00:00-01:00/1234567/+",
      "01:00-02:00/1234567/-",
      "02:00-03:00/1234567/+",
      "03:00-04:00/1234567/-",
    ]);
  });
});

describe("runSchedulePipeline", () => {
  it("turns raw spot prices into schedule lines", () => {
    const spot = [0, 0, 0, 0.4, 0.4];
    const records: RawPriceRecord[] = spot.map((spotPrice, index) => ({
      time_start: new Date(Date.UTC(2025, 5, 9, 22 + index)).toISOString(),
      spot_price: spotPrice,
    }));

    const result = runSchedulePipeline(
      records,
      {supplierFee: 8.6, vatMultiplier: 1.25, timeZone: ZONE},
      defaultParams,
      DAY,
    );

    expect(result.hours.map((hour) => hour.cost)).toEqual([
      expect.closeTo(8.6, 9),
      expect.closeTo(8.6, 9),
      expect.closeTo(8.6, 9),
      expect.closeTo(58.6, 9),
      expect.closeTo(58.6, 9),
    ]);
    expect(result.lines).toEqual(["00:00-03:00/1234567/+", "03:00-05:00/1234567/-"]);
  });
});
