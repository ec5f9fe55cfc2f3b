/**
 * Schedules Transform Unit Tests
 */
import { describe, expect, test } from "vitest";

import type { WeekPlan } from "../schema.js";
import {
  BUILT_IN_DAY_TYPES,
  expandWeek,
  indexDayTypes,
  swapDay,
  validateDaySchedule,
  weekdayOf,
} from "../transform.js";

const WORKDAY = "00:00/17 06:30/19 07:00/21 09:00/17 16:00/21 23:00/17";
const WEEKEND = "00:00/17 07:00/21 12:00/21 18:00/21 22:00/21 23:00/17";
const ECO = "00:00/16 06:00/17 08:00/18 16:00/18 20:00/17 23:00/16";

const DEFAULT_PLAN: WeekPlan = {
  monday: "workday",
  tuesday: "workday",
  wednesday: "workday",
  thursday: "workday",
  friday: "workday",
  saturday: "weekend_day",
  sunday: "weekend_day",
};

describe("Schedules Transform", () => {
  // ===========================================================================
  // weekdayOf
  // ===========================================================================

  describe("weekdayOf", () => {
    test("maps local dates to weekday names", () => {
      expect(weekdayOf(new Date(2026, 0, 5))).toBe("monday");
      expect(weekdayOf(new Date(2026, 0, 6))).toBe("tuesday");
      expect(weekdayOf(new Date(2026, 0, 11))).toBe("sunday");
    });
  });

  // ===========================================================================
  // swapDay
  // ===========================================================================

  describe("swapDay", () => {
    test("replaces one day with the weekend pattern", () => {
      const swapped = swapDay(DEFAULT_PLAN, "tuesday");

      expect(swapped.tuesday).toBe("weekend_day");
      expect(swapped.monday).toBe("workday");
      expect(swapped.wednesday).toBe("workday");
    });

    test("does not modify the input plan", () => {
      swapDay(DEFAULT_PLAN, "tuesday");

      expect(DEFAULT_PLAN.tuesday).toBe("workday");
    });

    test("accepts another day type", () => {
      expect(swapDay(DEFAULT_PLAN, "friday", "eco_day").friday).toBe("eco_day");
    });
  });

  // ===========================================================================
  // expandWeek
  // ===========================================================================

  describe("expandWeek", () => {
    const dayTypes = indexDayTypes(BUILT_IN_DAY_TYPES);

    test("expands every weekday", () => {
      const { schedule, unknownDayTypes } = expandWeek(DEFAULT_PLAN, dayTypes);

      expect(schedule).toEqual({
        monday: WORKDAY,
        tuesday: WORKDAY,
        wednesday: WORKDAY,
        thursday: WORKDAY,
        friday: WORKDAY,
        saturday: WEEKEND,
        sunday: WEEKEND,
      });
      expect(unknownDayTypes).toEqual([]);
    });

    test("falls back to eco_day for unknown day types", () => {
      const { schedule, unknownDayTypes } = expandWeek(
        { ...DEFAULT_PLAN, wednesday: "holiday_special" },
        dayTypes,
      );

      expect(schedule.wednesday).toBe(ECO);
      expect(unknownDayTypes).toEqual(["holiday_special"]);
    });

    test("falls back to a flat day when eco_day is missing", () => {
      const { schedule } = expandWeek(
        { ...DEFAULT_PLAN, monday: "missing" },
        indexDayTypes([]),
      );

      expect(schedule.monday).toBe("00:00/16");
    });
  });

  // ===========================================================================
  // validateDaySchedule
  // ===========================================================================

  describe("validateDaySchedule", () => {
    test("accepts six pairs starting at midnight", () => {
      expect(validateDaySchedule(WORKDAY)).toEqual([]);
    });

    test("reports wrong pair counts and start times", () => {
      expect(validateDaySchedule("06:00/20 22:00/16")).toEqual([
        "has 2 pairs, expected 6",
        "does not start with 00:00",
      ]);
    });

    test("reports malformed pairs", () => {
      expect(
        validateDaySchedule("00:00/17 25:00/19 07:00/21 09:00/17 16:00/21 x"),
      ).toEqual(["invalid pair '25:00/19'", "invalid pair 'x'"]);
    });
  });
});
