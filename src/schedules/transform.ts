/**
 * Schedules Module - Pure Transformations
 *
 * Week plan expansion, the stay-home day swap and day-type validation.
 * No side effects, no I/O.
 */
import {
  type DayType,
  WEEKDAYS,
  type WeekPlan,
  type WeekSchedule,
  type Weekday,
} from "./schema.js";

// =============================================================================
// Constants
// =============================================================================

/** Day type substituted for the current weekday in stay-home mode */
export const STAY_HOME_DAY_TYPE = "weekend_day";

/** Used in place of unknown day types */
export const FALLBACK_DAY_TYPE = "eco_day";
export const FALLBACK_DAY_SCHEDULE = "00:00/16";

export const BUILT_IN_DAY_TYPES: readonly DayType[] = [
  {
    id: "workday",
    schedule: "00:00/17 06:30/19 07:00/21 09:00/17 16:00/21 23:00/17",
    description: "Work day",
  },
  {
    id: "weekend_day",
    schedule: "00:00/17 07:00/21 12:00/21 18:00/21 22:00/21 23:00/17",
    description: "Day at home",
  },
  {
    id: "eco_day",
    schedule: "00:00/16 06:00/17 08:00/18 16:00/18 20:00/17 23:00/16",
    description: "Away / economy",
  },
];

const PAIRS_PER_DAY = 6;
const PAIR_PATTERN = /^([01]\d|2[0-3]):[0-5]\d\/\d{1,2}(\.\d)?$/;

// =============================================================================
// Weekdays
// =============================================================================

/**
 * Build a per-weekday record from a function.
 */
export function mapWeek<T>(
  fn: (day: Weekday) => T,
): Readonly<Record<Weekday, T>> {
  return {
    monday: fn("monday"),
    tuesday: fn("tuesday"),
    wednesday: fn("wednesday"),
    thursday: fn("thursday"),
    friday: fn("friday"),
    saturday: fn("saturday"),
    sunday: fn("sunday"),
  };
}

/**
 * Local calendar weekday of a date.
 */
export function weekdayOf(date: Date): Weekday {
  // getDay() is Sunday-first
  return WEEKDAYS[(date.getDay() + 6) % 7] ?? "monday";
}

// =============================================================================
// Week Plans
// =============================================================================

/**
 * Copy of `plan` with one day replaced. The input is not modified.
 */
export function swapDay(
  plan: WeekPlan,
  day: Weekday,
  dayTypeId: string = STAY_HOME_DAY_TYPE,
): WeekPlan {
  return { ...plan, [day]: dayTypeId };
}

/**
 * Expand a week plan to wire-format strings.
 *
 * Unknown day types fall back to eco_day (or a flat 16°C day when even
 * that is missing) and are reported in `unknownDayTypes`.
 */
export function expandWeek(
  plan: WeekPlan,
  dayTypes: ReadonlyMap<string, DayType>,
): { schedule: WeekSchedule; unknownDayTypes: string[] } {
  const unknownDayTypes: string[] = [];
  const fallback =
    dayTypes.get(FALLBACK_DAY_TYPE)?.schedule ?? FALLBACK_DAY_SCHEDULE;

  const schedule = mapWeek((day) => {
    const dayType = dayTypes.get(plan[day]);
    if (dayType === undefined) {
      unknownDayTypes.push(plan[day]);
      return fallback;
    }
    return dayType.schedule;
  });

  return { schedule, unknownDayTypes };
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Problems with a day schedule string; empty when valid.
 */
export function validateDaySchedule(schedule: string): string[] {
  const problems: string[] = [];
  const pairs = schedule.trim().split(/\s+/);

  if (pairs.length !== PAIRS_PER_DAY) {
    problems.push(`has ${pairs.length} pairs, expected ${PAIRS_PER_DAY}`);
  }
  if (!schedule.startsWith("00:00/")) {
    problems.push("does not start with 00:00");
  }
  for (const pair of pairs) {
    if (!PAIR_PATTERN.test(pair)) {
      problems.push(`invalid pair '${pair}'`);
    }
  }

  return problems;
}

/**
 * Index day types by id. Later entries win.
 */
export function indexDayTypes(
  dayTypes: readonly DayType[],
): ReadonlyMap<string, DayType> {
  return new Map(dayTypes.map((dayType) => [dayType.id, dayType]));
}
