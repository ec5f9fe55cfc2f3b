/**
 * Schedules Module - Public API
 */

// Types
export type {
  DayType,
  Schedule,
  WeekPlan,
  WeekSchedule,
  Weekday,
} from "./schema.js";
export type { ScheduleError } from "./errors.js";
export type { ScheduleCatalog } from "./service.js";

// Constants
export { WEEKDAYS } from "./schema.js";

// Error utilities
export { formatScheduleError } from "./errors.js";

// Service functions
export {
  createScheduleCatalog,
  loadDayTypes,
  loadScheduleCatalog,
  loadSchedules,
} from "./service.js";

// Pure transformations
export {
  BUILT_IN_DAY_TYPES,
  STAY_HOME_DAY_TYPE,
  expandWeek,
  swapDay,
  validateDaySchedule,
  weekdayOf,
} from "./transform.js";
