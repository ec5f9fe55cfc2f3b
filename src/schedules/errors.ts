/**
 * Schedules Module - Error Types
 *
 * Typed error union for schedule resolution and loading.
 */

export type ScheduleError =
  | { readonly type: "SCHEDULE_NOT_FOUND"; readonly scheduleId: string }
  | { readonly type: "SCHEDULE_DISABLED"; readonly scheduleId: string }
  | { readonly type: "DAY_TYPE_NOT_FOUND"; readonly dayTypeId: string }
  | {
      readonly type: "LOAD_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    };

export function scheduleNotFound(scheduleId: string): ScheduleError {
  return { type: "SCHEDULE_NOT_FOUND", scheduleId };
}

export function scheduleDisabled(scheduleId: string): ScheduleError {
  return { type: "SCHEDULE_DISABLED", scheduleId };
}

export function dayTypeNotFound(dayTypeId: string): ScheduleError {
  return { type: "DAY_TYPE_NOT_FOUND", dayTypeId };
}

export function loadFailed(
  path: string,
  message: string,
  cause?: Error,
): ScheduleError {
  if (cause) {
    return { type: "LOAD_FAILED", path, message, cause };
  }
  return { type: "LOAD_FAILED", path, message };
}

/**
 * Format a ScheduleError for logging.
 */
export function formatScheduleError(error: ScheduleError): string {
  switch (error.type) {
    case "SCHEDULE_NOT_FOUND":
      return `Schedule '${error.scheduleId}' not found`;
    case "SCHEDULE_DISABLED":
      return `Schedule '${error.scheduleId}' is disabled`;
    case "DAY_TYPE_NOT_FOUND":
      return `Day type '${error.dayTypeId}' not found`;
    case "LOAD_FAILED":
      return `Failed to load ${error.path}: ${error.message}`;
  }
}
