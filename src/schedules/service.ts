/**
 * Schedules Module - Service Layer
 *
 * File-backed schedule catalog: loads day types and schedules from the
 * config directory, resolves schedule ids to week plans and expands them.
 */
import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  type ScheduleError,
  formatScheduleError,
  loadFailed,
  scheduleDisabled,
  scheduleNotFound,
} from "./errors.js";
import {
  type DayType,
  DayTypesFileSchema,
  type Schedule,
  ScheduleSchema,
  type WeekPlan,
  type WeekSchedule,
} from "./schema.js";
import {
  BUILT_IN_DAY_TYPES,
  expandWeek,
  indexDayTypes,
  validateDaySchedule,
} from "./transform.js";

const log = createLogger("schedules");

export type ScheduleCatalog = Readonly<{
  /** Week plan of an enabled schedule. */
  resolve(scheduleId: string): Result<WeekPlan, ScheduleError>;
  /** Expand a plan; unknown day types fall back and are logged. */
  expand(plan: WeekPlan): WeekSchedule;
  getSchedule(scheduleId: string): Schedule | undefined;
  listSchedules(): readonly Schedule[];
  listDayTypes(): readonly DayType[];
}>;

// =============================================================================
// Catalog
// =============================================================================

export function createScheduleCatalog(
  schedules: readonly Schedule[],
  dayTypes: readonly DayType[],
): ScheduleCatalog {
  const byId = new Map(schedules.map((schedule) => [schedule.id, schedule]));
  const dayTypeIndex = indexDayTypes(dayTypes);

  return {
    resolve(scheduleId) {
      const schedule = byId.get(scheduleId);
      if (!schedule) {
        return err(scheduleNotFound(scheduleId));
      }
      if (!schedule.enabled) {
        return err(scheduleDisabled(scheduleId));
      }
      return ok(schedule.week);
    },

    expand(plan) {
      const { schedule, unknownDayTypes } = expandWeek(plan, dayTypeIndex);
      for (const dayTypeId of unknownDayTypes) {
        log.error(
          { dayTypeId, available: [...dayTypeIndex.keys()] },
          `Day type '${dayTypeId}' not found, using fallback`,
        );
      }
      return schedule;
    },

    getSchedule: (scheduleId) => byId.get(scheduleId),
    listSchedules: () => [...byId.values()],
    listDayTypes: () => [...dayTypeIndex.values()],
  };
}

// =============================================================================
// Loading
// =============================================================================

async function readJson(path: string): Promise<Result<unknown, ScheduleError>> {
  try {
    const text = await readFile(path, "utf8");
    const data: unknown = JSON.parse(text);
    return ok(data);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(loadFailed(path, cause.message, cause));
  }
}

/**
 * Load day types. Falls back to the built-in set when the file is
 * missing or malformed.
 */
export async function loadDayTypes(path: string): Promise<readonly DayType[]> {
  const raw = await readJson(path);
  if (raw.isErr()) {
    log.warn(
      { error: formatScheduleError(raw.error) },
      "Using built-in day types",
    );
    return BUILT_IN_DAY_TYPES;
  }

  const parsed = DayTypesFileSchema.safeParse(raw.value);
  if (!parsed.success) {
    log.error(
      { path, issues: parsed.error.issues.length },
      "Invalid day types file, using built-in day types",
    );
    return BUILT_IN_DAY_TYPES;
  }

  for (const dayType of parsed.data) {
    const problems = validateDaySchedule(dayType.schedule);
    if (problems.length > 0) {
      log.warn({ dayTypeId: dayType.id, problems }, "Suspicious day type");
    }
  }

  log.info(
    { dayTypes: parsed.data.map((dayType) => dayType.id) },
    `Loaded ${parsed.data.length} day types`,
  );
  return parsed.data;
}

/**
 * Load every *.json under the schedules directory. Invalid files are
 * logged and skipped.
 */
export async function loadSchedules(dir: string): Promise<Schedule[]> {
  let files: string[];
  try {
    files = (await readdir(dir)).filter((name) => name.endsWith(".json"));
  } catch (error) {
    log.warn(
      { dir, error: error instanceof Error ? error.message : String(error) },
      "Schedules directory not readable",
    );
    return [];
  }

  const schedules: Schedule[] = [];
  for (const file of files.sort()) {
    const path = join(dir, file);
    const raw = await readJson(path);
    if (raw.isErr()) {
      log.error({ error: formatScheduleError(raw.error) }, "Skipping schedule");
      continue;
    }

    const parsed = ScheduleSchema.safeParse(raw.value);
    if (!parsed.success) {
      log.error(
        { path, issues: parsed.error.issues.map((issue) => issue.message) },
        "Invalid schedule file, skipping",
      );
      continue;
    }
    schedules.push(parsed.data);
  }

  log.info(
    { schedules: schedules.map((schedule) => schedule.id) },
    `Loaded ${schedules.length} schedules`,
  );
  return schedules;
}

/**
 * Build the catalog from `<configDir>/day_types.json` and
 * `<configDir>/schedules/*.json`.
 */
export async function loadScheduleCatalog(
  configDir: string,
): Promise<ScheduleCatalog> {
  const [dayTypes, schedules] = await Promise.all([
    loadDayTypes(join(configDir, "day_types.json")),
    loadSchedules(join(configDir, "schedules")),
  ]);
  return createScheduleCatalog(schedules, dayTypes);
}
