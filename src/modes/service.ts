/**
 * Modes Module - Service Layer
 *
 * The mode orchestrator owns the current system mode and the single
 * pending restore. Transitions run one at a time; each either commits
 * or rolls the mode back.
 */
import { type Result, err, ok } from "neverthrow";

import type {
  DeviceCommandDispatcher,
  DeviceMode,
  DispatchError,
} from "../dispatcher/index.js";
import { formatDispatchError } from "../dispatcher/index.js";
import type { EventClient } from "../hub/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { ScheduleCatalog, WeekPlan } from "../schedules/index.js";
import { formatScheduleError, swapDay, weekdayOf } from "../schedules/index.js";
import type { Zone, ZoneDirectory } from "../zones/index.js";
import {
  type ModeError,
  alreadySet,
  applyFailed,
  formatModeError,
  invalidRequest,
  notInTimedMode,
  preconditionFailed,
} from "./errors.js";
import type {
  ModeChangeListener,
  ModeInfo,
  ModeOptions,
  PendingRestore,
  SystemMode,
} from "./schema.js";
import {
  buildModeInfo,
  isTimedMode,
  nextLocalMidnight,
  normalizePersistedMode,
  shouldSkipArm,
  ventilationRestoreTarget,
} from "./transform.js";

const log = createLogger("modes");

export type ModeOrchestratorDeps = Readonly<{
  dispatcher: DeviceCommandDispatcher;
  schedules: ScheduleCatalog;
  zones: Pick<ZoneDirectory, "listEnabledZones">;
  hub: Pick<EventClient, "getEntity">;
  /** Select entity the mode is mirrored into */
  modeEntity: string;
  initialMode: SystemMode;
  defaultVentilationMinutes: number;
}>;

export type ModeOrchestrator = Readonly<{
  setMode(
    mode: SystemMode,
    options?: ModeOptions,
    force?: boolean,
  ): Promise<Result<ModeInfo, ModeError>>;
  cancelTimer(): Promise<Result<ModeInfo, ModeError>>;
  /** One-time startup reconciliation with the hub's mode selector. */
  restoreFromHub(): Promise<Result<ModeInfo, ModeError>>;
  getCurrentMode(): SystemMode;
  getModeInfo(): ModeInfo;
  getPendingRestore(): PendingRestore | null;
  onModeChange(listener: ModeChangeListener): () => void;
  /** Cancel the pending restore (shutdown). */
  shutdown(): void;
}>;

type ArmedRestore = {
  restore: PendingRestore;
  timer: ReturnType<typeof setTimeout> | undefined;
  cancelled: boolean;
};

/** Longest delay setTimeout accepts; longer waits are re-armed in chunks. */
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

type ApplyResult = Result<true, ModeError>;

type TransitionFlags = Readonly<{
  force: boolean;
  persist: boolean;
  /** Cancel the pending restore once the new mode is applied */
  dropRestore?: boolean;
  /** Startup reconciliation: a timer comes back without a restore instant */
  fromHub?: boolean;
}>;

export function createModeOrchestrator(
  deps: ModeOrchestratorDeps,
): ModeOrchestrator {
  const { dispatcher, schedules, zones, hub } = deps;

  let currentMode: SystemMode = deps.initialMode;
  let previousMode: SystemMode | null = null;
  let pending: ArmedRestore | null = null;
  let restored = false;
  let queue: Promise<unknown> = Promise.resolve();
  const listeners = new Set<ModeChangeListener>();

  function getModeInfo(): ModeInfo {
    return buildModeInfo(
      currentMode,
      previousMode,
      pending?.restore ?? null,
      Date.now(),
    );
  }

  /**
   * Serialise transitions: HTTP requests and timer fires never interleave.
   */
  function runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task);
    queue = run.catch(() => undefined);
    return run;
  }

  // ===========================================================================
  // Pending Restore
  // ===========================================================================

  function cancelPending(): void {
    if (!pending) return;
    pending.cancelled = true;
    clearTimeout(pending.timer);
    log.info(
      { reason: pending.restore.reason },
      "Cancelled pending restore",
    );
    pending = null;
  }

  function arm(restore: PendingRestore): void {
    if (shouldSkipArm(pending?.restore ?? null, restore.reason)) {
      log.info(
        { reason: restore.reason },
        "Ventilation restore pending, midnight restore not armed",
      );
      return;
    }

    cancelPending();

    const entry: ArmedRestore = { restore, cancelled: false, timer: undefined };
    pending = entry;
    scheduleFire(entry);

    log.info(
      {
        reason: restore.reason,
        targetMode: restore.targetMode,
        fireAt: new Date(restore.fireAt).toISOString(),
      },
      `Restore to ${restore.targetMode} armed`,
    );
  }

  function scheduleFire(entry: ArmedRestore): void {
    const { restore } = entry;
    const remaining = Math.max(0, restore.fireAt - Date.now());

    entry.timer = setTimeout(
      () => {
        if (entry.cancelled) return;
        if (Date.now() < restore.fireAt) {
          scheduleFire(entry);
          return;
        }
        runExclusive(() => fire(entry)).catch((error) => {
          logOperationFailed(log, "restore", error, { ...restore });
        });
      },
      Math.min(remaining, MAX_TIMEOUT_MS),
    );
  }

  async function fire(entry: ArmedRestore): Promise<void> {
    // Cancelled while queued behind another transition
    if (entry.cancelled) return;
    if (pending === entry) {
      pending = null;
    }

    const { restore } = entry;
    if (currentMode !== restore.armedByMode) {
      log.info(
        { armedBy: restore.armedByMode, current: currentMode },
        "Mode changed since restore was armed, skipping",
      );
      if (currentMode === "stay_home") {
        armMidnightRestore();
      }
      return;
    }

    log.info(
      { reason: restore.reason, targetMode: restore.targetMode },
      "Restore timer fired",
    );
    const result = await transition(
      restore.targetMode,
      {},
      { force: false, persist: true },
    );
    if (result.isErr()) {
      log.error(
        { error: formatModeError(result.error) },
        `Restore to ${restore.targetMode} failed`,
      );
    }
  }

  function armMidnightRestore(): void {
    arm({
      targetMode: "default",
      fireAt: nextLocalMidnight(new Date()).getTime(),
      armedByMode: "stay_home",
      reason: "midnight",
    });
  }

  // ===========================================================================
  // Command Helpers
  // ===========================================================================

  function enabledThermostats(): string[] {
    const ids = new Set<string>();
    for (const zone of zones.listEnabledZones()) {
      for (const id of zone.thermostats) ids.add(id);
    }
    return [...ids];
  }

  /**
   * AND of all results. Every command runs; failures are collected.
   */
  function summarise(
    mode: SystemMode,
    results: readonly Result<true, DispatchError>[],
  ): ApplyResult {
    const failures = results.flatMap((result) =>
      result.isErr() ? [result.error] : [],
    );
    if (failures.length === 0) {
      return ok(true);
    }
    return err(
      applyFailed(
        mode,
        failures.map(formatDispatchError).join("; "),
        failures.length,
      ),
    );
  }

  async function setDeviceModes(
    mode: SystemMode,
    deviceMode: DeviceMode,
  ): Promise<ApplyResult> {
    const results: Result<true, DispatchError>[] = [];
    for (const thermostatId of enabledThermostats()) {
      results.push(await dispatcher.setHvacMode(thermostatId, deviceMode));
    }
    return summarise(mode, results);
  }

  function resolvePlan(
    mode: SystemMode,
    scheduleId: string,
  ): Result<WeekPlan, ModeError> {
    return schedules
      .resolve(scheduleId)
      .mapErr((error) => preconditionFailed(mode, formatScheduleError(error)));
  }

  /**
   * The zone's own schedule when it has a usable one, else `fallback`.
   */
  function zonePlan(zone: Zone, fallback: WeekPlan): WeekPlan {
    if (zone.activeSchedule === null) {
      return fallback;
    }
    const resolved = schedules.resolve(zone.activeSchedule);
    if (resolved.isErr()) {
      log.warn(
        { zoneId: zone.id, error: formatScheduleError(resolved.error) },
        "Zone schedule unusable, using default",
      );
      return fallback;
    }
    return resolved.value;
  }

  async function pushPlans(
    mode: SystemMode,
    planFor: (zone: Zone) => WeekPlan,
  ): Promise<ApplyResult> {
    const results: Result<true, DispatchError>[] = [];
    for (const zone of zones.listEnabledZones()) {
      const schedule = schedules.expand(planFor(zone));
      for (const thermostatId of zone.thermostats) {
        results.push(
          await dispatcher.applyWeeklySchedule(thermostatId, schedule),
        );
      }
    }
    return summarise(mode, results);
  }

  // ===========================================================================
  // Mode Appliers
  // ===========================================================================

  async function applyDefault(): Promise<ApplyResult> {
    const base = resolvePlan("default", "default");
    if (base.isErr()) return err(base.error);
    const defaultPlan = base.value;

    return pushPlans("default", (zone) => zonePlan(zone, defaultPlan));
  }

  async function applyEco(): Promise<ApplyResult> {
    const eco = resolvePlan("eco", "eco");
    if (eco.isErr()) return err(eco.error);
    const ecoPlan = eco.value;

    return pushPlans("eco", () => ecoPlan);
  }

  async function applyStayHome(options: ModeOptions): Promise<ApplyResult> {
    const base = resolvePlan("stay_home", "default");
    if (base.isErr()) return err(base.error);
    const defaultPlan = base.value;

    const today = weekdayOf(new Date());
    const active =
      options.activeZones === undefined ? null : new Set(options.activeZones);
    log.info(
      { today, activeZones: options.activeZones ?? "all" },
      `Swapping ${today} to the weekend pattern`,
    );

    const result = await pushPlans("stay_home", (zone) => {
      const plan = zonePlan(zone, defaultPlan);
      const swap = active === null || active.has(zone.id);
      return swap ? swapDay(plan, today) : plan;
    });

    if (result.isOk()) {
      armMidnightRestore();
    }
    return result;
  }

  async function applyVentilation(
    options: ModeOptions,
    previous: SystemMode,
  ): Promise<ApplyResult> {
    const minutes = options.durationMinutes ?? deps.defaultVentilationMinutes;
    const target = ventilationRestoreTarget(previous, pending?.restore ?? null);

    const result = await setDeviceModes("ventilation", "off");
    if (result.isOk()) {
      arm({
        targetMode: target,
        fireAt: Date.now() + minutes * 60_000,
        armedByMode: "ventilation",
        reason: "ventilation",
      });
    }
    return result;
  }

  async function applyTimer(
    options: ModeOptions,
    fromHub: boolean,
  ): Promise<ApplyResult> {
    const { restoreTime } = options;
    if (restoreTime === undefined) {
      if (!fromHub) {
        return err(invalidRequest("timer mode requires restoreTime"));
      }
      log.warn("Timer restored from hub without a restore time");
      return setDeviceModes("timer", "off");
    }

    const result = await setDeviceModes("timer", "off");
    if (result.isOk()) {
      arm({
        targetMode: "default",
        fireAt: restoreTime.getTime(),
        armedByMode: "timer",
        reason: "timer",
      });
    }
    return result;
  }

  function validate(
    mode: SystemMode,
    options: ModeOptions,
    fromHub: boolean,
  ): ModeError | null {
    if (mode === "timer" && !fromHub) {
      if (options.restoreTime === undefined) {
        return invalidRequest("timer mode requires restoreTime");
      }
      if (options.restoreTime.getTime() <= Date.now()) {
        return invalidRequest("restoreTime must be in the future");
      }
    }
    if (
      options.durationMinutes !== undefined &&
      !(Number.isFinite(options.durationMinutes) && options.durationMinutes > 0)
    ) {
      return invalidRequest("durationMinutes must be a positive number");
    }
    return null;
  }

  function apply(
    mode: SystemMode,
    options: ModeOptions,
    previous: SystemMode,
    fromHub: boolean,
  ): Promise<ApplyResult> {
    switch (mode) {
      case "default":
        return applyDefault();
      case "eco":
        return applyEco();
      case "stay_home":
        return applyStayHome(options);
      case "ventilation":
        return applyVentilation(options, previous);
      case "timer":
        return applyTimer(options, fromHub);
      case "manual":
        return setDeviceModes("manual", "heat");
      case "off":
        return setDeviceModes("off", "off");
    }
  }

  // ===========================================================================
  // Transition
  // ===========================================================================

  async function persistMode(mode: SystemMode): Promise<void> {
    const selector = hub.getEntity(deps.modeEntity);
    if (selector?.kind === "select" && selector.value === mode) {
      log.debug({ mode }, "Mode selector already in sync");
      return;
    }

    const result = await dispatcher.selectOption(deps.modeEntity, mode);
    if (result.isErr()) {
      log.warn(
        { mode, error: formatDispatchError(result.error) },
        "Failed to persist mode to hub",
      );
    }
  }

  function notify(): void {
    const info = getModeInfo();
    for (const listener of listeners) {
      try {
        listener(info);
      } catch (error) {
        log.error({ error }, "Mode change listener failed");
      }
    }
  }

  async function transition(
    mode: SystemMode,
    options: ModeOptions,
    flags: TransitionFlags,
  ): Promise<Result<ModeInfo, ModeError>> {
    const { force, persist } = flags;
    const fromHub = flags.fromHub ?? false;

    if (mode === currentMode && !force) {
      log.info({ mode }, `Mode already ${mode}, skipping`);
      return err(alreadySet(mode));
    }

    const invalid = validate(mode, options, fromHub);
    if (invalid) {
      log.warn({ mode }, formatModeError(invalid));
      return err(invalid);
    }

    const startTime = Date.now();
    const previous = currentMode;
    logOperationStart(log, "setMode", { mode, previous, force });

    currentMode = mode;
    const result = await apply(mode, options, previous, fromHub);

    if (result.isErr()) {
      currentMode = previous;
      logOperationFailed(log, "setMode", formatModeError(result.error), {
        mode,
        rolledBackTo: previous,
      });
      return err(result.error);
    }

    previousMode = previous;
    if (flags.dropRestore) {
      cancelPending();
    }
    if (persist) {
      await persistMode(mode);
    }

    logOperationComplete(log, "setMode", startTime, { mode, previous });
    notify();
    return ok(getModeInfo());
  }

  // ===========================================================================
  // Public Operations
  // ===========================================================================

  return {
    setMode(mode, options = {}, force = false) {
      return runExclusive(() =>
        transition(mode, options, { force, persist: true }),
      );
    },

    cancelTimer() {
      return runExclusive(async () => {
        if (!isTimedMode(currentMode)) {
          const error = notInTimedMode(currentMode);
          log.warn(formatModeError(error));
          return err(error);
        }
        return transition(
          "default",
          {},
          { force: false, persist: true, dropRestore: true },
        );
      });
    },

    restoreFromHub() {
      return runExclusive(async () => {
        if (restored) {
          log.debug("Startup reconciliation already done");
          return ok(getModeInfo());
        }
        restored = true;

        const selector = hub.getEntity(deps.modeEntity);
        const persisted = selector?.kind === "select" ? selector.value : null;
        const mode = normalizePersistedMode(persisted);

        if (mode === null) {
          log.info(
            { persisted, mode: currentMode },
            "No restorable mode on hub, pushing in-memory mode",
          );
          await persistMode(currentMode);
          return ok(getModeInfo());
        }

        if (mode === currentMode) {
          log.info({ mode }, "Hub mode matches in-memory mode");
          return ok(getModeInfo());
        }

        log.info({ mode, persisted }, `Restoring mode ${mode} from hub`);
        // Ventilation gets a fresh run back to the in-memory mode
        const options: ModeOptions =
          mode === "ventilation"
            ? { durationMinutes: deps.defaultVentilationMinutes }
            : {};
        return transition(mode, options, {
          force: false,
          persist: false,
          fromHub: true,
        });
      });
    },

    getCurrentMode: () => currentMode,
    getModeInfo,
    getPendingRestore: () => pending?.restore ?? null,

    onModeChange(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    shutdown() {
      cancelPending();
    },
  };
}
