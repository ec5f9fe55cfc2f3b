/**
 * Mode Orchestrator Tests
 *
 * Real schedule catalog and zone directory; the dispatcher is a fake that
 * records every command. Clock: Tuesday 2026-01-06 10:00 local time.
 */
import { type Result, err, ok } from "neverthrow";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import {
  type DispatchError,
  retriesExhausted,
  sendFailed,
} from "../../dispatcher/errors.js";
import type { DeviceCommandDispatcher } from "../../dispatcher/index.js";
import type { EntityState } from "../../hub/index.js";
import {
  BUILT_IN_DAY_TYPES,
  type Schedule,
  type WeekSchedule,
  createScheduleCatalog,
} from "../../schedules/index.js";
import { createZoneDirectory } from "../../zones/index.js";
import { type ModeOrchestrator, createModeOrchestrator } from "../service.js";

const WORKDAY = "00:00/17 06:30/19 07:00/21 09:00/17 16:00/21 23:00/17";
const WEEKEND = "00:00/17 07:00/21 12:00/21 18:00/21 22:00/21 23:00/17";
const ECO = "00:00/16 06:00/17 08:00/18 16:00/18 20:00/17 23:00/16";

const MODE_ENTITY = "input_select.heating_mode";

const DEFAULT_SCHEDULE: Schedule = {
  id: "default",
  name: "Default",
  enabled: true,
  week: {
    monday: "workday",
    tuesday: "workday",
    wednesday: "workday",
    thursday: "workday",
    friday: "workday",
    saturday: "weekend_day",
    sunday: "weekend_day",
  },
};

const ECO_SCHEDULE: Schedule = {
  id: "eco",
  name: "Eco",
  enabled: true,
  week: {
    monday: "eco_day",
    tuesday: "eco_day",
    wednesday: "eco_day",
    thursday: "eco_day",
    friday: "eco_day",
    saturday: "eco_day",
    sunday: "eco_day",
  },
};

const ZONES = createZoneDirectory([
  {
    id: "z1",
    name: "Living",
    thermostats: ["climate.living_room"],
    temperatureSensors: [],
    humiditySensors: [],
    activeSchedule: null,
    enabled: true,
  },
  {
    id: "z2",
    name: "Bedroom",
    thermostats: ["climate.bedroom"],
    temperatureSensors: [],
    humiditySensors: [],
    activeSchedule: null,
    enabled: true,
  },
  {
    id: "z3",
    name: "Attic",
    thermostats: ["climate.attic"],
    temperatureSensors: [],
    humiditySensors: [],
    activeSchedule: null,
    enabled: false,
  },
]);

type Command =
  | { op: "hvac"; target: string; mode: string }
  | { op: "schedule"; target: string; schedule: WeekSchedule }
  | { op: "select"; target: string; option: string };

/** Drain pending promise callbacks (setImmediate stays real). */
const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const MINUTE = 60_000;
const DAY = 24 * 60 * MINUTE;

describe("Mode Orchestrator", () => {
  let commands: Command[];
  let failingThermostats: Set<string>;
  let selectFails: boolean;
  let selectorValue: string | null | undefined;
  let orchestrator: ModeOrchestrator;

  function done(): Result<true, DispatchError> {
    return ok(true);
  }

  const dispatcher: DeviceCommandDispatcher = {
    async setHvacMode(thermostatId, mode) {
      commands.push({ op: "hvac", target: thermostatId, mode });
      return failingThermostats.has(thermostatId)
        ? err(sendFailed("climate", "set_hvac_mode", thermostatId))
        : done();
    },
    async setTargetTemperature() {
      return done();
    },
    async selectOption(entityId, option) {
      commands.push({ op: "select", target: entityId, option });
      return selectFails
        ? err(sendFailed("input_select", "select_option", entityId))
        : done();
    },
    async publishWeeklySchedule() {
      return done();
    },
    async applyWeeklySchedule(thermostatId, schedule) {
      commands.push({ op: "schedule", target: thermostatId, schedule });
      return failingThermostats.has(thermostatId)
        ? err(retriesExhausted(thermostatId, 3))
        : done();
    },
  };

  const hub = {
    getEntity(entityId: string): EntityState | undefined {
      if (entityId !== MODE_ENTITY || selectorValue === undefined) {
        return undefined;
      }
      return {
        entityId,
        friendlyName: null,
        available: true,
        lastUpdated: 0,
        kind: "select",
        value: selectorValue,
        options: [],
      };
    },
  };

  function create(schedules: readonly Schedule[] = [DEFAULT_SCHEDULE, ECO_SCHEDULE]) {
    return createModeOrchestrator({
      dispatcher,
      schedules: createScheduleCatalog(schedules, BUILT_IN_DAY_TYPES),
      zones: ZONES,
      hub,
      modeEntity: MODE_ENTITY,
      initialMode: "manual",
      defaultVentilationMinutes: 5,
    });
  }

  function scheduleFor(target: string): WeekSchedule | undefined {
    const pushes = commands.filter(
      (command): command is Extract<Command, { op: "schedule" }> =>
        command.op === "schedule" && command.target === target,
    );
    return pushes[pushes.length - 1]?.schedule;
  }

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
    vi.setSystemTime(new Date(2026, 0, 6, 10, 0, 0));
    commands = [];
    failingThermostats = new Set();
    selectFails = false;
    selectorValue = undefined;
    orchestrator = create();
  });

  afterEach(() => {
    orchestrator.shutdown();
    vi.useRealTimers();
  });

  // ===========================================================================
  // setMode basics
  // ===========================================================================

  describe("setMode", () => {
    test("default pushes the schedule to every enabled thermostat and persists", async () => {
      const result = await orchestrator.setMode("default");

      expect(result._unsafeUnwrap()).toMatchObject({
        current: "default",
        previous: "manual",
        pendingRestore: null,
      });
      expect(commands.map((c) => `${c.op}:${c.target}`)).toEqual([
        "schedule:climate.living_room",
        "schedule:climate.bedroom",
        `select:${MODE_ENTITY}`,
      ]);
      expect(scheduleFor("climate.bedroom")?.monday).toBe(WORKDAY);
    });

    test("fails with ALREADY_SET and sends nothing when the mode is current", async () => {
      const result = await orchestrator.setMode("manual");

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "ALREADY_SET",
        mode: "manual",
      });
      expect(commands).toEqual([]);
    });

    test("force re-applies the current mode", async () => {
      const result = await orchestrator.setMode("manual", {}, true);

      expect(result.isOk()).toBe(true);
      expect(commands.filter((c) => c.op === "hvac")).toEqual([
        { op: "hvac", target: "climate.living_room", mode: "heat" },
        { op: "hvac", target: "climate.bedroom", mode: "heat" },
      ]);
    });

    test("off turns every enabled thermostat off", async () => {
      await orchestrator.setMode("off");

      expect(commands).toEqual([
        { op: "hvac", target: "climate.living_room", mode: "off" },
        { op: "hvac", target: "climate.bedroom", mode: "off" },
        { op: "select", target: MODE_ENTITY, option: "off" },
      ]);
    });

    test("rolls back and keeps going past a failing thermostat", async () => {
      failingThermostats.add("climate.living_room");

      const result = await orchestrator.setMode("default");

      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe("APPLY_FAILED");
      expect(error.type === "APPLY_FAILED" && error.failures).toBe(1);
      expect(orchestrator.getCurrentMode()).toBe("manual");
      expect(commands.map((c) => `${c.op}:${c.target}`)).toEqual([
        "schedule:climate.living_room",
        "schedule:climate.bedroom",
      ]);
    });

    test("eco fails its precondition without sending when no eco schedule exists", async () => {
      orchestrator = create([DEFAULT_SCHEDULE]);

      const result = await orchestrator.setMode("eco");

      expect(result._unsafeUnwrapErr().type).toBe("PRECONDITION_FAILED");
      expect(orchestrator.getCurrentMode()).toBe("manual");
      expect(commands).toEqual([]);
    });

    test("eco pushes the eco schedule", async () => {
      await orchestrator.setMode("eco");

      expect(scheduleFor("climate.living_room")?.tuesday).toBe(ECO);
    });

    test("persisting is skipped when the selector already shows the mode", async () => {
      selectorValue = "off";

      await orchestrator.setMode("off");

      expect(commands.some((c) => c.op === "select")).toBe(false);
    });

    test("a persist failure does not roll back the mode", async () => {
      selectFails = true;

      const result = await orchestrator.setMode("off");

      expect(result.isOk()).toBe(true);
      expect(orchestrator.getCurrentMode()).toBe("off");
    });

    test("overlapping calls run one after the other", async () => {
      const [first, second] = await Promise.all([
        orchestrator.setMode("off"),
        orchestrator.setMode("off"),
      ]);

      expect(first.isOk()).toBe(true);
      expect(second._unsafeUnwrapErr().type).toBe("ALREADY_SET");
      expect(commands.filter((c) => c.op === "hvac")).toHaveLength(2);
    });

    test("notifies mode change listeners after commit", async () => {
      const listener = vi.fn();
      orchestrator.onModeChange(listener);

      await orchestrator.setMode("off");

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0]?.[0]).toMatchObject({
        current: "off",
        previous: "manual",
      });
    });
  });

  // ===========================================================================
  // stay_home
  // ===========================================================================

  describe("stay_home", () => {
    test("swaps today to the weekend pattern in every zone", async () => {
      await orchestrator.setMode("stay_home");

      for (const thermostat of ["climate.living_room", "climate.bedroom"]) {
        const schedule = scheduleFor(thermostat);
        expect(schedule?.tuesday).toBe(WEEKEND);
        expect(schedule?.monday).toBe(WORKDAY);
        expect(schedule?.wednesday).toBe(WORKDAY);
      }
    });

    test("only active zones get the swapped day", async () => {
      await orchestrator.setMode("stay_home", { activeZones: ["z1"] });

      expect(scheduleFor("climate.living_room")?.tuesday).toBe(WEEKEND);
      expect(scheduleFor("climate.bedroom")?.tuesday).toBe(WORKDAY);
    });

    test("arms a restore to default at the next local midnight", async () => {
      await orchestrator.setMode("stay_home");

      expect(orchestrator.getPendingRestore()).toEqual({
        targetMode: "default",
        fireAt: new Date(2026, 0, 7).getTime(),
        armedByMode: "stay_home",
        reason: "midnight",
      });
      expect(orchestrator.getModeInfo().pendingRestore?.remainingSeconds).toBe(
        14 * 3600,
      );
    });

    test("returns to default at midnight", async () => {
      await orchestrator.setMode("stay_home");

      await vi.advanceTimersByTimeAsync(14 * 60 * MINUTE);
      await flush();

      expect(orchestrator.getCurrentMode()).toBe("default");
      expect(orchestrator.getPendingRestore()).toBeNull();
    });
  });

  // ===========================================================================
  // ventilation
  // ===========================================================================

  describe("ventilation", () => {
    test("entered from eco returns to eco after 5 minutes", async () => {
      await orchestrator.setMode("eco");
      await orchestrator.setMode("ventilation", { durationMinutes: 5 });

      expect(orchestrator.getCurrentMode()).toBe("ventilation");
      expect(orchestrator.getPendingRestore()?.targetMode).toBe("eco");

      await vi.advanceTimersByTimeAsync(5 * MINUTE - 1);
      expect(orchestrator.getCurrentMode()).toBe("ventilation");

      await vi.advanceTimersByTimeAsync(1);
      await flush();

      expect(orchestrator.getCurrentMode()).toBe("eco");
    });

    test("turns enabled thermostats off and uses the default duration", async () => {
      await orchestrator.setMode("ventilation");

      expect(commands.filter((c) => c.op === "hvac")).toEqual([
        { op: "hvac", target: "climate.living_room", mode: "off" },
        { op: "hvac", target: "climate.bedroom", mode: "off" },
      ]);
      expect(orchestrator.getPendingRestore()?.fireAt).toBe(
        Date.now() + 5 * MINUTE,
      );
    });

    test("a failed ventilation arms nothing and rolls back", async () => {
      failingThermostats.add("climate.bedroom");

      const result = await orchestrator.setMode("ventilation");

      expect(result._unsafeUnwrapErr().type).toBe("APPLY_FAILED");
      expect(orchestrator.getCurrentMode()).toBe("manual");
      expect(orchestrator.getPendingRestore()).toBeNull();
    });

    test("the restore is a no-op when the mode changed meanwhile", async () => {
      await orchestrator.setMode("ventilation");
      await orchestrator.setMode("off");

      await vi.advanceTimersByTimeAsync(5 * MINUTE);
      await flush();

      expect(orchestrator.getCurrentMode()).toBe("off");
    });

    test("a pending ventilation restore blocks the midnight arm", async () => {
      await orchestrator.setMode("ventilation");
      await orchestrator.setMode("stay_home");

      expect(orchestrator.getPendingRestore()?.reason).toBe("ventilation");

      await vi.advanceTimersByTimeAsync(5 * MINUTE);
      await flush();

      expect(orchestrator.getCurrentMode()).toBe("stay_home");
      expect(orchestrator.getPendingRestore()?.reason).toBe("midnight");
    });

    test("interrupting stay_home restores it and re-arms midnight", async () => {
      await orchestrator.setMode("stay_home");
      await orchestrator.setMode("ventilation");

      expect(orchestrator.getPendingRestore()).toMatchObject({
        reason: "ventilation",
        targetMode: "stay_home",
      });

      await vi.advanceTimersByTimeAsync(5 * MINUTE);
      await flush();

      expect(orchestrator.getCurrentMode()).toBe("stay_home");
      expect(orchestrator.getPendingRestore()).toMatchObject({
        reason: "midnight",
        targetMode: "default",
      });
    });
  });

  // ===========================================================================
  // timer
  // ===========================================================================

  describe("timer", () => {
    test("requires a restore time", async () => {
      const result = await orchestrator.setMode("timer");

      expect(result._unsafeUnwrapErr().type).toBe("INVALID_REQUEST");
      expect(commands).toEqual([]);
    });

    test("rejects a restore time in the past", async () => {
      const result = await orchestrator.setMode("timer", {
        restoreTime: new Date(Date.now() - MINUTE),
      });

      expect(result._unsafeUnwrapErr().type).toBe("INVALID_REQUEST");
    });

    test("restores default at the given instant", async () => {
      await orchestrator.setMode("timer", {
        restoreTime: new Date(Date.now() + 60 * MINUTE),
      });

      expect(orchestrator.getModeInfo().pendingRestore).toMatchObject({
        reason: "timer",
        remainingSeconds: 3600,
      });

      await vi.advanceTimersByTimeAsync(60 * MINUTE);
      await flush();

      expect(orchestrator.getCurrentMode()).toBe("default");
    });

    test("a restore weeks away waits the full time", async () => {
      await orchestrator.setMode("timer", {
        restoreTime: new Date(Date.now() + 30 * DAY),
      });

      await vi.advanceTimersByTimeAsync(MINUTE);
      await flush();
      expect(orchestrator.getCurrentMode()).toBe("timer");

      await vi.advanceTimersByTimeAsync(25 * DAY);
      await flush();
      expect(orchestrator.getCurrentMode()).toBe("timer");
      expect(orchestrator.getModeInfo().pendingRestore).toMatchObject({
        reason: "timer",
        remainingSeconds: (5 * DAY - MINUTE) / 1000,
      });

      await vi.advanceTimersByTimeAsync(5 * DAY - MINUTE - 1);
      await flush();
      expect(orchestrator.getCurrentMode()).toBe("timer");

      await vi.advanceTimersByTimeAsync(1);
      await flush();
      expect(orchestrator.getCurrentMode()).toBe("default");
    });

    test("only one restore is ever pending", async () => {
      await orchestrator.setMode("timer", {
        restoreTime: new Date(Date.now() + 60 * MINUTE),
      });
      await orchestrator.setMode("ventilation", { durationMinutes: 10 });

      expect(orchestrator.getPendingRestore()).toMatchObject({
        reason: "ventilation",
        targetMode: "default",
      });

      await vi.advanceTimersByTimeAsync(10 * MINUTE);
      await flush();
      expect(orchestrator.getCurrentMode()).toBe("default");

      await orchestrator.setMode("off");
      await vi.advanceTimersByTimeAsync(60 * MINUTE);
      await flush();
      expect(orchestrator.getCurrentMode()).toBe("off");
    });
  });

  // ===========================================================================
  // cancelTimer
  // ===========================================================================

  describe("cancelTimer", () => {
    test("fails outside a timed mode", async () => {
      const result = await orchestrator.cancelTimer();

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "NOT_IN_TIMED_MODE",
        current: "manual",
      });
    });

    test("cancels the pending restore and switches to default", async () => {
      await orchestrator.setMode("timer", {
        restoreTime: new Date(Date.now() + 60 * MINUTE),
      });

      const result = await orchestrator.cancelTimer();

      expect(result._unsafeUnwrap().current).toBe("default");
      expect(result._unsafeUnwrap().pendingRestore).toBeNull();
      expect(orchestrator.getPendingRestore()).toBeNull();
    });

    test("keeps the timer and its restore when default cannot be applied", async () => {
      await orchestrator.setMode("timer", {
        restoreTime: new Date(Date.now() + 60 * MINUTE),
      });
      failingThermostats.add("climate.bedroom");

      const result = await orchestrator.cancelTimer();

      expect(result._unsafeUnwrapErr().type).toBe("APPLY_FAILED");
      expect(orchestrator.getCurrentMode()).toBe("timer");
      expect(orchestrator.getPendingRestore()).toMatchObject({
        reason: "timer",
        targetMode: "default",
      });

      failingThermostats.clear();
      await vi.advanceTimersByTimeAsync(60 * MINUTE);
      await flush();

      expect(orchestrator.getCurrentMode()).toBe("default");
    });
  });

  // ===========================================================================
  // restoreFromHub
  // ===========================================================================

  describe("restoreFromHub", () => {
    test("applies a recognised mode without writing it back", async () => {
      selectorValue = "eco";

      const result = await orchestrator.restoreFromHub();

      expect(result._unsafeUnwrap().current).toBe("eco");
      expect(commands.some((c) => c.op === "select")).toBe(false);
      expect(scheduleFor("climate.bedroom")?.friday).toBe(ECO);
    });

    test("maps the legacy holiday value to eco", async () => {
      selectorValue = "holiday";

      await orchestrator.restoreFromHub();

      expect(orchestrator.getCurrentMode()).toBe("eco");
    });

    test("pushes the in-memory mode when the value is unknown", async () => {
      selectorValue = "party";

      await orchestrator.restoreFromHub();

      expect(orchestrator.getCurrentMode()).toBe("manual");
      expect(commands).toEqual([
        { op: "select", target: MODE_ENTITY, option: "manual" },
      ]);
    });

    test("pushes the in-memory mode when the selector does not exist", async () => {
      await orchestrator.restoreFromHub();

      expect(commands).toEqual([
        { op: "select", target: MODE_ENTITY, option: "manual" },
      ]);
    });

    test("restores ventilation for the default duration, back to the in-memory mode", async () => {
      selectorValue = "ventilation";

      const result = await orchestrator.restoreFromHub();

      expect(result._unsafeUnwrap().current).toBe("ventilation");
      expect(commands).toEqual([
        { op: "hvac", target: "climate.living_room", mode: "off" },
        { op: "hvac", target: "climate.bedroom", mode: "off" },
      ]);
      expect(orchestrator.getPendingRestore()).toEqual({
        targetMode: "manual",
        fireAt: Date.now() + 5 * MINUTE,
        armedByMode: "ventilation",
        reason: "ventilation",
      });

      await vi.advanceTimersByTimeAsync(5 * MINUTE);
      await flush();

      expect(orchestrator.getCurrentMode()).toBe("manual");
    });

    test("restores timer as off with no restore armed", async () => {
      selectorValue = "timer";

      const result = await orchestrator.restoreFromHub();

      expect(result._unsafeUnwrap().current).toBe("timer");
      expect(commands).toEqual([
        { op: "hvac", target: "climate.living_room", mode: "off" },
        { op: "hvac", target: "climate.bedroom", mode: "off" },
      ]);
      expect(orchestrator.getPendingRestore()).toBeNull();

      const cancelled = await orchestrator.cancelTimer();
      expect(cancelled._unsafeUnwrap().current).toBe("default");
    });

    test("runs only once", async () => {
      selectorValue = "eco";
      await orchestrator.restoreFromHub();
      commands = [];
      selectorValue = "off";

      await orchestrator.restoreFromHub();

      expect(orchestrator.getCurrentMode()).toBe("eco");
      expect(commands).toEqual([]);
    });
  });
});
