/**
 * Dispatcher Module - Service Layer
 *
 * Translates thermostat intents into hub service calls. Schedule
 * publishes go out as mqtt.publish to the device's set topic and are
 * retried with exponential backoff, since delivery is fire-and-forget.
 */
import { readFile } from "node:fs/promises";
import { type Result, err, ok } from "neverthrow";

import type { EventClient } from "../hub/index.js";
import { createLogger } from "../logger.js";
import type { WeekSchedule } from "../schedules/index.js";
import {
  type DispatchError,
  formatDispatchError,
  invalidDeviceName,
  noDeviceMapping,
  retriesExhausted,
  sendFailed,
} from "./errors.js";
import {
  DEVICE_NAME_PATTERN,
  type DeviceMode,
  type PublishPolicy,
  type ThermostatMapping,
  ThermostatMappingEntrySchema,
} from "./schema.js";

const log = createLogger("dispatcher");

export type CommandTransport = Pick<EventClient, "invoke">;

export type DispatchResult = Promise<Result<true, DispatchError>>;

export type DeviceCommandDispatcher = Readonly<{
  setHvacMode(thermostatId: string, mode: DeviceMode): DispatchResult;
  setTargetTemperature(thermostatId: string, celsius: number): DispatchResult;
  /** Set an input_select / select entity. */
  selectOption(entityId: string, option: string): DispatchResult;
  /** Publish a weekly schedule to the thermostat's device. */
  publishWeeklySchedule(
    thermostatId: string,
    schedule: WeekSchedule,
  ): DispatchResult;
  /** Switch to auto, let the device settle, then publish the schedule. */
  applyWeeklySchedule(
    thermostatId: string,
    schedule: WeekSchedule,
  ): DispatchResult;
}>;

export type DispatcherOptions = Readonly<{
  transport: CommandTransport;
  mapping: ThermostatMapping;
  policy: PublishPolicy;
  sleep?: (ms: number) => Promise<void>;
}>;

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createDeviceCommandDispatcher(
  options: DispatcherOptions,
): DeviceCommandDispatcher {
  const { transport, mapping, policy } = options;
  const sleep = options.sleep ?? defaultSleep;

  async function call(
    domain: string,
    service: string,
    entityId: string | undefined,
    payload: Readonly<Record<string, unknown>>,
  ): DispatchResult {
    const sent = await transport.invoke(domain, service, entityId, payload);
    if (!sent) {
      const error = sendFailed(domain, service, entityId);
      log.error({ entityId, payload }, formatDispatchError(error));
      return err(error);
    }
    return ok(true);
  }

  async function setHvacMode(
    thermostatId: string,
    mode: DeviceMode,
  ): DispatchResult {
    const result = await call("climate", "set_hvac_mode", thermostatId, {
      hvac_mode: mode,
    });
    if (result.isOk()) {
      log.info({ thermostatId, mode }, `Set ${thermostatId} to ${mode}`);
    }
    return result;
  }

  async function publishWeeklySchedule(
    thermostatId: string,
    schedule: WeekSchedule,
  ): DispatchResult {
    const deviceName = mapping.get(thermostatId);
    if (deviceName === undefined) {
      const error = noDeviceMapping(thermostatId);
      log.warn({ thermostatId }, formatDispatchError(error));
      return err(error);
    }

    if (!DEVICE_NAME_PATTERN.test(deviceName)) {
      const error = invalidDeviceName(thermostatId, deviceName);
      log.error({ thermostatId, deviceName }, formatDispatchError(error));
      return err(error);
    }

    const topic = `${policy.namespace}/${deviceName}/set`;
    const payload = JSON.stringify({ weekly_schedule: schedule });

    for (let attempt = 0; attempt < policy.attempts; attempt++) {
      const sent = await transport.invoke("mqtt", "publish", undefined, {
        topic,
        payload,
      });

      if (sent) {
        log.info(
          { thermostatId, deviceName, topic, attempt: attempt + 1 },
          `Published schedule to ${thermostatId}`,
        );
        return ok(true);
      }

      if (attempt < policy.attempts - 1) {
        const waitMs = policy.retryBaseMs * 2 ** attempt;
        log.warn(
          { thermostatId, waitMs },
          `Retry ${attempt + 1}/${policy.attempts} for ${thermostatId}`,
        );
        await sleep(waitMs);
      }
    }

    const error = retriesExhausted(thermostatId, policy.attempts);
    log.error({ thermostatId, topic }, formatDispatchError(error));
    return err(error);
  }

  return {
    setHvacMode,

    setTargetTemperature(thermostatId, celsius) {
      return call("climate", "set_temperature", thermostatId, {
        temperature: celsius,
      });
    },

    selectOption(entityId, option) {
      const domain = entityId.startsWith("select.") ? "select" : "input_select";
      return call(domain, "select_option", entityId, { option });
    },

    publishWeeklySchedule,

    async applyWeeklySchedule(thermostatId, schedule) {
      const modeResult = await setHvacMode(thermostatId, "auto");
      if (modeResult.isErr()) {
        log.warn(
          { thermostatId },
          `Failed to set ${thermostatId} to auto, publishing anyway`,
        );
      }

      await sleep(policy.settleMs);

      const published = await publishWeeklySchedule(thermostatId, schedule);
      return published.andThen(() => modeResult);
    },
  };
}

// =============================================================================
// Mapping
// =============================================================================

/**
 * Load thermostat_mapping.json. Missing file or invalid entries are
 * logged; affected thermostats then fail with NO_DEVICE_MAPPING.
 */
export async function loadThermostatMapping(
  path: string,
): Promise<ThermostatMapping> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, "utf8"));
  } catch (error) {
    log.warn(
      { path, error: error instanceof Error ? error.message : String(error) },
      "No thermostat mapping loaded",
    );
    return new Map();
  }

  const mapping = new Map<string, string>();
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    log.error({ path }, "Thermostat mapping must be an object");
    return mapping;
  }

  for (const [thermostatId, entry] of Object.entries(data)) {
    const parsed = ThermostatMappingEntrySchema.safeParse(entry);
    if (parsed.success) {
      mapping.set(thermostatId, parsed.data);
    } else {
      log.error({ thermostatId }, "Invalid thermostat mapping entry");
    }
  }

  log.info({ count: mapping.size }, "Loaded thermostat mapping");
  return mapping;
}
