/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Heating controller configuration covering:
 * - Server settings
 * - Hub connection (WebSocket URL + long-lived token)
 * - Monitored entities (thermostats, sensors, mode selector)
 * - Config directory for zones, day types and schedules
 * - Reconnect and schedule publish policies
 */
import { z } from "zod";

/**
 * Comma-separated entity list. Blank entries are dropped.
 */
const entityList = z
  .string()
  .optional()
  .transform((val) =>
    (val ?? "")
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry !== ""),
  );

export const SYSTEM_MODE_VALUES = [
  "default",
  "stay_home",
  "eco",
  "timer",
  "ventilation",
  "manual",
  "off",
] as const;

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8090).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("HeatingControl").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Hub Connection
  // ==========================================================================
  HUB_WEBSOCKET_URL: z
    .string()
    .url()
    .describe("Hub WebSocket endpoint, e.g. ws://hub.local:8123/api/websocket"),
  HUB_ACCESS_TOKEN: z
    .string()
    .min(1, "HUB_ACCESS_TOKEN is required")
    .describe("Long-lived access token for the hub"),
  CONNECT_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10000)
    .describe("Ceiling for one connect + auth + initial fetch handshake"),
  RECONNECT_BASE_MS: z.coerce
    .number()
    .positive()
    .default(1000)
    .describe("First reconnect delay; doubles after every failed attempt"),
  RECONNECT_MAX_MS: z.coerce
    .number()
    .positive()
    .default(60000)
    .describe("Reconnect delay cap"),

  // ==========================================================================
  // Monitored Entities
  // ==========================================================================
  THERMOSTAT_ENTITIES: entityList.describe("climate.* entities to control"),
  TEMPERATURE_SENSOR_ENTITIES: entityList.describe(
    "sensor.* entities measuring temperature",
  ),
  HUMIDITY_SENSOR_ENTITIES: entityList.describe(
    "sensor.* entities measuring humidity",
  ),
  MODE_ENTITY: z
    .string()
    .default("input_select.heating_mode")
    .describe("Select entity the current mode is mirrored into"),

  // ==========================================================================
  // Zones, Schedules, Devices
  // ==========================================================================
  CONFIG_DIR: z
    .string()
    .default("config")
    .describe("Directory with zones.json, day_types.json, schedules/"),
  MQTT_NAMESPACE: z
    .string()
    .regex(/^[a-z0-9_-]+$/, "MQTT_NAMESPACE must be a plain topic segment")
    .default("zigbee2mqtt")
    .describe("First topic segment for device schedule publishes"),

  // ==========================================================================
  // Mode Behaviour
  // ==========================================================================
  INITIAL_MODE: z
    .enum(SYSTEM_MODE_VALUES)
    .default("manual")
    .describe("In-memory mode before startup reconciliation"),
  DEFAULT_VENTILATION_MINUTES: z.coerce
    .number()
    .positive()
    .default(5)
    .describe("Ventilation duration when none is given"),
  SCHEDULE_PUBLISH_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(3)
    .describe("Sends per schedule publish before giving up"),
  SCHEDULE_RETRY_BASE_MS: z.coerce
    .number()
    .nonnegative()
    .default(1000)
    .describe("Wait before the first schedule publish retry; doubles"),
  MODE_SETTLE_MS: z.coerce
    .number()
    .nonnegative()
    .default(500)
    .describe("Pause between a thermostat's mode-set and schedule publish"),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse a raw environment into config. Exposed for tests.
 */
export function parseConfig(env: Record<string, string | undefined>) {
  return ConfigSchema.safeParse(env);
}

// Parse at startup - crashes immediately if invalid
const parsed = parseConfig(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Entities the hub client keeps in its cache, grouped by declared kind.
 */
export type MonitoredEntities = Readonly<{
  thermostats: readonly string[];
  temperatureSensors: readonly string[];
  humiditySensors: readonly string[];
  selects: readonly string[];
}>;

export function getMonitoredEntities(cfg: Config = config): MonitoredEntities {
  return {
    thermostats: cfg.THERMOSTAT_ENTITIES,
    temperatureSensors: cfg.TEMPERATURE_SENSOR_ENTITIES,
    humiditySensors: cfg.HUMIDITY_SENSOR_ENTITIES,
    selects: [cfg.MODE_ENTITY],
  };
}

export function getReconnectPolicy(cfg: Config = config): Readonly<{
  baseMs: number;
  maxMs: number;
  connectTimeoutMs: number;
}> {
  return {
    baseMs: cfg.RECONNECT_BASE_MS,
    maxMs: cfg.RECONNECT_MAX_MS,
    connectTimeoutMs: cfg.CONNECT_TIMEOUT_MS,
  };
}

export function getPublishPolicy(cfg: Config = config): Readonly<{
  namespace: string;
  attempts: number;
  retryBaseMs: number;
  settleMs: number;
}> {
  return {
    namespace: cfg.MQTT_NAMESPACE,
    attempts: cfg.SCHEDULE_PUBLISH_ATTEMPTS,
    retryBaseMs: cfg.SCHEDULE_RETRY_BASE_MS,
    settleMs: cfg.MODE_SETTLE_MS,
  };
}
