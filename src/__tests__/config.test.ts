/**
 * Configuration Tests
 *
 * Exercises the schema through parseConfig so process.env stays untouched.
 */
import { describe, expect, test } from "vitest";

import {
  getMonitoredEntities,
  getPublishPolicy,
  getReconnectPolicy,
  parseConfig,
} from "../config.js";

const REQUIRED = {
  HUB_WEBSOCKET_URL: "ws://hub.test:8123/api/websocket",
  HUB_ACCESS_TOKEN: "test-token",
};

describe("Config", () => {
  test("applies defaults", () => {
    const parsed = parseConfig(REQUIRED);

    expect(parsed.success).toBe(true);
    expect(parsed.data).toMatchObject({
      PORT: 8090,
      MODE_ENTITY: "input_select.heating_mode",
      CONFIG_DIR: "config",
      MQTT_NAMESPACE: "zigbee2mqtt",
      INITIAL_MODE: "manual",
      CONNECT_TIMEOUT_MS: 10000,
      RECONNECT_BASE_MS: 1000,
      RECONNECT_MAX_MS: 60000,
      DEFAULT_VENTILATION_MINUTES: 5,
      THERMOSTAT_ENTITIES: [],
    });
  });

  test("requires the hub url and token", () => {
    const parsed = parseConfig({});

    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues.map((issue) => issue.path[0])).toEqual([
      "HUB_WEBSOCKET_URL",
      "HUB_ACCESS_TOKEN",
    ]);
  });

  test("splits entity lists and drops blanks", () => {
    const parsed = parseConfig({
      ...REQUIRED,
      THERMOSTAT_ENTITIES: " climate.a, ,climate.b,",
    });

    expect(parsed.data?.THERMOSTAT_ENTITIES).toEqual([
      "climate.a",
      "climate.b",
    ]);
  });

  test("rejects unknown initial modes and topic-unsafe namespaces", () => {
    expect(parseConfig({ ...REQUIRED, INITIAL_MODE: "holiday" }).success).toBe(
      false,
    );
    expect(parseConfig({ ...REQUIRED, MQTT_NAMESPACE: "a/#" }).success).toBe(
      false,
    );
  });

  test("derives monitored entities and policies", () => {
    const parsed = parseConfig({
      ...REQUIRED,
      THERMOSTAT_ENTITIES: "climate.a",
      HUMIDITY_SENSOR_ENTITIES: "sensor.h",
      SCHEDULE_PUBLISH_ATTEMPTS: "5",
      RECONNECT_MAX_MS: "30000",
    });
    if (!parsed.success) throw new Error("config should parse");

    expect(getMonitoredEntities(parsed.data)).toEqual({
      thermostats: ["climate.a"],
      temperatureSensors: [],
      humiditySensors: ["sensor.h"],
      selects: ["input_select.heating_mode"],
    });
    expect(getReconnectPolicy(parsed.data)).toEqual({
      baseMs: 1000,
      maxMs: 30000,
      connectTimeoutMs: 10000,
    });
    expect(getPublishPolicy(parsed.data)).toEqual({
      namespace: "zigbee2mqtt",
      attempts: 5,
      retryBaseMs: 1000,
      settleMs: 500,
    });
  });
});
