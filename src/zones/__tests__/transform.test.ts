/**
 * Zones Transform Unit Tests
 */
import { describe, expect, test } from "vitest";

import type { EntityState } from "../../hub/index.js";
import type { Zone } from "../schema.js";
import { averageOf, buildZoneStatus, parseZonesFile } from "../transform.js";

const LIVING: Zone = {
  id: "living",
  name: "Living room",
  thermostats: ["climate.living_room"],
  temperatureSensors: ["sensor.living_temp", "sensor.window_temp"],
  humiditySensors: ["sensor.living_humidity"],
  activeSchedule: null,
  enabled: true,
};

function sensor(
  entityId: string,
  kind: "temperature" | "humidity",
  value: number | null,
): EntityState {
  return {
    entityId,
    friendlyName: null,
    available: value !== null,
    lastUpdated: 0,
    kind,
    value,
    unit: kind === "temperature" ? "°C" : "%",
  };
}

describe("Zones Transform", () => {
  // ===========================================================================
  // parseZonesFile
  // ===========================================================================

  describe("parseZonesFile", () => {
    test("parses the list form with defaults", () => {
      const { zones, rejected } = parseZonesFile([
        { id: "living", name: "Living room", thermostats: ["climate.a"] },
      ]);

      expect(rejected).toEqual([]);
      expect(zones).toEqual([
        {
          id: "living",
          name: "Living room",
          thermostats: ["climate.a"],
          temperatureSensors: [],
          humiditySensors: [],
          activeSchedule: null,
          enabled: true,
        },
      ]);
    });

    test("parses the id-keyed form and maps snake_case fields", () => {
      const { zones } = parseZonesFile({
        bed: {
          id: "bed",
          name: "Bedroom",
          temperature_sensors: ["sensor.bed_temp"],
          active_schedule: "eco",
          enabled: false,
        },
      });

      expect(zones[0]?.temperatureSensors).toEqual(["sensor.bed_temp"]);
      expect(zones[0]?.activeSchedule).toBe("eco");
      expect(zones[0]?.enabled).toBe(false);
    });

    test("rejects invalid entries and keeps the rest", () => {
      const { zones, rejected } = parseZonesFile([
        { id: "ok", name: "Ok" },
        { id: "no-name" },
      ]);

      expect(zones.map((zone) => zone.id)).toEqual(["ok"]);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]?.key).toBe("1");
    });

    test("rejects a file that is neither list nor object", () => {
      expect(parseZonesFile("zones").rejected).toEqual([
        { key: "<root>", message: "not a list or object" },
      ]);
    });
  });

  // ===========================================================================
  // averageOf
  // ===========================================================================

  describe("averageOf", () => {
    test("rounds to one decimal", () => {
      expect(averageOf([20.1, 20.4, 21])).toBe(20.5);
    });

    test("returns null for no values", () => {
      expect(averageOf([])).toBeNull();
    });
  });

  // ===========================================================================
  // buildZoneStatus
  // ===========================================================================

  describe("buildZoneStatus", () => {
    test("collects member states and averages available readings", () => {
      const cache = new Map<string, EntityState>([
        ["sensor.living_temp", sensor("sensor.living_temp", "temperature", 20)],
        ["sensor.window_temp", sensor("sensor.window_temp", "temperature", null)],
        [
          "sensor.living_humidity",
          sensor("sensor.living_humidity", "humidity", 48.26),
        ],
      ]);

      const status = buildZoneStatus(LIVING, (id) => cache.get(id));

      expect(status.thermostats).toEqual([]);
      expect(status.temperatureSensors).toHaveLength(2);
      expect(status.averageTemperature).toBe(20);
      expect(status.averageHumidity).toBe(48.3);
    });
  });
});
