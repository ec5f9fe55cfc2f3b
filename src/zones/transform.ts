/**
 * Zones Module - Pure Transformations
 */
import type { EntityState, SensorState, ThermostatState } from "../hub/index.js";
import { type Zone, ZoneFileEntrySchema, type ZoneStatus } from "./schema.js";

export type RejectedZone = Readonly<{ key: string; message: string }>;

/**
 * Parse zones.json, which is either a list of zones or an object keyed by
 * zone id. Invalid entries are returned in `rejected`, not thrown.
 */
export function parseZonesFile(data: unknown): {
  zones: Zone[];
  rejected: RejectedZone[];
} {
  const zones: Zone[] = [];
  const rejected: RejectedZone[] = [];

  let entries: [string, unknown][];
  if (Array.isArray(data)) {
    entries = data.map((entry: unknown, index): [string, unknown] => [
      String(index),
      entry,
    ]);
  } else if (typeof data === "object" && data !== null) {
    entries = Object.entries(data);
  } else {
    rejected.push({ key: "<root>", message: "not a list or object" });
    return { zones, rejected };
  }

  for (const [key, entry] of entries) {
    const parsed = ZoneFileEntrySchema.safeParse(entry);
    if (parsed.success) {
      zones.push(parsed.data);
    } else {
      rejected.push({
        key,
        message: parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; "),
      });
    }
  }

  return { zones, rejected };
}

/**
 * Mean rounded to one decimal; null for no values.
 */
export function averageOf(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sum = values.reduce((total, value) => total + value, 0);
  return Math.round((sum / values.length) * 10) / 10;
}

function sensorsOf(
  ids: readonly string[],
  lookup: (entityId: string) => EntityState | undefined,
): SensorState[] {
  const sensors: SensorState[] = [];
  for (const id of ids) {
    const state = lookup(id);
    if (state && (state.kind === "temperature" || state.kind === "humidity")) {
      sensors.push(state);
    }
  }
  return sensors;
}

function readings(sensors: readonly SensorState[]): number[] {
  return sensors.flatMap((sensor) =>
    sensor.value === null ? [] : [sensor.value],
  );
}

/**
 * Combine a zone with the cached states of its members.
 */
export function buildZoneStatus(
  zone: Zone,
  lookup: (entityId: string) => EntityState | undefined,
): ZoneStatus {
  const thermostats: ThermostatState[] = [];
  for (const id of zone.thermostats) {
    const state = lookup(id);
    if (state?.kind === "thermostat") {
      thermostats.push(state);
    }
  }

  const temperatureSensors = sensorsOf(zone.temperatureSensors, lookup);
  const humiditySensors = sensorsOf(zone.humiditySensors, lookup);

  return {
    zone,
    thermostats,
    temperatureSensors,
    humiditySensors,
    averageTemperature: averageOf(readings(temperatureSensors)),
    averageHumidity: averageOf(readings(humiditySensors)),
  };
}
