/**
 * Zones Module - Schemas and Types
 *
 * A zone groups thermostats and sensors controlled as one unit.
 */
import { z } from "zod";

import type { SensorState, ThermostatState } from "../hub/index.js";

const entityIds = z.array(z.string().min(1)).default([]);

/**
 * One zone entry of zones.json (snake_case on disk).
 */
export const ZoneFileEntrySchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    thermostats: entityIds,
    temperature_sensors: entityIds,
    humidity_sensors: entityIds,
    active_schedule: z.string().nullable().default(null),
    enabled: z.boolean().default(true),
  })
  .transform(
    (entry): Zone => ({
      id: entry.id,
      name: entry.name,
      thermostats: entry.thermostats,
      temperatureSensors: entry.temperature_sensors,
      humiditySensors: entry.humidity_sensors,
      activeSchedule: entry.active_schedule,
      enabled: entry.enabled,
    }),
  );

export type Zone = Readonly<{
  id: string;
  name: string;
  thermostats: readonly string[];
  temperatureSensors: readonly string[];
  humiditySensors: readonly string[];
  /** Schedule pushed in default mode; null means "default" */
  activeSchedule: string | null;
  enabled: boolean;
}>;

/**
 * Live view of a zone built from the entity cache.
 */
export type ZoneStatus = Readonly<{
  zone: Zone;
  thermostats: readonly ThermostatState[];
  temperatureSensors: readonly SensorState[];
  humiditySensors: readonly SensorState[];
  averageTemperature: number | null;
  averageHumidity: number | null;
}>;
