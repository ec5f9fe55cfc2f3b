/**
 * Dispatcher Module - Schemas and Types
 */
import { z } from "zod";

/**
 * HVAC modes at the device layer. Distinct from the controller's
 * system modes.
 */
export type DeviceMode = "off" | "heat" | "auto";

/**
 * Device names are interpolated into publish topics.
 */
export const DEVICE_NAME_PATTERN = /^[a-z0-9\s()]+$/;

/**
 * thermostat_mapping.json: thermostat entity id -> device name.
 * The object form `{ "z2m_name": "..." }` is accepted as well.
 */
export const ThermostatMappingEntrySchema = z.union([
  z.string().min(1),
  z
    .object({ z2m_name: z.string().min(1) })
    .transform((entry) => entry.z2m_name),
]);

export type ThermostatMapping = ReadonlyMap<string, string>;

export type PublishPolicy = Readonly<{
  /** First topic segment, e.g. "zigbee2mqtt" */
  namespace: string;
  /** Total sends per schedule publish */
  attempts: number;
  /** Wait before the first retry; doubles per retry */
  retryBaseMs: number;
  /** Pause between a thermostat's mode-set and its schedule publish */
  settleMs: number;
}>;
