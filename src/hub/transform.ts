/**
 * Hub Module - Pure Transformations
 *
 * Message parsing/building, entity classification and the reconnect
 * backoff curve. No I/O.
 */
import type { MonitoredEntities } from "../config.js";
import {
  type EntityKind,
  type EntityState,
  type HubEntity,
  type InboundMessage,
  InboundMessageSchema,
  type OutboundMessage,
} from "./schema.js";

// =============================================================================
// Entity Classification
// =============================================================================

/**
 * Index of monitored entity ids to their declared kind.
 * Anything not in this map is dropped at ingestion.
 */
export function buildKindIndex(
  monitored: MonitoredEntities,
): ReadonlyMap<string, EntityKind> {
  const index = new Map<string, EntityKind>();
  for (const id of monitored.thermostats) index.set(id, "thermostat");
  for (const id of monitored.temperatureSensors) index.set(id, "temperature");
  for (const id of monitored.humiditySensors) index.set(id, "humidity");
  for (const id of monitored.selects) index.set(id, "select");
  return index;
}

/**
 * Decide the cache variant for an entity.
 *
 * The id's domain prefix picks thermostat vs sensor vs select. For sensors
 * the declared kind wins, then the device_class attribute, then the id.
 * Returns null for entities that fit no variant.
 */
export function classifyEntity(
  entityId: string,
  declared: EntityKind | undefined,
  attributes: Readonly<Record<string, unknown>>,
): EntityKind | null {
  if (entityId.startsWith("climate.")) {
    return "thermostat";
  }

  if (entityId.startsWith("input_select.") || entityId.startsWith("select.")) {
    return "select";
  }

  if (!entityId.startsWith("sensor.")) {
    return null;
  }

  if (declared === "temperature" || declared === "humidity") {
    return declared;
  }

  const deviceClass = attributes["device_class"];
  if (deviceClass === "temperature" || deviceClass === "humidity") {
    return deviceClass;
  }

  const lowered = entityId.toLowerCase();
  if (lowered.includes("temp")) return "temperature";
  if (lowered.includes("humid")) return "humidity";

  return null;
}

// =============================================================================
// Entity Parsing
// =============================================================================

function readNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function readString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

/**
 * Parse the hub's ISO timestamp, falling back to `now`.
 */
export function parseTimestamp(value: string | undefined, now: number): number {
  if (value === undefined) {
    return now;
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? now : parsed;
}

/**
 * Build the immutable cache entry for a raw entity.
 */
export function toEntityState(
  entity: HubEntity,
  kind: EntityKind,
  now: number,
): EntityState {
  const { attributes } = entity;
  const available = entity.state !== "unavailable";
  const base = {
    entityId: entity.entity_id,
    friendlyName: readString(attributes["friendly_name"]),
    available,
    lastUpdated: parseTimestamp(entity.last_updated, now),
  };

  switch (kind) {
    case "thermostat":
      return {
        ...base,
        kind,
        currentTemperature: readNumber(attributes["current_temperature"]),
        targetTemperature: readNumber(attributes["temperature"]),
        hvacMode: entity.state,
        presetMode: readString(attributes["preset_mode"]),
        battery: readNumber(attributes["battery"]),
      };

    case "temperature":
    case "humidity":
      return {
        ...base,
        kind,
        value: available ? readNumber(entity.state) : null,
        unit:
          readString(attributes["unit_of_measurement"]) ??
          (kind === "temperature" ? "°C" : "%"),
      };

    case "select": {
      const options = attributes["options"];
      return {
        ...base,
        kind,
        value: available ? entity.state : null,
        options: Array.isArray(options)
          ? options.filter((o): o is string => typeof o === "string")
          : [],
      };
    }
  }
}

// =============================================================================
// Wire Messages
// =============================================================================

/**
 * Parse one inbound frame. Returns null for non-JSON and for message
 * types the client does not handle (pong, unknown types).
 */
export function parseInboundMessage(raw: string): InboundMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = InboundMessageSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

export function authMessage(accessToken: string): OutboundMessage {
  return { type: "auth", access_token: accessToken };
}

export function getStatesMessage(id: number): OutboundMessage {
  return { id, type: "get_states" };
}

export function subscribeStateChangesMessage(id: number): OutboundMessage {
  return { id, type: "subscribe_events", event_type: "state_changed" };
}

/**
 * Build a call_service frame. entity_id is only included when given;
 * services like mqtt.publish take none.
 */
export function callServiceMessage(
  id: number,
  domain: string,
  service: string,
  entityId: string | undefined,
  payload: Readonly<Record<string, unknown>> = {},
): OutboundMessage {
  const serviceData: Record<string, unknown> = {};
  if (entityId !== undefined && entityId !== "") {
    serviceData["entity_id"] = entityId;
  }
  Object.assign(serviceData, payload);

  return {
    id,
    type: "call_service",
    domain,
    service,
    service_data: serviceData,
  };
}

// =============================================================================
// Reconnect Backoff
// =============================================================================

/**
 * Next reconnect delay: double the current one, capped.
 */
export function nextBackoff(currentMs: number, maxMs: number): number {
  return Math.min(currentMs * 2, maxMs);
}
