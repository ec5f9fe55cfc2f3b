/**
 * Hub Module - Schemas and Types
 *
 * Wire messages of the hub's WebSocket API and the typed entity cache.
 * Schemas are the source of truth for anything read off the wire.
 */
import { z } from "zod";

// =============================================================================
// Raw Entities
// =============================================================================

/**
 * Entity as the hub serialises it in get_states results and
 * state_changed events.
 */
export const HubEntitySchema = z.object({
  entity_id: z.string().min(1),
  state: z.string(),
  attributes: z.record(z.unknown()).default({}),
  last_updated: z.string().optional(),
  last_changed: z.string().optional(),
});

export type HubEntity = z.infer<typeof HubEntitySchema>;

export const StateChangedDataSchema = z.object({
  entity_id: z.string(),
  new_state: HubEntitySchema.nullable().optional(),
});

// =============================================================================
// Inbound Messages
// =============================================================================

export const InboundMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("auth_required"),
    ha_version: z.string().optional(),
  }),
  z.object({ type: z.literal("auth_ok") }),
  z.object({
    type: z.literal("auth_invalid"),
    message: z.string().optional(),
  }),
  z.object({
    type: z.literal("result"),
    id: z.number(),
    success: z.boolean(),
    result: z.unknown().optional(),
    error: z
      .object({
        code: z.string().optional(),
        message: z.string().optional(),
      })
      .optional(),
  }),
  z.object({
    type: z.literal("event"),
    id: z.number().optional(),
    event: z.object({
      event_type: z.string(),
      data: z.unknown(),
    }),
  }),
]);

export type InboundMessage = z.infer<typeof InboundMessageSchema>;

// =============================================================================
// Outbound Messages
// =============================================================================

export type OutboundMessage =
  | Readonly<{ type: "auth"; access_token: string }>
  | Readonly<{ id: number; type: "get_states" }>
  | Readonly<{ id: number; type: "subscribe_events"; event_type: string }>
  | Readonly<{
      id: number;
      type: "call_service";
      domain: string;
      service: string;
      service_data: Readonly<Record<string, unknown>>;
    }>;

// =============================================================================
// Cached Entity States
// =============================================================================

export type EntityKind = "thermostat" | "temperature" | "humidity" | "select";

type EntityBase = Readonly<{
  entityId: string;
  friendlyName: string | null;
  available: boolean;
  /** Hub's last_updated as epoch ms */
  lastUpdated: number;
}>;

export type ThermostatState = EntityBase &
  Readonly<{
    kind: "thermostat";
    currentTemperature: number | null;
    targetTemperature: number | null;
    /** Device HVAC mode as reported: off, heat, auto, unavailable... */
    hvacMode: string;
    presetMode: string | null;
    battery: number | null;
  }>;

export type SensorState = EntityBase &
  Readonly<{
    kind: "temperature" | "humidity";
    value: number | null;
    unit: string;
  }>;

export type SelectState = EntityBase &
  Readonly<{
    kind: "select";
    value: string | null;
    options: readonly string[];
  }>;

/**
 * One cached entity. The variant is decided once, at ingestion.
 */
export type EntityState = ThermostatState | SensorState | SelectState;

// =============================================================================
// Connection
// =============================================================================

export type ConnectionStatus =
  | "disconnected"
  | "connecting"
  | "connected"
  | "error";

export type StateChangeListener = (
  entityId: string,
  newState: HubEntity,
) => void | Promise<void>;

export type StatusListener = (status: ConnectionStatus) => void;
