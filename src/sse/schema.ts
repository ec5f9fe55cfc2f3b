/**
 * SSE Module - Schemas and Types
 *
 * Defines the event types for Server-Sent Events.
 */
import type { ConnectionStatus, EntityState } from "../hub/index.js";
import type { ModeInfo } from "../modes/index.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * A monitored entity changed on the hub.
 */
export type EntityUpdateEvent = Readonly<{
  type: "entity_update";
  entity: EntityState;
}>;

/**
 * A mode transition committed.
 */
export type ModeChangeEvent = Readonly<{
  type: "mode_change";
  mode: ModeInfo;
}>;

/**
 * Hub connection status changed.
 */
export type ConnectionEvent = Readonly<{
  type: "connection";
  status: ConnectionStatus;
}>;

/**
 * Snapshot sent to a client right after it connects.
 */
export type SystemStateEvent = Readonly<{
  type: "system_state";
  mode: ModeInfo;
  connection: ConnectionStatus;
  entities: readonly EntityState[];
}>;

export type SseEvent =
  | EntityUpdateEvent
  | ModeChangeEvent
  | ConnectionEvent
  | SystemStateEvent;
