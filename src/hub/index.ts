/**
 * Hub Module - Public API
 *
 * Event client for the hub's WebSocket API plus the typed entity cache.
 */

// Types
export type {
  ConnectionStatus,
  EntityKind,
  EntityState,
  HubEntity,
  SelectState,
  SensorState,
  StateChangeListener,
  StatusListener,
  ThermostatState,
} from "./schema.js";
export type { HubError } from "./errors.js";
export type { HubSocket, SocketFactory } from "./socket.js";
export type { EventClient, EventClientOptions } from "./service.js";

// Error utilities
export { formatHubError } from "./errors.js";

// Service
export { createEventClient } from "./service.js";
export { openWebSocket } from "./socket.js";

// Pure transformations
export {
  buildKindIndex,
  classifyEntity,
  nextBackoff,
  toEntityState,
} from "./transform.js";
