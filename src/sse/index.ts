/**
 * SSE Module - Public API
 *
 * Exports types and service functions for Server-Sent Events.
 */

// Types
export type {
  ConnectionEvent,
  EntityUpdateEvent,
  ModeChangeEvent,
  SseEvent,
  SystemStateEvent,
} from "./schema.js";

// Service functions
export {
  broadcast,
  broadcastConnection,
  broadcastEntityUpdate,
  broadcastModeChange,
  createSseStream,
  disconnectAllClients,
  formatSseEvent,
  getClientCount,
  removeClient,
  sendToClient,
} from "./service.js";
