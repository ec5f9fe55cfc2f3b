/**
 * SSE Module - Service Layer
 *
 * Server-Sent Events broadcasting for live dashboards.
 */
import type { ConnectionStatus, EntityState } from "../hub/index.js";
import { createLogger } from "../logger.js";
import type { ModeInfo } from "../modes/index.js";
import type { SseEvent } from "./schema.js";

const log = createLogger("sse");

const encoder = new TextEncoder();

// =============================================================================
// Client Management
// =============================================================================

type SseClient = {
  id: number;
  controller: ReadableStreamDefaultController<Uint8Array>;
  connected: boolean;
};

let clients: SseClient[] = [];
let nextClientId = 1;

/**
 * Encode one event in the text/event-stream format.
 */
export function formatSseEvent(event: SseEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

export function getClientCount(): number {
  return clients.filter((c) => c.connected).length;
}

/**
 * Create a new SSE stream for a client. The stream opens with a
 * `connected` event carrying the client id.
 */
export function createSseStream(): {
  stream: ReadableStream<Uint8Array>;
  clientId: number;
} {
  const clientId = nextClientId++;
  let client: SseClient | null = null;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      client = { id: clientId, controller, connected: true };
      clients.push(client);
      log.info(
        { clientId, totalClients: getClientCount() },
        "SSE client connected",
      );

      controller.enqueue(
        encoder.encode(
          `event: connected\ndata: ${JSON.stringify({ clientId })}\n\n`,
        ),
      );
    },
    cancel() {
      if (client) {
        client.connected = false;
        clients = clients.filter((c) => c.id !== clientId);
        log.info(
          { clientId, remainingClients: getClientCount() },
          "SSE client disconnected",
        );
      }
    },
  });

  return { stream, clientId };
}

export function removeClient(clientId: number): void {
  const client = clients.find((c) => c.id === clientId);
  if (client) {
    client.connected = false;
    clients = clients.filter((c) => c.id !== clientId);
    log.debug({ clientId }, "SSE client removed");
  }
}

// =============================================================================
// Event Broadcasting
// =============================================================================

/**
 * Broadcast an event to all connected clients. Clients whose stream
 * rejects the write are dropped.
 */
export function broadcast(event: SseEvent): void {
  const connectedClients = clients.filter((c) => c.connected);

  if (connectedClients.length === 0) {
    log.trace({ eventType: event.type }, "No clients to broadcast to");
    return;
  }

  const data = encoder.encode(formatSseEvent(event));

  let successCount = 0;
  let errorCount = 0;

  for (const client of connectedClients) {
    try {
      client.controller.enqueue(data);
      successCount++;
    } catch (error) {
      log.debug({ clientId: client.id, error }, "SSE write failed");
      client.connected = false;
      errorCount++;
    }
  }

  if (errorCount > 0) {
    clients = clients.filter((c) => c.connected);
    log.debug(
      { eventType: event.type, sent: successCount, failed: errorCount },
      "Broadcast complete with disconnections",
    );
  }

  log.trace(
    { eventType: event.type, clients: successCount },
    "Event broadcasted",
  );
}

export function broadcastEntityUpdate(entity: EntityState): void {
  broadcast({ type: "entity_update", entity });
}

export function broadcastModeChange(mode: ModeInfo): void {
  broadcast({ type: "mode_change", mode });
}

export function broadcastConnection(status: ConnectionStatus): void {
  broadcast({ type: "connection", status });
}

/**
 * Send event to a specific client.
 */
export function sendToClient(clientId: number, event: SseEvent): boolean {
  const client = clients.find((c) => c.id === clientId && c.connected);
  if (!client) return false;

  try {
    client.controller.enqueue(encoder.encode(formatSseEvent(event)));
    return true;
  } catch (error) {
    log.debug({ clientId, error }, "SSE write failed");
    client.connected = false;
    return false;
  }
}

// =============================================================================
// Cleanup
// =============================================================================

/**
 * Disconnect all clients (for shutdown).
 */
export function disconnectAllClients(): void {
  log.info({ clientCount: clients.length }, "Disconnecting all SSE clients...");

  for (const client of clients) {
    try {
      client.controller.close();
    } catch (error) {
      log.debug({ clientId: client.id, error }, "SSE stream already closed");
    }
  }

  clients = [];
}
