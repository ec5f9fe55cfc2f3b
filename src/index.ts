/**
 * Heating Controller - Application Entry Point
 *
 * Sets up:
 * - Zones, schedules and device mapping from CONFIG_DIR
 * - Hub event client (connect, reconnect loop)
 * - Mode orchestrator with one-time startup reconciliation
 * - Hono server with request ID tracing and global error handling
 * - SSE fan-out of entity, mode and connection changes
 */
import { join } from "node:path";
import { serve } from "@hono/node-server";
import { Hono } from "hono";

import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { createRoutes } from "./api/routes.js";
import {
  config,
  getMonitoredEntities,
  getPublishPolicy,
  getReconnectPolicy,
} from "./config.js";
import {
  createDeviceCommandDispatcher,
  loadThermostatMapping,
} from "./dispatcher/index.js";
import { createEventClient, formatHubError } from "./hub/index.js";
import { createLogger } from "./logger.js";
import { createModeOrchestrator, formatModeError } from "./modes/index.js";
import { loadScheduleCatalog } from "./schedules/index.js";
import {
  broadcastConnection,
  broadcastEntityUpdate,
  broadcastModeChange,
  disconnectAllClients,
} from "./sse/index.js";
import { loadZoneDirectory } from "./zones/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  ZONE HEATING CONTROLLER");
console.log("========================================");
console.log("");

const monitored = getMonitoredEntities();
const reconnectPolicy = getReconnectPolicy();

// Non-sensitive values only
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    hubUrl: config.HUB_WEBSOCKET_URL,
    configDir: config.CONFIG_DIR,
    modeEntity: config.MODE_ENTITY,
    initialMode: config.INITIAL_MODE,
    thermostats: monitored.thermostats.length,
    temperatureSensors: monitored.temperatureSensors.length,
    humiditySensors: monitored.humiditySensors.length,
  },
  "Configuration loaded",
);

// =============================================================================
// COLLABORATORS
// =============================================================================

const zones = await loadZoneDirectory(join(config.CONFIG_DIR, "zones.json"));
const schedules = await loadScheduleCatalog(config.CONFIG_DIR);
const mapping = await loadThermostatMapping(
  join(config.CONFIG_DIR, "thermostat_mapping.json"),
);

const hub = createEventClient({
  url: config.HUB_WEBSOCKET_URL,
  accessToken: config.HUB_ACCESS_TOKEN,
  monitored,
  connectTimeoutMs: reconnectPolicy.connectTimeoutMs,
  reconnectBaseMs: reconnectPolicy.baseMs,
  reconnectMaxMs: reconnectPolicy.maxMs,
});

const dispatcher = createDeviceCommandDispatcher({
  transport: hub,
  mapping,
  policy: getPublishPolicy(),
});

const orchestrator = createModeOrchestrator({
  dispatcher,
  schedules,
  zones,
  hub,
  modeEntity: config.MODE_ENTITY,
  initialMode: config.INITIAL_MODE,
  defaultVentilationMinutes: config.DEFAULT_VENTILATION_MINUTES,
});

// =============================================================================
// LIVE UPDATES
// =============================================================================

hub.onStateChange((entityId) => {
  const entity = hub.getEntity(entityId);
  if (entity) {
    broadcastEntityUpdate(entity);
  }
});

hub.onStatusChange((status) => {
  broadcastConnection(status);
});

orchestrator.onModeChange((info) => {
  broadcastModeChange(info);
});

// =============================================================================
// HUB CONNECTION + STARTUP RECONCILIATION
// =============================================================================

async function reconcileMode(): Promise<void> {
  const result = await orchestrator.restoreFromHub();
  if (result.isErr()) {
    log.error(
      { error: formatModeError(result.error) },
      "Startup mode reconciliation failed",
    );
    return;
  }
  log.info({ mode: result.value.current }, "Startup mode reconciled");
}

// Reconciliation runs once, after the first warm connection
const stopWaitingForHub = hub.onStatusChange((status) => {
  if (status !== "connected") return;
  stopWaitingForHub();
  reconcileMode().catch((error) => {
    log.error({ error }, "Startup mode reconciliation crashed");
  });
});

const connected = await hub.connect();
if (connected.isErr()) {
  log.error(
    { error: formatHubError(connected.error) },
    "Initial hub connection failed, retrying in background",
  );
  hub.reconnect();
}

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

// Global middleware
app.use("*", requestIdMiddleware);

// Error handler
app.onError(errorHandler);

// Mount routes
app.route("/", createRoutes({ orchestrator, hub, zones, dispatcher }));

// =============================================================================
// START SERVER
// =============================================================================

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: "0.0.0.0",
  },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  // Cancel pending restore timer
  orchestrator.shutdown();

  // Stop the hub client and its reconnect loop
  hub.disconnect();

  // Close SSE connections
  disconnectAllClients();

  server.close(() => {
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
