/**
 * API routes for the heating controller.
 *
 * Routes are organized by domain:
 * - /api/health - Health check
 * - /api/modes/* - System mode (list, current, set, cancel timer)
 * - /api/status/* - Hub connection and cached entity states
 * - /api/zones/:zoneId/status - Aggregated zone readings
 * - /api/thermostats/:entityId/temperature - Direct setpoint change
 * - /api/events - SSE stream for live updates
 */
import { type Context, Hono } from "hono";
import { type Result, err, ok } from "neverthrow";

import type { DeviceCommandDispatcher } from "../dispatcher/index.js";
import { formatDispatchError } from "../dispatcher/index.js";
import type { EntityState, EventClient } from "../hub/index.js";
import { createLogger } from "../logger.js";
import type { ModeError, ModeInfo, ModeOrchestrator } from "../modes/index.js";
import {
  MODE_DESCRIPTIONS,
  SetModeRequestSchema,
  formatModeError,
} from "../modes/index.js";
import {
  createSseStream,
  getClientCount,
  sendToClient,
} from "../sse/index.js";
import type { ZoneDirectory } from "../zones/index.js";
import { formatZoneError } from "../zones/index.js";
import { SetTemperatureRequestSchema } from "./schema.js";

const log = createLogger("api");

export const API_VERSION = "1.0.0";

export type ApiDeps = Readonly<{
  orchestrator: ModeOrchestrator;
  hub: Pick<EventClient, "getStatus" | "getSnapshot" | "getEntity">;
  zones: ZoneDirectory;
  dispatcher: Pick<DeviceCommandDispatcher, "setTargetTemperature">;
}>;

/**
 * HTTP status for a failed mode operation.
 */
export function modeErrorStatus(error: ModeError): 400 | 409 | 422 | 500 {
  switch (error.type) {
    case "ALREADY_SET":
      return 409;
    case "INVALID_REQUEST":
    case "NOT_IN_TIMED_MODE":
      return 400;
    case "PRECONDITION_FAILED":
      return 422;
    case "APPLY_FAILED":
      return 500;
  }
}

async function readJson(c: Context): Promise<Result<unknown, string>> {
  try {
    const body: unknown = await c.req.json();
    return ok(body);
  } catch (error) {
    return err(error instanceof Error ? error.message : "Invalid JSON body");
  }
}

export function createRoutes(deps: ApiDeps) {
  const { orchestrator, hub, zones, dispatcher } = deps;
  const routes = new Hono();

  const lookup = (entityId: string): EntityState | undefined =>
    hub.getEntity(entityId);

  function modeResponse(
    c: Context,
    result: Result<ModeInfo, ModeError>,
    operation: string,
  ) {
    const requestId = c.get("requestId");
    if (result.isErr()) {
      const message = formatModeError(result.error);
      log.warn(
        { requestId, code: result.error.type },
        `${operation}: ${message}`,
      );
      return c.json(
        { success: false, error: message, code: result.error.type, requestId },
        modeErrorStatus(result.error),
      );
    }
    return c.json({ success: true, mode: result.value, requestId });
  }

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: API_VERSION,
      hub: hub.getStatus(),
      mode: orchestrator.getCurrentMode(),
      sseClients: getClientCount(),
    });
  });

  // ===========================================================================
  // Modes
  // ===========================================================================

  routes.get("/api/modes", (c) => {
    const modes = Object.entries(MODE_DESCRIPTIONS).map(([id, info]) => ({
      id,
      ...info,
    }));
    return c.json({ current: orchestrator.getCurrentMode(), modes });
  });

  routes.get("/api/modes/current", (c) => {
    return c.json(orchestrator.getModeInfo());
  });

  routes.post("/api/modes/set", async (c) => {
    const requestId = c.get("requestId");

    const body = await readJson(c);
    if (body.isErr()) {
      return c.json({ success: false, error: body.error, requestId }, 400);
    }

    const parsed = SetModeRequestSchema.safeParse(body.value);
    if (!parsed.success) {
      log.warn({ requestId }, "Invalid set mode request");
      return c.json(
        {
          success: false,
          error: "Invalid request",
          issues: parsed.error.issues.map(
            (issue) => `${issue.path.join(".") || "body"}: ${issue.message}`,
          ),
          requestId,
        },
        400,
      );
    }

    const { mode, force, activeZones, restoreTime, durationMinutes } =
      parsed.data;
    log.info({ requestId, mode, force }, "POST /api/modes/set");

    const result = await orchestrator.setMode(
      mode,
      { activeZones, restoreTime, durationMinutes },
      force,
    );
    return modeResponse(c, result, "Set mode");
  });

  routes.post("/api/modes/timer/cancel", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "POST /api/modes/timer/cancel");
    return modeResponse(c, await orchestrator.cancelTimer(), "Cancel timer");
  });

  // ===========================================================================
  // Status
  // ===========================================================================

  routes.get("/api/status", (c) => {
    const entities = [...hub.getSnapshot().values()];

    return c.json({
      connection: hub.getStatus(),
      mode: orchestrator.getModeInfo(),
      thermostats: entities.filter((entity) => entity.kind === "thermostat"),
      sensors: entities.filter(
        (entity) =>
          entity.kind === "temperature" || entity.kind === "humidity",
      ),
      zones: zones.listEnabledZones().map((zone) => ({
        id: zone.id,
        name: zone.name,
      })),
    });
  });

  routes.get("/api/status/connection", (c) => {
    const status = hub.getStatus();
    return c.json({ status, connected: status === "connected" });
  });

  routes.get("/api/status/thermostats/:entityId", (c) => {
    const requestId = c.get("requestId");
    const entityId = c.req.param("entityId");
    const entity = hub.getEntity(entityId);

    if (entity?.kind !== "thermostat") {
      return c.json(
        { error: `Unknown thermostat ${entityId}`, requestId },
        404,
      );
    }
    return c.json(entity);
  });

  // ===========================================================================
  // Zones
  // ===========================================================================

  routes.get("/api/zones/:zoneId/status", (c) => {
    const requestId = c.get("requestId");
    const result = zones.getZoneStatus(c.req.param("zoneId"), lookup);

    if (result.isErr()) {
      return c.json({ error: formatZoneError(result.error), requestId }, 404);
    }
    return c.json(result.value);
  });

  // ===========================================================================
  // Thermostats
  // ===========================================================================

  routes.post("/api/thermostats/:entityId/temperature", async (c) => {
    const requestId = c.get("requestId");
    const entityId = c.req.param("entityId");

    if (hub.getEntity(entityId)?.kind !== "thermostat") {
      return c.json(
        { success: false, error: `Unknown thermostat ${entityId}`, requestId },
        404,
      );
    }

    const body = await readJson(c);
    const parsed = SetTemperatureRequestSchema.safeParse(
      body.isOk() ? body.value : undefined,
    );
    if (!parsed.success) {
      return c.json(
        {
          success: false,
          error: "temperature must be a number between 5 and 30",
          requestId,
        },
        400,
      );
    }

    const { temperature } = parsed.data;
    log.info({ requestId, entityId, temperature }, "Set target temperature");

    const result = await dispatcher.setTargetTemperature(entityId, temperature);
    if (result.isErr()) {
      return c.json(
        { success: false, error: formatDispatchError(result.error), requestId },
        502,
      );
    }
    return c.json({ success: true, entityId, temperature, requestId });
  });

  // ===========================================================================
  // Server-Sent Events
  // ===========================================================================

  /**
   * SSE stream. A new client first receives a system_state snapshot,
   * then every broadcast.
   */
  routes.get("/api/events", (c) => {
    const requestId = c.get("requestId");
    const { stream, clientId } = createSseStream();

    log.info({ requestId, clientId }, "SSE client connected");

    sendToClient(clientId, {
      type: "system_state",
      mode: orchestrator.getModeInfo(),
      connection: hub.getStatus(),
      entities: [...hub.getSnapshot().values()],
    });

    return new Response(stream, {
      headers: {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      },
    });
  });

  return routes;
}
