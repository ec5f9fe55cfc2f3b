/**
 * Hub Module - Service Layer
 *
 * Long-lived event client for the hub: authenticates, warms the entity
 * cache from a bulk fetch, subscribes to state changes and keeps the
 * cache current. Reconnects with exponential backoff on transport loss.
 *
 * Commands are fire-and-forget: invoke() reports transport delivery only.
 * The hub's effect surfaces later as a state_changed event.
 */
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

import type { MonitoredEntities } from "../config.js";
import { createLogger } from "../logger.js";
import {
  type HubError,
  authRejected,
  closed,
  connectionFailed,
  fetchFailed,
  formatHubError,
  timeout,
  unexpectedMessage,
} from "./errors.js";
import {
  type ConnectionStatus,
  type EntityState,
  type HubEntity,
  HubEntitySchema,
  type InboundMessage,
  type OutboundMessage,
  StateChangedDataSchema,
  type StateChangeListener,
  type StatusListener,
} from "./schema.js";
import { type HubSocket, type SocketFactory, openWebSocket } from "./socket.js";
import {
  authMessage,
  buildKindIndex,
  callServiceMessage,
  classifyEntity,
  getStatesMessage,
  nextBackoff,
  parseInboundMessage,
  subscribeStateChangesMessage,
  toEntityState,
} from "./transform.js";

const log = createLogger("hub");

export type EventClientOptions = Readonly<{
  url: string;
  accessToken: string;
  monitored: MonitoredEntities;
  /** Ceiling for socket open + auth + initial fetch */
  connectTimeoutMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  createSocket?: SocketFactory;
}>;

export type EventClient = Readonly<{
  connect(): Promise<Result<true, HubError>>;
  disconnect(): void;
  /** Start the backoff reconnect loop if it is not already running. */
  reconnect(): void;
  invoke(
    domain: string,
    service: string,
    entityId?: string,
    payload?: Readonly<Record<string, unknown>>,
  ): Promise<boolean>;
  getStatus(): ConnectionStatus;
  getSnapshot(): ReadonlyMap<string, EntityState>;
  getEntity(entityId: string): EntityState | undefined;
  onStateChange(listener: StateChangeListener): () => void;
  onStatusChange(listener: StatusListener): () => void;
}>;

type Phase = "handshake" | "listening";

export function createEventClient(options: EventClientOptions): EventClient {
  const createSocket = options.createSocket ?? openWebSocket;
  const kindIndex = buildKindIndex(options.monitored);

  // ===========================================================================
  // Client State
  // ===========================================================================

  let socket: HubSocket | null = null;
  let status: ConnectionStatus = "disconnected";
  let phase: Phase = "handshake";
  let generation = 0;
  let messageId = 1;
  let inFlight: Promise<Result<true, HubError>> | null = null;

  const cache = new Map<string, EntityState>();
  const stateListeners = new Set<StateChangeListener>();
  const statusListeners = new Set<StatusListener>();
  const pendingCalls = new Map<number, string>();

  // Handshake inbox: frames queued until the handshake consumes them
  let inbox: InboundMessage[] = [];
  let waiter: ((message: Result<InboundMessage, HubError>) => void) | null =
    null;

  // Reconnect loop
  let stopped = false;
  let reconnecting = false;
  let backoffMs = options.reconnectBaseMs;
  let reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  function nextMessageId(): number {
    return messageId++;
  }

  function setStatus(next: ConnectionStatus): void {
    if (status === next) return;
    status = next;
    for (const listener of statusListeners) {
      try {
        listener(next);
      } catch (error) {
        log.error({ error, status: next }, "Status listener failed");
      }
    }
  }

  // ===========================================================================
  // Transport Plumbing
  // ===========================================================================

  function nextMessage(): Promise<Result<InboundMessage, HubError>> {
    const queued = inbox.shift();
    if (queued !== undefined) {
      return Promise.resolve(ok(queued));
    }
    return new Promise((resolve) => {
      waiter = resolve;
    });
  }

  function releaseWaiter(reason: HubError): void {
    const pending = waiter;
    waiter = null;
    pending?.(err(reason));
  }

  async function send(
    sock: HubSocket,
    message: OutboundMessage,
  ): Promise<Result<true, HubError>> {
    try {
      await sock.send(JSON.stringify(message));
      return ok(true);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      return err(connectionFailed(`Write failed: ${cause.message}`, cause));
    }
  }

  function handleFrame(sock: HubSocket, raw: string): void {
    if (sock !== socket) return;

    const message = parseInboundMessage(raw);
    if (message === null) {
      log.debug({ frame: raw.slice(0, 200) }, "Ignoring unparseable frame");
      return;
    }

    if (phase === "handshake") {
      const pending = waiter;
      if (pending) {
        waiter = null;
        pending(ok(message));
      } else {
        inbox.push(message);
      }
      return;
    }

    dispatch(message);
  }

  function handleClose(sock: HubSocket, code: number, reason: string): void {
    if (sock !== socket) return;

    socket = null;
    pendingCalls.clear();
    releaseWaiter(closed(`Socket closed (${code})`));

    if (phase !== "listening") {
      // connect() reports handshake failures itself
      return;
    }

    phase = "handshake";
    log.warn({ code, reason }, "Hub connection closed");
    setStatus("disconnected");

    if (!stopped) {
      reconnect();
    }
  }

  function teardownSocket(): void {
    generation++;
    const sock = socket;
    socket = null;
    phase = "handshake";
    inbox = [];
    pendingCalls.clear();
    releaseWaiter(closed("Connection torn down"));
    sock?.close();
  }

  // ===========================================================================
  // Cache & Event Dispatch
  // ===========================================================================

  function ingest(entity: HubEntity): boolean {
    const declared = kindIndex.get(entity.entity_id);
    const kind = classifyEntity(entity.entity_id, declared, entity.attributes);
    if (kind === null) {
      log.debug({ entityId: entity.entity_id }, "No entity variant, dropped");
      return false;
    }
    cache.set(entity.entity_id, toEntityState(entity, kind, Date.now()));
    return true;
  }

  function notifyStateChange(entityId: string, newState: HubEntity): void {
    for (const listener of stateListeners) {
      try {
        void Promise.resolve(listener(entityId, newState)).catch((error) => {
          log.error({ error, entityId }, "State change listener failed");
        });
      } catch (error) {
        log.error({ error, entityId }, "State change listener failed");
      }
    }
  }

  function dispatch(message: InboundMessage): void {
    switch (message.type) {
      case "event": {
        if (message.event.event_type !== "state_changed") return;

        const data = StateChangedDataSchema.safeParse(message.event.data);
        if (!data.success) {
          log.debug("Malformed state_changed payload");
          return;
        }

        const { entity_id: entityId, new_state: newState } = data.data;
        if (!kindIndex.has(entityId) || !newState) return;

        if (ingest(newState)) {
          log.debug({ entityId, state: newState.state }, "State changed");
          notifyStateChange(entityId, newState);
        }
        return;
      }

      case "result": {
        const call = pendingCalls.get(message.id);
        if (call === undefined) return;
        pendingCalls.delete(message.id);

        if (!message.success) {
          log.warn(
            { id: message.id, call, error: message.error?.message },
            "Hub rejected service call",
          );
        }
        return;
      }

      default:
        log.debug({ type: message.type }, "Ignoring message");
    }
  }

  // ===========================================================================
  // Connect / Handshake
  // ===========================================================================

  async function handshake(attempt: number): Promise<Result<true, HubError>> {
    let sock: HubSocket;
    try {
      sock = await createSocket(options.url);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      return err(connectionFailed(cause.message, cause));
    }

    if (attempt !== generation) {
      sock.close();
      return err(closed("Superseded connection attempt"));
    }

    socket = sock;
    phase = "handshake";
    inbox = [];
    sock.onMessage((raw) => handleFrame(sock, raw));
    sock.onClose((code, reason) => handleClose(sock, code, reason));
    sock.onError((error) => {
      log.error({ error: error.message }, "Hub socket error");
    });

    // auth_required -> auth -> auth_ok
    const challenge = await nextMessage();
    if (challenge.isErr()) return err(challenge.error);
    if (challenge.value.type !== "auth_required") {
      return err(unexpectedMessage("auth_required", challenge.value.type));
    }

    const authSent = await send(sock, authMessage(options.accessToken));
    if (authSent.isErr()) return authSent;

    const reply = await nextMessage();
    if (reply.isErr()) return err(reply.error);
    if (reply.value.type === "auth_invalid") {
      return err(authRejected(reply.value.message ?? "auth_invalid"));
    }
    if (reply.value.type !== "auth_ok") {
      return err(unexpectedMessage("auth_ok", reply.value.type));
    }
    log.info("Authenticated with hub");

    // Bulk fetch - the cache is warm before connect() resolves
    const fetchId = nextMessageId();
    const fetchSent = await send(sock, getStatesMessage(fetchId));
    if (fetchSent.isErr()) return fetchSent;

    for (;;) {
      const next = await nextMessage();
      if (next.isErr()) return err(next.error);
      const message = next.value;
      if (message.type === "result" && message.id === fetchId) {
        if (!message.success) {
          return err(fetchFailed(message.error?.message ?? "get_states failed"));
        }
        warmCache(message.result);
        break;
      }
      dispatch(message);
    }

    const subscribeSent = await send(
      sock,
      subscribeStateChangesMessage(nextMessageId()),
    );
    if (subscribeSent.isErr()) return subscribeSent;
    log.info("Subscribed to state_changed events");

    if (attempt !== generation) {
      return err(closed("Superseded connection attempt"));
    }

    // Switch to listening and drain anything that arrived meanwhile
    phase = "listening";
    const backlog = inbox;
    inbox = [];
    for (const message of backlog) {
      dispatch(message);
    }

    return ok(true);
  }

  function warmCache(result: unknown): void {
    const entities = z.array(z.unknown()).safeParse(result);
    if (!entities.success) {
      log.warn("get_states result is not a list");
      return;
    }

    let loaded = 0;
    for (const raw of entities.data) {
      const entity = HubEntitySchema.safeParse(raw);
      if (!entity.success) continue;
      if (!kindIndex.has(entity.data.entity_id)) continue;
      if (ingest(entity.data)) loaded++;
    }

    log.info(
      { loaded, monitored: kindIndex.size },
      `Fetched initial states for ${loaded}/${kindIndex.size} entities`,
    );
  }

  async function runConnect(): Promise<Result<true, HubError>> {
    log.info({ url: options.url }, "Connecting to hub...");
    setStatus("connecting");

    generation++;
    const attempt = generation;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<Result<true, HubError>>((resolve) => {
      timer = setTimeout(() => {
        resolve(
          err(timeout("Handshake did not complete", options.connectTimeoutMs)),
        );
      }, options.connectTimeoutMs);
    });

    const result = await Promise.race([handshake(attempt), timedOut]);
    clearTimeout(timer);

    if (result.isErr()) {
      teardownSocket();
      log.error({ error: formatHubError(result.error) }, "Connect failed");
      setStatus("error");
      return result;
    }

    backoffMs = options.reconnectBaseMs;
    setStatus("connected");
    log.info("Connected to hub");
    return result;
  }

  function connect(): Promise<Result<true, HubError>> {
    if (status === "connected" && socket !== null) {
      return Promise.resolve(ok(true));
    }
    if (inFlight) {
      return inFlight;
    }

    stopped = false;
    inFlight = runConnect().finally(() => {
      inFlight = null;
    });
    return inFlight;
  }

  // ===========================================================================
  // Reconnect Loop
  // ===========================================================================

  function scheduleAttempt(): void {
    const delay = backoffMs;
    log.info({ delayMs: delay }, "Attempting reconnection after delay");

    reconnectTimer = setTimeout(() => {
      reconnectTimer = null;
      void attemptReconnect();
    }, delay);
  }

  async function attemptReconnect(): Promise<void> {
    if (stopped) {
      reconnecting = false;
      return;
    }

    const result = await connect();
    if (result.isOk()) {
      reconnecting = false;
      log.info("Reconnection successful");
      return;
    }

    backoffMs = nextBackoff(backoffMs, options.reconnectMaxMs);
    if (stopped) {
      reconnecting = false;
      return;
    }
    scheduleAttempt();
  }

  function reconnect(): void {
    if (reconnecting || stopped) return;
    reconnecting = true;
    scheduleAttempt();
  }

  function disconnect(): void {
    stopped = true;
    reconnecting = false;
    if (reconnectTimer) {
      clearTimeout(reconnectTimer);
      reconnectTimer = null;
    }
    teardownSocket();
    setStatus("disconnected");
    log.info("Disconnected from hub");
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  async function invoke(
    domain: string,
    service: string,
    entityId?: string,
    payload: Readonly<Record<string, unknown>> = {},
  ): Promise<boolean> {
    const sock = socket;
    if (sock === null || status !== "connected") {
      log.error({ domain, service, entityId }, "Not connected, call dropped");
      return false;
    }

    const id = nextMessageId();
    const sent = await send(
      sock,
      callServiceMessage(id, domain, service, entityId, payload),
    );

    if (sent.isErr()) {
      log.error(
        { domain, service, entityId, error: formatHubError(sent.error) },
        "Error calling service",
      );
      return false;
    }

    pendingCalls.set(id, `${domain}.${service}`);
    log.info({ entityId }, `Called ${domain}.${service}`);
    return true;
  }

  return {
    connect,
    disconnect,
    reconnect,
    invoke,
    getStatus: () => status,
    getSnapshot: () => new Map(cache),
    getEntity: (entityId) => cache.get(entityId),
    onStateChange(listener) {
      stateListeners.add(listener);
      return () => {
        stateListeners.delete(listener);
      };
    },
    onStatusChange(listener) {
      statusListeners.add(listener);
      return () => {
        statusListeners.delete(listener);
      };
    },
  };
}
