/**
 * Zones Module - Service Layer
 *
 * Read-only zone directory loaded from zones.json.
 */
import { readFile } from "node:fs/promises";
import { type Result, err, ok } from "neverthrow";

import type { EntityState } from "../hub/index.js";
import { createLogger } from "../logger.js";
import {
  type ZoneError,
  formatZoneError,
  loadFailed,
  zoneNotFound,
} from "./errors.js";
import type { Zone, ZoneStatus } from "./schema.js";
import { buildZoneStatus, parseZonesFile } from "./transform.js";

const log = createLogger("zones");

export type ZoneDirectory = Readonly<{
  listZones(): readonly Zone[];
  listEnabledZones(): readonly Zone[];
  getZone(zoneId: string): Result<Zone, ZoneError>;
  getZoneStatus(
    zoneId: string,
    lookup: (entityId: string) => EntityState | undefined,
  ): Result<ZoneStatus, ZoneError>;
}>;

export function createZoneDirectory(zones: readonly Zone[]): ZoneDirectory {
  const byId = new Map(zones.map((zone) => [zone.id, zone]));

  function getZone(zoneId: string): Result<Zone, ZoneError> {
    const zone = byId.get(zoneId);
    return zone ? ok(zone) : err(zoneNotFound(zoneId));
  }

  return {
    listZones: () => [...byId.values()],
    listEnabledZones: () => [...byId.values()].filter((zone) => zone.enabled),
    getZone,
    getZoneStatus: (zoneId, lookup) =>
      getZone(zoneId).map((zone) => buildZoneStatus(zone, lookup)),
  };
}

async function readZonesFile(path: string): Promise<Result<unknown, ZoneError>> {
  try {
    const text = await readFile(path, "utf8");
    const data: unknown = JSON.parse(text);
    return ok(data);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(loadFailed(path, cause.message, cause));
  }
}

/**
 * Load zones.json. A missing or unreadable file yields an empty directory.
 */
export async function loadZoneDirectory(path: string): Promise<ZoneDirectory> {
  const raw = await readZonesFile(path);
  if (raw.isErr()) {
    log.warn({ error: formatZoneError(raw.error) }, "No zones loaded");
    return createZoneDirectory([]);
  }

  const { zones, rejected } = parseZonesFile(raw.value);
  for (const entry of rejected) {
    log.error(entry, `Error loading zone ${entry.key}`);
  }

  log.info(
    { zones: zones.map((zone) => zone.id) },
    `Loaded ${zones.length} zones`,
  );
  return createZoneDirectory(zones);
}
