/**
 * Zone Directory Tests
 */
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

// Import after mocks
import { createZoneDirectory, loadZoneDirectory } from "../service.js";

describe("Zone Directory", () => {
  const directory = createZoneDirectory([
    {
      id: "z1",
      name: "Living",
      thermostats: ["climate.a"],
      temperatureSensors: [],
      humiditySensors: [],
      activeSchedule: null,
      enabled: true,
    },
    {
      id: "z2",
      name: "Attic",
      thermostats: ["climate.b"],
      temperatureSensors: [],
      humiditySensors: [],
      activeSchedule: null,
      enabled: false,
    },
  ]);

  test("listEnabledZones leaves out disabled zones", () => {
    expect(directory.listZones()).toHaveLength(2);
    expect(directory.listEnabledZones().map((zone) => zone.id)).toEqual([
      "z1",
    ]);
  });

  test("getZone returns ZONE_NOT_FOUND for unknown ids", () => {
    expect(directory.getZone("z9")._unsafeUnwrapErr()).toEqual({
      type: "ZONE_NOT_FOUND",
      zoneId: "z9",
    });
  });

  test("getZoneStatus reads member states through the lookup", () => {
    const status = directory.getZoneStatus("z1", () => undefined);

    expect(status._unsafeUnwrap().zone.id).toBe("z1");
    expect(status._unsafeUnwrap().averageTemperature).toBeNull();
  });

  describe("loadZoneDirectory", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "zones-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    test("loads zones from disk", async () => {
      const path = join(dir, "zones.json");
      await writeFile(
        path,
        JSON.stringify([{ id: "z1", name: "Living", thermostats: ["climate.a"] }]),
      );

      const loaded = await loadZoneDirectory(path);

      expect(loaded.getZone("z1")._unsafeUnwrap().thermostats).toEqual([
        "climate.a",
      ]);
    });

    test("a missing file gives an empty directory", async () => {
      const loaded = await loadZoneDirectory(join(dir, "missing.json"));

      expect(loaded.listZones()).toEqual([]);
    });
  });
});
