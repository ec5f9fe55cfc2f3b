/**
 * Zones Module - Public API
 */

// Types
export type { Zone, ZoneStatus } from "./schema.js";
export type { ZoneError } from "./errors.js";
export type { ZoneDirectory } from "./service.js";

// Error utilities
export { formatZoneError } from "./errors.js";

// Service functions
export { createZoneDirectory, loadZoneDirectory } from "./service.js";

// Pure transformations
export { averageOf, buildZoneStatus, parseZonesFile } from "./transform.js";
