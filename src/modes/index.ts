/**
 * Modes Module - Public API
 */

// Types
export type {
  ModeChangeListener,
  ModeInfo,
  ModeOptions,
  PendingRestore,
  PendingRestoreInfo,
  RestoreReason,
  SetModeRequest,
  SystemMode,
} from "./schema.js";
export type { ModeError } from "./errors.js";
export type { ModeOrchestrator, ModeOrchestratorDeps } from "./service.js";

// Schemas and constants
export {
  MODE_DESCRIPTIONS,
  SetModeRequestSchema,
  isSystemMode,
} from "./schema.js";

// Error utilities
export { formatModeError } from "./errors.js";

// Service
export { createModeOrchestrator } from "./service.js";

// Pure transformations
export {
  nextLocalMidnight,
  normalizePersistedMode,
  shouldSkipArm,
  ventilationRestoreTarget,
} from "./transform.js";
