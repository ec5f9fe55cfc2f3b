/**
 * Dispatcher Module - Public API
 */

// Types
export type {
  DeviceMode,
  PublishPolicy,
  ThermostatMapping,
} from "./schema.js";
export type { DispatchError } from "./errors.js";
export type {
  CommandTransport,
  DeviceCommandDispatcher,
  DispatchResult,
  DispatcherOptions,
} from "./service.js";

// Constants
export { DEVICE_NAME_PATTERN } from "./schema.js";

// Error utilities
export { formatDispatchError } from "./errors.js";

// Service functions
export {
  createDeviceCommandDispatcher,
  loadThermostatMapping,
} from "./service.js";
