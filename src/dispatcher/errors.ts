/**
 * Dispatcher Module - Error Types
 *
 * Per-command failures. Callers aggregate them; one failing thermostat
 * never aborts its siblings.
 */

export type DispatchError =
  | {
      readonly type: "SEND_FAILED";
      readonly domain: string;
      readonly service: string;
      readonly entityId?: string;
    }
  | { readonly type: "NO_DEVICE_MAPPING"; readonly thermostatId: string }
  | {
      readonly type: "INVALID_DEVICE_NAME";
      readonly thermostatId: string;
      readonly deviceName: string;
    }
  | {
      readonly type: "RETRIES_EXHAUSTED";
      readonly thermostatId: string;
      readonly attempts: number;
    };

export function sendFailed(
  domain: string,
  service: string,
  entityId?: string,
): DispatchError {
  if (entityId !== undefined) {
    return { type: "SEND_FAILED", domain, service, entityId };
  }
  return { type: "SEND_FAILED", domain, service };
}

export function noDeviceMapping(thermostatId: string): DispatchError {
  return { type: "NO_DEVICE_MAPPING", thermostatId };
}

export function invalidDeviceName(
  thermostatId: string,
  deviceName: string,
): DispatchError {
  return { type: "INVALID_DEVICE_NAME", thermostatId, deviceName };
}

export function retriesExhausted(
  thermostatId: string,
  attempts: number,
): DispatchError {
  return { type: "RETRIES_EXHAUSTED", thermostatId, attempts };
}

/**
 * Format a DispatchError for logging.
 */
export function formatDispatchError(error: DispatchError): string {
  switch (error.type) {
    case "SEND_FAILED": {
      const target = error.entityId ? ` for ${error.entityId}` : "";
      return `Failed to send ${error.domain}.${error.service}${target}`;
    }
    case "NO_DEVICE_MAPPING":
      return `No device mapping for ${error.thermostatId}`;
    case "INVALID_DEVICE_NAME":
      return `Invalid device name '${error.deviceName}' for ${error.thermostatId}`;
    case "RETRIES_EXHAUSTED":
      return `Schedule publish to ${error.thermostatId} failed after ${error.attempts} attempts`;
  }
}
