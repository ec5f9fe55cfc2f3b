/**
 * Zones Module - Error Types
 */

export type ZoneError =
  | { readonly type: "ZONE_NOT_FOUND"; readonly zoneId: string }
  | {
      readonly type: "LOAD_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    };

export function zoneNotFound(zoneId: string): ZoneError {
  return { type: "ZONE_NOT_FOUND", zoneId };
}

export function loadFailed(
  path: string,
  message: string,
  cause?: Error,
): ZoneError {
  if (cause) {
    return { type: "LOAD_FAILED", path, message, cause };
  }
  return { type: "LOAD_FAILED", path, message };
}

export function formatZoneError(error: ZoneError): string {
  switch (error.type) {
    case "ZONE_NOT_FOUND":
      return `Zone '${error.zoneId}' not found`;
    case "LOAD_FAILED":
      return `Failed to load ${error.path}: ${error.message}`;
  }
}
