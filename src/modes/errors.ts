/**
 * Modes Module - Error Types
 *
 * Distinguishes "already in that mode" from "invalid request" from
 * "application failed" so callers can map them to precise responses.
 */
import type { SystemMode } from "./schema.js";

export type ModeError =
  | { readonly type: "ALREADY_SET"; readonly mode: SystemMode }
  | { readonly type: "INVALID_REQUEST"; readonly message: string }
  | {
      readonly type: "PRECONDITION_FAILED";
      readonly mode: SystemMode;
      readonly message: string;
    }
  | {
      readonly type: "APPLY_FAILED";
      readonly mode: SystemMode;
      readonly message: string;
      readonly failures: number;
    }
  | { readonly type: "NOT_IN_TIMED_MODE"; readonly current: SystemMode };

export function alreadySet(mode: SystemMode): ModeError {
  return { type: "ALREADY_SET", mode };
}

export function invalidRequest(message: string): ModeError {
  return { type: "INVALID_REQUEST", message };
}

export function preconditionFailed(
  mode: SystemMode,
  message: string,
): ModeError {
  return { type: "PRECONDITION_FAILED", mode, message };
}

export function applyFailed(
  mode: SystemMode,
  message: string,
  failures: number,
): ModeError {
  return { type: "APPLY_FAILED", mode, message, failures };
}

export function notInTimedMode(current: SystemMode): ModeError {
  return { type: "NOT_IN_TIMED_MODE", current };
}

/**
 * Format a ModeError for logging and API responses.
 */
export function formatModeError(error: ModeError): string {
  switch (error.type) {
    case "ALREADY_SET":
      return `Mode is already ${error.mode}`;
    case "INVALID_REQUEST":
      return `Invalid request: ${error.message}`;
    case "PRECONDITION_FAILED":
      return `Cannot apply ${error.mode}: ${error.message}`;
    case "APPLY_FAILED":
      return `Failed to apply ${error.mode}: ${error.message}`;
    case "NOT_IN_TIMED_MODE":
      return `No timer to cancel in mode ${error.current}`;
  }
}
