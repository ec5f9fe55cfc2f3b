/**
 * Hub Module - Error Types
 *
 * Typed error union for hub connection operations.
 * Transport errors never cross the client boundary as exceptions.
 */

export type HubError =
  | {
      readonly type: "CONNECTION_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | { readonly type: "AUTH_REJECTED"; readonly message: string }
  | {
      readonly type: "UNEXPECTED_MESSAGE";
      readonly message: string;
      readonly expected: string;
      readonly received: string;
    }
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | { readonly type: "FETCH_FAILED"; readonly message: string }
  | { readonly type: "CLOSED"; readonly message: string };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function connectionFailed(message: string, cause?: Error): HubError {
  return cause !== undefined
    ? { type: "CONNECTION_FAILED", message, cause }
    : { type: "CONNECTION_FAILED", message };
}

export function authRejected(message: string): HubError {
  return { type: "AUTH_REJECTED", message };
}

export function unexpectedMessage(
  expected: string,
  received: string,
): HubError {
  return {
    type: "UNEXPECTED_MESSAGE",
    message: `Expected ${expected}, got ${received}`,
    expected,
    received,
  };
}

export function timeout(message: string, timeoutMs: number): HubError {
  return { type: "TIMEOUT", message, timeoutMs };
}

export function fetchFailed(message: string): HubError {
  return { type: "FETCH_FAILED", message };
}

export function closed(message: string): HubError {
  return { type: "CLOSED", message };
}

/**
 * Format error for logging/display.
 */
export function formatHubError(error: HubError): string {
  switch (error.type) {
    case "CONNECTION_FAILED":
      return `Hub connection failed: ${error.message}`;
    case "AUTH_REJECTED":
      return `Hub rejected credentials: ${error.message}`;
    case "UNEXPECTED_MESSAGE":
      return `Unexpected hub message: ${error.message}`;
    case "TIMEOUT":
      return `Hub handshake timeout after ${error.timeoutMs}ms: ${error.message}`;
    case "FETCH_FAILED":
      return `Initial state fetch failed: ${error.message}`;
    case "CLOSED":
      return `Hub connection closed: ${error.message}`;
  }
}
