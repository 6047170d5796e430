/**
 * Bridge Module - Error Types
 *
 * Reasons a bridge run ends with a failure. Errors are values, not
 * exceptions.
 */
import type { TransportError } from "../device/index.js";
import { formatTransportError } from "../device/index.js";
import type { PublishError } from "../mqtt/index.js";
import { formatPublishError } from "../mqtt/index.js";

export type BridgeError =
  | {
      readonly type: "TRANSPORT";
      readonly message: string;
      readonly cause: TransportError;
    }
  | {
      readonly type: "CONNECT";
      readonly message: string;
      readonly cause: PublishError;
    }
  | {
      readonly type: "SCHEDULER";
      readonly message: string;
      readonly cause?: Error;
    };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function transportFailed(cause: TransportError): BridgeError {
  return {
    type: "TRANSPORT",
    message: formatTransportError(cause),
    cause,
  };
}

export function connectFailed(cause: PublishError): BridgeError {
  return {
    type: "CONNECT",
    message: formatPublishError(cause),
    cause,
  };
}

export function schedulerFailed(error: unknown): BridgeError {
  if (error instanceof Error) {
    return { type: "SCHEDULER", message: error.message, cause: error };
  }
  return { type: "SCHEDULER", message: String(error) };
}

/**
 * Format a BridgeError for logging.
 */
export function formatBridgeError(error: BridgeError): string {
  switch (error.type) {
    case "TRANSPORT":
      return `Device transport failed: ${error.message}`;
    case "CONNECT":
      return `Broker connection failed: ${error.message}`;
    case "SCHEDULER":
      return `Publish loop failed: ${error.message}`;
  }
}
