/**
 * Discovery Module - Error Types
 *
 * Errors are values, not exceptions.
 */
import type { TransportError } from "../device/index.js";
import { formatTransportError } from "../device/index.js";

/**
 * The serial port or bus address cannot be determined.
 */
export type ConfigurationError =
  | {
      readonly type: "NO_DEVICE";
      readonly message: string;
    }
  | {
      readonly type: "MULTIPLE_DEVICES";
      readonly message: string;
      readonly candidates: ReadonlyArray<string>;
    }
  | {
      readonly type: "PORT_UNAVAILABLE";
      readonly message: string;
      readonly cause: TransportError;
    }
  | {
      readonly type: "ABORTED";
      readonly message: string;
    };

export function noDevice(message: string): ConfigurationError {
  return { type: "NO_DEVICE", message };
}

export function multipleDevices(
  message: string,
  candidates: ReadonlyArray<string>,
): ConfigurationError {
  return { type: "MULTIPLE_DEVICES", message, candidates };
}

export function portUnavailable(cause: TransportError): ConfigurationError {
  return {
    type: "PORT_UNAVAILABLE",
    message: formatTransportError(cause),
    cause,
  };
}

export function discoveryAborted(): ConfigurationError {
  return { type: "ABORTED", message: "Shutdown requested during discovery" };
}

/**
 * Format a ConfigurationError for logging.
 */
export function formatConfigurationError(error: ConfigurationError): string {
  switch (error.type) {
    case "NO_DEVICE":
      return `No device: ${error.message}`;
    case "MULTIPLE_DEVICES":
      return `Multiple devices: ${error.message}`;
    case "PORT_UNAVAILABLE":
      return `Probe port unavailable: ${error.message}`;
    case "ABORTED":
      return error.message;
  }
}
