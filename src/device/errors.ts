/**
 * Device Module - Error Types
 *
 * Typed error unions for serial transport and device reads.
 * Errors are values, not exceptions.
 */
import type { DecodeError } from "../registers/index.js";
import { formatDecodeError } from "../registers/index.js";

/**
 * Failures of the Modbus RTU transport.
 */
export type TransportError =
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly timeoutMs?: number;
    }
  | {
      readonly type: "CHECKSUM_MISMATCH";
      readonly message: string;
    }
  | {
      readonly type: "FRAMING_ERROR";
      readonly message: string;
    }
  | {
      readonly type: "DEVICE_EXCEPTION";
      readonly message: string;
      readonly exceptionCode: number;
    }
  | {
      readonly type: "PORT_ERROR";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * A failed read of one named register, with where it was read from.
 */
export type DeviceError =
  | {
      readonly type: "TRANSPORT_ERROR";
      readonly field: string;
      readonly address: number;
      readonly cause: TransportError;
    }
  | {
      readonly type: "DECODE_ERROR";
      readonly field: string;
      readonly address: number;
      readonly cause: DecodeError;
    }
  | {
      readonly type: "UNEXPECTED_VALUE";
      readonly field: string;
      readonly address: number;
      readonly message: string;
    };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function timeout(message: string, timeoutMs?: number): TransportError {
  return timeoutMs !== undefined
    ? { type: "TIMEOUT", message, timeoutMs }
    : { type: "TIMEOUT", message };
}

export function checksumMismatch(message: string): TransportError {
  return { type: "CHECKSUM_MISMATCH", message };
}

export function framingError(message: string): TransportError {
  return { type: "FRAMING_ERROR", message };
}

export function deviceException(
  message: string,
  exceptionCode: number,
): TransportError {
  return { type: "DEVICE_EXCEPTION", message, exceptionCode };
}

export function portError(message: string, cause?: Error): TransportError {
  return cause !== undefined
    ? { type: "PORT_ERROR", message, cause }
    : { type: "PORT_ERROR", message };
}

/**
 * Format a TransportError for logging.
 */
export function formatTransportError(error: TransportError): string {
  switch (error.type) {
    case "TIMEOUT":
      return error.timeoutMs !== undefined
        ? `Timeout after ${error.timeoutMs}ms: ${error.message}`
        : `Timeout: ${error.message}`;
    case "CHECKSUM_MISMATCH":
      return `Checksum mismatch: ${error.message}`;
    case "FRAMING_ERROR":
      return `Framing error: ${error.message}`;
    case "DEVICE_EXCEPTION":
      return `Device exception ${error.exceptionCode}: ${error.message}`;
    case "PORT_ERROR":
      return `Serial port error: ${error.message}`;
  }
}

/**
 * Format a DeviceError for logging.
 */
export function formatDeviceError(error: DeviceError): string {
  const where = `${error.field} @ 0x${error.address.toString(16).padStart(4, "0")}`;
  switch (error.type) {
    case "TRANSPORT_ERROR":
      return `${where}: ${formatTransportError(error.cause)}`;
    case "DECODE_ERROR":
      return `${where}: ${formatDecodeError(error.cause)}`;
    case "UNEXPECTED_VALUE":
      return `${where}: ${error.message}`;
  }
}
