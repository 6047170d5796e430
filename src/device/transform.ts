/**
 * Device Module - Pure Transformations
 *
 * Classifies transport failures and assembles telemetry records.
 * No side effects, no I/O - just data in, data out.
 */
import type { TransportError } from "./errors.js";
import {
  checksumMismatch,
  deviceException,
  framingError,
  portError,
  timeout,
} from "./errors.js";
import type { TelemetryField, TelemetryRecord } from "./schema.js";
import { CONTROLLER_TYPES } from "./schema.js";

// =============================================================================
// Transport Error Classification
// =============================================================================

const FRAMING_PATTERN = /data length|unexpected data|bad response|buffer/i;

/**
 * Map an error thrown by the Modbus client to a TransportError.
 *
 * The client signals timeouts through `errno: "ETIMEDOUT"`, device exception
 * responses through a numeric `modbusCode`, and CRC failures by message.
 */
export function classifyTransportError(
  error: unknown,
  timeoutMs?: number,
): TransportError {
  const cause = error instanceof Error ? error : new Error(String(error));
  const errno =
    typeof error === "object" && error !== null && "errno" in error
      ? error.errno
      : undefined;
  const modbusCode =
    typeof error === "object" && error !== null && "modbusCode" in error
      ? error.modbusCode
      : undefined;

  if (cause.name === "TransactionTimedOutError" || errno === "ETIMEDOUT") {
    return timeout(cause.message, timeoutMs);
  }

  if (typeof modbusCode === "number") {
    return deviceException(cause.message, modbusCode);
  }

  if (/crc/i.test(cause.message)) {
    return checksumMismatch(cause.message);
  }

  if (FRAMING_PATTERN.test(cause.message)) {
    return framingError(cause.message);
  }

  return portError(cause.message, cause);
}

// =============================================================================
// Telemetry
// =============================================================================

/**
 * Build an immutable telemetry record. Field order follows `values`.
 */
export function buildTelemetryRecord(
  capturedAt: Date,
  values: ReadonlyArray<readonly [TelemetryField, number]>,
): TelemetryRecord {
  const fields: Partial<Record<TelemetryField, number>> = {};
  for (const [field, value] of values) {
    fields[field] = value;
  }

  return Object.freeze({
    timestamp: capturedAt.toISOString(),
    fields: Object.freeze(fields),
  });
}

// =============================================================================
// Identity
// =============================================================================

/**
 * Name of a product type code.
 *
 * @example
 * controllerTypeName(0) // "controller"
 * controllerTypeName(7) // "code:7"
 */
export function controllerTypeName(code: number): string {
  return CONTROLLER_TYPES[code] ?? `code:${code}`;
}
