/**
 * Device Module - Public API
 *
 * Exports types, the serial transport and the device session.
 */

// Types
export type {
  AddressableTransport,
  DeviceIdentity,
  DeviceSessionOptions,
  RegisterTransport,
  SerialTransportOptions,
  TelemetryField,
  TelemetryRecord,
} from "./schema.js";
export type { DeviceError, TransportError } from "./errors.js";
export type { DeviceSession } from "./service.js";

export { CONTROLLER_TYPES, TELEMETRY_FIELDS } from "./schema.js";

// Error utilities
export {
  checksumMismatch,
  deviceException,
  formatDeviceError,
  formatTransportError,
  framingError,
  portError,
  timeout,
} from "./errors.js";

// Service functions (side effects)
export { createDeviceSession } from "./service.js";
export { openModbusTransport } from "./transport.js";

// Pure transformations
export {
  buildTelemetryRecord,
  classifyTransportError,
  controllerTypeName,
} from "./transform.js";
