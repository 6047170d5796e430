/**
 * Discovery Module - Public API
 */

// Types
export type {
  DeviceLocation,
  DiscoveryOptions,
  ListedPort,
  ProbeRange,
  UsbAdapter,
} from "./schema.js";
export type { ConfigurationError } from "./errors.js";

export { DEFAULT_PROBE_RANGE, PROBE_REGISTERS, USB_ADAPTERS } from "./schema.js";

// Error utilities
export { formatConfigurationError } from "./errors.js";

// Service functions (side effects)
export {
  findDeviceAddress,
  locateDevice,
  resolveSerialPort,
} from "./service.js";

// Pure transformations
export { matchAdapter, selectSingle } from "./transform.js";
