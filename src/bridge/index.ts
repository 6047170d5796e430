/**
 * Bridge Module - Public API
 */

// Types
export type {
  BridgeDeps,
  BridgeOptions,
  BrokerOptions,
  ChargeControllerBridgeOptions,
  DeviceBridge,
} from "./schema.js";
export type { BridgeError } from "./errors.js";

// Error utilities
export { formatBridgeError } from "./errors.js";

// Service functions (side effects)
export {
  createChargeControllerBridge,
  runBridge,
  withPublishSession,
} from "./service.js";

// Pure transformations
export {
  buildStatusMessage,
  countFields,
  toBridgeOptions,
  toDataPayload,
} from "./transform.js";
