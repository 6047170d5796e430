/**
 * MQTT Module - Public API
 *
 * Exports types, the publish session and topic helpers.
 */

// Types
export type {
  ConnectionState,
  MessagePayload,
  PayloadValue,
  PublishSessionOptions,
  QoS,
  StateListener,
  StatusMessage,
  TopicNamespace,
} from "./schema.js";
export type { PublishError } from "./errors.js";
export type { PublishSession } from "./service.js";

export { DEFAULT_DATA_QOS, QosSchema, STATUS_QOS } from "./schema.js";

// Error utilities
export { connectAborted, formatPublishError } from "./errors.js";

// Service functions (side effects)
export { createPublishSession } from "./service.js";

// Pure transformations
export { brokerUrl, buildTopics, serializePayload } from "./transform.js";
