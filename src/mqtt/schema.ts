/**
 * MQTT Module - Schemas and Types
 *
 * Shapes for the publish session: connection state, topics, payloads and
 * session options.
 */
import { z } from "zod";

// =============================================================================
// Quality of Service
// =============================================================================

export const QosSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export type QoS = z.infer<typeof QosSchema>;

// =============================================================================
// Connection State
// =============================================================================

/**
 * disconnected -> connecting -> connected, and back to disconnected on
 * close, connect error or explicit disconnect.
 */
export type ConnectionState = "disconnected" | "connecting" | "connected";

export type StateListener = (state: ConnectionState) => void;

// =============================================================================
// Topics and Payloads
// =============================================================================

/**
 * Topic namespace of one client: `<domain>/<client>` plus its status and
 * data topics.
 */
export type TopicNamespace = Readonly<{
  base: string;
  status: string;
  data: string;
}>;

export type PayloadValue = string | number | boolean | null | undefined;

/**
 * A flat JSON object. Undefined entries are dropped on serialization.
 */
export type MessagePayload = Readonly<Record<string, PayloadValue>>;

/**
 * Published retained on the status topic: as the last will (offline), as
 * the birth message (online), and on orderly shutdown (offline).
 */
export type StatusMessage = MessagePayload &
  Readonly<{
    client: string;
    online: boolean;
  }>;

// =============================================================================
// Session Options
// =============================================================================

export type PublishSessionOptions = Readonly<{
  brokerHost: string;
  brokerPort: number;
  clientName: string;
  domain: string;
  keepaliveSeconds: number;
  /** QoS of data messages; 0 when unset */
  dataQos?: QoS;
  /** Per-attempt CONNACK deadline of the client library */
  connectTimeoutMs?: number;
  reconnectPeriodMs: number;
  username?: string;
  password?: string;
  statusMessage: (online: boolean) => StatusMessage;
}>;

/** Status messages always go out at least once and stay on the broker. */
export const STATUS_QOS: QoS = 1;
export const DEFAULT_DATA_QOS: QoS = 0;
