/**
 * MQTT Module - Pure Transformations
 *
 * Topic names and payload encoding.
 * No side effects, no I/O - just data in, data out.
 */
import type { MessagePayload, TopicNamespace } from "./schema.js";

/**
 * Build the topic namespace for a client.
 *
 * @example
 * buildTopics("solar", "shed").data // "solar/shed/data"
 */
export function buildTopics(domain: string, clientName: string): TopicNamespace {
  const base = `${domain}/${clientName}`;
  return Object.freeze({
    base,
    status: `${base}/status`,
    data: `${base}/data`,
  });
}

/**
 * Serialize a payload as JSON. Undefined entries are left out.
 */
export function serializePayload(payload: MessagePayload): string {
  return JSON.stringify(payload);
}

/**
 * Broker URL for a plain TCP connection.
 */
export function brokerUrl(host: string, port: number): string {
  return `mqtt://${host}:${port}`;
}
