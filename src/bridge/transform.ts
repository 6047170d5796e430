/**
 * Bridge Module - Pure Transformations
 *
 * Payloads published for the charge controller.
 */
import type { Config } from "../config.js";
import type { DeviceIdentity, TelemetryRecord } from "../device/index.js";
import type { DeviceLocation } from "../discovery/index.js";
import type { MessagePayload, StatusMessage } from "../mqtt/index.js";
import type { BridgeOptions } from "./schema.js";

/**
 * Status message for the status topic: client name, online flag and the
 * identity fields that could be read.
 *
 * @example
 * buildStatusMessage("shed", { model: "RNG-CTRL-RVR40" }, true)
 * // { client: "shed", online: true, model: "RNG-CTRL-RVR40" }
 */
export function buildStatusMessage(
  clientName: string,
  identity: DeviceIdentity,
  online: boolean,
): StatusMessage {
  return { client: clientName, online, ...identity };
}

/**
 * Flatten a telemetry record into the data payload, timestamp first.
 */
export function toDataPayload(record: TelemetryRecord): MessagePayload {
  return { timestamp: record.timestamp, ...record.fields };
}

/**
 * Number of telemetry fields present in a record.
 */
export function countFields(record: TelemetryRecord): number {
  return Object.keys(record.fields).length;
}

/**
 * Bridge options from validated configuration and the located device.
 */
export function toBridgeOptions(
  config: Config,
  location: DeviceLocation,
): BridgeOptions {
  return {
    clientName: config.MQTT_CLIENT_NAME,
    domain: config.MQTT_TOPIC_DOMAIN,
    dataQos: config.MQTT_QOS,
    intervalMs: config.PUBLISH_INTERVAL_SECONDS * 1000,
    broker: {
      host: config.MQTT_BROKER_HOST,
      port: config.MQTT_BROKER_PORT,
      keepaliveSeconds: config.MQTT_KEEPALIVE_SECONDS,
      connectTimeoutMs: config.MQTT_CONNECT_TIMEOUT_MS,
      reconnectPeriodMs: config.MQTT_RECONNECT_PERIOD_MS,
      ...(config.MQTT_USERNAME !== undefined
        ? { username: config.MQTT_USERNAME }
        : {}),
      ...(config.MQTT_PASSWORD !== undefined
        ? { password: config.MQTT_PASSWORD }
        : {}),
    },
    serial: {
      path: location.path,
      baudRate: config.SERIAL_BAUD_RATE,
      unitId: location.unitId,
      timeoutMs: config.MODBUS_TIMEOUT_MS,
    },
  };
}
