/**
 * MQTT Module - Service Layer
 *
 * One broker connection that publishes a client's status and data.
 *
 * The last will (offline) is registered with the CONNECT packet, and the
 * birth message (online) is the first publish after every CONNACK, so a
 * subscriber of the status topic always sees the latest truth. Messages
 * published while disconnected are refused, not queued.
 */
import mqtt from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  type PublishError,
  connectAborted,
  connectFailed,
  connectTimeout,
  notConnected,
  publishFailed,
} from "./errors.js";
import type {
  ConnectionState,
  MessagePayload,
  PublishSessionOptions,
  QoS,
  StateListener,
  TopicNamespace,
} from "./schema.js";
import { DEFAULT_DATA_QOS, STATUS_QOS } from "./schema.js";
import { brokerUrl, buildTopics, serializePayload } from "./transform.js";

const log = createLogger("mqtt");

export type PublishSession = Readonly<{
  topics: TopicNamespace;
  getState(): ConnectionState;
  /** Returns a function that removes the listener. */
  onStateChange(listener: StateListener): () => void;
  connect(): Result<true, PublishError>;
  /** Resolves early with CONNECT_ABORTED once `signal` aborts. */
  waitForConnection(
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<Result<true, PublishError>>;
  publish(
    payload: MessagePayload,
    topic: string,
    qos: QoS,
    retain: boolean,
  ): Promise<Result<true, PublishError>>;
  publishStatus(online: boolean): Promise<Result<true, PublishError>>;
  publishData(payload: MessagePayload): Promise<Result<true, PublishError>>;
  disconnect(): Promise<void>;
}>;

/**
 * Create a publish session. Nothing touches the network until connect().
 */
export function createPublishSession(
  options: PublishSessionOptions,
): PublishSession {
  const topics = buildTopics(options.domain, options.clientName);
  const dataQos = options.dataQos ?? DEFAULT_DATA_QOS;
  const listeners = new Set<StateListener>();

  let client: MqttClient | null = null;
  let state: ConnectionState = "disconnected";
  let closing = false;

  function setState(next: ConnectionState): void {
    if (state === next) return;
    log.debug({ from: state, to: next }, "Connection state changed");
    state = next;
    for (const listener of listeners) {
      listener(next);
    }
  }

  // ===========================================================================
  // Publishing
  // ===========================================================================

  function publish(
    payload: MessagePayload,
    topic: string,
    qos: QoS,
    retain: boolean,
  ): Promise<Result<true, PublishError>> {
    if (client === null || state !== "connected") {
      log.error({ topic, state }, "Cannot publish: not connected to broker");
      return Promise.resolve(err(notConnected(topic)));
    }

    const activeClient = client;
    const message = serializePayload(payload);

    return new Promise((resolve) => {
      activeClient.publish(topic, message, { qos, retain }, (error) => {
        if (error) {
          log.error(
            { topic, qos, retain, error: error.message },
            "Publish failed",
          );
          resolve(err(publishFailed(topic, error.message, error)));
          return;
        }
        log.debug({ topic, qos, retain, bytes: message.length }, "Published");
        resolve(ok(true));
      });
    });
  }

  function publishStatus(
    online: boolean,
  ): Promise<Result<true, PublishError>> {
    return publish(
      options.statusMessage(online),
      topics.status,
      STATUS_QOS,
      true,
    );
  }

  function publishData(
    payload: MessagePayload,
  ): Promise<Result<true, PublishError>> {
    return publish(payload, topics.data, dataQos, false);
  }

  async function publishBirth(): Promise<void> {
    const result = await publishStatus(true);
    if (result.isOk()) {
      log.info({ topic: topics.status }, "Birth message published");
    }
  }

  // ===========================================================================
  // Connection Lifecycle
  // ===========================================================================

  function setupClientHandlers(mqttClient: MqttClient): void {
    mqttClient.on("connect", () => {
      log.info({ statusTopic: topics.status }, "Connected to MQTT broker");
      // Birth goes out before listeners run so no data can precede it.
      state = "connected";
      void publishBirth();
      for (const listener of listeners) {
        listener("connected");
      }
    });

    mqttClient.on("reconnect", () => {
      log.info("Reconnecting to MQTT broker...");
      setState("connecting");
    });

    mqttClient.on("close", () => {
      if (state !== "disconnected" && !closing) {
        log.warn("MQTT connection closed");
      }
      setState("disconnected");
    });

    mqttClient.on("offline", () => {
      log.warn("MQTT client offline");
    });

    mqttClient.on("error", (error) => {
      const code = "code" in error ? error.code : undefined;
      log.error({ error: error.message, code }, "MQTT client error");
      if (state === "connecting") {
        setState("disconnected");
      }
    });
  }

  function connect(): Result<true, PublishError> {
    if (state !== "disconnected" || client !== null) {
      log.warn({ state }, "MQTT session already connecting or connected");
      return ok(true);
    }

    const url = brokerUrl(options.brokerHost, options.brokerPort);
    const will = options.statusMessage(false);

    const clientOptions: IClientOptions = {
      clientId: options.clientName,
      keepalive: options.keepaliveSeconds,
      reconnectPeriod: options.reconnectPeriodMs,
      queueQoSZero: false,
      clean: true,
      will: {
        topic: topics.status,
        payload: Buffer.from(serializePayload(will)),
        qos: STATUS_QOS,
        retain: true,
      },
      ...(options.connectTimeoutMs !== undefined
        ? { connectTimeout: options.connectTimeoutMs }
        : {}),
      ...(options.username !== undefined ? { username: options.username } : {}),
      ...(options.password !== undefined ? { password: options.password } : {}),
    };

    log.info(
      { broker: url, clientId: options.clientName, statusTopic: topics.status },
      "Connecting to MQTT broker...",
    );

    let created: MqttClient;
    try {
      created = mqtt.connect(url, clientOptions);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      log.error(
        { broker: url, error: cause.message },
        "Failed to create MQTT client",
      );
      return err(connectFailed(cause.message, cause));
    }

    client = created;
    setupClientHandlers(created);
    setState("connecting");
    return ok(true);
  }

  function waitForConnection(
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<Result<true, PublishError>> {
    if (state === "connected") {
      return Promise.resolve(ok(true));
    }
    if (signal?.aborted) {
      return Promise.resolve(err(connectAborted()));
    }

    return new Promise((resolve) => {
      function settle(result: Result<true, PublishError>): void {
        clearTimeout(timer);
        listeners.delete(onState);
        signal?.removeEventListener("abort", onAbort);
        resolve(result);
      }

      const timer = setTimeout(() => {
        log.error({ timeoutMs }, "MQTT broker not reachable in time");
        settle(err(connectTimeout(timeoutMs)));
      }, timeoutMs);

      function onState(next: ConnectionState): void {
        if (next === "connected") settle(ok(true));
      }

      function onAbort(): void {
        log.info("Stopped waiting for the MQTT broker");
        settle(err(connectAborted()));
      }

      listeners.add(onState);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Publish the offline status and close the connection. A graceful
   * DISCONNECT makes the broker discard the last will.
   */
  async function disconnect(): Promise<void> {
    const activeClient = client;
    if (activeClient === null) {
      setState("disconnected");
      return;
    }

    log.info("Disconnecting MQTT client...");

    const graceful = state === "connected";
    if (graceful) {
      const result = await publishStatus(false);
      if (result.isOk()) {
        log.info({ topic: topics.status }, "Offline status published");
      }
    }

    closing = true;
    await new Promise<void>((resolve) => {
      activeClient.end(!graceful, () => resolve());
    });
    closing = false;

    client = null;
    setState("disconnected");
    log.info("MQTT client disconnected");
  }

  return {
    topics,
    getState: () => state,
    onStateChange(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    connect,
    waitForConnection,
    publish,
    publishStatus,
    publishData,
    disconnect,
  };
}
