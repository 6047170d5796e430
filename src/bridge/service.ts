/**
 * Bridge Module - Service Layer
 *
 * Composition root of one bridge run: serial transport, device session,
 * publish session and scheduler, with their teardown on every exit path.
 */
import { type Result, err, ok } from "neverthrow";

import {
  createDeviceSession,
  openModbusTransport,
} from "../device/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type PublishError,
  type PublishSession,
  connectAborted,
  createPublishSession,
} from "../mqtt/index.js";
import { runPeriodically } from "../scheduler/index.js";
import {
  type BridgeError,
  connectFailed,
  schedulerFailed,
  transportFailed,
} from "./errors.js";
import type {
  BridgeDeps,
  BridgeOptions,
  ChargeControllerBridgeOptions,
  DeviceBridge,
} from "./schema.js";
import { buildStatusMessage, countFields, toDataPayload } from "./transform.js";

const log = createLogger("bridge");

/**
 * Bridge a charge controller to a publisher.
 */
export function createChargeControllerBridge(
  options: ChargeControllerBridgeOptions,
): DeviceBridge {
  const { clientName, identity, device, publisher } = options;

  return {
    statusMessage: (online) => buildStatusMessage(clientName, identity, online),

    async publishData() {
      const record = await device.getData();
      const fields = countFields(record);

      const result = await publisher.publishData(toDataPayload(record));
      if (result.isOk()) {
        log.info(
          { timestamp: record.timestamp, fields },
          "Telemetry published",
        );
      }
    },
  };
}

export type SessionRunOptions = Readonly<{
  connectTimeoutMs: number;
  signal?: AbortSignal;
}>;

/**
 * Connect, wait for the broker, run `fn`, and always disconnect afterwards.
 * An abort before the broker answers ends the wait with CONNECT_ABORTED.
 *
 * @returns the value of `fn`, or the connect failure
 */
export async function withPublishSession<T>(
  session: PublishSession,
  options: SessionRunOptions,
  fn: () => Promise<T>,
): Promise<Result<T, PublishError>> {
  if (options.signal?.aborted) {
    return err(connectAborted());
  }

  try {
    const started = session.connect();
    if (started.isErr()) {
      return err(started.error);
    }

    const ready = await session.waitForConnection(
      options.connectTimeoutMs,
      options.signal,
    );
    if (ready.isErr()) {
      return err(ready.error);
    }

    return ok(await fn());
  } finally {
    await session.disconnect();
  }
}

/**
 * Run the bridge until `deps.signal` aborts.
 *
 * Identity is read once, before connecting, so the last will already
 * carries it. An abort at any point before the first tick ends the run
 * without contacting the broker, or without waiting for it any longer.
 */
export async function runBridge(
  options: BridgeOptions,
  deps: BridgeDeps,
): Promise<Result<void, BridgeError>> {
  const openTransport = deps.openTransport ?? openModbusTransport;
  const createSession = deps.createSession ?? createPublishSession;
  const startTime = Date.now();

  logOperationStart(log, "runBridge", {
    clientName: options.clientName,
    port: options.serial.path,
    unitId: options.serial.unitId,
  });

  if (deps.signal.aborted) {
    log.info("Shutdown requested before start, not opening the port");
    return ok(undefined);
  }

  const opened = await openTransport(options.serial);
  if (opened.isErr()) {
    logOperationFailed(log, "runBridge", opened.error.message);
    return err(transportFailed(opened.error));
  }

  const device = createDeviceSession(opened.value);

  try {
    const identity = await device.getIdentity();
    if (deps.signal.aborted) {
      log.info("Shutdown requested before connecting to the broker");
      return ok(undefined);
    }

    const session = createSession({
      brokerHost: options.broker.host,
      brokerPort: options.broker.port,
      clientName: options.clientName,
      domain: options.domain,
      keepaliveSeconds: options.broker.keepaliveSeconds,
      dataQos: options.dataQos,
      connectTimeoutMs: options.broker.connectTimeoutMs,
      reconnectPeriodMs: options.broker.reconnectPeriodMs,
      ...(options.broker.username !== undefined
        ? { username: options.broker.username }
        : {}),
      ...(options.broker.password !== undefined
        ? { password: options.broker.password }
        : {}),
      statusMessage: (online) =>
        buildStatusMessage(options.clientName, identity, online),
    });

    const bridge = createChargeControllerBridge({
      clientName: options.clientName,
      identity,
      device,
      publisher: session,
    });

    const outcome = await withPublishSession(
      session,
      { connectTimeoutMs: options.broker.connectTimeoutMs, signal: deps.signal },
      () =>
        runPeriodically(
          () => bridge.publishData(),
          {
            intervalMs: options.intervalMs,
            signal: deps.signal,
            ...(deps.clock !== undefined ? { clock: deps.clock } : {}),
          },
        ),
    );

    if (outcome.isErr() && outcome.error.type === "CONNECT_ABORTED") {
      logOperationComplete(log, "runBridge", startTime, { reason: "aborted" });
      return ok(undefined);
    }
    if (outcome.isErr()) {
      logOperationFailed(log, "runBridge", outcome.error.message);
      return err(connectFailed(outcome.error));
    }

    logOperationComplete(log, "runBridge", startTime, {
      reason: outcome.value,
    });
    return ok(undefined);
  } catch (error) {
    logOperationFailed(log, "runBridge", error);
    return err(schedulerFailed(error));
  } finally {
    await device.close();
  }
}
