/**
 * Discovery Module - Service Layer
 *
 * Finds the serial adapter and the controller's bus address when they are
 * not configured.
 */
import { type Result, err, ok } from "neverthrow";
import { SerialPort } from "serialport";

import {
  type AddressableTransport,
  openModbusTransport,
} from "../device/index.js";
import {
  createLogger,
  describeError,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type ConfigurationError,
  discoveryAborted,
  formatConfigurationError,
  noDevice,
  portUnavailable,
} from "./errors.js";
import type {
  DeviceLocation,
  DiscoveryOptions,
  ListedPort,
  ProbeRange,
} from "./schema.js";
import { DEFAULT_PROBE_RANGE, PROBE_REGISTERS } from "./schema.js";
import { matchAdapter, selectSingle } from "./transform.js";

const log = createLogger("discovery");

function listSerialPorts(): Promise<ReadonlyArray<ListedPort>> {
  return SerialPort.list();
}

/**
 * Use the configured port, or the single known USB adapter plugged in.
 */
export async function resolveSerialPort(
  configured: string | undefined,
  listPorts: () => Promise<ReadonlyArray<ListedPort>> = listSerialPorts,
): Promise<Result<string, ConfigurationError>> {
  if (configured !== undefined) {
    log.info({ path: configured }, "Using configured serial port");
    return ok(configured);
  }

  let ports: ReadonlyArray<ListedPort>;
  try {
    ports = await listPorts();
  } catch (error) {
    const message = describeError(error);
    log.error({ error: message }, "Cannot list serial ports");
    return err(noDevice(`Cannot list serial ports: ${message}`));
  }

  const adapters = ports.filter((port) => matchAdapter(port) !== null);
  log.debug(
    { listed: ports.length, matched: adapters.map((port) => port.path) },
    "Serial ports listed",
  );

  return selectSingle(adapters, "USB serial adapters", (port) => port.path).map(
    (port) => {
      log.info(
        { path: port.path, adapter: matchAdapter(port)?.name },
        "USB serial adapter found",
      );
      return port.path;
    },
  );
}

async function answers(transport: AddressableTransport): Promise<boolean> {
  for (const register of PROBE_REGISTERS) {
    const result = await transport.readRegisters(
      register.address,
      register.count,
    );
    if (result.isOk()) return true;
  }
  return false;
}

/**
 * Probe every address in `range` and require exactly one to answer.
 * Leaves the transport addressed at the last probed unit. An abort of
 * `signal` ends the probe before the next address.
 */
export async function findDeviceAddress(
  transport: AddressableTransport,
  range: ProbeRange = DEFAULT_PROBE_RANGE,
  signal?: AbortSignal,
): Promise<Result<number, ConfigurationError>> {
  log.info(range, "Probing bus addresses...");

  const found: number[] = [];
  for (let unitId = range.from; unitId <= range.to; unitId++) {
    if (signal?.aborted) {
      log.info({ unitId }, "Bus probe stopped");
      return err(discoveryAborted());
    }
    transport.setUnitId(unitId);
    if (await answers(transport)) {
      log.info({ unitId }, "Device answered");
      found.push(unitId);
    }
  }

  return selectSingle(found, "responding bus addresses", String);
}

/**
 * Resolve where the controller is: serial port and bus address, each taken
 * from configuration when set and discovered otherwise.
 */
export async function locateDevice(
  options: DiscoveryOptions,
): Promise<Result<DeviceLocation, ConfigurationError>> {
  const startTime = Date.now();
  logOperationStart(log, "locateDevice", {
    serialPort: options.serialPort ?? "auto",
    deviceAddress: options.deviceAddress ?? "auto",
  });

  const result = await locate(options);

  if (result.isOk()) {
    logOperationComplete(log, "locateDevice", startTime, result.value);
  } else if (result.error.type === "ABORTED") {
    log.info(result.error.message);
  } else {
    logOperationFailed(
      log,
      "locateDevice",
      formatConfigurationError(result.error),
    );
  }
  return result;
}

async function locate(
  options: DiscoveryOptions,
): Promise<Result<DeviceLocation, ConfigurationError>> {
  const path = await resolveSerialPort(options.serialPort, options.listPorts);
  if (path.isErr()) {
    return err(path.error);
  }

  if (options.deviceAddress !== undefined) {
    return ok({ path: path.value, unitId: options.deviceAddress });
  }

  if (options.signal?.aborted) {
    return err(discoveryAborted());
  }

  const range = options.range ?? DEFAULT_PROBE_RANGE;
  const openTransport = options.openTransport ?? openModbusTransport;
  const opened = await openTransport({
    path: path.value,
    baudRate: options.baudRate,
    unitId: range.from,
    timeoutMs: options.probeTimeoutMs,
  });
  if (opened.isErr()) {
    return err(portUnavailable(opened.error));
  }

  try {
    const address = await findDeviceAddress(
      opened.value,
      range,
      options.signal,
    );
    return address.map((unitId) => ({ path: path.value, unitId }));
  } finally {
    await opened.value.close();
  }
}
