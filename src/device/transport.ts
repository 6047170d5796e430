/**
 * Device Module - Serial Transport
 *
 * Modbus RTU over a serial port via modbus-serial. Framing, CRC and the
 * request/response cycle belong to the library; this adapter turns its
 * exceptions into TransportError values.
 */
import ModbusRTU from "modbus-serial";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { type TransportError, portError } from "./errors.js";
import type { AddressableTransport, SerialTransportOptions } from "./schema.js";
import { classifyTransportError } from "./transform.js";

const log = createLogger("device");

type ModbusClient = InstanceType<typeof ModbusRTU>;

/**
 * Open the serial port and address the given unit.
 *
 * @returns Result with the transport, or PORT_ERROR if the port cannot be opened
 */
export async function openModbusTransport(
  options: SerialTransportOptions,
): Promise<Result<AddressableTransport, TransportError>> {
  const client = new ModbusRTU();

  log.info(
    { path: options.path, baudRate: options.baudRate, unitId: options.unitId },
    "Opening serial port...",
  );

  try {
    await client.connectRTUBuffered(options.path, {
      baudRate: options.baudRate,
    });
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    log.error(
      { path: options.path, error: cause.message },
      "Failed to open serial port",
    );
    return err(portError(`Cannot open ${options.path}: ${cause.message}`, cause));
  }

  client.setID(options.unitId);
  client.setTimeout(options.timeoutMs);

  return ok(wrapClient(client, options.timeoutMs));
}

function wrapClient(
  client: ModbusClient,
  timeoutMs: number,
): AddressableTransport {
  return {
    async readRegisters(address, count) {
      try {
        const response = await client.readHoldingRegisters(address, count);
        return ok(response.data);
      } catch (error) {
        return err(classifyTransportError(error, timeoutMs));
      }
    },

    setUnitId(unitId) {
      client.setID(unitId);
    },

    close() {
      return new Promise<void>((resolve) => {
        if (!client.isOpen) {
          resolve();
          return;
        }
        client.close(() => {
          log.info("Serial port closed");
          resolve();
        });
      });
    },
  };
}
