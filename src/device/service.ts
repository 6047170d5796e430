/**
 * Device Module - Service Layer
 *
 * Named reads against one addressed charge controller. Each read is a
 * register map lookup, one transport read and one decode. Nothing here is
 * retried; the next scheduler tick is the retry.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  type DecodedValue,
  type RegisterName,
  decodeRegisters,
  getRegisterSpec,
} from "../registers/index.js";
import { type DeviceError, formatDeviceError } from "./errors.js";
import type {
  DeviceIdentity,
  DeviceSessionOptions,
  RegisterTransport,
  TelemetryField,
  TelemetryRecord,
} from "./schema.js";
import { TELEMETRY_FIELDS } from "./schema.js";
import { buildTelemetryRecord, controllerTypeName } from "./transform.js";

const log = createLogger("device");

export type DeviceSession = Readonly<{
  read(name: RegisterName): Promise<Result<DecodedValue, DeviceError>>;
  readNumber(name: RegisterName): Promise<Result<number, DeviceError>>;
  readText(name: RegisterName): Promise<Result<string, DeviceError>>;
  getData(): Promise<TelemetryRecord>;
  getIdentity(): Promise<DeviceIdentity>;
  close(): Promise<void>;
}>;

/**
 * Create a session over an open transport.
 */
export function createDeviceSession(
  transport: RegisterTransport,
  options: DeviceSessionOptions = {},
): DeviceSession {
  const now = options.now ?? (() => new Date());

  async function read(
    name: RegisterName,
  ): Promise<Result<DecodedValue, DeviceError>> {
    const spec = getRegisterSpec(name);

    const words = await transport.readRegisters(spec.address, spec.wordCount);
    if (words.isErr()) {
      const failure: DeviceError = {
        type: "TRANSPORT_ERROR",
        field: name,
        address: spec.address,
        cause: words.error,
      };
      return err(failure);
    }

    return decodeRegisters(spec, words.value).mapErr(
      (cause): DeviceError => ({
        type: "DECODE_ERROR",
        field: name,
        address: spec.address,
        cause,
      }),
    );
  }

  async function readNumber(
    name: RegisterName,
  ): Promise<Result<number, DeviceError>> {
    const value = await read(name);
    return value.andThen((decoded) =>
      typeof decoded === "number"
        ? ok(decoded)
        : err(unexpected(name, `expected a number, got "${decoded}"`)),
    );
  }

  async function readText(
    name: RegisterName,
  ): Promise<Result<string, DeviceError>> {
    const value = await read(name);
    return value.andThen((decoded) =>
      typeof decoded === "string"
        ? ok(decoded)
        : err(unexpected(name, `expected text, got ${decoded}`)),
    );
  }

  /**
   * Read every telemetry field in order. A field that fails is logged and
   * left out of the record; the rest are still published.
   */
  async function getData(): Promise<TelemetryRecord> {
    const capturedAt = now();
    const values: Array<readonly [TelemetryField, number]> = [];

    for (const field of TELEMETRY_FIELDS) {
      const result = await readNumber(field);
      if (result.isOk()) {
        values.push([field, result.value]);
      } else {
        logFieldFailure(result.error);
      }
    }

    const record = buildTelemetryRecord(capturedAt, values);

    log.debug(
      {
        read: values.length,
        omitted: TELEMETRY_FIELDS.length - values.length,
      },
      "Telemetry collected",
    );

    return record;
  }

  /**
   * Read the controller's identity and ratings, omitting fields that fail.
   */
  async function getIdentity(): Promise<DeviceIdentity> {
    const model = valueOf(await readText("model"));
    const serialNumber = valueOf(await readNumber("serial_number"));
    const softwareVersion = valueOf(await readText("software_version"));
    const hardwareVersion = valueOf(await readText("hardware_version"));
    const voltageRating = valueOf(await readNumber("voltage_rating"));
    const currentRating = valueOf(await readNumber("current_rating"));
    const dischargeRating = valueOf(await readNumber("discharge_rating"));
    const controllerType = valueOf(await readNumber("controller_type"));

    const identity: DeviceIdentity = {
      ...(model !== undefined ? { model } : {}),
      ...(serialNumber !== undefined ? { serial_number: serialNumber } : {}),
      ...(softwareVersion !== undefined
        ? { software_version: softwareVersion }
        : {}),
      ...(hardwareVersion !== undefined
        ? { hardware_version: hardwareVersion }
        : {}),
      ...(voltageRating !== undefined ? { voltage_rating: voltageRating } : {}),
      ...(currentRating !== undefined ? { current_rating: currentRating } : {}),
      ...(dischargeRating !== undefined
        ? { discharge_rating: dischargeRating }
        : {}),
      ...(controllerType !== undefined
        ? { type: controllerTypeName(controllerType) }
        : {}),
    };

    log.info(identity, "Controller identity read");

    return identity;
  }

  return {
    read,
    readNumber,
    readText,
    getData,
    getIdentity,
    close: () => transport.close(),
  };
}

function unexpected(name: RegisterName, message: string): DeviceError {
  return {
    type: "UNEXPECTED_VALUE",
    field: name,
    address: getRegisterSpec(name).address,
    message,
  };
}

/**
 * Unwrap a field read, logging and dropping it on failure.
 */
function valueOf<T>(result: Result<T, DeviceError>): T | undefined {
  if (result.isErr()) {
    logFieldFailure(result.error);
    return undefined;
  }
  return result.value;
}

function logFieldFailure(error: DeviceError): void {
  log.warn(
    {
      field: error.field,
      address: error.address,
      errorType: error.type,
      cause:
        error.type === "UNEXPECTED_VALUE" ? error.message : error.cause.type,
    },
    `Field omitted: ${formatDeviceError(error)}`,
  );
}
