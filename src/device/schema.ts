/**
 * Device Module - Schemas and Types
 *
 * Shapes for telemetry and identity read from the charge controller, and the
 * transport contract the device session reads through.
 */
import type { Result } from "neverthrow";

import type { RegisterName } from "../registers/index.js";
import type { TransportError } from "./errors.js";

// =============================================================================
// Register Transport
// =============================================================================

/**
 * Reads holding registers from one addressed device.
 */
export type RegisterTransport = Readonly<{
  readRegisters(
    address: number,
    count: number,
  ): Promise<Result<ReadonlyArray<number>, TransportError>>;
  close(): Promise<void>;
}>;

/**
 * A transport whose bus address can be changed, used while probing.
 */
export type AddressableTransport = RegisterTransport &
  Readonly<{
    setUnitId(unitId: number): void;
  }>;

export type SerialTransportOptions = Readonly<{
  path: string;
  baudRate: number;
  unitId: number;
  timeoutMs: number;
}>;

// =============================================================================
// Telemetry
// =============================================================================

/**
 * Numeric fields collected on every tick, in publish order.
 */
export const TELEMETRY_FIELDS = [
  "solar_voltage",
  "solar_current",
  "solar_power",
  "load_voltage",
  "load_current",
  "load_power",
  "battery_voltage",
  "battery_state_of_charge",
  "battery_temperature",
  "controller_temperature",
  "maximum_solar_power_today",
  "minimum_solar_power_today",
  "maximum_battery_voltage_today",
  "minimum_battery_voltage_today",
] as const satisfies ReadonlyArray<RegisterName>;

export type TelemetryField = (typeof TELEMETRY_FIELDS)[number];

/**
 * One sample of the controller. Fields that could not be read are absent.
 */
export type TelemetryRecord = Readonly<{
  /** ISO-8601 capture time */
  timestamp: string;
  fields: Readonly<Partial<Record<TelemetryField, number>>>;
}>;

// =============================================================================
// Identity
// =============================================================================

/**
 * Static description of the controller, read once per run.
 * Fields that could not be read are absent.
 */
export type DeviceIdentity = Readonly<{
  model?: string;
  serial_number?: number;
  software_version?: string;
  hardware_version?: string;
  voltage_rating?: number;
  current_rating?: number;
  discharge_rating?: number;
  type?: string;
}>;

/**
 * Product type codes in the low byte of register 0x000B.
 */
export const CONTROLLER_TYPES: Readonly<Record<number, string>> = {
  0: "controller",
  1: "inverter",
};

export type DeviceSessionOptions = Readonly<{
  /** Capture clock; defaults to the wall clock */
  now?: () => Date;
}>;
