/**
 * Register map of the Renogy charge controller family (Rover, Wanderer,
 * Adventurer). All values are holding registers read with function 0x03.
 */
import type { RegisterSpec } from "./schema.js";
import { HUNDREDTHS, TENTHS, UNIT_SCALE } from "./schema.js";

export const CHARGE_CONTROLLER_REGISTERS = {
  // ---------------------------------------------------------------------------
  // Identity / ratings
  // ---------------------------------------------------------------------------
  voltage_rating: {
    name: "voltage_rating",
    address: 0x000a,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "high",
    scale: UNIT_SCALE,
    unit: "V",
  },
  current_rating: {
    name: "current_rating",
    address: 0x000a,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "low",
    scale: UNIT_SCALE,
    unit: "A",
  },
  discharge_rating: {
    name: "discharge_rating",
    address: 0x000b,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "high",
    scale: UNIT_SCALE,
    unit: "A",
  },
  controller_type: {
    name: "controller_type",
    address: 0x000b,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "low",
    scale: UNIT_SCALE,
    unit: "",
  },
  model: {
    name: "model",
    address: 0x000c,
    wordCount: 8,
    decode: "BigEndianASCII",
    unit: "",
  },
  software_version: {
    name: "software_version",
    address: 0x0014,
    wordCount: 2,
    decode: "VersionTriplet",
    unit: "",
  },
  hardware_version: {
    name: "hardware_version",
    address: 0x0016,
    wordCount: 2,
    decode: "VersionTriplet",
    unit: "",
  },
  serial_number: {
    name: "serial_number",
    address: 0x0018,
    wordCount: 2,
    decode: "UnsignedLong",
    unit: "",
  },

  // ---------------------------------------------------------------------------
  // Real-time data
  // ---------------------------------------------------------------------------
  battery_state_of_charge: {
    name: "battery_state_of_charge",
    address: 0x0100,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "word",
    scale: UNIT_SCALE,
    unit: "%",
  },
  battery_voltage: {
    name: "battery_voltage",
    address: 0x0101,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "word",
    scale: TENTHS,
    unit: "V",
  },
  controller_temperature: {
    name: "controller_temperature",
    address: 0x0103,
    wordCount: 1,
    decode: "ScaledSigned",
    part: "high",
    scale: UNIT_SCALE,
    unit: "°C",
  },
  battery_temperature: {
    name: "battery_temperature",
    address: 0x0103,
    wordCount: 1,
    decode: "ScaledSigned",
    part: "low",
    scale: UNIT_SCALE,
    unit: "°C",
  },
  load_voltage: {
    name: "load_voltage",
    address: 0x0104,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "word",
    scale: TENTHS,
    unit: "V",
  },
  load_current: {
    name: "load_current",
    address: 0x0105,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "word",
    scale: HUNDREDTHS,
    unit: "A",
  },
  load_power: {
    name: "load_power",
    address: 0x0106,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "word",
    scale: UNIT_SCALE,
    unit: "W",
  },
  solar_voltage: {
    name: "solar_voltage",
    address: 0x0107,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "word",
    scale: TENTHS,
    unit: "V",
  },
  solar_current: {
    name: "solar_current",
    address: 0x0108,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "word",
    scale: HUNDREDTHS,
    unit: "A",
  },
  solar_power: {
    name: "solar_power",
    address: 0x0109,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "word",
    scale: UNIT_SCALE,
    unit: "W",
  },

  // ---------------------------------------------------------------------------
  // Daily statistics
  // ---------------------------------------------------------------------------
  minimum_battery_voltage_today: {
    name: "minimum_battery_voltage_today",
    address: 0x010b,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "word",
    scale: TENTHS,
    unit: "V",
  },
  maximum_battery_voltage_today: {
    name: "maximum_battery_voltage_today",
    address: 0x010c,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "word",
    scale: TENTHS,
    unit: "V",
  },
  maximum_solar_power_today: {
    name: "maximum_solar_power_today",
    address: 0x010f,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "word",
    scale: UNIT_SCALE,
    unit: "W",
  },
  minimum_solar_power_today: {
    name: "minimum_solar_power_today",
    address: 0x0110,
    wordCount: 1,
    decode: "ScaledUnsigned",
    part: "word",
    scale: UNIT_SCALE,
    unit: "W",
  },
} as const satisfies Readonly<Record<string, RegisterSpec>>;

export type RegisterName = keyof typeof CHARGE_CONTROLLER_REGISTERS;

/**
 * Look up the spec for a named register.
 */
export function getRegisterSpec(name: RegisterName): RegisterSpec {
  return CHARGE_CONTROLLER_REGISTERS[name];
}
