/**
 * Discovery Module - Schemas and Types
 *
 * Known USB serial adapters and the registers used to find a controller
 * on the bus.
 */
import type { Result } from "neverthrow";

import type {
  AddressableTransport,
  SerialTransportOptions,
  TransportError,
} from "../device/index.js";

/**
 * The fields of a serial port listing that discovery looks at.
 */
export type ListedPort = Readonly<{
  path: string;
  manufacturer?: string;
  vendorId?: string;
  productId?: string;
}>;

export type UsbAdapter = Readonly<{
  vendorId: string;
  productId: string;
  name: string;
}>;

/**
 * USB-to-RS485 adapters shipped with or recommended for the controllers.
 */
export const USB_ADAPTERS: ReadonlyArray<UsbAdapter> = [
  { vendorId: "0403", productId: "6015", name: "FTDI FT231X" },
  { vendorId: "0403", productId: "6001", name: "FTDI FT232R" },
];

export type ProbeRegister = Readonly<{ address: number; count: number }>;

/**
 * Read in order at every address; the first answer counts as a device.
 * 0x000C holds the controller model, 0x1402 the battery model.
 */
export const PROBE_REGISTERS: ReadonlyArray<ProbeRegister> = [
  { address: 0x000c, count: 8 },
  { address: 0x1402, count: 8 },
];

export type ProbeRange = Readonly<{ from: number; to: number }>;

/** Valid Modbus unit ids */
export const DEFAULT_PROBE_RANGE: ProbeRange = { from: 1, to: 247 };

export type DeviceLocation = Readonly<{
  path: string;
  unitId: number;
}>;

export type DiscoveryOptions = Readonly<{
  serialPort?: string;
  deviceAddress?: number;
  baudRate: number;
  probeTimeoutMs: number;
  range?: ProbeRange;
  /** Stops the bus probe between addresses. */
  signal?: AbortSignal;
  listPorts?: () => Promise<ReadonlyArray<ListedPort>>;
  openTransport?: (
    options: SerialTransportOptions,
  ) => Promise<Result<AddressableTransport, TransportError>>;
}>;
