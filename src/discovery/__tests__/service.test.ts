/**
 * Discovery Service Tests
 *
 * serialport is mocked; the bus is a fake transport where only chosen unit
 * ids answer.
 */
import { err, ok } from "neverthrow";
import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({ list: vi.fn() }));

vi.mock("serialport", () => ({
  SerialPort: { list: mocks.list },
}));

// Mock logger to reduce noise
vi.mock("../../logger.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../logger.js")>()),
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import type { AddressableTransport } from "../../device/index.js";
import { portError, timeout } from "../../device/index.js";
import {
  findDeviceAddress,
  locateDevice,
  resolveSerialPort,
} from "../service.js";

const ft231x = { path: "/dev/ttyUSB0", vendorId: "0403", productId: "6015" };
const arduino = { path: "/dev/ttyACM0", vendorId: "2341", productId: "0043" };

/**
 * A bus where `responders` maps unit id to the register addresses it
 * answers.
 */
function createBus(responders: Record<number, number[]>) {
  let unitId = 0;
  const probed: number[] = [];
  let closed = false;

  const transport: AddressableTransport = {
    async readRegisters(address, count) {
      const answered = responders[unitId] ?? [];
      return answered.includes(address)
        ? ok(new Array<number>(count).fill(0x2020))
        : err(timeout("Timed out", 100));
    },
    setUnitId(id) {
      unitId = id;
      probed.push(id);
    },
    async close() {
      closed = true;
    },
  };

  return { transport, probed, closed: () => closed };
}

// =============================================================================
// resolveSerialPort
// =============================================================================

describe("resolveSerialPort", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("uses the configured port without listing", async () => {
    const result = await resolveSerialPort("/dev/ttyUSB3");

    expect(result._unsafeUnwrap()).toBe("/dev/ttyUSB3");
    expect(mocks.list).not.toHaveBeenCalled();
  });

  it("picks the single known adapter", async () => {
    mocks.list.mockResolvedValue([arduino, ft231x]);

    const result = await resolveSerialPort(undefined);

    expect(result._unsafeUnwrap()).toBe("/dev/ttyUSB0");
  });

  it("fails when no adapter is plugged in", async () => {
    mocks.list.mockResolvedValue([arduino]);

    const result = await resolveSerialPort(undefined);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "NO_DEVICE",
      message: "No USB serial adapters found",
    });
  });

  it("fails when several adapters are plugged in", async () => {
    mocks.list.mockResolvedValue([
      ft231x,
      { ...ft231x, path: "/dev/ttyUSB1" },
    ]);

    const result = await resolveSerialPort(undefined);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "MULTIPLE_DEVICES",
      message: "Found 2 USB serial adapters: /dev/ttyUSB0, /dev/ttyUSB1",
      candidates: ["/dev/ttyUSB0", "/dev/ttyUSB1"],
    });
  });

  it("reports a listing failure as NO_DEVICE", async () => {
    mocks.list.mockRejectedValue(new Error("permission denied"));

    const result = await resolveSerialPort(undefined);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "NO_DEVICE",
      message: "Cannot list serial ports: permission denied",
    });
  });
});

// =============================================================================
// findDeviceAddress
// =============================================================================

describe("findDeviceAddress", () => {
  it("finds the single responding address", async () => {
    const bus = createBus({ 16: [0x000c] });

    const result = await findDeviceAddress(bus.transport, { from: 1, to: 20 });

    expect(result._unsafeUnwrap()).toBe(16);
    expect(bus.probed).toHaveLength(20);
  });

  it("accepts a device that only answers the battery register", async () => {
    const bus = createBus({ 5: [0x1402] });

    const result = await findDeviceAddress(bus.transport, { from: 1, to: 8 });

    expect(result._unsafeUnwrap()).toBe(5);
  });

  it("fails when nothing answers", async () => {
    const bus = createBus({});

    const result = await findDeviceAddress(bus.transport, { from: 1, to: 4 });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "NO_DEVICE",
      message: "No responding bus addresses found",
    });
  });

  it("fails when several addresses answer", async () => {
    const bus = createBus({ 16: [0x000c], 17: [0x000c, 0x1402] });

    const result = await findDeviceAddress(bus.transport, { from: 1, to: 20 });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "MULTIPLE_DEVICES",
      candidates: ["16", "17"],
    });
  });

  it("stops probing once shutdown is requested", async () => {
    const controller = new AbortController();
    const bus = createBus({ 1: [0x000c] });
    const transport: AddressableTransport = {
      ...bus.transport,
      setUnitId(id) {
        bus.transport.setUnitId(id);
        if (id === 3) controller.abort();
      },
    };

    const result = await findDeviceAddress(
      transport,
      { from: 1, to: 20 },
      controller.signal,
    );

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "ABORTED",
      message: "Shutdown requested during discovery",
    });
    expect(bus.probed).toEqual([1, 2, 3]);
  });
});

// =============================================================================
// locateDevice
// =============================================================================

describe("locateDevice", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("returns the configured location without probing", async () => {
    const openTransport = vi.fn();

    const result = await locateDevice({
      serialPort: "/dev/ttyUSB0",
      deviceAddress: 1,
      baudRate: 9600,
      probeTimeoutMs: 100,
      openTransport,
    });

    expect(result._unsafeUnwrap()).toEqual({ path: "/dev/ttyUSB0", unitId: 1 });
    expect(openTransport).not.toHaveBeenCalled();
  });

  it("probes with the probe timeout and closes the probe port", async () => {
    const bus = createBus({ 3: [0x000c] });
    const openTransport = vi.fn(async () => ok(bus.transport));

    const result = await locateDevice({
      serialPort: "/dev/ttyUSB0",
      baudRate: 9600,
      probeTimeoutMs: 100,
      range: { from: 1, to: 5 },
      openTransport,
    });

    expect(result._unsafeUnwrap()).toEqual({ path: "/dev/ttyUSB0", unitId: 3 });
    expect(openTransport).toHaveBeenCalledWith({
      path: "/dev/ttyUSB0",
      baudRate: 9600,
      unitId: 1,
      timeoutMs: 100,
    });
    expect(bus.closed()).toBe(true);
  });

  it("discovers the port before probing", async () => {
    mocks.list.mockResolvedValue([ft231x]);
    const bus = createBus({ 1: [0x000c] });

    const result = await locateDevice({
      baudRate: 9600,
      probeTimeoutMs: 100,
      range: { from: 1, to: 2 },
      openTransport: async () => ok(bus.transport),
    });

    expect(result._unsafeUnwrap()).toEqual({ path: "/dev/ttyUSB0", unitId: 1 });
  });

  it("does not open the probe port after shutdown was requested", async () => {
    const controller = new AbortController();
    controller.abort();
    const openTransport = vi.fn();

    const result = await locateDevice({
      serialPort: "/dev/ttyUSB0",
      baudRate: 9600,
      probeTimeoutMs: 100,
      signal: controller.signal,
      openTransport,
    });

    expect(result._unsafeUnwrapErr().type).toBe("ABORTED");
    expect(openTransport).not.toHaveBeenCalled();
  });

  it("returns PORT_UNAVAILABLE when the probe port cannot be opened", async () => {
    const result = await locateDevice({
      serialPort: "/dev/ttyUSB0",
      baudRate: 9600,
      probeTimeoutMs: 100,
      openTransport: async () => err(portError("Cannot open /dev/ttyUSB0: busy")),
    });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "PORT_UNAVAILABLE",
      message: "Serial port error: Cannot open /dev/ttyUSB0: busy",
    });
  });
});
