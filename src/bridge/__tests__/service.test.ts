/**
 * Bridge Service Tests
 *
 * Runs the bridge against the in-memory register bank and a recording
 * publish session, on a virtual clock.
 */
import { err, ok, type Result } from "neverthrow";
import { beforeEach, describe, expect, it, vi } from "vitest";

// Mock logger to reduce noise
vi.mock("../../logger.js", () => ({
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
import {
  createFakeTransport,
  type FakeTransport,
} from "../../device/__tests__/fake-transport.js";
import { createDeviceSession, portError } from "../../device/index.js";
import type {
  ConnectionState,
  MessagePayload,
  PublishError,
  PublishSession,
  PublishSessionOptions,
} from "../../mqtt/index.js";
import type { Clock } from "../../scheduler/index.js";
import {
  createChargeControllerBridge,
  runBridge,
  withPublishSession,
} from "../service.js";

// =============================================================================
// Test Doubles
// =============================================================================

type FakeSession = PublishSession & {
  readonly events: string[];
  readonly data: MessagePayload[];
};

function createFakeSession(
  setup: {
    waitResult?: Result<true, PublishError>;
    onData?: (count: number) => void;
  } = {},
): FakeSession {
  const events: string[] = [];
  const data: MessagePayload[] = [];
  let state: ConnectionState = "disconnected";

  return {
    events,
    data,
    topics: {
      base: "solar/shed",
      status: "solar/shed/status",
      data: "solar/shed/data",
    },
    getState: () => state,
    onStateChange: () => () => undefined,
    connect() {
      events.push("connect");
      state = "connecting";
      return ok(true);
    },
    async waitForConnection() {
      events.push("wait");
      const result = setup.waitResult ?? ok(true);
      if (result.isOk()) state = "connected";
      return result;
    },
    async publish() {
      return ok(true);
    },
    async publishStatus() {
      return ok(true);
    },
    async publishData(payload) {
      events.push("data");
      data.push(payload);
      setup.onData?.(data.length);
      return ok(true);
    },
    async disconnect() {
      events.push("disconnect");
      state = "disconnected";
    },
  };
}

function createVirtualClock(): Clock {
  let time = 0;
  return {
    now: () => time,
    async sleep(ms) {
      time += ms;
    },
  };
}

const connectTimeout: PublishError = {
  type: "CONNECT_TIMEOUT",
  timeoutMs: 10000,
  message: "No connection to broker within 10000ms",
};

const connectAborted: PublishError = {
  type: "CONNECT_ABORTED",
  message: "Shutdown requested before the broker answered",
};

const bridgeOptions = {
  clientName: "shed",
  domain: "solar",
  dataQos: 1,
  intervalMs: 60000,
  broker: {
    host: "broker.local",
    port: 1883,
    keepaliveSeconds: 60,
    connectTimeoutMs: 10000,
    reconnectPeriodMs: 5000,
  },
  serial: {
    path: "/dev/ttyUSB0",
    baudRate: 9600,
    unitId: 1,
    timeoutMs: 1000,
  },
} as const;

// =============================================================================
// createChargeControllerBridge
// =============================================================================

describe("createChargeControllerBridge", () => {
  it("publishes the current telemetry as one flat payload", async () => {
    const session = createFakeSession();
    const device = createDeviceSession(createFakeTransport(), {
      now: () => new Date("2024-06-01T12:00:00.000Z"),
    });
    const bridge = createChargeControllerBridge({
      clientName: "shed",
      identity: {},
      device,
      publisher: session,
    });

    await bridge.publishData();

    expect(session.data).toHaveLength(1);
    expect(session.data[0]).toMatchObject({
      timestamp: "2024-06-01T12:00:00.000Z",
      solar_voltage: 18.3,
      battery_state_of_charge: 87,
      battery_temperature: -5,
    });
  });

  it("builds status messages from the identity", () => {
    const bridge = createChargeControllerBridge({
      clientName: "shed",
      identity: { model: "RNG-CTRL-RVR40" },
      device: createDeviceSession(createFakeTransport()),
      publisher: createFakeSession(),
    });

    expect(bridge.statusMessage(true)).toEqual({
      client: "shed",
      online: true,
      model: "RNG-CTRL-RVR40",
    });
  });
});

// =============================================================================
// withPublishSession
// =============================================================================

describe("withPublishSession", () => {
  it("connects, waits, runs and disconnects in order", async () => {
    const session = createFakeSession();

    const result = await withPublishSession(session, { connectTimeoutMs: 1000 }, async () => {
      session.events.push("run");
      return 42;
    });

    expect(result._unsafeUnwrap()).toBe(42);
    expect(session.events).toEqual(["connect", "wait", "run", "disconnect"]);
  });

  it("disconnects and skips the work when the broker never answers", async () => {
    const session = createFakeSession({ waitResult: err(connectTimeout) });
    const work = vi.fn(async () => 1);

    const result = await withPublishSession(session, { connectTimeoutMs: 1000 }, work);

    expect(result._unsafeUnwrapErr()).toEqual(connectTimeout);
    expect(work).not.toHaveBeenCalled();
    expect(session.events).toEqual(["connect", "wait", "disconnect"]);
  });

  it("does not connect when already aborted", async () => {
    const session = createFakeSession();
    const controller = new AbortController();
    controller.abort();
    const work = vi.fn(async () => 1);

    const result = await withPublishSession(
      session,
      { connectTimeoutMs: 1000, signal: controller.signal },
      work,
    );

    expect(result._unsafeUnwrapErr()).toEqual(connectAborted);
    expect(work).not.toHaveBeenCalled();
    expect(session.events).toEqual([]);
  });

  it("disconnects when the work throws", async () => {
    const session = createFakeSession();
    const failure = new Error("boom");

    await expect(
      withPublishSession(session, { connectTimeoutMs: 1000 }, async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
    expect(session.events).toEqual(["connect", "wait", "disconnect"]);
  });
});

// =============================================================================
// runBridge
// =============================================================================

describe("runBridge", () => {
  let transport: FakeTransport;

  beforeEach(() => {
    vi.clearAllMocks();
    transport = createFakeTransport();
  });

  it("publishes every interval until aborted, then tears down", async () => {
    const controller = new AbortController();
    const session = createFakeSession({
      onData: (count) => {
        if (count === 2) controller.abort();
      },
    });
    const createSession = vi.fn((_options: PublishSessionOptions) => session);

    const result = await runBridge(bridgeOptions, {
      signal: controller.signal,
      openTransport: async () => ok(transport),
      createSession,
      clock: createVirtualClock(),
    });

    expect(result.isOk()).toBe(true);
    expect(session.events).toEqual([
      "connect",
      "wait",
      "data",
      "data",
      "disconnect",
    ]);
    expect(transport.closed()).toBe(true);
  });

  it("hands the identity to the session's status messages", async () => {
    const controller = new AbortController();
    const session = createFakeSession({ onData: () => controller.abort() });
    const createSession = vi.fn((_options: PublishSessionOptions) => session);

    await runBridge(bridgeOptions, {
      signal: controller.signal,
      openTransport: async () => ok(transport),
      createSession,
      clock: createVirtualClock(),
    });

    const sessionOptions = createSession.mock.calls[0]?.[0];
    expect(sessionOptions).toMatchObject({
      brokerHost: "broker.local",
      brokerPort: 1883,
      clientName: "shed",
      domain: "solar",
      dataQos: 1,
      keepaliveSeconds: 60,
      connectTimeoutMs: 10000,
      reconnectPeriodMs: 5000,
    });
    expect(sessionOptions?.statusMessage(false)).toEqual({
      client: "shed",
      online: false,
      model: "RNG-CTRL-RVR40",
      serial_number: 1234567,
      software_version: "V1.2.3",
      hardware_version: "V1.0.0",
      voltage_rating: 12,
      current_rating: 40,
      discharge_rating: 20,
      type: "controller",
    });
  });

  it("returns TRANSPORT when the serial port cannot be opened", async () => {
    const createSession = vi.fn((_options: PublishSessionOptions) =>
      createFakeSession(),
    );

    const result = await runBridge(bridgeOptions, {
      signal: new AbortController().signal,
      openTransport: async () =>
        err(portError("Cannot open /dev/ttyUSB0: No such file")),
      createSession,
    });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "TRANSPORT",
      message: "Serial port error: Cannot open /dev/ttyUSB0: No such file",
    });
    expect(createSession).not.toHaveBeenCalled();
  });

  it("returns CONNECT and closes the port when the broker is unreachable", async () => {
    const session = createFakeSession({ waitResult: err(connectTimeout) });

    const result = await runBridge(bridgeOptions, {
      signal: new AbortController().signal,
      openTransport: async () => ok(transport),
      createSession: () => session,
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "CONNECT",
      message: "Connect timeout: No connection to broker within 10000ms",
      cause: connectTimeout,
    });
    expect(session.data).toEqual([]);
    expect(transport.closed()).toBe(true);
  });

  it("does nothing when shutdown was requested before the start", async () => {
    const controller = new AbortController();
    controller.abort();
    const openTransport = vi.fn(async () => ok(transport));
    const createSession = vi.fn((_options: PublishSessionOptions) =>
      createFakeSession(),
    );

    const result = await runBridge(bridgeOptions, {
      signal: controller.signal,
      openTransport,
      createSession,
    });

    expect(result.isOk()).toBe(true);
    expect(openTransport).not.toHaveBeenCalled();
    expect(createSession).not.toHaveBeenCalled();
  });

  it("closes the port without connecting when aborted while opening it", async () => {
    const controller = new AbortController();
    const createSession = vi.fn((_options: PublishSessionOptions) =>
      createFakeSession(),
    );

    const result = await runBridge(bridgeOptions, {
      signal: controller.signal,
      openTransport: async () => {
        controller.abort();
        return ok(transport);
      },
      createSession,
    });

    expect(result.isOk()).toBe(true);
    expect(createSession).not.toHaveBeenCalled();
    expect(transport.closed()).toBe(true);
  });

  it("ends cleanly when aborted while waiting for the broker", async () => {
    const session = createFakeSession({ waitResult: err(connectAborted) });

    const result = await runBridge(bridgeOptions, {
      signal: new AbortController().signal,
      openTransport: async () => ok(transport),
      createSession: () => session,
    });

    expect(result.isOk()).toBe(true);
    expect(session.events).toEqual(["connect", "wait", "disconnect"]);
    expect(session.data).toEqual([]);
    expect(transport.closed()).toBe(true);
  });
});
