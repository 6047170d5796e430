/**
 * Bridge Module - Types
 *
 * Contracts between the device side and the publish side, and the options
 * of one bridge run.
 */
import type { Result } from "neverthrow";

import type {
  DeviceIdentity,
  DeviceSession,
  RegisterTransport,
  SerialTransportOptions,
  TransportError,
} from "../device/index.js";
import type {
  PublishSession,
  PublishSessionOptions,
  QoS,
  StatusMessage,
} from "../mqtt/index.js";
import type { Clock } from "../scheduler/index.js";

/**
 * What the publish session needs from a device: a status message for
 * will, birth and shutdown, and one data publish per tick.
 *
 * publishData never fails: a refused or failed publish is logged by the
 * session and the next tick is the retry.
 */
export type DeviceBridge = Readonly<{
  statusMessage(online: boolean): StatusMessage;
  publishData(): Promise<void>;
}>;

export type ChargeControllerBridgeOptions = Readonly<{
  clientName: string;
  identity: DeviceIdentity;
  device: Pick<DeviceSession, "getData">;
  publisher: Pick<PublishSession, "publishData">;
}>;

export type BrokerOptions = Readonly<{
  host: string;
  port: number;
  keepaliveSeconds: number;
  connectTimeoutMs: number;
  reconnectPeriodMs: number;
  username?: string;
  password?: string;
}>;

export type BridgeOptions = Readonly<{
  clientName: string;
  domain: string;
  dataQos: QoS;
  intervalMs: number;
  broker: BrokerOptions;
  serial: SerialTransportOptions;
}>;

export type BridgeDeps = Readonly<{
  signal: AbortSignal;
  openTransport?: (
    options: SerialTransportOptions,
  ) => Promise<Result<RegisterTransport, TransportError>>;
  createSession?: (options: PublishSessionOptions) => PublishSession;
  clock?: Clock;
}>;
