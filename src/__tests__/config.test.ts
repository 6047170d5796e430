/**
 * Configuration Tests
 */
import { describe, expect, it } from "vitest";

import { parseConfig } from "../config.js";

const required = {
  MQTT_BROKER_HOST: "broker.local",
  MQTT_CLIENT_NAME: "shed",
};

describe("parseConfig", () => {
  it("applies defaults", () => {
    const config = parseConfig(required)._unsafeUnwrap();

    expect(config).toMatchObject({
      NODE_ENV: "development",
      LOG_LEVEL: "info",
      MQTT_BROKER_PORT: 1883,
      MQTT_TOPIC_DOMAIN: "solar",
      MQTT_QOS: 1,
      MQTT_KEEPALIVE_SECONDS: 60,
      MQTT_CONNECT_TIMEOUT_MS: 10000,
      MQTT_RECONNECT_PERIOD_MS: 5000,
      SERIAL_BAUD_RATE: 9600,
      MODBUS_TIMEOUT_MS: 1000,
      PROBE_TIMEOUT_MS: 100,
      PUBLISH_INTERVAL_SECONDS: 60,
    });
    expect(config.SERIAL_PORT).toBeUndefined();
    expect(config.DEVICE_ADDRESS).toBeUndefined();
  });

  it("coerces numbers from strings", () => {
    const config = parseConfig({
      ...required,
      MQTT_BROKER_PORT: "8883",
      MQTT_QOS: "2",
      DEVICE_ADDRESS: "16",
    })._unsafeUnwrap();

    expect(config.MQTT_BROKER_PORT).toBe(8883);
    expect(config.MQTT_QOS).toBe(2);
    expect(config.DEVICE_ADDRESS).toBe(16);
  });

  it("treats empty optional values as unset", () => {
    const config = parseConfig({
      ...required,
      SERIAL_PORT: "  ",
      DEVICE_ADDRESS: "",
      MQTT_USERNAME: "",
    })._unsafeUnwrap();

    expect(config.SERIAL_PORT).toBeUndefined();
    expect(config.DEVICE_ADDRESS).toBeUndefined();
    expect(config.MQTT_USERNAME).toBeUndefined();
  });

  it("requires broker host and client name", () => {
    const issues = parseConfig({})._unsafeUnwrapErr();

    expect(issues).toEqual([
      "MQTT_BROKER_HOST: Required",
      "MQTT_CLIENT_NAME: Required",
    ]);
  });

  it("rejects topic wildcards in the client name", () => {
    const issues = parseConfig({
      ...required,
      MQTT_CLIENT_NAME: "shed/#",
    })._unsafeUnwrapErr();

    expect(issues).toEqual([
      "MQTT_CLIENT_NAME: MQTT_CLIENT_NAME must not contain '/', '#' or '+'",
    ]);
  });

  it("rejects an invalid QoS", () => {
    expect(parseConfig({ ...required, MQTT_QOS: "3" }).isErr()).toBe(true);
  });

  it("rejects a device address outside the Modbus range", () => {
    const issues = parseConfig({
      ...required,
      DEVICE_ADDRESS: "248",
    })._unsafeUnwrapErr();

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^DEVICE_ADDRESS: /);
  });
});
