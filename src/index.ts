#!/usr/bin/env node
/**
 * Charge Controller MQTT Bridge - Application Entry Point
 *
 * Loads configuration, locates the controller on the serial bus and
 * publishes its telemetry to MQTT until SIGINT or SIGTERM.
 */
import "dotenv/config";

import { formatBridgeError, runBridge, toBridgeOptions } from "./bridge/index.js";
import { loadConfig } from "./config.js";
import { formatConfigurationError, locateDevice } from "./discovery/index.js";
import { createLogger } from "./logger.js";

const log = createLogger("bridge");

async function main(): Promise<number> {
  const config = loadConfig();

  // ===========================================================================
  // APPLICATION STARTUP BANNER
  // ===========================================================================

  console.log("");
  console.log("========================================");
  console.log("  CHARGE CONTROLLER MQTT BRIDGE");
  console.log("========================================");
  console.log("");

  // Log configuration summary (non-sensitive values only)
  log.info(
    {
      env: config.NODE_ENV,
      broker: `${config.MQTT_BROKER_HOST}:${config.MQTT_BROKER_PORT}`,
      clientName: config.MQTT_CLIENT_NAME,
      topicDomain: config.MQTT_TOPIC_DOMAIN,
      qos: config.MQTT_QOS,
      serialPort: config.SERIAL_PORT ?? "auto",
      deviceAddress: config.DEVICE_ADDRESS ?? "auto",
      intervalSeconds: config.PUBLISH_INTERVAL_SECONDS,
      authenticated: config.MQTT_USERNAME !== undefined,
    },
    "Configuration loaded",
  );

  // ===========================================================================
  // GRACEFUL SHUTDOWN
  // ===========================================================================

  const controller = new AbortController();
  const shutdown = (signal: string) => {
    if (controller.signal.aborted) return;
    log.info({ signal }, `${signal} received. Shutting down gracefully...`);
    controller.abort();
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  // ===========================================================================
  // LOCATE DEVICE
  // ===========================================================================

  const location = await locateDevice({
    ...(config.SERIAL_PORT !== undefined
      ? { serialPort: config.SERIAL_PORT }
      : {}),
    ...(config.DEVICE_ADDRESS !== undefined
      ? { deviceAddress: config.DEVICE_ADDRESS }
      : {}),
    baudRate: config.SERIAL_BAUD_RATE,
    probeTimeoutMs: config.PROBE_TIMEOUT_MS,
    signal: controller.signal,
  });
  if (location.isErr() && location.error.type === "ABORTED") {
    log.info("Shutdown complete");
    return 0;
  }
  if (location.isErr()) {
    log.error(
      { error: location.error },
      formatConfigurationError(location.error),
    );
    return 1;
  }

  // ===========================================================================
  // RUN BRIDGE
  // ===========================================================================

  const result = await runBridge(toBridgeOptions(config, location.value), {
    signal: controller.signal,
  });
  if (result.isErr()) {
    log.error({ error: result.error.type }, formatBridgeError(result.error));
    return 1;
  }

  log.info("Shutdown complete");
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    log.fatal({ error }, "Bridge crashed");
    process.exit(1);
  });
