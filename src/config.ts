/**
 * Typed configuration - all config lives in the environment (or .env),
 * parsed with Zod at startup. The bridge exits immediately on invalid config.
 *
 * Covers:
 * - Logging
 * - MQTT broker connection and topic namespace
 * - Serial port / Modbus device addressing
 * - Publish schedule
 */
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

import { QosSchema } from "./mqtt/schema.js";

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export const NODE_ENVS = ["development", "production", "test"] as const;

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

/**
 * Parse optional integer - empty string becomes undefined.
 * z.coerce.number() would turn "" into 0.
 */
const optionalInt = (min: number, max: number) =>
  optionalString.pipe(
    z.coerce.number().int().min(min).max(max).optional(),
  );

export const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime / Logging
  // ==========================================================================
  NODE_ENV: z
    .enum(NODE_ENVS)
    .default("development")
    .describe("Runtime environment"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info").describe("Pino log level"),

  // ==========================================================================
  // MQTT Broker
  // ==========================================================================
  MQTT_BROKER_HOST: z
    .string()
    .min(1, "MQTT_BROKER_HOST is required")
    .describe("MQTT broker host name or IP"),
  MQTT_BROKER_PORT: z.coerce
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(1883)
    .describe("MQTT broker port"),
  MQTT_CLIENT_NAME: z
    .string()
    .min(1, "MQTT_CLIENT_NAME is required")
    .regex(/^[^/#+]+$/, "MQTT_CLIENT_NAME must not contain '/', '#' or '+'")
    .describe("Client name, also the last segment of the base topic"),
  MQTT_TOPIC_DOMAIN: z
    .string()
    .min(1)
    .default("solar")
    .describe("First segment of the base topic"),
  MQTT_QOS: z.coerce
    .number()
    .pipe(QosSchema)
    .default(1)
    .describe("QoS for data messages"),
  MQTT_KEEPALIVE_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(60)
    .describe("Keepalive interval; the broker fires the last will after 1.5x"),
  MQTT_CONNECT_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(10000)
    .describe("How long startup waits for the broker before giving up"),
  MQTT_RECONNECT_PERIOD_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(5000)
    .describe("Client reconnect period (0 disables reconnecting)"),
  MQTT_USERNAME: optionalString.describe("Broker username"),
  MQTT_PASSWORD: optionalString.describe("Broker password"),

  // ==========================================================================
  // Serial / Modbus Device
  // ==========================================================================
  SERIAL_PORT: optionalString.describe(
    "Serial device path; the single USB serial port is used when unset",
  ),
  SERIAL_BAUD_RATE: z.coerce
    .number()
    .int()
    .positive()
    .default(9600)
    .describe("Serial baud rate"),
  DEVICE_ADDRESS: optionalInt(1, 247).describe(
    "Modbus unit id; the bus is probed when unset",
  ),
  MODBUS_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(1000)
    .describe("Timeout for a single register read (ms)"),
  PROBE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(100)
    .describe("Timeout per address while probing the bus (ms)"),

  // ==========================================================================
  // Schedule
  // ==========================================================================
  PUBLISH_INTERVAL_SECONDS: z.coerce
    .number()
    .positive()
    .default(60)
    .describe("Seconds between telemetry publishes"),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse a set of environment variables into a Config.
 *
 * @returns Config or the list of human-readable validation issues
 */
export function parseConfig(
  env: Readonly<Record<string, string | undefined>>,
): Result<Config, ReadonlyArray<string>> {
  const parsed = ConfigSchema.safeParse(env);

  if (!parsed.success) {
    return err(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    );
  }

  return ok(parsed.data);
}

/**
 * Parse process.env at startup - exits immediately if invalid.
 */
export function loadConfig(): Config {
  const result = parseConfig(process.env);

  if (result.isErr()) {
    console.error("❌ Invalid configuration:");
    for (const issue of result.error) {
      console.error(`  - ${issue}`);
    }
    process.exit(1);
  }

  return result.value;
}

// =============================================================================
// Logging Configuration
// =============================================================================

/**
 * Logging settings, read separately so loggers can be created at module load
 * before the full config is validated. Invalid values fall back to defaults;
 * loadConfig() still reports them.
 */
const LoggingSchema = z.object({
  NODE_ENV: z.enum(NODE_ENVS).catch("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).catch("info"),
});

export const loggingConfig: Readonly<z.infer<typeof LoggingSchema>> =
  LoggingSchema.parse(process.env);
