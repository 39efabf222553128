/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Vital Watch configuration covering:
 * - Server settings
 * - Radar signal source (device node, piped stdin or MQTT topic)
 * - Escalation thresholds
 * - Alert dispatch queue
 * - WAHA notifications
 */
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional URL - empty string becomes undefined
 */
const optionalUrl = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined))
  .pipe(z.string().url().optional());

const ConfigSchema = z
  .object({
    // ==========================================================================
    // Server Configuration
    // ==========================================================================
    PORT: z.coerce.number().int().positive().default(8084).describe("HTTP server port"),
    HTTP_ENABLED: envBoolean(true).describe("Serve the status API and live events"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development")
      .describe("Runtime environment"),
    APP_NAME: z.string().default("VitalWatch").describe("Application name"),
    LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
      .default("info")
      .describe("Pino log level"),

    // ==========================================================================
    // Radar Signal Source
    // ==========================================================================
    SIGNAL_SOURCE: z
      .enum(["device", "stdin", "mqtt"])
      .default("device")
      .describe("Where radar frames are read from"),
    RADAR_DEVICE_PATH: z
      .string()
      .min(1)
      .default("/dev/ttyAMA0")
      .describe("Serial device node (or recorded log file) carrying radar lines"),
    MQTT_BROKER_URL: z
      .string()
      .optional()
      .describe("MQTT broker connection URL (SIGNAL_SOURCE=mqtt)"),
    MQTT_TOPIC_RADAR: z
      .string()
      .default("homelab/sensors/radar/presence")
      .describe("MQTT topic carrying radar lines"),
    PRESENCE_MARKER: z
      .string()
      .min(1)
      .default("SJYBSS")
      .describe("Frame marker preceding the presence status token"),

    // ==========================================================================
    // Escalation Thresholds
    // ==========================================================================
    INITIAL_THRESHOLD_SECONDS: z.coerce
      .number()
      .positive()
      .default(60)
      .describe("Seconds without movement before the initial alert"),
    CRITICAL_THRESHOLD_SECONDS: z.coerce
      .number()
      .positive()
      .default(300)
      .describe("Seconds without movement before the critical alert"),
    CRITICAL_COOLDOWN_SECONDS: z.coerce
      .number()
      .positive()
      .default(600)
      .describe("Minimum seconds between repeated critical alerts"),

    // ==========================================================================
    // Monitor Loop Timing
    // ==========================================================================
    READ_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(100)
      .describe("Bounded wait for the next radar frame (ms)"),
    IDLE_DELAY_MS: z.coerce
      .number()
      .int()
      .nonnegative()
      .default(100)
      .describe("Pause between iterations when no frame was available (ms)"),

    // ==========================================================================
    // Alert Dispatch
    // ==========================================================================
    DISPATCH_QUEUE_LIMIT: z.coerce
      .number()
      .int()
      .positive()
      .default(100)
      .describe("Maximum alerts waiting for delivery"),
    SHUTDOWN_DRAIN_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .nonnegative()
      .default(5000)
      .describe("How long shutdown waits for pending alerts (ms)"),

    // ==========================================================================
    // WhatsApp Notifications (WAHA)
    // ==========================================================================
    WAHA_SERVER: optionalUrl.describe("WAHA server endpoint"),
    WAHA_API_KEY: z.string().optional().describe("WAHA API key"),
    WAHA_SESSION: z.string().default("default").describe("WAHA session name"),
    NOTIFICATION_PHONE: z
      .string()
      .optional()
      .describe("Phone number for notifications (WhatsApp format)"),
    NOTIFICATION_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(10000)
      .describe("HTTP timeout for WAHA requests (ms)"),

    // ==========================================================================
    // Feature Flags
    // ==========================================================================
    ENABLE_NOTIFICATIONS: envBoolean(true).describe(
      "Enable WhatsApp notifications",
    ),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.SIGNAL_SOURCE === "mqtt" && !cfg.MQTT_BROKER_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MQTT_BROKER_URL"],
        message: "MQTT_BROKER_URL is required when SIGNAL_SOURCE=mqtt",
      });
    }
  });

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration error - carries the Zod issues for the startup report.
 */
export type ConfigError = Readonly<{
  type: "INVALID_CONFIG";
  issues: ReadonlyArray<z.ZodIssue>;
}>;

/**
 * Parse an environment map into typed configuration.
 */
export function parseConfig(
  env: Record<string, string | undefined>,
): Result<Config, ConfigError> {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    return err({ type: "INVALID_CONFIG", issues: parsed.error.issues });
  }
  return ok(parsed.data);
}

/**
 * Parse process.env, or report every issue and exit.
 */
function loadConfigOrExit(): Config {
  const result = parseConfig(process.env);
  if (result.isOk()) {
    return result.value;
  }

  console.error("❌ Invalid configuration:");
  for (const issue of result.error.issues) {
    console.error(`  ${issue.path.join(".")}: ${issue.message}`);
  }
  return process.exit(1);
}

// Parse at startup - crashes immediately if invalid
export const config: Config = loadConfigOrExit();

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Escalation thresholds in milliseconds, as the state machine consumes them.
 */
export function getThresholds(cfg: Config = config): Readonly<{
  initialThresholdMs: number;
  criticalThresholdMs: number;
  criticalCooldownMs: number;
}> {
  return {
    initialThresholdMs: cfg.INITIAL_THRESHOLD_SECONDS * 1000,
    criticalThresholdMs: cfg.CRITICAL_THRESHOLD_SECONDS * 1000,
    criticalCooldownMs: cfg.CRITICAL_COOLDOWN_SECONDS * 1000,
  };
}

/**
 * Signal source selection for the startup path.
 */
export function getSourceConfig(
  cfg: Config = config,
):
  | Readonly<{ kind: "device"; path: string }>
  | Readonly<{ kind: "stdin" }>
  | Readonly<{ kind: "mqtt"; brokerUrl: string; topic: string }> {
  if (cfg.SIGNAL_SOURCE === "mqtt" && cfg.MQTT_BROKER_URL) {
    return {
      kind: "mqtt",
      brokerUrl: cfg.MQTT_BROKER_URL,
      topic: cfg.MQTT_TOPIC_RADAR,
    };
  }
  if (cfg.SIGNAL_SOURCE === "stdin") {
    return { kind: "stdin" };
  }
  return { kind: "device", path: cfg.RADAR_DEVICE_PATH };
}

/**
 * WAHA notification configuration.
 * Returns null if notifications are disabled or not configured.
 */
export function getNotificationConfig(cfg: Config = config): Readonly<{
  serverUrl: string;
  apiKey: string | undefined;
  session: string;
  phoneNumber: string;
  timeoutMs: number;
}> | null {
  if (
    !cfg.ENABLE_NOTIFICATIONS ||
    !cfg.WAHA_SERVER ||
    !cfg.NOTIFICATION_PHONE
  ) {
    return null;
  }

  return {
    serverUrl: cfg.WAHA_SERVER,
    apiKey: cfg.WAHA_API_KEY,
    session: cfg.WAHA_SESSION,
    phoneNumber: cfg.NOTIFICATION_PHONE,
    timeoutMs: cfg.NOTIFICATION_TIMEOUT_MS,
  };
}
