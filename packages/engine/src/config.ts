/**
 * Engine configuration with secure defaults.
 *
 * In production mode (NODE_ENV=production) a plain ws:// server URL is
 * refused unless ALLOW_INSECURE_TRANSPORT is set, and the log level is
 * never more verbose than `warn`.
 *
 * Frozen protocol limits live in protocol/constants.ts, not here.
 *
 * @module config
 */

export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export type Platform = "ios" | "android";

export interface EngineConfig {
  /** Relay WebSocket URL. */
  serverUrl: string;
  /** Base URL of the REST endpoints (keys, backup, attachments). */
  apiBaseUrl: string;
  /** Directory holding the engine database. */
  dataDir: string;
  logLevel: LogLevel;
  platform: Platform;

  heartbeatIntervalMs: number;
  pongTimeoutMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  /** Reconnect attempts before waiting for a foreground/network signal. */
  reconnectMaxAttempts: number;

  authTimeoutMs: number;
  requestTimeoutMs: number;
  /** How long a transmitted outbox entry waits for `message_accepted`. */
  ackTimeoutMs: number;

  outboxMaxAttempts: number;
  outboxBaseDelayMs: number;
  outboxMaxDelayMs: number;

  /** Size of the inbound message id dedupe window. */
  dedupeWindow: number;
}

const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

type Env = Record<string, string | undefined>;

function envBool(env: Env, key: string, defaultVal: boolean): boolean {
  const val = env[key];
  if (val === undefined) return defaultVal;
  return val === "1" || val.toLowerCase() === "true";
}

function envInt(env: Env, key: string, defaultVal: number): number {
  const val = env[key];
  if (val === undefined) return defaultVal;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? defaultVal : parsed;
}

function envLogLevel(env: Env, defaultVal: LogLevel): LogLevel {
  const val = env["LOG_LEVEL"]?.toLowerCase();
  return LOG_LEVELS.find((level) => level === val) ?? defaultVal;
}

function envPlatform(env: Env): Platform {
  return env["PLATFORM"] === "ios" ? "ios" : "android";
}

/**
 * Load engine configuration from environment variables.
 * Throws if production mode would run over an unencrypted transport.
 */
export function loadConfig(env: Env = process.env): EngineConfig {
  const isProduction = env["NODE_ENV"] === "production";
  const serverUrl = env["SERVER_URL"] ?? "ws://localhost:3000/ws";

  if (isProduction && serverUrl.startsWith("ws://")) {
    if (!envBool(env, "ALLOW_INSECURE_TRANSPORT", false)) {
      throw new Error(
        "SECURITY: Refusing insecure transport (ws://) in production.\n" +
          "Use a wss:// SERVER_URL, or set ALLOW_INSECURE_TRANSPORT=true to override.",
      );
    }
  }

  let logLevel = envLogLevel(env, isProduction ? "warn" : "info");
  if (
    isProduction &&
    (logLevel === "info" || logLevel === "debug" || logLevel === "trace")
  ) {
    logLevel = "warn";
  }

  return {
    serverUrl,
    apiBaseUrl: env["API_BASE_URL"] ?? "http://localhost:3000",
    dataDir: env["DATA_DIR"] ?? ".sotto",
    logLevel,
    platform: envPlatform(env),

    heartbeatIntervalMs: envInt(env, "HEARTBEAT_INTERVAL_MS", 30_000),
    pongTimeoutMs: envInt(env, "PONG_TIMEOUT_MS", 60_000),
    reconnectBaseMs: envInt(env, "RECONNECT_BASE_MS", 1_000),
    reconnectMaxMs: envInt(env, "RECONNECT_MAX_MS", 30_000),
    reconnectMaxAttempts: envInt(env, "RECONNECT_MAX_ATTEMPTS", 10),

    authTimeoutMs: envInt(env, "AUTH_TIMEOUT_MS", 10_000),
    requestTimeoutMs: envInt(env, "REQUEST_TIMEOUT_MS", 10_000),
    ackTimeoutMs: envInt(env, "ACK_TIMEOUT_MS", 15_000),

    outboxMaxAttempts: envInt(env, "OUTBOX_MAX_ATTEMPTS", 10),
    outboxBaseDelayMs: envInt(env, "OUTBOX_BASE_DELAY_MS", 1_000),
    outboxMaxDelayMs: envInt(env, "OUTBOX_MAX_DELAY_MS", 60_000),

    dedupeWindow: envInt(env, "DEDUPE_WINDOW", 5_000),
  };
}
