import * as dotenv from "dotenv";

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const parsed = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * File locations used by a check cycle.
 */
export const PATHS = {
  CONFIG: process.env.SSL_MONITOR_CONFIG ?? "config/sites.yaml",
  STATE: process.env.SSL_MONITOR_STATE ?? "state/ssl_state.json",
  LOG_FILE: process.env.SSL_MONITOR_LOG_FILE ?? "logs/ssl_monitor.log"
} as const;

/**
 * Network limits for certificate probes and outbound notifications.
 *
 * Invariant: every value is positive.
 */
export const NET = {
  PROBE_TIMEOUT: intFromEnv("SSL_MONITOR_PROBE_TIMEOUT", 10_000),
  HTTP_TIMEOUT: intFromEnv("SSL_MONITOR_HTTP_TIMEOUT", 10_000),
  CONCURRENCY: intFromEnv("SSL_MONITOR_CONCURRENCY", 1)
} as const;

/**
 * Daemon mode defaults.
 */
export const DAEMON = {
  INTERVAL_SECONDS: intFromEnv("SSL_MONITOR_INTERVAL", 86_400)
} as const;

/**
 * Site defaults applied when the monitor file leaves a field out.
 */
export const DEFAULTS = {
  PORT: 443,
  ALERT_DAYS: [30, 15, 7, 3, 1],
  NOTIFICATION_INTERVAL_HOURS: 24,
  SLACK_WEBHOOK_ENV_NAME: "SLACK_WEBHOOK_URL",
  ENVIRONMENT_LABEL: "N/A"
} as const;

/**
 * Threshold at or below which an expiry warning is escalated to critical.
 */
export const CRITICAL_THRESHOLD_DAYS = 7;

export const STATE = {
  VERSION: 1
} as const;
