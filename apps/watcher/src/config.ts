import os from "node:os";

import { ConfigError } from "./errors.js";

export interface WatcherConfig {
  dir: string;
  outDir: string;
  patterns: string[];
  separator: string;
  scanIntervalSec: number;
  checkIntervalSec: number;
  stableIntervalSec: number;
  maxStableChecks: number;
  maxValidationAttempts: number;
  zip: boolean;
  clear: boolean;
  quarantineDir?: string;
  verbose: boolean;
  uploadUrl: string;
  uploadToken: string;
  connectTimeoutSec: number;
  readTimeoutSec: number;
  backoffUnitMs: number;
  statusListen?: ListenAddress;
  metricsNatsUrl?: string;
  metricsApplication: string;
  metricsHostname: string;
  metricsIntervalSec: number;
  sentryDsn?: string;
  logLevel: string;
}

export interface ListenAddress {
  host: string;
  port: number;
}

type Env = Record<string, string | undefined>;

function parseBoolean(raw: string | undefined, name: string, defaultValue: boolean): boolean {
  if (!raw) return defaultValue;
  const value = raw.trim().toLowerCase();
  if (value === "1" || value === "true" || value === "yes" || value === "on") return true;
  if (value === "0" || value === "false" || value === "no" || value === "off") return false;
  throw new ConfigError(`${name} must be one of 1/0/true/false/yes/no/on/off`);
}

function parsePositiveInt(raw: string | undefined, name: string, defaultValue: number): number {
  if (!raw) return defaultValue;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer`);
  }
  return n;
}

function parseNonNegativeInt(raw: string | undefined, name: string, defaultValue: number): number {
  if (!raw) return defaultValue;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`${name} must be a non-negative integer`);
  }
  return n;
}

function parseOptionalString(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const v = raw.trim();
  return v.length ? v : undefined;
}

function parseUrl(raw: string | undefined, name: string, defaultValue: string): string {
  const value = parseOptionalString(raw) ?? defaultValue;
  try {
    const url = new URL(value);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new ConfigError(`${name} must be an http(s) URL`);
    }
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`${name} must be a valid URL`);
  }
  return value;
}

export function parsePatterns(raw: string, separator: string): string[] {
  return raw
    .split(separator)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Accepts `host:port` or `:port`. An empty value disables the listener.
 */
export function parseListenAddress(raw: string | undefined, name = "STATUS_LISTEN"): ListenAddress | undefined {
  if (raw === undefined) return { host: "0.0.0.0", port: 9090 };
  const value = raw.trim();
  if (!value) return undefined;
  const colon = value.lastIndexOf(":");
  const host = colon >= 0 ? value.slice(0, colon) : "";
  const portRaw = colon >= 0 ? value.slice(colon + 1) : value;
  const port = Number(portRaw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`${name} port must be an integer between 1 and 65535`);
  }
  return { host: host || "0.0.0.0", port };
}

export function loadConfig(env: Env = process.env): WatcherConfig {
  const dir = parseOptionalString(env.WATCH_DIR) ?? process.cwd();
  const separator = env.WATCH_PATTERN_SEPARATOR || ",";
  const patterns = parsePatterns(env.WATCH_PATTERNS ?? ".xml", separator);
  if (patterns.length === 0) {
    throw new ConfigError("WATCH_PATTERNS must name at least one suffix");
  }
  const verbose = parseBoolean(env.WATCH_VERBOSE, "WATCH_VERBOSE", false);

  return {
    dir,
    outDir: parseOptionalString(env.WATCH_OUT_DIR) ?? dir,
    patterns,
    separator,
    scanIntervalSec: parsePositiveInt(env.WATCH_SCAN_INTERVAL_SEC, "WATCH_SCAN_INTERVAL_SEC", 60),
    checkIntervalSec: parsePositiveInt(env.WATCH_CHECK_INTERVAL_SEC, "WATCH_CHECK_INTERVAL_SEC", 180),
    stableIntervalSec: parsePositiveInt(env.WATCH_STABLE_INTERVAL_SEC, "WATCH_STABLE_INTERVAL_SEC", 15),
    maxStableChecks: parseNonNegativeInt(env.WATCH_MAX_STABLE_CHECKS, "WATCH_MAX_STABLE_CHECKS", 0),
    maxValidationAttempts: parseNonNegativeInt(
      env.WATCH_MAX_VALIDATION_ATTEMPTS,
      "WATCH_MAX_VALIDATION_ATTEMPTS",
      0,
    ),
    zip: parseBoolean(env.WATCH_ZIP, "WATCH_ZIP", false),
    clear: parseBoolean(env.WATCH_CLEAR, "WATCH_CLEAR", true),
    quarantineDir: parseOptionalString(env.WATCH_QUARANTINE_DIR),
    verbose,
    uploadUrl: parseUrl(env.UPLOAD_URL, "UPLOAD_URL", "http://localhost:3000/"),
    uploadToken: env.UPLOAD_TOKEN?.trim() ?? "",
    connectTimeoutSec: parsePositiveInt(env.UPLOAD_CONNECT_TIMEOUT_SEC, "UPLOAD_CONNECT_TIMEOUT_SEC", 10),
    readTimeoutSec: parsePositiveInt(env.UPLOAD_READ_TIMEOUT_SEC, "UPLOAD_READ_TIMEOUT_SEC", 300),
    backoffUnitMs: parsePositiveInt(env.UPLOAD_BACKOFF_UNIT_MS, "UPLOAD_BACKOFF_UNIT_MS", 60_000),
    statusListen: parseListenAddress(env.STATUS_LISTEN),
    metricsNatsUrl: parseOptionalString(env.METRICS_NATS_URL),
    metricsApplication: parseOptionalString(env.METRICS_APPLICATION) ?? "dropcourier",
    metricsHostname: parseOptionalString(env.METRICS_HOSTNAME) ?? os.hostname(),
    metricsIntervalSec: parsePositiveInt(env.METRICS_INTERVAL_SEC, "METRICS_INTERVAL_SEC", 10),
    sentryDsn: parseOptionalString(env.SENTRY_DSN),
    logLevel: parseOptionalString(env.LOG_LEVEL) ?? (verbose ? "debug" : "info"),
  };
}

export function describeConfig(cfg: WatcherConfig): Record<string, unknown> {
  return {
    ...cfg,
    uploadToken: cfg.uploadToken ? "[REDACTED]" : "",
    sentryDsn: cfg.sentryDsn ? "[REDACTED]" : undefined,
  };
}
