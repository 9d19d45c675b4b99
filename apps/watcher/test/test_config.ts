import assert from "node:assert/strict";
import { test } from "node:test";

import { describeConfig, loadConfig, parseListenAddress, parsePatterns } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

test("defaults match the documented values", () => {
  const cfg = loadConfig({ WATCH_DIR: "/srv/incoming" });

  assert.equal(cfg.dir, "/srv/incoming");
  assert.equal(cfg.outDir, "/srv/incoming");
  assert.deepEqual(cfg.patterns, [".xml"]);
  assert.equal(cfg.separator, ",");
  assert.equal(cfg.scanIntervalSec, 60);
  assert.equal(cfg.checkIntervalSec, 180);
  assert.equal(cfg.stableIntervalSec, 15);
  assert.equal(cfg.maxStableChecks, 0);
  assert.equal(cfg.maxValidationAttempts, 0);
  assert.equal(cfg.zip, false);
  assert.equal(cfg.clear, true);
  assert.equal(cfg.quarantineDir, undefined);
  assert.equal(cfg.verbose, false);
  assert.equal(cfg.uploadUrl, "http://localhost:3000/");
  assert.equal(cfg.uploadToken, "");
  assert.equal(cfg.connectTimeoutSec, 10);
  assert.equal(cfg.readTimeoutSec, 300);
  assert.equal(cfg.backoffUnitMs, 60_000);
  assert.deepEqual(cfg.statusListen, { host: "0.0.0.0", port: 9090 });
  assert.equal(cfg.metricsNatsUrl, undefined);
  assert.equal(cfg.metricsApplication, "dropcourier");
  assert.equal(cfg.metricsIntervalSec, 10);
  assert.equal(cfg.sentryDsn, undefined);
  assert.equal(cfg.logLevel, "info");
});

test("verbose switches the default log level to debug", () => {
  assert.equal(loadConfig({ WATCH_VERBOSE: "yes" }).logLevel, "debug");
  assert.equal(loadConfig({ WATCH_VERBOSE: "yes", LOG_LEVEL: "warn" }).logLevel, "warn");
});

test("patterns split on the configured separator", () => {
  const cfg = loadConfig({ WATCH_PATTERNS: ".xml; .XML ;;.rpt", WATCH_PATTERN_SEPARATOR: ";" });
  assert.deepEqual(cfg.patterns, [".xml", ".XML", ".rpt"]);
  assert.deepEqual(parsePatterns(".a|.b", "|"), [".a", ".b"]);
});

test("post-processing flags parse booleans", () => {
  const cfg = loadConfig({ WATCH_ZIP: "on", WATCH_CLEAR: "0", WATCH_OUT_DIR: "/srv/archive" });
  assert.equal(cfg.zip, true);
  assert.equal(cfg.clear, false);
  assert.equal(cfg.outDir, "/srv/archive");
});

test("invalid values throw ConfigError", () => {
  assert.throws(() => loadConfig({ WATCH_SCAN_INTERVAL_SEC: "0" }), ConfigError);
  assert.throws(() => loadConfig({ WATCH_CHECK_INTERVAL_SEC: "1.5" }), ConfigError);
  assert.throws(() => loadConfig({ WATCH_MAX_STABLE_CHECKS: "-1" }), ConfigError);
  assert.throws(() => loadConfig({ WATCH_ZIP: "maybe" }), ConfigError);
  assert.throws(() => loadConfig({ UPLOAD_URL: "ftp://collector.invalid/" }), ConfigError);
  assert.throws(() => loadConfig({ UPLOAD_URL: "not a url" }), ConfigError);
  assert.throws(() => loadConfig({ WATCH_PATTERNS: " , " }), ConfigError);
  assert.throws(() => loadConfig({ STATUS_LISTEN: ":99999" }), ConfigError);
});

test("listen address accepts host:port, :port and empty", () => {
  assert.deepEqual(parseListenAddress(":9191"), { host: "0.0.0.0", port: 9191 });
  assert.deepEqual(parseListenAddress("127.0.0.1:8080"), { host: "127.0.0.1", port: 8080 });
  assert.equal(parseListenAddress(""), undefined);
});

test("describeConfig redacts secrets", () => {
  const cfg = loadConfig({ UPLOAD_TOKEN: "test-secret", SENTRY_DSN: "https://key@sentry.invalid/1" });
  const described = describeConfig(cfg);
  assert.equal(described.uploadToken, "[REDACTED]");
  assert.equal(described.sentryDsn, "[REDACTED]");
  assert.equal(cfg.uploadToken, "test-secret");
});
