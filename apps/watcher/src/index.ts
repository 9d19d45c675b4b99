import { describeConfig, loadConfig } from "./config.js";
import { Dispatcher } from "./dispatcher.js";
import { createEventSink } from "./events.js";
import { createLogger } from "./logger.js";
import { openMetrics, startMetricsWatch } from "./metrics/metrics.js";
import { createErrorReporter } from "./reporting/errorReporter.js";
import { startScanLoop } from "./scan.js";
import { buildStatusServer } from "./server.js";
import { CollectorClient } from "./upload/collectorClient.js";
import { processFile, toProcessingContext } from "./worker/fileWorker.js";

const SHUTDOWN_GRACE_MS = 10_000;

async function main(): Promise<void> {
  const cfg = loadConfig();
  const logger = createLogger(cfg.logLevel);
  const reporter = createErrorReporter(cfg.sentryDsn, logger);
  const metrics = await openMetrics(cfg, logger);
  const events = createEventSink({ metrics, reporter });

  const collector = new CollectorClient({
    url: cfg.uploadUrl,
    token: cfg.uploadToken,
    connectTimeoutSec: cfg.connectTimeoutSec,
    readTimeoutSec: cfg.readTimeoutSec,
  });
  const ctx = toProcessingContext(cfg);

  const dispatcher = new Dispatcher({
    run: (fileName) => processFile(fileName, ctx, { collector, logger, events }),
    logger,
    events,
    reporter,
  });

  logger.info({ config: describeConfig(cfg) }, "watcher starting");

  const server = cfg.statusListen ? await buildStatusServer({ source: dispatcher }) : null;
  if (server && cfg.statusListen) {
    const address = await server.listen(cfg.statusListen);
    logger.info({ component: "status", address }, "status server listening");
  }

  const stopMetricsWatch = startMetricsWatch(metrics, () => dispatcher.size(), cfg.metricsIntervalSec * 1000);
  const scanLoop = startScanLoop(
    { dir: cfg.dir, patterns: cfg.patterns, intervalMs: cfg.scanIntervalSec * 1000 },
    { dispatcher, logger, reporter },
  );

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal, working: dispatcher.size() }, "shutting down");

    await scanLoop.stop();
    stopMetricsWatch();

    const grace = new Promise<"timeout">((resolve) => {
      setTimeout(() => resolve("timeout"), SHUTDOWN_GRACE_MS).unref();
    });
    const outcome = await Promise.race([dispatcher.drain().then(() => "drained" as const), grace]);
    if (outcome === "timeout") {
      logger.warn({ working_files: dispatcher.workingFiles() }, "shutdown grace elapsed with files still in work");
    }

    await server?.close();
    await collector.close();
    await metrics.close();
    await reporter.flush(2_000);
    logger.info("watcher stopped");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, "shutdown failed");
          process.exit(1);
        });
    });
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
