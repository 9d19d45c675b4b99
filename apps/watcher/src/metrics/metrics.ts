import { monitorEventLoopDelay } from "node:perf_hooks";

import { connect, StringCodec, type NatsConnection } from "nats";

import type { Logger } from "../logger.js";

export const DEFAULT_METRICS_SUBJECT = "telegraf";

export type MetricFields = Record<string, number | string | boolean>;
export type MetricTags = Record<string, string>;

/**
 * Explicit metrics handle, created at startup and closed at shutdown.
 * Components receive it as a dependency; there is no process-wide default.
 */
export interface MetricsContext {
  readonly enabled: boolean;
  send(name: string, fields: MetricFields, tags?: MetricTags): void;
  close(): Promise<void>;
}

export type MetricsPublisher = {
  publish(subject: string, line: string): void;
  close(): Promise<void>;
};

/**
 * Influx line protocol: `name,tag=v field=1,other="x"`, tags and fields sorted by key.
 */
export function formatMetricLine(name: string, fields: MetricFields, tags: MetricTags): string {
  let line = name;
  for (const key of Object.keys(tags).sort()) {
    line += `,${key}=${tags[key]}`;
  }
  const parts = Object.keys(fields)
    .sort()
    .map((key) => {
      const value = fields[key];
      return typeof value === "string" ? `${key}="${value}"` : `${key}=${String(value)}`;
    });
  return `${line} ${parts.join(",")}`;
}

export const disabledMetrics: MetricsContext = {
  enabled: false,
  send: () => {},
  close: async () => {},
};

export function createMetricsContext(
  publisher: MetricsPublisher,
  options: { application: string; hostname: string; subject?: string },
  logger: Logger,
): MetricsContext {
  const subject = options.subject ?? DEFAULT_METRICS_SUBJECT;
  let closed = false;

  return {
    enabled: true,
    send(name, fields, tags) {
      if (closed || Object.keys(fields).length === 0) return;
      const line = formatMetricLine(`${options.application}:${name}`, fields, {
        ...(tags ?? {}),
        hostname: options.hostname,
      });
      try {
        publisher.publish(subject, line);
      } catch (err) {
        logger.warn({ component: "metrics", err, metric: name }, "metric publish failed");
      }
    },
    async close() {
      if (closed) return;
      closed = true;
      await publisher.close();
    },
  };
}

export async function connectNatsPublisher(url: string): Promise<MetricsPublisher> {
  const nc: NatsConnection = await connect({ servers: url });
  const codec = StringCodec();
  return {
    publish(subject, line) {
      nc.publish(subject, codec.encode(line));
    },
    async close() {
      await nc.drain();
    },
  };
}

export async function openMetrics(
  cfg: { metricsNatsUrl?: string; metricsApplication: string; metricsHostname: string },
  logger: Logger,
): Promise<MetricsContext> {
  if (!cfg.metricsNatsUrl) {
    logger.info({ component: "metrics" }, "metrics disabled (METRICS_NATS_URL not set)");
    return disabledMetrics;
  }
  const publisher = await connectNatsPublisher(cfg.metricsNatsUrl);
  logger.info({ component: "metrics", nats_url: cfg.metricsNatsUrl }, "metrics connected");
  return createMetricsContext(
    publisher,
    { application: cfg.metricsApplication, hostname: cfg.metricsHostname },
    logger,
  );
}

export type RuntimeSampler = {
  sample(): MetricFields;
  stop(): void;
};

/**
 * Process memory plus mean event-loop delay since the previous sample.
 */
export function createRuntimeSampler(): RuntimeSampler {
  const loopDelay = monitorEventLoopDelay({ resolution: 20 });
  loopDelay.enable();
  return {
    sample() {
      const mem = process.memoryUsage();
      const meanNs = loopDelay.mean;
      loopDelay.reset();
      return {
        heap_used: mem.heapUsed,
        heap_total: mem.heapTotal,
        rss: mem.rss,
        external: mem.external,
        event_loop_delay_ms: Number.isFinite(meanNs) ? Math.round(meanNs / 1e4) / 100 : 0,
      };
    },
    stop() {
      loopDelay.disable();
    },
  };
}

/**
 * Periodically reports how many files are in work and the runtime gauges. Returns a stop function.
 */
export function startMetricsWatch(
  metrics: MetricsContext,
  filesInWork: () => number,
  intervalMs: number,
  sampler?: RuntimeSampler,
): () => void {
  if (!metrics.enabled) return () => {};
  const runtime = sampler ?? createRuntimeSampler();
  const tick = () => {
    metrics.send("watcher", { files_in_work: filesInWork() });
    metrics.send("runtime", runtime.sample());
  };
  tick();
  const timer = setInterval(tick, intervalMs);
  timer.unref?.();
  return () => {
    clearInterval(timer);
    runtime.stop();
  };
}
