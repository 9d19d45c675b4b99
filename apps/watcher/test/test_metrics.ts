import assert from "node:assert/strict";
import { test } from "node:test";

import { createEventSink } from "../src/events.js";
import { createSilentLogger } from "../src/logger.js";
import {
  createMetricsContext,
  createRuntimeSampler,
  disabledMetrics,
  formatMetricLine,
  startMetricsWatch,
  type MetricsPublisher,
} from "../src/metrics/metrics.js";
import { recordingReporter } from "./support.js";

function recordingPublisher(): MetricsPublisher & { lines: Array<[string, string]>; closes: number[] } {
  const lines: Array<[string, string]> = [];
  const closes: number[] = [];
  return {
    lines,
    closes,
    publish: (subject, line) => {
      lines.push([subject, line]);
    },
    close: async () => {
      closes.push(Date.now());
    },
  };
}

test("formatMetricLine sorts tags and fields and quotes strings", () => {
  assert.equal(
    formatMetricLine("app:watcher", { sent: 1, note: "ok", busy: true }, { stage: "uploading", hostname: "box" }),
    'app:watcher,hostname=box,stage=uploading busy=true,note="ok",sent=1',
  );
  assert.equal(formatMetricLine("m", { v: 2 }, {}), "m v=2");
});

test("metrics context prefixes the application and tags the host", async () => {
  const publisher = recordingPublisher();
  const metrics = createMetricsContext(publisher, { application: "dropcourier", hostname: "box" }, createSilentLogger());

  metrics.send("watcher", { files_in_work: 3 });
  metrics.send("watcher", {});
  assert.deepEqual(publisher.lines, [["telegraf", "dropcourier:watcher,hostname=box files_in_work=3"]]);

  await metrics.close();
  await metrics.close();
  metrics.send("watcher", { files_in_work: 1 });
  assert.equal(publisher.closes.length, 1);
  assert.equal(publisher.lines.length, 1);
});

test("a failing publish does not escape send", () => {
  const metrics = createMetricsContext(
    {
      publish: () => {
        throw new Error("connection closed");
      },
      close: async () => {},
    },
    { application: "dropcourier", hostname: "box" },
    createSilentLogger(),
  );
  assert.doesNotThrow(() => metrics.send("watcher", { sent: 1 }));
});

test("event sink maps watcher events to metrics", () => {
  const publisher = recordingPublisher();
  const metrics = createMetricsContext(publisher, { application: "app", hostname: "h" }, createSilentLogger());
  const reporter = recordingReporter();
  const sink = createEventSink({ metrics, reporter });

  sink.emit({ type: "task.admitted", file: "a.xml" });
  sink.emit({ type: "upload.failed", file: "a.xml", attempt: 1, http_status: 500, reason: "boom" });
  sink.emit({ type: "upload.succeeded", file: "a.xml", attempts: 2 });
  sink.emit({ type: "task.completed", file: "a.xml", attempts: 2 });
  sink.emit({ type: "task.failed", file: "b.xml", stage: "validating", reason: "bad", attempts: 0 });

  assert.deepEqual(
    publisher.lines.map(([, line]) => line),
    [
      "app:watcher,hostname=h admitted=1",
      "app:watcher,hostname=h sending_failure=1",
      "app:watcher,hostname=h sent=1",
      "app:watcher,hostname=h completed=1",
      "app:watcher,hostname=h,stage=validating failed=1",
    ],
  );
  assert.deepEqual(reporter.messages, ["upload to collector failed"]);
});

test("metrics watch reports files in work and runtime gauges until stopped", () => {
  const publisher = recordingPublisher();
  const metrics = createMetricsContext(publisher, { application: "app", hostname: "h" }, createSilentLogger());
  const stops: number[] = [];
  const sampler = {
    sample: () => ({ heap_used: 10, rss: 20 }),
    stop: () => {
      stops.push(1);
    },
  };

  const stop = startMetricsWatch(metrics, () => 4, 60_000, sampler);
  stop();
  assert.deepEqual(publisher.lines, [
    ["telegraf", "app:watcher,hostname=h files_in_work=4"],
    ["telegraf", "app:runtime,hostname=h heap_used=10,rss=20"],
  ]);
  assert.equal(stops.length, 1);

  const stopDisabled = startMetricsWatch(disabledMetrics, () => 4, 60_000, sampler);
  stopDisabled();
  assert.equal(stops.length, 1);
});

test("runtime sampler reports process memory", () => {
  const sampler = createRuntimeSampler();
  try {
    const fields = sampler.sample();
    assert.deepEqual(Object.keys(fields).sort(), ["event_loop_delay_ms", "external", "heap_total", "heap_used", "rss"]);
    assert.equal(typeof fields.heap_used, "number");
    assert.ok(Number(fields.rss) > 0);
  } finally {
    sampler.stop();
  }
});
