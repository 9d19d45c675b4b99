import type { WatcherEventV1 } from "@dropcourier/shared";

import type { MetricsContext } from "./metrics/metrics.js";
import type { ErrorReporter } from "./reporting/errorReporter.js";

export interface WatcherEvents {
  emit(event: WatcherEventV1): void;
}

export function createEventSink(deps: { metrics: MetricsContext; reporter: ErrorReporter }): WatcherEvents {
  return {
    emit(event) {
      switch (event.type) {
        case "task.admitted":
          deps.metrics.send("watcher", { admitted: 1 });
          return;
        case "upload.succeeded":
          deps.metrics.send("watcher", { sent: 1 });
          return;
        case "upload.failed":
          deps.metrics.send("watcher", { sending_failure: 1 });
          deps.reporter.captureMessage("upload to collector failed", {
            file: event.file,
            attempt: String(event.attempt),
            reason: event.reason,
          });
          return;
        case "task.completed":
          deps.metrics.send("watcher", { completed: 1 });
          return;
        case "task.failed":
          deps.metrics.send("watcher", { failed: 1 }, { stage: event.stage });
          return;
      }
    },
  };
}
