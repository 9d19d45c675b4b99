import http from "node:http";
import os from "node:os";
import path from "node:path";
import { mkdtemp } from "node:fs/promises";
import { gunzipSync } from "node:zlib";

import type { WatcherEventV1 } from "@dropcourier/shared";

import type { WatcherEvents } from "../src/events.js";
import type { ErrorReporter } from "../src/reporting/errorReporter.js";

export type ReceivedUpload = {
  headers: http.IncomingHttpHeaders;
  body: string;
};

export type CollectorStub = {
  url: string;
  uploads: ReceivedUpload[];
  close: () => Promise<void>;
};

/**
 * In-process collector. `statusFor(n)` picks the response status for the n-th request (1-based).
 */
export async function startCollectorStub(statusFor: (n: number) => number): Promise<CollectorStub> {
  const uploads: ReceivedUpload[] = [];
  const server = http.createServer(async (req, res) => {
    const chunks: Buffer[] = [];
    for await (const chunk of req) chunks.push(Buffer.from(chunk));
    const raw = Buffer.concat(chunks);
    const body = req.headers["content-encoding"] === "gzip" ? gunzipSync(raw).toString("utf8") : raw.toString("utf8");
    uploads.push({ headers: req.headers, body });
    const status = statusFor(uploads.length);
    res.writeHead(status, { "content-type": "text/plain" });
    res.end(status === 200 ? "ok" : "collector unavailable");
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("collector stub did not bind to TCP port");
  }

  return {
    url: `http://127.0.0.1:${address.port}/reports`,
    uploads,
    close: async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          resolve();
        });
      });
    },
  };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `dropcourier-${prefix}-`));
}

export function recordingSleep(): { waits: number[]; sleep: (ms: number) => Promise<void> } {
  const waits: number[] = [];
  return {
    waits,
    sleep: async (ms: number) => {
      waits.push(ms);
    },
  };
}

export function recordingEvents(): WatcherEvents & { events: WatcherEventV1[] } {
  const events: WatcherEventV1[] = [];
  return {
    events,
    emit: (event) => {
      events.push(event);
    },
  };
}

export type RecordingReporter = ErrorReporter & {
  exceptions: Array<{ err: unknown; tags?: Record<string, string> }>;
  messages: string[];
};

export function recordingReporter(): RecordingReporter {
  const exceptions: RecordingReporter["exceptions"] = [];
  const messages: string[] = [];
  return {
    exceptions,
    messages,
    captureException: (err, tags) => {
      exceptions.push({ err, tags });
    },
    captureMessage: (message) => {
      messages.push(message);
    },
    flush: async () => true,
  };
}

/**
 * Well-formed XML of exactly `size` bytes (ASCII only).
 */
export function xmlOfSize(size: number): string {
  const head = "<report><id>1</id><note>";
  const tail = "</note></report>";
  const fill = size - head.length - tail.length;
  if (fill < 0) throw new Error(`xmlOfSize: ${size} is below the minimum of ${head.length + tail.length}`);
  return `${head}${"x".repeat(fill)}${tail}`;
}
