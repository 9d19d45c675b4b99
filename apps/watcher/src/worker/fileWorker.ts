import { promises as fs } from "node:fs";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";

import type { WorkerStageV1 } from "@dropcourier/shared";

import type { WatcherConfig } from "../config.js";
import { FileWorkerError, UploadError, toErrorMessage } from "../errors.js";
import type { WatcherEvents } from "../events.js";
import type { Logger } from "../logger.js";
import type { Collector } from "../upload/collectorClient.js";
import { validateMarkup } from "../upload/markup.js";
import { quarantineFile, writeSingleEntryArchive } from "./archive.js";
import { sendWithBackoff } from "./backoff.js";

/**
 * Per-file settings captured when the worker is spawned. Frozen; workers never share mutable state.
 */
export type ProcessingContext = Readonly<{
  dir: string;
  outDir: string;
  zip: boolean;
  clear: boolean;
  quarantineDir?: string;
  stableIntervalMs: number;
  checkIntervalMs: number;
  maxStableChecks: number;
  maxValidationAttempts: number;
  backoffUnitMs: number;
}>;

export function toProcessingContext(cfg: WatcherConfig): ProcessingContext {
  return Object.freeze({
    dir: cfg.dir,
    outDir: cfg.outDir,
    zip: cfg.zip,
    clear: cfg.clear,
    quarantineDir: cfg.quarantineDir,
    stableIntervalMs: cfg.stableIntervalSec * 1000,
    checkIntervalMs: cfg.checkIntervalSec * 1000,
    maxStableChecks: cfg.maxStableChecks,
    maxValidationAttempts: cfg.maxValidationAttempts,
    backoffUnitMs: cfg.backoffUnitMs,
  });
}

export type WorkerFileSystem = {
  statSize(filePath: string): Promise<number>;
  readFile(filePath: string): Promise<Buffer>;
  unlink(filePath: string): Promise<void>;
};

export const nodeFileSystem: WorkerFileSystem = {
  statSize: async (filePath) => (await fs.stat(filePath)).size,
  readFile: (filePath) => fs.readFile(filePath),
  unlink: (filePath) => fs.unlink(filePath),
};

export type WorkerDeps = {
  collector: Collector;
  logger: Logger;
  events: WatcherEvents;
  fs?: WorkerFileSystem;
  sleep?: (ms: number) => Promise<void>;
};

export type WorkerResult =
  | {
      status: "completed";
      file: string;
      attempts: number;
      archivePath?: string;
    }
  | {
      status: "failed";
      file: string;
      stage: WorkerStageV1;
      error: FileWorkerError;
      attempts: number;
      quarantinePath?: string;
    };

type PollDeps = {
  fs: WorkerFileSystem;
  sleep: (ms: number) => Promise<void>;
  logger: Logger;
};

function defaultSleep(ms: number): Promise<void> {
  return delay(ms);
}

/**
 * Polls the file size until two consecutive observations agree. The first
 * observation is compared against 0, so a non-empty file always waits at least once.
 */
export async function waitForStableSize(
  fileName: string,
  filePath: string,
  ctx: Pick<ProcessingContext, "stableIntervalMs" | "maxStableChecks">,
  deps: PollDeps,
): Promise<number> {
  let previous = 0;
  let checks = 0;
  for (;;) {
    const size = await deps.fs.statSize(filePath);
    checks += 1;
    deps.logger.debug({ size, checks }, "file size observed");

    if (size === previous) {
      deps.logger.debug({ size }, "file size stabilized");
      return size;
    }
    if (ctx.maxStableChecks > 0 && checks >= ctx.maxStableChecks) {
      throw new FileWorkerError(
        fileName,
        "stabilizing",
        `file_size_unstable_after_${checks}_checks:last_size=${size}`,
      );
    }

    previous = size;
    await deps.sleep(ctx.stableIntervalMs);
  }
}

/**
 * Re-reads the file until it is large enough and parses as well-formed XML.
 */
export async function waitForValidContent(
  fileName: string,
  filePath: string,
  ctx: Pick<ProcessingContext, "checkIntervalMs" | "maxValidationAttempts">,
  deps: PollDeps,
): Promise<Buffer> {
  let attempts = 0;
  for (;;) {
    const content = await deps.fs.readFile(filePath);
    attempts += 1;

    const verdict = validateMarkup(content);
    if (verdict.ok) return content;

    deps.logger.debug(
      { size: content.length, reason: verdict.reason, detail: verdict.detail, attempts },
      "content not ready, will re-check",
    );
    if (ctx.maxValidationAttempts > 0 && attempts >= ctx.maxValidationAttempts) {
      throw new FileWorkerError(
        fileName,
        "validating",
        `content_invalid_after_${attempts}_attempts:${verdict.reason}`,
      );
    }
    await deps.sleep(ctx.checkIntervalMs);
  }
}

/**
 * Drives one file through stabilization, validation, upload, archival and cleanup.
 * Never rejects: every exit path resolves a WorkerResult.
 */
export async function processFile(
  fileName: string,
  ctx: ProcessingContext,
  deps: WorkerDeps,
): Promise<WorkerResult> {
  const filePath = path.join(ctx.dir, fileName);
  const logger = deps.logger.child({ component: "worker", file: fileName });
  const poll: PollDeps = {
    fs: deps.fs ?? nodeFileSystem,
    sleep: deps.sleep ?? defaultSleep,
    logger,
  };

  let stage: WorkerStageV1 = "stabilizing";
  let attempts = 0;

  logger.info({ path: filePath }, "found new file, start processing");

  try {
    await waitForStableSize(fileName, filePath, ctx, poll);

    stage = "validating";
    const payload = await waitForValidContent(fileName, filePath, ctx, poll);

    stage = "uploading";
    attempts = await sendWithBackoff(
      (attempt) => deps.collector.send(payload, fileName, attempt),
      {
        unitMs: ctx.backoffUnitMs,
        sleep: poll.sleep,
        onAttempt: (attempt) => {
          logger.info({ attempt }, "sending data to collector");
        },
        onFailure: ({ attempt, err, waitMs }) => {
          const reason = toErrorMessage(err);
          const httpStatus = err instanceof UploadError ? err.status : undefined;
          logger.warn({ attempt, http_status: httpStatus, reason, backoff_ms: waitMs }, "error sending to collector");
          deps.events.emit({
            type: "upload.failed",
            file: fileName,
            attempt,
            http_status: httpStatus,
            reason,
          });
        },
      },
    );
    logger.info({ attempts }, "successfully sent data to collector");
    deps.events.emit({ type: "upload.succeeded", file: fileName, attempts });

    stage = "archiving";
    let archivePath: string | undefined;
    if (ctx.zip) {
      archivePath = await writeSingleEntryArchive(ctx.outDir, fileName, payload);
      logger.info({ archive_path: archivePath }, "archived file");
    }

    stage = "cleanup";
    if (ctx.clear || ctx.zip) {
      await poll.fs.unlink(filePath);
      logger.info({ path: filePath }, "deleted file");
    }

    return { status: "completed", file: fileName, attempts, archivePath };
  } catch (err) {
    if (err instanceof UploadError) attempts = err.attempt;
    const error =
      err instanceof FileWorkerError
        ? err
        : new FileWorkerError(fileName, stage, toErrorMessage(err), { cause: err });

    const quarantinePath = ctx.quarantineDir
      ? await quarantineFile(filePath, ctx.quarantineDir, {
          file: fileName,
          stage: error.stage,
          reason: error.message,
          attempts,
          failed_at: new Date().toISOString(),
        }).catch((quarantineErr: unknown) => {
          logger.error({ err: quarantineErr }, "unable to quarantine file");
          return undefined;
        })
      : undefined;

    return {
      status: "failed",
      file: fileName,
      stage: error.stage,
      error,
      attempts,
      quarantinePath,
    };
  }
}
