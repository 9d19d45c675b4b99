import { promises as fs } from "node:fs";
import { setTimeout as delay } from "node:timers/promises";

import type { DirectoryEntry, Dispatcher } from "./dispatcher.js";
import type { Logger } from "./logger.js";
import type { ErrorReporter } from "./reporting/errorReporter.js";

export type ScanOptions = {
  dir: string;
  patterns: string[];
  intervalMs: number;
};

export type ScanDeps = {
  dispatcher: Dispatcher;
  logger: Logger;
  reporter: ErrorReporter;
  list?: (dir: string) => Promise<DirectoryEntry[]>;
};

export type ScanResult = {
  listed: number;
  admitted: string[];
};

type StartLoopHandle = {
  stop: () => Promise<void>;
};

export async function listDirectory(dir: string): Promise<DirectoryEntry[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries.map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }));
}

export function matchesPattern(name: string, patterns: string[]): boolean {
  return patterns.some((suffix) => name.endsWith(suffix));
}

/**
 * One scan tick: replaces the directory snapshot, then offers every accepted file to the dispatcher.
 */
export async function scanOnce(options: Omit<ScanOptions, "intervalMs">, deps: ScanDeps): Promise<ScanResult> {
  const logger = deps.logger.child({ component: "scan" });
  const entries = await (deps.list ?? listDirectory)(options.dir);
  deps.dispatcher.setDirectoryListing(entries.map((entry) => entry.name));

  const admitted: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory) {
      logger.debug({ name: entry.name }, "path is a directory, skipping");
      continue;
    }
    if (!matchesPattern(entry.name, options.patterns)) {
      logger.debug({ name: entry.name }, "file is not accepted by pattern, skipping");
      continue;
    }
    if (deps.dispatcher.admit(entry)) admitted.push(entry.name);
  }
  return { listed: entries.length, admitted };
}

export function startScanLoop(options: ScanOptions, deps: ScanDeps): StartLoopHandle {
  const logger = deps.logger.child({ component: "scan" });
  const controller = new AbortController();
  let stopping = false;

  const runLoop = async (): Promise<void> => {
    while (!stopping) {
      try {
        logger.debug({ dir: options.dir }, "scanning directory for new files");
        const result = await scanOnce(options, deps);
        if (result.admitted.length > 0) {
          logger.info({ listed: result.listed, admitted: result.admitted.length }, "scan admitted files");
        }
      } catch (err) {
        logger.error({ err, dir: options.dir }, "directory scan failed");
        deps.reporter.captureException(err, { dir: options.dir });
      }
      if (stopping) break;
      await delay(options.intervalMs, undefined, { signal: controller.signal }).catch((err: unknown) => {
        if (!controller.signal.aborted) throw err;
      });
    }
  };

  const loopPromise = runLoop();

  return {
    stop: async () => {
      stopping = true;
      controller.abort();
      await loopPromise;
    },
  };
}
