import type { StatusSnapshotV1 } from "@dropcourier/shared";

import { toErrorMessage } from "./errors.js";
import type { WatcherEvents } from "./events.js";
import type { Logger } from "./logger.js";
import type { ErrorReporter } from "./reporting/errorReporter.js";
import type { WorkerResult } from "./worker/fileWorker.js";

export type DirectoryEntry = {
  name: string;
  isDirectory: boolean;
};

export type FileRunner = (fileName: string) => Promise<WorkerResult>;

type TrackedTask = {
  name: string;
  done: Promise<void>;
};

export type DispatcherDeps = {
  run: FileRunner;
  logger: Logger;
  events: WatcherEvents;
  reporter: ErrorReporter;
};

/**
 * Registry of files currently owned by a worker. At most one worker runs per
 * file name; the entry is dropped as soon as that worker settles.
 */
export class Dispatcher {
  private readonly tracked = new Map<string, TrackedTask>();
  private dirFiles: string[] = [];
  private readonly logger: Logger;

  constructor(private readonly deps: DispatcherDeps) {
    this.logger = deps.logger.child({ component: "dispatcher" });
  }

  /**
   * Starts a worker for `entry` unless one is already tracked. Returns whether a worker was started.
   */
  admit(entry: DirectoryEntry): boolean {
    if (entry.isDirectory) return false;
    if (this.tracked.has(entry.name)) return false;

    const name = entry.name;
    const task: TrackedTask = { name, done: Promise.resolve() };
    this.tracked.set(name, task);

    task.done = Promise.resolve()
      .then(() => this.deps.run(name))
      .then(
        (result) => this.settle(result),
        (err: unknown) => this.settleUnexpected(name, err),
      )
      .catch((err: unknown) => {
        this.logger.error({ file: name, err }, "unable to record worker outcome");
      })
      .finally(() => {
        this.tracked.delete(name);
        this.logger.debug({ file: name, working: this.tracked.size }, "released file");
      });

    this.logger.info({ file: name, working: this.tracked.size }, "admitted file");
    this.deps.events.emit({ type: "task.admitted", file: name });
    return true;
  }

  has(name: string): boolean {
    return this.tracked.has(name);
  }

  size(): number {
    return this.tracked.size;
  }

  workingFiles(): string[] {
    return [...this.tracked.keys()];
  }

  setDirectoryListing(names: string[]): void {
    this.dirFiles = [...names];
  }

  snapshot(): StatusSnapshotV1 {
    return {
      dir_files: [...this.dirFiles],
      working_files: this.workingFiles(),
    };
  }

  /**
   * Resolves once every worker tracked at call time has settled and been released.
   */
  async drain(): Promise<void> {
    await Promise.all([...this.tracked.values()].map((task) => task.done));
  }

  private settle(result: WorkerResult): void {
    if (result.status === "completed") {
      this.logger.info({ file: result.file, attempts: result.attempts }, "file processed");
      this.deps.events.emit({ type: "task.completed", file: result.file, attempts: result.attempts });
      return;
    }

    this.logger.error(
      {
        file: result.file,
        stage: result.stage,
        attempts: result.attempts,
        quarantine_path: result.quarantinePath,
        err: result.error,
      },
      "file processing failed",
    );
    this.deps.reporter.captureException(result.error, { file: result.file, stage: result.stage });
    this.deps.events.emit({
      type: "task.failed",
      file: result.file,
      stage: result.stage,
      reason: result.error.message,
      attempts: result.attempts,
    });
  }

  private settleUnexpected(name: string, err: unknown): void {
    this.logger.error({ file: name, err }, "worker rejected unexpectedly");
    this.deps.reporter.captureException(err, { file: name });
    this.deps.events.emit({
      type: "task.failed",
      file: name,
      stage: "unknown",
      reason: toErrorMessage(err),
      attempts: 0,
    });
  }
}
