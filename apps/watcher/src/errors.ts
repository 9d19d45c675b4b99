import type { WorkerStageV1 } from "@dropcourier/shared";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class UploadError extends Error {
  public readonly status?: number;
  public readonly attempt: number;

  constructor(message: string, attempt: number, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UploadError";
    this.attempt = attempt;
    this.status = status;
  }
}

export class FileWorkerError extends Error {
  public readonly stage: WorkerStageV1;
  public readonly file: string;

  constructor(file: string, stage: WorkerStageV1, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FileWorkerError";
    this.file = file;
    this.stage = stage;
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function sanitizeErrorText(input: string): string {
  return input
    .replace(/(x-access-token[:=]\s*)[^\s,]+/gi, "$1[REDACTED]")
    .replace(/(https?:\/\/[^\s?]+)\?[^\s]*/gi, "$1?[REDACTED]")
    .slice(0, 500);
}
