import { promisify } from "node:util";
import { gzip } from "node:zlib";

import { Agent, fetch, type Response } from "undici";

import { UploadError, sanitizeErrorText } from "../errors.js";
import { minifyMarkup, validateMarkup } from "./markup.js";

const gzipAsync = promisify(gzip);

export interface Collector {
  send(payload: Buffer, fileName: string, attempt: number): Promise<void>;
  close(): Promise<void>;
}

export type CollectorOptions = {
  url: string;
  token: string;
  connectTimeoutSec: number;
  readTimeoutSec: number;
};

/**
 * Refuses anything that is not well-formed UTF-8 XML, so the bytes sent are never a lossy decode of the file.
 */
export async function buildUploadBody(payload: Buffer): Promise<Buffer> {
  const verdict = validateMarkup(payload);
  if (!verdict.ok) {
    throw new Error(`upload_body_rejected:${verdict.reason}${verdict.detail ? `:${verdict.detail}` : ""}`);
  }
  const minified = minifyMarkup(payload.toString("utf8"));
  const body = await gzipAsync(Buffer.from(minified, "utf8"));
  if (body.length === 0) {
    throw new Error("gzip_wrote_zero_bytes");
  }
  return body;
}

// Header values must be latin1; anything else is percent-encoded.
export function headerSafeFileName(fileName: string): string {
  return /^[\x20-\x7e]*$/.test(fileName) ? fileName : encodeURIComponent(fileName);
}

export function buildUploadHeaders(token: string, fileName: string): Record<string, string> {
  return {
    "x-access-token": token,
    "x-file-name": headerSafeFileName(fileName),
    "content-encoding": "gzip",
  };
}

/**
 * HTTP client for the collector. The connect timeout is applied at the socket
 * level; the read timeout bounds waiting for response headers and body.
 */
export class CollectorClient implements Collector {
  private readonly dispatcher: Agent;

  constructor(private readonly options: CollectorOptions) {
    const readTimeoutMs = options.readTimeoutSec * 1000;
    this.dispatcher = new Agent({
      connect: { timeout: options.connectTimeoutSec * 1000 },
      headersTimeout: readTimeoutMs,
      bodyTimeout: readTimeoutMs,
    });
  }

  async send(payload: Buffer, fileName: string, attempt: number): Promise<void> {
    const body = await buildUploadBody(payload);

    let res: Response;
    try {
      res = await fetch(this.options.url, {
        method: "POST",
        headers: buildUploadHeaders(this.options.token, fileName),
        body,
        dispatcher: this.dispatcher,
      });
    } catch (err) {
      const cause = err instanceof Error && err.cause instanceof Error ? err.cause.message : "";
      const message = err instanceof Error ? err.message : String(err);
      throw new UploadError(
        sanitizeErrorText(`collector_request_failed:${message}${cause ? `:${cause}` : ""}`),
        attempt,
        undefined,
        { cause: err },
      );
    }

    const text = await res.text();
    if (res.status !== 200) {
      throw new UploadError(
        `collector_http_status:${res.status}:${sanitizeErrorText(text) || "<empty>"}`,
        attempt,
        res.status,
      );
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
