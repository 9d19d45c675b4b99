import { randomUUID } from "node:crypto";
import { constants as fsConstants, promises as fs } from "node:fs";
import path from "node:path";

import JSZip from "jszip";

import type { WorkerStageV1 } from "@dropcourier/shared";

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/**
 * Fills a sibling temp file through `fill`, syncs it, then renames it onto `target`.
 * Readers of `target` never see a partial file; the temp file is removed on failure.
 */
async function commitViaTemp(target: string, fill: (tmp: string) => Promise<void>): Promise<void> {
  const tmp = `${target}.tmp-${randomUUID()}`;
  try {
    await fill(tmp);
    const handle = await fs.open(tmp, "r");
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmp, target);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

export function archivePathFor(outDir: string, fileName: string): string {
  return path.join(outDir, `${fileName}.zip`);
}

/**
 * Writes `data` as the only entry of a zip archive at `<outDir>/<fileName>.zip`.
 */
export async function writeSingleEntryArchive(
  outDir: string,
  fileName: string,
  data: Buffer,
): Promise<string> {
  const zip = new JSZip();
  zip.file(fileName, data);
  const archive = await zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
  });
  const target = archivePathFor(outDir, fileName);
  await fs.mkdir(outDir, { recursive: true });
  await commitViaTemp(target, (tmp) => fs.writeFile(tmp, archive));
  return target;
}

/**
 * Rename, falling back to copy-then-unlink when `dst` is on another device.
 */
export async function safeMove(
  src: string,
  dst: string,
  rename: (from: string, to: string) => Promise<void> = fs.rename,
): Promise<void> {
  try {
    await rename(src, dst);
    return;
  } catch (err) {
    if (errnoCode(err) !== "EXDEV") throw err;
  }
  await commitViaTemp(dst, (tmp) => fs.copyFile(src, tmp, fsConstants.COPYFILE_EXCL));
  await fs.unlink(src);
}

export type QuarantineManifest = {
  file: string;
  stage: WorkerStageV1;
  reason: string;
  attempts: number;
  failed_at: string;
};

export async function quarantineFile(
  sourcePath: string,
  quarantineDir: string,
  manifest: QuarantineManifest,
): Promise<string> {
  await fs.mkdir(quarantineDir, { recursive: true });
  const target = path.join(quarantineDir, manifest.file);
  await safeMove(sourcePath, target);
  const body = `${JSON.stringify(manifest, null, 2)}\n`;
  await commitViaTemp(path.join(quarantineDir, `${manifest.file}.error.json`), (tmp) => fs.writeFile(tmp, body));
  return target;
}
