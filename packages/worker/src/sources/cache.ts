// =============================================================================
// @dailysync/worker — On-disk cache of fetched source text
// =============================================================================
// Every fetched page is written here and read back before use. Writes go to
// a temp file that is renamed into place, and each file starts with a
// checksum header, so a read never returns a partial write: it either gets
// the full text or throws CacheIntegrityError.
// =============================================================================

import { createHash, randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { CacheIntegrityError, type DateKey } from "@dailysync/shared";

export interface SourceCache {
  /** Stores `text` for one source and date; returns the file path. */
  write(date: DateKey, source: string, text: string): Promise<string>;
  /** Reads a file written by `write`, verifying its header. */
  read(path: string): Promise<string>;
}

const HEADER_PATTERN = /^#sha256=([0-9a-f]{64});bytes=(\d+)$/;

function sha256(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

export function integrityHeader(text: string): string {
  return `#sha256=${sha256(text)};bytes=${Buffer.byteLength(text, "utf8")}`;
}

/** File name for one source on one date, e.g. "13-10-2025_drishti.txt". */
export function cacheFileName(date: DateKey, source: string): string {
  const safeSource = source.replace(/[^A-Za-z0-9_-]/g, "_");
  return `${date}_${safeSource}.txt`;
}

export function createFileSourceCache(dir: string): SourceCache {
  return {
    async write(date, source, text) {
      await mkdir(dir, { recursive: true });
      const target = join(dir, cacheFileName(date, source));
      const temp = `${target}.${randomUUID()}.tmp`;
      try {
        await writeFile(temp, `${integrityHeader(text)}\n${text}`, "utf8");
        await rename(temp, target);
      } catch (err) {
        await rm(temp, { force: true });
        throw err;
      }
      return target;
    },

    async read(path) {
      const raw = await readFile(path, "utf8");
      const newline = raw.indexOf("\n");
      const header = HEADER_PATTERN.exec(
        newline === -1 ? raw : raw.slice(0, newline),
      );
      if (newline === -1 || !header) {
        throw new CacheIntegrityError(path, "Cached source has no integrity header");
      }

      const body = raw.slice(newline + 1);
      const expectedBytes = Number(header[2]);
      const actualBytes = Buffer.byteLength(body, "utf8");
      if (actualBytes !== expectedBytes) {
        throw new CacheIntegrityError(
          path,
          `Cached source is truncated: expected ${expectedBytes} bytes, found ${actualBytes}`,
        );
      }
      if (sha256(body) !== header[1]) {
        throw new CacheIntegrityError(path, "Cached source checksum mismatch");
      }
      return body;
    },
  };
}
