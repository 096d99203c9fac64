// src/fingerprint.ts
import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { createHash } from "node:crypto";
import type { Logger } from "./logger.js";
import { errorCode, errorMessage } from "./util.js";

// Launcher files are tiny; anything bigger than this is streamed.
export const FINGERPRINT_STREAM_CUTOFF = 1_000_000;
const STREAM_HWM = 1024 * 1024;

// Only used to notice modification, so md5 is fine.
const ALGORITHM = "md5";
const ENCODING = "hex";

export function stringFingerprint(s: string | Buffer): string {
  return createHash(ALGORITHM).update(s).digest(ENCODING);
}

/**
 * Digest of the full content of a file, or null when the file is missing
 * or unreadable. A null result is what makes callers drop a cache row, so
 * read failures are never thrown.
 */
export async function fileFingerprint(
  path: string,
  opts: { logger?: Logger } = {},
): Promise<string | null> {
  try {
    const st = await fs.stat(path);
    if (!st.isFile()) return null;
    if (st.size <= FINGERPRINT_STREAM_CUTOFF) {
      const buf = await fs.readFile(path);
      return stringFingerprint(buf);
    }
    const h = createHash(ALGORITHM);
    const rs = createReadStream(path, { highWaterMark: STREAM_HWM });
    await pipeline(rs, async function* (src: AsyncIterable<Buffer>) {
      for await (const chunk of src) {
        h.update(chunk);
        yield;
      }
    });
    return h.digest(ENCODING);
  } catch (err) {
    const code = errorCode(err);
    if (code !== "ENOENT" && code !== "ENOTDIR") {
      opts.logger?.warn("failed to read file", {
        path,
        code,
        error: errorMessage(err),
      });
    }
    // missing and unreadable are treated alike
    return null;
  }
}
