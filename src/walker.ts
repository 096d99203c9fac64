// src/walker.ts
import { realpathSync } from "node:fs";
import * as walk from "@nodelib/fs.walk";
import { DESKTOP_FILE_SUFFIX } from "./constants.js";
import type { Logger } from "./logger.js";
import { hasSuffix } from "./util.js";

export interface WalkFilter {
  has(path: string): boolean;
}

export interface WalkOptions {
  suffix?: string;
  logger?: Logger;
}

function realDir(path: string): string | null {
  try {
    return realpathSync(path);
  } catch {
    // vanished or dangling while walking
    return null;
  }
}

/**
 * Lazily yield launcher files below `root` that `exclude` does not already
 * know about. Symlinked directories are followed, each real directory at
 * most once. Directories that cannot be read are reported and skipped.
 */
export async function* iterateLaunchers(
  root: string,
  exclude: WalkFilter,
  { suffix = DESKTOP_FILE_SUFFIX, logger }: WalkOptions = {},
): AsyncGenerator<string> {
  const seenDirs = new Set<string>();
  const rootReal = realDir(root);
  if (rootReal) seenDirs.add(rootReal);

  const stream = walk.walkStream(root, {
    followSymbolicLinks: true,
    deepFilter: (e) => {
      const real = realDir(e.path);
      if (real == null || seenDirs.has(real)) return false;
      seenDirs.add(real);
      return true;
    },
    entryFilter: (e) =>
      !e.dirent.isDirectory() &&
      hasSuffix(e.name, suffix) &&
      !exclude.has(e.path),
    errorFilter: (err) => {
      logger?.warn("failed to open directory", {
        path: err.path,
        code: err.code,
        error: err.message,
      });
      return true;
    },
  });

  // the walk stream never reports close, so drive it from data/end
  const queue: string[] = [];
  const state: { ended: boolean; failure: Error | null } = {
    ended: false,
    failure: null,
  };
  let wake: (() => void) | null = null;
  const notify = () => {
    const fn = wake;
    wake = null;
    fn?.();
  };
  stream.on("data", (entry: walk.Entry) => {
    queue.push(entry.path);
    notify();
  });
  stream.once("end", () => {
    state.ended = true;
    notify();
  });
  stream.once("error", (err: Error) => {
    state.failure = err;
    state.ended = true;
    notify();
  });

  try {
    for (;;) {
      const path = queue.shift();
      if (path != null) {
        logger?.debug("not present in cache", { path });
        yield path;
        continue;
      }
      if (state.failure) throw state.failure;
      if (state.ended) return;
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  } finally {
    if (!state.ended) {
      stream.removeAllListeners("data");
      stream.destroy();
    }
  }
}

/**
 * Materialize the walk, sorted, so callers can report progress against a
 * known total.
 */
export async function collectLaunchers(
  root: string,
  exclude: WalkFilter,
  opts: WalkOptions = {},
): Promise<string[]> {
  const out: string[] = [];
  for await (const path of iterateLaunchers(root, exclude, opts)) {
    out.push(path);
  }
  out.sort();
  return out;
}
