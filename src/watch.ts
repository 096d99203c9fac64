// src/watch.ts
import { watch as watchPaths, type FSWatcher } from "chokidar";
import { DEFAULT_WATCH_DEBOUNCE_MS, DESKTOP_FILE_SUFFIX } from "./constants.js";
import type { Logger } from "./logger.js";
import { hasSuffix, errorMessage } from "./util.js";

export interface DebouncedRunner {
  trigger(): void;
  /** Resolves once nothing is scheduled or running. */
  idle(): Promise<void>;
  close(): void;
}

/**
 * Run `fn` `ms` after the last trigger. Never runs `fn` twice at once:
 * triggers that land during a run schedule exactly one more run after it.
 */
export function createDebouncedRunner(
  fn: () => Promise<void>,
  ms: number,
  logger?: Logger,
): DebouncedRunner {
  let timer: NodeJS.Timeout | null = null;
  let running: Promise<void> | null = null;
  let pending = false;
  let closed = false;
  let waiters: Array<() => void> = [];

  const settle = () => {
    if (timer || running || pending) return;
    const done = waiters;
    waiters = [];
    for (const resolve of done) resolve();
  };

  const fire = () => {
    timer = null;
    if (closed) return settle();
    if (running) {
      pending = true;
      return;
    }
    running = fn()
      .catch((err: unknown) => {
        logger?.error("triggered run failed", { error: errorMessage(err) });
      })
      .finally(() => {
        running = null;
        if (pending && !closed) {
          pending = false;
          schedule();
        } else {
          pending = false;
        }
        settle();
      });
  };

  const schedule = () => {
    if (closed) return;
    if (timer) clearTimeout(timer);
    timer = setTimeout(fire, ms);
  };

  return {
    trigger: schedule,
    idle() {
      return new Promise<void>((resolve) => {
        waiters.push(resolve);
        settle();
      });
    },
    close() {
      closed = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      pending = false;
      settle();
    },
  };
}

export interface LauncherWatcher {
  close(): Promise<void>;
}

/**
 * Call `onChange` (debounced) whenever a launcher file below `dir` appears,
 * changes or goes away, or a whole directory is removed.
 */
export function watchLaunchers(
  dir: string,
  onChange: () => Promise<void>,
  {
    debounceMs = DEFAULT_WATCH_DEBOUNCE_MS,
    suffix = DESKTOP_FILE_SUFFIX,
    logger,
  }: { debounceMs?: number; suffix?: string; logger?: Logger } = {},
): LauncherWatcher {
  const runner = createDebouncedRunner(onChange, debounceMs, logger);
  const watcher: FSWatcher = watchPaths(dir, {
    persistent: true,
    ignoreInitial: true,
    followSymlinks: false,
    alwaysStat: false,
    awaitWriteFinish: { stabilityThreshold: 200, pollInterval: 50 },
  });

  const onFile = (event: string) => (path: string) => {
    if (!hasSuffix(path, suffix)) return;
    logger?.debug("launcher changed", { event, path });
    runner.trigger();
  };
  watcher.on("add", onFile("add"));
  watcher.on("change", onFile("change"));
  watcher.on("unlink", onFile("unlink"));
  watcher.on("unlinkDir", (path: string) => {
    logger?.debug("directory removed", { path });
    runner.trigger();
  });
  watcher.on("error", (err: unknown) => {
    logger?.warn("watch error", { dir, error: errorMessage(err) });
  });

  return {
    async close() {
      runner.close();
      await watcher.close();
      await runner.idle();
    },
  };
}
