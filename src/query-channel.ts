// src/query-channel.ts
import { DEFAULT_QUERY_TIMEOUT_MS } from "./constants.js";
import { NullLogger, type Logger } from "./logger.js";
import type {
  ExitStatus,
  PackageFiles,
  PackageFilter,
  PackageInfo,
  PackageQueryService,
  QueryRole,
} from "./query-service.js";
import { errorMessage } from "./util.js";

export type QueryExit = ExitStatus | "timeout" | "aborted";

export interface QueryOutcome<T> {
  exit: QueryExit;
  /** Results in delivery order; complete once the outcome is returned. */
  matches: T[];
}

export class QueryBusyError extends Error {
  constructor(readonly active: string) {
    super(`a ${active} query is still in flight`);
    this.name = "QueryBusyError";
  }
}

export interface QueryChannelOptions {
  /** 0 waits forever. */
  timeoutMs?: number;
  /** How long a cancelled request may take to report "finished". */
  cancelGraceMs?: number;
  logger?: Logger;
}

export const DEFAULT_CANCEL_GRACE_MS = 5_000;

/**
 * Turns the event stream of a PackageQueryService into request/response
 * calls. Only one request may be outstanding: results are not keyed, so a
 * second request would mix its matches into the first. A request that
 * times out or is aborted keeps the channel busy until the backend reports
 * "finished" for it.
 */
export class QueryChannel {
  private readonly timeoutMs: number;
  private readonly cancelGraceMs: number;
  private readonly logger: Logger;
  private active: string | null = null;
  private stuck = false;

  constructor(
    private readonly service: PackageQueryService,
    {
      timeoutMs = DEFAULT_QUERY_TIMEOUT_MS,
      cancelGraceMs = DEFAULT_CANCEL_GRACE_MS,
      logger,
    }: QueryChannelOptions = {},
  ) {
    this.timeoutMs = Math.max(0, timeoutMs);
    this.cancelGraceMs = Math.max(0, cancelGraceMs);
    this.logger = logger ?? new NullLogger();
  }

  get busy(): boolean {
    return this.active != null;
  }

  /** A cancelled request never finished within the grace period. */
  get stalled(): boolean {
    return this.stuck;
  }

  isImplemented(role: QueryRole): boolean {
    return this.service.isImplemented(role);
  }

  searchFiles(
    filter: PackageFilter,
    paths: readonly string[],
    signal?: AbortSignal,
  ): Promise<QueryOutcome<PackageInfo>> {
    return this.run<PackageInfo>(
      "search-file",
      (push) => {
        this.service.on("package", push);
        return () => this.service.off("package", push);
      },
      () => this.service.searchFiles(filter, paths),
      signal,
    );
  }

  getFiles(
    packageIds: readonly string[],
    signal?: AbortSignal,
  ): Promise<QueryOutcome<PackageFiles>> {
    return this.run<PackageFiles>(
      "get-files",
      (push) => {
        this.service.on("files", push);
        return () => this.service.off("files", push);
      },
      () => this.service.getFiles(packageIds),
      signal,
    );
  }

  private async run<T>(
    label: string,
    subscribe: (push: (item: T) => void) => () => void,
    issue: () => void,
    signal?: AbortSignal,
  ): Promise<QueryOutcome<T>> {
    if (this.active != null) {
      throw new QueryBusyError(this.active);
    }
    if (signal?.aborted) {
      return { exit: "aborted", matches: [] };
    }
    this.active = label;

    // the pending match list, fresh for every request
    const matches: T[] = [];
    const unsubscribe = subscribe((item) => matches.push(item));
    let onFinished: (status: ExitStatus) => void = () => {};
    const finished = new Promise<ExitStatus>((resolve) => {
      onFinished = resolve;
      this.service.on("finished", resolve);
    });
    const release = () => {
      this.service.off("finished", onFinished);
      this.active = null;
    };

    const cleanup: Array<() => void> = [unsubscribe];
    let exit: QueryExit;
    try {
      const interrupted = new Promise<QueryExit>((resolve) => {
        if (this.timeoutMs > 0) {
          const timer = setTimeout(() => resolve("timeout"), this.timeoutMs);
          cleanup.push(() => clearTimeout(timer));
        }
        if (signal) {
          const onAbort = () => resolve("aborted");
          signal.addEventListener("abort", onAbort, { once: true });
          cleanup.push(() => signal.removeEventListener("abort", onAbort));
        }
      });
      issue();
      exit = await Promise.race([finished, interrupted]);
    } catch (err) {
      release();
      throw err;
    } finally {
      for (const fn of cleanup) fn();
    }

    if (exit === "timeout" || exit === "aborted") {
      this.cancelInFlight(label);
      await this.drain(label, finished, release);
    } else {
      release();
    }
    if (exit !== "success") {
      this.logger.warn(`${label} failed with exit code: ${exit}`, {
        matches: matches.length,
      });
    }
    return { exit, matches };
  }

  /**
   * Wait for the cancelled request's own "finished". Past the grace period
   * the caller gets its answer, but the channel stays busy until the
   * backend finally reports.
   */
  private async drain(
    label: string,
    finished: Promise<ExitStatus>,
    release: () => void,
  ): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<"stalled">((resolve) => {
      timer = setTimeout(() => resolve("stalled"), this.cancelGraceMs);
    });
    const result = await Promise.race([finished, grace]);
    clearTimeout(timer);
    if (result !== "stalled") {
      release();
      return;
    }
    this.stuck = true;
    this.logger.warn(`${label} did not finish after cancel`, {
      graceMs: this.cancelGraceMs,
    });
    void finished.then((status) => {
      this.stuck = false;
      release();
      this.logger.info(`${label} finished late`, { status });
    });
  }

  private cancelInFlight(label: string): void {
    if (!this.service.cancel) return;
    try {
      this.service.cancel();
    } catch (err) {
      this.logger.warn(`failed to cancel ${label}`, {
        error: errorMessage(err),
      });
    }
  }
}
