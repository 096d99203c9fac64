// src/plugin.ts
//
// Hooks the launcher cache into a package-manager transaction host: the
// host calls initialize() once, onOperationFinished() after every
// transaction, and destroy() on shutdown.
import { CacheStore } from "./cache-store.js";
import type { LauncherCacheConfig } from "./config.js";
import {
  DesktopEntryVisibility,
  type VisibilityEvaluator,
} from "./desktop-entry.js";
import { NullLogger, type Logger } from "./logger.js";
import { LoggingProgress, type ProgressReporter } from "./progress.js";
import { QueryChannel } from "./query-channel.js";
import type { PackageQueryService } from "./query-service.js";
import {
  ingestPackages,
  runFullRescan,
  type IngestReport,
  type ReconcileContext,
  type RescanReport,
  type TransactionPackage,
} from "./reconcile.js";
import { OwnershipResolver } from "./resolver.js";
import { errorMessage } from "./util.js";

export type TransactionRole =
  | "refresh-cache"
  | "install-packages"
  | "update-packages"
  | "remove-packages"
  | "search-file"
  | "get-files";

export interface FinishedOperation {
  role: TransactionRole;
  /** Packages the transaction reported, with their dispositions. */
  packages?: readonly TransactionPackage[];
}

export type PluginResult =
  | { role: "refresh-cache"; report: RescanReport }
  | { role: "install-packages"; report: IngestReport }
  | null;

export interface DesktopFilePluginOptions {
  config: LauncherCacheConfig;
  service: PackageQueryService;
  logger?: Logger;
  visibility?: VisibilityEvaluator;
  progress?: ProgressReporter;
}

export class DesktopFilePlugin {
  static readonly description =
    "Scans desktop files on refresh and adds them to a database";

  private readonly config: LauncherCacheConfig;
  private readonly logger: Logger;
  private readonly channel: QueryChannel;
  private readonly resolver: OwnershipResolver;
  private readonly visibility: VisibilityEvaluator;
  private readonly progress: ProgressReporter;
  private store: CacheStore | null = null;
  // triggers run one after another so only one query is ever in flight
  private queue: Promise<unknown> = Promise.resolve();

  constructor(opts: DesktopFilePluginOptions) {
    this.config = opts.config;
    this.logger = opts.logger ?? new NullLogger();
    this.channel = new QueryChannel(opts.service, {
      timeoutMs: opts.config.queryTimeoutMs,
      logger: this.logger.child("query"),
    });
    this.resolver = new OwnershipResolver(
      this.channel,
      this.logger.child("resolver"),
    );
    this.visibility =
      opts.visibility ??
      new DesktopEntryVisibility({ logger: this.logger.child("desktop") });
    this.progress =
      opts.progress ?? new LoggingProgress(this.logger.child("progress"));
  }

  /** True once initialize() opened the cache. */
  get active(): boolean {
    return this.store != null;
  }

  get cache(): CacheStore | null {
    return this.store;
  }

  /**
   * Open (or create) the cache. When disabled by configuration, or when the
   * database cannot be opened, the plugin stays inert for its lifetime.
   */
  initialize(): boolean {
    if (this.store) return true;
    if (!this.config.enabled) {
      this.logger.debug("desktop file scanning disabled");
      return false;
    }
    try {
      this.store = CacheStore.open(
        this.config.databasePath,
        this.logger.child("store"),
      );
      return true;
    } catch (err) {
      this.logger.warn("can't open desktop database", {
        dbPath: this.config.databasePath,
        error: errorMessage(err),
      });
      return false;
    }
  }

  destroy(): void {
    this.store?.close();
    this.store = null;
  }

  /**
   * Never rejects: failures are logged and reported as null, so a broken
   * cache cannot fail the transaction that triggered it.
   */
  onOperationFinished(
    op: FinishedOperation,
    signal?: AbortSignal,
  ): Promise<PluginResult> {
    const run = this.queue.then(() => this.handle(op, signal));
    this.queue = run;
    return run;
  }

  private context(store: CacheStore, signal?: AbortSignal): ReconcileContext {
    return {
      store,
      resolver: this.resolver,
      visibility: this.visibility,
      logger: this.logger.child("reconcile"),
      progress: this.progress,
      applicationDir: this.config.applicationDir,
      signal,
    };
  }

  private async handle(
    op: FinishedOperation,
    signal?: AbortSignal,
  ): Promise<PluginResult> {
    const store = this.store;
    if (!store) return null;
    try {
      switch (op.role) {
        case "refresh-cache":
          if (!this.channel.isImplemented("search-file")) {
            this.logger.debug("cannot search files");
            return null;
          }
          return {
            role: op.role,
            report: await runFullRescan(this.context(store, signal)),
          };
        case "install-packages":
          if (!this.channel.isImplemented("get-files")) {
            this.logger.debug("cannot get files");
            return null;
          }
          return {
            role: op.role,
            report: await ingestPackages(
              this.context(store, signal),
              op.packages ?? [],
            ),
          };
        default:
          return null;
      }
    } catch (err) {
      this.logger.error("desktop file reconciliation failed", {
        role: op.role,
        error: errorMessage(err),
      });
      return null;
    }
  }
}
