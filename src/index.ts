export {
  CacheStore,
  StoreUnavailableError,
  rowToEntry,
  type CacheEntry,
} from "./cache-store.js";

export { openCacheDb, type Database } from "./db.js";

export { fileFingerprint, stringFingerprint } from "./fingerprint.js";

export { VisitedSet } from "./visited-set.js";

export { iterateLaunchers, collectLaunchers } from "./walker.js";

export {
  buildPackageId,
  splitPackageId,
  packageName,
  toInstalledPackageId,
  type PackageIdParts,
} from "./package-id.js";

export type {
  ExitStatus,
  PackageDisposition,
  PackageFiles,
  PackageFilter,
  PackageInfo,
  PackageQueryService,
  QueryRole,
} from "./query-service.js";

export {
  QueryChannel,
  QueryBusyError,
  type QueryExit,
  type QueryOutcome,
} from "./query-channel.js";

export {
  OwnershipResolver,
  type OwnerResolution,
  type OwnedFile,
} from "./resolver.js";

export {
  DesktopEntryVisibility,
  loadDesktopEntry,
  parseDesktopEntry,
  shouldShow,
  type DesktopEntry,
  type VisibilityEvaluator,
} from "./desktop-entry.js";

export { parseKeyFile, KeyFile, KeyFileParseError } from "./keyfile.js";

export {
  LoggingProgress,
  NullProgress,
  PERCENTAGE_INVALID,
  type ProgressReporter,
  type ScanStatus,
} from "./progress.js";

export {
  runFullRescan,
  ingestPackages,
  type ReconcileContext,
  type RescanReport,
  type IngestReport,
  type TransactionPackage,
} from "./reconcile.js";

export {
  CommandQueryService,
  type BackendKind,
  type CommandRunner,
} from "./command-backend.js";

export {
  loadConfig,
  DEFAULT_CONFIG,
  type LauncherCacheConfig,
} from "./config.js";

export {
  DesktopFilePlugin,
  type FinishedOperation,
  type PluginResult,
  type TransactionRole,
} from "./plugin.js";

export { watchLaunchers, createDebouncedRunner } from "./watch.js";

export {
  ConsoleLogger,
  StructuredLogger,
  NullLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";
