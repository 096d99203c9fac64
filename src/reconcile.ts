// src/reconcile.ts
//
// The two ways the launcher cache is brought up to date:
//
//   runFullRescan   validate every row, then discover and resolve
//                   launcher files the cache does not know yet
//   ingestPackages  record the launcher files shipped by packages that a
//                   transaction just installed or updated
import type { CacheEntry, CacheStore } from "./cache-store.js";
import { DESKTOP_FILE_SUFFIX } from "./constants.js";
import type { VisibilityEvaluator } from "./desktop-entry.js";
import { fileFingerprint } from "./fingerprint.js";
import type { Logger } from "./logger.js";
import { toInstalledPackageId } from "./package-id.js";
import { PERCENTAGE_INVALID, type ProgressReporter } from "./progress.js";
import type { PackageDisposition } from "./query-service.js";
import type { OwnershipResolver } from "./resolver.js";
import { hasSuffix } from "./util.js";
import { VisitedSet } from "./visited-set.js";
import { collectLaunchers } from "./walker.js";

export interface ReconcileContext {
  store: CacheStore;
  resolver: OwnershipResolver;
  visibility: VisibilityEvaluator;
  logger: Logger;
  progress: ProgressReporter;
  applicationDir: string;
  suffix?: string;
  signal?: AbortSignal;
}

export type RescanPhase =
  | "idle"
  | "validating-existing"
  | "discovering-new"
  | "resolving-new"
  | "done";

export interface RescanReport {
  phase: RescanPhase;
  aborted: boolean;
  checked: number;
  unchanged: number;
  removed: number;
  updated: number;
  candidates: number;
  added: number;
  unresolved: number;
  unparsable: number;
  failed: number;
}

export interface TransactionPackage {
  packageId: string;
  info: PackageDisposition;
}

export interface IngestReport {
  packages: string[];
  queried: boolean;
  files: number;
  stored: number;
  skipped: number;
  unparsable: number;
  failed: number;
}

type WriteResult = "stored" | "unparsable" | "failed";

/**
 * Write a row for `path`, deciding its menu visibility first. Files that
 * cannot be loaded as launchers are never stored, and any stale row for
 * them is dropped.
 */
async function writeEntry(
  ctx: ReconcileContext,
  path: string,
  owner: string,
  fingerprint: string,
): Promise<WriteResult> {
  const visible = await ctx.visibility.evaluate(path);
  if (visible == null) {
    ctx.logger.warn("could not load desktop file", { path });
    ctx.store.removeByPath(path);
    return "unparsable";
  }
  const entry: CacheEntry = { path, owner, visible, fingerprint };
  ctx.logger.debug("add filename", { ...entry });
  return ctx.store.upsert(entry) ? "stored" : "failed";
}

function emptyRescanReport(): RescanReport {
  return {
    phase: "idle",
    aborted: false,
    checked: 0,
    unchanged: 0,
    removed: 0,
    updated: 0,
    candidates: 0,
    added: 0,
    unresolved: 0,
    unparsable: 0,
    failed: 0,
  };
}

export async function runFullRescan(
  ctx: ReconcileContext,
): Promise<RescanReport> {
  const { store, resolver, logger, progress, signal } = ctx;
  const report = emptyRescanReport();
  const visited = new VisitedSet();

  progress.setStatus("scan-applications");
  progress.setPercentage(PERCENTAGE_INVALID);

  // modifications and removals of what we already track
  report.phase = "validating-existing";
  await store.forEach(async (entry) => {
    if (signal?.aborted) return;
    report.checked++;
    const fingerprint = await fileFingerprint(entry.path, { logger });
    if (fingerprint == null) {
      logger.debug("removing entry as file is no longer found", {
        path: entry.path,
      });
      store.removeByPath(entry.path);
      report.removed++;
      return;
    }
    visited.mark(entry.path);
    if (fingerprint === entry.fingerprint) {
      report.unchanged++;
      return;
    }

    logger.debug("fingerprint changed", {
      path: entry.path,
      stored: entry.fingerprint,
      current: fingerprint,
    });
    const resolution = await resolver.resolveOwner([entry.path], signal);
    if (!resolution.ok) {
      report.unresolved++;
      return;
    }
    const result = await writeEntry(
      ctx,
      entry.path,
      resolution.owner.name,
      fingerprint,
    );
    if (result === "stored") report.updated++;
    else if (result === "unparsable") report.unparsable++;
    else report.failed++;
  });
  if (signal?.aborted) return finishAborted(report, progress);

  report.phase = "discovering-new";
  const candidates = await collectLaunchers(ctx.applicationDir, visited, {
    suffix: ctx.suffix ?? DESKTOP_FILE_SUFFIX,
    logger,
  });
  report.candidates = candidates.length;

  report.phase = "resolving-new";
  if (candidates.length) {
    const step = 100 / candidates.length;
    progress.setStatus("generate-package-list");
    for (let i = 0; i < candidates.length; i++) {
      if (signal?.aborted) return finishAborted(report, progress);
      progress.setPercentage(i * step);
      const path = candidates[i];
      const fingerprint = await fileFingerprint(path, { logger });
      if (fingerprint == null) {
        // disappeared between the walk and now
        continue;
      }
      const resolution = await resolver.resolveOwner([path], signal);
      if (!resolution.ok) {
        logger.warn("failed to resolve owner, leaving untracked", { path });
        report.unresolved++;
        continue;
      }
      const result = await writeEntry(
        ctx,
        path,
        resolution.owner.name,
        fingerprint,
      );
      if (result === "stored") report.added++;
      else if (result === "unparsable") report.unparsable++;
      else report.failed++;
    }
  }

  report.phase = "done";
  progress.setPercentage(100);
  progress.setStatus("finished");
  logger.info("rescan complete", { ...report });
  return report;
}

function finishAborted(
  report: RescanReport,
  progress: ProgressReporter,
): RescanReport {
  report.aborted = true;
  progress.setPercentage(100);
  progress.setStatus("finished");
  return report;
}

const INGESTED_DISPOSITIONS: ReadonlySet<PackageDisposition> = new Set([
  "installing",
  "updating",
]);

/**
 * Only packages the transaction installed or updated are looked at, and
 * their ids are rewritten to the installed form before asking for files.
 * The owner comes from the manifest itself, so no ownership lookup runs.
 */
export async function ingestPackages(
  ctx: ReconcileContext,
  packages: readonly TransactionPackage[],
): Promise<IngestReport> {
  const { resolver, logger, progress, signal } = ctx;
  const suffix = ctx.suffix ?? DESKTOP_FILE_SUFFIX;
  const ids = [
    ...new Set(
      packages
        .filter((p) => INGESTED_DISPOSITIONS.has(p.info))
        .map((p) => toInstalledPackageId(p.packageId)),
    ),
  ];
  const report: IngestReport = {
    packages: ids,
    queried: false,
    files: 0,
    stored: 0,
    skipped: 0,
    unparsable: 0,
    failed: 0,
  };
  logger.debug("processing packages for desktop files", {
    count: ids.length,
  });
  if (ids.length === 0) return report;

  progress.setStatus("scan-applications");
  progress.setPercentage(PERCENTAGE_INVALID);
  report.queried = true;
  const files = await resolver.resolveFilesForPackages(ids, signal);
  report.files = files.length;

  for (const file of files) {
    if (!hasSuffix(file.path, suffix)) {
      report.skipped++;
      continue;
    }
    const fingerprint = await fileFingerprint(file.path, { logger });
    if (fingerprint == null) {
      report.skipped++;
      continue;
    }
    logger.debug("adding filename", { path: file.path, owner: file.owner });
    const result = await writeEntry(ctx, file.path, file.owner, fingerprint);
    if (result === "stored") report.stored++;
    else if (result === "unparsable") report.unparsable++;
    else report.failed++;
  }

  progress.setPercentage(100);
  logger.info("ingested package files", {
    packages: ids.length,
    stored: report.stored,
  });
  return report;
}
