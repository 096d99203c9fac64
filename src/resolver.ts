// src/resolver.ts
import { NullLogger, type Logger } from "./logger.js";
import { packageName } from "./package-id.js";
import type { QueryChannel, QueryExit } from "./query-channel.js";
import type { PackageInfo } from "./query-service.js";

export type OwnerResolution =
  | { ok: true; owner: PackageInfo; exit: QueryExit }
  | { ok: false; reason: "none" | "ambiguous"; matches: number; exit: QueryExit };

export interface OwnedFile {
  path: string;
  owner: string;
  packageId: string;
}

export class OwnershipResolver {
  private readonly logger: Logger;

  constructor(
    private readonly channel: QueryChannel,
    logger?: Logger,
  ) {
    this.logger = logger ?? new NullLogger();
  }

  /**
   * Ask the backend which installed package owns `paths`. Only a single
   * match counts as an answer; we never guess between several owners.
   */
  async resolveOwner(
    paths: readonly string[],
    signal?: AbortSignal,
  ): Promise<OwnerResolution> {
    const { exit, matches } = await this.channel.searchFiles(
      "installed",
      paths,
      signal,
    );
    if (matches.length === 1) {
      return { ok: true, owner: matches[0], exit };
    }
    this.logger.warn("ownership is not exactly one package", {
      paths: [...paths],
      matches: matches.length,
      owners: matches.map((m) => m.packageId),
    });
    return {
      ok: false,
      reason: matches.length === 0 ? "none" : "ambiguous",
      matches: matches.length,
      exit,
    };
  }

  /** Flatten the manifests of `packageIds` into (path, owner) pairs. */
  async resolveFilesForPackages(
    packageIds: readonly string[],
    signal?: AbortSignal,
  ): Promise<OwnedFile[]> {
    if (packageIds.length === 0) return [];
    const { matches } = await this.channel.getFiles(packageIds, signal);
    const out: OwnedFile[] = [];
    for (const delivered of matches) {
      const owner = packageName(delivered.packageId);
      for (const path of delivered.files) {
        out.push({ path, owner, packageId: delivered.packageId });
      }
    }
    return out;
  }
}
