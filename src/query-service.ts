// src/query-service.ts
//
// The package-management backend that answers ownership and file-list
// queries. It is driven one request at a time (see query-channel.ts) and
// reports results through events: zero or more "package" or "files"
// events followed by exactly one "finished".

export type QueryRole = "search-file" | "get-files";

export type PackageFilter = "installed" | "none";

export type ExitStatus = "success" | "failed" | "cancelled" | "killed";

/** Disposition of a package inside a finished transaction. */
export type PackageDisposition =
  | "installed"
  | "available"
  | "installing"
  | "updating"
  | "removing"
  | "obsoleting"
  | "downgrading"
  | "reinstalling";

export interface PackageInfo {
  packageId: string;
  name: string;
  info: PackageDisposition;
  summary?: string;
}

export interface PackageFiles {
  packageId: string;
  files: string[];
}

export interface PackageQueryService {
  isImplemented(role: QueryRole): boolean;
  searchFiles(filter: PackageFilter, paths: readonly string[]): void;
  getFiles(packageIds: readonly string[]): void;
  /** Abort the request in flight; it must still end with "finished". */
  cancel?(): void;

  on(event: "package", listener: (pkg: PackageInfo) => void): this;
  on(event: "files", listener: (files: PackageFiles) => void): this;
  on(event: "finished", listener: (exit: ExitStatus) => void): this;
  off(event: "package", listener: (pkg: PackageInfo) => void): this;
  off(event: "files", listener: (files: PackageFiles) => void): this;
  off(event: "finished", listener: (exit: ExitStatus) => void): this;
}
