// src/package-id.ts
//
// Package ids have the form "name;version;arch;data", where data names the
// repository, or "installed" once the package is on the system.

export interface PackageIdParts {
  name: string;
  version: string;
  arch: string;
  data: string;
}

export const INSTALLED_DATA = "installed";

export function buildPackageId(
  name: string,
  version = "",
  arch = "",
  data = "",
): string {
  return [name, version, arch, data].join(";");
}

/** Returns null unless the id has exactly four fields and a name. */
export function splitPackageId(id: string): PackageIdParts | null {
  const parts = id.split(";");
  if (parts.length !== 4) return null;
  const [name, version, arch, data] = parts;
  if (!name) return null;
  return { name, version, arch, data };
}

/** The owner name recorded in the cache for a package id. */
export function packageName(id: string): string {
  return splitPackageId(id)?.name ?? id;
}

export function toInstalledPackageId(id: string): string {
  const parts = splitPackageId(id);
  if (!parts) return id;
  return buildPackageId(parts.name, parts.version, parts.arch, INSTALLED_DATA);
}
