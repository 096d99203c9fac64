import { EventEmitter } from "node:events";
import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type {
  ExitStatus,
  PackageFilter,
  PackageInfo,
  PackageQueryService,
  QueryRole,
} from "../query-service.js";

export function wait(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function pkg(name: string, version = "1.0", arch = "x86_64"): PackageInfo {
  return {
    packageId: `${name};${version};${arch};installed`,
    name,
    info: "installed",
  };
}

export function desktopFile(name: string, extra: string[] = []): string {
  return [
    "[Desktop Entry]",
    "Type=Application",
    `Name=${name}`,
    `Exec=${name.toLowerCase()}`,
    ...extra,
    "",
  ].join("\n");
}

export async function writeFile(file: string, content: string) {
  await fsp.mkdir(path.dirname(file), { recursive: true });
  await fsp.writeFile(file, content, "utf8");
}

/**
 * In-process package backend: answers from the `owners` and `manifests`
 * maps on the next tick, the way a real backend answers asynchronously.
 */
export class FakeQueryService
  extends EventEmitter
  implements PackageQueryService
{
  readonly owners = new Map<string, PackageInfo[]>();
  readonly manifests = new Map<string, string[]>();
  readonly searches: string[][] = [];
  readonly fileRequests: string[][] = [];
  readonly roles = new Set<QueryRole>(["search-file", "get-files"]);
  exit: ExitStatus = "success";
  hang = false;
  cancelled = 0;
  /** Delay before a cancelled request reports "finished". */
  cancelDelayMs = 0;
  /** When false, cancel() never reports "finished". */
  finishOnCancel = true;

  isImplemented(role: QueryRole): boolean {
    return this.roles.has(role);
  }

  searchFiles(_filter: PackageFilter, paths: readonly string[]): void {
    this.searches.push([...paths]);
    if (this.hang) return;
    process.nextTick(() => {
      for (const p of paths) {
        for (const match of this.owners.get(p) ?? []) {
          this.emit("package", match);
        }
      }
      this.emit("finished", this.exit);
    });
  }

  getFiles(packageIds: readonly string[]): void {
    this.fileRequests.push([...packageIds]);
    if (this.hang) return;
    process.nextTick(() => {
      for (const packageId of packageIds) {
        const files = this.manifests.get(packageId);
        if (files) this.emit("files", { packageId, files });
      }
      this.emit("finished", this.exit);
    });
  }

  cancel(): void {
    this.cancelled++;
    if (!this.finishOnCancel) return;
    const finish = () => this.emit("finished", "cancelled");
    if (this.cancelDelayMs > 0) setTimeout(finish, this.cancelDelayMs);
    else process.nextTick(finish);
  }
}
