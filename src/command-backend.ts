// src/command-backend.ts
//
// PackageQueryService backed by the system package database tools.
import { spawn } from "node:child_process";
import { EventEmitter } from "node:events";
import { NullLogger, type Logger } from "./logger.js";
import { buildPackageId, INSTALLED_DATA } from "./package-id.js";
import type {
  ExitStatus,
  PackageFiles,
  PackageFilter,
  PackageInfo,
  PackageQueryService,
  QueryRole,
} from "./query-service.js";
import { errorMessage } from "./util.js";

export type BackendKind = "dpkg" | "rpm";
export const BACKEND_KINDS: BackendKind[] = ["dpkg", "rpm"];

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  signal: AbortSignal,
) => Promise<CommandResult>;

export const spawnCommand: CommandRunner = (command, args, signal) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      env: { ...process.env, LC_ALL: "C" },
      signal,
    });
    let stdout = "";
    let stderr = "";
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.on("error", reject);
    child.on("close", (code) => resolve({ code, stdout, stderr }));
  });

function installedPackage(name: string, version = "", arch = ""): PackageInfo {
  return {
    packageId: buildPackageId(name, version, arch, INSTALLED_DATA),
    name,
    info: "installed",
  };
}

/**
 * `dpkg-query -S` prints "pkg[:arch][, pkg2...]: /path". Diversion notes
 * and "no path found" messages are ignored.
 */
export function parseDpkgSearch(stdout: string): PackageInfo[] {
  const out = new Map<string, PackageInfo>();
  for (const line of stdout.split("\n")) {
    const sep = line.indexOf(": /");
    if (sep <= 0 || line.startsWith("diversion by")) continue;
    for (const raw of line.slice(0, sep).split(",")) {
      const spec = raw.trim();
      if (!spec) continue;
      const colon = spec.indexOf(":");
      const pkg =
        colon > 0
          ? installedPackage(spec.slice(0, colon), "", spec.slice(colon + 1))
          : installedPackage(spec);
      out.set(pkg.packageId, pkg);
    }
  }
  return [...out.values()];
}

/** `dpkg-query -L` prints one path per line, directories included. */
export function parseDpkgList(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("/"));
}

export const RPM_QUERY_FORMAT = "%{NAME};%{VERSION}-%{RELEASE};%{ARCH}\\n";

/** Lines produced by `rpm -qf --queryformat RPM_QUERY_FORMAT`. */
export function parseRpmSearch(stdout: string): PackageInfo[] {
  const out = new Map<string, PackageInfo>();
  for (const line of stdout.split("\n")) {
    const fields = line.trim().split(";");
    if (fields.length !== 3 || !fields[0]) continue;
    const pkg = installedPackage(fields[0], fields[1], fields[2]);
    out.set(pkg.packageId, pkg);
  }
  return [...out.values()];
}

export function parseRpmList(stdout: string): string[] {
  return parseDpkgList(stdout);
}

interface BackendCommands {
  search(paths: readonly string[]): [string, string[]];
  list(name: string): [string, string[]];
  parseSearch(stdout: string): PackageInfo[];
  parseList(stdout: string): string[];
}

const COMMANDS: Record<BackendKind, BackendCommands> = {
  dpkg: {
    search: (paths) => ["dpkg-query", ["-S", ...paths]],
    list: (name) => ["dpkg-query", ["-L", name]],
    parseSearch: parseDpkgSearch,
    parseList: parseDpkgList,
  },
  rpm: {
    search: (paths) => ["rpm", ["-qf", "--queryformat", RPM_QUERY_FORMAT, ...paths]],
    list: (name) => ["rpm", ["-ql", name]],
    parseSearch: parseRpmSearch,
    parseList: parseRpmList,
  },
};

export class CommandQueryService
  extends EventEmitter
  implements PackageQueryService
{
  private readonly commands: BackendCommands;
  private readonly run: CommandRunner;
  private readonly logger: Logger;
  private controller: AbortController | null = null;

  constructor(
    readonly kind: BackendKind,
    opts: { runner?: CommandRunner; logger?: Logger } = {},
  ) {
    super();
    this.commands = COMMANDS[kind];
    this.run = opts.runner ?? spawnCommand;
    this.logger = opts.logger ?? new NullLogger();
  }

  isImplemented(role: QueryRole): boolean {
    return role === "search-file" || role === "get-files";
  }

  searchFiles(_filter: PackageFilter, paths: readonly string[]): void {
    // both tools only know about installed packages
    this.start("search-file", async (signal) => {
      const [cmd, args] = this.commands.search(paths);
      const res = await this.run(cmd, args, signal);
      if (signal.aborted) return "cancelled";
      // exit 1 only means some path has no owner
      if (res.code !== 0 && res.code !== 1) {
        throw new Error(`${cmd} exited ${res.code}: ${res.stderr.trim()}`);
      }
      for (const pkg of this.commands.parseSearch(res.stdout)) {
        this.emit("package", pkg);
      }
      return "success";
    });
  }

  getFiles(packageIds: readonly string[]): void {
    this.start("get-files", async (signal) => {
      let status: ExitStatus = "success";
      for (const packageId of packageIds) {
        const name = packageId.split(";")[0];
        const [cmd, args] = this.commands.list(name);
        const res = await this.run(cmd, args, signal);
        if (signal.aborted) return "cancelled";
        if (res.code !== 0) {
          this.logger.warn("cannot list package files", {
            packageId,
            code: res.code,
            stderr: res.stderr.trim(),
          });
          status = "failed";
          continue;
        }
        const files: PackageFiles = {
          packageId,
          files: this.commands.parseList(res.stdout),
        };
        this.emit("files", files);
      }
      return status;
    });
  }

  cancel(): void {
    this.controller?.abort();
  }

  private start(
    label: QueryRole,
    job: (signal: AbortSignal) => Promise<ExitStatus>,
  ): void {
    // a new request supersedes whatever is still running
    this.controller?.abort();
    const controller = new AbortController();
    this.controller = controller;
    void job(controller.signal).then(
      (status) => this.finish(controller, status),
      (err: unknown) => {
        if (!controller.signal.aborted) {
          this.logger.warn(`${label} command failed`, {
            error: errorMessage(err),
          });
        }
        this.finish(controller, "failed");
      },
    );
  }

  private finish(controller: AbortController, status: ExitStatus): void {
    // superseded requests have no listener left to tell
    if (this.controller !== controller) return;
    this.controller = null;
    this.emit("finished", controller.signal.aborted ? "cancelled" : status);
  }
}
