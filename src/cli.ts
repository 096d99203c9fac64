#!/usr/bin/env node
// src/cli.ts
import { readFileSync } from "node:fs";
import path from "node:path";
import { Command, Option } from "commander";
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { CacheEntry } from "./cache-store.js";
import { cliEntrypoint, parseIntOption } from "./cli-util.js";
import {
  BACKEND_KINDS,
  CommandQueryService,
  type BackendKind,
} from "./command-backend.js";
import { loadConfig, type LauncherCacheConfig } from "./config.js";
import {
  CLI_NAME,
  DEFAULT_CONFIG_FILE,
  DEFAULT_WATCH_DEBOUNCE_MS,
} from "./constants.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import { DesktopFilePlugin } from "./plugin.js";
import type { PackageQueryService } from "./query-service.js";
import type { IngestReport, RescanReport } from "./reconcile.js";
import { watchLaunchers } from "./watch.js";

type GlobalOptions = {
  logLevel?: string;
  config?: string;
  db?: string;
  appDir?: string;
  backend?: BackendKind;
  timeout?: number;
  force?: boolean;
};

export interface CliDeps {
  createService?: (kind: BackendKind, logger: Logger) => PackageQueryService;
  createLogger?: (level: string | undefined) => Logger;
  env?: NodeJS.ProcessEnv;
}

function readVersion(): string {
  try {
    const raw = readFileSync(path.join(__dirname, "..", "package.json"), "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === "object" && "version" in parsed) {
      return String(parsed.version);
    }
  } catch {
    // running from an unusual layout; fall through
  }
  return "0.0.0";
}

export function formatRescan(report: RescanReport): string {
  const parts = [
    `${report.checked} checked`,
    `${report.removed} removed`,
    `${report.updated} updated`,
    `${report.added} added`,
    `${report.unresolved} unresolved`,
  ];
  if (report.unparsable) parts.push(`${report.unparsable} unparsable`);
  if (report.failed) parts.push(`${report.failed} failed`);
  return `rescan: ${parts.join(", ")}${report.aborted ? " (aborted)" : ""}`;
}

export function formatIngest(report: IngestReport): string {
  if (!report.queried) return "ingest: no installed or updated packages";
  return `ingest: ${report.stored} stored from ${report.packages.length} package(s), ${report.files} file(s) listed`;
}

export function formatEntries(entries: CacheEntry[]): string {
  const table = new AsciiTable3("Launchers")
    .setHeading("Path", "Package", "Show", "Fingerprint")
    .setStyle("unicode-round");
  [1, 2, 3, 4].forEach((idx) => table.setAlign(idx, AlignmentEnum.LEFT));
  for (const e of entries) {
    table.addRow(e.path, e.owner, e.visible ? "yes" : "no", e.fingerprint);
  }
  return table.toString();
}

export function buildProgram(deps: CliDeps = {}): Command {
  const createLogger =
    deps.createLogger ?? ((level) => new ConsoleLogger(parseLogLevel(level)));
  const createService =
    deps.createService ??
    ((kind, logger) => new CommandQueryService(kind, { logger }));

  const program = new Command()
    .name(CLI_NAME)
    .description("Cache of desktop launcher files and the packages that own them")
    .version(readVersion())
    .option("--log-level <level>", `log verbosity (${LOG_LEVELS.join(", ")})`)
    .option("--config <file>", "daemon key-file configuration", DEFAULT_CONFIG_FILE)
    .option("--db <file>", "path to the launcher cache database")
    .option("--app-dir <dir>", "directory holding launcher files")
    .addOption(
      new Option("--backend <kind>", "package database tool").choices(
        BACKEND_KINDS,
      ),
    )
    .option(
      "--timeout <ms>",
      "give up on a backend query after this long (0 = never)",
      parseIntOption,
    )
    .option("--force", "run even if ScanDesktopFiles is disabled", false);

  async function withPlugin<T>(
    command: Command,
    fn: (plugin: DesktopFilePlugin, config: LauncherCacheConfig, logger: Logger) => Promise<T>,
  ): Promise<T | undefined> {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const bootLogger = createLogger(globals.logLevel);
    const overrides: Partial<LauncherCacheConfig> = {
      databasePath: globals.db,
      applicationDir: globals.appDir,
      backend: globals.backend,
      queryTimeoutMs: globals.timeout,
    };
    if (globals.force) overrides.enabled = true;
    const config = await loadConfig({
      configFile: globals.config,
      env: deps.env,
      overrides,
      logger: bootLogger,
    });
    const logger = globals.logLevel ? bootLogger : createLogger(config.logLevel);
    const plugin = new DesktopFilePlugin({
      config,
      service: createService(config.backend, logger.child("backend")),
      logger,
    });
    if (!plugin.initialize()) {
      logger.warn(
        config.enabled
          ? "launcher cache is unavailable"
          : "launcher cache is disabled (ScanDesktopFiles=false)",
      );
      process.exitCode = 1;
      return undefined;
    }
    try {
      return await fn(plugin, config, logger);
    } finally {
      plugin.destroy();
    }
  }

  program
    .command("rescan")
    .description("validate every cached launcher and add new ones")
    .action(async (_opts: unknown, command: Command) => {
      await withPlugin(command, async (plugin) => {
        const result = await plugin.onOperationFinished({ role: "refresh-cache" });
        if (result?.role === "refresh-cache") {
          console.log(formatRescan(result.report));
        }
      });
    });

  program
    .command("ingest")
    .description("record launchers shipped by freshly installed packages")
    .argument("<package-id...>", "package ids (name;version;arch;data)")
    .action(async (ids: string[], _opts: unknown, command: Command) => {
      await withPlugin(command, async (plugin) => {
        const result = await plugin.onOperationFinished({
          role: "install-packages",
          packages: ids.map((packageId) => ({ packageId, info: "installing" })),
        });
        if (result?.role === "install-packages") {
          console.log(formatIngest(result.report));
        }
      });
    });

  program
    .command("list")
    .description("print every cached launcher")
    .action(async (_opts: unknown, command: Command) => {
      await withPlugin(command, async (plugin) => {
        const entries = plugin.cache?.all() ?? [];
        console.log(entries.length ? formatEntries(entries) : "cache is empty");
      });
    });

  program
    .command("lookup")
    .description("show the owner of one launcher file")
    .argument("<path>", "absolute path of the launcher file")
    .action(async (file: string, _opts: unknown, command: Command) => {
      await withPlugin(command, async (plugin) => {
        const entry = plugin.cache?.get(path.resolve(file));
        if (!entry) {
          console.log(`${file}: not in cache`);
          process.exitCode = 1;
          return;
        }
        console.log(`${entry.path}: ${entry.owner} (${entry.visible ? "shown" : "hidden"})`);
      });
    });

  program
    .command("watch")
    .description("rescan whenever launcher files change")
    .option("--debounce <ms>", "quiet period before rescanning", parseIntOption, DEFAULT_WATCH_DEBOUNCE_MS)
    .action(async (opts: { debounce: number }, command: Command) => {
      await withPlugin(command, async (plugin, config, logger) => {
        const rescan = async () => {
          const result = await plugin.onOperationFinished({ role: "refresh-cache" });
          if (result?.role === "refresh-cache") {
            logger.info(formatRescan(result.report));
          }
        };
        await rescan();
        const watcher = watchLaunchers(config.applicationDir, rescan, {
          debounceMs: opts.debounce,
          logger: logger.child("watch"),
        });
        logger.info("watching for launcher changes", { dir: config.applicationDir });
        await new Promise<void>((resolve) => {
          const stop = () => {
            process.off("SIGINT", stop);
            process.off("SIGTERM", stop);
            resolve();
          };
          process.on("SIGINT", stop);
          process.on("SIGTERM", stop);
        });
        await watcher.close();
      });
    });

  return program;
}

cliEntrypoint(module, () => buildProgram(), { label: CLI_NAME });
