import fsp from "node:fs/promises";
import path from "node:path";
import {
  applyEnv,
  applyKeyFile,
  DEFAULT_CONFIG,
  loadConfig,
} from "../config.js";
import { parseKeyFile } from "../keyfile.js";
import { MemoryLogger } from "../logger.js";
import { mkTmp } from "./util.js";

describe("config", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkTmp("config-");
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("missing config file gives the defaults", async () => {
    const logger = new MemoryLogger();
    const config = await loadConfig({
      configFile: path.join(tmp, "absent.conf"),
      env: {},
      logger,
    });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(logger.messages("warn")).toEqual([]);
  });

  test("key file, then environment, then overrides", async () => {
    const configFile = path.join(tmp, "daemon.conf");
    await fsp.writeFile(
      configFile,
      [
        "[Daemon]",
        "ScanDesktopFiles=false",
        "DesktopDatabase=/srv/from-file.db",
        "ApplicationDir=/srv/apps-from-file",
        "QueryTimeoutMs=soon",
        "Backend=dpkg",
        "",
      ].join("\n"),
    );
    const logger = new MemoryLogger();
    const config = await loadConfig({
      configFile,
      env: {
        LAUNCHER_CACHE_APP_DIR: "/srv/apps-from-env",
        LAUNCHER_CACHE_BACKEND: "rpm",
      },
      overrides: { databasePath: "/srv/override.db", logLevel: undefined },
      logger,
    });
    expect(config).toEqual({
      enabled: false,
      databasePath: "/srv/override.db",
      applicationDir: "/srv/apps-from-env",
      queryTimeoutMs: DEFAULT_CONFIG.queryTimeoutMs,
      backend: "rpm",
      logLevel: "info",
    });
    expect(logger.messages("warn")).toEqual(["ignoring invalid value"]);
  });

  test("an unparsable config file is reported and skipped", async () => {
    const configFile = path.join(tmp, "broken.conf");
    await fsp.writeFile(configFile, "this is not a key file\n");
    const logger = new MemoryLogger();
    const config = await loadConfig({ configFile, env: {}, logger });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(logger.messages("warn")).toEqual(["failed to load config file"]);
  });

  test("keys outside the daemon group are ignored", () => {
    const kf = parseKeyFile("[Other]\nScanDesktopFiles=false\n");
    expect(applyKeyFile({ ...DEFAULT_CONFIG }, kf).enabled).toBe(true);
  });

  test("environment values are validated", () => {
    const logger = new MemoryLogger();
    const config = applyEnv(
      { ...DEFAULT_CONFIG },
      {
        LAUNCHER_CACHE_ENABLED: "0",
        LAUNCHER_CACHE_QUERY_TIMEOUT_MS: "0",
        LAUNCHER_CACHE_BACKEND: "pacman",
        LAUNCHER_CACHE_LOG_LEVEL: "DEBUG",
      },
      logger,
    );
    expect(config.enabled).toBe(false);
    expect(config.queryTimeoutMs).toBe(0);
    expect(config.backend).toBe("dpkg");
    expect(config.logLevel).toBe("debug");
    expect(logger.messages("warn")).toEqual(["ignoring invalid value"]);
  });
});
