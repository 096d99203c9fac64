// src/config.ts
import fs from "node:fs/promises";
import { BACKEND_KINDS, type BackendKind } from "./command-backend.js";
import {
  DEFAULT_APPLICATION_DIR,
  DEFAULT_CONFIG_FILE,
  DEFAULT_DATABASE,
  DEFAULT_QUERY_TIMEOUT_MS,
} from "./constants.js";
import { parseBoolean, parseKeyFile, type KeyFile } from "./keyfile.js";
import { LOG_LEVELS, NullLogger, type LogLevel, type Logger } from "./logger.js";
import { errorCode, errorMessage } from "./util.js";

export interface LauncherCacheConfig {
  /** ScanDesktopFiles; when false the whole cache is inert. */
  enabled: boolean;
  databasePath: string;
  applicationDir: string;
  /** 0 waits for the backend forever. */
  queryTimeoutMs: number;
  backend: BackendKind;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<LauncherCacheConfig> = {
  enabled: true,
  databasePath: DEFAULT_DATABASE,
  applicationDir: DEFAULT_APPLICATION_DIR,
  queryTimeoutMs: DEFAULT_QUERY_TIMEOUT_MS,
  backend: "dpkg",
  logLevel: "info",
};

export const CONFIG_GROUP = "Daemon";

function asBackend(raw: string): BackendKind | null {
  const v = raw.trim().toLowerCase();
  return BACKEND_KINDS.find((k) => k === v) ?? null;
}

function asLogLevel(raw: string): LogLevel | null {
  const v = raw.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v) ?? null;
}

function asTimeout(raw: string): number | null {
  const v = raw.trim();
  if (!/^\d+$/.test(v)) return null;
  return Number(v);
}

type Setter = (config: LauncherCacheConfig, raw: string) => boolean;

function setter<K extends keyof LauncherCacheConfig>(
  key: K,
  parse: (raw: string) => LauncherCacheConfig[K] | null,
): Setter {
  return (config, raw) => {
    const value = parse(raw);
    if (value == null) return false;
    config[key] = value;
    return true;
  };
}

function asPath(raw: string): string | null {
  return raw.trim() ? raw.trim() : null;
}

// key-file key and environment variable for every setting
const FIELDS: Array<{ ini: string; env: string; set: Setter }> = [
  {
    ini: "ScanDesktopFiles",
    env: "LAUNCHER_CACHE_ENABLED",
    set: setter("enabled", parseBoolean),
  },
  {
    ini: "DesktopDatabase",
    env: "LAUNCHER_CACHE_DB",
    set: setter("databasePath", asPath),
  },
  {
    ini: "ApplicationDir",
    env: "LAUNCHER_CACHE_APP_DIR",
    set: setter("applicationDir", asPath),
  },
  {
    ini: "QueryTimeoutMs",
    env: "LAUNCHER_CACHE_QUERY_TIMEOUT_MS",
    set: setter("queryTimeoutMs", asTimeout),
  },
  {
    ini: "Backend",
    env: "LAUNCHER_CACHE_BACKEND",
    set: setter("backend", asBackend),
  },
  {
    ini: "LogLevel",
    env: "LAUNCHER_CACHE_LOG_LEVEL",
    set: setter("logLevel", asLogLevel),
  },
];

export function applyKeyFile(
  base: LauncherCacheConfig,
  kf: KeyFile,
  logger: Logger = new NullLogger(),
): LauncherCacheConfig {
  const config = { ...base };
  for (const { ini, set } of FIELDS) {
    const raw = kf.getString(CONFIG_GROUP, ini);
    if (raw != null && !set(config, raw)) {
      logger.warn("ignoring invalid value", { key: ini, value: raw });
    }
  }
  return config;
}

export function applyEnv(
  base: LauncherCacheConfig,
  env: NodeJS.ProcessEnv,
  logger: Logger = new NullLogger(),
): LauncherCacheConfig {
  const config = { ...base };
  for (const { env: name, set } of FIELDS) {
    const raw = env[name];
    if (raw && !set(config, raw)) {
      logger.warn("ignoring invalid value", { key: name, value: raw });
    }
  }
  return config;
}

export interface LoadConfigOptions {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<LauncherCacheConfig>;
  logger?: Logger;
}

/**
 * Defaults, then the key file, then LAUNCHER_CACHE_* variables, then
 * explicit overrides (CLI flags). A missing key file is not an error.
 */
export async function loadConfig({
  configFile = DEFAULT_CONFIG_FILE,
  env = process.env,
  overrides = {},
  logger = new NullLogger(),
}: LoadConfigOptions = {}): Promise<LauncherCacheConfig> {
  let config: LauncherCacheConfig = { ...DEFAULT_CONFIG };
  try {
    const text = await fs.readFile(configFile, "utf8");
    config = applyKeyFile(config, parseKeyFile(text), logger);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      logger.debug("no config file, using defaults", { configFile });
    } else {
      logger.warn("failed to load config file", {
        configFile,
        error: errorMessage(err),
      });
    }
  }
  config = applyEnv(config, env, logger);
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(config, { [key]: value });
  }
  return config;
}
