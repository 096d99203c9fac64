// src/constants.ts
export const CLI_NAME = "launcher-cache";

export const DESKTOP_FILE_SUFFIX = ".desktop";

export const DEFAULT_DATABASE = "/var/lib/PackageKit/desktop-files.db";
export const DEFAULT_APPLICATION_DIR = "/usr/share/applications";
export const DEFAULT_CONFIG_FILE = "/etc/PackageKit/PackageKit.conf";

// 5 minutes
export const DEFAULT_QUERY_TIMEOUT_MS = 300_000;

export const DEFAULT_WATCH_DEBOUNCE_MS = 1_000;
