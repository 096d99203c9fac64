// src/desktop-entry.ts
import fs from "node:fs/promises";
import { constants } from "node:fs";
import path from "node:path";
import { parseKeyFile, type KeyFile } from "./keyfile.js";
import { NullLogger, type Logger } from "./logger.js";
import { errorMessage } from "./util.js";

export const DESKTOP_ENTRY_GROUP = "Desktop Entry";

export interface DesktopEntry {
  type: string;
  name: string | null;
  exec: string | null;
  tryExec: string | null;
  noDisplay: boolean;
  hidden: boolean;
  onlyShowIn: string[] | null;
  notShowIn: string[] | null;
}

/**
 * Decides whether a launcher file belongs in a menu. Resolves to null when
 * the file cannot be loaded as an application entry at all.
 */
export interface VisibilityEvaluator {
  evaluate(path: string): Promise<boolean | null>;
}

/**
 * Read the fields we care about from a parsed key file. Anything that is
 * not an application entry yields null.
 */
export function desktopEntryFromKeyFile(kf: KeyFile): DesktopEntry | null {
  if (kf.startGroup !== DESKTOP_ENTRY_GROUP) return null;
  const type = kf.getString(DESKTOP_ENTRY_GROUP, "Type");
  if (type !== "Application") return null;
  return {
    type,
    name: kf.getString(DESKTOP_ENTRY_GROUP, "Name"),
    exec: kf.getString(DESKTOP_ENTRY_GROUP, "Exec"),
    tryExec: kf.getString(DESKTOP_ENTRY_GROUP, "TryExec"),
    noDisplay: kf.getBoolean(DESKTOP_ENTRY_GROUP, "NoDisplay") ?? false,
    hidden: kf.getBoolean(DESKTOP_ENTRY_GROUP, "Hidden") ?? false,
    onlyShowIn: kf.getStringList(DESKTOP_ENTRY_GROUP, "OnlyShowIn"),
    notShowIn: kf.getStringList(DESKTOP_ENTRY_GROUP, "NotShowIn"),
  };
}

export function parseDesktopEntry(text: string): DesktopEntry | null {
  return desktopEntryFromKeyFile(parseKeyFile(text));
}

export function currentDesktops(env: NodeJS.ProcessEnv = process.env): string[] {
  const raw = env.XDG_CURRENT_DESKTOP;
  if (!raw) return [];
  return raw.split(":").filter(Boolean);
}

/**
 * Menu visibility for the given desktop environments, checked in order:
 * the first one named in OnlyShowIn or NotShowIn decides. With no match,
 * an entry restricted by OnlyShowIn stays hidden.
 */
export function shouldShow(entry: DesktopEntry, desktops: string[]): boolean {
  if (entry.noDisplay || entry.hidden) return false;
  for (const desktop of desktops) {
    if (entry.onlyShowIn?.includes(desktop)) return true;
    if (entry.notShowIn?.includes(desktop)) return false;
  }
  return entry.onlyShowIn == null;
}

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const st = await fs.stat(candidate);
    if (!st.isFile()) return false;
    await fs.access(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function findProgram(
  program: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string | null> {
  if (!program) return null;
  if (program.includes("/")) {
    return (await isExecutableFile(program)) ? program : null;
  }
  const dirs = (env.PATH ?? "/usr/bin:/bin").split(path.delimiter);
  for (const dir of dirs) {
    if (!dir) continue;
    const candidate = path.join(dir, program);
    if (await isExecutableFile(candidate)) return candidate;
  }
  return null;
}

export interface LoadDesktopEntryOptions {
  env?: NodeJS.ProcessEnv;
  /** Skip the TryExec lookup, e.g. when scanning a foreign root. */
  checkTryExec?: boolean;
  logger?: Logger;
}

export async function loadDesktopEntry(
  file: string,
  { env = process.env, checkTryExec = true, logger }: LoadDesktopEntryOptions = {},
): Promise<DesktopEntry | null> {
  let entry: DesktopEntry | null;
  try {
    entry = parseDesktopEntry(await fs.readFile(file, "utf8"));
  } catch (err) {
    logger?.debug("cannot parse desktop file", {
      path: file,
      error: errorMessage(err),
    });
    return null;
  }
  if (!entry) return null;
  if (checkTryExec && entry.tryExec) {
    if ((await findProgram(entry.tryExec, env)) == null) {
      logger?.debug("TryExec program not found", {
        path: file,
        tryExec: entry.tryExec,
      });
      return null;
    }
  }
  return entry;
}

export class DesktopEntryVisibility implements VisibilityEvaluator {
  private readonly env: NodeJS.ProcessEnv;
  private readonly desktops: string[];
  private readonly checkTryExec: boolean;
  private readonly logger: Logger;

  constructor(
    opts: {
      env?: NodeJS.ProcessEnv;
      desktops?: string[];
      checkTryExec?: boolean;
      logger?: Logger;
    } = {},
  ) {
    this.env = opts.env ?? process.env;
    this.desktops = opts.desktops ?? currentDesktops(this.env);
    this.checkTryExec = opts.checkTryExec ?? true;
    this.logger = opts.logger ?? new NullLogger();
  }

  async evaluate(file: string): Promise<boolean | null> {
    const entry = await loadDesktopEntry(file, {
      env: this.env,
      checkTryExec: this.checkTryExec,
      logger: this.logger,
    });
    return entry ? shouldShow(entry, this.desktops) : null;
  }
}
