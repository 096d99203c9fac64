// src/keyfile.ts
//
// Parser for the freedesktop key-file format shared by desktop entries and
// the daemon configuration file:
//
//   # comment
//   [Group Name]
//   Key=value
//   Key[de]=localized value

export class KeyFileParseError extends Error {
  constructor(
    message: string,
    readonly line: number,
  ) {
    super(`line ${line}: ${message}`);
    this.name = "KeyFileParseError";
  }
}

const KEY_RE = /^[A-Za-z0-9-]+(\[[^\]=]+\])?$/;

export class KeyFile {
  private readonly groups = new Map<string, Map<string, string>>();

  get startGroup(): string | null {
    for (const name of this.groups.keys()) return name;
    return null;
  }

  hasGroup(group: string): boolean {
    return this.groups.has(group);
  }

  groupNames(): string[] {
    return [...this.groups.keys()];
  }

  /** Raw value, escapes untouched. */
  getRaw(group: string, key: string): string | undefined {
    return this.groups.get(group)?.get(key);
  }

  getString(group: string, key: string): string | null {
    const raw = this.getRaw(group, key);
    return raw == null ? null : unescapeValue(raw);
  }

  getBoolean(group: string, key: string): boolean | null {
    const raw = this.getRaw(group, key);
    if (raw == null) return null;
    return parseBoolean(raw);
  }

  getInteger(group: string, key: string): number | null {
    const raw = this.getRaw(group, key)?.trim();
    if (!raw || !/^-?\d+$/.test(raw)) return null;
    return Number(raw);
  }

  getStringList(group: string, key: string): string[] | null {
    const raw = this.getRaw(group, key);
    return raw == null ? null : splitList(raw);
  }

  addGroup(group: string): Map<string, string> {
    let entries = this.groups.get(group);
    if (!entries) {
      entries = new Map();
      this.groups.set(group, entries);
    }
    return entries;
  }

  set(group: string, key: string, value: string): void {
    this.addGroup(group).set(key, value);
  }
}

export function parseBoolean(raw: string): boolean | null {
  switch (raw.trim()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      return null;
  }
}

export function unescapeValue(raw: string): string {
  let out = "";
  for (let i = 0; i < raw.length; i++) {
    const c = raw[i];
    if (c !== "\\" || i + 1 >= raw.length) {
      out += c;
      continue;
    }
    const next = raw[++i];
    switch (next) {
      case "s":
        out += " ";
        break;
      case "n":
        out += "\n";
        break;
      case "t":
        out += "\t";
        break;
      case "r":
        out += "\r";
        break;
      case "\\":
        out += "\\";
        break;
      default:
        // unknown escapes (including "\;") are kept for list splitting
        out += "\\" + next;
    }
  }
  return out;
}

/** Split a ';'-separated list value; "\;" is a literal semicolon. */
export function splitList(raw: string): string[] {
  const items: string[] = [];
  let current = "";
  for (let i = 0; i < raw.length; i++) {
    const c = raw[i];
    if (c === "\\" && raw[i + 1] === ";") {
      current += ";";
      i++;
    } else if (c === "\\" && i + 1 < raw.length) {
      current += c + raw[i + 1];
      i++;
    } else if (c === ";") {
      items.push(unescapeValue(current));
      current = "";
    } else {
      current += c;
    }
  }
  if (current.length) items.push(unescapeValue(current));
  return items;
}

export function parseKeyFile(text: string): KeyFile {
  const kf = new KeyFile();
  let group: string | null = null;
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const line = lines[i].replace(/^\s+/, "");
    if (!line || line.startsWith("#")) continue;
    if (line.startsWith("[")) {
      const end = line.indexOf("]");
      if (end < 2 || line.slice(end + 1).trim()) {
        throw new KeyFileParseError("invalid group header", lineNo);
      }
      group = line.slice(1, end);
      if (kf.hasGroup(group)) {
        throw new KeyFileParseError(`duplicate group [${group}]`, lineNo);
      }
      kf.addGroup(group);
      continue;
    }
    const eq = line.indexOf("=");
    if (eq <= 0) {
      throw new KeyFileParseError("expected key=value", lineNo);
    }
    if (group == null) {
      throw new KeyFileParseError("key outside of any group", lineNo);
    }
    const key = line.slice(0, eq).trimEnd();
    if (!KEY_RE.test(key)) {
      throw new KeyFileParseError(`invalid key "${key}"`, lineNo);
    }
    kf.set(group, key, line.slice(eq + 1).replace(/^\s+/, ""));
  }
  return kf;
}
