import fs from "fs";
import os from "os";
import path from "path";
import { ConfigParseError } from "./errors.js";
import type { Logger } from "./output.js";
import type { ConfigSection, ConfigValue, FileConfig } from "./types.js";

type DraftValue = { kind: "leaf"; value: string } | { kind: "section"; entries: DraftSection };
type DraftSection = Record<string, DraftValue>;

export const CONFIG_FILENAME = "rackops";
export const DEFAULT_SECTION = "default";

// A config file that cannot be read is treated the same as a missing one.
const UNREADABLE_CODES = new Set(["ENOENT", "ENOTDIR", "EISDIR", "EACCES", "EPERM"]);

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_CONFIG_HOME;
  if (xdg && xdg.trim().length > 0) {
    return xdg;
  }
  const home = env.HOME && env.HOME.trim().length > 0 ? env.HOME : os.homedir();
  return path.join(home, ".config");
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), CONFIG_FILENAME);
}

function emptySection(): DraftSection {
  return Object.create(null);
}

export function loadConfig(file: string, logger?: Logger): FileConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch (error) {
    const errno = (error as NodeJS.ErrnoException).code;
    if (errno !== undefined && UNREADABLE_CODES.has(errno)) {
      if (errno === "ENOENT") {
        logger?.debug(`No configuration file at ${file}`);
      } else {
        logger?.warn(`Ignoring unreadable configuration file ${file} (${errno})`);
      }
      return normalizeConfig(emptySection());
    }
    throw error;
  }
  return parseConfig(raw, file);
}

/**
 * Parses INI-style text into a section tree.
 *
 * - `[name]` opens a section, `[outer.inner]` a nested one
 * - `key = value` or `key: value`; indented lines continue the previous value
 * - `#` and `;` start comment lines
 * - keys of `[DEFAULT]` are inherited by every other top-level section
 */
export function parseConfig(content: string, file = "<config>"): FileConfig {
  const root = emptySection();
  const declared = new Set<string>();
  const lines = content.split(/\r?\n/);
  let current: DraftSection | null = null;
  let lastLeaf: { kind: "leaf"; value: string } | null = null;

  for (let i = 0; i < lines.length; i += 1) {
    const lineNumber = i + 1;
    const rawLine = lines[i] ?? "";
    const line = rawLine.trim();

    if (!line) {
      lastLeaf = null;
      continue;
    }
    if (line.startsWith("#") || line.startsWith(";")) {
      continue;
    }

    if (lastLeaf && /^\s/.test(rawLine)) {
      lastLeaf.value = lastLeaf.value.length > 0 ? `${lastLeaf.value}\n${line}` : line;
      continue;
    }
    lastLeaf = null;

    if (line.startsWith("[")) {
      const header = /^\[([^\[\]]+)\]$/.exec(line);
      const name = header?.[1]?.trim();
      if (!name) {
        throw new ConfigParseError(file, lineNumber, `malformed section header "${line}"`);
      }
      const segments = name.split(".").map((segment) => segment.trim().toLowerCase());
      if (segments.some((segment) => segment.length === 0)) {
        throw new ConfigParseError(file, lineNumber, `malformed section name "${name}"`);
      }
      const qualified = segments.join(".");
      if (declared.has(qualified)) {
        throw new ConfigParseError(file, lineNumber, `duplicate section "${name}"`);
      }
      declared.add(qualified);
      current = openSection(root, segments, file, lineNumber);
      continue;
    }

    if (!current) {
      throw new ConfigParseError(file, lineNumber, "key outside of any section");
    }

    const separator = line.search(/[=:]/);
    if (separator === -1) {
      throw new ConfigParseError(file, lineNumber, `expected "key = value", got "${line}"`);
    }
    const key = line.slice(0, separator).trim().toLowerCase();
    if (!key) {
      throw new ConfigParseError(file, lineNumber, "empty key");
    }
    const existing = current[key];
    if (existing) {
      const detail =
        existing.kind === "section" ? `"${key}" is already a section` : `duplicate key "${key}"`;
      throw new ConfigParseError(file, lineNumber, detail);
    }
    const leaf: { kind: "leaf"; value: string } = { kind: "leaf", value: line.slice(separator + 1).trim() };
    current[key] = leaf;
    lastLeaf = leaf;
  }

  inheritDefaults(root);
  return normalizeConfig(root);
}

function openSection(root: DraftSection, segments: string[], file: string, lineNumber: number): DraftSection {
  let entries = root;
  for (const segment of segments) {
    const existing = entries[segment];
    if (!existing) {
      const created = emptySection();
      entries[segment] = { kind: "section", entries: created };
      entries = created;
      continue;
    }
    if (existing.kind === "leaf") {
      throw new ConfigParseError(file, lineNumber, `"${segment}" is already a value`);
    }
    entries = existing.entries;
  }
  return entries;
}

function inheritDefaults(root: DraftSection): void {
  const defaults = root[DEFAULT_SECTION];
  if (!defaults || defaults.kind !== "section") return;
  for (const [name, value] of Object.entries(root)) {
    if (name === DEFAULT_SECTION || value.kind !== "section") continue;
    for (const [key, inherited] of Object.entries(defaults.entries)) {
      if (inherited.kind === "leaf" && !value.entries[key]) {
        value.entries[key] = { kind: "leaf", value: inherited.value };
      }
    }
  }
}

/**
 * Rebuilds a section tree with every name lowercased, frozen all the way down.
 */
export function normalizeConfig(section: ConfigSection): FileConfig {
  const normalized: Record<string, ConfigValue> = emptySection();
  for (const [name, value] of Object.entries(section)) {
    normalized[name.toLowerCase()] = normalizeValue(value);
  }
  return Object.freeze(normalized);
}

function normalizeValue(value: ConfigValue): ConfigValue {
  switch (value.kind) {
    case "leaf": {
      const leaf: ConfigValue = { kind: "leaf", value: value.value };
      return Object.freeze(leaf);
    }
    case "section": {
      const branch: ConfigValue = { kind: "section", entries: normalizeConfig(value.entries) };
      return Object.freeze(branch);
    }
  }
}

function entry(section: ConfigSection, name: string): ConfigValue | undefined {
  return Object.hasOwn(section, name) ? section[name] : undefined;
}

export function getSection(config: ConfigSection, name: string): ConfigSection | undefined {
  const value = entry(config, name.toLowerCase());
  return value?.kind === "section" ? value.entries : undefined;
}

export function getLeaf(section: ConfigSection | undefined, key: string): string | undefined {
  if (!section) return undefined;
  const value = entry(section, key.toLowerCase());
  return value?.kind === "leaf" ? value.value : undefined;
}
