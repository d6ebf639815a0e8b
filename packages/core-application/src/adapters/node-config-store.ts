import fs from "node:fs/promises";
import path from "node:path";
import ini from "ini";

import { DEFAULT_SETTINGS, type Settings } from "@inbox-sorter/core-domain";
import type { ConfigStore } from "../ports/config-store";
import { ConfigError, IOError } from "../application/errors";
import { exists } from "../infra/fs-utils";

const SECTION = "settings";

type SettingsSection = {
  isRunning: string;
  getHashes: string;
  hashMethod: string;
  currentPathName: string;
};

function toSection(settings: Settings): SettingsSection {
  return {
    isRunning: String(settings.running),
    getHashes: String(settings.digestEnabled),
    hashMethod: settings.digestAlgorithm,
    currentPathName: settings.watchDirectory,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Keys are matched case-insensitively: files written by other INI tooling
 * commonly lowercase option names (`isrunning = true`).
 */
function lowercaseKeys(section: Record<string, unknown>): Map<string, unknown> {
  const out = new Map<string, unknown>();
  for (const [k, v] of Object.entries(section)) out.set(k.toLowerCase(), v);
  return out;
}

function readRaw(section: Map<string, unknown>, key: keyof SettingsSection, source: string) {
  const value = section.get(key.toLowerCase());
  if (value === undefined) {
    throw new ConfigError(`Missing key "${key}" in [${SECTION}] of ${source}`);
  }
  return value;
}

function readBoolean(section: Map<string, unknown>, key: keyof SettingsSection, source: string): boolean {
  const value = readRaw(section, key, source);
  if (typeof value === "boolean") return value;

  const text = String(value).trim().toLowerCase();
  if (text === "true") return true;
  if (text === "false") return false;

  throw new ConfigError(`Key "${key}" in ${source} must be "true" or "false", got "${String(value)}"`);
}

function readString(section: Map<string, unknown>, key: keyof SettingsSection, source: string): string {
  const text = String(readRaw(section, key, source)).trim();
  if (text.length === 0) {
    throw new ConfigError(`Key "${key}" in ${source} must not be empty`);
  }
  return text;
}

// `key = value` lines; section headers and comment lines never match
const ASSIGNMENT = /^(\s*[^=;#[\s][^=]*=)(.*)$/;

function isQuoted(value: string): boolean {
  const v = value.trim();
  return v.length > 1 && (v[0] === '"' || v[0] === "'") && v[v.length - 1] === v[0];
}

/**
 * `ini` cuts a value at the first `;` or `#`. Setting values are plain
 * strings (paths may contain both), so escape them before parsing.
 */
function escapeValues(raw: string): string {
  return raw
    .split(/\r?\n/)
    .map((line) => {
      const m = ASSIGNMENT.exec(line);
      if (!m || isQuoted(m[2])) return line;
      return m[1] + m[2].replace(/[\\;#]/g, (c) => `\\${c}`);
    })
    .join("\n");
}

// undo the `\;` / `\#` escapes `ini` writes, so other INI readers see the literal value
function unescapeValues(text: string): string {
  return text
    .split("\n")
    .map((line) => {
      const m = ASSIGNMENT.exec(line);
      if (!m || isQuoted(m[2])) return line;
      return m[1] + m[2].replace(/\\([;#])/g, "$1");
    })
    .join("\n");
}

export function parseSettings(raw: string, source = "config.ini"): Settings {
  const parsed: Record<string, unknown> = ini.parse(escapeValues(raw));
  const section = parsed[SECTION];
  if (!isRecord(section)) {
    throw new ConfigError(`Missing [${SECTION}] section in ${source}`);
  }

  const keys = lowercaseKeys(section);
  return {
    running: readBoolean(keys, "isRunning", source),
    digestEnabled: readBoolean(keys, "getHashes", source),
    digestAlgorithm: readString(keys, "hashMethod", source),
    watchDirectory: readString(keys, "currentPathName", source),
  };
}

export function stringifySettings(settings: Settings): string {
  return unescapeValues(ini.stringify({ [SECTION]: toSection(settings) }, { whitespace: true }));
}

/**
 * Settings persisted as an INI file with a single `[settings]` section.
 * A present but malformed file is reported, never repaired.
 */
export class NodeConfigStore implements ConfigStore {
  constructor(private readonly filePath: string) {}

  async bootstrapIfAbsent(): Promise<boolean> {
    if (await exists(this.filePath)) return false;
    await this.save(DEFAULT_SETTINGS);
    return true;
  }

  async load(): Promise<Settings> {
    await this.bootstrapIfAbsent();

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      throw new IOError(`Failed to read settings: ${this.filePath}`, this.filePath, err);
    }

    return parseSettings(raw, this.filePath);
  }

  async save(settings: Settings): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, stringifySettings(settings), "utf-8");
    } catch (err) {
      throw new IOError(`Failed to write settings: ${this.filePath}`, this.filePath, err);
    }
  }
}
