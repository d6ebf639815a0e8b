import fs from "node:fs/promises";
import path from "node:path";

import { DEFAULT_PREFIXES, type PrefixSet } from "@inbox-sorter/core-domain";
import type { PathRegistry } from "../ports/path-registry";
import { IOError, RegistryError } from "../application/errors";
import { exists } from "../infra/fs-utils";

function validatePrefix(entry: unknown, index: number, source: string): string {
  if (typeof entry !== "string") {
    throw new RegistryError(`Entry ${index} in ${source} is not a string`);
  }
  if (entry.trim().length === 0) {
    throw new RegistryError(`Entry ${index} in ${source} is empty`);
  }
  // each prefix names a single subdirectory of the base directory
  if (entry.includes("/") || entry.includes("\\") || entry === "." || entry === "..") {
    throw new RegistryError(`Entry ${index} in ${source} is not a valid directory name: "${entry}"`);
  }
  return entry;
}

export function parsePrefixList(raw: string, source = "filePaths.json"): PrefixSet {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new RegistryError(`${source} is not valid JSON`, err);
  }

  if (!Array.isArray(parsed)) {
    throw new RegistryError(`${source} must contain a JSON array of strings`);
  }

  return Object.freeze(parsed.map((entry, i) => validatePrefix(entry, i, source)));
}

export class NodePathRegistry implements PathRegistry {
  constructor(
    private readonly options: {
      filePath: string;
      baseDir: string;
    }
  ) {}

  async bootstrapIfAbsent(): Promise<boolean> {
    const { filePath } = this.options;
    if (await exists(filePath)) return false;

    try {
      await fs.writeFile(filePath, JSON.stringify(DEFAULT_PREFIXES, null, 4), "utf-8");
    } catch (err) {
      throw new IOError(`Failed to write prefix list: ${filePath}`, filePath, err);
    }
    return true;
  }

  async load(): Promise<PrefixSet> {
    await this.bootstrapIfAbsent();

    const { filePath } = this.options;
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      throw new IOError(`Failed to read prefix list: ${filePath}`, filePath, err);
    }

    return parsePrefixList(raw, filePath);
  }

  destinationOf(prefix: string): string {
    return path.join(path.resolve(this.options.baseDir), prefix);
  }

  async ensureDirectories(prefixes: PrefixSet): Promise<void> {
    for (const prefix of prefixes) {
      const dir = this.destinationOf(prefix);
      try {
        // EEXIST here means a non-directory occupies the path
        await fs.mkdir(dir, { recursive: true });
      } catch (err) {
        throw new IOError(`Cannot create destination directory: ${dir}`, dir, err);
      }
    }
  }
}
