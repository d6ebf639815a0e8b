import path from "node:path";

export type ResourcePaths = {
  baseDir: string;
  settingsFile: string;
  prefixListFile: string;
  ledgerFile: string;
};

export function resolveResourcePaths(baseDir: string): ResourcePaths {
  const base = path.resolve(baseDir);
  return {
    baseDir: base,
    settingsFile: path.join(base, "config.ini"),
    prefixListFile: path.join(base, "filePaths.json"),
    ledgerFile: path.join(base, "fileHashes.json"),
  };
}
