import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { NodePathRegistry, parsePrefixList } from "./node-path-registry.js";
import { IOError, RegistryError } from "../application/errors.js";

let root: string;
let registry: NodePathRegistry;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "inbox-sorter-registry-"));
  registry = new NodePathRegistry({ filePath: path.join(root, "filePaths.json"), baseDir: root });
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("NodePathRegistry", () => {
  it("bootstraps a placeholder entry when the file is absent", async () => {
    await expect(registry.load()).resolves.toEqual(["empty"]);
    await expect(fs.readFile(path.join(root, "filePaths.json"), "utf-8")).resolves.toBe('[\n    "empty"\n]');
  });

  it("loads prefixes in file order", async () => {
    await fs.writeFile(path.join(root, "filePaths.json"), JSON.stringify(["Receipts", "Invoices", "Tax"]));
    await expect(registry.load()).resolves.toEqual(["Receipts", "Invoices", "Tax"]);
  });

  it.each([
    ["not json", "{oops"],
    ["an object", '{"a": "b"}'],
    ["a non-string entry", '["ok", 1]'],
    ["an empty entry", '["ok", " "]'],
    ["a nested path", '["a/b"]'],
    ["a parent reference", '[".."]'],
  ])("rejects %s", (_label, raw) => {
    expect(() => parsePrefixList(raw)).toThrow(RegistryError);
  });

  it("creates missing destination directories and is idempotent", async () => {
    await registry.ensureDirectories(["Receipts", "Invoices"]);
    await registry.ensureDirectories(["Receipts", "Invoices"]);

    const receipts = await fs.stat(path.join(root, "Receipts"));
    const invoices = await fs.stat(path.join(root, "Invoices"));
    expect(receipts.isDirectory()).toBe(true);
    expect(invoices.isDirectory()).toBe(true);
  });

  it("fails with IOError when a file occupies the destination path", async () => {
    await fs.writeFile(path.join(root, "Receipts"), "not a directory");
    await expect(registry.ensureDirectories(["Receipts"])).rejects.toBeInstanceOf(IOError);
  });

  it("resolves destinations under the base directory", () => {
    expect(registry.destinationOf("Receipts")).toBe(path.join(root, "Receipts"));
  });
});
