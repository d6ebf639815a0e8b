import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { NodeFileHasher, resolveDigestAlgorithm } from "./node-file-hasher.js";
import { IOError } from "../application/errors.js";

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "inbox-sorter-hash-"));
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

async function writeFile(name: string, data: string | Buffer) {
  const p = path.join(root, name);
  await fs.writeFile(p, data);
  return p;
}

describe("NodeFileHasher", () => {
  const hasher = new NodeFileHasher();

  it("computes MD5 by default name", async () => {
    const p = await writeFile("hello.txt", "hello");
    await expect(hasher.hashFile(p, "MD5")).resolves.toEqual({
      algorithm: "MD5",
      value: "5d41402abc4b2a76b9719d911017c592",
    });
  });

  it("computes SHA-256", async () => {
    const p = await writeFile("hello.txt", "hello");
    const h = await hasher.hashFile(p, "SHA-256");
    expect(h.algorithm).toBe("SHA-256");
    expect(h.value).toBe("2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824");
  });

  it.each([
    ["SHA-1", "sha1"],
    ["SHA-224", "sha224"],
  ])("computes %s like node:crypto %s", async (name, nodeName) => {
    const p = await writeFile("doc.txt", "inbox sorter test payload");
    const expected = createHash(nodeName).update("inbox sorter test payload").digest("hex");
    const h = await hasher.hashFile(p, name);
    expect(h.value).toBe(expected);
  });

  it("hashes files larger than one chunk", async () => {
    const data = Buffer.alloc(10_000);
    for (let i = 0; i < data.length; i++) data[i] = i % 251;
    const p = await writeFile("big.bin", data);

    const h = await hasher.hashFile(p, "SHA-256");
    expect(h.value).toBe(createHash("sha256").update(data).digest("hex"));
  });

  it("falls back to MD5 for unknown algorithm names", async () => {
    const p = await writeFile("hello.txt", "hello");
    expect(resolveDigestAlgorithm("CRC32")).toBe("MD5");
    await expect(hasher.hashFile(p, "CRC32")).resolves.toEqual({
      algorithm: "MD5",
      value: "5d41402abc4b2a76b9719d911017c592",
    });
  });

  it("is deterministic for the same bytes", async () => {
    const p = await writeFile("same.txt", "same bytes");
    const a = await hasher.hashFile(p, "SHA-1");
    const b = await hasher.hashFile(p, "SHA-1");
    expect(a).toEqual(b);
  });

  it("rejects with IOError when the file is missing", async () => {
    await expect(hasher.hashFile(path.join(root, "gone.png"), "MD5")).rejects.toBeInstanceOf(IOError);
  });
});
