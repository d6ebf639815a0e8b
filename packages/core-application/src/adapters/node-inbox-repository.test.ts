import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { NodeInboxRepository } from "./node-inbox-repository.js";
import { IOError, MoveError } from "../application/errors.js";

let root: string;
const repo = new NodeInboxRepository();

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "inbox-sorter-inbox-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

describe("NodeInboxRepository", () => {
  it("lists only regular files, not subdirectories", async () => {
    await fs.writeFile(path.join(root, "a.png"), "a");
    await fs.writeFile(path.join(root, "b.png"), "b");
    await fs.mkdir(path.join(root, "nested"));
    await fs.writeFile(path.join(root, "nested", "c.png"), "c");

    const files = await repo.listFiles(root);
    expect([...files].sort()).toEqual(["a.png", "b.png"]);
  });

  it("fails with IOError when the directory does not exist", async () => {
    await expect(repo.listFiles(path.join(root, "missing"))).rejects.toBeInstanceOf(IOError);
  });

  it("reports whether ensureDirectory created anything", async () => {
    const dir = path.join(root, "Images");
    await expect(repo.ensureDirectory(dir)).resolves.toBe(true);
    await expect(repo.ensureDirectory(dir)).resolves.toBe(false);
  });

  it("moves a file to its destination", async () => {
    const src = path.join(root, "foo bar.png");
    const dest = path.join(root, "bar.png");
    await fs.writeFile(src, "image bytes");

    await repo.moveFile(src, dest);

    await expect(fs.readFile(dest, "utf-8")).resolves.toBe("image bytes");
    await expect(fs.stat(src)).rejects.toThrow();
  });

  it("fails with MoveError when the source is gone", async () => {
    const src = path.join(root, "gone.png");
    const dest = path.join(root, "out.png");

    const err = await repo.moveFile(src, dest).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(MoveError);
    expect(err).toMatchObject({ source: src, destination: dest });
  });

  describe("across devices", () => {
    function failRenameWithExdev() {
      vi.spyOn(fs, "rename").mockRejectedValue(Object.assign(new Error("cross-device link"), { code: "EXDEV" }));
    }

    it("copies the file and removes the source", async () => {
      const src = path.join(root, "foo bar.png");
      const dest = path.join(root, "bar.png");
      await fs.writeFile(src, "image bytes");
      failRenameWithExdev();

      await repo.moveFile(src, dest);

      await expect(fs.readFile(dest, "utf-8")).resolves.toBe("image bytes");
      await expect(fs.stat(src)).rejects.toThrow();
    });

    it("removes the copy when the source cannot be unlinked", async () => {
      const src = path.join(root, "foo bar.png");
      const dest = path.join(root, "bar.png");
      await fs.writeFile(src, "image bytes");
      failRenameWithExdev();
      vi.spyOn(fs, "unlink").mockRejectedValue(Object.assign(new Error("permission denied"), { code: "EACCES" }));

      const err = await repo.moveFile(src, dest).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(MoveError);
      expect(err).toMatchObject({ message: `Failed to remove ${src} after copying to ${dest}` });
      await expect(fs.readFile(src, "utf-8")).resolves.toBe("image bytes");
      await expect(fs.stat(dest)).rejects.toThrow();
    });
  });
});
