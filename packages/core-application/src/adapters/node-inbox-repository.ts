import fs from "node:fs/promises";
import path from "node:path";

import type { InboxRepository } from "../ports/inbox-repository";
import { IOError, MoveError } from "../application/errors";
import { errnoCode } from "../infra/fs-utils";

export class NodeInboxRepository implements InboxRepository {
  async ensureDirectory(dirAbs: string): Promise<boolean> {
    try {
      const created = await fs.mkdir(dirAbs, { recursive: true });
      return created !== undefined;
    } catch (err) {
      throw new IOError(`Cannot create directory: ${dirAbs}`, dirAbs, err);
    }
  }

  async listFiles(dirAbs: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(dirAbs, { withFileTypes: true });
      const files: string[] = [];

      for (const entry of entries) {
        if (entry.isFile()) {
          files.push(entry.name);
        } else if (entry.isSymbolicLink()) {
          // symlinks count when they point at a regular file
          const target = await fs.stat(path.join(dirAbs, entry.name)).catch(() => null);
          if (target?.isFile()) files.push(entry.name);
        }
      }

      return files;
    } catch (err) {
      throw new IOError(`Cannot list directory: ${dirAbs}`, dirAbs, err);
    }
  }

  async moveFile(sourceAbs: string, destinationAbs: string): Promise<void> {
    try {
      await fs.rename(sourceAbs, destinationAbs);
      return;
    } catch (err) {
      if (errnoCode(err) !== "EXDEV") {
        throw new MoveError(`Failed to move ${sourceAbs} to ${destinationAbs}`, sourceAbs, destinationAbs, err);
      }
    }

    // cross-device: copy then remove the source
    try {
      await fs.copyFile(sourceAbs, destinationAbs);
    } catch (err) {
      throw new MoveError(`Failed to copy ${sourceAbs} to ${destinationAbs} across devices`, sourceAbs, destinationAbs, err);
    }

    try {
      await fs.unlink(sourceAbs);
    } catch (err) {
      // the source stays in the inbox, so drop the copy
      await fs.rm(destinationAbs, { force: true }).catch((rmErr: unknown) => {
        throw new MoveError(
          `Failed to remove ${sourceAbs} after copying, and the copy at ${destinationAbs} could not be removed`,
          sourceAbs,
          destinationAbs,
          rmErr
        );
      });
      throw new MoveError(`Failed to remove ${sourceAbs} after copying to ${destinationAbs}`, sourceAbs, destinationAbs, err);
    }
  }
}
