import fs from "node:fs/promises";

import { ledgerKey, type DigestLedgerContents } from "@inbox-sorter/core-domain";
import type { DigestLedger } from "../ports/digest-ledger";
import { IOError } from "../application/errors";
import { exists } from "../infra/fs-utils";

function serialize(contents: DigestLedgerContents): string {
  return JSON.stringify(contents, null, 4);
}

/**
 * JSON ledger of `"<destination> | <file>" -> hex digest`.
 *
 * Entries accumulate in memory for the lifetime of the instance and the whole
 * file is rewritten on every record. Content already on disk when the process
 * starts is not merged in; a new process starts from an empty mapping.
 */
export class NodeDigestLedger implements DigestLedger {
  private readonly store = new Map<string, string>();

  constructor(private readonly filePath: string) {}

  async bootstrapIfAbsent(): Promise<void> {
    if (await exists(this.filePath)) return;
    await this.write(serialize({}));
  }

  async record(destination: string, finalFilename: string, digestHex: string): Promise<void> {
    await this.bootstrapIfAbsent();
    this.store.set(ledgerKey(destination, finalFilename), digestHex.toLowerCase());
    await this.write(serialize(this.entries()));
  }

  entries(): DigestLedgerContents {
    return Object.fromEntries(this.store);
  }

  private async write(content: string): Promise<void> {
    try {
      await fs.writeFile(this.filePath, content, "utf-8");
    } catch (err) {
      throw new IOError(`Failed to write digest ledger: ${this.filePath}`, this.filePath, err);
    }
  }
}

export async function readLedgerFile(filePath: string): Promise<DigestLedgerContents> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, "utf-8"));
  } catch (err) {
    throw new IOError(`Failed to read digest ledger: ${filePath}`, filePath, err);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new IOError(`Digest ledger is not a JSON object: ${filePath}`, filePath);
  }

  const out: DigestLedgerContents = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== "string") {
      throw new IOError(`Digest ledger entry "${key}" is not a string`, filePath);
    }
    out[key] = value;
  }
  return out;
}
