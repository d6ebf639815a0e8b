import type { DigestLedgerContents } from "@inbox-sorter/core-domain";

export interface DigestLedger {
  bootstrapIfAbsent(): Promise<void>;
  record(destination: string, finalFilename: string, digestHex: string): Promise<void>;
  entries(): DigestLedgerContents;
}
