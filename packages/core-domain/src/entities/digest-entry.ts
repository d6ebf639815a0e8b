export type DigestLedgerKey = string;

export type DigestLedgerContents = Record<DigestLedgerKey, string>;

export function ledgerKey(destination: string, finalFilename: string): DigestLedgerKey {
  return `${destination} | ${finalFilename}`;
}
