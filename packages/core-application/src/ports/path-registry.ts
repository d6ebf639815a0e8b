import type { PrefixSet } from "@inbox-sorter/core-domain";

export interface PathRegistry {
  bootstrapIfAbsent(): Promise<boolean>;
  load(): Promise<PrefixSet>;
  ensureDirectories(prefixes: PrefixSet): Promise<void>;
  destinationOf(prefix: string): string;
}
