import type { Settings } from "@inbox-sorter/core-domain";

export interface ConfigStore {
  /** Writes the default settings when the resource is missing. Returns true if it did. */
  bootstrapIfAbsent(): Promise<boolean>;
  load(): Promise<Settings>;
  save(settings: Settings): Promise<void>;
}
