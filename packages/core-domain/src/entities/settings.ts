/**
 * Operational settings read from the settings resource. A fresh snapshot is
 * loaded at the top of every polling tick and is not mutated afterwards.
 */
export type Settings = {
  running: boolean;
  digestEnabled: boolean;

  // raw hashMethod value; unknown names fall back to MD5 when hashing
  digestAlgorithm: string;

  // inbox directory, relative to the base directory
  watchDirectory: string;
};

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  running: true,
  digestEnabled: true,
  digestAlgorithm: "MD5",
  watchDirectory: "Images",
});
