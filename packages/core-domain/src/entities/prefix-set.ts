/**
 * Registered prefixes, in registry order. Each entry is both the filename
 * prefix to match and the name of the destination subdirectory.
 */
export type PrefixSet = readonly string[];

export const DEFAULT_PREFIXES: PrefixSet = Object.freeze(["empty"]);
