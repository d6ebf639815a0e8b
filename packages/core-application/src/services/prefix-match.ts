import type { PrefixSet } from "@inbox-sorter/core-domain";

export type MovePlan = {
  prefix: string;
  finalName: string;
};

/** First prefix in registry order that the name starts with. */
export function matchPrefix(fileName: string, prefixes: PrefixSet): string | null {
  for (const prefix of prefixes) {
    if (fileName.startsWith(prefix)) return prefix;
  }
  return null;
}

/**
 * Removes a leading `"<prefix> "` token, once. Names that match the prefix
 * without the separating space are kept as they are, and so is a name that
 * would become empty.
 */
export function stripPrefix(fileName: string, prefix: string): string {
  const token = `${prefix} `;
  if (!fileName.startsWith(token)) return fileName;

  const rest = fileName.slice(token.length);
  return rest.length > 0 ? rest : fileName;
}

export function planMove(fileName: string, prefixes: PrefixSet): MovePlan | null {
  const prefix = matchPrefix(fileName, prefixes);
  if (prefix === null) return null;
  return { prefix, finalName: stripPrefix(fileName, prefix) };
}
