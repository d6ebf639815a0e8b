import path from "node:path";

import {
  summarizeOutcomes,
  type CycleSummary,
  type DispatchOutcome,
  type PrefixSet,
  type Settings,
} from "@inbox-sorter/core-domain";
import type { InboxRepository } from "../ports/inbox-repository";
import type { PathRegistry } from "../ports/path-registry";
import type { FileHasher } from "../ports/file-hasher";
import type { DigestLedger } from "../ports/digest-ledger";
import type { Logger } from "../ports/logger";
import { toError } from "../application/errors";
import { planMove } from "./prefix-match";

export type DispatchServiceDeps = {
  inbox: InboxRepository;
  registry: PathRegistry;
  hasher: FileHasher;
  ledger: DigestLedger;
  logger: Logger;
};

/**
 * One polling cycle: list the inbox, move every file that matches a prefix
 * and, when enabled, record its digest. Files are handled one at a time and a
 * failure on one file does not stop the others.
 */
export class DispatchService {
  constructor(private readonly deps: DispatchServiceDeps) {}

  async runCycle(params: {
    inboxAbs: string;
    settings: Settings;
    prefixes: PrefixSet;
  }): Promise<CycleSummary> {
    const { inboxAbs, settings, prefixes } = params;
    const { inbox, logger } = this.deps;

    // currentPathName may point somewhere new since the last tick
    if (await inbox.ensureDirectory(inboxAbs)) {
      logger.warn("Inbox directory was missing and has been created", { inbox: inboxAbs });
    }

    const names = await inbox.listFiles(inboxAbs);
    logger.debug(`Listed ${names.length} file(s)`, { inbox: inboxAbs, files: names });

    const outcomes: DispatchOutcome[] = [];
    for (const name of names) {
      outcomes.push(await this.dispatchFile(inboxAbs, name, settings, prefixes));
    }

    return summarizeOutcomes(outcomes);
  }

  private async dispatchFile(
    inboxAbs: string,
    name: string,
    settings: Settings,
    prefixes: PrefixSet
  ): Promise<DispatchOutcome> {
    const { inbox, registry, hasher, ledger, logger } = this.deps;

    const plan = planMove(name, prefixes);
    if (!plan) return { status: "unmatched", name };

    const { prefix, finalName } = plan;
    const source = path.join(inboxAbs, name);
    const destination = path.join(registry.destinationOf(prefix), finalName);

    try {
      await inbox.moveFile(source, destination);
    } catch (err) {
      const error = toError(err);
      logger.error(`Failed to move ${name}`, { prefix, destination, error: error.message });
      return { status: "failed", stage: "move", name, prefix, error };
    }

    logger.info(`Moved ${name} -> ${prefix}/${finalName}`);

    if (!settings.digestEnabled) {
      return { status: "moved", name, prefix, finalName, source, destination, digest: null };
    }

    try {
      const digest = await hasher.hashFile(destination, settings.digestAlgorithm);
      await ledger.record(prefix, finalName, digest.value);
      logger.debug(`Recorded ${digest.algorithm} for ${prefix}/${finalName}`, { digest: digest.value });
      return { status: "moved", name, prefix, finalName, source, destination, digest };
    } catch (err) {
      // the move already happened; the file stays relocated without a digest
      const error = toError(err);
      logger.error(`Moved ${name} but could not record its digest`, { destination, error: error.message });
      return { status: "failed", stage: "digest", name, prefix, destination, error };
    }
  }
}
