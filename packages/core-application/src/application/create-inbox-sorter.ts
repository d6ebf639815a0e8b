import type { CycleSummary } from "@inbox-sorter/core-domain";
import type { Logger } from "../ports/logger";
import type { Sleeper } from "../ports/clock";
import { resolveResourcePaths } from "./resource-paths";
import { NodeConfigStore } from "../adapters/node-config-store";
import { NodePathRegistry } from "../adapters/node-path-registry";
import { NodeInboxRepository } from "../adapters/node-inbox-repository";
import { NodeFileHasher } from "../adapters/node-file-hasher";
import { NodeDigestLedger } from "../adapters/node-digest-ledger";
import { DispatchService } from "../services/dispatch-service";
import { Dispatcher } from "../services/dispatcher";

export type InboxSorterOptions = {
  baseDir: string;
  logger: Logger;
  pollIntervalMs?: number;
  startupDelayMs?: number;
  sleep?: Sleeper;
  onCycle?: (summary: CycleSummary) => void;
};

/** Wires the Node adapters around a base directory. */
export function createInboxSorter(options: InboxSorterOptions) {
  const paths = resolveResourcePaths(options.baseDir);

  const config = new NodeConfigStore(paths.settingsFile);
  const registry = new NodePathRegistry({
    filePath: paths.prefixListFile,
    baseDir: paths.baseDir,
  });
  const inbox = new NodeInboxRepository();
  const ledger = new NodeDigestLedger(paths.ledgerFile);

  const service = new DispatchService({
    inbox,
    registry,
    hasher: new NodeFileHasher(),
    ledger,
    logger: options.logger.child("dispatch"),
  });

  const dispatcher = new Dispatcher(
    { config, registry, inbox, service, logger: options.logger },
    {
      baseDir: paths.baseDir,
      pollIntervalMs: options.pollIntervalMs,
      startupDelayMs: options.startupDelayMs,
      sleep: options.sleep,
      onCycle: options.onCycle,
    }
  );

  return { dispatcher, config, registry, ledger, paths };
}
