import path from "node:path";

import {
  isDigestAlgorithm,
  type CycleSummary,
  type DispatcherState,
  type PrefixSet,
  type Settings,
} from "@inbox-sorter/core-domain";
import type { ConfigStore } from "../ports/config-store";
import type { PathRegistry } from "../ports/path-registry";
import type { InboxRepository } from "../ports/inbox-repository";
import type { Logger } from "../ports/logger";
import type { Sleeper } from "../ports/clock";
import { sleep } from "../infra/sleep";
import { DispatchService } from "./dispatch-service";

export const DEFAULT_POLL_INTERVAL_MS = 3000;
export const DEFAULT_STARTUP_DELAY_MS = 2000;

export type DispatcherDeps = {
  config: ConfigStore;
  registry: PathRegistry;
  inbox: InboxRepository;
  service: DispatchService;
  logger: Logger;
};

export type DispatcherOptions = {
  baseDir: string;
  pollIntervalMs?: number;
  startupDelayMs?: number;
  sleep?: Sleeper;
  onCycle?: (summary: CycleSummary) => void;
};

/**
 * Polling loop. Settings are reloaded at the top of every tick; the loop ends
 * when they report `running=false` (or `stop()` was called) and does not come
 * back. Prefixes are loaded once, at startup.
 */
export class Dispatcher {
  private currentState: DispatcherState = "stopped";
  private stopRequested = false;
  private cycles = 0;
  private warnedAlgorithm: string | null = null;

  private readonly pollIntervalMs: number;
  private readonly startupDelayMs: number;
  private readonly sleep: Sleeper;

  constructor(
    private readonly deps: DispatcherDeps,
    private readonly options: DispatcherOptions
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.startupDelayMs = options.startupDelayMs ?? DEFAULT_STARTUP_DELAY_MS;
    this.sleep = options.sleep ?? sleep;
  }

  get state(): DispatcherState {
    return this.currentState;
  }

  get completedCycles(): number {
    return this.cycles;
  }

  /** Ask the loop to end at the next cycle boundary. */
  stop(): void {
    this.stopRequested = true;
  }

  async run(): Promise<void> {
    const { config, registry, inbox, logger } = this.deps;

    await config.bootstrapIfAbsent();
    await registry.bootstrapIfAbsent();

    const initial = await config.load();
    await this.sleep(this.startupDelayMs);

    if (!initial.running || this.stopRequested) {
      logger.info("isRunning is false, not starting");
      return;
    }

    const prefixes = await registry.load();
    await registry.ensureDirectories(prefixes);
    await inbox.ensureDirectory(this.inboxPath(initial));

    this.currentState = "running";
    logger.info("Running", { inbox: this.inboxPath(initial), prefixes: [...prefixes] });

    try {
      for (;;) {
        const settings = await config.load();
        if (!settings.running || this.stopRequested) break;

        await this.tick(settings, prefixes);
        await this.sleep(this.pollIntervalMs);
      }
    } finally {
      this.currentState = "stopped";
    }

    logger.info("Stopped", { cycles: this.cycles });
  }

  private async tick(settings: Settings, prefixes: PrefixSet): Promise<void> {
    const { service, logger } = this.deps;

    const algorithm = settings.digestAlgorithm;
    if (settings.digestEnabled && !isDigestAlgorithm(algorithm) && algorithm !== this.warnedAlgorithm) {
      logger.warn(`Unknown hashMethod "${algorithm}", using MD5`);
      this.warnedAlgorithm = algorithm;
    }

    const summary = await service.runCycle({
      inboxAbs: this.inboxPath(settings),
      settings,
      prefixes,
    });
    this.cycles++;

    const counts = {
      listed: summary.listed,
      moved: summary.moved,
      unmatched: summary.unmatched,
      failed: summary.failed,
    };
    if (summary.moved > 0 || summary.failed > 0) logger.info("Cycle complete", counts);
    else logger.debug("Cycle complete", counts);

    this.options.onCycle?.(summary);
  }

  private inboxPath(settings: Settings): string {
    return path.resolve(this.options.baseDir, settings.watchDirectory);
  }
}
