import { DEFAULT_CPU_THRESHOLD, DEFAULT_HOST_CHECK_INTERVAL_S } from "../lib/constants";
import { errorMessage } from "../lib/errors";
import type { LifecycleOperations } from "../lib/lifecycle";
import { logger } from "../lib/logger";
import type { HostSampler } from "../lib/probes";

export interface HostGuardianConfig {
  cpuThreshold?: number;
  intervalS?: number;
  enabled?: boolean;
  /** Runs before each enabled tick, e.g. to reload state written by other processes. */
  beforeTick?: () => Promise<void>;
  /** Read at the top of every tick; `undefined` keeps the current toggle. */
  readToggle?: () => Promise<boolean | undefined>;
}

export type HostTickOutcome =
  | { kind: "disabled" }
  | { kind: "ok"; usage: number }
  | { kind: "breach"; usage: number; stopped: number }
  | { kind: "error"; message: string };

/**
 * Host guardian: samples host CPU on a fixed period and force-stops every instance
 * when usage crosses the threshold.
 */
export class HostGuardian {
  private readonly sampler: HostSampler;
  private readonly operations: LifecycleOperations;
  private readonly cpuThreshold: number;
  private readonly intervalMs: number;
  private readonly beforeTick?: () => Promise<void>;
  private readonly readToggle?: () => Promise<boolean | undefined>;

  private enabled: boolean;
  private ticking = false;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(sampler: HostSampler, operations: LifecycleOperations, config: HostGuardianConfig = {}) {
    this.sampler = sampler;
    this.operations = operations;
    this.cpuThreshold = config.cpuThreshold ?? DEFAULT_CPU_THRESHOLD;
    this.intervalMs = (config.intervalS ?? DEFAULT_HOST_CHECK_INTERVAL_S) * 1000;
    this.enabled = config.enabled ?? true;
    this.beforeTick = config.beforeTick;
    this.readToggle = config.readToggle;
  }

  start(): void {
    if (this.timer) {
      logger.warn("Host guardian already running");
      return;
    }

    logger.info("Starting host guardian", {
      cpuThreshold: this.cpuThreshold,
      intervalMs: this.intervalMs,
      enabled: this.enabled
    });

    this.timer = setInterval(() => {
      void this.runScheduledTick();
    }, this.intervalMs);
    void this.runScheduledTick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info("Host guardian stopped");
    }
  }

  enable(): void {
    this.enabled = true;
    logger.info("Host guardian enabled");
  }

  disable(): void {
    this.enabled = false;
    logger.info("Host guardian disabled");
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  async tick(): Promise<HostTickOutcome> {
    await this.syncToggle();
    if (!this.enabled) {
      return { kind: "disabled" };
    }

    let usage: number;
    try {
      if (this.beforeTick) {
        await this.beforeTick();
      }
      usage = await this.sampler.cpuPercent();
    } catch (error) {
      logger.error("Host CPU sampling failed", { error: errorMessage(error) });
      return { kind: "error", message: errorMessage(error) };
    }

    if (usage <= this.cpuThreshold) {
      logger.debug("Host CPU within limits", { usage });
      return { kind: "ok", usage };
    }

    logger.warn("Host CPU above threshold, stopping all instances", { usage, threshold: this.cpuThreshold });
    try {
      const stopped = await this.operations.stopAll();
      logger.warn("Host guardian stopped instances", { stopped });
      return { kind: "breach", usage, stopped };
    } catch (error) {
      logger.error("Host guardian failed to stop instances", { error: errorMessage(error) });
      return { kind: "error", message: errorMessage(error) };
    }
  }

  private async syncToggle(): Promise<void> {
    if (!this.readToggle) {
      return;
    }
    try {
      const enabled = await this.readToggle();
      if (enabled === true && !this.enabled) {
        this.enable();
      } else if (enabled === false && this.enabled) {
        this.disable();
      }
    } catch (error) {
      logger.warn("Could not read the host guard toggle, keeping the current one", { error: errorMessage(error) });
    }
  }

  private async runScheduledTick(): Promise<void> {
    if (this.ticking) {
      logger.debug("Previous host guardian tick still running, skipping");
      return;
    }
    this.ticking = true;
    try {
      await this.tick();
    } finally {
      this.ticking = false;
    }
  }
}
