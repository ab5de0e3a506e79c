import {
  AUTO_SYSTEM_ACTOR,
  DEFAULT_CPU_THRESHOLD,
  DEFAULT_INSTANCE_CHECK_INTERVAL_S,
  DEFAULT_RAM_THRESHOLD
} from "../lib/constants";
import { errorMessage, StateConflictError } from "../lib/errors";
import type { LifecycleOperations } from "../lib/lifecycle";
import { logger } from "../lib/logger";
import type { UsageSample } from "../lib/probes";
import type { InstanceStore } from "../lib/store";

export interface UsageProbe {
  sample(id: string): Promise<UsageSample>;
}

export interface InstanceGuardianConfig {
  cpuThreshold?: number;
  ramThreshold?: number;
  intervalS?: number;
  beforeTick?: () => Promise<void>;
}

export function breachReason(sample: UsageSample, cpuThreshold: number, ramThreshold: number): string | null {
  const cpuOver = sample.cpu > cpuThreshold;
  const ramOver = sample.ram > ramThreshold;
  if (!cpuOver && !ramOver) {
    return null;
  }
  const metrics = cpuOver && ramOver ? "CPU and RAM" : cpuOver ? "CPU" : "RAM";
  return (
    `${metrics} exceeded: CPU ${sample.cpu.toFixed(1)}%, RAM ${sample.ram.toFixed(1)}% ` +
    `(threshold: ${cpuThreshold}% CPU / ${ramThreshold}% RAM)`
  );
}

export class InstanceGuardian {
  private readonly store: InstanceStore;
  private readonly probe: UsageProbe;
  private readonly operations: LifecycleOperations;
  private readonly cpuThreshold: number;
  private readonly ramThreshold: number;
  private readonly intervalMs: number;
  private readonly beforeTick?: () => Promise<void>;

  private ticking = false;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    store: InstanceStore,
    probe: UsageProbe,
    operations: LifecycleOperations,
    config: InstanceGuardianConfig = {}
  ) {
    this.store = store;
    this.probe = probe;
    this.operations = operations;
    this.cpuThreshold = config.cpuThreshold ?? DEFAULT_CPU_THRESHOLD;
    this.ramThreshold = config.ramThreshold ?? DEFAULT_RAM_THRESHOLD;
    this.intervalMs = (config.intervalS ?? DEFAULT_INSTANCE_CHECK_INTERVAL_S) * 1000;
    this.beforeTick = config.beforeTick;
  }

  start(): void {
    if (this.timer) {
      logger.warn("Instance guardian already running");
      return;
    }

    logger.info("Starting instance guardian", {
      cpuThreshold: this.cpuThreshold,
      ramThreshold: this.ramThreshold,
      intervalMs: this.intervalMs
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
      logger.info("Instance guardian stopped");
    }
  }

  /** Returns the ids suspended during this tick. */
  async tick(): Promise<string[]> {
    if (this.beforeTick) {
      try {
        await this.beforeTick();
      } catch (error) {
        logger.error("Instance guardian could not refresh state", { error: errorMessage(error) });
        return [];
      }
    }

    const running = this.store
      .listInstances()
      .filter(({ record }) => record.status === "running")
      .map(({ record }) => record.id);

    const suspended: string[] = [];
    for (const id of running) {
      try {
        if (await this.checkInstance(id)) {
          suspended.push(id);
        }
      } catch (error) {
        logger.error("Instance check failed", { id, error: errorMessage(error) });
      }
    }
    return suspended;
  }

  private async checkInstance(id: string): Promise<boolean> {
    const sample = await this.probe.sample(id);
    const reason = breachReason(sample, this.cpuThreshold, this.ramThreshold);
    if (!reason) {
      logger.debug("Instance within limits", { id, cpu: sample.cpu, ram: sample.ram });
      return false;
    }

    // The record may have changed while the probes ran.
    const current = this.store.findInstance(id);
    if (!current || current.record.status !== "running") {
      logger.info("Skipping breach for instance that is no longer running", { id });
      return false;
    }

    try {
      await this.operations.suspend(id, reason, AUTO_SYSTEM_ACTOR);
    } catch (error) {
      if (error instanceof StateConflictError) {
        logger.info("Skipping breach, instance changed state during suspension", { id, error: error.message });
        return false;
      }
      throw error;
    }
    return true;
  }

  private async runScheduledTick(): Promise<void> {
    if (this.ticking) {
      logger.debug("Previous instance guardian tick still running, skipping");
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
