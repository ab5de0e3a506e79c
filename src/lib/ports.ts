import { PORT_RANGE } from "./constants";
import { errorMessage, NotFoundError, QuotaExceededError, ValidationError } from "./errors";
import type { ToolExecutor } from "./executor";
import { logger } from "./logger";
import type { InstanceStore } from "./store";
import type { PortForward, StoreState } from "./types";
import { isPositiveInteger } from "./utils";

export type Protocol = "tcp" | "udp";

export interface PortRange {
  start: number;
  end: number;
}

export interface PortSummary {
  total: number;
  used: number;
  available: number;
}

export function deviceName(hostPort: number, protocol: Protocol): string {
  return `port-${hostPort}-${protocol}`;
}

export class PortAllocator {
  private readonly store: InstanceStore;
  private readonly executor: ToolExecutor;
  private readonly range: PortRange;
  // Ports chosen by allocations whose device commands have not finished yet.
  private readonly pending = new Map<number, string>();

  constructor(store: InstanceStore, executor: ToolExecutor, range: PortRange = PORT_RANGE) {
    this.store = store;
    this.executor = executor;
    this.range = range;
  }

  nextPort(): number | null {
    const used = this.usedPorts();
    for (let port = this.range.start; port <= this.range.end; port += 1) {
      if (!used.has(port) && !this.pending.has(port)) {
        return port;
      }
    }
    return null;
  }

  async allocate(user: string, instanceId: string, internalPort: number): Promise<PortForward> {
    if (!Number.isInteger(internalPort) || internalPort < 1 || internalPort > 65535) {
      throw new ValidationError(`Internal port must be an integer between 1 and 65535, got ${internalPort}.`);
    }

    const slots = this.slotsOf(user);
    const used = this.forwardsOf(user).length + this.pendingFor(user);
    if (used >= slots) {
      throw new QuotaExceededError(user, used, slots);
    }

    const hostPort = this.nextPort();
    if (hostPort === null) {
      throw new ValidationError(`No free host ports left in ${this.range.start}-${this.range.end}.`);
    }

    this.pending.set(hostPort, user);
    try {
      await this.addDevice(instanceId, hostPort, internalPort, "tcp");
      try {
        await this.addDevice(instanceId, hostPort, internalPort, "udp");
      } catch (error) {
        await this.removeDevice(instanceId, hostPort, "tcp");
        throw error;
      }

      const forward: PortForward = { instanceId, internalPort, hostPort };
      await this.store.mutate((state) => {
        const list = state.ports.forwards[user] ?? [];
        list.push(forward);
        state.ports.forwards[user] = list;
      });
      logger.info("Port forward added", { user, instanceId, hostPort, internalPort });
      return forward;
    } finally {
      this.pending.delete(hostPort);
    }
  }

  async release(user: string, hostPort: number): Promise<PortForward> {
    const forward = this.forwardsOf(user).find((item) => item.hostPort === hostPort);
    if (!forward) {
      throw new NotFoundError(`User '${user}' has no forward on host port ${hostPort}.`);
    }

    await this.removeDevice(forward.instanceId, hostPort, "tcp");
    await this.removeDevice(forward.instanceId, hostPort, "udp");

    await this.store.mutate((state) => {
      const remaining = (state.ports.forwards[user] ?? []).filter((item) => item.hostPort !== hostPort);
      if (remaining.length > 0) {
        state.ports.forwards[user] = remaining;
      } else {
        delete state.ports.forwards[user];
      }
    });
    logger.info("Port forward removed", { user, instanceId: forward.instanceId, hostPort });
    return forward;
  }

  async addSlots(user: string, amount: number): Promise<number> {
    if (!isPositiveInteger(amount)) {
      throw new ValidationError(`Slot amount must be a positive integer, got ${amount}.`);
    }
    return await this.store.mutate((state) => {
      const next = (state.ports.slots[user] ?? 0) + amount;
      state.ports.slots[user] = next;
      return next;
    });
  }

  forwardsOf(user: string): PortForward[] {
    return this.store.snapshot().ports.forwards[user] ?? [];
  }

  slotsOf(user: string): number {
    return this.store.snapshot().ports.slots[user] ?? 0;
  }

  summary(): PortSummary {
    const total = this.range.end - this.range.start + 1;
    const used = this.usedPorts().size;
    return { total, used, available: total - used };
  }

  /** Drops every forward that points at the instance. Device rules go away with the instance. */
  dropForwardsFor(state: StoreState, instanceId: string): number {
    let dropped = 0;
    for (const [user, forwards] of Object.entries(state.ports.forwards)) {
      const remaining = forwards.filter((item) => item.instanceId !== instanceId);
      dropped += forwards.length - remaining.length;
      if (remaining.length > 0) {
        state.ports.forwards[user] = remaining;
      } else {
        delete state.ports.forwards[user];
      }
    }
    return dropped;
  }

  private usedPorts(): Set<number> {
    const used = new Set<number>();
    for (const forwards of Object.values(this.store.snapshot().ports.forwards)) {
      for (const forward of forwards) {
        used.add(forward.hostPort);
      }
    }
    return used;
  }

  private pendingFor(user: string): number {
    let count = 0;
    for (const owner of this.pending.values()) {
      if (owner === user) {
        count += 1;
      }
    }
    return count;
  }

  private async addDevice(instanceId: string, hostPort: number, internalPort: number, protocol: Protocol): Promise<void> {
    await this.executor.execute([
      "lxc",
      "config",
      "device",
      "add",
      instanceId,
      deviceName(hostPort, protocol),
      "proxy",
      `listen=${protocol}:0.0.0.0:${hostPort}`,
      `connect=${protocol}:127.0.0.1:${internalPort}`
    ]);
  }

  private async removeDevice(instanceId: string, hostPort: number, protocol: Protocol): Promise<void> {
    try {
      await this.executor.execute(["lxc", "config", "device", "remove", instanceId, deviceName(hostPort, protocol)]);
    } catch (error) {
      logger.warn("Failed to remove proxy device", {
        instanceId,
        device: deviceName(hostPort, protocol),
        error: errorMessage(error)
      });
    }
  }
}
