import { DEFAULT_IMAGE, DEFAULT_STORAGE_POOL, INSTANCE_PREFIX, SUSPENSION_LOG_DISPLAY_LIMIT } from "./constants";
import { errorMessage, NotFoundError, StateConflictError, ValidationError } from "./errors";
import type { ToolExecutor } from "./executor";
import { logger } from "./logger";
import { bestEffort, type Notifier, type RoleGrants } from "./notifier";
import type { PortAllocator } from "./ports";
import { formatDisk, formatMemory, type InstanceProbe } from "./probes";
import { assertTransition, isNoopTransition, type TransitionCause } from "./status";
import type { InstanceStore } from "./store";
import type { FleetSummary, InstanceRecord, InstanceStats, InstanceStatus, ResourceSpec, SuspensionEntry } from "./types";
import { compactTimestamp, formatConfig, formatPercent, isPositiveInteger } from "./utils";

export type ResourceChanges = Partial<ResourceSpec>;

export interface SuspensionLogEntry extends SuspensionEntry {
  instanceId: string;
  ownerId: string;
}

export interface SuspensionLog {
  total: number;
  entries: SuspensionLogEntry[];
}

export interface LifecycleOptions {
  store: InstanceStore;
  executor: ToolExecutor;
  ports: PortAllocator;
  probe: InstanceProbe;
  notifier: Notifier;
  roles: RoleGrants;
  image?: string;
  storagePool?: string;
  now?: () => Date;
}

const RESOURCE_KEYS = ["ramGb", "cpuCores", "diskGb"] as const;

const RESOURCE_LABELS: Record<keyof ResourceSpec, string> = {
  ramGb: "RAM (GB)",
  cpuCores: "CPU cores",
  diskGb: "Disk (GB)"
};

const CLONE_ID_PATTERN = /^[A-Za-z0-9-]+$/;
const POOL_PATTERN = /^[A-Za-z0-9_.-]+$/;

export function validateResources(resources: ResourceSpec): ResourceSpec {
  for (const key of RESOURCE_KEYS) {
    if (!isPositiveInteger(resources[key])) {
      throw new ValidationError(`${RESOURCE_LABELS[key]} must be a positive integer, got ${resources[key]}.`);
    }
  }
  return resources;
}

export function validateResourceChanges(changes: ResourceChanges): ResourceChanges {
  const provided = RESOURCE_KEYS.filter((key) => changes[key] !== undefined);
  if (provided.length === 0) {
    throw new ValidationError("Specify at least one of RAM, CPU or disk.");
  }
  for (const key of provided) {
    if (!isPositiveInteger(changes[key])) {
      throw new ValidationError(`${RESOURCE_LABELS[key]} must be a positive integer, got ${changes[key]}.`);
    }
  }
  return changes;
}

export function resourceCommand(id: string, key: keyof ResourceSpec, value: number): string[] {
  switch (key) {
    case "ramGb":
      return ["lxc", "config", "set", id, "limits.memory", `${value * 1024}MB`];
    case "cpuCores":
      return ["lxc", "config", "set", id, "limits.cpu", String(value)];
    case "diskGb":
      return ["lxc", "config", "device", "set", id, "root", "size", `${value}GB`];
  }
}

export class LifecycleOperations {
  private readonly store: InstanceStore;
  private readonly executor: ToolExecutor;
  private readonly ports: PortAllocator;
  private readonly probe: InstanceProbe;
  private readonly notifier: Notifier;
  private readonly roles: RoleGrants;
  private readonly image: string;
  private readonly storagePool: string;
  private readonly now: () => Date;

  constructor(options: LifecycleOptions) {
    this.store = options.store;
    this.executor = options.executor;
    this.ports = options.ports;
    this.probe = options.probe;
    this.notifier = options.notifier;
    this.roles = options.roles;
    this.image = options.image ?? DEFAULT_IMAGE;
    this.storagePool = options.storagePool ?? DEFAULT_STORAGE_POOL;
    this.now = options.now ?? (() => new Date());
  }

  nextInstanceId(ownerId: string): string {
    const prefix = `${INSTANCE_PREFIX}${ownerId}-`;
    let highest = 0;
    for (const record of this.store.instancesOf(ownerId)) {
      if (!record.id.startsWith(prefix)) {
        continue;
      }
      const suffix = record.id.slice(prefix.length);
      if (/^\d+$/.test(suffix)) {
        highest = Math.max(highest, Number.parseInt(suffix, 10));
      }
    }

    let sequence = highest + 1;
    while (this.store.hasInstanceId(`${prefix}${sequence}`)) {
      sequence += 1;
    }
    return `${prefix}${sequence}`;
  }

  async create(ownerId: string, resources: ResourceSpec): Promise<InstanceRecord> {
    if (!ownerId.trim()) {
      throw new ValidationError("Owner id is required.");
    }
    validateResources(resources);

    const id = this.nextInstanceId(ownerId);
    logger.info("Creating instance", { id, ownerId, ...resources });
    await this.provision(id, resources);

    const record: InstanceRecord = {
      id,
      resources: { ...resources },
      config: formatConfig(resources.ramGb, resources.cpuCores, resources.diskGb),
      status: "running",
      createdAt: this.now().toISOString(),
      suspensionHistory: [],
      sharedWith: []
    };
    await this.store.mutate((state) => {
      const owned = state.instances[ownerId] ?? [];
      owned.push(record);
      state.instances[ownerId] = owned;
    });
    await bestEffort("Owner role grant", () => this.roles.grantOwnerRole(ownerId));
    return record;
  }

  async start(id: string): Promise<InstanceRecord> {
    const { record } = this.store.requireInstance(id);
    if (isNoopTransition(record.status, "running")) {
      return record;
    }
    assertTransition(id, record.status, "running");

    await this.executor.execute(["lxc", "start", id]);
    return await this.setStatus(id, "running");
  }

  async stop(id: string): Promise<InstanceRecord> {
    const { record } = this.store.requireInstance(id);
    if (isNoopTransition(record.status, "stopped")) {
      return record;
    }
    assertTransition(id, record.status, "stopped");

    await this.executor.execute(["lxc", "stop", id]);
    return await this.setStatus(id, "stopped");
  }

  async restart(id: string): Promise<InstanceRecord> {
    const { record } = this.store.requireInstance(id);
    this.requireRunning(record, "restart");
    await this.executor.execute(["lxc", "restart", id]);
    return record;
  }

  async suspend(id: string, reason: string, actor: string): Promise<SuspensionEntry> {
    const { record, ownerId } = this.store.requireInstance(id);
    this.requireRunning(record, "suspend");

    logger.warn("Suspending instance", { id, reason, actor });
    await this.executor.execute(["lxc", "stop", id]);

    const entry: SuspensionEntry = { time: this.now().toISOString(), reason, actor };
    await this.store.updateInstance(id, (current) => {
      if (current.status === "suspended") {
        throw new StateConflictError(`Instance '${id}' is already suspended.`);
      }
      assertTransition(id, current.status, "suspended");
      current.status = "suspended";
      current.suspensionHistory.push(entry);
    });

    await bestEffort("Suspension notice", () =>
      this.notifier.notify(ownerId, `Your instance ${id} has been suspended. Reason: ${reason}`)
    );
    return entry;
  }

  async unsuspend(id: string, actor: string): Promise<InstanceRecord> {
    const { record, ownerId } = this.store.requireInstance(id);
    if (record.status !== "suspended") {
      throw new StateConflictError(`Instance '${id}' is not suspended.`);
    }

    await this.executor.execute(["lxc", "start", id]);
    const updated = await this.setStatus(id, "running", "unsuspend");
    logger.info("Instance unsuspended", { id, actor });

    await bestEffort("Unsuspension notice", () =>
      this.notifier.notify(ownerId, `Your instance ${id} has been unsuspended by ${actor}.`)
    );
    return updated;
  }

  async resize(id: string, changes: ResourceChanges): Promise<InstanceRecord> {
    validateResourceChanges(changes);
    this.store.requireInstance(id);
    return await this.applyResources(id, changes);
  }

  async addResources(id: string, deltas: ResourceChanges): Promise<InstanceRecord> {
    validateResourceChanges(deltas);
    const { record } = this.store.requireInstance(id);

    const target: ResourceChanges = {};
    for (const key of RESOURCE_KEYS) {
      const delta = deltas[key];
      if (delta !== undefined) {
        target[key] = record.resources[key] + delta;
      }
    }
    return await this.applyResources(id, target);
  }

  async reinstall(id: string): Promise<InstanceRecord> {
    const { record } = this.store.requireInstance(id);
    if (record.status === "suspended") {
      throw new StateConflictError(`Instance '${id}' is suspended and cannot be reinstalled.`, {
        hint: "Ask an admin to unsuspend it first."
      });
    }

    const resources = { ...record.resources };
    logger.warn("Reinstalling instance", { id });
    await this.forceStop(id);
    await this.executor.execute(["lxc", "delete", id, "--force"]);
    await this.provision(id, resources);

    return await this.store.mutate((state) => {
      const current = this.requireRecord(state.instances, id);
      assertTransition(id, current.status, "running");
      this.ports.dropForwardsFor(state, id);
      current.status = "running";
      current.createdAt = this.now().toISOString();
      return current;
    });
  }

  async clone(id: string, newId?: string): Promise<InstanceRecord> {
    const { record, ownerId } = this.store.requireInstance(id);
    const cloneId = newId ?? `${id}-clone-${compactTimestamp(this.now())}`;
    if (!CLONE_ID_PATTERN.test(cloneId)) {
      throw new ValidationError(`Instance id '${cloneId}' may only contain letters, digits and dashes.`);
    }
    if (this.store.hasInstanceId(cloneId)) {
      throw new ValidationError(`Instance '${cloneId}' already exists.`);
    }

    logger.info("Cloning instance", { id, cloneId });
    await this.executor.execute(["lxc", "copy", id, cloneId]);
    await this.executor.execute(["lxc", "start", cloneId]);

    const cloned: InstanceRecord = {
      id: cloneId,
      resources: { ...record.resources },
      config: record.config,
      status: "running",
      createdAt: this.now().toISOString(),
      suspensionHistory: [],
      sharedWith: []
    };
    await this.store.mutate((state) => {
      const owned = state.instances[ownerId] ?? [];
      owned.push(cloned);
      state.instances[ownerId] = owned;
    });
    return cloned;
  }

  async migrate(id: string, targetPool: string): Promise<InstanceRecord> {
    if (!POOL_PATTERN.test(targetPool)) {
      throw new ValidationError(`Invalid storage pool name '${targetPool}'.`);
    }
    const { record } = this.store.requireInstance(id);
    if (record.status === "suspended") {
      throw new StateConflictError(`Instance '${id}' is suspended and cannot be migrated.`);
    }

    if (record.status === "running") {
      await this.executor.execute(["lxc", "stop", id]);
      await this.setStatus(id, "stopped");
    }

    const tempId = `${id}-migrate-${Math.floor(this.now().getTime() / 1000)}`;
    logger.info("Migrating instance", { id, targetPool, tempId });
    await this.executor.execute(["lxc", "copy", id, tempId, "--storage", targetPool]);
    await this.executor.execute(["lxc", "delete", id, "--force"]);
    await this.executor.execute(["lxc", "rename", tempId, id]);
    await this.executor.execute(["lxc", "start", id]);
    return await this.setStatus(id, "running");
  }

  async delete(id: string, reason: string, actor: string): Promise<InstanceRecord> {
    const { record, ownerId } = this.store.requireInstance(id);

    logger.warn("Deleting instance", { id, ownerId, reason, actor });
    await this.forceStop(id);
    await this.executor.execute(["lxc", "delete", id, "--force"]);

    const ownerHasNone = await this.store.mutate((state) => {
      const remaining = (state.instances[ownerId] ?? []).filter((item) => item.id !== id);
      if (remaining.length > 0) {
        state.instances[ownerId] = remaining;
      } else {
        delete state.instances[ownerId];
      }
      this.ports.dropForwardsFor(state, id);
      return remaining.length === 0;
    });

    await bestEffort("Deletion notice", () =>
      this.notifier.notify(ownerId, `Your instance ${id} has been deleted by ${actor}. Reason: ${reason}`)
    );
    if (ownerHasNone) {
      await bestEffort("Owner role revocation", () => this.roles.revokeOwnerRole(ownerId));
    }
    return record;
  }

  /** Force-stops every instance on the host and marks the running records stopped. */
  async stopAll(): Promise<number> {
    await this.executor.execute(["lxc", "stop", "--all", "--force"]);
    return await this.store.mutate((state) => {
      let stopped = 0;
      for (const records of Object.values(state.instances)) {
        for (const record of records) {
          if (record.status === "running") {
            record.status = "stopped";
            stopped += 1;
          }
        }
      }
      return stopped;
    });
  }

  async share(id: string, userId: string): Promise<InstanceRecord> {
    const { ownerId } = this.store.requireInstance(id);
    if (!userId.trim()) {
      throw new ValidationError("User id is required.");
    }
    if (userId === ownerId) {
      throw new ValidationError("An owner cannot share an instance with themselves.");
    }

    const updated = await this.store.updateInstance(id, (record) => {
      if (record.sharedWith.includes(userId)) {
        throw new ValidationError(`Instance '${id}' is already shared with '${userId}'.`);
      }
      record.sharedWith.push(userId);
      return record;
    });
    await bestEffort("Share notice", () =>
      this.notifier.notify(userId, `Instance ${id} has been shared with you by ${ownerId}.`)
    );
    return updated;
  }

  async unshare(id: string, userId: string): Promise<InstanceRecord> {
    this.store.requireInstance(id);
    return await this.store.updateInstance(id, (record) => {
      if (!record.sharedWith.includes(userId)) {
        throw new ValidationError(`Instance '${id}' is not shared with '${userId}'.`);
      }
      record.sharedWith = record.sharedWith.filter((item) => item !== userId);
      return record;
    });
  }

  async stats(id: string): Promise<InstanceStats> {
    this.store.requireInstance(id);
    const [status, cpu, memory, disk] = await Promise.all([
      orUnknown(id, "status", () => this.probe.status(id)),
      orUnknown(id, "cpu", async () => formatPercent(await this.probe.cpuPercent(id))),
      orUnknown(id, "memory", async () => formatMemory(await this.probe.memory(id))),
      orUnknown(id, "disk", async () => formatDisk(await this.probe.disk(id)))
    ]);
    return { id, status, cpu, memory, disk };
  }

  async processes(id: string): Promise<string> {
    const { record } = this.store.requireInstance(id);
    this.requireRunning(record, "list processes");
    return await this.probe.processes(id);
  }

  async logs(id: string, lines?: number): Promise<string> {
    const { record } = this.store.requireInstance(id);
    this.requireRunning(record, "read logs");
    return await this.probe.logs(id, lines);
  }

  fleetSummary(): FleetSummary {
    const { instances, admins } = this.store.snapshot();
    const summary: FleetSummary = {
      users: Object.keys(instances).length,
      admins: admins.admins.length + 1,
      instances: 0,
      running: 0,
      stopped: 0,
      suspended: 0,
      resources: { ramGb: 0, cpuCores: 0, diskGb: 0 }
    };
    for (const records of Object.values(instances)) {
      for (const record of records) {
        summary.instances += 1;
        summary[record.status] += 1;
        for (const key of RESOURCE_KEYS) {
          summary.resources[key] += record.resources[key];
        }
      }
    }
    return summary;
  }

  suspensionLog(id?: string): SuspensionLog {
    if (id) {
      const { record, ownerId } = this.store.requireInstance(id);
      const entries = [...record.suspensionHistory]
        .reverse()
        .slice(0, SUSPENSION_LOG_DISPLAY_LIMIT)
        .map((entry) => ({ ...entry, instanceId: id, ownerId }));
      return { total: record.suspensionHistory.length, entries };
    }

    const entries: SuspensionLogEntry[] = [];
    for (const { ownerId, record } of this.store.listInstances()) {
      for (const entry of record.suspensionHistory) {
        entries.push({ ...entry, instanceId: record.id, ownerId });
      }
    }
    entries.sort((a, b) => (a.time < b.time ? 1 : a.time > b.time ? -1 : 0));
    return { total: entries.length, entries };
  }

  private async provision(id: string, resources: ResourceSpec): Promise<void> {
    await this.executor.execute(["lxc", "init", this.image, id, "--storage", this.storagePool]);
    for (const key of RESOURCE_KEYS) {
      await this.executor.execute(resourceCommand(id, key, resources[key]));
    }
    await this.executor.execute(["lxc", "start", id]);
  }

  private async applyResources(id: string, target: ResourceChanges): Promise<InstanceRecord> {
    const wasRunning = this.store.requireInstance(id).record.status === "running";
    if (wasRunning) {
      await this.executor.execute(["lxc", "stop", id]);
      await this.setStatus(id, "stopped");
    }

    for (const key of RESOURCE_KEYS) {
      const value = target[key];
      if (value === undefined) {
        continue;
      }
      await this.executor.execute(resourceCommand(id, key, value));
      await this.store.updateInstance(id, (record) => {
        record.resources[key] = value;
        record.config = formatConfig(record.resources.ramGb, record.resources.cpuCores, record.resources.diskGb);
      });
      logger.info("Instance resource updated", { id, [key]: value });
    }

    if (wasRunning) {
      await this.executor.execute(["lxc", "start", id]);
      return await this.setStatus(id, "running");
    }
    return this.store.requireInstance(id).record;
  }

  private async forceStop(id: string): Promise<void> {
    try {
      await this.executor.execute(["lxc", "stop", id, "--force"]);
    } catch (error) {
      logger.warn("Force stop failed, continuing", { id, error: errorMessage(error) });
    }
  }

  private async setStatus(id: string, status: InstanceStatus, cause?: TransitionCause): Promise<InstanceRecord> {
    return await this.store.updateInstance(id, (record) => {
      assertTransition(id, record.status, status, cause);
      record.status = status;
      return record;
    });
  }

  private requireRunning(record: InstanceRecord, action: string): void {
    if (record.status !== "running") {
      throw new StateConflictError(`Instance '${record.id}' must be running to ${action} (currently ${record.status}).`, {
        hint: record.status === "suspended" ? "Unsuspend the instance first." : "Start the instance first."
      });
    }
  }

  private requireRecord(instances: Record<string, InstanceRecord[]>, id: string): InstanceRecord {
    for (const records of Object.values(instances)) {
      const record = records.find((item) => item.id === id);
      if (record) {
        return record;
      }
    }
    throw new NotFoundError(`Instance '${id}' no longer exists.`);
  }
}

async function orUnknown(id: string, probe: string, read: () => Promise<string>): Promise<string> {
  try {
    return await read();
  } catch (error) {
    logger.debug("Probe failed", { id, probe, error: errorMessage(error) });
    return "unknown";
  }
}
