import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { STATE_FILES } from "./constants";
import { errorMessage, NotFoundError, PersistenceError } from "./errors";
import { logger } from "./logger";
import type {
  AdminRegistry,
  InstanceRecord,
  OwnedInstance,
  PortAllocationTable,
  PortForward,
  StoreState,
  SuspensionEntry
} from "./types";

const positiveInt = z.number().int().positive();

const suspensionEntrySchema = z.object({
  time: z.string(),
  reason: z.string(),
  actor: z.string()
});

const instanceSchema = z.object({
  id: z.string().min(1),
  resources: z.object({
    ramGb: positiveInt,
    cpuCores: positiveInt,
    diskGb: positiveInt
  }),
  config: z.string(),
  status: z.enum(["running", "stopped", "suspended"]),
  // Older documents carried a separate flag; it only ever forces the suspended status.
  suspended: z.boolean().optional(),
  createdAt: z.string(),
  suspensionHistory: z.array(suspensionEntrySchema).default([]),
  sharedWith: z.array(z.string()).default([])
});

const instancesDocSchema = z.record(z.string(), z.array(instanceSchema));

const adminsDocSchema = z.object({
  mainAdmin: z.string().optional(),
  admins: z.array(z.string()).default([])
});

const portsDocSchema = z.object({
  slots: z.record(z.string(), z.number().int().nonnegative()).default({}),
  forwards: z
    .record(
      z.string(),
      z.array(
        z.object({
          instanceId: z.string().min(1),
          internalPort: z.number().int().min(1).max(65535),
          hostPort: z.number().int().min(1).max(65535)
        })
      )
    )
    .default({})
});

const COLLECTIONS = ["instances", "admins", "ports"] as const;

type Collection = (typeof COLLECTIONS)[number];

const COLLECTION_FILES: Record<Collection, string> = {
  instances: STATE_FILES.instances,
  admins: STATE_FILES.admins,
  ports: STATE_FILES.ports
};

export interface InstanceStoreOptions {
  directory: string;
  mainAdminId: string;
}

export function emptyState(mainAdminId: string): StoreState {
  return {
    instances: {},
    admins: { mainAdmin: mainAdminId, admins: [] },
    ports: { slots: {}, forwards: {} }
  };
}

export class InstanceStore {
  readonly directory: string;
  private readonly mainAdminId: string;
  private state: StoreState;
  private saving: Promise<void> = Promise.resolve();

  constructor(options: InstanceStoreOptions) {
    this.directory = options.directory;
    this.mainAdminId = options.mainAdminId;
    this.state = emptyState(options.mainAdminId);
  }

  filePath(collection: Collection): string {
    return path.join(this.directory, COLLECTION_FILES[collection]);
  }

  async load(): Promise<StoreState> {
    const [instances, admins, ports] = await Promise.all([
      this.readCollection("instances", instancesDocSchema, {}),
      this.readCollection("admins", adminsDocSchema, { admins: [] }),
      this.readCollection("ports", portsDocSchema, { slots: {}, forwards: {} })
    ]);

    this.state = {
      instances: normalizeInstances(instances),
      admins: normalizeAdmins(this.mainAdminId, admins.admins),
      ports: normalizePorts(ports)
    };
    return this.state;
  }

  snapshot(): Readonly<StoreState> {
    return this.state;
  }

  async mutate<T>(fn: (state: StoreState) => T): Promise<T> {
    const result = fn(this.state);
    await this.save();
    return result;
  }

  async updateInstance<T>(id: string, fn: (record: InstanceRecord, ownerId: string) => T): Promise<T> {
    return await this.mutate((state) => {
      const found = locate(state, id);
      if (!found) {
        throw new NotFoundError(`Instance '${id}' no longer exists.`);
      }
      return fn(found.record, found.ownerId);
    });
  }

  async save(): Promise<void> {
    const next = this.saving.catch(() => undefined).then(() => this.writeAll());
    this.saving = next;
    await next;
  }

  findInstance(id: string): OwnedInstance | undefined {
    return locate(this.state, id);
  }

  requireInstance(id: string): OwnedInstance {
    const found = this.findInstance(id);
    if (!found) {
      throw new NotFoundError(`Instance '${id}' not found.`, {
        hint: "Run `warden ls` to see known instances."
      });
    }
    return found;
  }

  listInstances(): OwnedInstance[] {
    const result: OwnedInstance[] = [];
    for (const [ownerId, records] of Object.entries(this.state.instances)) {
      for (const record of records) {
        result.push({ ownerId, record });
      }
    }
    return result;
  }

  instancesOf(ownerId: string): InstanceRecord[] {
    return this.state.instances[ownerId] ?? [];
  }

  hasInstanceId(id: string): boolean {
    return this.findInstance(id) !== undefined;
  }

  private async writeAll(): Promise<void> {
    const documents = serializeState(this.state);
    try {
      await fs.promises.mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new PersistenceError(`Failed to create state directory ${this.directory}: ${errorMessage(error)}`);
    }
    for (const collection of COLLECTIONS) {
      await this.writeCollection(collection, documents[collection]);
    }
    logger.debug("State saved", { directory: this.directory });
  }

  private async writeCollection(collection: Collection, contents: string): Promise<void> {
    const target = this.filePath(collection);
    const tempPath = `${target}.tmp.${process.pid}.${Date.now()}`;
    try {
      await fs.promises.writeFile(tempPath, contents, "utf8");
      await fs.promises.rename(tempPath, target);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn("Failed to remove temp state file", { tempPath, error: errorMessage(cleanupError) });
      });
      throw new PersistenceError(`Failed to save ${COLLECTION_FILES[collection]}: ${errorMessage(error)}`);
    }
  }

  private async readCollection<S extends z.ZodTypeAny>(
    collection: Collection,
    schema: S,
    fallback: z.output<S>
  ): Promise<z.output<S>> {
    const target = this.filePath(collection);
    let raw: string;
    try {
      raw = await fs.promises.readFile(target, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return fallback;
      }
      throw new PersistenceError(`Failed to read ${COLLECTION_FILES[collection]}: ${errorMessage(error)}`);
    }

    let parsed: z.SafeParseReturnType<unknown, z.output<S>>;
    try {
      parsed = schema.safeParse(JSON.parse(raw));
    } catch (error) {
      await this.quarantine(target, errorMessage(error));
      return fallback;
    }
    if (!parsed.success) {
      await this.quarantine(target, parsed.error.issues.map((issue) => issue.message).join("; "));
      return fallback;
    }
    return parsed.data;
  }

  private async quarantine(target: string, reason: string): Promise<void> {
    const quarantinePath = `${target}.corrupt-${Date.now()}`;
    logger.warn("State file is corrupt, starting from an empty collection", { file: target, quarantinePath, reason });
    try {
      await fs.promises.rename(target, quarantinePath);
    } catch (error) {
      throw new PersistenceError(`Failed to move aside corrupt ${path.basename(target)}: ${errorMessage(error)}`);
    }
  }
}

export function serializeState(state: StoreState): Record<Collection, string> {
  const instances: Record<string, InstanceRecord[]> = {};
  for (const [ownerId, records] of Object.entries(state.instances)) {
    instances[ownerId] = records.map(orderRecord);
  }

  const admins: AdminRegistry = {
    mainAdmin: state.admins.mainAdmin,
    admins: [...state.admins.admins]
  };

  const ports: PortAllocationTable = {
    slots: { ...state.ports.slots },
    forwards: Object.fromEntries(
      Object.entries(state.ports.forwards).map(([user, forwards]) => [user, forwards.map(orderForward)])
    )
  };

  return {
    instances: toDocument(instances),
    admins: toDocument(admins),
    ports: toDocument(ports)
  };
}

function toDocument(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

function locate(state: StoreState, id: string): OwnedInstance | undefined {
  for (const [ownerId, records] of Object.entries(state.instances)) {
    const record = records.find((item) => item.id === id);
    if (record) {
      return { ownerId, record };
    }
  }
  return undefined;
}

function normalizeInstances(doc: z.output<typeof instancesDocSchema>): Record<string, InstanceRecord[]> {
  const result: Record<string, InstanceRecord[]> = {};
  for (const [ownerId, records] of Object.entries(doc)) {
    if (records.length === 0) {
      continue;
    }
    result[ownerId] = records.map((raw) =>
      orderRecord({
        id: raw.id,
        resources: raw.resources,
        config: raw.config,
        status: raw.suspended ? "suspended" : raw.status,
        createdAt: raw.createdAt,
        suspensionHistory: raw.suspensionHistory,
        sharedWith: raw.sharedWith
      })
    );
  }
  return result;
}

function normalizeAdmins(mainAdmin: string, admins: string[]): AdminRegistry {
  const unique = [...new Set(admins)].filter((id) => id !== mainAdmin);
  return { mainAdmin, admins: unique };
}

function normalizePorts(doc: z.output<typeof portsDocSchema>): PortAllocationTable {
  const forwards: Record<string, PortForward[]> = {};
  for (const [user, entries] of Object.entries(doc.forwards)) {
    forwards[user] = entries.map(orderForward);
  }
  return { slots: { ...doc.slots }, forwards };
}

function orderRecord(record: InstanceRecord): InstanceRecord {
  return {
    id: record.id,
    resources: {
      ramGb: record.resources.ramGb,
      cpuCores: record.resources.cpuCores,
      diskGb: record.resources.diskGb
    },
    config: record.config,
    status: record.status,
    createdAt: record.createdAt,
    suspensionHistory: record.suspensionHistory.map(orderEntry),
    sharedWith: [...record.sharedWith]
  };
}

function orderEntry(entry: SuspensionEntry): SuspensionEntry {
  return { time: entry.time, reason: entry.reason, actor: entry.actor };
}

function orderForward(forward: PortForward): PortForward {
  return { instanceId: forward.instanceId, internalPort: forward.internalPort, hostPort: forward.hostPort };
}
