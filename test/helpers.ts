import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ExecutionError } from "../src/lib/errors";
import { toArgv, type CommandLine, type ExecuteOptions, type ToolExecutor } from "../src/lib/executor";
import { LifecycleOperations } from "../src/lib/lifecycle";
import { configureLogger, type LogRecord } from "../src/lib/logger";
import type { Notifier, RoleGrants } from "../src/lib/notifier";
import { PortAllocator } from "../src/lib/ports";
import { InstanceProbe } from "../src/lib/probes";
import { InstanceStore } from "../src/lib/store";
import type { InstanceRecord } from "../src/lib/types";

export const FIXED_NOW = new Date("2024-05-01T12:00:00.000Z");
export const MAIN_ADMIN = "root-admin";

type Response = string | Error | ((argv: string[]) => string | Promise<string>);

/** Records every command line and answers from rules matched by prefix; the latest rule wins. */
export class FakeExecutor implements ToolExecutor {
  readonly calls: string[] = [];
  private readonly rules: Array<{ prefix: string; response: Response }> = [];

  on(prefix: string, response: Response): this {
    this.rules.unshift({ prefix, response });
    return this;
  }

  fail(prefix: string, message = "simulated failure"): this {
    return this.on(prefix, new ExecutionError(message));
  }

  async execute(commandLine: CommandLine, _options?: ExecuteOptions): Promise<string> {
    const argv = toArgv(commandLine);
    const line = argv.join(" ");
    this.calls.push(line);
    await Promise.resolve();

    const rule = this.rules.find((item) => line.startsWith(item.prefix));
    if (!rule) {
      return "ok";
    }
    if (rule.response instanceof Error) {
      throw rule.response;
    }
    if (typeof rule.response === "function") {
      return await rule.response(argv);
    }
    return rule.response;
  }
}

export class RecordingNotifier implements Notifier {
  readonly notes: Array<{ userId: string; message: string }> = [];
  failing = false;

  async notify(userId: string, message: string): Promise<void> {
    if (this.failing) {
      throw new Error("chat unavailable");
    }
    this.notes.push({ userId, message });
  }
}

export class RecordingRoles implements RoleGrants {
  readonly granted: string[] = [];
  readonly revoked: string[] = [];

  async grantOwnerRole(userId: string): Promise<void> {
    this.granted.push(userId);
  }

  async revokeOwnerRole(userId: string): Promise<void> {
    this.revoked.push(userId);
  }
}

export function silenceLogs(): void {
  configureLogger({ level: "silent" });
}

export function captureLogs(): LogRecord[] {
  const records: LogRecord[] = [];
  configureLogger({ level: "debug", sink: (record) => records.push(record) });
  return records;
}

export async function makeTempDir(): Promise<string> {
  return await fs.promises.mkdtemp(path.join(os.tmpdir(), "warden-test-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export function makeRecord(id: string, overrides: Partial<InstanceRecord> = {}): InstanceRecord {
  return {
    id,
    resources: { ramGb: 2, cpuCores: 1, diskGb: 20 },
    config: "2GB RAM / 1 CPU / 20GB Disk",
    status: "running",
    createdAt: "2024-01-01T00:00:00.000Z",
    suspensionHistory: [],
    sharedWith: [],
    ...overrides
  };
}

export async function seedInstance(store: InstanceStore, ownerId: string, record: InstanceRecord): Promise<void> {
  await store.mutate((state) => {
    const owned = state.instances[ownerId] ?? [];
    owned.push(record);
    state.instances[ownerId] = owned;
  });
}

export interface Harness {
  dir: string;
  store: InstanceStore;
  executor: FakeExecutor;
  ports: PortAllocator;
  probe: InstanceProbe;
  notifier: RecordingNotifier;
  roles: RecordingRoles;
  operations: LifecycleOperations;
}

export async function makeHarness(): Promise<Harness> {
  const dir = await makeTempDir();
  const store = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  await store.load();
  const executor = new FakeExecutor();
  const ports = new PortAllocator(store, executor, { start: 10000, end: 10002 });
  const probe = new InstanceProbe(executor);
  const notifier = new RecordingNotifier();
  const roles = new RecordingRoles();
  const operations = new LifecycleOperations({
    store,
    executor,
    ports,
    probe,
    notifier,
    roles,
    image: "ubuntu:22.04",
    storagePool: "default",
    now: () => FIXED_NOW
  });
  return { dir, store, executor, ports, probe, notifier, roles, operations };
}
