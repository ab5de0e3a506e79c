import type { Command } from "commander";
import { AccessControl } from "./access";
import { loadConfig, type WardenConfig } from "./config";
import { ConfirmationBroker } from "./confirmations";
import { CommandExecutor, type ToolExecutor } from "./executor";
import { LifecycleOperations } from "./lifecycle";
import { configureLogger } from "./logger";
import { LogNotifier, LogRoleGrants, type Notifier, type RoleGrants } from "./notifier";
import { PortAllocator } from "./ports";
import { HostCpuSampler, InstanceProbe } from "./probes";
import { requireToolBinary } from "./runtime";
import { InstanceStore } from "./store";

export interface Engine {
  config: WardenConfig;
  store: InstanceStore;
  executor: ToolExecutor;
  ports: PortAllocator;
  probe: InstanceProbe;
  hostSampler: HostCpuSampler;
  operations: LifecycleOperations;
  access: AccessControl;
  confirmations: ConfirmationBroker;
}

export interface EngineDependencies {
  executor: ToolExecutor;
  notifier?: Notifier;
  roles?: RoleGrants;
  now?: () => Date;
}

export interface CommandContext extends Engine {
  actor: string;
}

interface GlobalOptions {
  as?: string;
}

export function createEngine(config: WardenConfig, deps: EngineDependencies): Engine {
  const store = new InstanceStore({ directory: config.home, mainAdminId: config.mainAdminId });
  const ports = new PortAllocator(store, deps.executor, { start: config.portRangeStart, end: config.portRangeEnd });
  const probe = new InstanceProbe(deps.executor);
  const operations = new LifecycleOperations({
    store,
    executor: deps.executor,
    ports,
    probe,
    notifier: deps.notifier ?? new LogNotifier(),
    roles: deps.roles ?? new LogRoleGrants(),
    image: config.image,
    storagePool: config.storagePool,
    now: deps.now
  });

  return {
    config,
    store,
    executor: deps.executor,
    ports,
    probe,
    hostSampler: new HostCpuSampler(deps.executor),
    operations,
    access: new AccessControl(store),
    confirmations: new ConfirmationBroker()
  };
}

export async function getCommandContext(command: Command): Promise<CommandContext> {
  const config = loadConfig();
  configureLogger({ level: config.logLevel });

  const toolPath = await requireToolBinary(config.toolBin);
  const executor = new CommandExecutor({ toolPath, defaultTimeoutMs: config.commandTimeoutS * 1000 });
  const engine = createEngine(config, { executor });
  await engine.store.load();

  const { as } = command.optsWithGlobals<GlobalOptions>();
  return { ...engine, actor: as ?? config.actorId ?? config.mainAdminId };
}
