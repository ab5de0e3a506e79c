import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { readHostGuardToggle, runGuardianDaemon } from "../services/daemon";
import { HostGuardian } from "../services/host-guardian";
import { InstanceGuardian } from "../services/instance-guardian";

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Run the host and instance guardians in the foreground")
    .action(async (_options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      const { config, store } = ctx;
      const reload = async () => {
        await store.load();
      };

      const hostGuardian = new HostGuardian(ctx.hostSampler, ctx.operations, {
        cpuThreshold: config.cpuThreshold,
        intervalS: config.hostCheckIntervalS,
        enabled: config.hostGuardEnabled,
        beforeTick: reload,
        readToggle: () => readHostGuardToggle(config.home)
      });
      const instanceGuardian = new InstanceGuardian(store, ctx.probe, ctx.operations, {
        cpuThreshold: config.cpuThreshold,
        ramThreshold: config.ramThreshold,
        intervalS: config.instanceCheckIntervalS,
        beforeTick: reload
      });

      await runGuardianDaemon({ home: config.home, hostGuardian, instanceGuardian });
    });
}
