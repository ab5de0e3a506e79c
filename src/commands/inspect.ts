import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { formatConfig } from "../lib/utils";
import { parseCount, withSpinner } from "./helpers";

interface LogsOptions {
  lines?: string;
}

export function registerInspectCommands(program: Command): void {
  program
    .command("info <id>")
    .description("Show the stored record of an instance")
    .action(async (id: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      const { ownerId, record } = ctx.access.requireInstance(ctx.actor, id, "view");

      console.log(`ID: ${record.id}`);
      console.log(`Owner: ${ownerId}`);
      console.log(`Status: ${record.status}`);
      console.log(`Configuration: ${record.config}`);
      console.log(`Created: ${record.createdAt}`);
      console.log(`Shared with: ${record.sharedWith.length > 0 ? record.sharedWith.join(", ") : "-"}`);
      console.log(`Suspensions: ${record.suspensionHistory.length}`);
      const forwards = Object.values(ctx.store.snapshot().ports.forwards)
        .flat()
        .filter((forward) => forward.instanceId === record.id);
      for (const forward of forwards) {
        console.log(`Forward: ${forward.hostPort} -> ${forward.internalPort}`);
      }
    });

  program
    .command("stats <id>")
    .description("Show live usage of an instance")
    .action(async (id: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireInstance(ctx.actor, id, "view");

      const stats = await withSpinner(`Collecting stats for '${id}'...`, () => `Stats for '${id}':`, () =>
        ctx.operations.stats(id)
      );
      console.log(`Status: ${stats.status}`);
      console.log(`CPU: ${stats.cpu}`);
      console.log(`Memory: ${stats.memory}`);
      console.log(`Disk: ${stats.disk}`);
    });

  program
    .command("processes <id>")
    .description("List processes running inside an instance")
    .action(async (id: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      const output = await ctx.operations.processes(id);
      console.log(output);
    });

  program
    .command("logs <id>")
    .description("Show the latest system journal lines of an instance")
    .option("-n, --lines <count>", "Number of lines to show")
    .action(async (id: string, options: LogsOptions, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      const lines = options.lines === undefined ? undefined : parseCount("Lines", options.lines);
      console.log(await ctx.operations.logs(id, lines));
    });

  program
    .command("fleet")
    .description("Summarize users, instances and allocated resources on this host")
    .action(async (_options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      const summary = ctx.operations.fleetSummary();

      console.log(`Users: ${summary.users}`);
      console.log(`Admins: ${summary.admins}`);
      console.log(
        `Instances: ${summary.instances} (${summary.running} running, ${summary.stopped} stopped, ` +
          `${summary.suspended} suspended)`
      );
      const { ramGb, cpuCores, diskGb } = summary.resources;
      console.log(`Allocated: ${formatConfig(ramGb, cpuCores, diskGb)}`);
    });
}
