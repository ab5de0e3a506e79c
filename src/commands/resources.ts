import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import type { ResourceChanges } from "../lib/lifecycle";
import { parseOptionalCount, withSpinner } from "./helpers";

interface ResourceOptions {
  ram?: string;
  cpu?: string;
  disk?: string;
}

function toChanges(options: ResourceOptions): ResourceChanges {
  return {
    ramGb: parseOptionalCount("RAM", options.ram),
    cpuCores: parseOptionalCount("CPU", options.cpu),
    diskGb: parseOptionalCount("Disk", options.disk)
  };
}

export function registerResourceCommands(program: Command): void {
  program
    .command("resize <id>")
    .description("Set absolute resources; a running instance is restarted")
    .option("--ram <gb>", "RAM in GB")
    .option("--cpu <cores>", "CPU cores")
    .option("--disk <gb>", "Disk in GB")
    .action(async (id: string, options: ResourceOptions, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      const changes = toChanges(options);
      await withSpinner(`Resizing '${id}'...`, (record) => `Resized '${id}': ${record.config}.`, () =>
        ctx.operations.resize(id, changes)
      );
    });

  program
    .command("add-resources <id>")
    .description("Add resources on top of the current allocation")
    .option("--ram <gb>", "Extra RAM in GB")
    .option("--cpu <cores>", "Extra CPU cores")
    .option("--disk <gb>", "Extra disk in GB")
    .action(async (id: string, options: ResourceOptions, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      const deltas = toChanges(options);
      await withSpinner(`Adding resources to '${id}'...`, (record) => `Updated '${id}': ${record.config}.`, () =>
        ctx.operations.addResources(id, deltas)
      );
    });
}
