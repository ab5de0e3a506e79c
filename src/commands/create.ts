import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { parseCount, withSpinner } from "./helpers";

export function registerCreateCommand(program: Command): void {
  program
    .command("create <owner> <ram> <cpu> <disk>")
    .description("Create and start an instance for a user (RAM and disk in GB)")
    .action(async (owner: string, ram: string, cpu: string, disk: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);

      const resources = {
        ramGb: parseCount("RAM", ram),
        cpuCores: parseCount("CPU", cpu),
        diskGb: parseCount("Disk", disk)
      };

      const record = await withSpinner(
        `Creating instance for '${owner}'...`,
        (created) => `Created '${created.id}'.`,
        () => ctx.operations.create(owner, resources)
      );
      console.log(`Owner: ${owner}`);
      console.log(`Configuration: ${record.config}`);
      console.log(`Created: ${record.createdAt}`);
    });
}
