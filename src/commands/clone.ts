import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { withSpinner } from "./helpers";

export function registerCopyCommands(program: Command): void {
  program
    .command("clone <id> [newId]")
    .description("Copy an instance under the same owner and start the copy")
    .action(async (id: string, newId: string | undefined, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      await withSpinner(`Cloning '${id}'...`, (cloned) => `Cloned '${id}' to '${cloned.id}'.`, () =>
        ctx.operations.clone(id, newId)
      );
    });

  program
    .command("migrate <id> <pool>")
    .description("Move an instance to another storage pool")
    .action(async (id: string, pool: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      await withSpinner(`Migrating '${id}' to '${pool}'...`, () => `Migrated '${id}' to '${pool}'.`, () =>
        ctx.operations.migrate(id, pool)
      );
    });
}
