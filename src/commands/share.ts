import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";

export function registerShareCommands(program: Command): void {
  program
    .command("share <id> <userId>")
    .description("Let another user start, stop and inspect your instance")
    .action(async (id: string, userId: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireInstance(ctx.actor, id, "owner");
      const record = await ctx.operations.share(id, userId);
      console.log(`Shared '${id}' with '${userId}'. Now shared with: ${record.sharedWith.join(", ")}`);
    });

  program
    .command("unshare <id> <userId>")
    .description("Revoke a user's access to your instance")
    .action(async (id: string, userId: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireInstance(ctx.actor, id, "owner");
      await ctx.operations.unshare(id, userId);
      console.log(`Removed '${userId}' from '${id}'.`);
    });
}
