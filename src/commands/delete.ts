import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { confirmAction, withSpinner } from "./helpers";

interface DeleteOptions {
  yes?: boolean;
  reason: string;
}

export function registerDeleteCommand(program: Command): void {
  program
    .command("delete <id>")
    .description("Permanently delete an instance and its forwards")
    .option("-y, --yes", "Skip interactive confirmation")
    .option("--reason <text>", "Reason sent to the owner", "No reason provided")
    .action(async (id: string, options: DeleteOptions, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      const { ownerId } = ctx.store.requireInstance(id);

      const proceed = await confirmAction(`Delete '${id}' owned by '${ownerId}' permanently?`, options.yes);
      if (!proceed) {
        console.log("Cancelled.");
        return;
      }

      await withSpinner(`Deleting '${id}'...`, () => `Deleted '${id}'.`, () =>
        ctx.operations.delete(id, options.reason, ctx.actor)
      );
    });
}
