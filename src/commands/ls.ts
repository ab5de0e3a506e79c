import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { ValidationError } from "../lib/errors";
import { isInstanceStatus } from "../lib/status";
import { renderTable } from "../lib/table";

interface LsOptions {
  owner?: string;
  status?: string;
}

export function registerLsCommand(program: Command): void {
  program
    .command("ls")
    .description("List instances you can see")
    .option("--owner <userId>", "Only show instances of this owner")
    .option("--status <status>", "Only show instances with this status")
    .action(async (options: LsOptions, command: Command) => {
      const ctx = await getCommandContext(command);
      if (options.status !== undefined && !isInstanceStatus(options.status)) {
        throw new ValidationError(`Unknown status '${options.status}'.`, {
          hint: "Use running, stopped or suspended."
        });
      }

      const isAdmin = ctx.access.isAdmin(ctx.actor);
      const visible = ctx.store.listInstances().filter(({ ownerId, record }) => {
        if (!isAdmin && ownerId !== ctx.actor && !record.sharedWith.includes(ctx.actor)) {
          return false;
        }
        if (options.owner && ownerId !== options.owner) {
          return false;
        }
        return options.status === undefined || record.status === options.status;
      });

      if (visible.length === 0) {
        console.log("No instances found.");
        return;
      }

      const rows = visible.map(({ ownerId, record }) => [
        record.id,
        ownerId,
        record.status,
        record.config,
        record.sharedWith.length > 0 ? record.sharedWith.join(",") : "-"
      ]);
      console.log(renderTable(["ID", "OWNER", "STATUS", "CONFIG", "SHARED WITH"], rows));
    });
}
