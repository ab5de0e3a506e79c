import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { renderTable } from "../lib/table";
import { withSpinner } from "./helpers";

interface SuspendOptions {
  reason: string;
}

export function registerSuspendCommands(program: Command): void {
  program
    .command("suspend <id>")
    .description("Suspend an instance and record why")
    .option("--reason <text>", "Reason recorded in the suspension log", "Suspended by an admin")
    .action(async (id: string, options: SuspendOptions, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      await withSpinner(`Suspending '${id}'...`, () => `Suspended '${id}'.`, () =>
        ctx.operations.suspend(id, options.reason, ctx.actor)
      );
    });

  program
    .command("unsuspend <id>")
    .description("Lift a suspension and start the instance")
    .action(async (id: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      await withSpinner(`Unsuspending '${id}'...`, () => `Unsuspended '${id}'.`, () =>
        ctx.operations.unsuspend(id, ctx.actor)
      );
    });

  program
    .command("suspension-logs [id]")
    .description("Show suspension history, newest first")
    .action(async (id: string | undefined, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      if (id) {
        ctx.access.requireInstance(ctx.actor, id, "view");
      } else {
        ctx.access.requireAdmin(ctx.actor);
      }

      const log = ctx.operations.suspensionLog(id);
      if (log.total === 0) {
        console.log("No suspensions recorded.");
        return;
      }

      const rows = log.entries.map((entry) => [entry.time, entry.instanceId, entry.actor, entry.reason]);
      console.log(renderTable(["TIME", "INSTANCE", "ACTOR", { header: "REASON", maxWidth: 60 }], rows));
      if (log.entries.length < log.total) {
        console.log(`Showing ${log.entries.length} of ${log.total} entries.`);
      }
    });
}
