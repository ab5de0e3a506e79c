import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { confirmAction, withSpinner } from "./helpers";

interface ConfirmOptions {
  yes?: boolean;
}

export function registerReinstallCommand(program: Command): void {
  program
    .command("reinstall <id>")
    .description("Wipe an instance and recreate it from the template image")
    .option("-y, --yes", "Skip interactive confirmation")
    .action(async (id: string, options: ConfirmOptions, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireInstance(ctx.actor, id, "owner");

      const ticket = ctx.confirmations.request("reinstall", id, () => ctx.operations.reinstall(id));
      const proceed = await confirmAction(`Reinstall '${id}'? All data on it will be lost.`, options.yes);
      if (!proceed) {
        ctx.confirmations.cancel(ticket.token);
        console.log("Cancelled.");
        return;
      }

      await withSpinner(`Reinstalling '${id}'...`, () => `Reinstalled '${id}'.`, () =>
        ctx.confirmations.confirm(ticket.token)
      );
    });
}

export function registerStopAllCommand(program: Command): void {
  program
    .command("stop-all")
    .description("Force-stop every instance on the host")
    .option("-y, --yes", "Skip interactive confirmation")
    .action(async (options: ConfirmOptions, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);

      const ticket = ctx.confirmations.request("stop-all", "host", () => ctx.operations.stopAll());
      const proceed = await confirmAction("Force-stop every instance on this host?", options.yes);
      if (!proceed) {
        ctx.confirmations.cancel(ticket.token);
        console.log("Cancelled.");
        return;
      }

      await withSpinner("Stopping all instances...", () => "Stop-all issued.", () =>
        ctx.confirmations.confirm(ticket.token)
      );
      const running = ctx.store.listInstances().filter(({ record }) => record.status === "running").length;
      console.log(`Running instances left in the record: ${running}`);
    });
}
