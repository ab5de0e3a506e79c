import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { withSpinner } from "./helpers";

export function registerPowerCommands(program: Command): void {
  program
    .command("start <id>")
    .description("Start a stopped instance")
    .action(async (id: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      const { record } = ctx.access.requireInstance(ctx.actor, id, "operate");
      if (record.status === "running") {
        console.log(`Instance '${id}' is already running.`);
        return;
      }
      await withSpinner(`Starting '${id}'...`, () => `Started '${id}'.`, () => ctx.operations.start(id));
    });

  program
    .command("stop <id>")
    .description("Stop a running instance")
    .action(async (id: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      const { record } = ctx.access.requireInstance(ctx.actor, id, "operate");
      if (record.status === "stopped") {
        console.log(`Instance '${id}' is already stopped.`);
        return;
      }
      await withSpinner(`Stopping '${id}'...`, () => `Stopped '${id}'.`, () => ctx.operations.stop(id));
    });

  program
    .command("restart <id>")
    .description("Restart a running instance")
    .action(async (id: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireInstance(ctx.actor, id, "operate");
      await withSpinner(`Restarting '${id}'...`, () => `Restarted '${id}'.`, () => ctx.operations.restart(id));
    });
}
