import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { findLiveDaemon, setHostGuardToggle } from "../services/daemon";

export function registerHostGuardCommand(program: Command): void {
  const hostGuard = program.command("host-guard").description("Inspect or toggle the host CPU guard");

  hostGuard
    .command("status")
    .description("Show whether the host guard is active")
    .action(async (_options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      const daemon = await findLiveDaemon(ctx.config.home);
      if (!daemon) {
        console.log(chalk.yellow("Guardian daemon is not running."));
        return;
      }
      const state = daemon.hostGuardEnabled ? chalk.green("enabled") : chalk.yellow("disabled");
      console.log(`Host guard is ${state} (daemon pid ${daemon.pid}, threshold ${ctx.config.cpuThreshold}% CPU).`);
    });

  hostGuard
    .command("enable")
    .description("Enable the host guard in the running daemon")
    .action(async (_options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      const daemon = await setHostGuardToggle(ctx.config.home, true);
      console.log(`Host guard enabled for daemon pid ${daemon.pid}; it applies at the next host check.`);
    });

  hostGuard
    .command("disable")
    .description("Disable the host guard in the running daemon")
    .action(async (_options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      const daemon = await setHostGuardToggle(ctx.config.home, false);
      console.log(`Host guard disabled for daemon pid ${daemon.pid}; it applies at the next host check.`);
    });
}
