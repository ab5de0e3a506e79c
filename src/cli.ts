#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { registerAdminCommand } from "./commands/admin";
import { registerCopyCommands } from "./commands/clone";
import { registerCreateCommand } from "./commands/create";
import { registerDeleteCommand } from "./commands/delete";
import { registerHostGuardCommand } from "./commands/host-guard";
import { registerInspectCommands } from "./commands/inspect";
import { registerLsCommand } from "./commands/ls";
import { registerPortsCommand } from "./commands/ports";
import { registerPowerCommands } from "./commands/power";
import { registerReinstallCommand, registerStopAllCommand } from "./commands/reinstall";
import { registerResourceCommands } from "./commands/resources";
import { registerServeCommand } from "./commands/serve";
import { registerShareCommands } from "./commands/share";
import { registerSuspendCommands } from "./commands/suspend";
import { CLI_NAME, VERSION } from "./lib/constants";
import { describeError, renderWardenError, toWardenError } from "./lib/errors";
import { logger } from "./lib/logger";

const program = new Command();
const normalizedArgv = process.argv.map((arg) => (arg === "-v" ? "--version" : arg));

program
  .name(CLI_NAME)
  .description("Instance lifecycle and resource guard for LXD hosts")
  .version(VERSION, "--version", "output the version number")
  .option("--as <userId>", "act as this user id (defaults to WARDEN_ACTOR or the main admin)");

registerCreateCommand(program);
registerLsCommand(program);
registerInspectCommands(program);
registerPowerCommands(program);
registerSuspendCommands(program);
registerResourceCommands(program);
registerReinstallCommand(program);
registerCopyCommands(program);
registerDeleteCommand(program);
registerStopAllCommand(program);
registerShareCommands(program);
registerPortsCommand(program);
registerAdminCommand(program);
registerHostGuardCommand(program);
registerServeCommand(program);

program.parseAsync(normalizedArgv).catch((error: unknown) => {
  const wardenError = toWardenError(error);
  logger.debug("Command failed", { error: describeError(wardenError) });
  console.error(chalk.red(renderWardenError(wardenError)));
  process.exitCode = wardenError.exitCode;
});
