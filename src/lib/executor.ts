import { SUCCESS_MARKER, TOOL_TOKEN } from "./constants";
import { ExecutionError, ValidationError } from "./errors";
import {
  CommandError,
  CommandLineSyntaxError,
  CommandTimeoutError,
  formatCommand,
  parseCommandLine,
  runCommand,
  type CommandRunner
} from "./exec";
import { logger } from "./logger";

export type CommandLine = string | readonly string[];

export interface ExecuteOptions {
  timeoutMs?: number;
}

export interface ToolExecutor {
  execute(commandLine: CommandLine, options?: ExecuteOptions): Promise<string>;
}

export interface CommandExecutorOptions {
  toolPath: string;
  defaultTimeoutMs: number;
  runner?: CommandRunner;
}

export class CommandExecutor implements ToolExecutor {
  private readonly toolPath: string;
  private readonly defaultTimeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: CommandExecutorOptions) {
    this.toolPath = options.toolPath;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.runner = options.runner ?? runCommand;
  }

  async execute(commandLine: CommandLine, options: ExecuteOptions = {}): Promise<string> {
    const argv = toArgv(commandLine);
    const [head, ...args] = argv;
    const command = head === TOOL_TOKEN ? this.toolPath : head;
    const printable = formatCommand(head, args);
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    logger.debug("Executing command", { command: printable, timeoutMs });
    try {
      const result = await this.runner(command, args, { timeoutMs });
      return result.stdout.trim() || SUCCESS_MARKER;
    } catch (error) {
      const failure = toExecutionError(error);
      logger.error("Command failed", { command: printable, error: failure.message });
      throw failure;
    }
  }
}

export function toArgv(commandLine: CommandLine): string[] {
  let argv: string[];
  if (typeof commandLine === "string") {
    try {
      argv = parseCommandLine(commandLine);
    } catch (error) {
      if (error instanceof CommandLineSyntaxError) {
        throw new ValidationError(error.message);
      }
      throw error;
    }
  } else {
    argv = [...commandLine];
  }

  if (argv.length === 0 || !argv[0]) {
    throw new ValidationError("Command line is empty.");
  }
  return argv;
}

function toExecutionError(error: unknown): ExecutionError {
  if (error instanceof ExecutionError) {
    return error;
  }
  if (error instanceof CommandTimeoutError) {
    return new ExecutionError(error.message);
  }
  if (error instanceof CommandError) {
    return new ExecutionError(error.stderr || "Command failed with no error output", {
      detail: error.stdout || undefined
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message);
  }
  return new ExecutionError(String(error));
}
