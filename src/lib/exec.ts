import { spawn } from "node:child_process";

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  allowNonZeroExit?: boolean;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<RunResult>;

export class CommandError extends Error {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;

  constructor(command: string, exitCode: number, stdout: string, stderr: string) {
    super(`Command failed (${exitCode}): ${command}`);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export class CommandTimeoutError extends Error {
  command: string;
  timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${formatSeconds(timeoutMs)}s`);
    this.name = "CommandTimeoutError";
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

export class CommandLineSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandLineSyntaxError";
  }
}

export async function runCommand(command: string, args: string[] = [], options: RunOptions = {}): Promise<RunResult> {
  const timeoutMs = options.timeoutMs ?? 60_000;
  const env = options.env ? { ...process.env, ...options.env } : process.env;

  return await new Promise<RunResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env,
      stdio: ["ignore", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const timeoutHandle = setTimeout(() => {
      child.kill("SIGTERM");
      if (!settled) {
        settled = true;
        reject(new CommandTimeoutError(formatCommand(command, args), timeoutMs));
      }
    }, timeoutMs);

    child.stdout?.on("data", (chunk: Buffer | string) => {
      stdout += chunk.toString();
    });

    child.stderr?.on("data", (chunk: Buffer | string) => {
      stderr += chunk.toString();
    });

    child.on("error", (error) => {
      clearTimeout(timeoutHandle);
      if (!settled) {
        settled = true;
        reject(error);
      }
    });

    child.on("close", (code) => {
      clearTimeout(timeoutHandle);
      const exitCode = typeof code === "number" ? code : 1;
      if (exitCode !== 0 && !options.allowNonZeroExit) {
        if (!settled) {
          settled = true;
          reject(new CommandError(formatCommand(command, args), exitCode, stdout.trim(), stderr.trim()));
        }
        return;
      }
      if (!settled) {
        settled = true;
        resolve({ stdout: stdout.trim(), stderr: stderr.trim(), exitCode });
      }
    });
  });
}

// Whitespace splits tokens; single quotes are literal, double quotes honor backslash escapes.
export function parseCommandLine(line: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quote: "'" | "\"" | null = null;

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];

    if (quote === "'") {
      if (char === "'") {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (char === "\\") {
      const next = line[index + 1];
      if (next === undefined) {
        throw new CommandLineSyntaxError("Command line ends with a dangling escape.");
      }
      current += next;
      inToken = true;
      index += 1;
      continue;
    }

    if (quote === "\"") {
      if (char === "\"") {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (char === "'" || char === "\"") {
      quote = char;
      inToken = true;
      continue;
    }

    if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
      continue;
    }

    current += char;
    inToken = true;
  }

  if (quote) {
    throw new CommandLineSyntaxError(`Unterminated ${quote === "'" ? "single" : "double"} quote in command line.`);
  }
  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? String(seconds) : seconds.toFixed(1);
}
