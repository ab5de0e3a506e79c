import test from "node:test";
import assert from "node:assert/strict";
import { ExecutionError, ValidationError } from "../src/lib/errors";
import { CommandError, CommandTimeoutError, type CommandRunner, type RunOptions, type RunResult } from "../src/lib/exec";
import { CommandExecutor } from "../src/lib/executor";
import { silenceLogs } from "./helpers";

silenceLogs();

interface RunnerCall {
  command: string;
  args: string[];
  options?: RunOptions;
}

function scriptedRunner(outcome: RunResult | Error): { runner: CommandRunner; calls: RunnerCall[] } {
  const calls: RunnerCall[] = [];
  const runner: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  };
  return { runner, calls };
}

const TOOL = "/opt/lxd/bin/lxc";

test("execute substitutes the tool path and returns the success marker on empty output", async () => {
  const { runner, calls } = scriptedRunner({ stdout: "", stderr: "", exitCode: 0 });
  const executor = new CommandExecutor({ toolPath: TOOL, defaultTimeoutMs: 120_000, runner });

  const output = await executor.execute("lxc start web-1");

  assert.equal(output, "ok");
  assert.deepEqual(calls, [{ command: TOOL, args: ["start", "web-1"], options: { timeoutMs: 120_000 } }]);
});

test("execute returns trimmed stdout", async () => {
  const { runner } = scriptedRunner({ stdout: "  Status: RUNNING \n", stderr: "", exitCode: 0 });
  const executor = new CommandExecutor({ toolPath: TOOL, defaultTimeoutMs: 1000, runner });

  assert.equal(await executor.execute(["lxc", "info", "web-1"]), "Status: RUNNING");
});

test("execute leaves other programs alone and honors a per-call timeout", async () => {
  const { runner, calls } = scriptedRunner({ stdout: "x", stderr: "", exitCode: 0 });
  const executor = new CommandExecutor({ toolPath: TOOL, defaultTimeoutMs: 120_000, runner });

  await executor.execute(["top", "-bn1"], { timeoutMs: 5000 });

  assert.deepEqual(calls, [{ command: "top", args: ["-bn1"], options: { timeoutMs: 5000 } }]);
});

test("non-zero exit becomes an ExecutionError carrying stderr", async () => {
  const { runner } = scriptedRunner(new CommandError("lxc start web-1", 1, "", "Error: Instance not found"));
  const executor = new CommandExecutor({ toolPath: TOOL, defaultTimeoutMs: 1000, runner });

  await assert.rejects(
    executor.execute("lxc start web-1"),
    (error: unknown) => error instanceof ExecutionError && error.message === "Error: Instance not found"
  );
});

test("non-zero exit without stderr uses a fallback message", async () => {
  const { runner } = scriptedRunner(new CommandError("lxc start web-1", 1, "partial", ""));
  const executor = new CommandExecutor({ toolPath: TOOL, defaultTimeoutMs: 1000, runner });

  await assert.rejects(
    executor.execute("lxc start web-1"),
    (error: unknown) => error instanceof ExecutionError
      && error.message === "Command failed with no error output"
      && error.detail === "partial"
  );
});

test("timeouts become ExecutionErrors", async () => {
  const { runner } = scriptedRunner(new CommandTimeoutError("lxc start web-1", 120_000));
  const executor = new CommandExecutor({ toolPath: TOOL, defaultTimeoutMs: 120_000, runner });

  await assert.rejects(
    executor.execute("lxc start web-1"),
    (error: unknown) => error instanceof ExecutionError && error.message === "Command timed out after 120s"
  );
});

test("spawn failures become ExecutionErrors with the system message", async () => {
  const { runner } = scriptedRunner(new Error("spawn /opt/lxd/bin/lxc ENOENT"));
  const executor = new CommandExecutor({ toolPath: TOOL, defaultTimeoutMs: 1000, runner });

  await assert.rejects(
    executor.execute("lxc list"),
    (error: unknown) => error instanceof ExecutionError && error.message === "spawn /opt/lxd/bin/lxc ENOENT"
  );
});

test("empty and malformed command lines are validation errors", async () => {
  const { runner, calls } = scriptedRunner({ stdout: "", stderr: "", exitCode: 0 });
  const executor = new CommandExecutor({ toolPath: TOOL, defaultTimeoutMs: 1000, runner });

  await assert.rejects(
    executor.execute("   "),
    (error: unknown) => error instanceof ValidationError && error.message === "Command line is empty."
  );
  await assert.rejects(
    executor.execute("lxc exec 'web-1"),
    (error: unknown) => error instanceof ValidationError
      && error.message === "Unterminated single quote in command line."
  );
  assert.equal(calls.length, 0);
});
