import inquirer from "inquirer";
import ora from "ora";
import { ValidationError } from "../lib/errors";

export async function withSpinner<T>(label: string, done: (result: T) => string, task: () => Promise<T>): Promise<T> {
  const spinner = ora(label).start();
  try {
    const result = await task();
    spinner.succeed(done(result));
    return result;
  } catch (error) {
    spinner.fail(`${label.replace(/\.+$/, "")} failed.`);
    throw error;
  }
}

export async function confirmAction(message: string, yes: boolean | undefined): Promise<boolean> {
  if (yes) {
    return true;
  }
  if (!process.stdout.isTTY) {
    throw new ValidationError("Confirmation requires a TTY. Re-run with --yes.");
  }

  const answer = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: "confirm",
      name: "proceed",
      message,
      default: false
    }
  ]);
  return answer.proceed;
}

export function parseCount(label: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${label} must be a positive integer, got '${raw}'.`);
  }
  return value;
}

export function parseOptionalCount(label: string, raw: string | undefined): number | undefined {
  return raw === undefined ? undefined : parseCount(label, raw);
}
