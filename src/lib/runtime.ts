import fs from "node:fs";
import { TOOL_BINARY_CANDIDATES, TOOL_TOKEN } from "./constants";
import { ValidationError } from "./errors";
import { runCommand } from "./exec";

export async function resolveToolBinary(explicit?: string): Promise<string | null> {
  if (explicit) {
    return fs.existsSync(explicit) ? explicit : null;
  }

  for (const candidate of TOOL_BINARY_CANDIDATES) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  const whichResult = await runCommand("which", [TOOL_TOKEN], { allowNonZeroExit: true, timeoutMs: 5000 });
  if (whichResult.exitCode === 0 && whichResult.stdout) {
    const resolved = whichResult.stdout.split("\n")[0].trim();
    if (resolved) {
      return resolved;
    }
  }

  return null;
}

export async function requireToolBinary(explicit?: string): Promise<string> {
  const binary = await resolveToolBinary(explicit);
  if (binary) {
    return binary;
  }

  throw new ValidationError(
    explicit ? `Management tool not found at ${explicit}.` : `Management tool '${TOOL_TOKEN}' was not found.`,
    { hint: "Install LXD or point WARDEN_TOOL_BIN at the lxc binary." }
  );
}
