import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { STATE_FILES } from "../lib/constants";
import { errorMessage, NotFoundError, StateConflictError } from "../lib/errors";
import { logger } from "../lib/logger";
import type { HostGuardian } from "./host-guardian";
import type { InstanceGuardian } from "./instance-guardian";

const daemonStateSchema = z.object({
  pid: z.number().int().positive(),
  hostGuardEnabled: z.boolean(),
  startedAt: z.string()
});

export type DaemonState = z.infer<typeof daemonStateSchema>;

export interface GuardianDaemonOptions {
  home: string;
  hostGuardian: HostGuardian;
  instanceGuardian: InstanceGuardian;
}

export function daemonStatePath(home: string): string {
  return path.join(home, STATE_FILES.daemon);
}

export async function readDaemonState(home: string): Promise<DaemonState | undefined> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(daemonStatePath(home), "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return undefined;
    }
    throw error;
  }

  try {
    const parsed = daemonStateSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : undefined;
  } catch (error) {
    logger.warn("Ignoring unreadable daemon state", { error: errorMessage(error) });
    return undefined;
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

export async function findLiveDaemon(home: string): Promise<DaemonState | undefined> {
  const state = await readDaemonState(home);
  if (!state || !isProcessAlive(state.pid)) {
    return undefined;
  }
  return state;
}

/** Records a new host guard toggle for the running daemon; it applies at the daemon's next host check. */
export async function setHostGuardToggle(home: string, enabled: boolean): Promise<DaemonState> {
  const state = await findLiveDaemon(home);
  if (!state) {
    throw new NotFoundError("No guardian daemon is running.", { hint: "Start it with `warden serve`." });
  }
  const next = { ...state, hostGuardEnabled: enabled };
  await writeDaemonState(home, next);
  return next;
}

export async function readHostGuardToggle(home: string): Promise<boolean | undefined> {
  const state = await readDaemonState(home);
  return state?.hostGuardEnabled;
}

async function writeDaemonState(home: string, state: DaemonState): Promise<void> {
  const target = daemonStatePath(home);
  const tempPath = `${target}.tmp.${process.pid}.${Date.now()}`;
  await fs.promises.mkdir(home, { recursive: true });
  await fs.promises.writeFile(tempPath, `${JSON.stringify(state, null, 2)}\n`, "utf8");
  await fs.promises.rename(tempPath, target);
}

async function clearDaemonStateIfOwned(home: string): Promise<void> {
  const state = await readDaemonState(home);
  if (state?.pid !== process.pid) {
    return;
  }
  try {
    await fs.promises.unlink(daemonStatePath(home));
  } catch (error) {
    logger.warn("Failed to remove daemon state", { error: errorMessage(error) });
  }
}

/**
 * Runs both guardians until the process receives SIGINT, SIGTERM or SIGHUP.
 * The host guard toggle lives in the daemon state file, see `setHostGuardToggle`.
 */
export async function runGuardianDaemon(options: GuardianDaemonOptions): Promise<void> {
  const { home, hostGuardian, instanceGuardian } = options;

  const existing = await findLiveDaemon(home);
  if (existing && existing.pid !== process.pid) {
    throw new StateConflictError(`A guardian daemon is already running (pid ${existing.pid}).`);
  }

  const state: DaemonState = {
    pid: process.pid,
    hostGuardEnabled: hostGuardian.isEnabled(),
    startedAt: new Date().toISOString()
  };
  await writeDaemonState(home, state);

  hostGuardian.start();
  instanceGuardian.start();
  logger.info("Guardian daemon started", { pid: process.pid, hostGuardEnabled: state.hostGuardEnabled });

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info("Guardian daemon shutting down", { signal });
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      process.off("SIGHUP", shutdown);
      hostGuardian.stop();
      instanceGuardian.stop();
      resolve();
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
    process.on("SIGHUP", shutdown);
  });

  await clearDaemonStateIfOwned(home);
}
