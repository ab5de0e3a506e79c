import { StateConflictError } from "./errors";
import type { InstanceStatus } from "./types";

export const INSTANCE_STATUSES: readonly InstanceStatus[] = ["running", "stopped", "suspended"];

// Leaving "suspended" is only possible through an explicit unsuspend.
const ALLOWED_TRANSITIONS: Record<InstanceStatus, readonly InstanceStatus[]> = {
  running: ["stopped", "suspended"],
  stopped: ["running"],
  suspended: []
};

export type TransitionCause = "unsuspend";

export function isInstanceStatus(value: unknown): value is InstanceStatus {
  return typeof value === "string" && INSTANCE_STATUSES.some((status) => status === value);
}

export function canTransition(from: InstanceStatus, to: InstanceStatus, cause?: TransitionCause): boolean {
  if (from === to) {
    return true;
  }
  if (from === "suspended") {
    return cause === "unsuspend" && to === "running";
  }
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isNoopTransition(from: InstanceStatus, to: InstanceStatus): boolean {
  return from === to;
}

export function assertTransition(id: string, from: InstanceStatus, to: InstanceStatus, cause?: TransitionCause): void {
  if (canTransition(from, to, cause)) {
    return;
  }
  throw new StateConflictError(`Instance '${id}' cannot go from ${from} to ${to}.`, {
    hint: transitionHint(from)
  });
}

function transitionHint(from: InstanceStatus): string | undefined {
  if (from === "suspended") {
    return "Unsuspend the instance first.";
  }
  if (from === "stopped") {
    return "Start the instance first.";
  }
  return undefined;
}
