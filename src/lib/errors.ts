import { CommandError, CommandTimeoutError } from "./exec";

export type WardenErrorKind =
  | "execution"
  | "validation"
  | "quota_exceeded"
  | "not_found"
  | "state_conflict"
  | "persistence"
  | "permission"
  | "internal";

interface WardenErrorOptions {
  hint?: string;
  detail?: string;
  exitCode?: number;
}

export interface ErrorDescription {
  kind: WardenErrorKind;
  message: string;
  detail?: string;
}

export class WardenError extends Error {
  readonly kind: WardenErrorKind;
  readonly hint?: string;
  readonly detail?: string;
  readonly exitCode: number;

  constructor(kind: WardenErrorKind, message: string, options: WardenErrorOptions = {}) {
    super(message);
    this.name = "WardenError";
    this.kind = kind;
    this.hint = options.hint;
    this.detail = options.detail;
    this.exitCode = options.exitCode ?? 1;
  }
}

export class ExecutionError extends WardenError {
  constructor(message: string, options: WardenErrorOptions = {}) {
    super("execution", message, options);
    this.name = "ExecutionError";
  }
}

export class ValidationError extends WardenError {
  constructor(message: string, options: WardenErrorOptions = {}, kind: "validation" | "quota_exceeded" = "validation") {
    super(kind, message, options);
    this.name = "ValidationError";
  }
}

export class QuotaExceededError extends ValidationError {
  readonly used: number;
  readonly slots: number;

  constructor(user: string, used: number, slots: number) {
    super(
      `User '${user}' has used ${used} of ${slots} port slots.`,
      { hint: "Release a forward or ask an admin for more slots." },
      "quota_exceeded"
    );
    this.name = "QuotaExceededError";
    this.used = used;
    this.slots = slots;
  }
}

export class NotFoundError extends WardenError {
  constructor(message: string, options: WardenErrorOptions = {}) {
    super("not_found", message, options);
    this.name = "NotFoundError";
  }
}

export class StateConflictError extends WardenError {
  constructor(message: string, options: WardenErrorOptions = {}) {
    super("state_conflict", message, options);
    this.name = "StateConflictError";
  }
}

export class PersistenceError extends WardenError {
  constructor(message: string, options: WardenErrorOptions = {}) {
    super("persistence", message, options);
    this.name = "PersistenceError";
  }
}

export class PermissionError extends WardenError {
  constructor(message: string, options: WardenErrorOptions = {}) {
    super("permission", message, options);
    this.name = "PermissionError";
  }
}

export function toWardenError(error: unknown): WardenError {
  if (error instanceof WardenError) {
    return error;
  }

  if (error instanceof CommandTimeoutError) {
    return new ExecutionError(error.message);
  }

  if (error instanceof CommandError) {
    const detail = [error.stdout, error.stderr].filter(Boolean).join("\n");
    return new ExecutionError(error.stderr || error.message, {
      detail: detail || undefined
    });
  }

  // Anything else is a defect or an unexpected library failure, not a tool failure.
  if (error instanceof Error) {
    return new WardenError("internal", error.message, { detail: error.stack });
  }

  return new WardenError("internal", String(error));
}

export function describeError(error: unknown): ErrorDescription {
  const normalized = toWardenError(error);
  const description: ErrorDescription = {
    kind: normalized.kind,
    message: normalized.message
  };
  if (normalized.detail) {
    description.detail = normalized.detail;
  }
  return description;
}

export function renderWardenError(error: WardenError): string {
  const lines = [`${error.message} [${error.kind}]`];
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  if (error.detail) {
    lines.push(error.detail);
  }
  return lines.join("\n");
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
