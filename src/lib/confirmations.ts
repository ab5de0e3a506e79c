import { randomUUID } from "node:crypto";
import { CONFIRMATION_TTL_MS } from "./constants";
import { NotFoundError } from "./errors";

export type ConfirmationKind = "reinstall" | "stop-all";

export interface ConfirmationTicket {
  token: string;
  kind: ConfirmationKind;
  subject: string;
  expiresAt: number;
}

interface PendingConfirmation extends ConfirmationTicket {
  action: () => Promise<unknown>;
}

export interface ConfirmationBrokerOptions {
  ttlMs?: number;
  now?: () => number;
  newToken?: () => string;
}

/**
 * Two-phase protocol for destructive operations: `request` parks the action behind an
 * opaque token, `confirm` runs it at most once before the token expires.
 */
export class ConfirmationBroker {
  private readonly pending = new Map<string, PendingConfirmation>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly newToken: () => string;

  constructor(options: ConfirmationBrokerOptions = {}) {
    this.ttlMs = options.ttlMs ?? CONFIRMATION_TTL_MS;
    this.now = options.now ?? Date.now;
    this.newToken = options.newToken ?? randomUUID;
  }

  request(kind: ConfirmationKind, subject: string, action: () => Promise<unknown>): ConfirmationTicket {
    this.prune();
    const ticket: ConfirmationTicket = {
      token: this.newToken(),
      kind,
      subject,
      expiresAt: this.now() + this.ttlMs
    };
    this.pending.set(ticket.token, { ...ticket, action });
    return ticket;
  }

  async confirm(token: string): Promise<unknown> {
    this.prune();
    const entry = this.pending.get(token);
    if (!entry) {
      throw new NotFoundError("Confirmation expired or unknown.", { hint: "Request the operation again." });
    }
    this.pending.delete(token);
    return await entry.action();
  }

  cancel(token: string): boolean {
    return this.pending.delete(token);
  }

  private prune(): void {
    const now = this.now();
    for (const [token, entry] of this.pending) {
      if (entry.expiresAt <= now) {
        this.pending.delete(token);
      }
    }
  }
}
