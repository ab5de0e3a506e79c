import { errorMessage } from "./errors";
import { logger } from "./logger";

export interface Notifier {
  notify(userId: string, message: string): Promise<void>;
}

export interface RoleGrants {
  grantOwnerRole(userId: string): Promise<void>;
  revokeOwnerRole(userId: string): Promise<void>;
}

export class LogNotifier implements Notifier {
  async notify(userId: string, message: string): Promise<void> {
    logger.info("Owner notification", { userId, message });
  }
}

export class LogRoleGrants implements RoleGrants {
  async grantOwnerRole(userId: string): Promise<void> {
    logger.info("Owner role granted", { userId });
  }

  async revokeOwnerRole(userId: string): Promise<void> {
    logger.info("Owner role revoked", { userId });
  }
}

// Collaborator failures never fail the operation that triggered them.
export async function bestEffort(label: string, task: () => Promise<void>): Promise<boolean> {
  try {
    await task();
    return true;
  } catch (error) {
    logger.warn(`${label} failed`, { error: errorMessage(error) });
    return false;
  }
}
