import { NotFoundError, PermissionError, ValidationError } from "./errors";
import type { InstanceStore } from "./store";
import type { OwnedInstance } from "./types";

export type InstanceAccess = "operate" | "view" | "owner";

export class AccessControl {
  private readonly store: InstanceStore;

  constructor(store: InstanceStore) {
    this.store = store;
  }

  isMainAdmin(userId: string): boolean {
    return this.store.snapshot().admins.mainAdmin === userId;
  }

  isAdmin(userId: string): boolean {
    return this.isMainAdmin(userId) || this.store.snapshot().admins.admins.includes(userId);
  }

  listAdmins(): string[] {
    const { mainAdmin, admins } = this.store.snapshot().admins;
    return [mainAdmin, ...admins];
  }

  requireAdmin(userId: string): void {
    if (!this.isAdmin(userId)) {
      throw new PermissionError(`User '${userId}' is not an admin.`);
    }
  }

  requireMainAdmin(userId: string): void {
    if (!this.isMainAdmin(userId)) {
      throw new PermissionError("Only the main admin can manage admins.");
    }
  }

  /**
   * Resolves an instance the user may act on. `view` covers stats and info, `operate`
   * covers start/stop/restart, `owner` covers reinstall and sharing.
   */
  requireInstance(userId: string, id: string, access: InstanceAccess): OwnedInstance {
    const found = this.store.requireInstance(id);
    const { ownerId, record } = found;

    if (access === "owner") {
      if (ownerId !== userId) {
        throw new PermissionError(`Only the owner of '${id}' can do that.`);
      }
    } else if (!this.isAdmin(userId) && ownerId !== userId && !record.sharedWith.includes(userId)) {
      throw new PermissionError(`User '${userId}' has no access to '${id}'.`);
    }

    if (record.status === "suspended" && access !== "view" && !this.isAdmin(userId)) {
      throw new PermissionError(`Instance '${id}' is suspended.`, {
        hint: "Only stats and info are available until an admin unsuspends it."
      });
    }
    return found;
  }

  async addAdmin(userId: string): Promise<void> {
    if (!userId.trim()) {
      throw new ValidationError("User id is required.");
    }
    if (this.isAdmin(userId)) {
      throw new ValidationError(`User '${userId}' is already an admin.`);
    }
    await this.store.mutate((state) => {
      state.admins.admins.push(userId);
    });
  }

  async removeAdmin(userId: string): Promise<void> {
    if (this.isMainAdmin(userId)) {
      throw new PermissionError("The main admin cannot be removed.");
    }
    if (!this.isAdmin(userId)) {
      throw new NotFoundError(`User '${userId}' is not an admin.`);
    }
    await this.store.mutate((state) => {
      state.admins.admins = state.admins.admins.filter((id) => id !== userId);
    });
  }
}
