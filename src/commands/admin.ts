import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";

export function registerAdminCommand(program: Command): void {
  const admin = program.command("admin").description("Manage the admin registry (main admin only)");

  admin
    .command("list")
    .description("List admins")
    .action(async (_options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireMainAdmin(ctx.actor);
      for (const userId of ctx.access.listAdmins()) {
        console.log(ctx.access.isMainAdmin(userId) ? `${userId} (main)` : userId);
      }
    });

  admin
    .command("add <userId>")
    .description("Grant admin rights")
    .action(async (userId: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireMainAdmin(ctx.actor);
      await ctx.access.addAdmin(userId);
      console.log(`'${userId}' is now an admin.`);
    });

  admin
    .command("remove <userId>")
    .description("Revoke admin rights")
    .action(async (userId: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireMainAdmin(ctx.actor);
      await ctx.access.removeAdmin(userId);
      console.log(`'${userId}' is no longer an admin.`);
    });
}
