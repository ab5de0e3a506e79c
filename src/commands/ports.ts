import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { renderTable, type TableColumn } from "../lib/table";
import { parseCount, withSpinner } from "./helpers";

const PORT_COLUMN: TableColumn = { header: "HOST PORT", align: "right" };

export function registerPortsCommand(program: Command): void {
  const ports = program.command("ports").description("Manage host port forwards");

  ports
    .command("list")
    .description("Show your forwards and quota")
    .action(async (_options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      const forwards = ctx.ports.forwardsOf(ctx.actor);
      console.log(`Slots: ${forwards.length}/${ctx.ports.slotsOf(ctx.actor)} used`);
      if (forwards.length > 0) {
        const rows = forwards.map((forward) => [
          String(forward.hostPort),
          forward.instanceId,
          String(forward.internalPort)
        ]);
        console.log(renderTable([PORT_COLUMN, "INSTANCE", { ...PORT_COLUMN, header: "INTERNAL PORT" }], rows));
      }
      if (ctx.access.isAdmin(ctx.actor)) {
        const summary = ctx.ports.summary();
        console.log(`Pool: ${summary.used} used, ${summary.available} of ${summary.total} available`);
      }
    });

  ports
    .command("add <id> <port>")
    .description("Forward a host port (tcp and udp) to a port inside your instance")
    .action(async (id: string, port: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireInstance(ctx.actor, id, "operate");
      const internalPort = parseCount("Port", port);
      await withSpinner(
        `Forwarding port ${internalPort} of '${id}'...`,
        (forward) => `Host port ${forward.hostPort} now forwards to ${id}:${forward.internalPort}.`,
        () => ctx.ports.allocate(ctx.actor, id, internalPort)
      );
    });

  ports
    .command("remove <hostPort>")
    .description("Remove one of your forwards")
    .action(async (hostPort: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      const port = parseCount("Host port", hostPort);
      await withSpinner(`Removing forward ${port}...`, () => `Removed forward ${port}.`, () =>
        ctx.ports.release(ctx.actor, port)
      );
    });

  ports
    .command("grant <userId> <amount>")
    .description("Give a user more port slots")
    .action(async (userId: string, amount: string, _options: unknown, command: Command) => {
      const ctx = await getCommandContext(command);
      ctx.access.requireAdmin(ctx.actor);
      const total = await ctx.ports.addSlots(userId, parseCount("Amount", amount));
      console.log(`User '${userId}' now has ${total} port slots.`);
    });
}
