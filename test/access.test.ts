import test from "node:test";
import assert from "node:assert/strict";
import { AccessControl } from "../src/lib/access";
import { NotFoundError, PermissionError, ValidationError } from "../src/lib/errors";
import { MAIN_ADMIN, makeHarness, makeRecord, removeTempDir, seedInstance, silenceLogs } from "./helpers";
import type { Harness } from "./helpers";

silenceLogs();

async function setup(): Promise<Harness & { access: AccessControl }> {
  const harness = await makeHarness();
  const access = new AccessControl(harness.store);
  await access.addAdmin("ops");
  await seedInstance(harness.store, "alice", makeRecord("warden-alice-1", { sharedWith: ["bob"] }));
  await seedInstance(harness.store, "alice", makeRecord("warden-alice-2", { status: "suspended" }));
  return { ...harness, access };
}

test("admins include the main admin and registered admins", async (t) => {
  const { dir, access } = await setup();
  t.after(() => removeTempDir(dir));

  assert.equal(access.isAdmin(MAIN_ADMIN), true);
  assert.equal(access.isAdmin("ops"), true);
  assert.equal(access.isAdmin("alice"), false);
  assert.equal(access.isMainAdmin("ops"), false);
  assert.deepEqual(access.listAdmins(), [MAIN_ADMIN, "ops"]);
  assert.throws(() => access.requireAdmin("alice"), PermissionError);
  assert.throws(
    () => access.requireMainAdmin("ops"),
    (error: unknown) => error instanceof PermissionError && error.message === "Only the main admin can manage admins."
  );
});

test("owners, shared users and admins may operate an instance", async (t) => {
  const { dir, access } = await setup();
  t.after(() => removeTempDir(dir));

  assert.equal(access.requireInstance("alice", "warden-alice-1", "operate").ownerId, "alice");
  assert.equal(access.requireInstance("bob", "warden-alice-1", "operate").record.id, "warden-alice-1");
  assert.equal(access.requireInstance("ops", "warden-alice-1", "operate").ownerId, "alice");
  assert.throws(
    () => access.requireInstance("carol", "warden-alice-1", "view"),
    (error: unknown) => error instanceof PermissionError
      && error.message === "User 'carol' has no access to 'warden-alice-1'."
  );
});

test("owner-only actions reject shared users and admins", async (t) => {
  const { dir, access } = await setup();
  t.after(() => removeTempDir(dir));

  assert.equal(access.requireInstance("alice", "warden-alice-1", "owner").ownerId, "alice");
  assert.throws(
    () => access.requireInstance("bob", "warden-alice-1", "owner"),
    (error: unknown) => error instanceof PermissionError
      && error.message === "Only the owner of 'warden-alice-1' can do that."
  );
  assert.throws(() => access.requireInstance("ops", "warden-alice-1", "owner"), PermissionError);
});

test("non-admins may only view a suspended instance", async (t) => {
  const { dir, access } = await setup();
  t.after(() => removeTempDir(dir));

  assert.equal(access.requireInstance("alice", "warden-alice-2", "view").record.status, "suspended");
  assert.throws(
    () => access.requireInstance("alice", "warden-alice-2", "operate"),
    (error: unknown) => error instanceof PermissionError
      && error.message === "Instance 'warden-alice-2' is suspended."
      && error.hint === "Only stats and info are available until an admin unsuspends it."
  );
  assert.equal(access.requireInstance("ops", "warden-alice-2", "operate").ownerId, "alice");
});

test("unknown instances are not found", async (t) => {
  const { dir, access } = await setup();
  t.after(() => removeTempDir(dir));

  assert.throws(() => access.requireInstance("alice", "ghost", "view"), NotFoundError);
});

test("admin registry changes persist and protect the main admin", async (t) => {
  const { dir, access, store } = await setup();
  t.after(() => removeTempDir(dir));

  await assert.rejects(access.addAdmin("ops"), ValidationError);
  await assert.rejects(access.addAdmin(MAIN_ADMIN), ValidationError);
  await access.addAdmin("dave");
  await access.removeAdmin("ops");
  await assert.rejects(
    access.removeAdmin(MAIN_ADMIN),
    (error: unknown) => error instanceof PermissionError && error.message === "The main admin cannot be removed."
  );
  await assert.rejects(access.removeAdmin("erin"), NotFoundError);

  assert.deepEqual(store.snapshot().admins, { mainAdmin: MAIN_ADMIN, admins: ["dave"] });
});
