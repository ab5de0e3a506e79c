import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { NotFoundError, PersistenceError } from "../src/lib/errors";
import { InstanceStore } from "../src/lib/store";
import { MAIN_ADMIN, makeRecord, makeTempDir, removeTempDir, seedInstance, silenceLogs } from "./helpers";

silenceLogs();

async function readState(dir: string): Promise<Record<string, string>> {
  const files: Record<string, string> = {};
  for (const name of ["instances.json", "admins.json", "ports.json"]) {
    files[name] = await fs.promises.readFile(path.join(dir, name), "utf8");
  }
  return files;
}

test("load on an empty directory yields empty collections", async (t) => {
  const dir = await makeTempDir();
  t.after(() => removeTempDir(dir));

  const store = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  const state = await store.load();

  assert.deepEqual(state, {
    instances: {},
    admins: { mainAdmin: MAIN_ADMIN, admins: [] },
    ports: { slots: {}, forwards: {} }
  });
});

test("mutations persist and survive a reload", async (t) => {
  const dir = await makeTempDir();
  t.after(() => removeTempDir(dir));

  const store = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  await store.load();
  await seedInstance(store, "alice", makeRecord("warden-alice-1", { sharedWith: ["bob"] }));
  await store.mutate((state) => {
    state.admins.admins.push("ops");
    state.ports.slots.alice = 2;
    state.ports.forwards.alice = [{ instanceId: "warden-alice-1", internalPort: 22, hostPort: 10000 }];
  });

  const reloaded = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  await reloaded.load();

  assert.deepEqual(reloaded.snapshot(), store.snapshot());
  assert.deepEqual(reloaded.requireInstance("warden-alice-1").ownerId, "alice");
});

test("save after load reproduces the documents byte for byte", async (t) => {
  const dir = await makeTempDir();
  t.after(() => removeTempDir(dir));

  const store = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  await store.load();
  await seedInstance(
    store,
    "alice",
    makeRecord("warden-alice-1", {
      status: "suspended",
      suspensionHistory: [{ time: "2024-01-02T00:00:00.000Z", reason: "CPU exceeded", actor: "auto-system" }]
    })
  );
  const first = await readState(dir);

  const reloaded = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  await reloaded.load();
  await reloaded.save();

  assert.deepEqual(await readState(dir), first);
});

test("save leaves no temp files behind", async (t) => {
  const dir = await makeTempDir();
  t.after(() => removeTempDir(dir));

  const store = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  await store.load();
  await Promise.all([store.save(), store.save(), store.save()]);

  const names = (await fs.promises.readdir(dir)).sort();
  assert.deepEqual(names, ["admins.json", "instances.json", "ports.json"]);
});

test("a legacy suspended flag becomes the suspended status", async (t) => {
  const dir = await makeTempDir();
  t.after(() => removeTempDir(dir));

  const legacy = {
    alice: [{ ...makeRecord("warden-alice-1", { status: "stopped" }), suspended: true }]
  };
  await fs.promises.writeFile(path.join(dir, "instances.json"), JSON.stringify(legacy), "utf8");

  const store = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  await store.load();

  const { record } = store.requireInstance("warden-alice-1");
  assert.equal(record.status, "suspended");
  assert.equal(Object.prototype.hasOwnProperty.call(record, "suspended"), false);
});

test("a corrupt document is moved aside and the rest still loads", async (t) => {
  const dir = await makeTempDir();
  t.after(() => removeTempDir(dir));

  await fs.promises.writeFile(path.join(dir, "instances.json"), "{ not json", "utf8");
  await fs.promises.writeFile(path.join(dir, "admins.json"), JSON.stringify({ admins: ["ops"] }), "utf8");

  const store = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  const state = await store.load();

  assert.deepEqual(state.instances, {});
  assert.deepEqual(state.admins, { mainAdmin: MAIN_ADMIN, admins: ["ops"] });
  const names = await fs.promises.readdir(dir);
  assert.equal(names.includes("instances.json"), false);
  assert.equal(names.filter((name) => name.startsWith("instances.json.corrupt-")).length, 1);
});

test("a document failing validation is treated as corrupt", async (t) => {
  const dir = await makeTempDir();
  t.after(() => removeTempDir(dir));

  const invalid = { alice: [{ ...makeRecord("warden-alice-1"), status: "exploded" }] };
  await fs.promises.writeFile(path.join(dir, "instances.json"), JSON.stringify(invalid), "utf8");

  const store = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  const state = await store.load();

  assert.deepEqual(state.instances, {});
  const names = await fs.promises.readdir(dir);
  assert.equal(names.filter((name) => name.startsWith("instances.json.corrupt-")).length, 1);
});

test("the main admin always comes from configuration", async (t) => {
  const dir = await makeTempDir();
  t.after(() => removeTempDir(dir));

  await fs.promises.writeFile(
    path.join(dir, "admins.json"),
    JSON.stringify({ mainAdmin: "someone-else", admins: ["ops", MAIN_ADMIN, "ops"] }),
    "utf8"
  );

  const store = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  const state = await store.load();

  assert.deepEqual(state.admins, { mainAdmin: MAIN_ADMIN, admins: ["ops"] });
});

test("a throwing mutation saves nothing", async (t) => {
  const dir = await makeTempDir();
  t.after(() => removeTempDir(dir));

  const store = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  await store.load();

  await assert.rejects(
    store.mutate(() => {
      throw new Error("nope");
    }),
    /nope/
  );
  assert.deepEqual(await fs.promises.readdir(dir), []);
});

test("an unwritable directory raises PersistenceError", async (t) => {
  const dir = await makeTempDir();
  t.after(() => removeTempDir(dir));

  const blocker = path.join(dir, "blocker");
  await fs.promises.writeFile(blocker, "", "utf8");
  const store = new InstanceStore({ directory: path.join(blocker, "state"), mainAdminId: MAIN_ADMIN });

  await assert.rejects(
    store.save(),
    (error: unknown) => error instanceof PersistenceError && error.kind === "persistence"
  );
});

test("lookups find instances across owners", async (t) => {
  const dir = await makeTempDir();
  t.after(() => removeTempDir(dir));

  const store = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  await store.load();
  await seedInstance(store, "alice", makeRecord("warden-alice-1"));
  await seedInstance(store, "bob", makeRecord("warden-bob-1"));

  assert.deepEqual(
    store.listInstances().map(({ ownerId, record }) => `${ownerId}:${record.id}`),
    ["alice:warden-alice-1", "bob:warden-bob-1"]
  );
  assert.equal(store.findInstance("warden-bob-1")?.ownerId, "bob");
  assert.equal(store.findInstance("missing"), undefined);
  assert.deepEqual(store.instancesOf("carol"), []);
  assert.throws(() => store.requireInstance("missing"), NotFoundError);
});

test("updateInstance fails when the record is gone", async (t) => {
  const dir = await makeTempDir();
  t.after(() => removeTempDir(dir));

  const store = new InstanceStore({ directory: dir, mainAdminId: MAIN_ADMIN });
  await store.load();

  await assert.rejects(
    store.updateInstance("missing", () => undefined),
    (error: unknown) => error instanceof NotFoundError && error.message === "Instance 'missing' no longer exists."
  );
});
