import test from "node:test";
import assert from "node:assert/strict";
import type { HostSampler } from "../src/lib/probes";
import { HostGuardian } from "../src/services/host-guardian";
import { makeHarness, makeRecord, removeTempDir, seedInstance, silenceLogs } from "./helpers";

silenceLogs();

class StubSampler implements HostSampler {
  samples = 0;

  constructor(private readonly result: number | Error) {}

  async cpuPercent(): Promise<number> {
    this.samples += 1;
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

test("a disabled guardian does not sample", async (t) => {
  const { dir, operations, executor } = await makeHarness();
  t.after(() => removeTempDir(dir));
  const sampler = new StubSampler(99);
  const guardian = new HostGuardian(sampler, operations, { enabled: false });

  assert.deepEqual(await guardian.tick(), { kind: "disabled" });
  assert.equal(sampler.samples, 0);
  assert.deepEqual(executor.calls, []);
});

test("usage at or below the threshold leaves instances alone", async (t) => {
  const { dir, operations, executor, store } = await makeHarness();
  t.after(() => removeTempDir(dir));
  await seedInstance(store, "alice", makeRecord("warden-alice-1"));

  const guardian = new HostGuardian(new StubSampler(90), operations, { cpuThreshold: 90 });

  assert.deepEqual(await guardian.tick(), { kind: "ok", usage: 90 });
  assert.deepEqual(executor.calls, []);
  assert.equal(store.requireInstance("warden-alice-1").record.status, "running");
});

test("a breach force-stops everything and marks running records stopped", async (t) => {
  const { dir, operations, executor, store } = await makeHarness();
  t.after(() => removeTempDir(dir));
  await seedInstance(store, "alice", makeRecord("warden-alice-1"));
  await seedInstance(store, "alice", makeRecord("warden-alice-2"));
  await seedInstance(store, "bob", makeRecord("warden-bob-1", { status: "stopped" }));
  await seedInstance(store, "bob", makeRecord("warden-bob-2", { status: "suspended" }));

  const guardian = new HostGuardian(new StubSampler(95), operations, { cpuThreshold: 90 });

  assert.deepEqual(await guardian.tick(), { kind: "breach", usage: 95, stopped: 2 });
  assert.deepEqual(executor.calls, ["lxc stop --all --force"]);
  assert.deepEqual(
    store.listInstances().map(({ record }) => record.status),
    ["stopped", "stopped", "stopped", "suspended"]
  );
});

test("sampling failures are reported and nothing is stopped", async (t) => {
  const { dir, operations, executor } = await makeHarness();
  t.after(() => removeTempDir(dir));
  const guardian = new HostGuardian(new StubSampler(new Error("top missing")), operations);

  assert.deepEqual(await guardian.tick(), { kind: "error", message: "top missing" });
  assert.deepEqual(executor.calls, []);
});

test("a failed stop-all leaves the records untouched", async (t) => {
  const { dir, operations, executor, store } = await makeHarness();
  t.after(() => removeTempDir(dir));
  await seedInstance(store, "alice", makeRecord("warden-alice-1"));
  executor.fail("lxc stop --all", "daemon unreachable");

  const guardian = new HostGuardian(new StubSampler(99), operations);

  assert.deepEqual(await guardian.tick(), { kind: "error", message: "daemon unreachable" });
  assert.equal(store.requireInstance("warden-alice-1").record.status, "running");
});

test("the toggle is read at the start of every tick", async (t) => {
  const { dir, operations } = await makeHarness();
  t.after(() => removeTempDir(dir));
  const sampler = new StubSampler(10);
  const guardian = new HostGuardian(sampler, operations);

  assert.equal(guardian.isEnabled(), true);
  guardian.disable();
  assert.deepEqual(await guardian.tick(), { kind: "disabled" });
  guardian.enable();
  assert.deepEqual(await guardian.tick(), { kind: "ok", usage: 10 });
  assert.equal(sampler.samples, 1);
});

test("beforeTick runs only for enabled ticks", async (t) => {
  const { dir, operations } = await makeHarness();
  t.after(() => removeTempDir(dir));
  let reloads = 0;
  const guardian = new HostGuardian(new StubSampler(10), operations, {
    enabled: false,
    beforeTick: async () => {
      reloads += 1;
    }
  });

  await guardian.tick();
  guardian.enable();
  await guardian.tick();

  assert.equal(reloads, 1);
});

test("readToggle switches the guard before each tick", async (t) => {
  const { dir, operations } = await makeHarness();
  t.after(() => removeTempDir(dir));
  const sampler = new StubSampler(10);
  let stored: boolean | undefined = false;
  const guardian = new HostGuardian(sampler, operations, { readToggle: async () => stored });

  assert.deepEqual(await guardian.tick(), { kind: "disabled" });
  assert.equal(guardian.isEnabled(), false);

  stored = true;
  assert.deepEqual(await guardian.tick(), { kind: "ok", usage: 10 });

  stored = undefined;
  assert.deepEqual(await guardian.tick(), { kind: "ok", usage: 10 });
  assert.equal(sampler.samples, 2);
});

test("an unreadable toggle keeps the current setting", async (t) => {
  const { dir, operations } = await makeHarness();
  t.after(() => removeTempDir(dir));
  const guardian = new HostGuardian(new StubSampler(10), operations, {
    readToggle: async () => {
      throw new Error("EACCES");
    }
  });

  assert.deepEqual(await guardian.tick(), { kind: "ok", usage: 10 });
  assert.equal(guardian.isEnabled(), true);
});
