import fs from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConvergenceTimeout, JobFailure, RollbackError, TransientRejection } from "../src/core/errors.js";
import { listTransactionRecords } from "../src/guardian/journal.js";
import { createSnapshot } from "../src/guardian/snapshot.js";
import { DEFAULT_SEED, createTestRig, type TestRig } from "./helpers/context.js";

function observe(rig: TestRig) {
  return {
    domains: rig.api.domainStates(),
    hosts: rig.api.hostStates(),
    services: [rig.engine, ...rig.hosts].map((m) => ({ [m.name]: m.serviceStates() }))
  };
}

describe("snapshot transaction", () => {
  it("captures once and restores the running environment when asked to", async () => {
    const rig = await createTestRig({ linkApiToEngine: true });
    const before = observe(rig);

    const { record, journalPath } = await createSnapshot(rig.ctx, "baseline", { restore: true });

    expect(rig.virt.snapshots.get("baseline")).toEqual(["engine", "host0", "host1"]);
    expect(observe(rig)).toEqual(before);
    expect(record.status).toBe("restored");
    expect(record.phases).toEqual(["running", "quiescing", "captured", "restoring", "running"]);
    expect(record.error).toBeNull();
    expect(journalPath).not.toBeNull();

    const afterCapture = rig.events.slice(rig.events.indexOf("snapshot baseline") + 1);
    expect(afterCapture).toEqual([
      "start supervdsmd@host1",
      "start vdsmd@host1",
      "start supervdsmd@host0",
      "start vdsmd@host0",
      "start ovirt-engine@engine",
      "host host0 up",
      "host host1 up",
      "sd master_sd active",
      "sd sd2 active"
    ]);
  });

  it("quiesces in order and leaves the environment down without restore", async () => {
    const rig = await createTestRig({ linkApiToEngine: true });

    const { record } = await createSnapshot(rig.ctx, "cold", { restore: false });

    const at = (event: string) => rig.events.indexOf(event);
    expect(at("sd sd2 maintenance")).toBeLessThan(at("sd master_sd maintenance"));
    expect(at("sd master_sd maintenance")).toBeLessThan(at("host host0 maintenance"));
    expect(at("host host1 maintenance")).toBeLessThan(at("stop ovirt-engine@engine"));
    expect(at("stop ovirt-engine@engine")).toBeLessThan(at("stop vdsmd@host0"));
    expect(at("stop supervdsmd@host1")).toBeLessThan(at("snapshot cold"));
    expect(rig.events.at(-1)).toBe("snapshot cold");

    expect(rig.api.domainStates()).toEqual({ master_sd: "maintenance", sd2: "maintenance" });
    expect(rig.api.hostStates()).toEqual({ host0: "maintenance", host1: "maintenance" });
    expect(rig.engine.serviceStates()).toEqual({ "ovirt-engine": "stopped" });
    expect(record.status).toBe("captured");
    expect(record.phases).toEqual(["running", "quiescing", "captured"]);
  });

  it("restores the pre-transaction state when the capture fails", async () => {
    const rig = await createTestRig({ linkApiToEngine: true });
    const before = observe(rig);
    const failure = new Error("disk full");
    rig.virt.failCreate = failure;

    await expect(createSnapshot(rig.ctx, "broken")).rejects.toBe(failure);

    expect(observe(rig)).toEqual(before);
    expect(rig.virt.snapshots.size).toBe(0);

    const [record] = await listTransactionRecords(rig.ctx.paths);
    expect(record?.status).toBe("aborted");
    expect(record?.error).toBe("disk full");
    expect(record?.phases).toEqual(["running", "quiescing", "restoring", "running"]);
    expect(record?.undoFailures).toEqual([]);
  });

  it("restarts services already stopped when a host fails to stop", async () => {
    const rig = await createTestRig({ linkApiToEngine: true });
    const before = observe(rig);
    rig.hosts[1]?.failStop.add("supervdsmd");

    const error = await createSnapshot(rig.ctx, "partial").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(JobFailure);
    expect(error instanceof JobFailure && error.failures.map((f) => f.name)).toEqual(["stop services on host1"]);
    expect(observe(rig)).toEqual(before);
    expect(rig.virt.snapshots.size).toBe(0);
  });

  it("reports cleanup failures alongside the original cause", async () => {
    const rig = await createTestRig({ linkApiToEngine: true });
    const failure = new Error("disk full");
    rig.virt.failCreate = failure;
    rig.hosts[0]?.failStart.add("vdsmd");

    const error = await createSnapshot(rig.ctx, "messy").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RollbackError);
    if (!(error instanceof RollbackError)) return;
    expect(error.cause).toBe(failure);
    expect(error.undoFailures.map((f) => f.label)).toEqual(["restart services on host0"]);

    expect(rig.hosts[0]?.serviceStates()).toEqual({ vdsmd: "stopped", supervdsmd: "running" });
    expect(rig.api.domainStates()).toEqual({ master_sd: "active", sd2: "active" });
    expect(rig.api.hostStates()).toEqual({ host0: "up", host1: "up" });

    const [record] = await listTransactionRecords(rig.ctx.paths);
    expect(record?.status).toBe("aborted");
    expect(record?.error).toBe("disk full");
    expect(record?.undoFailures).toHaveLength(1);
    expect(record?.phases).toEqual(["running", "quiescing", "restoring"]);
  });

  it("reactivates the first data center when a later one refuses maintenance", async () => {
    const rig = await createTestRig({
      linkApiToEngine: true,
      seed: {
        ...DEFAULT_SEED,
        dataCenters: [
          { id: "dc-a", name: "a", domains: [{ id: "sd-a", name: "a_master", master: true }] },
          { id: "dc-b", name: "b", domains: [{ id: "sd-b", name: "b_master", master: true }] }
        ]
      }
    });
    rig.api.reject("deactivateStorageDomain", "b_master");

    await expect(createSnapshot(rig.ctx, "split")).rejects.toBeInstanceOf(TransientRejection);

    expect(rig.events).toEqual(["sd a_master maintenance", "sd a_master active"]);
    expect(rig.api.domainStates()).toEqual({ a_master: "active", b_master: "active" });
    expect(rig.api.hostStates()).toEqual({ host0: "up", host1: "up" });
  });

  it("reactivates every host when one never reaches maintenance", async () => {
    const rig = await createTestRig({ linkApiToEngine: true });
    const before = observe(rig);
    rig.api.stuck.add("host1 maintenance");

    await expect(createSnapshot(rig.ctx, "stuck")).rejects.toBeInstanceOf(ConvergenceTimeout);

    expect(observe(rig)).toEqual(before);
    expect(rig.events).not.toContain("stop ovirt-engine@engine");
  });

  it("reactivates hosts and domains when the engine refuses to stop", async () => {
    const rig = await createTestRig({ linkApiToEngine: true });
    const before = observe(rig);
    rig.engine.failStop.add("ovirt-engine");

    await expect(createSnapshot(rig.ctx, "engine")).rejects.toThrow("stop ovirt-engine failed on engine");

    expect(observe(rig)).toEqual(before);
    const [record] = await listTransactionRecords(rig.ctx.paths);
    expect(record?.status).toBe("aborted");
    expect(record?.phases).toEqual(["running", "quiescing", "restoring", "running"]);
  });

  it("journals snapshot names that contain a path separator", async () => {
    const rig = await createTestRig({ linkApiToEngine: true });

    const { journalPath } = await createSnapshot(rig.ctx, "nightly/1");

    expect(journalPath && path.dirname(journalPath)).toBe(rig.ctx.paths.transactions);
    expect(journalPath).toMatch(/-nightly%2F1-[0-9a-f]{12}\.json$/);
    const [record] = await listTransactionRecords(rig.ctx.paths);
    expect(record?.name).toBe("nightly/1");
  });

  it("keeps the outcome when the journal cannot be written", async () => {
    const rig = await createTestRig({ linkApiToEngine: true });
    await fs.mkdir(rig.ctx.paths.state, { recursive: true });
    await fs.writeFile(rig.ctx.paths.journal, "not a directory", "utf8");

    const { record, journalPath } = await createSnapshot(rig.ctx, "unjournaled");
    expect(record.status).toBe("restored");
    expect(journalPath).toBeNull();

    const failure = new Error("disk full");
    rig.virt.failCreate = failure;
    await expect(createSnapshot(rig.ctx, "unjournaled-2")).rejects.toBe(failure);
  });
});
