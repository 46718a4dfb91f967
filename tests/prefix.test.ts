import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { parsePrefixConfig } from "../src/core/config.js";
import { ConfigError } from "../src/core/errors.js";
import { Prefix, type PrefixCollaborators } from "../src/harness/prefix.js";
import { DEFAULT_SEED, TEST_SERVICES } from "./helpers/context.js";
import { FakeMachine, FakeManagementApi, FakeToolkit, FakeVirt } from "./helpers/fakes.js";

const config = parsePrefixConfig({
  name: "basic-suite",
  engine: { name: "engine", address: "192.168.200.2", distro: "el7" },
  hosts: [
    { name: "host0", address: "192.168.200.3", distro: "el7" },
    { name: "host1", address: "192.168.200.4", distro: "el7" }
  ],
  api: { url: "https://192.168.200.2/ovirt-engine/api", username: "admin@internal", password: "test-secret" },
  timeouts: { shortMs: 250, longMs: 250, pollIntervalMs: 1, reachableMs: 100 },
  repo: { host: "127.0.0.1", port: 0 }
});

type FakeCollaborators = Omit<PrefixCollaborators, "environment"> & {
  environment: { engine: FakeMachine; hosts: FakeMachine[] };
  toolkit: FakeToolkit;
  virt: FakeVirt;
};

function fakeCollaborators(): FakeCollaborators {
  return {
    environment: {
      engine: new FakeMachine("engine", "el7", TEST_SERVICES.engine, [], ["setup_engine.sh"], ["/var/log/engine.log"]),
      hosts: [
        new FakeMachine("host0", "el7", TEST_SERVICES.host, [], ["setup_host.sh"], ["/var/log/vdsm.log"]),
        new FakeMachine("host1", "el7", TEST_SERVICES.host, [], ["setup_host.sh"], ["/var/log/vdsm.log"])
      ]
    },
    api: new FakeManagementApi(DEFAULT_SEED),
    virt: new FakeVirt(),
    toolkit: new FakeToolkit()
  };
}

async function tempRoot(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "envrig-prefix-"));
}

describe("Prefix", () => {
  it("takes a snapshot through the wired collaborators", async () => {
    const collaborators = fakeCollaborators();
    const prefix = await Prefix.fromConfig(await tempRoot(), config, collaborators);

    const { record } = await prefix.createSnapshot("baseline");

    expect(record.status).toBe("restored");
    expect(collaborators.virt.snapshots.get("baseline")).toEqual(["engine", "host0", "host1"]);
  });

  it("persists source revisions recorded while preparing", async () => {
    const root = await tempRoot();
    const collaborators = fakeCollaborators();
    collaborators.toolkit.revisions.set("/src/ovirt-engine", "abc123");
    const prefix = await Prefix.fromConfig(root, config, collaborators);

    await prefix.prepareRepository({ engineDir: "/src/ovirt-engine" });
    const reopened = await Prefix.fromConfig(root, config, fakeCollaborators());

    expect(reopened.metadata).toEqual({ "ovirt-engine-revision": "abc123" });
  });

  it("runs a test command in the prefix and keeps its log", async () => {
    const root = await tempRoot();
    const script = path.join(root, "check.sh");
    await fs.writeFile(script, 'echo "prefix=$ENVRIG_PREFIX"\necho "repo=$ENVRIG_REPO_URL"\nexit 3\n', "utf8");
    const prefix = await Prefix.fromConfig(root, config, fakeCollaborators());

    const result = await prefix.runTest("sh", [script]);

    expect(result.exitCode).toBe(3);
    expect(result.logPath).toBe(path.join(prefix.paths.logs, "check.sh.log"));
    const [firstLine, secondLine] = (await fs.readFile(result.logPath, "utf8")).split("\n");
    expect(firstLine).toBe(`prefix=${root}`);
    expect(secondLine).toMatch(/^repo=http:\/\/127\.0\.0\.1:\d+\/$/);
  });

  it("collects the machines' logs after a test run", async () => {
    const root = await tempRoot();
    const script = path.join(root, "smoke.sh");
    await fs.writeFile(script, "exit 0\n", "utf8");
    const prefix = await Prefix.fromConfig(root, config, fakeCollaborators());

    const result = await prefix.runTest("sh", [script]);

    const outputDir = path.join(prefix.paths.artifacts, "smoke.sh");
    expect(result.exitCode).toBe(0);
    expect(result.artifacts).toEqual([
      path.join(outputDir, "engine"),
      path.join(outputDir, "host0"),
      path.join(outputDir, "host1")
    ]);
    expect(await fs.readFile(path.join(outputDir, "host1", "vdsm.log"), "utf8")).toBe("host1:/var/log/vdsm.log\n");
  });

  it("keeps the test result when log collection fails", async () => {
    const root = await tempRoot();
    const script = path.join(root, "smoke.sh");
    await fs.writeFile(script, "exit 0\n", "utf8");
    const prefix = await Prefix.fromConfig(root, config, fakeCollaborators());
    await fs.writeFile(prefix.paths.artifacts, "not a directory", "utf8");

    const result = await prefix.runTest("sh", [script]);

    expect(result.exitCode).toBe(0);
    expect(result.artifacts).toEqual([]);
  });

  it("deploys every machine with its scripts", async () => {
    const collaborators = fakeCollaborators();
    const prefix = await Prefix.fromConfig(await tempRoot(), config, collaborators);

    await prefix.deploy();

    const { engine, hosts } = collaborators.environment;
    expect(engine.ranScripts).toEqual(["setup_engine.sh"]);
    expect(hosts.map((host) => host.ranScripts)).toEqual([
      ["setup_host.sh"],
      ["setup_host.sh"]
    ]);
  });

  it("refuses to open a directory without a configuration", async () => {
    await expect(Prefix.open(await tempRoot(), fakeCollaborators())).rejects.toBeInstanceOf(ConfigError);
  });
});
