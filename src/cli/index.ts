#!/usr/bin/env node
import path from "node:path";
import { Command } from "commander";
import { describeError } from "../core/errors.js";
import { listTransactionRecords } from "../guardian/journal.js";
import { Prefix } from "../harness/prefix.js";

const program = new Command();
program
  .name("envrig")
  .description("envrig v0.1.0 - lifecycle orchestration for multi-host test environments")
  .version("0.1.0")
  .option("--prefix <dir>", "prefix directory", process.cwd())
  .option("--json", "json output", false);

interface GlobalOptions {
  prefix: string;
  json: boolean;
}

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function emit(data: unknown, asJson: boolean): void {
  if (asJson || typeof data !== "string") {
    console.log(JSON.stringify(data, null, 2));
    return;
  }
  console.log(data);
}

async function openPrefix(): Promise<Prefix> {
  return Prefix.open(path.resolve(globals().prefix));
}

program
  .command("status")
  .description("Show hosts, storage domains and recent snapshot transactions")
  .action(async () => {
    const prefix = await openPrefix();
    const { api } = prefix.context;
    const hosts = await api.listHosts();
    const dataCenters = await api.listDataCenters();
    const storageDomains = (await Promise.all(dataCenters.map((dc) => api.listStorageDomains(dc.id)))).flat();
    const transactions = await listTransactionRecords(prefix.paths);
    emit(
      {
        ok: true,
        prefix: prefix.config.name,
        metadata: prefix.metadata,
        hosts,
        storageDomains,
        transactions: transactions.slice(0, 5)
      },
      true
    );
  });

program
  .command("start")
  .description("Start every machine and activate the environment")
  .action(async () => {
    await (await openPrefix()).start();
    emit({ ok: true, action: "start" }, globals().json);
  });

program
  .command("stop")
  .description("Deactivate the environment and stop every machine")
  .action(async () => {
    await (await openPrefix()).stop();
    emit({ ok: true, action: "stop" }, globals().json);
  });

program
  .command("activate")
  .description("Activate hosts, then storage domains")
  .action(async () => {
    await (await openPrefix()).activate();
    emit({ ok: true, action: "activate" }, globals().json);
  });

program
  .command("deactivate")
  .description("Put storage domains, then hosts, into maintenance")
  .action(async () => {
    await (await openPrefix()).deactivate();
    emit({ ok: true, action: "deactivate" }, globals().json);
  });

program
  .command("snapshot")
  .description("Quiesce the environment and snapshot every machine")
  .argument("<name>")
  .option("--no-restore", "leave the environment deactivated after the snapshot")
  .action(async (name: string, opts: { restore: boolean }) => {
    const result = await (await openPrefix()).createSnapshot(name, opts.restore);
    emit({ ok: true, ...result }, globals().json);
  });

program
  .command("revert")
  .description("Revert every machine to a snapshot and reactivate the environment")
  .argument("<name>")
  .action(async (name: string) => {
    await (await openPrefix()).revertSnapshot(name);
    emit({ ok: true, action: "revert", name }, globals().json);
  });

program
  .command("prepare-repo")
  .description("Sync repositories and build packages, then merge them into the internal repository")
  .option("--rpm-repo <dir>", "local mirror of upstream repositories")
  .option("--yum-config <file>", "yum configuration listing the repositories to sync")
  .option("--skip-sync", "do not sync the mirror", false)
  .option("--vdsm-dir <dir>", "vdsm sources to build")
  .option("--engine-dir <dir>", "engine sources to build")
  .option("--engine-build-gwt", "build the engine web UI", false)
  .option("--jsonrpc-java-dir <dir>", "vdsm-jsonrpc-java sources to build")
  .action(
    async (opts: {
      rpmRepo?: string;
      yumConfig?: string;
      skipSync: boolean;
      vdsmDir?: string;
      engineDir?: string;
      engineBuildGwt: boolean;
      jsonrpcJavaDir?: string;
    }) => {
      const summary = await (await openPrefix()).prepareRepository(opts);
      emit({ ok: true, ...summary }, globals().json);
    }
  );

program
  .command("deploy")
  .description("Run each machine's deploy scripts")
  .action(async () => {
    await (await openPrefix()).deploy();
    emit({ ok: true, action: "deploy" }, globals().json);
  });

program
  .command("collect")
  .description("Collect artifacts from every machine")
  .argument("[dir]")
  .action(async (dir?: string) => {
    const prefix = await openPrefix();
    const collected = await prefix.collectArtifacts(dir ? path.resolve(dir) : undefined);
    emit({ ok: true, collected }, globals().json);
  });

program
  .command("run-test")
  .description("Run a test command against the prefix")
  .argument("<command>")
  .argument("[args...]")
  .action(async (command: string, args: string[]) => {
    const result = await (await openPrefix()).runTest(command, args);
    emit({ ok: result.exitCode === 0, ...result }, globals().json);
    process.exitCode = result.exitCode;
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(describeError(error));
  process.exit(1);
});
