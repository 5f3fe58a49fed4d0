#!/usr/bin/env node
/**
 * Terminal Runtime - Standalone Service
 * Thin CLI wrapper around the terminal library.
 *
 * Readers and relay boards are supplied by embedding the library; the CLI
 * drives a simulated tag and relay from the keyboard.
 */

import { createInterface } from "node:readline";

import chalk from "chalk";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { toError } from "@workshop-access/shared";

import {
  BrokerUsageUploader,
  ConfigManager,
  FileUsageHistoryStore,
  HttpBackendTransport,
  MachineUsageStateMachine,
  RequestBroker,
  SessionRegistry,
  SimulatedRelay,
  SimulatedTag,
  TerminalService,
  WsBackendTransport,
  type TerminalSnapshot,
} from "../lib/index.js";

interface RunArgs {
  backend?: string;
  transport?: "ws" | "http";
  machine?: string;
  permission?: string[];
  simulate: boolean;
  tagUid: string;
  tagKey?: string;
}

function describe(snapshot: TerminalSnapshot): string {
  const machine = snapshot.machine;
  const machineText =
    machine.type === "active"
      ? chalk.green(`ACTIVE ${machine.session.userLabel} (${machine.session.userId})`)
      : machine.type === "denied"
        ? chalk.red(`DENIED ${machine.message}`)
        : chalk.gray("IDLE");
  const creation = snapshot.creation ? ` tag=${snapshot.creation.tagUid} ${snapshot.creation.state.type}` : "";
  const error = snapshot.lastError ? chalk.yellow(` error=${snapshot.lastError.kind}: ${snapshot.lastError.message}`) : "";
  return `${machineText}${chalk.cyan(creation)}${error}`;
}

async function run(args: RunArgs): Promise<void> {
  if (!args.simulate) {
    throw new Error("No reader driver is configured; start with --simulate");
  }
  if (!args.tagKey) {
    throw new Error("--tag-key (or TAG_KEY) is required to personalize the simulated tag");
  }

  const configManager = new ConfigManager();
  const config = configManager.loadOrCreate({
    backendUrl: args.backend,
    transport: args.transport,
    machineId: args.machine,
    requiredPermissions: args.permission,
  });

  const transportConfig = {
    backendUrl: config.backendUrl,
    terminalToken: configManager.getTerminalToken(),
    terminalId: config.terminalId,
  };
  let closeTransport: () => Promise<void> = async () => undefined;
  let broker: RequestBroker;
  if (config.transport === "ws") {
    const transport = new WsBackendTransport(transportConfig);
    broker = new RequestBroker(transport);
    await transport.connect().catch(async (error: unknown) => {
      await transport.close();
      throw error;
    });
    closeTransport = () => transport.close();
  } else {
    broker = new RequestBroker(new HttpBackendTransport(transportConfig));
  }

  const machineUsage = new MachineUsageStateMachine({
    machine: { machineId: config.machineId, requiredPermissions: config.requiredPermissions },
    relay: new SimulatedRelay(),
    historyStore: new FileUsageHistoryStore(config.historyDir),
    uploader: new BrokerUsageUploader(broker),
  });

  const service = new TerminalService({
    broker,
    registry: new SessionRegistry(),
    machineUsage,
    keySlot: config.keySlot,
    requestTimeoutMs: config.requestTimeoutMs,
    tickIntervalMs: config.tickIntervalMs,
  });

  const tag = SimulatedTag.personalized(args.tagUid, args.tagKey, config.keySlot);
  const uid = tag.uid;

  let last = "";
  service.onSnapshot((snapshot) => {
    const line = describe(snapshot);
    if (line !== last) {
      console.log(line);
      last = line;
    }
  });

  await service.start();
  console.log(chalk.bold(`Terminal ${config.terminalId} for machine ${config.machineId}`));
  console.log(chalk.gray("Keys: [p] present tag  [r] remove tag  [c] check out  [q] quit"));

  const shutdown = async () => {
    console.log("\nShutting down terminal...");
    await service.stop();
    await closeTransport();
    console.log("✓ Stopped");
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  const rl = createInterface({ input: process.stdin });
  rl.on("line", (line) => {
    switch (line.trim()) {
      case "p":
      case "":
        service.tagPresented(uid, tag);
        break;
      case "r":
        service.tagRemoved(uid);
        break;
      case "c":
        service.requestCheckout().catch((error: unknown) => {
          console.error(chalk.red(toError(error).message));
        });
        break;
      case "q":
        void shutdown();
        break;
      default:
        console.error(chalk.gray(`Unknown key: ${line}`));
    }
  });
}

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName("workshop-terminal")
    .usage("Usage: $0 <command> [options]")
    .strict()
    .command(
      "run",
      "Run the terminal",
      (y) =>
        y
          .option("backend", { type: "string", desc: "Backend base URL (or $BACKEND_URL)" })
          .option("transport", { choices: ["ws", "http"] as const, desc: "Backend transport" })
          .option("machine", { type: "string", desc: "Machine id" })
          .option("permission", { type: "string", array: true, desc: "Permission required to use the machine" })
          .option("simulate", { type: "boolean", default: false, desc: "Use a simulated tag and relay" })
          .option("tag-uid", { type: "string", default: "04a1b2c3d4e5f6", desc: "Simulated tag UID (hex)" })
          .option("tag-key", {
            type: "string",
            default: process.env.TAG_KEY,
            desc: "Authorization key of the simulated tag (hex, from `workshop-backend diversify`)",
          }),
      (argv) =>
        run({
          backend: argv.backend,
          transport: argv.transport,
          machine: argv.machine,
          permission: argv.permission,
          simulate: argv.simulate,
          tagUid: argv.tagUid,
          tagKey: argv.tagKey,
        }),
    )
    .help()
    .alias("h", "help")
    .version("0.1.0")
    .demandCommand(1, "Please specify a command")
    .parseAsync();
}

main().catch((err: unknown) => {
  console.error(chalk.red(toError(err).message));
  process.exitCode = 1;
});
