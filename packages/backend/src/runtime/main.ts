#!/usr/bin/env node
/**
 * Backend Runtime - Standalone Server
 * Thin CLI wrapper around the Backend library
 */

import chalk from "chalk";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import {
  bytesToHex,
  createLogger,
  isKeyPurpose,
  KEY_PURPOSES,
  parseTagUid,
  toError,
  type KeyPurpose,
} from "@workshop-access/shared";

import { Backend } from "../backend.js";
import { loadConfig } from "../config.js";
import { loadSeedFile } from "../repository/seed.js";
import { KeyService } from "../service/key-service.js";
import { startServer } from "../server.js";

async function serve(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger("backend:main", config.logLevel);
  logger.info("Configuration loaded", {
    systemName: config.systemName,
    timezone: config.timezone,
    seedFile: config.seedFile,
    tagVerification: config.sdmMetaReadKey !== undefined,
  });

  const backend = new Backend({
    masterKey: config.masterKey,
    systemName: config.systemName,
    sdmMetaReadKey: config.sdmMetaReadKey,
    timezone: config.timezone,
  });
  if (config.seedFile) {
    backend.seed(loadSeedFile(config.seedFile));
  }

  console.log(chalk.bold("Starting workshop backend..."));
  const running = await startServer(backend, {
    port: config.port,
    host: config.host,
    terminalToken: config.terminalToken,
  });
  console.log(chalk.green(`✓ Listening on http://${config.host}:${running.port}`));
  if (!config.terminalToken) {
    console.log(chalk.yellow("TERMINAL_TOKEN is not set; terminals are not authenticated"));
  }

  const shutdown = async () => {
    console.log("\nShutting down backend...");
    await running.stop();
    console.log("✓ Stopped");
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

function diversify(uid: string, purposes: KeyPurpose[]): void {
  const config = loadConfig();
  const keyService = new KeyService(config.masterKey, config.systemName);
  const keys = keyService.personalizationKeys(parseTagUid(uid));

  console.log(chalk.bold(`Keys for tag ${uid.toLowerCase()} (system "${config.systemName}")`));
  for (const purpose of purposes) {
    console.log(`${purpose.padEnd(14)} ${bytesToHex(keys[purpose])}`);
  }
  for (const key of Object.values(keys)) {
    key.fill(0);
  }
}

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName("workshop-backend")
    .usage("Usage: $0 <command> [options]")
    .strict()
    .command("serve", "Run the backend server", {}, () => serve())
    .command(
      "diversify",
      "Print diversified tag keys for personalization",
      (y) =>
        y
          .option("uid", { type: "string", demandOption: true, desc: "Tag UID (7 bytes hex)" })
          .option("purpose", {
            type: "string",
            array: true,
            desc: `Key purposes (${KEY_PURPOSES.join(", ")}); all when omitted`,
          }),
      (argv) => {
        const requested: string[] = argv.purpose ?? [...KEY_PURPOSES];
        const purposes = requested.filter(isKeyPurpose);
        if (purposes.length !== requested.length) {
          throw new Error(`Unknown key purpose; expected one of ${KEY_PURPOSES.join(", ")}`);
        }
        diversify(argv.uid, purposes);
      },
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
