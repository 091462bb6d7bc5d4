#!/usr/bin/env node
/* eslint-disable no-console */
import process from "node:process";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";
import { SERVER_NAME, SERVER_VERSION, start } from "./server.js";

function parseArguments(args: string[]) {
  let showHelp = false;
  let showVersion = false;

  for (const arg of args) {
    if (arg === "--help" || arg === "-h") {
      showHelp = true;
    }

    if (arg === "--version" || arg === "-v") {
      showVersion = true;
    }
  }

  return { showHelp, showVersion };
}

function printHelp(): void {
  console.log(
    `${SERVER_NAME} v${SERVER_VERSION}\n\n` +
      `Usage: ${SERVER_NAME} [options]\n\n` +
      `Runs an MCP server on stdio. Settings come from the environment or a .env file\n` +
      `(LLM_PROVIDER, MED_HYPOTHESIS_RUNS_PATH, EVIDENCE_SOURCES, LOG_LEVEL, ...).\n\n` +
      `Options:\n` +
      `  --help, -h     Show this help message\n` +
      `  --version, -v  Print the current version`,
  );
}

async function main(): Promise<void> {
  const cliOptions = parseArguments(process.argv.slice(2));

  if (cliOptions.showVersion) {
    console.log(`${SERVER_NAME} v${SERVER_VERSION}`);
    return;
  }

  if (cliOptions.showHelp) {
    printHelp();
    return;
  }

  try {
    const { server, service } = await start();

    const shutdown = async (signal: string) => {
      logger.info("Shutting down", "cli", { signal, runsInFlight: service.pending });
      await service.drain();
      await server.close();
      process.exit(0);
    };
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((error: unknown) => {
          logger.error("Shutdown failed", "cli", { error });
          process.exit(1);
        });
      });
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("Invalid configuration", "cli", { issues: error.issues });
    } else {
      logger.error(`Failed to start ${SERVER_NAME} server`, "cli", { error });
    }
    process.exitCode = 1;
  }
}

void main();
