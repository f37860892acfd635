#!/usr/bin/env node
import fs from "node:fs";
import process from "node:process";
import { ConfigError, parseArgs, USAGE } from "./config.js";
import { errorMessage } from "./errors.js";
import { log } from "./logger.js";
import { openInBrowser } from "./open-browser.js";
import { startPreview } from "./preview.js";

async function main(): Promise<number> {
  const command = parseArgs(process.argv.slice(2));

  if (command.kind === "help") {
    console.log(USAGE.trim());
    return 0;
  }
  if (command.kind === "version") {
    console.log(readVersion());
    return 0;
  }

  const { config } = command;
  const preview = await startPreview(config);

  log.info(`Watching ${preview.root}`);
  log.info(`Preview available at ${preview.url}`);
  if (!config.offline) {
    log.info(`Rendering through ${config.githubApi} (use --offline to render locally)`);
  }
  log.info("Press Ctrl+C to exit.");

  if (config.open) {
    try {
      await openInBrowser(preview.url);
    } catch (error) {
      log.warn(`Unable to open browser automatically: ${errorMessage(error)}`);
    }
  }

  return new Promise<number>((resolve) => {
    let shuttingDown = false;

    const shutdown = (code: number) => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      preview.close().then(
        () => resolve(code),
        (error: unknown) => {
          log.error(`Failed to close preview server: ${errorMessage(error)}`);
          resolve(1);
        },
      );
    };

    process.on("SIGINT", () => shutdown(0));
    process.on("SIGTERM", () => shutdown(0));
    process.on("uncaughtException", (error) => {
      log.error("Uncaught exception", error);
      shutdown(1);
    });
  });
}

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(new URL("../package.json", import.meta.url), "utf8"),
  );
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "unknown";
}

try {
  process.exit(await main());
} catch (error) {
  if (error instanceof ConfigError) {
    log.error(error.message);
    console.error(USAGE.trim());
  } else {
    log.error(errorMessage(error));
  }
  process.exit(1);
}
