#!/usr/bin/env -S node --import tsx

/**
 * localpilot CLI entry point.
 *
 * Parses flags, resolves configuration, starts the listeners and relays,
 * and runs until SIGINT/SIGTERM. Any start-up failure (bad config, port
 * in use, certificate generation) exits with status 1.
 */

import { createLogger } from "@localpilot/core";
import type { Logger } from "@localpilot/core";
import { resolveConfig } from "@localpilot/server";

import { HELP, isError, parseArgs } from "./args.js";
import type { ServeArgs } from "./args.js";
import { startServices } from "./services.js";
import type { Services } from "./services.js";

const VERSION = "0.1.0";

async function startAll(args: ServeArgs, logger: Logger): Promise<Services | null> {
  try {
    const config = resolveConfig(args.overrides);
    const services = await startServices({ config, logger });
    logger.info("ready", {
      public: `${config.bindHost}:${services.plainRelay.port}`,
      publicTls: `${config.bindHost}:${services.tlsRelay.port}`,
    });
    return services;
  } catch (err: unknown) {
    logger.error("failed to start", { err });
    return null;
  }
}

async function runServe(args: ServeArgs): Promise<void> {
  const logger = createLogger({ scope: "localpilot", verbose: args.verbose });

  const services = await startAll(args, logger);
  if (!services) return process.exit(1);

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("shutting down", { signal });
    services.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("error during shutdown", { err });
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

async function main(): Promise<void> {
  const result = parseArgs(process.argv);

  if (isError(result)) {
    console.error(result.error);
    process.exit(1);
  }

  switch (result.command) {
    case "help":
      console.log(HELP);
      break;
    case "version":
      console.log(VERSION);
      break;
    case "serve":
      await runServe(result);
      break;
  }
}

main().catch((err) => {
  console.error("Fatal:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
