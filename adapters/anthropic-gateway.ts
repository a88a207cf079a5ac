#!/usr/bin/env node
// Entry point: load the env file, start the gateway, stop on SIGINT/SIGTERM.
import { loadEnvFile } from "./config.js";
import { createLogger } from "./logger.js";
import { startGateway } from "./server.js";

loadEnvFile();

async function main() {
  const gateway = await startGateway();
  const log = gateway.logger;

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    gateway
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, "shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  createLogger().fatal({ err }, "failed to start gateway");
  process.exit(1);
});
