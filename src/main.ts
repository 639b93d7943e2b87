#!/usr/bin/env node
import { buildSimulator } from "./app";
import { describeError } from "./errors";
import { loadConfig } from "./config";
import { ConsoleLogger } from "./logging/logger";

async function main() {
  const config = loadConfig();
  const logger = new ConsoleLogger(config.logLevel);
  const { server, recordReplay } = buildSimulator(config, logger);

  const address = await server.listen(config.port, config.host);
  logger.info("listening on http://%s:%d", address.address, address.port);

  const shutdown = (signal: string) => {
    logger.info("received %s, shutting down", signal);
    const pending = recordReplay?.mode === "record" ? recordReplay.save() : Promise.resolve();
    pending
      .then(() => server.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("shutdown failed: %s", describeError(err));
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("[aoai-sim] startup error", err);
  process.exit(1);
});
