import { config } from "./config/env";
import { createApp } from "./app";
import { loadRegistry } from "./registry/registry";
import { createLogger, logger } from "./utils/logger";

const log = createLogger("server");

function main(): void {
  const registry = loadRegistry(config.mcpConfigFile);
  log.info(
    { endpoints: registry.keys(), source: config.mcpConfigFile ?? "built-in" },
    "MCP registry loaded"
  );

  const app = createApp({ registry });
  const server = app.listen(config.port, config.host, () => {
    log.info({ profile: config.profile }, `MCP config server listening on ${config.host}:${config.port}`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    log.info({ signal }, "Shutting down");
    server.close((err) => {
      if (err) {
        log.error({ err }, "Error while closing HTTP server");
        process.exitCode = 1;
      }
      logger.flush();
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

try {
  main();
} catch (err) {
  log.fatal({ err }, "Failed to start MCP config server");
  logger.flush();
  process.exit(1);
}
