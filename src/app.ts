import express, { type Express } from "express";
import cors from "cors";
import type { Logger } from "pino";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";
import type { McpRegistry } from "./registry/registry";
import { createMcpRouter } from "./routes/mcpRouter";
import { createRootRouter } from "./routes/rootRouter";
import { createLogger } from "./utils/logger";

export type AppOptions = {
  registry: McpRegistry;
  logger?: Logger;
};

export function createApp({ registry, logger = createLogger("http") }: AppOptions): Express {
  const app = express();

  app.disable("x-powered-by");
  // mount paths follow the same matching rules as routerOptions
  app.enable("case sensitive routing");
  app.enable("strict routing");
  app.use(cors());
  app.use(requestLogger(logger));

  app.use("/", createRootRouter(registry));
  app.use("/mcp", createMcpRouter(registry));

  app.use(notFoundHandler);
  app.use(errorHandler(logger));

  return app;
}
