import { Router } from "express";
import type { McpRegistry } from "../registry/registry";
import { routerOptions } from "./routerOptions";

// GET /mcp/:endpoint[/server|/tools[/:toolName]]
// Lookup failures throw NotFoundError subclasses; the app's error handler turns them into 404s.
export function createMcpRouter(registry: McpRegistry): Router {
  const mcpRouter = Router(routerOptions);

  mcpRouter.get("/:endpoint", (req, res) => {
    res.json(registry.getConfiguration(req.params.endpoint));
  });

  mcpRouter.get("/:endpoint/server", (req, res) => {
    res.json(registry.getServerInfo(req.params.endpoint));
  });

  mcpRouter.get("/:endpoint/tools", (req, res) => {
    res.json(registry.getTools(req.params.endpoint));
  });

  mcpRouter.get("/:endpoint/tools/:toolName", (req, res) => {
    res.json(registry.getTool(req.params.endpoint, req.params.toolName));
  });

  return mcpRouter;
}
