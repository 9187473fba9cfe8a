import { Router } from "express";
import type { McpRegistry } from "../registry/registry";
import { describeRoot, listEndpoints } from "../registry/summaries";
import { routerOptions } from "./routerOptions";

export function createRootRouter(registry: McpRegistry): Router {
  const rootRouter = Router(routerOptions);

  rootRouter.get("/", (_req, res) => {
    res.json(describeRoot(registry));
  });

  rootRouter.get("/list-endpoints", (_req, res) => {
    res.json(listEndpoints(registry));
  });

  rootRouter.get("/healthz", (_req, res) => {
    res.json({ ok: true, endpoints: registry.size });
  });

  return rootRouter;
}
