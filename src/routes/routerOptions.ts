import type { RouterOptions } from "express";

// "/MCP/weather" and "/mcp/weather/" are not aliases of "/mcp/weather"
export const routerOptions: RouterOptions = { caseSensitive: true, strict: true };
