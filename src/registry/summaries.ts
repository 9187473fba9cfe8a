import type { EndpointInfo, EndpointListing, RootSummary } from "../types/mcp";
import type { McpRegistry } from "./registry";

export const ROOT_MESSAGE = "Dynamic MCP Demo Server";

export function describeRoot(registry: McpRegistry): RootSummary {
  const endpointsInfo: Record<string, EndpointInfo> = {};
  for (const [endpoint, mcpConfig] of registry.entries()) {
    endpointsInfo[endpoint] = {
      server_name: mcpConfig.server.name,
      tools_count: mcpConfig.tools.length,
    };
  }

  return {
    message: ROOT_MESSAGE,
    available_endpoints: registry.keys(),
    endpoints_info: endpointsInfo,
  };
}

export function listEndpoints(registry: McpRegistry): EndpointListing {
  return {
    endpoints: registry.entries().map(([endpoint, mcpConfig]) => ({
      endpoint,
      server_name: mcpConfig.server.name,
      server_version: mcpConfig.server.version,
      server_description: mcpConfig.server.description,
      tools: mcpConfig.tools.map((tool) => ({ name: tool.name, description: tool.description })),
    })),
  };
}
