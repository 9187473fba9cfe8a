export type JsonObject = Record<string, unknown>;

export type ToolDefinition = {
  name: string;
  description: string;
  /** JSON Schema for the tool's arguments. Served as-is, never interpreted. */
  inputSchema: JsonObject;
};

export type ServerInfo = {
  name: string;
  version: string;
  description: string | null;
};

export type McpConfig = {
  server: ServerInfo;
  tools: ToolDefinition[];
};

/** Endpoint key -> configuration, as read from a registry source. */
export type RegistrySource = Record<string, McpConfig>;

export type EndpointInfo = {
  server_name: string;
  tools_count: number;
};

export type RootSummary = {
  message: string;
  available_endpoints: string[];
  endpoints_info: Record<string, EndpointInfo>;
};

export type EndpointSummary = {
  endpoint: string;
  server_name: string;
  server_version: string;
  server_description: string | null;
  tools: Array<Pick<ToolDefinition, "name" | "description">>;
};

export type EndpointListing = {
  endpoints: EndpointSummary[];
};
