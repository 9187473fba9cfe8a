import type { RegistrySource } from "../types/mcp";

const databaseParam = {
  type: "string",
  description: "Database name",
  default: "default",
};

const headersParam = {
  type: "object",
  description: "HTTP request headers",
  additionalProperties: { type: "string" },
};

export const seedConfigs = {
  weather: {
    server: {
      name: "Weather MCP Server",
      version: "1.0.0",
      description: "Tools for looking up weather conditions",
    },
    tools: [
      {
        name: "get_weather",
        description: "Get the current weather for a city",
        inputSchema: {
          type: "object",
          properties: {
            city: { type: "string", description: "Name of the city to look up" },
            unit: {
              type: "string",
              enum: ["celsius", "fahrenheit"],
              description: "Temperature unit",
              default: "celsius",
            },
          },
          required: ["city"],
        },
      },
      {
        name: "get_forecast",
        description: "Get the weather forecast for a city",
        inputSchema: {
          type: "object",
          properties: {
            city: { type: "string", description: "Name of the city to forecast" },
            days: {
              type: "integer",
              description: "Number of forecast days (1-7)",
              minimum: 1,
              maximum: 7,
              default: 3,
            },
          },
          required: ["city"],
        },
      },
    ],
  },
  database: {
    server: {
      name: "Database MCP Server",
      version: "1.0.0",
      description: "Tools for working with a database",
    },
    tools: [
      {
        name: "query_database",
        description: "Run a SQL query",
        inputSchema: {
          type: "object",
          properties: {
            sql: { type: "string", description: "SQL query to run" },
            database: databaseParam,
          },
          required: ["sql"],
        },
      },
      {
        name: "execute_command",
        description: "Execute a database command (INSERT, UPDATE, DELETE)",
        inputSchema: {
          type: "object",
          properties: {
            command: { type: "string", description: "SQL command to execute" },
            database: databaseParam,
          },
          required: ["command"],
        },
      },
      {
        name: "list_tables",
        description: "List every table in the database",
        inputSchema: {
          type: "object",
          properties: {
            database: databaseParam,
          },
          required: [],
        },
      },
    ],
  },
  file: {
    server: {
      name: "File System MCP Server",
      version: "1.0.0",
      description: "Tools for file system operations",
    },
    tools: [
      {
        name: "read_file",
        description: "Read the contents of a file",
        inputSchema: {
          type: "object",
          properties: {
            path: { type: "string", description: "Path of the file to read" },
            encoding: { type: "string", description: "File encoding", default: "utf-8" },
          },
          required: ["path"],
        },
      },
      {
        name: "write_file",
        description: "Write content to a file",
        inputSchema: {
          type: "object",
          properties: {
            path: { type: "string", description: "Path of the file to write" },
            content: { type: "string", description: "Content to write" },
            encoding: { type: "string", description: "File encoding", default: "utf-8" },
          },
          required: ["path", "content"],
        },
      },
      {
        name: "list_directory",
        description: "List the contents of a directory",
        inputSchema: {
          type: "object",
          properties: {
            path: { type: "string", description: "Directory to list", default: "." },
            recursive: {
              type: "boolean",
              description: "Whether to descend into subdirectories",
              default: false,
            },
          },
          required: [],
        },
      },
    ],
  },
  api: {
    server: {
      name: "API Client MCP Server",
      version: "1.0.0",
      description: "Tools for calling HTTP APIs",
    },
    tools: [
      {
        name: "http_get",
        description: "Send an HTTP GET request",
        inputSchema: {
          type: "object",
          properties: {
            url: { type: "string", description: "Request URL" },
            headers: headersParam,
          },
          required: ["url"],
        },
      },
      {
        name: "http_post",
        description: "Send an HTTP POST request",
        inputSchema: {
          type: "object",
          properties: {
            url: { type: "string", description: "Request URL" },
            body: { type: "object", description: "Request body (JSON)" },
            headers: headersParam,
          },
          required: ["url", "body"],
        },
      },
    ],
  },
} satisfies RegistrySource;
