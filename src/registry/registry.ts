import { readFileSync } from "node:fs";
import type { McpConfig, RegistrySource, ServerInfo, ToolDefinition } from "../types/mcp";
import { ConfigError, EndpointNotFoundError, ToolNotFoundError, describeError } from "../utils/errors";
import { parseRegistrySource } from "./schema";
import { seedConfigs } from "./seed";

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Read-only map from endpoint key to MCP configuration.
 *
 * Built once at startup and never mutated, so concurrent requests can read
 * it without coordination. Reloading means building a new registry and
 * swapping the whole instance, never editing one in place.
 */
export class McpRegistry {
  private readonly configs: ReadonlyMap<string, McpConfig>;

  constructor(source: unknown, origin?: string) {
    const parsed = parseRegistrySource(source, origin);
    this.configs = new Map(Object.entries(deepFreeze(parsed)));
  }

  static fromSeed(): McpRegistry {
    return new McpRegistry(seedConfigs, "built-in configs");
  }

  /** Loads a registry from a JSON file shaped like the built-in configs. */
  static fromFile(path: string): McpRegistry {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (err) {
      throw new ConfigError(`Cannot read MCP config file '${path}': ${describeError(err)}`, { path });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(`MCP config file '${path}' is not valid JSON: ${describeError(err)}`, { path });
    }

    return new McpRegistry(json, `MCP config file '${path}'`);
  }

  get size(): number {
    return this.configs.size;
  }

  keys(): string[] {
    return [...this.configs.keys()];
  }

  entries(): Array<[string, McpConfig]> {
    return [...this.configs.entries()];
  }

  has(key: string): boolean {
    return this.configs.has(key);
  }

  getConfiguration(key: string): McpConfig {
    const mcpConfig = this.configs.get(key);
    if (!mcpConfig) {
      throw new EndpointNotFoundError(key, this.keys());
    }
    return mcpConfig;
  }

  getServerInfo(key: string): ServerInfo {
    return this.getConfiguration(key).server;
  }

  getTools(key: string): ToolDefinition[] {
    return this.getConfiguration(key).tools;
  }

  getTool(key: string, toolName: string): ToolDefinition {
    const tools = this.getTools(key);
    const tool = tools.find((t) => t.name === toolName);
    if (!tool) {
      throw new ToolNotFoundError(key, toolName, tools.map((t) => t.name));
    }
    return tool;
  }
}

/** Registry source used at startup: the JSON file when one is configured. */
export function loadRegistry(mcpConfigFile?: string): McpRegistry {
  return mcpConfigFile ? McpRegistry.fromFile(mcpConfigFile) : McpRegistry.fromSeed();
}
