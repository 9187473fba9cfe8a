import { z } from "zod";
import type { RegistrySource, ToolDefinition } from "../types/mcp";
import { ConfigError } from "../utils/errors";

// keys become a single URL path segment
const endpointKeySchema = z
  .string()
  .min(1, "endpoint key must not be empty")
  .refine((key) => !key.includes("/"), "endpoint key must not contain '/'")
  .refine((key) => key !== "__proto__", "endpoint key '__proto__' is reserved")
  // integer-like keys would be moved ahead of the others in object key order
  .refine((key) => !/^\d+$/.test(key), "endpoint key must not be all digits");

const toolSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  inputSchema: z.record(z.unknown()),
}) satisfies z.ZodType<ToolDefinition>;

// a missing description is served as null
const serverInfoSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  description: z
    .string()
    .nullish()
    .transform((description) => description ?? null),
});

const mcpConfigSchema = z.object({
  server: serverInfoSchema,
  tools: z.array(toolSchema),
});

export const registrySourceSchema = z.record(endpointKeySchema, mcpConfigSchema);

function duplicateToolNames(tools: readonly ToolDefinition[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const tool of tools) {
    if (seen.has(tool.name)) duplicates.add(tool.name);
    seen.add(tool.name);
  }
  return [...duplicates];
}

/**
 * Validates an untrusted registry source.
 *
 * Throws ConfigError on a shape mismatch or when an endpoint lists the same
 * tool name twice, since per-tool lookups would then be ambiguous.
 */
export function parseRegistrySource(input: unknown, origin = "registry source"): RegistrySource {
  const result = registrySourceSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid ${origin}: ${issues.join("; ")}`, { origin, issues });
  }

  for (const [endpoint, mcpConfig] of Object.entries(result.data)) {
    const duplicates = duplicateToolNames(mcpConfig.tools);
    if (duplicates.length > 0) {
      throw new ConfigError(
        `Invalid ${origin}: endpoint '${endpoint}' defines duplicate tools: ${duplicates.join(", ")}`,
        { origin, endpoint, duplicates }
      );
    }
  }

  return result.data;
}
