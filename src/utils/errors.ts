// src/utils/errors.ts
/**
 * Error hierarchy for the HTTP surface.
 *
 * Every error carries a machine-readable `code`, the HTTP `statusCode` it maps
 * to and a `context` bag. pino's `err` serializer copies all three onto the
 * logged error.
 */

export type ErrorResponseBody = {
  ok: false;
  error: string;
  detail: string;
  available?: string[];
};

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly context: Record<string, unknown>;

  constructor(code: string, message: string, statusCode: number, context: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
  }

  toResponseBody(): ErrorResponseBody {
    return { ok: false, error: this.code, detail: this.message };
  }
}

export class NotFoundError extends AppError {
  /** Valid alternatives the caller could have asked for. */
  readonly available: readonly string[];

  constructor(code: string, message: string, available: readonly string[], context: Record<string, unknown> = {}) {
    super(code, message, 404, { ...context, available });
    this.available = available;
  }

  override toResponseBody(): ErrorResponseBody {
    return { ...super.toResponseBody(), available: [...this.available] };
  }
}

export class EndpointNotFoundError extends NotFoundError {
  readonly endpoint: string;

  constructor(endpoint: string, available: readonly string[]) {
    super(
      "endpoint_not_found",
      `MCP endpoint '${endpoint}' does not exist. Available endpoints: ${available.join(", ")}`,
      available,
      { endpoint }
    );
    this.endpoint = endpoint;
  }
}

export class ToolNotFoundError extends NotFoundError {
  readonly endpoint: string;
  readonly toolName: string;

  constructor(endpoint: string, toolName: string, available: readonly string[]) {
    super(
      "tool_not_found",
      `Tool '${toolName}' does not exist in endpoint '${endpoint}'. Available tools: ${available.join(", ")}`,
      available,
      { endpoint, toolName }
    );
    this.endpoint = endpoint;
    this.toolName = toolName;
  }
}

export class RouteNotFoundError extends AppError {
  constructor(method: string, path: string) {
    super("route_not_found", `Route ${method} ${path} not found`, 404, { method, path });
  }
}

/** Raised at startup when a registry source is malformed. */
export class ConfigError extends AppError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super("config_error", message, 500, context);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
