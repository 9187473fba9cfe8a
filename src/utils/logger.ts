// src/utils/logger.ts
/**
 * Pino logger for the service.
 *
 * `PROFILE=dev` streams human-readable lines to the console through
 * pino-pretty. `PROFILE=prod` appends newline-delimited JSON to `LOG_FILE`.
 *
 * Modules take a child logger so every line carries `{ module }`:
 *   const log = createLogger("registry");
 *   log.info({ endpoints: 4 }, "registry ready");
 */
import pino, { type Logger, type LoggerOptions } from "pino";
import { config, type AppConfig } from "../config/env";

type LoggerConfig = Pick<AppConfig, "profile" | "logLevel" | "logFile">;

export function buildLoggerOptions(cfg: LoggerConfig): LoggerOptions {
  const options: LoggerOptions = {
    level: cfg.logLevel,
    base: { service: "mcp-config-registry" },
    serializers: { err: pino.stdSerializers.err },
  };

  // a silent logger never needs the pretty worker thread
  if (cfg.profile === "dev" && cfg.logLevel !== "silent") {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
        ignore: "pid,hostname,service",
      },
    };
  }

  return options;
}

export type FileDestination = ReturnType<typeof pino.destination>;

export function buildDestination(cfg: LoggerConfig): FileDestination | undefined {
  if (cfg.profile !== "prod") return undefined;
  return pino.destination({ dest: cfg.logFile, append: true, mkdir: true, sync: true });
}

export function createRootLogger(
  cfg: LoggerConfig,
  destination: FileDestination | undefined = buildDestination(cfg)
): Logger {
  const options = buildLoggerOptions(cfg);
  return destination ? pino(options, destination) : pino(options);
}

export const logger: Logger = createRootLogger(config);

export function createLogger(module: string, context: Record<string, unknown> = {}): Logger {
  return logger.child({ module, ...context });
}
