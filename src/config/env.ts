// src/config/env.ts
import * as dotenv from "dotenv";
import pino, { type LevelWithSilent } from "pino";

dotenv.config(); // load .env into process.env

export type Profile = "dev" | "prod";

export type AppConfig = {
  port: number;
  host: string;
  profile: Profile;
  logLevel: LevelWithSilent;
  logFile: string;
  mcpConfigFile?: string;
};

type Env = Record<string, string | undefined>;

function parseProfile(raw: string | undefined): Profile {
  return (raw ?? "dev").trim().toLowerCase() === "prod" ? "prod" : "dev";
}

const logLevels: readonly string[] = [...Object.keys(pino.levels.values), "silent"];

function isLogLevel(value: string): value is LevelWithSilent {
  return logLevels.includes(value);
}

// pino throws on unknown level names, so anything unrecognised logs at info
function parseLogLevel(raw: string | undefined): LevelWithSilent {
  const level = (raw ?? "").trim().toLowerCase();
  return isLogLevel(level) ? level : "info";
}

function parsePort(raw: string | undefined): number {
  const port = Number(raw);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : 8000;
}

export function readConfig(env: Env = process.env): AppConfig {
  return {
    port: parsePort(env.PORT),
    host: env.HOST || "0.0.0.0",
    profile: parseProfile(env.PROFILE),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFile: env.LOG_FILE || "app.log",
    // empty string means "use the built-in configs"
    mcpConfigFile: env.MCP_CONFIG_FILE || undefined,
  };
}

export const config: Readonly<AppConfig> = Object.freeze(readConfig());
