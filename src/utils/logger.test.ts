import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  buildDestination,
  buildLoggerOptions,
  createLogger,
  createRootLogger,
  type FileDestination,
} from "./logger";

describe("buildLoggerOptions", () => {
  it("pretty-prints to the console in dev", () => {
    const options = buildLoggerOptions({ profile: "dev", logLevel: "debug", logFile: "app.log" });
    expect(options.level).toBe("debug");
    expect(options.transport).toMatchObject({ target: "pino-pretty" });
  });

  it("skips the pretty transport when silent", () => {
    const options = buildLoggerOptions({ profile: "dev", logLevel: "silent", logFile: "app.log" });
    expect(options.transport).toBeUndefined();
  });

  it("writes plain JSON in prod", () => {
    const options = buildLoggerOptions({ profile: "prod", logLevel: "info", logFile: "app.log" });
    expect(options.transport).toBeUndefined();
  });

  it("only opens a file destination in prod", () => {
    expect(buildDestination({ profile: "dev", logLevel: "info", logFile: "app.log" })).toBeUndefined();
  });
});

describe("file logging", () => {
  let dir: string | undefined;
  let destination: FileDestination | undefined;

  function openFileLogger(logFile: string) {
    const cfg = { profile: "prod" as const, logLevel: "info" as const, logFile };
    destination = buildDestination(cfg);
    return createRootLogger(cfg, destination);
  }

  afterEach(async () => {
    const open = destination;
    if (open) {
      await new Promise<void>((resolve) => {
        open.once("close", () => resolve());
        open.end();
      });
    }
    destination = undefined;
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("appends JSON lines to the log file, creating its directory", () => {
    dir = mkdtempSync(join(tmpdir(), "mcp-log-"));
    const logFile = join(dir, "nested", "app.log");

    const log = openFileLogger(logFile);
    log.info({ endpoint: "weather" }, "first");
    log.debug("hidden");

    const lines = readFileSync(logFile, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 30, msg: "first", endpoint: "weather" });
  });

  it("keeps existing content", () => {
    dir = mkdtempSync(join(tmpdir(), "mcp-log-"));
    const logFile = join(dir, "app.log");
    writeFileSync(logFile, "previous line\n");

    const log = openFileLogger(logFile);
    log.warn("second");

    const lines = readFileSync(logFile, "utf-8").trim().split("\n");
    expect(lines[0]).toBe("previous line");
    expect(JSON.parse(lines[1])).toMatchObject({ level: 40, msg: "second" });
  });
});

describe("createLogger", () => {
  it("binds the module name", () => {
    const log = createLogger("registry", { requestId: "req-1" });
    expect(log.bindings()).toMatchObject({ module: "registry", requestId: "req-1" });
  });
});
