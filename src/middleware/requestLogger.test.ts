import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import express from "express";
import pino from "pino";
import { requestLogger } from "./requestLogger";
import { memoryStream, startTestServer, type MemoryStream, type TestServer } from "../testHelpers";

let server: TestServer;
let logs: MemoryStream;

beforeAll(async () => {
  logs = memoryStream();
  const app = express();
  app.use(requestLogger(pino({ level: "info" }, logs)));
  app.get("/ping", (_req, res) => {
    res.status(202).json({ ok: true });
  });
  server = await startTestServer(app);
});

afterAll(async () => {
  await server.close();
});

describe("requestLogger", () => {
  it("logs method, url, status and duration once per request", async () => {
    const { status } = await server.get("/ping?x=1");
    expect(status).toBe(202);

    await vi.waitFor(() => expect(logs.lines).toHaveLength(1));
    const [line] = logs.lines;
    expect(line).toMatchObject({
      level: 30,
      msg: "request completed",
      method: "GET",
      url: "/ping?x=1",
      status: 202,
    });
    expect(typeof line.durationMs).toBe("number");
    expect(line.durationMs).toBeGreaterThanOrEqual(0);
  });
});
