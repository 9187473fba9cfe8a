import type { Express } from "express";
import type { Server } from "node:http";
import type { DestinationStream } from "pino";

export type TestServer = {
  baseUrl: string;
  get(path: string): Promise<{ status: number; body: unknown }>;
  close(): Promise<void>;
};

/** Listens on an ephemeral loopback port. */
export async function startTestServer(app: Express): Promise<TestServer> {
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("expected a TCP address");
  const baseUrl = `http://127.0.0.1:${address.port}`;

  return {
    baseUrl,
    async get(path) {
      const res = await fetch(`${baseUrl}${path}`);
      return { status: res.status, body: await res.json() };
    },
    close: () =>
      new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve()))),
  };
}

export type MemoryStream = DestinationStream & { lines: Array<Record<string, unknown>> };

/** pino destination that keeps each JSON line parsed in memory. */
export function memoryStream(): MemoryStream {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  };
}
