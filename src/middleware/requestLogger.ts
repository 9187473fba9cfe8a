import type { RequestHandler } from "express";
import type { Logger } from "pino";

/** Logs one line per request once the response has been sent. */
export function requestLogger(log: Logger): RequestHandler {
  return (req, res, next) => {
    const startedAt = process.hrtime.bigint();
    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      log.info(
        { method: req.method, url: req.originalUrl, status: res.statusCode, durationMs },
        "request completed"
      );
    });
    next();
  };
}
