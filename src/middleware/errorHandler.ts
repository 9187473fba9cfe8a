import type { ErrorRequestHandler, RequestHandler } from "express";
import type { Logger } from "pino";
import { AppError, RouteNotFoundError } from "../utils/errors";

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new RouteNotFoundError(req.method, req.path));
};

export function errorHandler(log: Logger): ErrorRequestHandler {
  return (err: unknown, _req, res, _next) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        log.error({ err }, "Request failed");
      } else {
        log.debug({ err }, "Request rejected");
      }
      res.status(err.statusCode).json(err.toResponseBody());
      return;
    }

    // express raises URIError for path params it cannot percent-decode
    if (err instanceof URIError) {
      log.debug({ err }, "Malformed request path");
      res.status(400).json({ ok: false, error: "bad_request", detail: "Malformed request path" });
      return;
    }

    log.error({ err }, "Unhandled error");
    res.status(500).json({ ok: false, error: "internal_error" });
  };
}
