import { NextFunction, Request, RequestHandler, Response } from "express";
import { Logger, logContext } from "../config/logger";

export function buildRequestLogger(logger: Logger): RequestHandler {
  return (request: Request, response: Response, next: NextFunction) => {
    const startedAt = Date.now();
    response.on("finish", () => {
      const statusCode = response.statusCode;
      logContext(
        logger,
        statusCode >= 500 ? "error" : statusCode >= 400 ? "warn" : "info",
        "http.request.completed",
        {
          method: request.method,
          route: request.path,
          status_code: statusCode,
          latency_ms: Date.now() - startedAt,
          ok: statusCode < 400,
        },
      );
    });
    next();
  };
}
