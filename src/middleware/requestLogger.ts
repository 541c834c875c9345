import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";

export function createRequestLogger(logger: Logger) {
  return function requestLogger(
    request: Request,
    response: Response,
    next: NextFunction,
  ) {
    const requestStart = Date.now();
    response.on("finish", () => {
      const durationMs = Date.now() - requestStart;
      // status polling from dashboards is noisy at info
      const level = response.statusCode >= 500 ? "warn" : request.method === "GET" ? "debug" : "info";
      logger[level](
        {
          method: request.method,
          url: request.originalUrl,
          status: response.statusCode,
          durationMs,
        },
        "HTTP request completed",
      );
    });
    next();
  };
}
