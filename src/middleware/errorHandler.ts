import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import { ConfigurationError, RegisterMapError } from "../errors";

export function createErrorHandler(logger: Logger) {
  return function errorHandler(
    error: Error,
    request: Request,
    response: Response,
    _next: NextFunction,
  ): void {
    void _next;
    if (error instanceof ConfigurationError || error instanceof RegisterMapError) {
      response.status(400).json({ detail: error.message, issues: error.issues });
      return;
    }
    if (error instanceof SyntaxError && "body" in error) {
      response.status(400).json({ detail: "Malformed JSON body" });
      return;
    }
    logger.error({ error, method: request.method, url: request.originalUrl }, "Unhandled error");
    response.status(500).json({ detail: "Internal server error" });
  };
}
