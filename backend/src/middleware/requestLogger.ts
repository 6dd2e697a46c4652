import type { NextFunction, Request, RequestHandler, Response } from "express";

import type { Logger } from "../lib/logger";

/**
 * Logs method, path, status and duration once the response finishes.
 * Bodies and headers are never logged: they carry message text and the API key.
 */
export function createRequestLogger(logger: Logger, nowMs: () => number = () => Date.now()): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = nowMs();
    res.on("finish", () => {
      logger.debug(`${req.method} ${req.path} ${res.statusCode} ${nowMs() - start}ms`);
    });
    next();
  };
}
