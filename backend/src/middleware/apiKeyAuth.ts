import { timingSafeEqual } from "node:crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";

export const API_KEY_HEADER = "X-API-Key";

/** Byte-for-byte, case-sensitive comparison that does not leak the matching prefix length. */
export function apiKeyMatches(expected: string, provided: string | undefined): boolean {
  if (typeof provided !== "string") return false;
  const a = Buffer.from(expected, "utf8");
  const b = Buffer.from(provided, "utf8");
  if (a.byteLength !== b.byteLength) return false;
  return timingSafeEqual(a, b);
}

export function createApiKeyAuth(
  apiKey: string,
  reject: (res: Response) => void
): RequestHandler {
  if (apiKey === "") {
    throw new Error("apiKeyAuth requires a non-empty apiKey.");
  }
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKeyMatches(apiKey, req.header(API_KEY_HEADER))) {
      reject(res);
      return;
    }
    next();
  };
}
