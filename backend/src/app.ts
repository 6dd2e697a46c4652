import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";

import { errorMessage, silentLogger, type Logger } from "./lib/logger";
import { API_KEY_HEADER, createApiKeyAuth } from "./middleware/apiKeyAuth";
import { createRequestLogger } from "./middleware/requestLogger";
import type { InboxService, ServiceError as InboxError } from "./services/inboxService";
import type { SendService, ServiceError as SendError } from "./services/sendService";
import type { StatusService } from "./services/statusService";

type HttpErrorCode = "UNAUTHORIZED" | "NOT_FOUND" | "METHOD_NOT_ALLOWED" | "PAYLOAD_TOO_LARGE" | "INVALID_INPUT" | "INTERNAL_ERROR";

type HttpError = Readonly<{
  code: HttpErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type AnyServiceError = InboxError | SendError | HttpError;

export type GatewayAppDeps = Readonly<{
  apiKey: string;
  inboxService: InboxService;
  sendService: SendService;
  statusService: StatusService;
  maxBodyBytes?: number;
  nowMs?: () => number;
  logger?: Logger;
}>;

type RouteGroup = Readonly<{
  pattern: RegExp;
  methods: ReadonlyArray<string>;
}>;

const ROUTE_GROUPS: ReadonlyArray<RouteGroup> = [
  { pattern: /^\/status\/?$/, methods: ["GET"] },
  { pattern: /^\/inbox\/?$/, methods: ["GET"] },
  { pattern: /^\/inbox\/[^/]+\/read\/?$/, methods: ["POST"] },
  { pattern: /^\/inbox\/[^/]+\/?$/, methods: ["GET", "DELETE"] },
  { pattern: /^\/send\/?$/, methods: ["POST"] }
];

// Preflight for unknown paths still succeeds; it advertises the union of all methods.
const ALL_METHODS = ["GET", "POST", "DELETE"];

const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

function statusForCode(code: AnyServiceError["code"]): number {
  return code === "UNAUTHORIZED"
    ? 401
    : code === "INVALID_INPUT"
      ? 400
    : code === "OPERATION_FAILED"
      ? 400
    : code === "CAPABILITY_UNAVAILABLE"
      ? 403
    : code === "NOT_FOUND"
      ? 404
    : code === "METHOD_NOT_ALLOWED"
      ? 405
    : code === "PAYLOAD_TOO_LARGE"
      ? 413
    : code === "STORE_ERROR"
      ? 502
    : 500;
}

function sendError(res: Response, error: AnyServiceError, extra: Record<string, unknown> = {}): void {
  res.status(statusForCode(error.code)).json({ success: false, ...extra, error: error.message, code: error.code });
}

function allowedMethodsFor(path: string): ReadonlyArray<string> | null {
  const group = ROUTE_GROUPS.find((g) => g.pattern.test(path));
  return group ? group.methods : null;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

/** Express 4 does not forward rejected promises; route them to the error boundary. */
function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function createGatewayApp(deps: GatewayAppDeps): Express {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? silentLogger;
  const maxBodyBytes = deps.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const { inboxService, sendService, statusService } = deps;

  const requireApiKey = createApiKeyAuth(deps.apiKey, (res) =>
    sendError(res, { code: "UNAUTHORIZED", message: `Unauthorized: missing or invalid ${API_KEY_HEADER}.` })
  );

  const app = express();
  app.disable("x-powered-by");
  app.disable("etag");

  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    if (req.method === "OPTIONS") {
      const methods = allowedMethodsFor(req.path) ?? ALL_METHODS;
      res.setHeader("Access-Control-Allow-Methods", [...methods, "OPTIONS"].join(", "));
      res.setHeader("Access-Control-Allow-Headers", `Content-Type, ${API_KEY_HEADER}`);
      res.status(204).end();
      return;
    }
    next();
  });
  app.use(createRequestLogger(logger, nowMs));

  app.get(
    "/status",
    asyncRoute(async (_req, res) => {
      res.status(200).json(await statusService.getStatus());
    })
  );

  app.get(
    "/inbox",
    requireApiKey,
    asyncRoute(async (req, res) => {
      const listing = await inboxService.list({ limit: req.query.limit, unread: req.query.unread, from: req.query.from });
      res.status(200).json({ ...listing, timestamp: nowMs() });
    })
  );

  app.get(
    "/inbox/:id",
    requireApiKey,
    asyncRoute(async (req, res) => {
      const result = await inboxService.getById(req.params.id);
      if (!result.ok) return sendError(res, result.error);
      res.status(200).json(result.value);
    })
  );

  app.post(
    "/inbox/:id/read",
    requireApiKey,
    asyncRoute(async (req, res) => {
      const id = req.params.id;
      const result = await inboxService.markRead(id);
      if (!result.ok) return sendError(res, result.error, { id });
      res.status(200).json({ success: true, id: result.value.id });
    })
  );

  app.delete(
    "/inbox/:id",
    requireApiKey,
    asyncRoute(async (req, res) => {
      const id = req.params.id;
      const result = await inboxService.delete(id);
      if (!result.ok) return sendError(res, result.error, { id, deleted: false });
      res.status(200).json({ success: true, id: result.value.id, deleted: true });
    })
  );

  app.post(
    "/send",
    requireApiKey,
    express.json({ limit: maxBodyBytes, type: () => true }),
    asyncRoute(async (req, res) => {
      const result = await sendService.send(req.body);
      if (!result.ok) return sendError(res, result.error);
      res.status(200).json(result.value);
    })
  );

  app.use((req, res) => {
    const methods = allowedMethodsFor(req.path);
    if (methods) {
      res.setHeader("Allow", [...methods, "OPTIONS"].join(", "));
      return sendError(res, {
        code: "METHOD_NOT_ALLOWED",
        message: `Method ${req.method} is not allowed on ${req.path}.`
      });
    }
    sendError(res, { code: "NOT_FOUND", message: "Route not found." });
  });

  // Final error boundary.
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isObject(err) && err.type === "entity.parse.failed") {
      return sendError(res, { code: "INVALID_INPUT", message: "Request body is not valid JSON." });
    }
    if (isObject(err) && err.type === "entity.too.large") {
      return sendError(res, { code: "PAYLOAD_TOO_LARGE", message: "Request body is too large.", context: { maxBytes: maxBodyBytes } });
    }
    logger.error(`Unhandled error on ${req.method} ${req.path}: ${errorMessage(err)}`);
    if (res.headersSent) return;
    sendError(res, { code: "INTERNAL_ERROR", message: "Internal server error." });
  });

  return app;
}
