import http from "node:http";

import { WebSocketServer } from "ws";

import { createGatewayApp } from "./app";
import type { GatewaySettings } from "./config/gatewaySettings";
import { silentLogger, type Logger } from "./lib/logger";
import { withTimeout } from "./lib/withTimeout";
import { createEventHub, type EventHub } from "./realtime/eventHub";
import { sentEvent } from "./realtime/events";
import { createInboxService, type MessageStore } from "./services/inboxService";
import { startInboundRelay } from "./services/inboundRelay";
import { createSendService, type MessageTransport } from "./services/sendService";
import { createStatusService } from "./services/statusService";

export type GatewayOptions = Pick<
  GatewaySettings,
  | "host"
  | "port"
  | "eventPort"
  | "apiKey"
  | "sendResponsePolicy"
  | "transportTimeoutMs"
  | "storeTimeoutMs"
  | "eventMaxBufferedBytes"
>;

export type GatewayDeps = Readonly<{
  options: GatewayOptions;
  store: MessageStore;
  transport: MessageTransport;
  heartbeatIntervalMs?: number;
  nowMs?: () => number;
  logger?: Logger;
}>;

export type RunningGateway = Readonly<{
  port: number;
  eventPort: number;
  hub: EventHub;
  /** Stops both listeners, closes subscribers and waits for pending sends. Idempotent. */
  close(): Promise<void>;
}>;

// Frames above the cap close the socket with 1009; frames above the decode limit are acked undecoded.
const MAX_EVENT_FRAME_BYTES = 64 * 1024;
const MAX_DECODED_FRAME_BYTES = 4 * 1024;

function listen(server: http.Server, port: number, host: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

function boundPort(server: http.Server, fallback: number): number {
  const address = server.address();
  return address !== null && typeof address === "object" ? address.port : fallback;
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (!server.listening) return resolve();
    server.close((e?: Error) => (e ? reject(e) : resolve()));
  });
}

export async function startGateway(deps: GatewayDeps): Promise<RunningGateway> {
  const { options, store, transport } = deps;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? silentLogger;

  const eventHttpServer = http.createServer((_req, res) => {
    res.writeHead(426, { "content-type": "application/json", "access-control-allow-origin": "*" });
    res.end(JSON.stringify({ success: false, error: "Upgrade to WebSocket required.", code: "UPGRADE_REQUIRED" }));
  });
  let acceptingSubscribers = true;
  const wss = new WebSocketServer({
    server: eventHttpServer,
    maxPayload: MAX_EVENT_FRAME_BYTES,
    verifyClient: (_info: unknown, done: (result: boolean, code?: number, message?: string) => void): void => {
      if (acceptingSubscribers) return done(true);
      done(false, 503, "Server shutting down");
    }
  });
  const hub = createEventHub({
    wss,
    maxBufferedBytes: options.eventMaxBufferedBytes,
    maxIncomingPayloadBytes: MAX_DECODED_FRAME_BYTES,
    heartbeatIntervalMs: deps.heartbeatIntervalMs,
    nowMs,
    logger
  });

  const sendService = createSendService({
    transport,
    policy: options.sendResponsePolicy,
    transportTimeoutMs: options.transportTimeoutMs,
    nowMs,
    logger,
    onSent: (outcome) => hub.publish(sentEvent(outcome, nowMs()))
  });
  const inboxService = createInboxService({ store, storeTimeoutMs: options.storeTimeoutMs, logger });

  const httpServer = http.createServer();
  const statusService = createStatusService({
    isRunning: () => httpServer.listening,
    canSend: () => transport.canSend(),
    canRead: () => withTimeout(store.canRead(), options.storeTimeoutMs, "Message store canRead"),
    port: () => boundPort(httpServer, options.port),
    eventPort: () => boundPort(eventHttpServer, options.eventPort),
    nowMs,
    logger
  });
  httpServer.on("request", createGatewayApp({ apiKey: options.apiKey, inboxService, sendService, statusService, nowMs, logger }));

  const relay = startInboundRelay({ store, publish: hub.publish, nowMs, logger });

  try {
    await listen(httpServer, options.port, options.host);
    await listen(eventHttpServer, options.eventPort, options.host);
  } catch (e: unknown) {
    relay.stop();
    await hub.close();
    await Promise.all([closeServer(httpServer), closeServer(eventHttpServer)]);
    throw e;
  }

  const port = boundPort(httpServer, options.port);
  const eventPort = boundPort(eventHttpServer, options.eventPort);
  logger.info(
    `Gateway listening on http://${options.host}:${port} (events on ws://${options.host}:${eventPort}, send policy ${options.sendResponsePolicy})`
  );

  let closing: Promise<void> | null = null;
  async function shutdown(): Promise<void> {
    logger.info("Shutting down.");
    relay.stop();
    acceptingSubscribers = false;
    // New HTTP connections are refused from here on; in-flight requests still complete.
    const httpClosed = closeServer(httpServer);
    // Existing subscribers stay open until pending sends have reported their outcome.
    await sendService.idle();
    await hub.close();
    await Promise.all([httpClosed, closeServer(eventHttpServer)]);
  }

  return {
    port,
    eventPort,
    hub,
    close(): Promise<void> {
      closing ??= shutdown();
      return closing;
    }
  };
}
