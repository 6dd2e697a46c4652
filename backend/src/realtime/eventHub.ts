import type { IncomingMessage } from "node:http";
import { WebSocket, type RawData, type WebSocketServer } from "ws";

import { errorMessage, silentLogger, type Logger } from "../lib/logger";
import { decodeClientFrame, encodeAck, encodeEvent, statusEvent, type GatewayEvent } from "./events";

export type EventHubDeps = Readonly<{
  wss: WebSocketServer;
  /** A subscriber whose unsent output grows past this is considered stalled and dropped. */
  maxBufferedBytes?: number;
  maxIncomingPayloadBytes?: number;
  heartbeatIntervalMs?: number;
  closeGraceMs?: number;
  nowMs?: () => number;
  logger?: Logger;
}>;

export type EventHub = Readonly<{
  /** Enqueues an event for every open subscriber. Never throws and never waits on sockets. */
  publish(event: GatewayEvent): void;
  subscriberCount(): number;
  /** Resolves once every event published so far has been handed to the sockets. */
  flush(): Promise<void>;
  close(): Promise<void>;
}>;

type Subscriber = {
  readonly ws: WebSocket;
  readonly label: string;
  /** Sequence number of the last event published before this subscriber opened. */
  readonly joinedAfterSeq: number;
  alive: boolean;
};

type QueuedEvent = Readonly<{ seq: number; event: GatewayEvent }>;

const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;
const DEFAULT_MAX_INCOMING_PAYLOAD_BYTES = 4 * 1024;
const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
const DEFAULT_CLOSE_GRACE_MS = 2_000;

function rawDataToBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (Buffer.isBuffer(data)) return data;
  return Buffer.from(data);
}

function describePeer(req: IncomingMessage): string {
  const address = req.socket.remoteAddress ?? "unknown";
  const port = req.socket.remotePort;
  return typeof port === "number" ? `${address}:${port}` : address;
}

export function createEventHub(deps: EventHubDeps): EventHub {
  const maxBufferedBytes = deps.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
  const maxIncomingPayloadBytes = deps.maxIncomingPayloadBytes ?? DEFAULT_MAX_INCOMING_PAYLOAD_BYTES;
  const heartbeatIntervalMs = deps.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
  const closeGraceMs = deps.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? silentLogger;

  if (!Number.isFinite(maxBufferedBytes) || maxBufferedBytes <= 0) {
    throw new Error("eventHub requires a positive maxBufferedBytes.");
  }
  if (!Number.isFinite(maxIncomingPayloadBytes) || maxIncomingPayloadBytes <= 0) {
    throw new Error("eventHub requires a positive maxIncomingPayloadBytes.");
  }
  if (!Number.isFinite(heartbeatIntervalMs) || heartbeatIntervalMs <= 0) {
    throw new Error("eventHub requires a positive heartbeatIntervalMs.");
  }

  const subscribers = new Map<WebSocket, Subscriber>();
  const queue: QueuedEvent[] = [];
  let lastSeq = 0;
  let drainHandle: NodeJS.Immediate | null = null;
  let drainWaiters: Array<() => void> = [];
  let closed = false;

  function drop(subscriber: Subscriber, reason: string): void {
    if (!subscribers.delete(subscriber.ws)) return;
    logger.warn(`Dropping subscriber ${subscriber.label}: ${reason}`);
    subscriber.ws.terminate();
  }

  function deliver(subscriber: Subscriber, frame: string): void {
    const ws = subscriber.ws;
    if (ws.readyState !== WebSocket.OPEN) return;
    if (ws.bufferedAmount > maxBufferedBytes) {
      drop(subscriber, `output buffer exceeded ${maxBufferedBytes} bytes`);
      return;
    }
    try {
      ws.send(frame, (error?: Error) => {
        if (error) drop(subscriber, `send failed: ${error.message}`);
      });
    } catch (e: unknown) {
      drop(subscriber, `send failed: ${errorMessage(e)}`);
    }
  }

  function drain(): void {
    drainHandle = null;
    const batch = queue.splice(0, queue.length);
    for (const { seq, event } of batch) {
      const frame = encodeEvent(event);
      // Iterate a snapshot: drop() mutates the map while we walk it.
      for (const subscriber of Array.from(subscribers.values())) {
        if (subscriber.joinedAfterSeq >= seq) continue;
        deliver(subscriber, frame);
      }
    }
    const waiters = drainWaiters;
    drainWaiters = [];
    for (const resolve of waiters) resolve();
  }

  function scheduleDrain(): void {
    if (drainHandle) return;
    drainHandle = setImmediate(drain);
  }

  function publish(event: GatewayEvent): void {
    if (closed) {
      logger.debug(`Event hub closed; discarding "${event.type}" event.`);
      return;
    }
    lastSeq += 1;
    queue.push({ seq: lastSeq, event });
    scheduleDrain();
  }

  function handleInbound(subscriber: Subscriber, data: RawData): void {
    const buffer = rawDataToBuffer(data);
    if (buffer.byteLength > maxIncomingPayloadBytes) {
      logger.warn(`Subscriber ${subscriber.label} sent ${buffer.byteLength} bytes; frame ignored.`);
    } else {
      const frame = decodeClientFrame(buffer.toString("utf8"));
      if (frame.kind === "frame") {
        logger.debug(`Subscriber ${subscriber.label} sent "${frame.type}".`);
      } else {
        logger.debug(`Subscriber ${subscriber.label} sent an unrecognized frame (${frame.reason}).`);
      }
    }
    deliver(subscriber, encodeAck(nowMs()));
  }

  deps.wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    if (closed) {
      ws.close(1001, "Server shutting down");
      return;
    }

    const subscriber: Subscriber = { ws, label: describePeer(req), joinedAfterSeq: lastSeq, alive: true };
    subscribers.set(ws, subscriber);
    logger.info(`Subscriber connected: ${subscriber.label} (${subscribers.size} open)`);

    ws.on("pong", () => {
      subscriber.alive = true;
    });
    ws.on("message", (data: RawData) => handleInbound(subscriber, data));
    ws.on("close", () => {
      if (subscribers.delete(ws)) {
        logger.info(`Subscriber disconnected: ${subscriber.label} (${subscribers.size} open)`);
      }
    });
    ws.on("error", (error: Error) => drop(subscriber, `socket error: ${error.message}`));

    publish(statusEvent(subscribers.size, nowMs()));
  });

  const heartbeatTimer = setInterval(() => {
    for (const subscriber of Array.from(subscribers.values())) {
      if (!subscriber.alive) {
        drop(subscriber, "heartbeat timeout");
        continue;
      }
      subscriber.alive = false;
      try {
        subscriber.ws.ping();
      } catch (e: unknown) {
        drop(subscriber, `ping failed: ${errorMessage(e)}`);
      }
    }
  }, heartbeatIntervalMs);
  heartbeatTimer.unref();

  return {
    publish,

    subscriberCount(): number {
      return subscribers.size;
    },

    flush(): Promise<void> {
      if (!drainHandle) return Promise.resolve();
      return new Promise<void>((resolve) => {
        drainWaiters.push(resolve);
      });
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      clearInterval(heartbeatTimer);
      if (drainHandle) {
        clearImmediate(drainHandle);
        drain();
      }

      for (const subscriber of subscribers.values()) {
        subscriber.ws.close(1001, "Server shutting down");
      }
      const graceTimer = setTimeout(() => {
        for (const subscriber of subscribers.values()) subscriber.ws.terminate();
      }, closeGraceMs);
      graceTimer.unref();

      await new Promise<void>((resolve) => deps.wss.close(() => resolve()));
      clearTimeout(graceTimer);
      subscribers.clear();
    }
  };
}
