import type { Message } from "../services/inboxService";

export type EventType = "received" | "sent" | "status";

export type ReceivedEventData = Readonly<{
  id: string;
  from: string;
  body: string;
  timestamp: string;
}>;

export type SentEventData = Readonly<{
  messageId: string;
  to: string;
  body: string;
  success: "true" | "false";
  error?: string;
  timestamp: string;
}>;

export type StatusEventData = Readonly<{
  connected: "true";
  clients: string;
}>;

export type GatewayEvent =
  | Readonly<{ type: "received"; data: ReceivedEventData; emittedAt: number }>
  | Readonly<{ type: "sent"; data: SentEventData; emittedAt: number }>
  | Readonly<{ type: "status"; data: StatusEventData; emittedAt: number }>;

/** Wire shape of every server-to-client frame. */
export type ServerFrame = Readonly<{
  type: EventType | "ack";
  data: Readonly<Record<string, string>>;
  timestamp: number;
}>;

export type SentOutcome = Readonly<{
  messageId: string;
  to: string;
  body: string;
  success: boolean;
  error?: string;
  completedAtMs: number;
}>;

export function receivedEvent(message: Message, nowMs: number): GatewayEvent {
  return {
    type: "received",
    data: {
      id: message.id,
      from: message.address,
      body: message.body,
      timestamp: String(message.timestamp)
    },
    emittedAt: nowMs
  };
}

export function sentEvent(outcome: SentOutcome, nowMs: number): GatewayEvent {
  const data: SentEventData = {
    messageId: outcome.messageId,
    to: outcome.to,
    body: outcome.body,
    success: outcome.success ? "true" : "false",
    ...(outcome.success || outcome.error === undefined ? {} : { error: outcome.error }),
    timestamp: String(outcome.completedAtMs)
  };
  return { type: "sent", data, emittedAt: nowMs };
}

export function statusEvent(clients: number, nowMs: number): GatewayEvent {
  return { type: "status", data: { connected: "true", clients: String(clients) }, emittedAt: nowMs };
}

export function encodeEvent(event: GatewayEvent): string {
  const frame: ServerFrame = { type: event.type, data: event.data, timestamp: event.emittedAt };
  return JSON.stringify(frame);
}

export function encodeAck(nowMs: number): string {
  const frame: ServerFrame = { type: "ack", data: { received: "true" }, timestamp: nowMs };
  return JSON.stringify(frame);
}

// Client frames carry no control semantics today; the tags are decoded so that
// logs and future handlers see a closed vocabulary instead of raw strings.
export type ClientFrameType = "ping" | "subscribe" | "unsubscribe";

export type ClientFrame =
  | Readonly<{ kind: "frame"; type: ClientFrameType }>
  | Readonly<{ kind: "unrecognized"; reason: "invalid_json" | "invalid_envelope" | "unknown_type"; type?: string }>;

function safeJsonParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isClientFrameType(value: string): value is ClientFrameType {
  return value === "ping" || value === "subscribe" || value === "unsubscribe";
}

export function decodeClientFrame(text: string): ClientFrame {
  const parsed = safeJsonParse(text);
  if (!parsed.ok) return { kind: "unrecognized", reason: "invalid_json" };
  const value = parsed.value;
  if (!isObject(value)) return { kind: "unrecognized", reason: "invalid_envelope" };
  const type = value.type;
  if (typeof type !== "string") return { kind: "unrecognized", reason: "invalid_envelope" };
  if (!isClientFrameType(type)) return { kind: "unrecognized", reason: "unknown_type", type };
  return { kind: "frame", type };
}
