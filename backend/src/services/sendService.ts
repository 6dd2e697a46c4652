import { errorMessage, silentLogger, type Logger } from "../lib/logger";
import { withTimeout } from "../lib/withTimeout";
import type { SentOutcome } from "../realtime/events";

export type ErrorCode = "INVALID_INPUT" | "CAPABILITY_UNAVAILABLE";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = Readonly<{ ok: true; value: T }>;
type ResultErr = Readonly<{ ok: false; error: ServiceError }>;
export type Result<T> = ResultOk<T> | ResultErr;

export type TransportResult = Readonly<{ ok: true } | { ok: false; error: string }>;

export type MessageTransport = Readonly<{
  /** False when the device or provider cannot send at all (no telephony, no credentials). */
  canSend(): boolean;
  send(to: string, body: string): Promise<TransportResult>;
}>;

/**
 * `accept` answers as soon as the request is validated; the delivery outcome only
 * reaches subscribers. `confirm` waits for the transport and reports its outcome.
 */
export type SendResponsePolicy = "accept" | "confirm";

export type SendResponse = Readonly<{
  success: boolean;
  messageId: string;
  error?: string;
  timestamp: number;
}>;

export type SendServiceDeps = Readonly<{
  transport: MessageTransport;
  onSent: (outcome: SentOutcome) => void;
  policy?: SendResponsePolicy;
  transportTimeoutMs?: number;
  nowMs?: () => number;
  random?: () => number;
  logger?: Logger;
}>;

export type SendService = Readonly<{
  send(input: unknown): Promise<Result<SendResponse>>;
  /** Resolves once every dispatched transport call has settled and been reported. */
  idle(): Promise<void>;
}>;

const DEFAULT_TRANSPORT_TIMEOUT_MS = 30_000;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  return { ok: false, error: context ? { code, message, context } : { code, message } };
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function asTrimmedString(v: unknown): string | null {
  if (typeof v !== "string") return null;
  const t = v.trim();
  return t.length ? t : null;
}

/** `sms_<epoch millis>_<1000..9999>`. Unique within a run with overwhelming probability, not across restarts. */
export function generateMessageId(nowMs: number, random: () => number = Math.random): string {
  const suffix = 1000 + Math.floor(random() * 9000);
  return `sms_${nowMs}_${Math.min(suffix, 9999)}`;
}

export function createSendService(deps: SendServiceDeps): SendService {
  const policy = deps.policy ?? "accept";
  const transportTimeoutMs = deps.transportTimeoutMs ?? DEFAULT_TRANSPORT_TIMEOUT_MS;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const random = deps.random ?? Math.random;
  const logger = deps.logger ?? silentLogger;
  const inFlight = new Set<Promise<SentOutcome>>();

  async function dispatch(messageId: string, to: string, body: string): Promise<SentOutcome> {
    let result: TransportResult;
    try {
      result = await withTimeout(deps.transport.send(to, body), transportTimeoutMs, "Transport send");
    } catch (e: unknown) {
      result = { ok: false, error: errorMessage(e) };
    }

    const outcome: SentOutcome = result.ok
      ? { messageId, to, body, success: true, completedAtMs: nowMs() }
      : { messageId, to, body, success: false, error: result.error, completedAtMs: nowMs() };

    if (outcome.success) {
      logger.info(`Message ${messageId} sent to ${to}`);
    } else {
      logger.warn(`Message ${messageId} to ${to} failed: ${outcome.error ?? "unknown error"}`);
    }

    try {
      deps.onSent(outcome);
    } catch (e: unknown) {
      logger.error(`Failed to report outcome of ${messageId}: ${errorMessage(e)}`);
    }
    return outcome;
  }

  function track(work: Promise<SentOutcome>): Promise<SentOutcome> {
    inFlight.add(work);
    void work.finally(() => inFlight.delete(work));
    return work;
  }

  return {
    async send(input: unknown): Promise<Result<SendResponse>> {
      if (!isObject(input)) {
        return err("INVALID_INPUT", "Request body must be a JSON object.");
      }
      const to = asTrimmedString(input.to);
      // The body is sent exactly as given; only blank bodies are rejected.
      const body = typeof input.message === "string" && input.message.trim() !== "" ? input.message : null;
      if (!to || !body) {
        return err("INVALID_INPUT", "Both 'to' and 'message' are required.", {
          missing: [...(to ? [] : ["to"]), ...(body ? [] : ["message"])]
        });
      }
      if (!deps.transport.canSend()) {
        return err("CAPABILITY_UNAVAILABLE", "Sending messages is not available on this device.");
      }

      const messageId = generateMessageId(nowMs(), random);
      const work = track(dispatch(messageId, to, body));

      if (policy === "accept") {
        return ok({ success: true, messageId, timestamp: nowMs() });
      }

      const outcome = await work;
      return ok({
        success: outcome.success,
        messageId,
        ...(outcome.error === undefined ? {} : { error: outcome.error }),
        timestamp: nowMs()
      });
    },

    async idle(): Promise<void> {
      while (inFlight.size > 0) {
        await Promise.allSettled(Array.from(inFlight));
      }
    }
  };
}
