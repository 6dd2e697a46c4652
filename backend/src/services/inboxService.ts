import { errorMessage, silentLogger, type Logger } from "../lib/logger";
import { withTimeout } from "../lib/withTimeout";

export type ErrorCode = "INVALID_INPUT" | "NOT_FOUND" | "CAPABILITY_UNAVAILABLE" | "OPERATION_FAILED" | "STORE_ERROR";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = Readonly<{ ok: true; value: T }>;
type ResultErr = Readonly<{ ok: false; error: ServiceError }>;
export type Result<T> = ResultOk<T> | ResultErr;

export const MESSAGE_KINDS = ["inbox", "sent", "draft", "outbox", "failed"] as const;
export type MessageKind = (typeof MESSAGE_KINDS)[number];

export type Message = Readonly<{
  id: string;
  threadId: string;
  address: string;
  body: string;
  timestamp: number;
  read: boolean;
  kind: MessageKind;
}>;

/** Filters applied to the inbox folder. Results are newest first and at most `limit` long. */
export type MessageQuery = Readonly<{
  limit: number;
  onlyUnread: boolean;
  fromAddress?: string;
}>;

export type MessageCounts = Readonly<{
  total: number;
  unread: number;
}>;

export type MessageStore = Readonly<{
  /** False while read access to the device store has not been granted. Re-derived on every call. */
  canRead(): Promise<boolean>;
  query(query: MessageQuery): Promise<ReadonlyArray<Message>>;
  /** Counts over the whole inbox folder, ignoring any filter. */
  counts(): Promise<MessageCounts>;
  getById(id: string): Promise<Message | null>;
  /** Returns the number of rows affected. */
  markRead(id: string): Promise<number>;
  /** Returns the number of rows affected. */
  delete(id: string): Promise<number>;
  /** Subscribes to newly received messages. Returns the unsubscribe function. */
  onReceived(listener: (message: Message) => void): () => void;
}>;

export type InboxListing = Readonly<{
  messages: ReadonlyArray<Message>;
  totalCount: number;
  unreadCount: number;
}>;

export type ListInput = Readonly<{
  limit?: unknown;
  unread?: unknown;
  from?: unknown;
}>;

export type InboxServiceDeps = Readonly<{
  store: MessageStore;
  storeTimeoutMs?: number;
  logger?: Logger;
}>;

export type InboxService = Readonly<{
  list(input: ListInput): Promise<InboxListing>;
  getById(id: unknown): Promise<Result<Message>>;
  markRead(id: unknown): Promise<Result<{ id: string }>>;
  delete(id: unknown): Promise<Result<{ id: string }>>;
}>;

export const DEFAULT_LIST_LIMIT = 50;
const DEFAULT_STORE_TIMEOUT_MS = 10_000;

const EMPTY_LISTING: InboxListing = { messages: [], totalCount: 0, unreadCount: 0 };

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  return { ok: false, error: context ? { code, message, context } : { code, message } };
}

function asTrimmedString(v: unknown): string | null {
  if (typeof v !== "string") return null;
  const t = v.trim();
  return t.length ? t : null;
}

// No upper bound: callers may ask for as many rows as the store holds.
export function parseLimit(raw: unknown): number {
  const text = typeof raw === "number" ? String(raw) : asTrimmedString(raw);
  if (text === null) return DEFAULT_LIST_LIMIT;
  const n = Number(text);
  if (!Number.isInteger(n) || n <= 0) return DEFAULT_LIST_LIMIT;
  return n;
}

export function parseUnreadFlag(raw: unknown): boolean {
  if (raw === true) return true;
  const text = asTrimmedString(raw);
  if (text === null) return false;
  const lowered = text.toLowerCase();
  return lowered === "true" || lowered === "1";
}

export function createInboxService(deps: InboxServiceDeps): InboxService {
  const storeTimeoutMs = deps.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
  const logger = deps.logger ?? silentLogger;
  const store = deps.store;

  function bounded<T>(work: Promise<T>, label: string): Promise<T> {
    return withTimeout(work, storeTimeoutMs, `Message store ${label}`);
  }

  async function denyUnreadable(op: string): Promise<ResultErr | null> {
    let readable: boolean;
    try {
      readable = await bounded(store.canRead(), "canRead");
    } catch (e: unknown) {
      logger.error(`Message store access check failed before ${op}: ${errorMessage(e)}`);
      return err("STORE_ERROR", "Message store is unavailable.");
    }
    return readable ? null : err("CAPABILITY_UNAVAILABLE", "Read access to the message store has not been granted.");
  }

  async function mutate(rawId: unknown, op: "markRead" | "delete"): Promise<Result<{ id: string }>> {
    const id = asTrimmedString(rawId);
    if (!id) return err("INVALID_INPUT", "Message id is required.");
    const denied = await denyUnreadable(op);
    if (denied) return denied;

    let affected: number;
    try {
      affected = await bounded(op === "markRead" ? store.markRead(id) : store.delete(id), op);
    } catch (e: unknown) {
      logger.error(`Message store ${op} failed for ${id}: ${errorMessage(e)}`);
      return err("STORE_ERROR", "Message store is unavailable.");
    }

    if (affected < 1) {
      const message = op === "markRead" ? "Failed to mark message as read." : "Failed to delete message.";
      return err("OPERATION_FAILED", message, { id });
    }
    return ok({ id });
  }

  return {
    async list(input: ListInput): Promise<InboxListing> {
      const fromAddress = asTrimmedString(input.from) ?? undefined;
      const query: MessageQuery = {
        limit: parseLimit(input.limit),
        onlyUnread: parseUnreadFlag(input.unread),
        ...(fromAddress ? { fromAddress } : {})
      };

      try {
        if (!(await bounded(store.canRead(), "canRead"))) {
          logger.warn("Inbox listing requested without read access; returning an empty inbox.");
          return EMPTY_LISTING;
        }
        const [messages, counts] = await Promise.all([bounded(store.query(query), "query"), bounded(store.counts(), "counts")]);
        return { messages, totalCount: counts.total, unreadCount: counts.unread };
      } catch (e: unknown) {
        logger.error(`Inbox listing failed; returning an empty inbox: ${errorMessage(e)}`);
        return EMPTY_LISTING;
      }
    },

    async getById(rawId: unknown): Promise<Result<Message>> {
      const id = asTrimmedString(rawId);
      if (!id) return err("INVALID_INPUT", "Message id is required.");
      const denied = await denyUnreadable("getById");
      if (denied) return denied;

      let message: Message | null;
      try {
        message = await bounded(store.getById(id), "getById");
      } catch (e: unknown) {
        logger.error(`Message store getById failed for ${id}: ${errorMessage(e)}`);
        return err("STORE_ERROR", "Message store is unavailable.");
      }
      if (!message) return err("NOT_FOUND", "Message not found.", { id });
      return ok(message);
    },

    markRead(rawId: unknown): Promise<Result<{ id: string }>> {
      return mutate(rawId, "markRead");
    },

    delete(rawId: unknown): Promise<Result<{ id: string }>> {
      return mutate(rawId, "delete");
    }
  };
}
