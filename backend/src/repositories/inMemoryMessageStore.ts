import fs from "node:fs";
import path from "node:path";

import { MESSAGE_KINDS, type Message, type MessageCounts, type MessageKind, type MessageQuery, type MessageStore } from "../services/inboxService";

export type InboundInput = Readonly<{
  from: string;
  body: string;
  timestamp?: number;
}>;

export type SeedMessage = Readonly<{
  address: string;
  body: string;
  timestamp: number;
  read?: boolean;
  kind?: MessageKind;
}>;

export type InMemoryMessageStore = MessageStore &
  Readonly<{
    /** Stands in for the platform receiving a message: stores it and notifies listeners. */
    deliverInbound(input: InboundInput): Message;
    /** Stands in for the platform recording a message of any kind, without notifying. */
    seed(message: SeedMessage): Message;
    setReadable(readable: boolean): void;
    size(): number;
  }>;

type MessageStoreOptions = Readonly<{
  /** When set, messages are loaded from and written back to this JSON file. */
  storeFilePath?: string;
  readable?: boolean;
  nowMs?: () => number;
}>;

type StoredMessage = {
  id: string;
  threadId: string;
  address: string;
  body: string;
  timestamp: number;
  read: boolean;
  kind: MessageKind;
  seq: number;
};

function isMessageKind(value: unknown): value is MessageKind {
  return typeof value === "string" && MESSAGE_KINDS.some((kind) => kind === value);
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isMessageLike(v: unknown): v is Message {
  if (!isObject(v)) return false;
  return (
    typeof v.id === "string" &&
    typeof v.threadId === "string" &&
    typeof v.address === "string" &&
    typeof v.body === "string" &&
    typeof v.timestamp === "number" &&
    typeof v.read === "boolean" &&
    isMessageKind(v.kind)
  );
}

function toMessage(stored: StoredMessage): Message {
  return {
    id: stored.id,
    threadId: stored.threadId,
    address: stored.address,
    body: stored.body,
    timestamp: stored.timestamp,
    read: stored.read,
    kind: stored.kind
  };
}

// Newest first; among equal timestamps the later insert wins.
function newestFirst(a: StoredMessage, b: StoredMessage): number {
  return b.timestamp - a.timestamp || b.seq - a.seq;
}

export function createInMemoryMessageStore(options: MessageStoreOptions = {}): InMemoryMessageStore {
  const nowMs = options.nowMs ?? (() => Date.now());
  const storeFilePath = options.storeFilePath;
  const byId = new Map<string, StoredMessage>();
  const threadIdByAddress = new Map<string, string>();
  const listeners = new Set<(message: Message) => void>();
  let readable = options.readable ?? true;
  let lastId = 0;
  let lastThreadId = 0;
  let lastSeq = 0;

  function threadFor(address: string): string {
    const existing = threadIdByAddress.get(address);
    if (existing) return existing;
    lastThreadId += 1;
    const threadId = String(lastThreadId);
    threadIdByAddress.set(address, threadId);
    return threadId;
  }

  function insert(message: Omit<StoredMessage, "seq">): StoredMessage {
    lastSeq += 1;
    const stored: StoredMessage = { ...message, seq: lastSeq };
    byId.set(stored.id, stored);
    const numericId = Number(stored.id);
    if (Number.isInteger(numericId) && numericId > lastId) lastId = numericId;
    const numericThread = Number(stored.threadId);
    if (!threadIdByAddress.has(stored.address)) threadIdByAddress.set(stored.address, stored.threadId);
    if (Number.isInteger(numericThread) && numericThread > lastThreadId) lastThreadId = numericThread;
    return stored;
  }

  function create(address: string, body: string, timestamp: number, read: boolean, kind: MessageKind): StoredMessage {
    return insert({ id: String(lastId + 1), threadId: threadFor(address), address, body, timestamp, read, kind });
  }

  function load(): void {
    if (!storeFilePath || !fs.existsSync(storeFilePath)) return;
    const raw = fs.readFileSync(storeFilePath, "utf8");
    if (!raw.trim()) return;
    const parsed: unknown = JSON.parse(raw);
    if (!isObject(parsed) || parsed.version !== 1 || !Array.isArray(parsed.messages)) {
      throw new Error("Invalid message store format.");
    }
    for (const candidate of parsed.messages) {
      if (!isMessageLike(candidate)) continue;
      insert(candidate);
    }
  }

  // Callers that change existing rows write the next state first and apply it only once the write succeeded.
  function persist(next: ReadonlyArray<StoredMessage> = Array.from(byId.values())): void {
    if (!storeFilePath) return;
    fs.mkdirSync(path.dirname(storeFilePath), { recursive: true });
    const messages = [...next].sort((a, b) => a.seq - b.seq).map(toMessage);
    fs.writeFileSync(storeFilePath, JSON.stringify({ version: 1, messages }), "utf8");
  }

  function inbox(): StoredMessage[] {
    return Array.from(byId.values()).filter((m) => m.kind === "inbox");
  }

  load();

  return {
    async canRead(): Promise<boolean> {
      return readable;
    },

    async query(query: MessageQuery): Promise<ReadonlyArray<Message>> {
      const fromAddress = query.fromAddress;
      return inbox()
        .filter((m) => (query.onlyUnread ? !m.read : true))
        .filter((m) => (fromAddress ? m.address.includes(fromAddress) : true))
        .sort(newestFirst)
        .slice(0, Math.max(0, query.limit))
        .map(toMessage);
    },

    async counts(): Promise<MessageCounts> {
      const all = inbox();
      return { total: all.length, unread: all.filter((m) => !m.read).length };
    },

    async getById(id: string): Promise<Message | null> {
      const stored = byId.get(id);
      return stored ? toMessage(stored) : null;
    },

    async markRead(id: string): Promise<number> {
      const stored = byId.get(id);
      if (!stored) return 0;
      // Already-read rows still count as affected, as a content-provider update does.
      persist(Array.from(byId.values(), (m) => (m === stored ? { ...m, read: true } : m)));
      stored.read = true;
      return 1;
    },

    async delete(id: string): Promise<number> {
      if (!byId.has(id)) return 0;
      persist(Array.from(byId.values()).filter((m) => m.id !== id));
      byId.delete(id);
      return 1;
    },

    onReceived(listener: (message: Message) => void): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    deliverInbound(input: InboundInput): Message {
      const stored = create(input.from, input.body, input.timestamp ?? nowMs(), false, "inbox");
      persist();
      const message = toMessage(stored);
      for (const listener of Array.from(listeners)) listener(message);
      return message;
    },

    seed(message: SeedMessage): Message {
      const stored = create(message.address, message.body, message.timestamp, message.read ?? false, message.kind ?? "inbox");
      persist();
      return toMessage(stored);
    },

    setReadable(next: boolean): void {
      readable = next;
    },

    size(): number {
      return byId.size;
    }
  };
}
