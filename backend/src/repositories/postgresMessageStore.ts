import type { Notification, PoolClient, QueryResult } from "pg";

import { errorMessage, silentLogger, type Logger } from "../lib/logger";
import { MESSAGE_KINDS, type Message, type MessageCounts, type MessageKind, type MessageQuery, type MessageStore } from "../services/inboxService";
import { RECEIVED_CHANNEL } from "./postgresCore";

type Row = Record<string, unknown>;

/** The part of `pg.Pool` the store uses. */
export type MessagePool = {
  query(text: string, values?: unknown[]): Promise<QueryResult<Row>>;
  connect(): Promise<PoolClient>;
};

export type PostgresMessageStoreDeps = Readonly<{
  pool: MessagePool;
  logger?: Logger;
}>;

export type PostgresMessageStore = MessageStore &
  Readonly<{
    /** Releases the LISTEN connection, if one is held. */
    close(): Promise<void>;
  }>;

const MAX_BIGINT = 9_223_372_036_854_775_807n;

function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function asNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
}

function isMessageKind(value: unknown): value is MessageKind {
  return typeof value === "string" && MESSAGE_KINDS.some((kind) => kind === value);
}

/** Ids outside BIGINT range can never match a row, and comparing them raises 22003. */
export function isStorableId(id: string): boolean {
  return /^\d{1,19}$/.test(id) && BigInt(id) <= MAX_BIGINT;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

function parseMessage(row: Row): Message | null {
  // BIGSERIAL ids arrive as strings.
  const id = typeof row.id === "number" ? String(row.id) : asString(row.id);
  const timestamp = asNumber(row.created_at_ms);
  const kind = row.kind;
  if (!id || !Number.isFinite(timestamp) || !isMessageKind(kind)) return null;
  return {
    id,
    threadId: asString(row.thread_id),
    address: asString(row.address),
    body: asString(row.body),
    timestamp,
    read: row.read === true,
    kind
  };
}

const SELECT_COLUMNS = "id, thread_id, address, body, created_at_ms, read, kind";

export function createPostgresMessageStore(deps: PostgresMessageStoreDeps): PostgresMessageStore {
  const pool = deps.pool;
  const logger = deps.logger ?? silentLogger;
  const listeners = new Set<(message: Message) => void>();
  let listenClient: PoolClient | null = null;
  let listenStarting: Promise<void> | null = null;

  function run(text: string, values: unknown[] = []): Promise<QueryResult<Row>> {
    return pool.query(text, values);
  }

  async function fetchById(id: string): Promise<Message | null> {
    if (!isStorableId(id)) return null;
    const res = await run(`SELECT ${SELECT_COLUMNS} FROM sms_messages WHERE id = $1`, [id]);
    const row = res.rows[0];
    return row ? parseMessage(row) : null;
  }

  function handleNotification(notification: Notification): void {
    if (notification.channel !== RECEIVED_CHANNEL) return;
    const id = notification.payload ?? "";
    fetchById(id)
      .then((message) => {
        if (!message) return;
        for (const listener of Array.from(listeners)) listener(message);
      })
      .catch((e: unknown) => {
        logger.error(`Failed to load received message ${id}: ${errorMessage(e)}`);
      });
  }

  async function startListening(): Promise<void> {
    const client = await pool.connect();
    client.on("notification", handleNotification);
    client.on("error", (e: Error) => {
      logger.error(`Message store listener failed: ${e.message}`);
    });
    try {
      await client.query(`LISTEN ${RECEIVED_CHANNEL}`);
    } catch (e: unknown) {
      client.release(true);
      throw e;
    }
    listenClient = client;
  }

  async function stopListening(): Promise<void> {
    if (listenStarting) await listenStarting;
    const client = listenClient;
    listenClient = null;
    if (!client) return;
    try {
      await client.query(`UNLISTEN ${RECEIVED_CHANNEL}`);
      client.release();
    } catch (e: unknown) {
      logger.warn(`Failed to UNLISTEN ${RECEIVED_CHANNEL}: ${errorMessage(e)}`);
      client.release(true);
    }
  }

  return {
    // Asked on every call so a GRANT or REVOKE takes effect immediately.
    async canRead(): Promise<boolean> {
      const res = await run("SELECT has_table_privilege(current_user, 'sms_messages', 'SELECT') AS granted");
      return res.rows[0]?.granted === true;
    },

    async query(query: MessageQuery): Promise<ReadonlyArray<Message>> {
      const clauses = ["kind = 'inbox'"];
      const values: unknown[] = [];
      if (query.fromAddress) {
        values.push(`%${escapeLike(query.fromAddress)}%`);
        clauses.push(`address LIKE $${values.length}`);
      }
      if (query.onlyUnread) clauses.push("read = false");
      values.push(query.limit);
      const res = await run(
        `SELECT ${SELECT_COLUMNS}
         FROM sms_messages
         WHERE ${clauses.join(" AND ")}
         ORDER BY created_at_ms DESC, id DESC
         LIMIT $${values.length}`,
        values
      );
      return res.rows.map(parseMessage).filter((m): m is Message => m !== null);
    },

    async counts(): Promise<MessageCounts> {
      const res = await run(
        `SELECT COUNT(*) AS total, COUNT(*) FILTER (WHERE read = false) AS unread
         FROM sms_messages
         WHERE kind = 'inbox'`
      );
      const row = res.rows[0];
      const total = row ? asNumber(row.total) : 0;
      const unread = row ? asNumber(row.unread) : 0;
      return {
        total: Number.isFinite(total) ? total : 0,
        unread: Number.isFinite(unread) ? unread : 0
      };
    },

    getById(id: string): Promise<Message | null> {
      return fetchById(id);
    },

    async markRead(id: string): Promise<number> {
      if (!isStorableId(id)) return 0;
      const res = await run("UPDATE sms_messages SET read = true WHERE id = $1", [id]);
      return res.rowCount ?? 0;
    },

    async delete(id: string): Promise<number> {
      if (!isStorableId(id)) return 0;
      const res = await run("DELETE FROM sms_messages WHERE id = $1", [id]);
      return res.rowCount ?? 0;
    },

    onReceived(listener: (message: Message) => void): () => void {
      listeners.add(listener);
      if (!listenClient && !listenStarting) {
        listenStarting = startListening()
          .catch((e: unknown) => {
            logger.error(`Failed to LISTEN on ${RECEIVED_CHANNEL}: ${errorMessage(e)}`);
          })
          .finally(() => {
            listenStarting = null;
          });
      }
      return () => {
        listeners.delete(listener);
        if (listeners.size === 0) {
          stopListening().catch((e: unknown) => {
            logger.error(`Failed to stop listening: ${errorMessage(e)}`);
          });
        }
      };
    },

    async close(): Promise<void> {
      listeners.clear();
      await stopListening();
    }
  };
}
