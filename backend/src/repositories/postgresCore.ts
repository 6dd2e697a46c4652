import { Pool } from "pg";

export type PostgresSettings = Readonly<{
  connectionString: string;
  ssl?: boolean;
}>;

export const RECEIVED_CHANNEL = "sms_received";

function asBoolean(value: string | undefined): boolean {
  return typeof value === "string" && value.trim().toLowerCase() === "true";
}

export function resolvePostgresSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): PostgresSettings | null {
  const dbUrl = env.DATABASE_URL;
  if (typeof dbUrl !== "string" || dbUrl.trim() === "") {
    return null;
  }
  return {
    connectionString: dbUrl.trim(),
    ssl: asBoolean(env.DATABASE_SSL)
  };
}

export function createPostgresPool(settings: PostgresSettings): Pool {
  return new Pool({
    connectionString: settings.connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
    ssl: settings.ssl === true ? { rejectUnauthorized: false } : undefined
  });
}

export async function ensurePostgresSchema(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS sms_messages (
      id BIGSERIAL PRIMARY KEY,
      thread_id TEXT NOT NULL,
      address TEXT NOT NULL,
      body TEXT NOT NULL,
      created_at_ms BIGINT NOT NULL,
      read BOOLEAN NOT NULL DEFAULT false,
      kind TEXT NOT NULL
    )
  `);
  await pool.query("CREATE INDEX IF NOT EXISTS idx_sms_messages_kind_created_at_ms ON sms_messages(kind, created_at_ms DESC)");
  await pool.query("CREATE INDEX IF NOT EXISTS idx_sms_messages_address ON sms_messages(address)");

  // Every inbound row announces its id on the received channel.
  await pool.query(`
    CREATE OR REPLACE FUNCTION notify_sms_received() RETURNS trigger AS $$
    BEGIN
      IF NEW.kind = 'inbox' THEN
        PERFORM pg_notify('${RECEIVED_CHANNEL}', NEW.id::text);
      END IF;
      RETURN NEW;
    END;
    $$ LANGUAGE plpgsql
  `);
  await pool.query("DROP TRIGGER IF EXISTS sms_messages_received ON sms_messages");
  await pool.query(`
    CREATE TRIGGER sms_messages_received
    AFTER INSERT ON sms_messages
    FOR EACH ROW EXECUTE FUNCTION notify_sms_received()
  `);
}
