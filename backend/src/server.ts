import path from "node:path";

import { resolveGatewaySettingsFromEnv } from "./config/gatewaySettings";
import { startGateway } from "./gateway";
import { createConsoleLogger, errorMessage } from "./lib/logger";
import { createInMemoryMessageStore } from "./repositories/inMemoryMessageStore";
import { createPostgresMessageStore, type PostgresMessageStore } from "./repositories/postgresMessageStore";
import { createPostgresPool, ensurePostgresSchema, resolvePostgresSettingsFromEnv } from "./repositories/postgresCore";
import type { MessageStore } from "./services/inboxService";
import { createLoopbackTransport } from "./services/transport/loopbackTransport";
import { createTwilioTransport } from "./services/transport/twilioTransport";

async function main(): Promise<void> {
  const settings = resolveGatewaySettingsFromEnv();
  const logger = createConsoleLogger({ debug: settings.debug });

  const postgresSettings = resolvePostgresSettingsFromEnv();
  if (settings.requireDatabase && !postgresSettings) {
    throw new Error("REQUIRE_DATABASE=true but no PostgreSQL URL was found. Set DATABASE_URL.");
  }
  const postgresPool = postgresSettings ? createPostgresPool(postgresSettings) : null;
  let postgresStore: PostgresMessageStore | null = null;
  let store: MessageStore;
  if (postgresPool) {
    await ensurePostgresSchema(postgresPool);
    postgresStore = createPostgresMessageStore({ pool: postgresPool, logger });
    store = postgresStore;
    logger.info("Message store: PostgreSQL");
  } else if (settings.messageStoreFile) {
    store = createInMemoryMessageStore({ storeFilePath: path.resolve(settings.messageStoreFile) });
    logger.info(`Message store: local file ${settings.messageStoreFile}`);
  } else {
    store = createInMemoryMessageStore();
    logger.info("Message store: in-memory");
  }

  const transport = settings.twilio ? createTwilioTransport(settings.twilio) : createLoopbackTransport({ logger });
  if (!settings.twilio) {
    logger.warn("Twilio not configured. Outbound messages go to the loopback transport.");
  }

  const gateway = await startGateway({ options: settings, store, transport, logger });

  const shutdown = async (): Promise<void> => {
    await gateway.close();
    if (postgresStore) await postgresStore.close();
    if (postgresPool) await postgresPool.end();
  };

  const onSignal = (): void => {
    shutdown()
      .catch((e: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(e)}`);
        process.exitCode = 1;
      })
      .finally(() => process.exit());
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((e: unknown) => {
  console.error(`[SmsGateway] Failed to start: ${errorMessage(e)}`);
  process.exit(1);
});
