import { errorMessage, silentLogger, type Logger } from "../lib/logger";
import { receivedEvent, type GatewayEvent } from "../realtime/events";
import type { MessageStore } from "./inboxService";

export type InboundRelayDeps = Readonly<{
  store: Pick<MessageStore, "onReceived">;
  publish: (event: GatewayEvent) => void;
  nowMs?: () => number;
  logger?: Logger;
}>;

export type InboundRelay = Readonly<{
  stop(): void;
}>;

/** Turns every message the store reports as newly received into a `received` event. */
export function startInboundRelay(deps: InboundRelayDeps): InboundRelay {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? silentLogger;

  const unsubscribe = deps.store.onReceived((message) => {
    logger.info(`Message ${message.id} received from ${message.address}`);
    try {
      deps.publish(receivedEvent(message, nowMs()));
    } catch (e: unknown) {
      logger.error(`Failed to publish received message ${message.id}: ${errorMessage(e)}`);
    }
  });

  let stopped = false;
  return {
    stop(): void {
      if (stopped) return;
      stopped = true;
      unsubscribe();
    }
  };
}
