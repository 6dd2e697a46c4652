import { silentLogger, type Logger } from "../../lib/logger";
import type { MessageTransport, TransportResult } from "../sendService";

export type LoopbackTransportDeps = Readonly<{
  logger?: Logger;
}>;

/** Development transport: nothing leaves the process, every send is logged and reported ok. */
export function createLoopbackTransport(deps: LoopbackTransportDeps = {}): MessageTransport {
  const logger = deps.logger ?? silentLogger;
  return {
    canSend(): boolean {
      return true;
    },
    async send(to: string, body: string): Promise<TransportResult> {
      logger.info(`Loopback transport: message to ${to} (${body.length} chars) not delivered.`);
      return { ok: true };
    }
  };
}
