import { errorMessage, silentLogger, type Logger } from "../lib/logger";

export type ServiceState = "running" | "stopped";

export type GatewayStatus = Readonly<{
  status: ServiceState;
  sendCapable: boolean;
  readCapable: boolean;
  port: number;
  eventPort: number;
  timestamp: number;
}>;

export type StatusServiceDeps = Readonly<{
  isRunning: () => boolean;
  canSend: () => boolean;
  canRead: () => Promise<boolean>;
  /** Ports are read on every call: listeners bound to port 0 only know theirs after listen. */
  port: () => number;
  eventPort: () => number;
  nowMs?: () => number;
  logger?: Logger;
}>;

export type StatusService = Readonly<{
  getStatus(): Promise<GatewayStatus>;
}>;

export function createStatusService(deps: StatusServiceDeps): StatusService {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? silentLogger;

  async function readCapable(): Promise<boolean> {
    try {
      return await deps.canRead();
    } catch (e: unknown) {
      logger.warn(`Read capability check failed; reporting it as unavailable: ${errorMessage(e)}`);
      return false;
    }
  }

  return {
    // Nothing is cached; every call asks the collaborators again.
    async getStatus(): Promise<GatewayStatus> {
      return {
        status: deps.isRunning() ? "running" : "stopped",
        sendCapable: deps.canSend(),
        readCapable: await readCapable(),
        port: deps.port(),
        eventPort: deps.eventPort(),
        timestamp: nowMs()
      };
    }
  };
}
