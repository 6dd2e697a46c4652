import type { SendResponsePolicy } from "../services/sendService";

export type TwilioSettings = Readonly<{
  accountSid: string;
  authToken: string;
  fromNumber: string;
}>;

export type GatewaySettings = Readonly<{
  host: string;
  port: number;
  eventPort: number;
  apiKey: string;
  sendResponsePolicy: SendResponsePolicy;
  transportTimeoutMs: number;
  storeTimeoutMs: number;
  eventMaxBufferedBytes: number;
  requireDatabase: boolean;
  /** JSON file backing the in-memory store when no database is configured. */
  messageStoreFile: string | null;
  debug: boolean;
  twilio: TwilioSettings | null;
}>;

export const DEFAULT_PORT = 8888;
export const DEFAULT_TRANSPORT_TIMEOUT_MS = 30_000;
export const DEFAULT_STORE_TIMEOUT_MS = 10_000;
export const DEFAULT_EVENT_MAX_BUFFERED_BYTES = 1024 * 1024;

function trimmed(value: string | undefined): string {
  return typeof value === "string" ? value.trim() : "";
}

function asBoolean(value: string | undefined): boolean {
  return trimmed(value).toLowerCase() === "true";
}

function parsePort(name: string, raw: string | undefined, fallback: number): number {
  const value = trimmed(raw);
  if (value === "") return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 65_535) {
    throw new Error(`${name} must be an integer between 0 and 65535.`);
  }
  return n;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  const value = trimmed(raw);
  if (value === "") return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer.`);
  }
  return n;
}

function parsePolicy(raw: string | undefined): SendResponsePolicy {
  const value = trimmed(raw).toLowerCase();
  if (value === "" || value === "accept") return "accept";
  if (value === "confirm") return "confirm";
  throw new Error('SEND_RESPONSE_POLICY must be "accept" or "confirm".');
}

function resolveTwilio(env: NodeJS.ProcessEnv): TwilioSettings | null {
  const accountSid = trimmed(env.TWILIO_ACCOUNT_SID);
  const authToken = trimmed(env.TWILIO_AUTH_TOKEN);
  const fromNumber = trimmed(env.TWILIO_FROM_NUMBER);
  if (!accountSid || !authToken || !fromNumber) return null;
  return { accountSid, authToken, fromNumber };
}

export function resolveGatewaySettingsFromEnv(env: NodeJS.ProcessEnv = process.env): GatewaySettings {
  const apiKey = env.SMS_GATEWAY_API_KEY;
  if (typeof apiKey !== "string" || apiKey.trim() === "") {
    throw new Error("Missing SMS_GATEWAY_API_KEY environment variable.");
  }

  const port = parsePort("PORT", env.PORT, DEFAULT_PORT);
  // Port 0 asks the OS for an ephemeral port, so the event port cannot be derived from it.
  const eventPort = parsePort("EVENT_PORT", env.EVENT_PORT, port === 0 ? 0 : port + 1);
  if (port !== 0 && eventPort === port) {
    throw new Error("EVENT_PORT must differ from PORT.");
  }

  return {
    host: trimmed(env.HOST) || "0.0.0.0",
    port,
    eventPort,
    // The key is compared byte for byte, so it is kept exactly as given.
    apiKey,
    sendResponsePolicy: parsePolicy(env.SEND_RESPONSE_POLICY),
    transportTimeoutMs: parsePositiveInt("TRANSPORT_TIMEOUT_MS", env.TRANSPORT_TIMEOUT_MS, DEFAULT_TRANSPORT_TIMEOUT_MS),
    storeTimeoutMs: parsePositiveInt("STORE_TIMEOUT_MS", env.STORE_TIMEOUT_MS, DEFAULT_STORE_TIMEOUT_MS),
    eventMaxBufferedBytes: parsePositiveInt(
      "EVENT_MAX_BUFFERED_BYTES",
      env.EVENT_MAX_BUFFERED_BYTES,
      DEFAULT_EVENT_MAX_BUFFERED_BYTES
    ),
    requireDatabase: asBoolean(env.REQUIRE_DATABASE),
    messageStoreFile: trimmed(env.MESSAGE_STORE_FILE) || null,
    debug: asBoolean(env.DEBUG),
    twilio: resolveTwilio(env)
  };
}
