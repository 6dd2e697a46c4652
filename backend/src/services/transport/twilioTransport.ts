import type { MessageTransport, TransportResult } from "../sendService";

export type TwilioTransportDeps = Readonly<{
  accountSid: string;
  authToken: string;
  fromNumber: string;
  apiBaseUrl?: string;
  fetchFn?: typeof fetch;
}>;

const DEFAULT_API_BASE_URL = "https://api.twilio.com";
const MAX_ERROR_TEXT_LENGTH = 300;

function describeFailure(status: number, text: string): string {
  const compact = text.replace(/\s+/g, " ").trim();
  const clipped = compact.length > MAX_ERROR_TEXT_LENGTH ? `${compact.slice(0, MAX_ERROR_TEXT_LENGTH)}...` : compact;
  return clipped ? `Twilio ${status}: ${clipped}` : `Twilio ${status}`;
}

/** Sends through the Twilio Messages REST API. */
export function createTwilioTransport(deps: TwilioTransportDeps): MessageTransport {
  const fetchFn = deps.fetchFn ?? fetch;
  const apiBaseUrl = (deps.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
  const configured = [deps.accountSid, deps.authToken, deps.fromNumber].every((v) => v.trim() !== "");
  const url = `${apiBaseUrl}/2010-04-01/Accounts/${encodeURIComponent(deps.accountSid)}/Messages.json`;
  const auth = Buffer.from(`${deps.accountSid}:${deps.authToken}`).toString("base64");

  return {
    canSend(): boolean {
      return configured;
    },

    async send(to: string, body: string): Promise<TransportResult> {
      if (!configured) return { ok: false, error: "Twilio transport is not configured." };
      const res = await fetchFn(url, {
        method: "POST",
        headers: {
          authorization: `Basic ${auth}`,
          "content-type": "application/x-www-form-urlencoded"
        },
        body: new URLSearchParams({ To: to, From: deps.fromNumber.trim(), Body: body })
      });
      if (!res.ok) {
        const text = await res.text();
        return { ok: false, error: describeFailure(res.status, text) };
      }
      return { ok: true };
    }
  };
}
