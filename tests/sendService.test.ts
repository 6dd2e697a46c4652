import type { SentOutcome } from "../backend/src/realtime/events";
import {
  createSendService,
  generateMessageId,
  type MessageTransport,
  type TransportResult
} from "../backend/src/services/sendService";

type Deferred<T> = { promise: Promise<T>; resolve(value: T): void };

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function fakeTransport(
  send: (to: string, body: string) => Promise<TransportResult>,
  canSend = true
): MessageTransport & { calls: Array<{ to: string; body: string }> } {
  const calls: Array<{ to: string; body: string }> = [];
  return {
    calls,
    canSend: () => canSend,
    send(to: string, body: string): Promise<TransportResult> {
      calls.push({ to, body });
      return send(to, body);
    }
  };
}

describe("sendService", () => {
  it("Given a clock and random source When generateMessageId is called Then it uses the sms_<millis>_<4 digits> format", () => {
    expect(generateMessageId(1_700_000_000_000, () => 0)).toBe("sms_1700000000000_1000");
    expect(generateMessageId(1_700_000_000_000, () => 0.5)).toBe("sms_1700000000000_5500");
    expect(generateMessageId(1_700_000_000_000, () => 0.99999999)).toBe("sms_1700000000000_9999");
    expect(generateMessageId(Date.now())).toMatch(/^sms_\d+_\d{4}$/);
  });

  it("Given the accept policy When send is called Then it answers before the transport settles and reports the outcome later", async () => {
    const pending = deferred<TransportResult>();
    const transport = fakeTransport(() => pending.promise);
    const outcomes: SentOutcome[] = [];
    const svc = createSendService({
      transport,
      policy: "accept",
      nowMs: () => 1_000,
      random: () => 0,
      onSent: (o) => outcomes.push(o)
    });

    const res = await svc.send({ to: "+15551234567", message: "hi" });

    expect(res).toEqual({ ok: true, value: { success: true, messageId: "sms_1000_1000", timestamp: 1_000 } });
    expect(transport.calls).toEqual([{ to: "+15551234567", body: "hi" }]);
    expect(outcomes).toEqual([]);

    pending.resolve({ ok: false, error: "no signal" });
    await svc.idle();

    expect(outcomes).toEqual([
      { messageId: "sms_1000_1000", to: "+15551234567", body: "hi", success: false, error: "no signal", completedAtMs: 1_000 }
    ]);
  });

  it("Given the confirm policy When the transport succeeds Then the response carries the real outcome and the same id as the event", async () => {
    const outcomes: SentOutcome[] = [];
    const svc = createSendService({
      transport: fakeTransport(async () => ({ ok: true })),
      policy: "confirm",
      nowMs: () => 2_000,
      random: () => 0.25,
      onSent: (o) => outcomes.push(o)
    });

    const res = await svc.send({ to: "+15551234567", message: "hi" });

    expect(res).toEqual({ ok: true, value: { success: true, messageId: "sms_2000_3250", timestamp: 2_000 } });
    expect(outcomes).toEqual([
      { messageId: "sms_2000_3250", to: "+15551234567", body: "hi", success: true, completedAtMs: 2_000 }
    ]);
  });

  it("Given the confirm policy When the transport throws Then the response reports failure instead of raising", async () => {
    const svc = createSendService({
      transport: fakeTransport(async () => {
        throw new Error("modem offline");
      }),
      policy: "confirm",
      nowMs: () => 3_000,
      random: () => 0,
      onSent: () => {}
    });

    const res = await svc.send({ to: "+15551234567", message: "hi" });

    expect(res).toEqual({
      ok: true,
      value: { success: false, messageId: "sms_3000_1000", error: "modem offline", timestamp: 3_000 }
    });
  });

  it("Given the confirm policy When the transport never answers Then the transport timeout reports failure", async () => {
    const svc = createSendService({
      transport: fakeTransport(() => new Promise<TransportResult>(() => {})),
      policy: "confirm",
      transportTimeoutMs: 20,
      nowMs: () => 4_000,
      random: () => 0,
      onSent: () => {}
    });

    const res = await svc.send({ to: "+15551234567", message: "hi" });

    expect(res).toEqual({
      ok: true,
      value: { success: false, messageId: "sms_4000_1000", error: "Transport send timed out after 20ms.", timestamp: 4_000 }
    });
  });

  it("Given missing fields When send is called Then it rejects with INVALID_INPUT before calling the transport", async () => {
    const transport = fakeTransport(async () => ({ ok: true }));
    const svc = createSendService({ transport, onSent: () => {} });

    expect(await svc.send({ to: "+15551234567" })).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Both 'to' and 'message' are required.", context: { missing: ["message"] } }
    });
    expect(await svc.send({ to: " ", message: "  " })).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Both 'to' and 'message' are required.", context: { missing: ["to", "message"] } }
    });
    expect(await svc.send({ to: 15551234567, message: "hi" })).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Both 'to' and 'message' are required.", context: { missing: ["to"] } }
    });
    expect(await svc.send(["+15551234567", "hi"])).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Request body must be a JSON object." }
    });
    expect(transport.calls).toEqual([]);
  });

  it("Given a transport that cannot send When send is called Then it rejects with CAPABILITY_UNAVAILABLE", async () => {
    const transport = fakeTransport(async () => ({ ok: true }), false);
    const svc = createSendService({ transport, onSent: () => {} });

    const res = await svc.send({ to: "+15551234567", message: "hi" });

    expect(res).toEqual({
      ok: false,
      error: { code: "CAPABILITY_UNAVAILABLE", message: "Sending messages is not available on this device." }
    });
    expect(transport.calls).toEqual([]);
  });

  it("Given an onSent callback that throws When a send completes Then the error is contained", async () => {
    const svc = createSendService({
      transport: fakeTransport(async () => ({ ok: true })),
      policy: "confirm",
      onSent: () => {
        throw new Error("hub gone");
      }
    });

    const res = await svc.send({ to: "+15551234567", message: "hi" });

    expect(res.ok).toBe(true);
    if (!res.ok) throw new Error("unreachable");
    expect(res.value.success).toBe(true);
  });

  it("Given a message with surrounding whitespace When send is called Then the body reaches the transport unchanged and the address is trimmed", async () => {
    const transport = fakeTransport(async () => ({ ok: true }));
    const svc = createSendService({ transport, policy: "confirm", onSent: () => {} });

    await svc.send({ to: " +15551234567 ", message: "  spaced  " });

    expect(transport.calls).toEqual([{ to: "+15551234567", body: "  spaced  " }]);
  });
});
