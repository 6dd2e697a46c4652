import request from "supertest";

import { createGatewayApp } from "../backend/src/app";
import type { SentOutcome } from "../backend/src/realtime/events";
import { createInMemoryMessageStore, type InMemoryMessageStore } from "../backend/src/repositories/inMemoryMessageStore";
import { createInboxService } from "../backend/src/services/inboxService";
import { createSendService, type MessageTransport } from "../backend/src/services/sendService";
import { createStatusService } from "../backend/src/services/statusService";

const NOW = 1_700_000_000_000;
const API_KEY = "test-secret";

function createFixture(options: Readonly<{ maxBodyBytes?: number }> = {}): {
  app: ReturnType<typeof createGatewayApp>;
  store: InMemoryMessageStore;
  sent: Array<{ to: string; body: string }>;
  outcomes: SentOutcome[];
} {
  const store = createInMemoryMessageStore({ nowMs: () => NOW });
  store.seed({ address: "+15550001111", body: "first", timestamp: 1_000, read: true });
  store.seed({ address: "+15550002222", body: "second", timestamp: 2_000 });
  store.seed({ address: "+15550001111", body: "third", timestamp: 3_000 });

  const sent: Array<{ to: string; body: string }> = [];
  const outcomes: SentOutcome[] = [];
  const transport: MessageTransport = {
    canSend: () => true,
    async send(to: string, body: string) {
      sent.push({ to, body });
      return { ok: true };
    }
  };

  const app = createGatewayApp({
    apiKey: API_KEY,
    inboxService: createInboxService({ store }),
    sendService: createSendService({ transport, policy: "confirm", nowMs: () => NOW, onSent: (o) => outcomes.push(o) }),
    statusService: createStatusService({
      isRunning: () => true,
      canSend: () => transport.canSend(),
      canRead: () => store.canRead(),
      port: () => 8888,
      eventPort: () => 8889,
      nowMs: () => NOW
    }),
    nowMs: () => NOW,
    ...(options.maxBodyBytes === undefined ? {} : { maxBodyBytes: options.maxBodyBytes })
  });
  return { app, store, sent, outcomes };
}

describe("gateway http api", () => {
  it("Given no API key When GET /status is called Then it reports the running service", async () => {
    const { app } = createFixture();

    const res = await request(app).get("/status");

    expect(res.status).toBe(200);
    expect(res.headers["access-control-allow-origin"]).toBe("*");
    expect(res.body).toEqual({
      status: "running",
      sendCapable: true,
      readCapable: true,
      port: 8888,
      eventPort: 8889,
      timestamp: NOW
    });
  });

  it("Given a missing or wrong API key When a protected route is called Then it answers 401 and changes nothing", async () => {
    const { app, store } = createFixture();

    const missing = await request(app).get("/inbox");
    const wrong = await request(app).delete("/inbox/2").set("X-API-Key", "not-the-key");
    const wrongCase = await request(app).delete("/inbox/2").set("X-API-Key", API_KEY.toUpperCase());

    for (const res of [missing, wrong, wrongCase]) {
      expect(res.status).toBe(401);
      expect(res.headers["access-control-allow-origin"]).toBe("*");
      expect(res.body).toEqual({
        success: false,
        error: "Unauthorized: missing or invalid X-API-Key.",
        code: "UNAUTHORIZED"
      });
    }
    expect(store.size()).toBe(3);
  });

  it("Given a preflight request When OPTIONS is sent Then it answers 204 with the CORS headers and no key", async () => {
    const { app } = createFixture();

    const inbox = await request(app).options("/inbox");
    const item = await request(app).options("/inbox/3");
    const unknown = await request(app).options("/nowhere");

    expect(inbox.status).toBe(204);
    expect(inbox.headers["access-control-allow-origin"]).toBe("*");
    expect(inbox.headers["access-control-allow-methods"]).toBe("GET, OPTIONS");
    expect(inbox.headers["access-control-allow-headers"]).toBe("Content-Type, X-API-Key");
    expect(item.headers["access-control-allow-methods"]).toBe("GET, DELETE, OPTIONS");
    expect(unknown.status).toBe(204);
    expect(unknown.headers["access-control-allow-methods"]).toBe("GET, POST, DELETE, OPTIONS");
  });

  it("Given unknown paths and wrong methods When they are called Then they answer 404 and 405", async () => {
    const { app } = createFixture();

    const missing = await request(app).get("/nowhere").set("X-API-Key", API_KEY);
    const wrongMethod = await request(app).post("/status");

    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ success: false, error: "Route not found.", code: "NOT_FOUND" });
    expect(wrongMethod.status).toBe(405);
    expect(wrongMethod.headers["allow"]).toBe("GET, OPTIONS");
    expect(wrongMethod.body).toEqual({
      success: false,
      error: "Method POST is not allowed on /status.",
      code: "METHOD_NOT_ALLOWED"
    });
  });

  it("Given unread and from query parameters When GET /inbox is called Then only matching unread messages are listed with full counts", async () => {
    const { app } = createFixture();

    const res = await request(app).get("/inbox?unread=true&from=0001111&limit=10").set("X-API-Key", API_KEY);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      messages: [
        { id: "3", threadId: "1", address: "+15550001111", body: "third", timestamp: 3_000, read: false, kind: "inbox" }
      ],
      totalCount: 3,
      unreadCount: 2,
      timestamp: NOW
    });
  });

  it("Given an existing and an unknown id When GET /inbox/:id is called Then it returns the message or 404", async () => {
    const { app } = createFixture();

    const found = await request(app).get("/inbox/2").set("X-API-Key", API_KEY);
    const missing = await request(app).get("/inbox/999999").set("X-API-Key", API_KEY);

    expect(found.status).toBe(200);
    expect(found.body).toEqual({
      id: "2",
      threadId: "2",
      address: "+15550002222",
      body: "second",
      timestamp: 2_000,
      read: false,
      kind: "inbox"
    });
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ success: false, error: "Message not found.", code: "NOT_FOUND" });
  });

  it("Given an unread message When POST /inbox/:id/read is called twice Then both calls succeed", async () => {
    const { app, store } = createFixture();

    const first = await request(app).post("/inbox/2/read").set("X-API-Key", API_KEY);
    const second = await request(app).post("/inbox/2/read").set("X-API-Key", API_KEY);

    expect(first.status).toBe(200);
    expect(first.body).toEqual({ success: true, id: "2" });
    expect(second.body).toEqual({ success: true, id: "2" });
    expect((await store.getById("2"))?.read).toBe(true);
  });

  it("Given an existing and an unknown id When DELETE /inbox/:id is called Then the first is removed and the second fails with 400", async () => {
    const { app, store } = createFixture();

    const removed = await request(app).delete("/inbox/1").set("X-API-Key", API_KEY);
    const missing = await request(app).delete("/inbox/999999").set("X-API-Key", API_KEY);

    expect(removed.status).toBe(200);
    expect(removed.body).toEqual({ success: true, id: "1", deleted: true });
    expect(missing.status).toBe(400);
    expect(missing.body).toEqual({
      success: false,
      id: "999999",
      deleted: false,
      error: "Failed to delete message.",
      code: "OPERATION_FAILED"
    });
    expect(store.size()).toBe(2);
  });

  it("Given a valid send request When POST /send is called Then it answers with a correlation id shared with the outcome", async () => {
    const { app, sent, outcomes } = createFixture();

    const res = await request(app)
      .post("/send")
      .set("X-API-Key", API_KEY)
      .send({ to: "+15551234567", message: "hello there" });

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.timestamp).toBe(NOW);
    expect(res.body.messageId).toMatch(new RegExp(`^sms_${NOW}_\\d{4}$`));
    expect(sent).toEqual([{ to: "+15551234567", body: "hello there" }]);
    expect(outcomes.map((o) => o.messageId)).toEqual([res.body.messageId]);
  });

  it("Given a body without a recipient When POST /send is called Then it answers 400 and nothing is sent", async () => {
    const { app, sent } = createFixture();

    const res = await request(app).post("/send").set("X-API-Key", API_KEY).send({ message: "hello" });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: "Both 'to' and 'message' are required.", code: "INVALID_INPUT" });
    expect(sent).toEqual([]);
  });

  it("Given malformed JSON When POST /send is called Then it answers 400 after the key check", async () => {
    const { app } = createFixture();

    const unauthenticated = await request(app).post("/send").set("Content-Type", "application/json").send("{bad");
    const authenticated = await request(app)
      .post("/send")
      .set("X-API-Key", API_KEY)
      .set("Content-Type", "application/json")
      .send("{bad");

    expect(unauthenticated.status).toBe(401);
    expect(authenticated.status).toBe(400);
    expect(authenticated.body).toEqual({ success: false, error: "Request body is not valid JSON.", code: "INVALID_INPUT" });
  });

  it("Given a body over the size limit When POST /send is called Then it answers 413", async () => {
    const { app, sent } = createFixture({ maxBodyBytes: 64 });

    const res = await request(app)
      .post("/send")
      .set("X-API-Key", API_KEY)
      .send({ to: "+15551234567", message: "x".repeat(200) });

    expect(res.status).toBe(413);
    expect(res.body).toEqual({ success: false, error: "Request body is too large.", code: "PAYLOAD_TOO_LARGE" });
    expect(sent).toEqual([]);
  });
});
