import type { GatewayEvent } from "../backend/src/realtime/events";
import { createInMemoryMessageStore } from "../backend/src/repositories/inMemoryMessageStore";
import { startInboundRelay } from "../backend/src/services/inboundRelay";

describe("inboundRelay", () => {
  it("Given a running relay When the store receives a message Then a received event is published", () => {
    const store = createInMemoryMessageStore({ nowMs: () => 1_000 });
    const published: GatewayEvent[] = [];
    startInboundRelay({ store, publish: (e) => published.push(e), nowMs: () => 2_000 });

    store.deliverInbound({ from: "+15550001111", body: "hi" });

    expect(published).toEqual([
      { type: "received", data: { id: "1", from: "+15550001111", body: "hi", timestamp: "1000" }, emittedAt: 2_000 }
    ]);
  });

  it("Given a stopped relay When the store receives a message Then nothing is published", () => {
    const store = createInMemoryMessageStore();
    const published: GatewayEvent[] = [];
    const relay = startInboundRelay({ store, publish: (e) => published.push(e) });

    relay.stop();
    relay.stop();
    store.deliverInbound({ from: "+15550001111", body: "hi" });

    expect(published).toEqual([]);
  });

  it("Given a publisher that throws When a message arrives Then the store delivery still succeeds", () => {
    const store = createInMemoryMessageStore();
    startInboundRelay({
      store,
      publish: () => {
        throw new Error("hub closed");
      }
    });

    expect(() => store.deliverInbound({ from: "+15550001111", body: "hi" })).not.toThrow();
    expect(store.size()).toBe(1);
  });
});
