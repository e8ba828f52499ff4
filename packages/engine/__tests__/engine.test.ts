import { describe, it, expect, afterEach, vi } from "vitest";
import { MessagingEngine } from "../src/engine.js";
import { SessionError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { openDatabase } from "../src/storage/database.js";
import type { InboundMessage } from "../src/messaging/message-pipeline.js";
import { FakeRelay } from "./helpers/fake-relay.js";
import {
  STORE_KEY,
  createClient,
  introduce,
  startAndAuthenticate,
  testConfig,
} from "./helpers/clients.js";

const running: MessagingEngine[] = [];

afterEach(() => {
  for (const engine of running.splice(0)) engine.stop();
});

function track<T extends { engine: MessagingEngine }>(client: T): T {
  running.push(client.engine);
  return client;
}

describe("MessagingEngine", () => {
  it("does not start without an identity", async () => {
    const engine = await MessagingEngine.open({
      config: testConfig(),
      storeKey: STORE_KEY,
      db: openDatabase(":memory:"),
      transportFactory: new FakeRelay().factory,
      logger: silentLogger(),
    });
    expect(() => engine.start()).toThrow(SessionError);
    expect(engine.calls).toBeNull();
  });

  it("resends an unacknowledged message after a restart without duplicating it", async () => {
    const relay = new FakeRelay();
    const db = openDatabase(":memory:");
    const alice = await createClient(relay, { db });
    const bob = track(await createClient(relay));
    await startAndAuthenticate(alice.engine);
    await startAndAuthenticate(bob.engine);
    introduce(alice.engine, bob.engine);
    const inbox: InboundMessage[] = [];
    bob.engine.on("message", (m) => inbox.push(m));

    relay.holdAcks = true;
    const entry = await alice.engine.sendText(bob.engine.identity.requireAccountId(), "exactly once");
    await vi.waitFor(() => {
      expect(inbox.map((m) => m.text)).toEqual(["exactly once"]);
    });

    // Process dies with the entry in flight: nothing else touches the row.
    alice.engine.connection.disconnect();
    alice.engine.outbox.stop();
    db.prepare<[string]>("UPDATE outbox SET status = 'sending' WHERE message_id = ?").run(entry.messageId);
    relay.holdAcks = false;

    const restarted = track(await createClient(relay, { db }));
    expect(restarted.engine.identity.current().accountId).toBe(alice.engine.identity.current().accountId);
    expect(restarted.engine.outbox.get(entry.messageId)?.status).toBe("sending");

    await startAndAuthenticate(restarted.engine);
    await vi.waitFor(() => {
      expect(restarted.engine.outbox.get(entry.messageId)?.status).toBe("sent");
    });

    const transmissions = relay
      .framesOfType("send_message")
      .filter((f) => f.payload["messageId"] === entry.messageId);
    expect(transmissions).toHaveLength(2);
    expect(relay.accepted.filter((id) => id === entry.messageId)).toHaveLength(1);
    expect(inbox).toHaveLength(1);
  });

  it("retransmits a message in flight once when the server drops the connection", async () => {
    const relay = new FakeRelay();
    const fastReconnect = { config: { reconnectBaseMs: 5, reconnectMaxMs: 10 } };
    const alice = track(await createClient(relay, fastReconnect));
    const bob = track(await createClient(relay));
    await startAndAuthenticate(alice.engine);
    await startAndAuthenticate(bob.engine);
    introduce(alice.engine, bob.engine);
    const inbox: InboundMessage[] = [];
    bob.engine.on("message", (m) => inbox.push(m));
    const sent: string[] = [];
    alice.engine.on("sent", ({ messageId }) => sent.push(messageId));
    const aliceTransport = relay.transports[0];
    if (!aliceTransport) throw new Error("alice has no transport");

    relay.holdAcks = true;
    const entry = await alice.engine.sendText(bob.engine.identity.requireAccountId(), "in flight");
    await vi.waitFor(() => {
      expect(relay.accepted).toEqual([entry.messageId]);
    });
    expect(alice.engine.outbox.get(entry.messageId)?.status).toBe("sending");

    relay.holdAcks = false;
    aliceTransport.drop();

    await vi.waitFor(() => {
      expect(sent).toEqual([entry.messageId]);
    });
    expect(relay.transports).toHaveLength(3);
    expect(alice.engine.session.isAuthenticated).toBe(true);
    expect(alice.engine.outbox.get(entry.messageId)?.status).toBe("sent");
    const transmissions = relay
      .framesOfType("send_message")
      .filter((f) => f.payload["messageId"] === entry.messageId);
    expect(transmissions).toHaveLength(2);
    expect(relay.accepted).toEqual([entry.messageId]);
    expect(inbox.map((m) => m.messageId)).toEqual([entry.messageId]);
  });

  it("recovers the same account from the recovery phrase on a new device", async () => {
    const relay = new FakeRelay();
    const original = track(await createClient(relay));
    const accountId = await startAndAuthenticate(original.engine);

    const restored = track(await createClient(relay, { mnemonic: original.mnemonic }));
    await expect(startAndAuthenticate(restored.engine)).resolves.toBe(accountId);
    expect(restored.engine.identity.current().deviceId).not.toBe(
      original.engine.identity.current().deviceId,
    );
  });

  it("stays disconnected when the server refuses the credentials", async () => {
    const relay = new FakeRelay();
    const client = track(await createClient(relay));
    const errors: string[] = [];
    client.engine.on("error", ({ context }) => errors.push(context));
    relay.failNext = { type: "register_proof", code: "AUTH_FAILED" };

    client.engine.start();
    await vi.waitFor(() => {
      expect(errors).toEqual(["authentication"]);
    });
    expect(client.engine.connection.state).toBe("disconnected");
    expect(relay.transports).toHaveLength(1);
  });

  it("reconnects after an authentication timeout", async () => {
    const relay = new FakeRelay();
    const client = track(
      await createClient(relay, { config: { authTimeoutMs: 50, reconnectBaseMs: 5, reconnectMaxMs: 10 } }),
    );
    relay.ignore.add("register_begin");

    client.engine.start();
    await vi.waitFor(() => {
      expect(relay.transports.length).toBeGreaterThanOrEqual(2);
    });
    relay.ignore.clear();

    await vi.waitFor(() => {
      expect(client.engine.session.isAuthenticated).toBe(true);
    });
  });

  it("reports connection states and authentication", async () => {
    const relay = new FakeRelay();
    const client = track(await createClient(relay));
    const states: string[] = [];
    const authenticated: string[] = [];
    client.engine.on("connection", (state) => states.push(state));
    client.engine.on("authenticated", ({ accountId }) => authenticated.push(accountId));

    const accountId = await startAndAuthenticate(client.engine);

    expect(states).toEqual(["connecting", "connected"]);
    expect(authenticated).toEqual([accountId]);
  });

  it("logs out and disconnects", async () => {
    const relay = new FakeRelay();
    const client = track(await createClient(relay));
    await startAndAuthenticate(client.engine);

    await client.engine.logout();

    expect(relay.framesOfType("logout")).toHaveLength(1);
    expect(client.engine.session.isAuthenticated).toBe(false);
    expect(client.engine.connection.state).toBe("disconnected");
  });
});
