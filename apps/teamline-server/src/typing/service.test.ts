import { describe, it, expect, beforeEach, vi } from "vitest";
import { ConnectionHub } from "../ws/hub.js";
import { FakeSocket } from "../testing/fake-socket.js";
import { MemoryTypingStore, type TypingKey, type TypingRow, type TypingStore } from "./store.js";
import { TypingService } from "./service.js";

class BrokenStore implements TypingStore {
  async upsert(_row: TypingRow): Promise<void> {
    throw new Error("store offline");
  }
  async remove(_key: TypingKey): Promise<void> {
    throw new Error("store offline");
  }
  async get(_key: TypingKey): Promise<TypingRow | null> {
    return null;
  }
  async close(): Promise<void> {}
}

describe("TypingService", () => {
  let hub: ConnectionHub;
  let clock: number;
  let alice: FakeSocket;
  let bob: FakeSocket;

  beforeEach(() => {
    hub = new ConnectionHub("test");
    clock = 1_000_000;
    alice = new FakeSocket();
    bob = new FakeSocket();
    hub.connect("project", "p1", "alice", alice);
    hub.connect("project", "p1", "bob", bob);
  });

  it("broadcasts typing to everyone but the typist", async () => {
    const typing = new TypingService(hub, new MemoryTypingStore(() => clock), 5000, () => clock);

    await typing.start("project", "p1", "alice");

    expect(alice.sent).toEqual([]);
    expect(bob.frames()).toEqual([{ type: "typing", user_id: "alice", is_typing: true }]);
  });

  it("expires typing state after the ttl", async () => {
    const typing = new TypingService(hub, new MemoryTypingStore(() => clock), 5000, () => clock);

    await typing.start("project", "p1", "alice");
    expect(await typing.isTyping("project", "p1", "alice")).toBe(true);

    clock += 4999;
    expect(await typing.isTyping("project", "p1", "alice")).toBe(true);

    clock += 1;
    expect(await typing.isTyping("project", "p1", "alice")).toBe(false);
  });

  it("stop clears the row and broadcasts is_typing false", async () => {
    const typing = new TypingService(hub, new MemoryTypingStore(() => clock), 5000, () => clock);

    await typing.start("project", "p1", "alice");
    await typing.stop("project", "p1", "alice");

    expect(await typing.isTyping("project", "p1", "alice")).toBe(false);
    expect(bob.frames()).toEqual([
      { type: "typing", user_id: "alice", is_typing: true },
      { type: "typing", user_id: "alice", is_typing: false },
    ]);
  });

  it("a repeated start extends the expiry", async () => {
    const typing = new TypingService(hub, new MemoryTypingStore(() => clock), 5000, () => clock);

    await typing.start("project", "p1", "alice");
    clock += 3000;
    await typing.start("project", "p1", "alice");
    clock += 3000;

    expect(await typing.isTyping("project", "p1", "alice")).toBe(true);
  });

  it("direct chats broadcast into the dm scope", async () => {
    const dmPeer = new FakeSocket();
    hub.connect("dm", "c1", "bob", dmPeer);
    const typing = new TypingService(hub, new MemoryTypingStore(() => clock), 5000, () => clock);

    await typing.start("direct", "c1", "alice");

    expect(dmPeer.frames()).toEqual([{ type: "typing", user_id: "alice", is_typing: true }]);
    expect(bob.sent).toEqual([]);
  });

  it("still broadcasts when the store fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const typing = new TypingService(hub, new BrokenStore(), 5000, () => clock);

    await typing.start("project", "p1", "alice");
    await typing.stop("project", "p1", "alice");

    expect(bob.frames()).toHaveLength(2);
    expect(warn).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });
});
