import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { ChatScope } from "@teamline/protocol";
import { createTestWorld, type TestWorld } from "../testing/fixtures.js";
import { FakeSocket } from "../testing/fake-socket.js";
import { ForbiddenError, NotFoundError, ValidationError } from "../errors.js";

const HOUR = 60 * 60 * 1000;
const project: ChatScope = { type: "project", id: "proj-1" };

describe("ChatService", () => {
  let world: TestWorld;
  let dm: ChatScope;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    world = createTestWorld();
    dm = { type: "dm", id: world.conversation.id };
  });

  afterEach(async () => {
    await world.ctx.close();
    world.ctx.db.close();
  });

  describe("send", () => {
    it("persists, enriches and broadcasts with per-recipient ownership", async () => {
      const alice = new FakeSocket();
      const bob = new FakeSocket();
      world.ctx.hub.connect("project", "proj-1", "alice", alice);
      world.ctx.hub.connect("project", "proj-1", "bob", bob);

      const sent = await world.ctx.chat.send(project, "alice", { body: "hi" });

      expect(sent).toMatchObject({
        chat_type: "project",
        body: "hi",
        user_id: "alice",
        message_type: "text",
        attachments: [],
        read_by: [],
        user: { id: "alice", display_name: "Alice", avatar_url: null },
      });
      expect(alice.frames()).toEqual([{ type: "message", data: sent, is_own_message: true, sender_id: "alice" }]);
      expect(bob.frames()).toEqual([{ type: "message", data: sent, is_own_message: false, sender_id: "alice" }]);
    });

    it("resolves while a recipient's socket is not flushing", async () => {
      const bob = new FakeSocket();
      bob.stalled = true;
      world.ctx.hub.connect("project", "proj-1", "bob", bob);

      const sent = await world.ctx.chat.send(project, "alice", { body: "hi" });

      expect(bob.frames()).toEqual([{ type: "message", data: sent, is_own_message: false, sender_id: "alice" }]);
    });

    it("round-trips through getMessage", async () => {
      const sent = await world.ctx.chat.send(project, "alice", { body: "hello" });
      expect(world.ctx.chat.getMessage(project, sent.id)).toEqual(sent);
    });

    it("requires a body or an attachment", async () => {
      await expect(world.ctx.chat.send(project, "alice", { body: "   " })).rejects.toThrow(ValidationError);
      await expect(world.ctx.chat.send(project, "alice", {})).rejects.toThrow(
        "Message must have a body or at least one attachment"
      );
    });

    it("accepts attachment-only messages as file messages and links the uploads", async () => {
      world.ctx.db
        .prepare(
          `INSERT INTO chat_attachments (id, message_id, message_type, file_name, file_size, file_type, storage_path, uploaded_by, created_at)
           VALUES ('att-1', NULL, 'project', 'a.png', 10, 'image/png', 'uploads/a.png', 'alice', 0)`
        )
        .run();

      const sent = await world.ctx.chat.send(project, "alice", { attachments: ["att-1"] });

      expect(sent.message_type).toBe("file");
      expect(sent.body).toBeNull();
      expect(sent.attachments).toEqual(["att-1"]);
      const linked = world.ctx.db
        .prepare<[string], { message_id: string | null }>("SELECT message_id FROM chat_attachments WHERE id = ?")
        .get("att-1");
      expect(linked?.message_id).toBe(sent.id);
    });

    it("rejects oversized bodies and too many attachments", async () => {
      await expect(world.ctx.chat.send(project, "alice", { body: "x".repeat(10_001) })).rejects.toThrow(
        "Message body exceeds 10000 characters"
      );
      await expect(
        world.ctx.chat.send(project, "alice", { attachments: ["1", "2", "3", "4", "5", "6"] })
      ).rejects.toThrow("A message can carry at most 5 attachments");
    });

    it("only replies to messages in the same project", async () => {
      const parent = await world.ctx.chat.send(project, "alice", { body: "question" });
      const reply = await world.ctx.chat.send(project, "bob", { body: "answer", reply_to_id: parent.id });

      expect(reply.chat_type === "project" && reply.reply_to_id).toBe(parent.id);
      await expect(
        world.ctx.chat.send({ type: "project", id: "proj-2" }, "bob", { body: "x", reply_to_id: parent.id })
      ).rejects.toThrow(NotFoundError);
    });

    it("direct messages go to the other participant and land in their inbox", async () => {
      const inbox = new FakeSocket();
      world.ctx.hub.connect("inbox", "org-1:bob", "bob", inbox);
      await world.ctx.subscriber.start();

      const sent = await world.ctx.chat.send(dm, "alice", { body: "ping" });
      await world.ctx.subscriber.idle();

      expect(sent).toMatchObject({
        chat_type: "direct",
        sender_id: "alice",
        receiver_id: "bob",
        organization_id: "org-1",
        read_at: null,
        sender: { id: "alice", display_name: "Alice", avatar_url: null },
        receiver: { id: "bob", display_name: "Bob", avatar_url: null },
      });

      const items = world.ctx.inbox.list("bob", "org-1").items;
      expect(items).toHaveLength(1);
      expect(items[0]).toMatchObject({
        title: "New message from Alice",
        message: "Alice: ping",
        event_type: "direct_message",
        reference_id: world.conversation.id,
        user_by: "alice",
      });
      expect(inbox.frames().map((f) => f.type)).toEqual(["inbox_new"]);
    });

    it("a failing inbox notification does not fail the send", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      vi.spyOn(world.ctx.notifications, "notifyDirectMessage").mockRejectedValue(new Error("inbox down"));

      const sent = await world.ctx.chat.send(dm, "alice", { body: "still delivered" });

      expect(sent.body).toBe("still delivered");
      expect(warn).toHaveBeenCalledWith(`[chat] Failed to create inbox notification for ${sent.id}:`, "inbox down");
    });
  });

  describe("edit", () => {
    it("lets the author edit within the window", async () => {
      const bob = new FakeSocket();
      world.ctx.hub.connect("project", "proj-1", "bob", bob);
      const sent = await world.ctx.chat.send(project, "alice", { body: "draft" });

      world.clock.advance(HOUR);
      const edited = await world.ctx.chat.edit(project, "alice", sent.id, "final");

      expect(edited.body).toBe("final");
      expect(edited.edited_at).not.toBeNull();
      expect(bob.frames()[1]).toEqual({
        type: "message_edited",
        data: edited,
        is_own_message: false,
        sender_id: "alice",
      });
    });

    it("rejects edits after the window", async () => {
      const sent = await world.ctx.chat.send(project, "alice", { body: "old" });
      world.clock.advance(25 * HOUR);

      await expect(world.ctx.chat.edit(project, "alice", sent.id, "new")).rejects.toThrow("Edit window has expired");
      expect(world.ctx.chat.getMessage(project, sent.id).body).toBe("old");
    });

    it("rejects edits by anyone but the author", async () => {
      const sent = await world.ctx.chat.send(project, "alice", { body: "mine" });
      await expect(world.ctx.chat.edit(project, "carol", sent.id, "theirs")).rejects.toThrow(ForbiddenError);
    });

    it("rejects edits of deleted messages", async () => {
      const sent = await world.ctx.chat.send(project, "alice", { body: "gone" });
      await world.ctx.chat.delete(project, "alice", sent.id);

      await expect(world.ctx.chat.edit(project, "alice", sent.id, "back")).rejects.toThrow(
        "Cannot edit a deleted message"
      );
    });

    it("does not find messages from another scope", async () => {
      const sent = await world.ctx.chat.send(project, "alice", { body: "here" });
      await expect(world.ctx.chat.edit({ type: "project", id: "proj-2" }, "alice", sent.id, "x")).rejects.toThrow(
        "Message not found"
      );
    });
  });

  describe("delete", () => {
    it("hides the content and broadcasts only the id", async () => {
      const bob = new FakeSocket();
      world.ctx.hub.connect("project", "proj-1", "bob", bob);
      const sent = await world.ctx.chat.send(project, "alice", { body: "secret" });

      expect(await world.ctx.chat.delete(project, "alice", sent.id)).toBe(true);

      const tombstone = world.ctx.chat.getMessage(project, sent.id);
      expect(tombstone.body).toBeNull();
      expect(tombstone.attachments).toEqual([]);
      expect(tombstone.deleted_at).not.toBeNull();
      expect(bob.frames()[1]).toEqual({
        type: "message_deleted",
        message_id: sent.id,
        is_own_message: false,
        sender_id: "alice",
      });
      const history = world.ctx.chat.listMessages(project);
      expect(history.map((m) => m.body)).toEqual([null]);
    });

    it("a project admin may delete someone else's message", async () => {
      const sent = await world.ctx.chat.send(project, "alice", { body: "off-topic" });
      await expect(world.ctx.chat.delete(project, "carol", sent.id)).resolves.toBe(true);
    });

    it("other members may not", async () => {
      const sent = await world.ctx.chat.send(project, "alice", { body: "keep" });
      await expect(world.ctx.chat.delete(project, "bob", sent.id)).rejects.toThrow(
        "You can only delete your own messages"
      );
    });

    it("only the sender may delete a direct message", async () => {
      const sent = await world.ctx.chat.send(dm, "alice", { body: "dm" });
      await expect(world.ctx.chat.delete(dm, "bob", sent.id)).rejects.toThrow(ForbiddenError);
    });

    it("deleting twice is a silent no-op", async () => {
      const bob = new FakeSocket();
      world.ctx.hub.connect("project", "proj-1", "bob", bob);
      const sent = await world.ctx.chat.send(project, "alice", { body: "once" });

      await world.ctx.chat.delete(project, "alice", sent.id);
      expect(await world.ctx.chat.delete(project, "alice", sent.id)).toBe(false);
      expect(bob.frames().map((f) => f.type)).toEqual(["message", "message_deleted"]);
    });

    it("missing messages are not found", async () => {
      await expect(world.ctx.chat.delete(project, "alice", "nope")).rejects.toThrow(NotFoundError);
    });
  });

  describe("markRead", () => {
    it("adds the reader to every message up to the cursor, once", async () => {
      const alice = new FakeSocket();
      world.ctx.hub.connect("project", "proj-1", "alice", alice);
      const m1 = await world.ctx.chat.send(project, "alice", { body: "one" });
      const m2 = await world.ctx.chat.send(project, "alice", { body: "two" });
      const m3 = await world.ctx.chat.send(project, "alice", { body: "three" });

      const changed = await world.ctx.chat.markRead(project, "bob", m2.id);
      const again = await world.ctx.chat.markRead(project, "bob", m2.id);

      expect(changed).toEqual([m1.id, m2.id]);
      expect(again).toEqual([]);
      const history = world.ctx.chat.listMessages(project);
      expect(history.map((m) => (m.chat_type === "project" ? m.read_by : null))).toEqual([["bob"], ["bob"], []]);
      expect(history[2]?.id).toBe(m3.id);

      const reads = alice.frames().filter((f) => f.type === "read");
      expect(reads).toEqual([
        { type: "read", user_id: "bob", message_id: m2.id, message_ids: [m1.id, m2.id], is_own: false, sender_id: "bob" },
      ]);
    });

    it("skips deleted messages", async () => {
      const m1 = await world.ctx.chat.send(project, "alice", { body: "one" });
      const m2 = await world.ctx.chat.send(project, "alice", { body: "two" });
      await world.ctx.chat.delete(project, "alice", m1.id);

      expect(await world.ctx.chat.markRead(project, "bob", m2.id)).toEqual([m2.id]);
    });

    it("stamps read_at on the caller's unread direct messages only", async () => {
      const fromAlice = await world.ctx.chat.send(dm, "alice", { body: "hey" });
      const fromBob = await world.ctx.chat.send(dm, "bob", { body: "yo" });

      const changed = await world.ctx.chat.markRead(dm, "bob", fromBob.id);

      expect(changed).toEqual([fromAlice.id]);
      const readAt = world.ctx.chat.listMessages(dm).map((m) => (m.chat_type === "direct" ? m.read_at : undefined));
      expect(readAt[0]).toEqual(expect.any(Number));
      expect(readAt[1]).toBeNull();
    });

    it("an unknown cursor is not found", async () => {
      await expect(world.ctx.chat.markRead(project, "bob", "missing")).rejects.toThrow(NotFoundError);
    });

    it("no read event is sent when nothing changed", async () => {
      const alice = new FakeSocket();
      world.ctx.hub.connect("project", "proj-1", "alice", alice);
      const m1 = await world.ctx.chat.send(project, "alice", { body: "one" });
      world.ctx.db.prepare("UPDATE chat_messages SET read_by = ? WHERE id = ?").run('["bob"]', m1.id);

      expect(await world.ctx.chat.markRead(project, "bob", m1.id)).toEqual([]);
      expect(alice.frames().map((f) => f.type)).toEqual(["message"]);
    });
  });

  describe("listMessages", () => {
    it("pages backwards with before and returns each page oldest first", async () => {
      for (let i = 0; i < 5; i++) {
        await world.ctx.chat.send(project, "alice", { body: `m${i}` });
      }

      const newest = world.ctx.chat.listMessages(project, { limit: 2 });
      expect(newest.map((m) => m.body)).toEqual(["m3", "m4"]);

      const older = world.ctx.chat.listMessages(project, { limit: 2, before: newest[0]?.created_at });
      expect(older.map((m) => m.body)).toEqual(["m1", "m2"]);
    });

    it("caps the page size at 100", async () => {
      for (let i = 0; i < 105; i++) {
        await world.ctx.chat.send(project, "alice", { body: `m${i}` });
      }

      const page = world.ctx.chat.listMessages(project, { limit: 500 });
      expect(page).toHaveLength(100);
      expect(page[0]?.body).toBe("m5");
    });
  });
});
