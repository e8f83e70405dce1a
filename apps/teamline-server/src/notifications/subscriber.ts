import { inboxEventSchema, inboxScopeId, notificationEventSchema } from "@teamline/protocol";
import type { BroadcastResult, ConnectionHub } from "../ws/hub.js";
import { errorMessage } from "../errors.js";
import type { NotificationBus } from "./bus.js";
import { NOTIFICATION_CHANNEL } from "./publisher.js";

/**
 * Relays notification events from the bus to the inbox connections this
 * process holds. Run exactly one per process that owns sockets.
 */
export class NotificationSubscriber {
  private unsubscribe: (() => Promise<void>) | null = null;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly bus: NotificationBus,
    private readonly hub: ConnectionHub
  ) {}

  get running(): boolean {
    return this.unsubscribe !== null;
  }

  /** Resolves false when the bus is unreachable; live inbox push is then disabled */
  async start(): Promise<boolean> {
    if (this.unsubscribe) return true;
    try {
      this.unsubscribe = await this.bus.subscribe(NOTIFICATION_CHANNEL, (raw) => this.enqueue(raw));
    } catch (err) {
      console.warn("[bridge] Notification bus unreachable, inbox push disabled:", errorMessage(err));
      return false;
    }
    console.log(`[bridge] Subscribed to ${NOTIFICATION_CHANNEL}`);
    return true;
  }

  async stop(): Promise<void> {
    const unsubscribe = this.unsubscribe;
    this.unsubscribe = null;
    if (unsubscribe) {
      try {
        await unsubscribe();
      } catch (err) {
        console.warn("[bridge] Failed to unsubscribe:", errorMessage(err));
      }
    }
    await this.idle();
  }

  /** Resolves once every event received so far has been relayed */
  idle(): Promise<void> {
    return this.pending;
  }

  /**
   * Decode one bus message and push it into the owner's inbox scope.
   * Returns null when the message was dropped.
   */
  async relay(raw: string): Promise<BroadcastResult | null> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      console.warn("[bridge] Dropping notification: invalid JSON");
      return null;
    }

    const envelope = notificationEventSchema.safeParse(parsed);
    if (!envelope.success) {
      console.warn("[bridge] Dropping notification: bad envelope:", envelope.error.issues[0]?.message);
      return null;
    }

    const { user_id, org_id, type, payload } = envelope.data;
    const event = inboxEventSchema.safeParse({ ...payload, type });
    if (!event.success) {
      console.warn(`[bridge] Dropping ${type} notification: bad payload:`, event.error.issues[0]?.message);
      return null;
    }

    return this.hub.broadcast("inbox", inboxScopeId(org_id, user_id), event.data);
  }

  private enqueue(raw: string): void {
    this.pending = this.pending
      .then(() => this.relay(raw))
      .then(
        () => undefined,
        (err: unknown) => {
          console.error("[bridge] Failed to relay notification:", errorMessage(err));
        }
      );
  }
}
