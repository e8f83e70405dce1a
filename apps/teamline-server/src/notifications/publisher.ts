import type { NotificationEvent } from "@teamline/protocol";
import { errorMessage } from "../errors.js";
import type { NotificationBus } from "./bus.js";

export const NOTIFICATION_CHANNEL = "notifications:inbox";

export class NotificationPublisher {
  constructor(private readonly bus: NotificationBus) {}

  /** Resolves false when the bus rejected the event; the caller carries on either way */
  async publish(event: NotificationEvent): Promise<boolean> {
    try {
      await this.bus.publish(NOTIFICATION_CHANNEL, JSON.stringify(event));
      return true;
    } catch (err) {
      console.warn(`[bridge] Failed to publish ${event.type} for ${event.user_id}:`, errorMessage(err));
      return false;
    }
  }
}
