import type { ClientSocket } from "./hub.js";
import { errorMessage } from "../errors.js";

/**
 * Ping every tracked socket once per interval. A socket that has not answered
 * the previous ping by the next tick is terminated, which fires its close
 * handler and unregisters it.
 */
export class Heartbeat {
  private alive = new Map<ClientSocket, boolean>();
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly intervalMs: number) {}

  get size(): number {
    return this.alive.size;
  }

  track(socket: ClientSocket): void {
    this.alive.set(socket, true);
    socket.on("pong", () => {
      if (this.alive.has(socket)) this.alive.set(socket, true);
    });
  }

  untrack(socket: ClientSocket): void {
    this.alive.delete(socket);
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sweep(), this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** One heartbeat tick. Returns how many sockets were terminated. */
  sweep(): number {
    let terminated = 0;
    for (const [socket, alive] of this.alive) {
      if (!alive) {
        this.alive.delete(socket);
        socket.terminate();
        terminated++;
        continue;
      }

      this.alive.set(socket, false);
      try {
        socket.ping();
      } catch (err) {
        console.warn("[ws] Ping failed:", errorMessage(err));
      }
    }

    if (terminated > 0) {
      console.log(`[ws] Terminated ${terminated} unresponsive connection(s)`);
    }
    return terminated;
  }
}
