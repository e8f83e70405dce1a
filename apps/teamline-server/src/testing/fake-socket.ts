import { EventEmitter } from "node:events";
import type { OutboundFrame } from "@teamline/protocol";
import type { ClientSocket } from "../ws/hub.js";

/** In-process stand-in for a `ws` socket */
export class FakeSocket extends EventEmitter implements ClientSocket {
  readyState = 1;
  sent: string[] = [];
  pings = 0;
  closedWith: { code?: number; reason?: string } | null = null;
  /** When set, every send reports this error through its callback */
  failWith: Error | null = null;
  /** When set, write callbacks are held until `flush` (a peer that stopped reading) */
  stalled = false;
  private unflushed: ((err?: Error) => void)[] = [];

  send(data: string, cb?: (err?: Error) => void): void {
    if (this.failWith) {
      cb?.(this.failWith);
      return;
    }
    this.sent.push(data);
    if (this.stalled) {
      if (cb) this.unflushed.push(cb);
      return;
    }
    cb?.();
  }

  /** Complete every held write, failing them with `err` when given */
  flush(err?: Error): void {
    for (const cb of this.unflushed.splice(0)) cb(err);
  }

  close(code?: number, reason?: string): void {
    if (this.readyState === 3) return;
    this.closedWith = { code, reason };
    this.readyState = 3;
    this.emit("close");
  }

  ping(): void {
    this.pings++;
  }

  terminate(): void {
    if (this.readyState === 3) return;
    this.readyState = 3;
    this.emit("close");
  }

  /** Simulate a client text frame */
  receive(frame: string | object): void {
    const text = typeof frame === "string" ? frame : JSON.stringify(frame);
    this.emit("message", Buffer.from(text), false);
  }

  frames(): OutboundFrame[] {
    return this.sent.map((raw): OutboundFrame => JSON.parse(raw));
  }
}
