import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Heartbeat } from "./heartbeat.js";
import { FakeSocket } from "../testing/fake-socket.js";

describe("Heartbeat", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("pings tracked sockets every interval", () => {
    const heartbeat = new Heartbeat(1000);
    const socket = new FakeSocket();
    heartbeat.track(socket);
    heartbeat.start();

    vi.advanceTimersByTime(1000);
    expect(socket.pings).toBe(1);

    socket.emit("pong");
    vi.advanceTimersByTime(1000);
    expect(socket.pings).toBe(2);

    heartbeat.stop();
  });

  it("terminates a socket that missed a pong", () => {
    const heartbeat = new Heartbeat(1000);
    const silent = new FakeSocket();
    const responsive = new FakeSocket();
    const closed = vi.fn();
    silent.on("close", closed);
    heartbeat.track(silent);
    heartbeat.track(responsive);
    heartbeat.start();

    vi.advanceTimersByTime(1000);
    responsive.emit("pong");
    vi.advanceTimersByTime(1000);

    expect(closed).toHaveBeenCalledTimes(1);
    expect(silent.readyState).toBe(3);
    expect(responsive.readyState).toBe(1);
    expect(heartbeat.size).toBe(1);

    heartbeat.stop();
  });

  it("untracked sockets are left alone", () => {
    const heartbeat = new Heartbeat(1000);
    const socket = new FakeSocket();
    heartbeat.track(socket);
    heartbeat.untrack(socket);

    expect(heartbeat.sweep()).toBe(0);
    expect(heartbeat.sweep()).toBe(0);
    expect(socket.pings).toBe(0);
    expect(socket.readyState).toBe(1);
  });

  it("stop cancels further ticks", () => {
    const heartbeat = new Heartbeat(1000);
    const socket = new FakeSocket();
    heartbeat.track(socket);
    heartbeat.start();
    heartbeat.stop();

    vi.advanceTimersByTime(5000);
    expect(socket.pings).toBe(0);
  });
});
