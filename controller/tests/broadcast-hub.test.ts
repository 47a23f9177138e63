import { describe, test, expect, beforeEach, vi } from "vitest";
import { BroadcastHub } from "../src/services/broadcast-hub";
import { StateStore } from "../src/services/state-store";
import { FakeSocket, captureLogger, constant, type CapturedLogger } from "./helpers";

describe("BroadcastHub", () => {
  let captured: CapturedLogger;
  let hub: BroadcastHub;
  let store: StateStore;

  const connect = (id: string) => {
    const socket = new FakeSocket();
    hub.register({ id, socket, connectedAt: 0, lastSeen: 0 });
    return socket;
  };

  beforeEach(() => {
    captured = captureLogger();
    hub = new BroadcastHub(captured.logger);
    store = new StateStore({ random: constant(0.5) });
  });

  test("broadcast reaches every registered session", () => {
    const a = connect("a");
    const b = connect("b");

    const delivered = hub.broadcast(store.snapshot());

    expect(delivered).toBe(2);
    expect(a.sent).toHaveLength(1);
    expect(b.sent).toEqual(a.sent);
    expect(a.events()[0]).toEqual(store.snapshot());
  });

  test("writes events to each session in call order", () => {
    const socket = connect("a");

    for (let i = 0; i < 5; i++) {
      store.apply({ type: "tick" });
      hub.broadcast(store.snapshot());
    }

    const seqs = socket
      .events()
      .map((event) => (event.type === "system_status" ? event.seq : -1));
    expect(seqs).toEqual([1, 2, 3, 4, 5]);
  });

  test("drops a session whose socket is no longer open", () => {
    const open = connect("open");
    const closed = connect("closed");
    closed.readyState = 3;
    const onDisconnection = vi.fn();
    hub.on("disconnection", onDisconnection);

    const delivered = hub.broadcast(store.snapshot());

    expect(delivered).toBe(1);
    expect(open.sent).toHaveLength(1);
    expect(hub.getSession("closed")).toBeUndefined();
    expect(hub.size()).toBe(1);
    expect(onDisconnection).toHaveBeenCalledWith("closed");

    const errorLine = captured.lines().find((line) => line.event === "session_error");
    expect(errorLine?.sessionId).toBe("closed");
  });

  test("drops a session whose send throws", () => {
    const failing = connect("failing");
    failing.failOnSend = true;

    expect(hub.unicast("failing", store.snapshot())).toBe(false);
    expect(hub.getSession("failing")).toBeUndefined();

    const disconnected = captured
      .lines()
      .find((line) => line.event === "session_disconnected");
    expect(disconnected?.reason).toBe("send failed");
    expect(failing.closedWith).toEqual({ code: 1011, reason: "Send failed" });
  });

  test("unicast only reaches the addressed session", () => {
    const a = connect("a");
    const b = connect("b");

    expect(
      hub.unicast("b", {
        type: "error",
        data: { code: "TIMEOUT", message: "Inference timed out after 10ms" },
      })
    ).toBe(true);

    expect(a.sent).toHaveLength(0);
    expect(b.sent).toEqual([
      '{"type":"error","data":{"code":"TIMEOUT","message":"Inference timed out after 10ms"}}',
    ]);
  });

  test("unicast to an unknown session returns false", () => {
    expect(hub.unicast("missing", store.snapshot())).toBe(false);
  });

  test("unregister reports whether the session existed", () => {
    connect("a");

    expect(hub.unregister("a")).toBe(true);
    expect(hub.unregister("a")).toBe(false);
  });

  test("touch records activity", () => {
    connect("a");

    hub.touch("a", 1234);

    expect(hub.getSession("a")?.lastSeen).toBe(1234);
  });

  test("shutdown closes every socket as going away", () => {
    const a = connect("a");
    const b = connect("b");

    const onDisconnection = vi.fn();
    hub.on("disconnection", onDisconnection);

    hub.shutdown();

    expect(a.closedWith).toEqual({ code: 1001, reason: "Server shutting down" });
    expect(b.closedWith).toEqual({ code: 1001, reason: "Server shutting down" });
    expect(hub.size()).toBe(0);
    expect(onDisconnection.mock.calls).toEqual([["a"], ["b"]]);
  });
});
