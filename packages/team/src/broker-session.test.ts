import { describe, it, expect, vi, beforeEach } from "vitest";
import { WebSocket } from "ws";
import type { RpcBody, TeamEvent, TeamLogger } from "@teamwire/schemas";
import { NetworkEncryptor, decodeFrame, encodeFrame, openFrame, requestBody, sealFrame } from "@teamwire/protocol";
import { MemoryTeamStore } from "@teamwire/store";
import { BrokerSession, QUEUE_OVERFLOW_CLOSE_CODE } from "./broker-session.js";
import type { SessionSocket } from "./broker-session.js";
import { TeamAuthority } from "./team-authority.js";
import { createBrokerDispatcher } from "./broker-handlers.js";

const AT = "2026-03-01T10:00:00.000Z";

class FakeSocket implements SessionSocket {
  readyState: number = WebSocket.OPEN;
  sent: string[] = [];
  pendingAcks: ((err?: Error) => void)[] = [];
  autoAck = true;
  closedWith?: { code?: number; reason?: string };

  send(data: string, cb: (err?: Error) => void): void {
    this.sent.push(data);
    if (this.autoAck) queueMicrotask(() => cb());
    else this.pendingAcks.push(cb);
  }

  close(code?: number, reason?: string): void {
    this.closedWith = { code, reason };
    this.readyState = WebSocket.CLOSED;
  }

  terminate(): void {
    this.readyState = WebSocket.CLOSED;
  }
}

function silentLogger(): TeamLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function modeEvent(seq: number): TeamEvent {
  return { kind: "mode", seq, timestamp: AT, mode: "sync", previous: "sync" };
}

describe("BrokerSession", () => {
  const encryptor = new NetworkEncryptor(Buffer.alloc(32, 7));
  let socket: FakeSocket;
  let logger: TeamLogger;
  let authority: TeamAuthority;
  let onClose: ReturnType<typeof vi.fn>;
  let session: BrokerSession;

  function openSent(raw: string | undefined): { id?: string; body: RpcBody } {
    const decoded = decodeFrame(raw ?? "");
    if (!decoded.ok) throw decoded.error;
    const opened = openFrame(encryptor, decoded.value);
    if (!opened.ok) throw opened.error;
    return { id: decoded.value.id, body: opened.value };
  }

  function call(method: string, params: object, id?: string): void {
    session.receive(encodeFrame(sealFrame(encryptor, requestBody(method, params), id)));
  }

  beforeEach(() => {
    socket = new FakeSocket();
    logger = silentLogger();
    authority = new TeamAuthority({ teamId: "alpha", store: new MemoryTeamStore(), logger });
    onClose = vi.fn();
    session = new BrokerSession({
      id: "s1",
      socket,
      remoteHost: "10.1.1.1",
      encryptor,
      dispatcher: createBrokerDispatcher(authority),
      maxQueuedFrames: 2,
      logger,
      onClose,
    });
  });

  it("answers a request and binds the node", async () => {
    call("register", { node_id: "n1" }, "req-1");
    await vi.waitFor(() => expect(socket.sent).toHaveLength(1));
    const reply = openSent(socket.sent[0]);
    expect(reply.id).toBe("req-1");
    expect(reply.body).toMatchObject({ result: { team_id: "alpha", nodes: [{ node_id: "n1", host: "10.1.1.1" }] } });
    expect(session.nodeId).toBe("n1");
  });

  it("replies with UnknownMethod for methods outside the table", async () => {
    call("teleport", {}, "req-2");
    call("team.event", modeEvent(1), "req-3");
    await vi.waitFor(() => expect(socket.sent).toHaveLength(2));
    expect(openSent(socket.sent[0]).body).toEqual({ error: 'Unknown RPC method "teleport"', code: "UnknownMethod" });
    expect(openSent(socket.sent[1]).body).toEqual({ error: 'Unknown RPC method "team.event"', code: "UnknownMethod" });
  });

  it("replies with InvalidParams and leaves state alone", async () => {
    call("mode", { mode: "chaos" }, "req-4");
    await vi.waitFor(() => expect(socket.sent).toHaveLength(1));
    expect(openSent(socket.sent[0]).body).toMatchObject({ code: "InvalidParams" });
    expect(authority.snapshot().mode).toBe("sync");
  });

  it("applies notifications without replying", async () => {
    call("mode", { mode: "review" });
    await vi.waitFor(() => expect(authority.snapshot().mode).toBe("review"));
    expect(socket.sent).toEqual([]);
  });

  it("rejects an unsupported protocol version", async () => {
    session.receive(encodeFrame(sealFrame(encryptor, { protocol_version: 2, method: "heartbeat", params: {} }, "req-5")));
    await vi.waitFor(() => expect(socket.sent).toHaveLength(1));
    expect(openSent(socket.sent[0]).body).toEqual({ error: "Unsupported protocol version 2", code: "InvalidParams" });
  });

  it("drops frames sealed with another key and keeps the session open", () => {
    const stranger = new NetworkEncryptor(Buffer.alloc(32, 9));
    session.receive(encodeFrame(sealFrame(stranger, requestBody("mode", { mode: "async" }), "req-6")));
    session.receive("not json at all");
    expect(socket.sent).toEqual([]);
    expect(session.isClosed).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith("Dropped inbound frame", {
      session_id: "s1",
      code: "DecryptFailure",
      reason: "Authentication failed",
    });
    expect(logger.warn).toHaveBeenCalledWith("Dropped inbound frame", {
      session_id: "s1",
      code: "FrameError",
      reason: "Frame is not valid JSON",
    });
  });

  it("sends one frame at a time, in order", () => {
    socket.autoAck = false;
    expect(session.notify(modeEvent(1))).toBe(true);
    expect(session.notify(modeEvent(2))).toBe(true);
    expect(socket.sent).toHaveLength(1);
    expect(session.queuedFrames).toBe(1);

    socket.pendingAcks[0]?.();
    expect(socket.sent).toHaveLength(2);
    expect(openSent(socket.sent[0]).body).toMatchObject({ method: "team.event", params: { seq: 1 } });
    expect(openSent(socket.sent[1]).body).toMatchObject({ method: "team.event", params: { seq: 2 } });
  });

  it("closes a session whose outbound queue overflows", () => {
    socket.autoAck = false;
    const results = [1, 2, 3, 4].map((seq) => session.notify(modeEvent(seq)));
    expect(results).toEqual([true, true, true, false]);
    expect(socket.closedWith).toEqual({ code: QUEUE_OVERFLOW_CLOSE_CODE, reason: "Outbound queue overflow" });
    expect(session.isClosed).toBe(true);
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(session.notify(modeEvent(5))).toBe(false);
  });

  it("closes the session when a send fails", () => {
    socket.autoAck = false;
    session.notify(modeEvent(1));
    socket.pendingAcks[0]?.(new Error("EPIPE"));
    expect(socket.closedWith).toEqual({ code: 1011, reason: "Send failed" });
    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
