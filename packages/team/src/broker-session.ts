import {
  PROTOCOL_VERSION,
  TeamError,
  logError,
  toErrorBody,
} from "@teamwire/schemas";
import type { Frame, RpcBody, TeamEvent, TeamLogger } from "@teamwire/schemas";
import { decodeFrame, encodeFrame, isRequestBody, openFrame, requestBody, sealFrame } from "@teamwire/protocol";
import type { NetworkEncryptor } from "@teamwire/protocol";
import { WebSocket } from "ws";
import type { BrokerDispatcher } from "./broker-handlers.js";
import type { SessionBinding } from "./team-authority.js";

/** The slice of a ws socket a session drives. */
export interface SessionSocket {
  readonly readyState: number;
  send(data: string, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export const QUEUE_OVERFLOW_CLOSE_CODE = 1013;
export const GOING_AWAY_CLOSE_CODE = 1001;
const CLOSE_GRACE_MS = 1000;

export interface BrokerSessionOptions {
  id: string;
  socket: SessionSocket;
  remoteHost: string;
  encryptor: NetworkEncryptor;
  dispatcher: BrokerDispatcher;
  /** Frames allowed to wait behind the one in flight. */
  maxQueuedFrames: number;
  logger: TeamLogger;
  onClose?: (session: BrokerSession) => void;
}

/**
 * One connected node. Inbound frames are decoded and submitted in
 * arrival order; outbound frames go through a bounded queue drained one
 * send at a time. A session that cannot keep up is closed rather than
 * allowed to stall the broker.
 */
export class BrokerSession {
  readonly id: string;
  readonly binding: SessionBinding;
  private socket: SessionSocket;
  private encryptor: NetworkEncryptor;
  private dispatcher: BrokerDispatcher;
  private maxQueuedFrames: number;
  private logger: TeamLogger;
  private onClose?: (session: BrokerSession) => void;
  private queue: string[] = [];
  private sending = false;
  private closed = false;

  constructor(options: BrokerSessionOptions) {
    this.id = options.id;
    this.socket = options.socket;
    this.encryptor = options.encryptor;
    this.dispatcher = options.dispatcher;
    this.maxQueuedFrames = options.maxQueuedFrames;
    this.logger = options.logger;
    this.onClose = options.onClose;
    this.binding = { session_id: options.id, remote_host: options.remoteHost, node_id: null };
  }

  get nodeId(): string | null {
    return this.binding.node_id;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get queuedFrames(): number {
    return this.queue.length;
  }

  /** Handles one raw inbound message. Undecodable frames are dropped; the connection stays up. */
  receive(raw: string): void {
    if (this.closed) return;
    const decoded = decodeFrame(raw);
    if (!decoded.ok) {
      this.dropFrame(decoded.error);
      return;
    }
    const opened = openFrame(this.encryptor, decoded.value);
    if (!opened.ok) {
      this.dropFrame(opened.error);
      return;
    }
    const body = opened.value;
    const id = decoded.value.id;

    if (!isRequestBody(body)) {
      this.logger.debug("Ignoring response frame from client", { session_id: this.id });
      return;
    }
    if (body.protocol_version !== PROTOCOL_VERSION) {
      const err = new TeamError("InvalidParams", `Unsupported protocol version ${body.protocol_version}`);
      if (id !== undefined) this.reply(id, err.toBody());
      return;
    }

    let replied = false;
    const commit = id === undefined
      ? undefined
      : (result: unknown) => {
        replied = true;
        this.reply(id, { result });
      };

    this.dispatcher.dispatch(body.method, body.params, { session: this.binding, commit }).then(
      (result) => {
        if (id !== undefined && !replied) this.reply(id, { result });
      },
      (err: unknown) => {
        if (!(err instanceof TeamError)) {
          logError(this.logger, `Handler "${body.method}" failed`, err, { session_id: this.id });
        } else if (id === undefined) {
          this.logger.debug("Notification rejected", { method: body.method, code: err.code, session_id: this.id });
        }
        if (id !== undefined) this.reply(id, toErrorBody(err));
      },
    );
  }

  /** Queues a `team.event` notification. Returns false if the session is gone. */
  notify(event: TeamEvent): boolean {
    return this.enqueue(sealFrame(this.encryptor, requestBody("team.event", event)));
  }

  close(code: number, reason: string): void {
    if (this.closed) return;
    this.markClosed();
    try {
      this.socket.close(code, reason);
    } catch (err) {
      logError(this.logger, "Socket close failed", err, { session_id: this.id });
    }
    // don't wait forever on a peer that never answers the close handshake
    setTimeout(() => {
      if (this.socket.readyState !== WebSocket.CLOSED) this.socket.terminate();
    }, CLOSE_GRACE_MS).unref();
  }

  /** Called when the socket closed underneath us. */
  markClosed(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    this.onClose?.(this);
  }

  private reply(id: string, body: RpcBody): void {
    this.enqueue(sealFrame(this.encryptor, body, id));
  }

  private enqueue(frame: Frame): boolean {
    if (this.closed) return false;
    if (this.queue.length >= this.maxQueuedFrames) {
      this.logger.warn("Outbound queue overflow, dropping session", {
        session_id: this.id,
        node_id: this.binding.node_id,
        queued: this.queue.length,
      });
      this.close(QUEUE_OVERFLOW_CLOSE_CODE, "Outbound queue overflow");
      return false;
    }
    this.queue.push(encodeFrame(frame));
    this.drain();
    return true;
  }

  private drain(): void {
    if (this.sending || this.closed) return;
    if (this.socket.readyState !== WebSocket.OPEN) return;
    const next = this.queue.shift();
    if (next === undefined) return;
    this.sending = true;
    this.socket.send(next, (err) => {
      this.sending = false;
      if (err) {
        logError(this.logger, "Frame send failed", err, { session_id: this.id });
        this.close(1011, "Send failed");
        return;
      }
      this.drain();
    });
  }

  private dropFrame(error: TeamError): void {
    this.logger.warn("Dropped inbound frame", { session_id: this.id, code: error.code, reason: error.message });
  }
}
