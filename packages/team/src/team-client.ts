import { WebSocket } from "ws";
import { v4 as uuid } from "uuid";
import {
  BROKER_RESULT_VALIDATORS,
  CLIENT_PARAM_VALIDATORS,
  ConsoleLogger,
  TeamError,
  formatErrors,
  logError,
  withTimeout,
} from "@teamwire/schemas";
import type {
  AttachEvent,
  BroadcastResult,
  BrokerMethod,
  BrokerMethodParams,
  BrokerMethodResults,
  ClientMethodParams,
  EventResult,
  HandoffEvent,
  HeartbeatResult,
  LeaveResult,
  LedgerResult,
  LedgerTotals,
  ModeResult,
  RegisterParams,
  RpcErrorBody,
  RpcResultBody,
  TeamEvent,
  TeamLogger,
  TeamMode,
  TeamSnapshot,
} from "@teamwire/schemas";
import {
  Dispatcher,
  NetworkEncryptor,
  decodeFrame,
  encodeFrame,
  isRequestBody,
  openFrame,
  requestBody,
  sealFrame,
} from "@teamwire/protocol";
import type { HandlerTable } from "@teamwire/protocol";
import { DEFAULT_BROKER_CONFIG, DEFAULT_REQUEST_TIMEOUT_MS } from "./config.js";
import { TeamView } from "./team-view.js";
import { rawDataToString } from "./ws-data.js";

export interface TeamClientOptions {
  /** e.g. ws://127.0.0.1:7420/team */
  url: string;
  /** base64-encoded shared team key */
  teamKey: string;
  node: RegisterParams;
  heartbeatIntervalMs?: number;
  requestTimeoutMs?: number;
  logger?: TeamLogger;
  onClose?: (code: number, reason: string) => void;
}

export type TeamEventListener = (event: TeamEvent) => void;

type ResponseBody = RpcResultBody | RpcErrorBody;

interface PendingRequest {
  resolve: (body: ResponseBody) => void;
  reject: (err: Error) => void;
}

/**
 * A node's connection to its team broker. Keeps a local replica of team
 * state, heartbeats while joined, and re-registers if the broker has
 * forgotten the node.
 */
export class TeamClient {
  readonly nodeId: string;
  private url: string;
  private node: RegisterParams;
  private encryptor: NetworkEncryptor;
  private heartbeatIntervalMs: number;
  private requestTimeoutMs: number;
  private logger: TeamLogger;
  private onClose?: (code: number, reason: string) => void;
  private ws?: WebSocket;
  private pending = new Map<string, PendingRequest>();
  private listeners: TeamEventListener[] = [];
  private view = new TeamView();
  private dispatcher: Dispatcher<ClientMethodParams, null>;
  private heartbeatTimer?: ReturnType<typeof setInterval>;

  constructor(options: TeamClientOptions) {
    this.url = options.url;
    this.node = options.node;
    this.nodeId = options.node.node_id;
    this.encryptor = NetworkEncryptor.fromBase64(options.teamKey);
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_BROKER_CONFIG.heartbeatIntervalMs;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? new ConsoleLogger(`team-client:${options.node.node_id}`);
    this.onClose = options.onClose;

    const handlers: HandlerTable<ClientMethodParams, null> = {
      "team.event": (event) => this.handleEvent(event),
      ledger: (event) => this.handleEvent(event),
      mode: (event) => this.handleEvent(event),
    };
    this.dispatcher = new Dispatcher(handlers, CLIENT_PARAM_VALIDATORS);
  }

  /** Connects, registers and starts heartbeating. */
  async join(): Promise<TeamSnapshot> {
    await this.connect();
    const snapshot = await this.register();
    this.startHeartbeat();
    return snapshot;
  }

  /** Leaves the team and closes the connection. */
  async leave(): Promise<LeaveResult> {
    this.stopHeartbeat();
    const result = await this.request("leave", {});
    this.view.clear();
    await this.close();
    return result;
  }

  broadcast(message: string, payload?: Record<string, unknown>): Promise<BroadcastResult> {
    return this.request("broadcast", payload === undefined ? { message } : { message, payload });
  }

  setMode(mode: TeamMode): Promise<ModeResult> {
    return this.request("mode", { mode });
  }

  async attach(repo: string, path?: string): Promise<EventResult<AttachEvent>> {
    const result = await this.request("attach", path === undefined ? { repo } : { repo, path });
    this.view.applyOwnEvent(result.event);
    return result;
  }

  async handoff(repo: string, task: string, target: string): Promise<EventResult<HandoffEvent>> {
    const result = await this.request("handoff", { repo, task, target });
    this.view.applyOwnEvent(result.event);
    return result;
  }

  async recordLedger(amount: number, description?: string): Promise<LedgerResult> {
    const result = await this.request("ledger", description === undefined ? { amount } : { amount, description });
    this.view.addLedgerEntry(result.entry);
    return result;
  }

  /** Sends one heartbeat; re-registers when the broker no longer knows this node. */
  async sendHeartbeat(): Promise<HeartbeatResult> {
    const result = await this.request("heartbeat", {});
    if (!result.known) {
      this.logger.warn("Broker does not know this node, re-registering", { node_id: this.nodeId });
      await this.register();
    }
    return result;
  }

  /** Totals over the local replica of the ledger. */
  ledgerSummary(): LedgerTotals {
    return this.view.totals();
  }

  state(): TeamSnapshot | null {
    return this.view.snapshot();
  }

  on(listener: TeamEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  async close(): Promise<void> {
    this.stopHeartbeat();
    const ws = this.ws;
    if (!ws || ws.readyState === WebSocket.CLOSED) return;
    await new Promise<void>((resolve) => {
      ws.once("close", () => resolve());
      ws.close(1000, "Client closing");
    });
  }

  async request<M extends BrokerMethod>(method: M, params: BrokerMethodParams[M]): Promise<BrokerMethodResults[M]> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      throw new TeamError("ConnectionClosed", "Not connected to the team broker");
    }
    const id = uuid();
    const response = new Promise<ResponseBody>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
    });
    ws.send(encodeFrame(sealFrame(this.encryptor, requestBody(method, params), id)), (err) => {
      if (err) this.pending.get(id)?.reject(new TeamError("ConnectionClosed", `Send failed: ${err.message}`));
    });

    let body: ResponseBody;
    try {
      body = await withTimeout(response, this.requestTimeoutMs, `Request "${method}"`);
    } finally {
      this.pending.delete(id);
    }
    if ("error" in body) throw TeamError.fromBody(body);

    const result = body.result;
    const validate = BROKER_RESULT_VALIDATORS[method];
    if (!validate(result)) {
      throw new TeamError("FrameError", `Malformed "${method}" result: ${formatErrors(validate.errors).join(", ")}`);
    }
    return result;
  }

  private async register(): Promise<TeamSnapshot> {
    const snapshot = await this.request("register", this.node);
    this.view.applySnapshot(snapshot);
    return snapshot;
  }

  private async connect(): Promise<void> {
    if (this.ws && this.ws.readyState === WebSocket.OPEN) return;
    const ws = new WebSocket(this.url);
    await new Promise<void>((resolve, reject) => {
      const onOpen = () => {
        ws.off("error", onError);
        resolve();
      };
      const onError = (err: Error) => {
        ws.off("open", onOpen);
        reject(new TeamError("ConnectionClosed", `Cannot reach team broker at ${this.url}: ${err.message}`));
      };
      ws.once("open", onOpen);
      ws.once("error", onError);
    });

    ws.on("message", (data, isBinary) => {
      if (!isBinary) this.handleMessage(rawDataToString(data));
    });
    ws.on("close", (code, reason) => this.handleClose(code, reason.toString("utf-8")));
    ws.on("error", (err) => logError(this.logger, "Team connection error", err));
    this.ws = ws;
  }

  private handleMessage(raw: string): void {
    const decoded = decodeFrame(raw);
    if (!decoded.ok) {
      this.logger.warn("Dropped frame from broker", { code: decoded.error.code, reason: decoded.error.message });
      return;
    }
    const opened = openFrame(this.encryptor, decoded.value);
    if (!opened.ok) {
      this.logger.warn("Dropped frame from broker", { code: opened.error.code, reason: opened.error.message });
      return;
    }
    const body = opened.value;

    if (isRequestBody(body)) {
      this.dispatcher.dispatch(body.method, body.params, null).catch((err: unknown) => {
        logError(this.logger, `Rejected "${body.method}" notification`, err);
      });
      return;
    }

    const id = decoded.value.id;
    const pending = id === undefined ? undefined : this.pending.get(id);
    if (!pending) {
      this.logger.debug("Ignoring response with no matching request", { id });
      return;
    }
    pending.resolve(body);
  }

  private handleEvent(event: TeamEvent): void {
    if (!this.view.applyEvent(event)) return;
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        logError(this.logger, "Team event listener failed", err, { kind: event.kind, seq: event.seq });
      }
    }
  }

  private handleClose(code: number, reason: string): void {
    this.stopHeartbeat();
    this.ws = undefined;
    for (const [id, pending] of this.pending) {
      pending.reject(new TeamError("ConnectionClosed", `Connection closed (${code}) before a reply arrived`));
      this.pending.delete(id);
    }
    this.logger.info("Disconnected from team broker", { code, reason });
    this.onClose?.(code, reason);
  }

  private startHeartbeat(): void {
    if (this.heartbeatTimer) return;
    this.heartbeatTimer = setInterval(() => {
      this.sendHeartbeat().catch((err: unknown) => logError(this.logger, "Heartbeat failed", err));
    }, this.heartbeatIntervalMs);
    this.heartbeatTimer.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
  }
}
