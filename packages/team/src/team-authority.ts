import {
  ConsoleLogger,
  TeamError,
  invalidParams,
  logError,
  notRegistered,
  unknownNode,
  unknownRepo,
} from "@teamwire/schemas";
import type {
  AttachEvent,
  AttachParams,
  BroadcastParams,
  BroadcastResult,
  EventResult,
  HandoffEvent,
  HandoffParams,
  HeartbeatParams,
  HeartbeatResult,
  LeaveParams,
  LeaveResult,
  LedgerEntry,
  LedgerParams,
  LedgerResult,
  ModeParams,
  ModeResult,
  RegisterParams,
  TeamEvent,
  TeamLogger,
  TeamNode,
  TeamPersistence,
  TeamSnapshot,
} from "@teamwire/schemas";
import { NodeRegistry } from "./node-registry.js";
import { Ledger } from "./ledger.js";
import { AttachmentMap } from "./attachment-map.js";
import { ModeState } from "./mode-state.js";

/** Per-connection state the authority reads and updates. */
export interface SessionBinding {
  readonly session_id: string | null;
  readonly remote_host: string;
  /** Node bound to the connection; set by `register`, cleared by `leave`. */
  node_id: string | null;
}

/** One call into the authority. */
export interface CallContext {
  session: SessionBinding;
  /**
   * Runs inside the critical section with the call's result, so a reply
   * queued here reaches the caller ahead of any later mutation's events.
   */
  commit?: (result: unknown) => void;
}

export interface EventTarget {
  /** The calling session; it gets the reply instead of the event. */
  exceptSession?: string | null;
  /** A node that must not see the event, e.g. one just evicted. */
  exceptNode?: string;
}

/** Fans an event out to sessions; returns how many it was queued on. */
export type EventPublisher = (event: TeamEvent, target: EventTarget) => number;

export interface TeamAuthorityOptions {
  teamId: string;
  store: TeamPersistence;
  publish?: EventPublisher;
  logger?: TeamLogger;
  now?: () => Date;
}

export interface RestoreSummary {
  nodes: number;
  entries: number;
  mode: TeamSnapshot["mode"];
}

/**
 * Sole owner of team state. Every mutation, whether it comes from a
 * session or from the heartbeat sweep, runs through `run()`, one at a
 * time and in submission order. Events are stamped with `seq` and handed
 * to the publisher inside that critical section.
 */
export class TeamAuthority {
  readonly teamId: string;
  private store: TeamPersistence;
  private publish: EventPublisher;
  private logger: TeamLogger;
  private now: () => Date;

  private registry = new NodeRegistry();
  private ledger = new Ledger();
  private attachments = new AttachmentMap();
  private mode = new ModeState();

  private writeLock: Promise<void> = Promise.resolve();
  private seq = 0;
  private pendingLedger: LedgerEntry[] = [];
  private snapshotDirty = false;
  private closed = false;

  constructor(options: TeamAuthorityOptions) {
    this.teamId = options.teamId;
    this.store = options.store;
    this.publish = options.publish ?? (() => 0);
    this.logger = options.logger ?? new ConsoleLogger("team-authority");
    this.now = options.now ?? (() => new Date());
  }

  /** Serializes `fn` behind every mutation submitted before it. */
  async run<T>(fn: () => Promise<T> | T, commit?: (result: T) => void): Promise<T> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      if (this.closed) {
        throw new TeamError("ConnectionClosed", "Team authority is closed");
      }
      const result = await fn();
      commit?.(result);
      return result;
    } finally {
      releaseLock();
    }
  }

  /** Loads persisted state. Call once, before serving. */
  async restore(): Promise<RestoreSummary> {
    return this.run(async () => {
      await this.store.init();
      const snapshot = await this.store.loadSnapshot();
      const logged = await this.store.loadLedger();
      const now = this.now();

      if (snapshot) {
        this.registry.restore(snapshot.nodes, now);
        this.ledger.restore(snapshot.ledger);
        this.attachments.restore(snapshot.attachments, (id) => this.registry.has(id));
        this.mode.set(snapshot.mode);
      }
      this.ledger.restore(logged);

      // Entries that only the snapshot had still belong in the log
      const loggedIds = new Set(logged.map((e) => e.id));
      const lastLogged = logged.reduce((max, e) => Math.max(max, e.id), 0);
      this.pendingLedger = this.ledger.list().filter((e) => !loggedIds.has(e.id) && e.id > lastLogged);

      const summary = { nodes: this.registry.size, entries: this.ledger.size, mode: this.mode.current };
      this.logger.info("Restored team state", { team_id: this.teamId, ...summary });
      return summary;
    });
  }

  register(params: RegisterParams, caller: CallContext): Promise<TeamSnapshot> {
    return this.run(async () => {
      const { node, replaced } = this.registry.register(params, this.now(), caller.session.remote_host);
      caller.session.node_id = node.node_id;
      this.emit({ kind: "join", node, ...this.stamp() }, { exceptSession: caller.session.session_id });
      if (replaced) {
        this.logger.info("Node re-registered", { node_id: node.node_id });
      } else {
        this.logger.info("Node joined", { node_id: node.node_id, role: node.role });
      }

      await this.persistCapabilities(node);
      await this.persistSnapshot();
      return this.snapshot();
    }, caller.commit);
  }

  broadcast(params: BroadcastParams, caller: CallContext): Promise<BroadcastResult> {
    return this.run(() => {
      const delivered = this.emit(
        { kind: "broadcast", from: caller.session.node_id, message: params.message, payload: params.payload ?? {}, ...this.stamp() },
        { exceptSession: caller.session.session_id },
      ).delivered;
      return { status: "ok", delivered };
    }, caller.commit);
  }

  recordLedger(params: LedgerParams, caller: CallContext): Promise<LedgerResult> {
    return this.run(async () => {
      const actor = params.actor_node_id ?? caller.session.node_id;
      if (actor === null) throw notRegistered("ledger");
      if (!Number.isFinite(params.amount)) {
        throw invalidParams("ledger", [`/amount: must be a finite number`]);
      }

      const entry = this.ledger.append(actor, params.amount, params.description ?? "", this.now());
      this.pendingLedger.push(entry);
      const persisted = await this.flushLedger();

      this.emit({ kind: "ledger", entry, ...this.stamp() }, { exceptSession: caller.session.session_id });
      await this.persistSnapshot();
      return { entry, totals: this.ledger.totals(), persisted };
    }, caller.commit);
  }

  attach(params: AttachParams, caller: CallContext): Promise<EventResult<AttachEvent>> {
    return this.run(async () => {
      const nodeId = params.node_id ?? caller.session.node_id;
      if (nodeId === null) throw notRegistered("attach");
      if (!this.registry.has(nodeId)) throw unknownNode(nodeId);

      const previous = this.attachments.attach(params.repo, nodeId);
      const event: AttachEvent = {
        kind: "attach",
        repo: params.repo,
        path: params.path ?? "",
        node_id: nodeId,
        previous_owner: previous,
        ...this.stamp(),
      };
      this.emit(event, { exceptSession: caller.session.session_id });
      await this.persistSnapshot();
      return { status: "ok", event };
    }, caller.commit);
  }

  handoff(params: HandoffParams, caller: CallContext): Promise<EventResult<HandoffEvent>> {
    return this.run(async () => {
      const source = this.attachments.owner(params.repo);
      if (source === undefined) throw unknownRepo(params.repo);
      if (!this.registry.has(params.target)) throw unknownNode(params.target);

      this.attachments.transfer(params.repo, params.target);
      const event: HandoffEvent = {
        kind: "handoff",
        repo: params.repo,
        task: params.task,
        source,
        target: params.target,
        ...this.stamp(),
      };
      this.emit(event, { exceptSession: caller.session.session_id });
      await this.persistSnapshot();
      return { status: "ok", event };
    }, caller.commit);
  }

  setMode(params: ModeParams, caller: CallContext): Promise<ModeResult> {
    return this.run(async () => {
      const { previous, changed } = this.mode.set(params.mode);
      // every session, the caller included, learns the mode
      this.emit({ kind: "mode", mode: params.mode, previous, ...this.stamp() }, {});
      if (changed) this.logger.info("Team mode changed", { from: previous, to: params.mode });
      await this.persistSnapshot();
      return { status: "ok", mode: params.mode, changed };
    }, caller.commit);
  }

  heartbeat(params: HeartbeatParams, caller: CallContext): Promise<HeartbeatResult> {
    return this.run(async () => {
      const nodeId = params.node_id ?? caller.session.node_id;
      const known = nodeId !== null && this.registry.heartbeat(nodeId, this.now());
      // heartbeats alone do not rewrite the snapshot; a pending retry still goes out
      if (this.snapshotDirty) await this.persistSnapshot();
      return { status: "ok", known };
    }, caller.commit);
  }

  leave(params: LeaveParams, caller: CallContext): Promise<LeaveResult> {
    return this.run(async () => {
      const nodeId = params.node_id ?? caller.session.node_id;
      if (nodeId === null) throw notRegistered("leave");
      const removed = this.removeNode(nodeId, "leave", { exceptSession: caller.session.session_id });
      if (caller.session.node_id === nodeId) caller.session.node_id = null;
      if (removed) await this.persistSnapshot();
      return { status: "ok", removed };
    }, caller.commit);
  }

  /** Evicts every node silent for longer than `timeoutMs`. */
  sweep(timeoutMs: number): Promise<string[]> {
    return this.run(async () => {
      const evicted = this.registry.stale(this.now(), timeoutMs);
      for (const nodeId of evicted) {
        this.removeNode(nodeId, "heartbeat_timeout", { exceptNode: nodeId });
      }
      if (evicted.length > 0) await this.persistSnapshot();
      return evicted;
    });
  }

  /** Current state. Safe to call at any time; reads never wait for the lock. */
  snapshot(): TeamSnapshot {
    return {
      team_id: this.teamId,
      mode: this.mode.current,
      nodes: this.registry.list(),
      ledger: this.ledger.list(),
      attachments: this.attachments.toRecord(),
    };
  }

  getNode(nodeId: string): TeamNode | undefined {
    return this.registry.get(nodeId);
  }

  /** Ledger entries accepted but not yet in the log. */
  get pendingLedgerCount(): number {
    return this.pendingLedger.length;
  }

  get isSnapshotDirty(): boolean {
    return this.snapshotDirty;
  }

  /**
   * Flushes pending persistence and releases the store. Mutations
   * submitted after this resolve are rejected.
   */
  async close(): Promise<void> {
    await this.run(async () => {
      await this.flushLedger();
      if (this.snapshotDirty) await this.persistSnapshot();
      this.closed = true;
    }).catch((err: unknown) => {
      if (!(err instanceof TeamError && err.code === "ConnectionClosed")) throw err;
    });
    await this.store.close();
  }

  private removeNode(nodeId: string, reason: "leave" | "heartbeat_timeout", target: EventTarget): boolean {
    const node = this.registry.remove(nodeId);
    if (!node) return false;
    const released = this.attachments.releaseNode(nodeId);
    this.emit({ kind: "leave", node_id: nodeId, reason, released_repos: released, ...this.stamp() }, target);
    this.logger.info(reason === "leave" ? "Node left" : "Node timed out", { node_id: nodeId, released_repos: released });
    return true;
  }

  private stamp(): { seq: number; timestamp: string } {
    this.seq += 1;
    return { seq: this.seq, timestamp: this.now().toISOString() };
  }

  private emit(event: TeamEvent, target: EventTarget): { delivered: number } {
    let delivered = 0;
    try {
      delivered = this.publish(event, target);
    } catch (err) {
      logError(this.logger, "Event fan-out failed", err, { kind: event.kind, seq: event.seq });
    }
    return { delivered };
  }

  /** Writes pending ledger entries in id order; stops at the first failure. */
  private async flushLedger(): Promise<boolean> {
    while (this.pendingLedger.length > 0) {
      const next = this.pendingLedger[0];
      if (next === undefined) break;
      try {
        await this.store.appendLedger(next);
      } catch (err) {
        logError(this.logger, "Ledger write failed", err, {
          team_id: this.teamId,
          entry_id: next.id,
          pending: this.pendingLedger.length,
        });
        return false;
      }
      this.pendingLedger.shift();
    }
    return true;
  }

  private async persistSnapshot(): Promise<void> {
    try {
      await this.store.writeSnapshot(this.snapshot());
      this.snapshotDirty = false;
    } catch (err) {
      this.snapshotDirty = true;
      logError(this.logger, "Snapshot write failed", err, { team_id: this.teamId });
    }
  }

  private async persistCapabilities(node: TeamNode): Promise<void> {
    try {
      await this.store.writeCapabilities({
        node_id: node.node_id,
        name: node.name,
        host: node.host,
        role: node.role,
        capabilities: node.capabilities,
        updated_at: node.last_heartbeat,
      });
    } catch (err) {
      logError(this.logger, "Capability write failed", err, { team_id: this.teamId, node_id: node.node_id });
    }
  }
}
