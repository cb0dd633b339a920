/**
 * Teamwire Core Types
 *
 * Canonical data model shared by the broker, its clients and the
 * persistence layer. Everything that crosses the wire or lands on disk
 * is described here.
 */

// ─── Team ───────────────────────────────────────────────────────────

export type NodeRole = "admin" | "editor" | "observer";

export type TeamMode = "sync" | "async" | "review";

export const NODE_ROLES: readonly NodeRole[] = ["admin", "editor", "observer"];
export const TEAM_MODES: readonly TeamMode[] = ["sync", "async", "review"];

export interface TeamNode {
  node_id: string;
  name: string;
  role: NodeRole;
  /** Declared skills; kept sorted and de-duplicated. */
  capabilities: string[];
  host: string;
  last_heartbeat: string;
  joined_at: string;
}

export interface LedgerEntry {
  id: number;
  timestamp: string;
  actor_node_id: string;
  amount: number;
  description: string;
}

export interface LedgerTotals {
  total: number;
  count: number;
  by_actor: Record<string, number>;
}

export interface TeamSnapshot {
  team_id: string;
  mode: TeamMode;
  nodes: TeamNode[];
  ledger: LedgerEntry[];
  /** repo → owning node_id */
  attachments: Record<string, string>;
}

// ─── Events (payload of `team.event`) ──────────────────────────────

export type LeaveReason = "leave" | "heartbeat_timeout";

interface TeamEventBase {
  /** Position in the broker's serialized mutation order. */
  seq: number;
  timestamp: string;
}

export interface JoinEvent extends TeamEventBase {
  kind: "join";
  node: TeamNode;
}

export interface LeaveEvent extends TeamEventBase {
  kind: "leave";
  node_id: string;
  reason: LeaveReason;
  released_repos: string[];
}

export interface BroadcastEvent extends TeamEventBase {
  kind: "broadcast";
  from: string | null;
  message: string;
  payload: Record<string, unknown>;
}

export interface LedgerEvent extends TeamEventBase {
  kind: "ledger";
  entry: LedgerEntry;
}

export interface AttachEvent extends TeamEventBase {
  kind: "attach";
  repo: string;
  path: string;
  node_id: string;
  previous_owner: string | null;
}

export interface HandoffEvent extends TeamEventBase {
  kind: "handoff";
  repo: string;
  task: string;
  source: string;
  target: string;
}

export interface ModeEvent extends TeamEventBase {
  kind: "mode";
  mode: TeamMode;
  previous: TeamMode;
}

export type TeamEvent =
  | JoinEvent
  | LeaveEvent
  | BroadcastEvent
  | LedgerEvent
  | AttachEvent
  | HandoffEvent
  | ModeEvent;

export type TeamEventKind = TeamEvent["kind"];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event before the broker stamps its position and time. */
export type TeamEventInput = DistributiveOmit<TeamEvent, "seq" | "timestamp">;

// ─── Method params ──────────────────────────────────────────────────

export interface RegisterParams {
  node_id: string;
  name?: string;
  role?: NodeRole;
  capabilities?: string[];
  host?: string;
}

export interface BroadcastParams {
  message: string;
  payload?: Record<string, unknown>;
}

export interface LedgerParams {
  amount: number;
  description?: string;
  actor_node_id?: string;
}

export interface AttachParams {
  repo: string;
  path?: string;
  node_id?: string;
}

export interface HandoffParams {
  repo: string;
  task: string;
  target: string;
}

export interface ModeParams {
  mode: TeamMode;
}

export interface HeartbeatParams {
  node_id?: string;
}

export interface LeaveParams {
  node_id?: string;
}

/** Methods the broker answers, keyed to their params. */
export interface BrokerMethodParams {
  register: RegisterParams;
  broadcast: BroadcastParams;
  ledger: LedgerParams;
  attach: AttachParams;
  handoff: HandoffParams;
  mode: ModeParams;
  heartbeat: HeartbeatParams;
  leave: LeaveParams;
}

/** Notifications a client accepts from the broker. */
export interface ClientMethodParams {
  "team.event": TeamEvent;
  ledger: LedgerEvent;
  mode: ModeEvent;
}

export type BrokerMethod = keyof BrokerMethodParams;
export type TeamMethod = BrokerMethod | "team.event";

export const TEAM_METHODS: readonly TeamMethod[] = [
  "register", "broadcast", "ledger", "attach", "handoff", "mode", "heartbeat", "leave", "team.event",
];

// ─── Method results ─────────────────────────────────────────────────

export interface BroadcastResult {
  status: "ok";
  delivered: number;
}

export interface LedgerResult {
  entry: LedgerEntry;
  totals: LedgerTotals;
  /** False when the ledger log write failed; the entry is retried on the next write. */
  persisted: boolean;
}

export interface EventResult<E extends TeamEvent> {
  status: "ok";
  event: E;
}

export interface ModeResult {
  status: "ok";
  mode: TeamMode;
  changed: boolean;
}

export interface HeartbeatResult {
  status: "ok";
  known: boolean;
}

export interface LeaveResult {
  status: "ok";
  removed: boolean;
}

export interface BrokerMethodResults {
  register: TeamSnapshot;
  broadcast: BroadcastResult;
  ledger: LedgerResult;
  attach: EventResult<AttachEvent>;
  handoff: EventResult<HandoffEvent>;
  mode: ModeResult;
  heartbeat: HeartbeatResult;
  leave: LeaveResult;
}

// ─── Wire ───────────────────────────────────────────────────────────

export const PROTOCOL_VERSION = 1;

export interface EncryptedPayload {
  /** base64 */
  nonce: string;
  /** base64; ciphertext followed by the authentication tag */
  ciphertext: string;
}

export interface Frame {
  jsonrpc: "2.0";
  id?: string;
  payload: EncryptedPayload;
}

export interface RpcRequestBody {
  protocol_version: number;
  method: string;
  params: object;
}

export interface RpcResultBody {
  result: unknown;
}

export interface RpcErrorBody {
  error: string;
  code: TeamErrorCode;
}

export type RpcBody = RpcRequestBody | RpcResultBody | RpcErrorBody;

// ─── Errors ─────────────────────────────────────────────────────────

export type TeamErrorCode =
  | "DecryptFailure"
  | "FrameError"
  | "UnknownMethod"
  | "InvalidParams"
  | "UnknownNode"
  | "UnknownRepo"
  | "NotRegistered"
  | "PersistenceFailure"
  | "HeartbeatTimeout"
  | "Timeout"
  | "ConnectionClosed"
  | "InternalError";

// ─── Logging ────────────────────────────────────────────────────────

export interface TeamLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

// ─── Configuration file ─────────────────────────────────────────────

/** The optional YAML file read by the command line. Every key is optional. */
export interface TeamwireConfigFile {
  team_key?: string;
  team_id?: string;
  host?: string;
  port?: number;
  data_dir?: string;
  heartbeat_interval_ms?: number;
  miss_threshold?: number;
  max_queued_frames?: number;
  ephemeral?: boolean;
  fsync?: boolean;
  /** Where `teamwire join` connects. */
  broker_url?: string;
}

// ─── Persistence ────────────────────────────────────────────────────

export interface CapabilityRecord {
  node_id: string;
  name: string;
  host: string;
  role: NodeRole;
  capabilities: string[];
  updated_at: string;
}

/** What the broker needs from durable storage. */
export interface TeamPersistence {
  init(): Promise<void>;
  loadSnapshot(): Promise<TeamSnapshot | null>;
  loadLedger(): Promise<LedgerEntry[]>;
  writeSnapshot(snapshot: TeamSnapshot): Promise<void>;
  appendLedger(entry: LedgerEntry): Promise<void>;
  writeCapabilities(record: CapabilityRecord): Promise<void>;
  close(): Promise<void>;
}
