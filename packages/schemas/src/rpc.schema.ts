import { NODE_ROLES, TEAM_MODES } from "./types.js";

const MAX_ID_LENGTH = 256;
const MAX_TEXT_LENGTH = 10_000;

const nodeId = { type: "string", minLength: 1, maxLength: MAX_ID_LENGTH } as const;
const base64 = { type: "string", minLength: 1, pattern: "^[A-Za-z0-9+/]+={0,2}$" } as const;

export const FrameSchema = {
  type: "object",
  required: ["jsonrpc", "payload"],
  properties: {
    jsonrpc: { const: "2.0" },
    id: { type: "string", minLength: 1, maxLength: MAX_ID_LENGTH },
    payload: {
      type: "object",
      required: ["nonce", "ciphertext"],
      properties: { nonce: base64, ciphertext: base64 },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const;

export const RpcBodySchema = {
  oneOf: [
    {
      type: "object",
      required: ["protocol_version", "method", "params"],
      properties: {
        protocol_version: { type: "integer", minimum: 1 },
        method: { type: "string", minLength: 1, maxLength: 64 },
        params: { type: "object" },
      },
    },
    {
      type: "object",
      required: ["result"],
      not: { anyOf: [{ required: ["method"] }, { required: ["error"] }] },
    },
    {
      type: "object",
      required: ["error", "code"],
      properties: {
        error: { type: "string" },
        code: { type: "string", minLength: 1 },
      },
      not: { required: ["method"] },
    },
  ],
} as const;

// ─── Broker method params ───────────────────────────────────────────

export const RegisterParamsSchema = {
  type: "object",
  required: ["node_id"],
  properties: {
    node_id: nodeId,
    name: { type: "string", minLength: 1, maxLength: MAX_ID_LENGTH },
    role: { type: "string", enum: NODE_ROLES },
    capabilities: {
      type: "array",
      maxItems: 256,
      items: { type: "string", minLength: 1, maxLength: MAX_ID_LENGTH },
    },
    host: { type: "string", maxLength: MAX_ID_LENGTH },
  },
} as const;

export const BroadcastParamsSchema = {
  type: "object",
  required: ["message"],
  properties: {
    message: { type: "string", minLength: 1, maxLength: MAX_ID_LENGTH },
    payload: { type: "object" },
  },
} as const;

export const LedgerParamsSchema = {
  type: "object",
  required: ["amount"],
  properties: {
    amount: { type: "number" },
    description: { type: "string", maxLength: MAX_TEXT_LENGTH },
    actor_node_id: nodeId,
  },
} as const;

export const AttachParamsSchema = {
  type: "object",
  required: ["repo"],
  properties: {
    repo: { type: "string", minLength: 1, maxLength: MAX_ID_LENGTH },
    path: { type: "string", maxLength: 4096 },
    node_id: nodeId,
  },
} as const;

export const HandoffParamsSchema = {
  type: "object",
  required: ["repo", "task", "target"],
  properties: {
    repo: { type: "string", minLength: 1, maxLength: MAX_ID_LENGTH },
    task: { type: "string", minLength: 1, maxLength: MAX_TEXT_LENGTH },
    target: nodeId,
  },
} as const;

export const ModeParamsSchema = {
  type: "object",
  required: ["mode"],
  properties: {
    mode: { type: "string", enum: TEAM_MODES },
  },
} as const;

export const NodeRefParamsSchema = {
  type: "object",
  properties: {
    node_id: nodeId,
  },
} as const;

// ─── Persisted state ────────────────────────────────────────────────

export const LedgerEntrySchema = {
  type: "object",
  required: ["id", "timestamp", "actor_node_id", "amount", "description"],
  properties: {
    id: { type: "integer", minimum: 1 },
    timestamp: { type: "string", format: "date-time" },
    actor_node_id: nodeId,
    amount: { type: "number" },
    description: { type: "string" },
  },
} as const;

export const TeamNodeSchema = {
  type: "object",
  required: ["node_id", "name", "role", "capabilities", "host", "last_heartbeat", "joined_at"],
  properties: {
    node_id: nodeId,
    name: { type: "string" },
    role: { type: "string", enum: NODE_ROLES },
    capabilities: { type: "array", items: { type: "string" } },
    host: { type: "string" },
    last_heartbeat: { type: "string", format: "date-time" },
    joined_at: { type: "string", format: "date-time" },
  },
} as const;

export const TeamSnapshotSchema = {
  type: "object",
  required: ["team_id", "mode", "nodes", "ledger", "attachments"],
  properties: {
    team_id: { type: "string", minLength: 1 },
    mode: { type: "string", enum: TEAM_MODES },
    nodes: { type: "array", items: TeamNodeSchema },
    ledger: { type: "array", items: LedgerEntrySchema },
    attachments: { type: "object", additionalProperties: { type: "string" } },
  },
} as const;

// ─── Client notifications ───────────────────────────────────────────

export const TeamEventSchema = {
  type: "object",
  required: ["kind", "seq", "timestamp"],
  properties: {
    kind: { type: "string", enum: ["join", "leave", "broadcast", "ledger", "attach", "handoff", "mode"] },
    seq: { type: "integer", minimum: 1 },
    timestamp: { type: "string", format: "date-time" },
  },
} as const;

export const LedgerEventSchema = {
  type: "object",
  required: ["kind", "seq", "timestamp", "entry"],
  properties: {
    kind: { const: "ledger" },
    seq: { type: "integer", minimum: 1 },
    entry: LedgerEntrySchema,
  },
} as const;

export const ModeEventSchema = {
  type: "object",
  required: ["kind", "seq", "timestamp", "mode", "previous"],
  properties: {
    kind: { const: "mode" },
    seq: { type: "integer", minimum: 1 },
    mode: { type: "string", enum: TEAM_MODES },
    previous: { type: "string", enum: TEAM_MODES },
  },
} as const;

// ─── Method results ─────────────────────────────────────────────────

const ok = { const: "ok" } as const;

export const BroadcastResultSchema = {
  type: "object",
  required: ["status", "delivered"],
  properties: { status: ok, delivered: { type: "integer", minimum: 0 } },
} as const;

export const LedgerResultSchema = {
  type: "object",
  required: ["entry", "totals", "persisted"],
  properties: {
    entry: LedgerEntrySchema,
    totals: {
      type: "object",
      required: ["total", "count", "by_actor"],
      properties: {
        total: { type: "number" },
        count: { type: "integer", minimum: 0 },
        by_actor: { type: "object", additionalProperties: { type: "number" } },
      },
    },
    persisted: { type: "boolean" },
  },
} as const;

export const AttachResultSchema = {
  type: "object",
  required: ["status", "event"],
  properties: {
    status: ok,
    event: {
      type: "object",
      required: ["kind", "seq", "timestamp", "repo", "path", "node_id", "previous_owner"],
      properties: {
        kind: { const: "attach" },
        seq: { type: "integer", minimum: 1 },
        repo: { type: "string" },
        path: { type: "string" },
        node_id: { type: "string" },
        previous_owner: { type: ["string", "null"] },
      },
    },
  },
} as const;

export const HandoffResultSchema = {
  type: "object",
  required: ["status", "event"],
  properties: {
    status: ok,
    event: {
      type: "object",
      required: ["kind", "seq", "timestamp", "repo", "task", "source", "target"],
      properties: {
        kind: { const: "handoff" },
        seq: { type: "integer", minimum: 1 },
        repo: { type: "string" },
        task: { type: "string" },
        source: { type: "string" },
        target: { type: "string" },
      },
    },
  },
} as const;

export const ModeResultSchema = {
  type: "object",
  required: ["status", "mode", "changed"],
  properties: { status: ok, mode: { type: "string", enum: TEAM_MODES }, changed: { type: "boolean" } },
} as const;

export const HeartbeatResultSchema = {
  type: "object",
  required: ["status", "known"],
  properties: { status: ok, known: { type: "boolean" } },
} as const;

export const LeaveResultSchema = {
  type: "object",
  required: ["status", "removed"],
  properties: { status: ok, removed: { type: "boolean" } },
} as const;

// ─── Configuration file ─────────────────────────────────────────────

const positiveInt = { type: "integer", minimum: 1 } as const;

export const ConfigFileSchema = {
  type: "object",
  properties: {
    team_key: { type: "string" },
    team_id: { type: "string", minLength: 1 },
    host: { type: "string", minLength: 1 },
    port: { type: "integer", minimum: 0, maximum: 65535 },
    data_dir: { type: "string", minLength: 1 },
    heartbeat_interval_ms: positiveInt,
    miss_threshold: positiveInt,
    max_queued_frames: positiveInt,
    ephemeral: { type: "boolean" },
    fsync: { type: "boolean" },
    broker_url: { type: "string", pattern: "^wss?://" },
  },
  additionalProperties: false,
} as const;
