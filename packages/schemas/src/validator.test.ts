import { describe, it, expect } from "vitest";
import {
  BROKER_PARAM_VALIDATORS,
  CLIENT_PARAM_VALIDATORS,
  BROKER_RESULT_VALIDATORS,
  isFrame,
  isRpcBody,
  validateFrameData,
  validateRpcBodyData,
  isLedgerEntry,
  isTeamSnapshot,
  validateTeamSnapshotData,
  isConfigFile,
  validateConfigFileData,
} from "./validator.js";
import { TeamError, toErrorBody, unknownMethod } from "./errors.js";

describe("frame validation", () => {
  const frame = () => ({
    jsonrpc: "2.0",
    id: "req-1",
    payload: { nonce: "AAAAAAAAAAAAAAAA", ciphertext: "c2VjcmV0" },
  });

  it("accepts a request frame", () => {
    expect(validateFrameData(frame())).toEqual({ valid: true, errors: [] });
  });

  it("accepts a notification frame without id", () => {
    const { id: _id, ...notification } = frame();
    expect(isFrame(notification)).toBe(true);
  });

  it("rejects a wrong protocol tag", () => {
    expect(isFrame({ ...frame(), jsonrpc: "1.0" })).toBe(false);
  });

  it("rejects a payload that is not base64", () => {
    const result = validateFrameData({ ...frame(), payload: { nonce: "not base64!", ciphertext: "c2VjcmV0" } });
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toContain("/payload/nonce");
  });

  it("rejects unknown top-level fields", () => {
    expect(isFrame({ ...frame(), extra: true })).toBe(false);
  });
});

describe("rpc body validation", () => {
  it("accepts a request body", () => {
    expect(isRpcBody({ protocol_version: 1, method: "mode", params: { mode: "sync" } })).toBe(true);
  });

  it("accepts a result body", () => {
    expect(isRpcBody({ result: { status: "ok" } })).toBe(true);
  });

  it("accepts an error body", () => {
    expect(isRpcBody({ error: "nope", code: "UnknownMethod" })).toBe(true);
  });

  it("rejects a request without params", () => {
    expect(validateRpcBodyData({ method: "mode" }).valid).toBe(false);
  });

  it("rejects an error body without a code", () => {
    expect(isRpcBody({ error: "nope" })).toBe(false);
  });
});

describe("broker param validators", () => {
  it("requires node_id on register", () => {
    expect(BROKER_PARAM_VALIDATORS.register({ name: "n1" })).toBe(false);
    expect(BROKER_PARAM_VALIDATORS.register({ node_id: "n1", role: "admin", capabilities: ["review"] })).toBe(true);
  });

  it("rejects unknown roles", () => {
    expect(BROKER_PARAM_VALIDATORS.register({ node_id: "n1", role: "owner" })).toBe(false);
  });

  it("only accepts the three modes", () => {
    expect(BROKER_PARAM_VALIDATORS.mode({ mode: "review" })).toBe(true);
    expect(BROKER_PARAM_VALIDATORS.mode({ mode: "paused" })).toBe(false);
  });

  it("requires a numeric ledger amount", () => {
    expect(BROKER_PARAM_VALIDATORS.ledger({ amount: 5 })).toBe(true);
    expect(BROKER_PARAM_VALIDATORS.ledger({ amount: "5" })).toBe(false);
  });

  it("requires repo, task and target on handoff", () => {
    expect(BROKER_PARAM_VALIDATORS.handoff({ repo: "alpha", task: "review" })).toBe(false);
    expect(BROKER_PARAM_VALIDATORS.handoff({ repo: "alpha", task: "review", target: "n2" })).toBe(true);
  });

  it("accepts an empty heartbeat", () => {
    expect(BROKER_PARAM_VALIDATORS.heartbeat({})).toBe(true);
  });
});

describe("client param validators", () => {
  it("accepts a team event", () => {
    const event = { kind: "mode", seq: 3, timestamp: new Date().toISOString(), mode: "async", previous: "sync" };
    expect(CLIENT_PARAM_VALIDATORS["team.event"](event)).toBe(true);
    expect(CLIENT_PARAM_VALIDATORS.mode(event)).toBe(true);
  });

  it("rejects an event with an unknown kind", () => {
    expect(CLIENT_PARAM_VALIDATORS["team.event"]({ kind: "explode", seq: 1, timestamp: new Date().toISOString() })).toBe(false);
  });
});

describe("TeamError", () => {
  it("round-trips through an error body", () => {
    const err = unknownMethod("teleport");
    const body = err.toBody();
    expect(body).toEqual({ error: 'Unknown RPC method "teleport"', code: "UnknownMethod" });
    const rebuilt = TeamError.fromBody(body);
    expect(rebuilt).toBeInstanceOf(Error);
    expect(rebuilt.code).toBe("UnknownMethod");
  });

  it("maps foreign errors to InternalError", () => {
    expect(toErrorBody(new Error("disk on fire"))).toEqual({ error: "disk on fire", code: "InternalError" });
    expect(toErrorBody("plain")).toEqual({ error: "plain", code: "InternalError" });
  });
});

describe("persisted state validation", () => {
  const now = "2026-03-01T10:00:00.000Z";

  it("accepts a well-formed snapshot", () => {
    const snapshot = {
      team_id: "t1",
      mode: "review",
      nodes: [{
        node_id: "n1", name: "n1", role: "editor", capabilities: ["ts"], host: "box",
        last_heartbeat: now, joined_at: now,
      }],
      ledger: [{ id: 1, timestamp: now, actor_node_id: "n1", amount: 2.5, description: "gpu" }],
      attachments: { "repo-a": "n1" },
    };
    expect(isTeamSnapshot(snapshot)).toBe(true);
  });

  it("reports what is wrong with a snapshot", () => {
    const result = validateTeamSnapshotData({ team_id: "t1", mode: "chaos", nodes: [], ledger: [], attachments: {} });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/mode: must be equal to one of the allowed values"]);
  });

  it("rejects a ledger entry with a zero id", () => {
    expect(isLedgerEntry({ id: 0, timestamp: now, actor_node_id: "n1", amount: 1, description: "" })).toBe(false);
    expect(isLedgerEntry({ id: 1, timestamp: now, actor_node_id: "n1", amount: 1, description: "" })).toBe(true);
  });
});

describe("broker result validators", () => {
  it("accepts an attach result with no previous owner", () => {
    const result = {
      status: "ok",
      event: {
        kind: "attach", seq: 4, timestamp: "2026-03-01T10:00:00.000Z",
        repo: "web", path: "/src/web", node_id: "n1", previous_owner: null,
      },
    };
    expect(BROKER_RESULT_VALIDATORS.attach(result)).toBe(true);
    expect(BROKER_RESULT_VALIDATORS.handoff(result)).toBe(false);
  });

  it("rejects a heartbeat result without the known flag", () => {
    expect(BROKER_RESULT_VALIDATORS.heartbeat({ status: "ok" })).toBe(false);
    expect(BROKER_RESULT_VALIDATORS.heartbeat({ status: "ok", known: false })).toBe(true);
  });
});

describe("config file validation", () => {
  it("accepts a partial file", () => {
    expect(isConfigFile({ port: 7421, ephemeral: true, broker_url: "ws://10.0.0.5:7420/team" })).toBe(true);
    expect(isConfigFile({})).toBe(true);
  });

  it("rejects unknown keys and out-of-range ports", () => {
    expect(validateConfigFileData({ prot: 7420 }).errors).toEqual(["/: must NOT have additional properties"]);
    expect(validateConfigFileData({ port: 70000 }).errors).toEqual(["/port: must be <= 65535"]);
  });
});
