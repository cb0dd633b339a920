import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm, readFile, writeFile, readdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import type { CapabilityRecord, TeamLogger, TeamSnapshot } from "@teamwire/schemas";
import { TeamStore, safeFileName } from "./team-store.js";
import { MemoryTeamStore } from "./memory-store.js";

const NOW = "2026-03-01T10:00:00.000Z";

function silentLogger(): TeamLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function snapshot(overrides?: Partial<TeamSnapshot>): TeamSnapshot {
  return {
    team_id: "alpha",
    mode: "sync",
    nodes: [{
      node_id: "n1", name: "laptop", role: "editor", capabilities: ["review", "ts"], host: "box-1",
      last_heartbeat: NOW, joined_at: NOW,
    }],
    ledger: [],
    attachments: { web: "n1" },
    ...overrides,
  };
}

describe("TeamStore", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "teamwire-store-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("returns nothing for a fresh team", async () => {
    const store = new TeamStore(root, "alpha", { fsync: false, lock: false, logger: silentLogger() });
    await store.init();
    expect(await store.loadSnapshot()).toBeNull();
    expect(await store.loadLedger()).toEqual([]);
    await store.close();
  });

  it("writes and reloads the snapshot", async () => {
    const store = new TeamStore(root, "alpha", { fsync: false, lock: false, logger: silentLogger() });
    await store.init();
    await store.writeSnapshot(snapshot({ mode: "review" }));
    await store.close();

    const reopened = new TeamStore(root, "alpha", { fsync: false, lock: false, logger: silentLogger() });
    await reopened.init();
    expect(await reopened.loadSnapshot()).toEqual(snapshot({ mode: "review" }));
    expect(existsSync(join(root, "alpha", "team.json.tmp"))).toBe(false);
  });

  it("keeps the last snapshot when writes are issued concurrently", async () => {
    const store = new TeamStore(root, "alpha", { fsync: false, lock: false, logger: silentLogger() });
    await store.init();
    await Promise.all([
      store.writeSnapshot(snapshot({ mode: "sync" })),
      store.writeSnapshot(snapshot({ mode: "async" })),
      store.writeSnapshot(snapshot({ mode: "review" })),
    ]);
    expect((await store.loadSnapshot())?.mode).toBe("review");
  });

  it("ignores a snapshot that fails validation", async () => {
    const logger = silentLogger();
    const store = new TeamStore(root, "alpha", { fsync: false, lock: false, logger });
    await store.init();
    await writeFile(join(root, "alpha", "team.json"), JSON.stringify({ ...snapshot(), mode: "party" }), "utf-8");
    expect(await store.loadSnapshot()).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith("Ignoring invalid snapshot", {
      file: join(root, "alpha", "team.json"),
      errors: ["/mode: must be equal to one of the allowed values"],
    });
  });

  it("ignores a snapshot that is not JSON", async () => {
    const store = new TeamStore(root, "alpha", { fsync: false, lock: false, logger: silentLogger() });
    await store.init();
    await writeFile(join(root, "alpha", "team.json"), "{\"team_id\":", "utf-8");
    expect(await store.loadSnapshot()).toBeNull();
  });

  it("ignores a snapshot that belongs to a different team", async () => {
    const store = new TeamStore(root, "alpha", { fsync: false, lock: false, logger: silentLogger() });
    await store.init();
    await writeFile(join(root, "alpha", "team.json"), JSON.stringify(snapshot({ team_id: "beta" })), "utf-8");
    expect(await store.loadSnapshot()).toBeNull();
  });

  it("appends ledger entries to the team's log", async () => {
    const store = new TeamStore(root, "alpha", { fsync: false, lock: false, logger: silentLogger() });
    await store.init();
    const first = { id: 1, timestamp: NOW, actor_node_id: "n1", amount: 5, description: "compute" };
    const second = { id: 2, timestamp: NOW, actor_node_id: "n2", amount: 3, description: "storage" };
    await store.appendLedger(first);
    await store.appendLedger(second);
    expect(await store.loadLedger()).toEqual([first, second]);
    expect(await store.verifyLedger()).toEqual({ valid: true });
    const raw = await readFile(join(root, "alpha", "ledger.jsonl"), "utf-8");
    expect(raw.trim().split("\n")).toHaveLength(2);
  });

  it("writes one capabilities file per node with a safe name", async () => {
    const store = new TeamStore(root, "alpha", { fsync: false, lock: false, logger: silentLogger() });
    await store.init();
    const record: CapabilityRecord = {
      node_id: "../evil", name: "evil", host: "h", role: "observer", capabilities: [], updated_at: NOW,
    };
    await store.writeCapabilities(record);
    await store.writeCapabilities({ ...record, node_id: "n1", capabilities: ["go"] });

    expect((await readdir(join(root, "alpha", "capabilities"))).sort()).toEqual(["%2E%2E%2Fevil.json", "n1.json"]);
    expect(await store.listCapabilityNodes()).toEqual(["../evil", "n1"]);
    const stored = JSON.parse(await readFile(join(root, "alpha", "capabilities", "n1.json"), "utf-8"));
    expect(stored.capabilities).toEqual(["go"]);
  });

  it("keeps teams in separate directories", async () => {
    const a = new TeamStore(root, "alpha", { fsync: false, lock: false, logger: silentLogger() });
    const b = new TeamStore(root, "beta", { fsync: false, lock: false, logger: silentLogger() });
    await a.init();
    await b.init();
    await a.writeSnapshot(snapshot());
    expect(await b.loadSnapshot()).toBeNull();
    expect(a.teamDir).toBe(join(root, "alpha"));
    expect(b.teamDir).toBe(join(root, "beta"));
  });
});

describe("safeFileName", () => {
  it("leaves plain ids alone", () => {
    expect(safeFileName("node-7_a")).toBe("node-7_a");
  });

  it("encodes separators and dots", () => {
    expect(safeFileName("a/b")).toBe("a%2Fb");
    expect(safeFileName("..")).toBe("%2E%2E");
  });
});

describe("MemoryTeamStore", () => {
  it("returns copies so callers cannot mutate stored state", async () => {
    const store = new MemoryTeamStore();
    await store.writeSnapshot(snapshot());
    const loaded = await store.loadSnapshot();
    loaded?.nodes.pop();
    expect((await store.loadSnapshot())?.nodes).toHaveLength(1);
    expect(store.snapshotWrites).toBe(1);
  });

  it("enforces increasing ledger ids", async () => {
    const store = new MemoryTeamStore();
    await store.appendLedger({ id: 1, timestamp: NOW, actor_node_id: "n1", amount: 1, description: "" });
    await expect(
      store.appendLedger({ id: 1, timestamp: NOW, actor_node_id: "n1", amount: 1, description: "" }),
    ).rejects.toThrow("Ledger entry id 1 does not follow 1");
  });

  it("starts from the state it was seeded with", async () => {
    const entry = { id: 4, timestamp: NOW, actor_node_id: "n1", amount: 2, description: "seed" };
    const store = new MemoryTeamStore({ snapshot: snapshot(), ledger: [entry] });
    expect(await store.loadLedger()).toEqual([entry]);
    expect((await store.loadSnapshot())?.team_id).toBe("alpha");
  });
});
