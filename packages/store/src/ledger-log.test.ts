import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createHash } from "node:crypto";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm, readFile, writeFile, appendFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import type { LedgerEntry, TeamLogger } from "@teamwire/schemas";
import { LedgerLog } from "./ledger-log.js";

function silentLogger(): TeamLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function entry(id: number, amount = 1): LedgerEntry {
  return { id, timestamp: "2026-03-01T10:00:00.000Z", actor_node_id: "n1", amount, description: `entry ${id}` };
}

describe("LedgerLog", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "teamwire-ledger-"));
    file = join(dir, "ledger.jsonl");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the file on first append and reads entries back", async () => {
    const log = new LedgerLog(file, { fsync: false, lock: false, logger: silentLogger() });
    await log.init();
    expect(existsSync(file)).toBe(false);
    await log.append(entry(1, 5));
    await log.append(entry(2, 3));
    expect(await log.readAll()).toEqual([entry(1, 5), entry(2, 3)]);
    expect(log.getLastId()).toBe(2);
  });

  it("creates a missing parent directory on init", async () => {
    const nested = join(dir, "a", "b", "ledger.jsonl");
    const log = new LedgerLog(nested, { fsync: false, lock: false, logger: silentLogger() });
    await log.init();
    await log.append(entry(1));
    expect(existsSync(nested)).toBe(true);
  });

  it("chains each record to the hash of the previous line", async () => {
    const log = new LedgerLog(file, { fsync: true, lock: false, logger: silentLogger() });
    await log.init();
    await log.append(entry(1));
    await log.append(entry(2));
    const lines = (await readFile(file, "utf-8")).trim().split("\n");
    const first = JSON.parse(lines[0] ?? "");
    const second = JSON.parse(lines[1] ?? "");
    expect(first.hash_prev).toBeUndefined();
    expect(second.hash_prev).toBe(createHash("sha256").update(lines[0] ?? "").digest("hex"));
    expect(await log.verifyIntegrity()).toEqual({ valid: true });
  });

  it("rejects ids that do not increase", async () => {
    const log = new LedgerLog(file, { fsync: false, lock: false, logger: silentLogger() });
    await log.init();
    await log.append(entry(1));
    await expect(log.append(entry(1))).rejects.toThrow("Ledger entry id 1 does not follow 1");
    // a failed append does not poison the chain
    await log.append(entry(2));
    expect((await log.readAll()).map((e) => e.id)).toEqual([1, 2]);
  });

  it("rejects malformed entries", async () => {
    const log = new LedgerLog(file, { fsync: false, lock: false, logger: silentLogger() });
    await log.init();
    const bad = { ...entry(1), timestamp: "yesterday" };
    await expect(log.append(bad)).rejects.toThrow("Invalid ledger entry");
    expect(existsSync(file)).toBe(false);
  });

  it("resumes the last id when reopened", async () => {
    const first = new LedgerLog(file, { fsync: false, lock: false, logger: silentLogger() });
    await first.init();
    await first.append(entry(1));
    await first.append(entry(2));
    await first.close();

    const second = new LedgerLog(file, { fsync: false, lock: false, logger: silentLogger() });
    await second.init();
    expect(second.getLastId()).toBe(2);
    await second.append(entry(3));
    expect(await second.verifyIntegrity()).toEqual({ valid: true });
  });

  it("serializes concurrent appends", async () => {
    const log = new LedgerLog(file, { fsync: false, lock: false, logger: silentLogger() });
    await log.init();
    await Promise.all(Array.from({ length: 20 }, (_, i) => log.append(entry(i + 1))));
    const ids = (await log.readAll()).map((e) => e.id);
    expect(ids).toEqual(Array.from({ length: 20 }, (_, i) => i + 1));
    expect(await log.verifyIntegrity()).toEqual({ valid: true });
  });

  // ─── Recovery ─────────────────────────────────────────────────────

  it("drops a torn last line on init", async () => {
    const setup = new LedgerLog(file, { fsync: false, lock: false, logger: silentLogger() });
    await setup.init();
    await setup.append(entry(1));
    await setup.append(entry(2));
    await appendFile(file, '{"entry":{"id":3,"times', "utf-8");

    const logger = silentLogger();
    const log = new LedgerLog(file, { fsync: false, lock: false, logger });
    await log.init();
    expect((await log.readAll()).map((e) => e.id)).toEqual([1, 2]);
    expect(logger.warn).toHaveBeenCalledWith("Truncated incomplete last line", { file });
    await log.append(entry(3));
    expect(await log.verifyIntegrity()).toEqual({ valid: true });
  });

  it("truncates to the valid prefix when the chain is broken", async () => {
    const setup = new LedgerLog(file, { fsync: false, lock: false, logger: silentLogger() });
    await setup.init();
    await setup.append(entry(1, 10));
    await setup.append(entry(2, 20));
    await setup.append(entry(3, 30));

    const lines = (await readFile(file, "utf-8")).trim().split("\n");
    lines[0] = (lines[0] ?? "").replace('"amount":10', '"amount":99');
    await writeFile(file, lines.join("\n") + "\n", "utf-8");
    expect(await setup.verifyIntegrity()).toEqual({ valid: false, brokenAt: 1 });

    const logger = silentLogger();
    const log = new LedgerLog(file, { fsync: false, lock: false, logger });
    await log.init();
    expect(await log.readAll()).toEqual([entry(1, 99)]);
    expect(log.getLastId()).toBe(1);
    expect(logger.error).toHaveBeenCalledWith("Recovered from corruption at line 2, truncated 2 records", {
      file,
      reason: "hash chain broken",
    });
  });

  it("throws in strict mode instead of repairing", async () => {
    const setup = new LedgerLog(file, { fsync: false, lock: false, logger: silentLogger() });
    await setup.init();
    await setup.append(entry(1, 10));
    await setup.append(entry(2, 20));
    const original = await readFile(file, "utf-8");
    await writeFile(file, original.replace('"amount":10', '"amount":11'), "utf-8");

    const log = new LedgerLog(file, { fsync: false, lock: false, recovery: "strict", logger: silentLogger() });
    await expect(log.init()).rejects.toThrow("Ledger integrity violation at line 2: hash chain broken");
    // the file is left untouched
    expect((await readFile(file, "utf-8")).split("\n").filter(Boolean)).toHaveLength(2);
  });

  // ─── Lockfile ─────────────────────────────────────────────────────

  it("refuses a second writer while the lock is held", async () => {
    const first = new LedgerLog(file, { fsync: false, logger: silentLogger() });
    await first.init();
    expect(await readFile(`${file}.lock`, "utf-8")).toBe(String(process.pid));

    const second = new LedgerLog(file, { fsync: false, logger: silentLogger() });
    await expect(second.init()).rejects.toThrow(`Ledger is locked by process ${process.pid}`);

    await first.close();
    expect(existsSync(`${file}.lock`)).toBe(false);
    const third = new LedgerLog(file, { fsync: false, logger: silentLogger() });
    await third.init();
    await third.close();
  });

  it("replaces a stale lock with an unreadable pid", async () => {
    await writeFile(`${file}.lock`, "not-a-pid", "utf-8");
    const log = new LedgerLog(file, { fsync: false, logger: silentLogger() });
    await log.init();
    expect(await readFile(`${file}.lock`, "utf-8")).toBe(String(process.pid));
    await log.close();
  });
});
