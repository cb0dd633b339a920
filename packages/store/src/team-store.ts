import { readFile, readdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { ConsoleLogger, isTeamSnapshot, validateTeamSnapshotData } from "@teamwire/schemas";
import type { CapabilityRecord, LedgerEntry, TeamLogger, TeamPersistence, TeamSnapshot } from "@teamwire/schemas";
import { LedgerLog } from "./ledger-log.js";
import { writeJsonAtomic } from "./atomic-file.js";

export interface TeamStoreOptions {
  fsync?: boolean;
  lock?: boolean;
  recovery?: "truncate" | "strict";
  logger?: TeamLogger;
}

export const SNAPSHOT_FILE = "team.json";
export const LEDGER_FILE = "ledger.jsonl";
export const CAPABILITIES_DIR = "capabilities";

/**
 * File-backed team state, one directory per team:
 *
 *   <rootDir>/<team_id>/team.json             latest snapshot (atomic replace)
 *   <rootDir>/<team_id>/ledger.jsonl          hash-chained ledger
 *   <rootDir>/<team_id>/capabilities/<id>.json
 */
export class TeamStore implements TeamPersistence {
  readonly teamDir: string;
  private snapshotPath: string;
  private capabilitiesDir: string;
  private ledger: LedgerLog;
  private writeLock: Promise<void> = Promise.resolve();
  private fsync: boolean;
  private logger: TeamLogger;
  private teamId: string;

  constructor(rootDir: string, teamId: string, options?: TeamStoreOptions) {
    this.teamId = teamId;
    this.teamDir = join(rootDir, safeFileName(teamId));
    this.snapshotPath = join(this.teamDir, SNAPSHOT_FILE);
    this.capabilitiesDir = join(this.teamDir, CAPABILITIES_DIR);
    this.fsync = options?.fsync ?? true;
    this.logger = options?.logger ?? new ConsoleLogger("team-store");
    this.ledger = new LedgerLog(join(this.teamDir, LEDGER_FILE), {
      fsync: this.fsync,
      lock: options?.lock,
      recovery: options?.recovery,
      logger: this.logger,
    });
  }

  async init(): Promise<void> {
    await this.ledger.init();
  }

  async loadSnapshot(): Promise<TeamSnapshot | null> {
    if (!existsSync(this.snapshotPath)) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(this.snapshotPath, "utf-8"));
    } catch {
      this.logger.warn("Ignoring unreadable snapshot", { file: this.snapshotPath });
      return null;
    }
    if (!isTeamSnapshot(parsed)) {
      const { errors } = validateTeamSnapshotData(parsed);
      this.logger.warn("Ignoring invalid snapshot", { file: this.snapshotPath, errors });
      return null;
    }
    if (parsed.team_id !== this.teamId) {
      this.logger.warn("Ignoring snapshot for another team", { file: this.snapshotPath, team_id: parsed.team_id });
      return null;
    }
    return parsed;
  }

  async loadLedger(): Promise<LedgerEntry[]> {
    return this.ledger.readAll();
  }

  async writeSnapshot(snapshot: TeamSnapshot): Promise<void> {
    await this.serialized(() => writeJsonAtomic(this.snapshotPath, snapshot, { fsync: this.fsync }));
  }

  async appendLedger(entry: LedgerEntry): Promise<void> {
    await this.ledger.append(entry);
  }

  async writeCapabilities(record: CapabilityRecord): Promise<void> {
    const filePath = join(this.capabilitiesDir, `${safeFileName(record.node_id)}.json`);
    await this.serialized(() => writeJsonAtomic(filePath, record, { fsync: this.fsync }));
  }

  /** Node ids that have a capabilities file. */
  async listCapabilityNodes(): Promise<string[]> {
    if (!existsSync(this.capabilitiesDir)) return [];
    const files = await readdir(this.capabilitiesDir);
    return files
      .filter((f) => f.endsWith(".json"))
      .map((f) => decodeURIComponent(f.slice(0, -".json".length)))
      .sort();
  }

  async verifyLedger(): Promise<{ valid: boolean; brokenAt?: number }> {
    return this.ledger.verifyIntegrity();
  }

  async close(): Promise<void> {
    await this.writeLock;
    await this.ledger.close();
  }

  private async serialized(fn: () => Promise<void>): Promise<void> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;
    try {
      await fn();
    } finally {
      releaseLock();
    }
  }
}

/** Percent-encodes anything that could escape the team directory. */
export function safeFileName(id: string): string {
  return encodeURIComponent(id).replace(/\./g, "%2E");
}
