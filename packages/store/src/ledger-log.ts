import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { ConsoleLogger, isLedgerEntry } from "@teamwire/schemas";
import type { LedgerEntry, TeamLogger } from "@teamwire/schemas";

export interface LedgerLogOptions {
  fsync?: boolean;
  /** If true, acquire an advisory lockfile to prevent multi-process corruption. Default: true */
  lock?: boolean;
  /** How to handle corruption on init. "truncate" (default) auto-repairs; "strict" throws. */
  recovery?: "truncate" | "strict";
  logger?: TeamLogger;
}

/** One line of the ledger file. */
export interface LedgerRecord {
  hash_prev?: string;
  entry: LedgerEntry;
}

/**
 * Append-only JSONL ledger. Each line carries the sha256 of the line
 * before it, so a rewritten or reordered history is detected on open.
 * Entry ids must strictly increase.
 */
export class LedgerLog {
  private filePath: string;
  private lastHash: string | undefined;
  private lastId = 0;
  private writeLock: Promise<void> = Promise.resolve();
  private fsync: boolean;
  private lockEnabled: boolean;
  private lockPath: string;
  private locked = false;
  private recovery: "truncate" | "strict";
  private logger: TeamLogger;

  constructor(filePath: string, options?: LedgerLogOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.lockEnabled = options?.lock ?? true;
    this.lockPath = `${filePath}.lock`;
    this.recovery = options?.recovery ?? "truncate";
    this.logger = options?.logger ?? new ConsoleLogger("ledger-log");
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (this.lockEnabled) {
      await this.acquireLock();
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);

    // A crash mid-append leaves at most one torn line at the end
    const last = lines[lines.length - 1];
    if (last !== undefined && parseRecord(last) === null) {
      lines.pop();
      await writeFile(this.filePath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
      this.logger.warn("Truncated incomplete last line", { file: this.filePath });
    }

    let prevHash: string | undefined;
    let lastId = 0;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const record = parseRecord(line);
      const problem = record === null
        ? "unreadable record"
        : record.hash_prev !== prevHash
          ? "hash chain broken"
          : record.entry.id <= lastId
            ? `entry id ${record.entry.id} does not follow ${lastId}`
            : null;

      if (record === null || problem !== null) {
        if (this.recovery === "strict") {
          this.lastHash = undefined;
          this.lastId = 0;
          throw new Error(`Ledger integrity violation at line ${i + 1}: ${problem ?? "unreadable record"}`);
        }
        // Keep the valid prefix
        await this.rewrite(lines.slice(0, i));
        this.logger.error(`Recovered from corruption at line ${i + 1}, truncated ${lines.length - i} records`, {
          file: this.filePath,
          reason: problem ?? "unreadable record",
        });
        break;
      }
      prevHash = hashLine(line);
      lastId = record.entry.id;
    }
    this.lastHash = prevHash;
    this.lastId = lastId;
  }

  async append(entry: LedgerEntry): Promise<void> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      if (!isLedgerEntry(entry)) {
        throw new Error(`Invalid ledger entry: ${JSON.stringify(entry)}`);
      }
      if (entry.id <= this.lastId) {
        throw new Error(`Ledger entry id ${entry.id} does not follow ${this.lastId}`);
      }
      const record: LedgerRecord = { entry };
      if (this.lastHash !== undefined) record.hash_prev = this.lastHash;
      const line = JSON.stringify(record);
      const lineHash = hashLine(line);

      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // Only update in-memory state after successful write
      this.lastHash = lineHash;
      this.lastId = entry.id;
    } finally {
      releaseLock();
    }
  }

  async readAll(): Promise<LedgerEntry[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const entries: LedgerEntry[] = [];
    for (const line of content.trim().split("\n").filter(Boolean)) {
      const record = parseRecord(line);
      if (record) entries.push(record.entry);
    }
    return entries;
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    if (!existsSync(this.filePath)) return { valid: true };
    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const record = parseRecord(line);
      if (record === null || (i > 0 && record.hash_prev !== prevHash)) {
        return { valid: false, brokenAt: i };
      }
      prevHash = hashLine(line);
    }
    return { valid: true };
  }

  /** Highest entry id written so far. */
  getLastId(): number {
    return this.lastId;
  }

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Wait for any pending writes to complete. Call this before process exit
   * so no acknowledged entry is lost.
   */
  async close(): Promise<void> {
    await this.writeLock;
    if (this.lockEnabled && this.locked) {
      await this.releaseLock();
    }
  }

  private async rewrite(lines: string[]): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
    await rename(tmpPath, this.filePath);
  }

  private async acquireLock(): Promise<void> {
    try {
      const fh = await open(this.lockPath, "wx");
      await fh.write(String(process.pid), undefined, "utf-8");
      await fh.close();
      this.locked = true;
    } catch (err: unknown) {
      if (errnoCode(err) !== "EEXIST") throw err;

      // Lock file exists; is the owning process still alive?
      let pid: number;
      try {
        pid = parseInt((await readFile(this.lockPath, "utf-8")).trim(), 10);
      } catch {
        await this.removeStaleLock();
        return this.acquireLock();
      }
      if (isNaN(pid) || !isProcessAlive(pid)) {
        await this.removeStaleLock();
        return this.acquireLock();
      }
      throw new Error(`Ledger is locked by process ${pid} (lockfile: ${this.lockPath})`);
    }
  }

  private async releaseLock(): Promise<void> {
    await this.removeStaleLock();
    this.locked = false;
  }

  private async removeStaleLock(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (err: unknown) {
      // May have been cleaned up by another process
      if (errnoCode(err) !== "ENOENT") throw err;
    }
  }
}

function hashLine(line: string): string {
  return createHash("sha256").update(line).digest("hex");
}

function parseRecord(line: string): LedgerRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || !("entry" in parsed)) return null;
  const hashPrev = "hash_prev" in parsed ? parsed.hash_prev : undefined;
  if (hashPrev !== undefined && typeof hashPrev !== "string") return null;
  if (!isLedgerEntry(parsed.entry)) return null;
  return hashPrev === undefined ? { entry: parsed.entry } : { hash_prev: hashPrev, entry: parsed.entry };
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    // EPERM means it exists but belongs to someone else
    return errnoCode(err) === "EPERM";
  }
}
