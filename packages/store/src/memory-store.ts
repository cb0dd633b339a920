import type { CapabilityRecord, LedgerEntry, TeamPersistence, TeamSnapshot } from "@teamwire/schemas";

/** In-process persistence for tests and throwaway brokers. */
export class MemoryTeamStore implements TeamPersistence {
  snapshot: TeamSnapshot | null = null;
  readonly ledger: LedgerEntry[] = [];
  readonly capabilities = new Map<string, CapabilityRecord>();
  snapshotWrites = 0;
  closed = false;

  constructor(initial?: { snapshot?: TeamSnapshot; ledger?: LedgerEntry[] }) {
    if (initial?.snapshot) this.snapshot = structuredClone(initial.snapshot);
    if (initial?.ledger) this.ledger.push(...structuredClone(initial.ledger));
  }

  async init(): Promise<void> {
    this.closed = false;
  }

  async loadSnapshot(): Promise<TeamSnapshot | null> {
    return this.snapshot ? structuredClone(this.snapshot) : null;
  }

  async loadLedger(): Promise<LedgerEntry[]> {
    return structuredClone(this.ledger);
  }

  async writeSnapshot(snapshot: TeamSnapshot): Promise<void> {
    this.snapshot = structuredClone(snapshot);
    this.snapshotWrites++;
  }

  async appendLedger(entry: LedgerEntry): Promise<void> {
    const last = this.ledger[this.ledger.length - 1];
    if (last && entry.id <= last.id) {
      throw new Error(`Ledger entry id ${entry.id} does not follow ${last.id}`);
    }
    this.ledger.push(structuredClone(entry));
  }

  async writeCapabilities(record: CapabilityRecord): Promise<void> {
    this.capabilities.set(record.node_id, structuredClone(record));
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
