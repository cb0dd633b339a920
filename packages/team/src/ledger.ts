import type { LedgerEntry, LedgerTotals } from "@teamwire/schemas";

/** The team's shared budget ledger. Entries are immutable once appended. */
export class Ledger {
  private entries: LedgerEntry[] = [];

  append(actorNodeId: string, amount: number, description: string, now: Date): LedgerEntry {
    if (!Number.isFinite(amount)) {
      throw new RangeError(`Ledger amount must be a finite number, got ${amount}`);
    }
    const entry: LedgerEntry = {
      id: this.nextId(),
      timestamp: now.toISOString(),
      actor_node_id: actorNodeId,
      amount,
      description,
    };
    this.entries.push(entry);
    return { ...entry };
  }

  totals(): LedgerTotals {
    return summarizeLedger(this.entries);
  }

  /**
   * Merges persisted entries by id. The log and the snapshot can each hold
   * entries the other missed, so both are fed through here.
   */
  restore(entries: LedgerEntry[]): void {
    const byId = new Map<number, LedgerEntry>();
    for (const entry of this.entries) byId.set(entry.id, entry);
    for (const entry of entries) {
      if (!byId.has(entry.id)) byId.set(entry.id, { ...entry });
    }
    this.entries = [...byId.values()].sort((a, b) => a.id - b.id);
  }

  list(): LedgerEntry[] {
    return this.entries.map((e) => ({ ...e }));
  }

  get size(): number {
    return this.entries.length;
  }

  private nextId(): number {
    const last = this.entries[this.entries.length - 1];
    return last ? last.id + 1 : 1;
  }
}

export function summarizeLedger(entries: readonly LedgerEntry[]): LedgerTotals {
  // node ids are arbitrary strings, "constructor" and "__proto__" included
  const byActor = new Map<string, number>();
  let total = 0;
  for (const entry of entries) {
    total += entry.amount;
    byActor.set(entry.actor_node_id, (byActor.get(entry.actor_node_id) ?? 0) + entry.amount);
  }
  return { total, count: entries.length, by_actor: Object.fromEntries(byActor) };
}
