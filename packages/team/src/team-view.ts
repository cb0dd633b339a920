import type {
  AttachEvent,
  HandoffEvent,
  LedgerEntry,
  LedgerTotals,
  TeamEvent,
  TeamMode,
  TeamNode,
  TeamSnapshot,
} from "@teamwire/schemas";
import { summarizeLedger } from "./ledger.js";

/**
 * A client's read-only replica of team state, built from the register
 * snapshot and the `team.event` stream. Every apply is idempotent, and
 * events at or below the highest `seq` already applied are skipped.
 */
export class TeamView {
  private state: TeamSnapshot | null = null;
  private lastSeq = 0;
  /** seq of the last attach, handoff or release seen per repo */
  private repoSeq = new Map<string, number>();

  /**
   * Replaces the replica. Anything queued behind the snapshot is newer, and
   * a restarted broker numbers its events from 1 again, so the seq resets.
   */
  applySnapshot(snapshot: TeamSnapshot): void {
    this.state = structuredClone(snapshot);
    this.lastSeq = 0;
    this.repoSeq.clear();
  }

  /** Returns false when the event was already applied. */
  applyEvent(event: TeamEvent): boolean {
    if (event.seq <= this.lastSeq) return false;
    this.lastSeq = event.seq;
    this.apply(event);
    return true;
  }

  /**
   * Applies the event carried in this node's own attach or handoff reply.
   * The broker sends it nowhere else, and later events can be read before
   * the reply is handled, so only the repo's own ordering is checked.
   */
  applyOwnEvent(event: AttachEvent | HandoffEvent): void {
    this.apply(event);
  }

  /** Adds an entry the local node recorded itself. */
  addLedgerEntry(entry: LedgerEntry): void {
    const state = this.state;
    if (!state || state.ledger.some((e) => e.id === entry.id)) return;
    state.ledger = [...state.ledger, { ...entry }].sort((a, b) => a.id - b.id);
  }

  clear(): void {
    this.state = null;
    this.lastSeq = 0;
    this.repoSeq.clear();
  }

  get lastAppliedSeq(): number {
    return this.lastSeq;
  }

  snapshot(): TeamSnapshot | null {
    return this.state ? structuredClone(this.state) : null;
  }

  get mode(): TeamMode | undefined {
    return this.state?.mode;
  }

  nodes(): TeamNode[] {
    return this.state ? structuredClone(this.state.nodes) : [];
  }

  owner(repo: string): string | undefined {
    const attachments = this.state?.attachments;
    return attachments && Object.hasOwn(attachments, repo) ? attachments[repo] : undefined;
  }

  totals(): LedgerTotals {
    return summarizeLedger(this.state?.ledger ?? []);
  }

  private apply(event: TeamEvent): void {
    const state = this.state;
    if (!state) return;

    switch (event.kind) {
      case "join":
        state.nodes = [...state.nodes.filter((n) => n.node_id !== event.node.node_id), structuredClone(event.node)];
        break;
      case "leave": {
        state.nodes = state.nodes.filter((n) => n.node_id !== event.node_id);
        const released = event.released_repos.filter((repo) => this.claimRepo(repo, event.seq));
        state.attachments = withOwners(state.attachments, released, (_repo, owner) =>
          owner === event.node_id ? undefined : owner);
        break;
      }
      case "broadcast":
        break;
      case "ledger":
        this.addLedgerEntry(event.entry);
        break;
      case "attach":
        if (this.claimRepo(event.repo, event.seq)) {
          state.attachments = withOwners(state.attachments, [event.repo], () => event.node_id);
        }
        break;
      case "handoff":
        if (this.claimRepo(event.repo, event.seq)) {
          state.attachments = withOwners(state.attachments, [event.repo], () => event.target);
        }
        break;
      case "mode":
        state.mode = event.mode;
        break;
    }
  }

  /** False when a newer event already decided who owns `repo`. */
  private claimRepo(repo: string, seq: number): boolean {
    if ((this.repoSeq.get(repo) ?? 0) >= seq) return false;
    this.repoSeq.set(repo, seq);
    return true;
  }
}

/**
 * Rebuilds an attachment record with `repos` set to whatever `owner`
 * returns; undefined drops the repo.
 */
function withOwners(
  attachments: Record<string, string>,
  repos: readonly string[],
  owner: (repo: string, current: string | undefined) => string | undefined,
): Record<string, string> {
  const owners = new Map(Object.entries(attachments));
  for (const repo of repos) {
    const next = owner(repo, owners.get(repo));
    if (next === undefined) owners.delete(repo);
    else owners.set(repo, next);
  }
  return Object.fromEntries(owners);
}
