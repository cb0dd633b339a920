/** repo → owning node. Each repo has at most one owner. */
export class AttachmentMap {
  private owners = new Map<string, string>();

  /** Last writer wins. Returns the owner that was replaced, if any. */
  attach(repo: string, nodeId: string): string | null {
    const previous = this.owners.get(repo) ?? null;
    this.owners.set(repo, nodeId);
    return previous;
  }

  /** Moves an owned repo to `nodeId`; returns the previous owner. */
  transfer(repo: string, nodeId: string): string | null {
    const previous = this.owners.get(repo);
    if (previous === undefined) return null;
    this.owners.set(repo, nodeId);
    return previous;
  }

  owner(repo: string): string | undefined {
    return this.owners.get(repo);
  }

  /** Drops every repo owned by `nodeId`; returns them sorted. */
  releaseNode(nodeId: string): string[] {
    const released: string[] = [];
    for (const [repo, owner] of this.owners) {
      if (owner === nodeId) released.push(repo);
    }
    for (const repo of released) {
      this.owners.delete(repo);
    }
    return released.sort();
  }

  restore(attachments: Record<string, string>, isKnownNode: (nodeId: string) => boolean): void {
    for (const [repo, owner] of Object.entries(attachments)) {
      if (isKnownNode(owner)) this.owners.set(repo, owner);
    }
  }

  /** Sorted by repo. Every repo is an own property, "__proto__" included. */
  toRecord(): Record<string, string> {
    return Object.fromEntries([...this.owners].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  }

  get size(): number {
    return this.owners.size;
  }
}
