import type { NodeRole, RegisterParams, TeamNode } from "@teamwire/schemas";

export interface RegisterOutcome {
  node: TeamNode;
  /** The entry this registration replaced, if the id was already known. */
  replaced: TeamNode | undefined;
}

const DEFAULT_ROLE: NodeRole = "editor";

/** Live nodes by id. Insertion order is join order. */
export class NodeRegistry {
  private nodes = new Map<string, TeamNode>();

  register(params: RegisterParams, now: Date, fallbackHost: string): RegisterOutcome {
    const replaced = this.nodes.get(params.node_id);
    const timestamp = now.toISOString();
    const node: TeamNode = {
      node_id: params.node_id,
      name: params.name ?? params.node_id,
      role: params.role ?? DEFAULT_ROLE,
      capabilities: normalizeCapabilities(params.capabilities ?? []),
      host: params.host ?? fallbackHost,
      last_heartbeat: timestamp,
      // reconnecting keeps the original join time
      joined_at: replaced?.joined_at ?? timestamp,
    };
    this.nodes.set(node.node_id, node);
    return { node: { ...node, capabilities: [...node.capabilities] }, replaced };
  }

  /** Returns false for unknown nodes and leaves the registry untouched. */
  heartbeat(nodeId: string, now: Date): boolean {
    const node = this.nodes.get(nodeId);
    if (!node) return false;
    node.last_heartbeat = now.toISOString();
    return true;
  }

  remove(nodeId: string): TeamNode | undefined {
    const node = this.nodes.get(nodeId);
    if (node) this.nodes.delete(nodeId);
    return node;
  }

  has(nodeId: string): boolean {
    return this.nodes.has(nodeId);
  }

  get(nodeId: string): TeamNode | undefined {
    const node = this.nodes.get(nodeId);
    return node ? { ...node, capabilities: [...node.capabilities] } : undefined;
  }

  /** Ids of nodes whose last heartbeat is more than `maxSilenceMs` old. */
  stale(now: Date, maxSilenceMs: number): string[] {
    const cutoff = now.getTime() - maxSilenceMs;
    const out: string[] = [];
    for (const node of this.nodes.values()) {
      if (Date.parse(node.last_heartbeat) < cutoff) out.push(node.node_id);
    }
    return out;
  }

  /** Loads persisted nodes, giving each a fresh heartbeat grace period. */
  restore(nodes: TeamNode[], now: Date): void {
    const timestamp = now.toISOString();
    for (const node of nodes) {
      this.nodes.set(node.node_id, {
        ...node,
        capabilities: normalizeCapabilities(node.capabilities),
        last_heartbeat: timestamp,
      });
    }
  }

  list(): TeamNode[] {
    return [...this.nodes.values()].map((n) => ({ ...n, capabilities: [...n.capabilities] }));
  }

  get size(): number {
    return this.nodes.size;
  }
}

export function normalizeCapabilities(capabilities: string[]): string[] {
  return [...new Set(capabilities)].sort();
}
