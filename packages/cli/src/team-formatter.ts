// Pure formatting and parsing for the join console. No I/O.
import { TEAM_MODES } from "@teamwire/schemas";
import type { TeamEvent, TeamMode, TeamSnapshot } from "@teamwire/schemas";

// ANSI color helpers
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export type TeamCommand =
  | { kind: "broadcast"; message: string }
  | { kind: "mode"; mode: TeamMode }
  | { kind: "attach"; repo: string; path?: string }
  | { kind: "handoff"; repo: string; target: string; task: string }
  | { kind: "ledger"; amount: number; description?: string }
  | { kind: "state" }
  | { kind: "help" }
  | { kind: "leave" }
  | { kind: "quit" };

export type ParsedCommand =
  | { ok: true; command: TeamCommand }
  | { ok: false; error: string };

export function isTeamMode(value: string): value is TeamMode {
  return TEAM_MODES.some((m) => m === value);
}

export function teamPrompt(nodeId: string, mode?: TeamMode): string {
  return mode ? `${nodeId} ${dim(`[${mode}]`)}> ` : `${nodeId}> `;
}

export function formatAmount(amount: number): string {
  return amount >= 0 ? `+${amount}` : String(amount);
}

export function formatTeamEvent(event: TeamEvent): string {
  const seq = dim(`#${event.seq}`);
  switch (event.kind) {
    case "join":
      return `${seq} ${green("join")} ${event.node.node_id} (${event.node.role}) from ${event.node.host}`;
    case "leave": {
      const why = event.reason === "heartbeat_timeout" ? red("timed out") : "left";
      const released = event.released_repos.length > 0 ? ` ${dim(`released ${event.released_repos.join(", ")}`)}` : "";
      return `${seq} ${yellow("leave")} ${event.node_id} ${why}${released}`;
    }
    case "broadcast": {
      const payload = Object.keys(event.payload).length > 0 ? ` ${dim(JSON.stringify(event.payload))}` : "";
      return `${seq} ${cyan(event.from ?? "broker")}: ${event.message}${payload}`;
    }
    case "ledger": {
      const description = event.entry.description ? ` ${event.entry.description}` : "";
      return `${seq} ${cyan("ledger")} ${event.entry.actor_node_id} ${formatAmount(event.entry.amount)}${description}`;
    }
    case "attach": {
      const at = event.path ? ` at ${event.path}` : "";
      const was = event.previous_owner && event.previous_owner !== event.node_id
        ? ` ${dim(`(was ${event.previous_owner})`)}`
        : "";
      return `${seq} ${cyan("attach")} ${event.repo} -> ${event.node_id}${at}${was}`;
    }
    case "handoff":
      return `${seq} ${bold("handoff")} ${event.repo}: ${event.source} -> ${event.target} "${event.task}"`;
    case "mode":
      return `${seq} ${yellow("mode")} ${event.previous} -> ${event.mode}`;
  }
}

export function formatSnapshot(snapshot: TeamSnapshot): string {
  const lines = [bold(`Team ${snapshot.team_id}`) + ` ${dim(`(mode ${snapshot.mode})`)}`];

  lines.push(`Nodes (${snapshot.nodes.length}):`);
  for (const node of snapshot.nodes) {
    const caps = node.capabilities.length > 0 ? ` ${dim(`[${node.capabilities.join(", ")}]`)}` : "";
    lines.push(`  ${node.node_id} ${node.role} ${node.host}${caps}`);
  }

  const repos = Object.keys(snapshot.attachments);
  if (repos.length > 0) {
    lines.push("Attachments:");
    for (const repo of repos) lines.push(`  ${repo} -> ${snapshot.attachments[repo]}`);
  }

  const total = snapshot.ledger.reduce((sum, e) => sum + e.amount, 0);
  lines.push(`Ledger: ${snapshot.ledger.length} entries, total ${total}`);
  return lines.join("\n");
}

export function helpText(): string {
  return [
    bold("Commands:"),
    "  /mode <sync|async|review>          Switch the team mode",
    "  /attach <repo> [path]              Claim a repository",
    "  /handoff <repo> <node> <task...>   Hand a repository to another node",
    "  /ledger <amount> [description...]  Record a ledger entry",
    "  /state                             Show the local team view",
    "  /leave                             Leave the team and exit",
    "  /quit                              Disconnect without leaving",
    "",
    dim("Any other text is broadcast to the team."),
  ].join("\n");
}

/** Returns null for blank lines. */
export function parseTeamCommand(line: string): ParsedCommand | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  if (!trimmed.startsWith("/")) return { ok: true, command: { kind: "broadcast", message: trimmed } };

  const [name = "", ...args] = trimmed.split(/\s+/);
  switch (name) {
    case "/help":
      return { ok: true, command: { kind: "help" } };
    case "/state":
      return { ok: true, command: { kind: "state" } };
    case "/leave":
      return { ok: true, command: { kind: "leave" } };
    case "/quit":
    case "/exit":
      return { ok: true, command: { kind: "quit" } };
    case "/mode": {
      const mode = args[0];
      if (mode === undefined || !isTeamMode(mode)) {
        return { ok: false, error: `Usage: /mode <${TEAM_MODES.join("|")}>` };
      }
      return { ok: true, command: { kind: "mode", mode } };
    }
    case "/attach": {
      const [repo, path] = args;
      if (repo === undefined) return { ok: false, error: "Usage: /attach <repo> [path]" };
      return { ok: true, command: path === undefined ? { kind: "attach", repo } : { kind: "attach", repo, path } };
    }
    case "/handoff": {
      const [repo, target, ...task] = args;
      if (repo === undefined || target === undefined || task.length === 0) {
        return { ok: false, error: "Usage: /handoff <repo> <node> <task...>" };
      }
      return { ok: true, command: { kind: "handoff", repo, target, task: task.join(" ") } };
    }
    case "/ledger": {
      const [raw, ...description] = args;
      const amount = raw === undefined ? Number.NaN : Number(raw);
      if (!Number.isFinite(amount)) return { ok: false, error: "Usage: /ledger <amount> [description...]" };
      return {
        ok: true,
        command: description.length > 0 ? { kind: "ledger", amount, description: description.join(" ") } : { kind: "ledger", amount },
      };
    }
    default:
      return { ok: false, error: `Unknown command ${name}. Type /help for commands.` };
  }
}
