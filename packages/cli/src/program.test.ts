import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { TeamLogger } from "@teamwire/schemas";
import { createProgram } from "./program.js";
import type { TerminalIO } from "./team-console.js";

const TEAM_KEY = Buffer.alloc(32, 3).toString("base64");
const stripAnsi = (s: string): string => s.replace(/\x1b\[[0-9;]*m/g, "");

function silentLogger(): TeamLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

class MockTerminal implements TerminalIO {
  lines: string[] = [];
  private lineHandler: ((line: string) => void) | null = null;

  createReadline(): void { /* no-op */ }
  closeReadline(): void { /* no-op */ }
  setPrompt(): void { /* no-op */ }
  prompt(): void { /* no-op */ }
  onLine(handler: (line: string) => void): void { this.lineHandler = handler; }
  onClose(): void { /* no-op */ }
  clearLine(): void { /* no-op */ }
  writeLine(text: string): void { this.lines.push(stripAnsi(text)); }

  simulateLine(text: string): void { this.lineHandler?.(text); }
}

describe("teamwire program", () => {
  let dir: string;
  let lines: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "teamwire-program-"));
    lines = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("registers serve, join and keygen", () => {
    const names = createProgram({ env: {} }).commands.map((c) => c.name());
    expect(names).toEqual(["serve", "join", "keygen"]);
  });

  it("generates a 32-byte key", async () => {
    await createProgram({ env: {}, writeLine: (text) => lines.push(text) }).parseAsync(["node", "teamwire", "keygen"]);
    expect(lines).toHaveLength(1);
    expect(Buffer.from(lines[0] ?? "", "base64")).toHaveLength(32);
  });

  it("refuses to serve without a team key", async () => {
    const program = createProgram({ env: {}, cwd: dir, writeLine: (text) => lines.push(text), logger: silentLogger() });
    await expect(program.parseAsync(["node", "teamwire", "serve", "--ephemeral"]))
      .rejects.toThrow("Invalid broker configuration:\n  - Team key is required (set TEAMWIRE_TEAM_KEY or pass --key)");
    expect(lines).toEqual([]);
  });

  it("serves a team that a node can join", async () => {
    const stops: Array<() => Promise<void>> = [];
    const serve = createProgram({
      env: {},
      cwd: dir,
      writeLine: (text) => lines.push(text),
      logger: silentLogger(),
      onShutdown: (stop) => { stops.push(stop); },
    });
    await serve.parseAsync(["node", "teamwire", "serve", "--key", TEAM_KEY, "--port", "0", "--ephemeral", "--team-id", "core"]);

    const url = /^Team core ready at (ws:\/\/127\.0\.0\.1:\d+\/team)$/.exec(lines[0] ?? "")?.[1];
    expect(url).toBeDefined();
    expect(lines[1]).toBe("Restored 0 node(s), 0 ledger entries, mode sync");

    const terminal = new MockTerminal();
    const proc = { exit: vi.fn() };
    const joinProgram = createProgram({
      env: { TEAMWIRE_TEAM_KEY: TEAM_KEY },
      cwd: dir,
      logger: silentLogger(),
      terminal,
      process: proc,
      hostname: () => "host-a",
    });
    try {
      await joinProgram.parseAsync(["node", "teamwire", "join", "--url", url ?? "", "--role", "admin"]);
      expect(terminal.lines[0]).toBe("Joined team core as host-a");
      expect(terminal.lines[1]).toContain("  host-a admin");

      terminal.simulateLine("/quit");
      await vi.waitFor(() => expect(proc.exit).toHaveBeenCalledWith(0));
    } finally {
      for (const stop of stops) await stop();
    }
    expect(stops).toHaveLength(1);
  });
});
