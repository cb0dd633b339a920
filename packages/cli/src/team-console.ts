import * as readline from "node:readline";
import { TeamError } from "@teamwire/schemas";
import type {
  AttachEvent,
  BroadcastResult,
  EventResult,
  HandoffEvent,
  LeaveResult,
  LedgerResult,
  ModeResult,
  TeamEvent,
  TeamMode,
  TeamSnapshot,
} from "@teamwire/schemas";
import {
  dim, green, red, yellow,
  formatAmount, formatSnapshot, formatTeamEvent, helpText, parseTeamCommand, teamPrompt,
} from "./team-formatter.js";
import type { TeamCommand } from "./team-formatter.js";

// ─── DI Interfaces ────────────────────────────────────────────────

/** The slice of TeamClient the console drives. */
export interface TeamConsoleClient {
  readonly nodeId: string;
  join(): Promise<TeamSnapshot>;
  leave(): Promise<LeaveResult>;
  broadcast(message: string): Promise<BroadcastResult>;
  setMode(mode: TeamMode): Promise<ModeResult>;
  attach(repo: string, path?: string): Promise<EventResult<AttachEvent>>;
  handoff(repo: string, task: string, target: string): Promise<EventResult<HandoffEvent>>;
  recordLedger(amount: number, description?: string): Promise<LedgerResult>;
  state(): TeamSnapshot | null;
  on(listener: (event: TeamEvent) => void): () => void;
  close(): Promise<void>;
}

/** Terminal I/O abstraction (wraps readline + stdout). */
export interface TerminalIO {
  createReadline(): void;
  closeReadline(): void;
  setPrompt(prompt: string): void;
  prompt(): void;
  onLine(handler: (line: string) => void): void;
  onClose(handler: () => void): void;
  clearLine(): void;
  writeLine(text: string): void;
}

export interface ProcessControl {
  exit(code: number): void;
}

export interface TeamConsoleConfig {
  client: TeamConsoleClient;
  terminal: TerminalIO;
  process?: ProcessControl;
}

// ─── TeamConsole ──────────────────────────────────────────────────

/** Interactive front end for `teamwire join`. */
export class TeamConsole {
  private readonly _client: TeamConsoleClient;
  private readonly _terminal: TerminalIO;
  private readonly _process: ProcessControl;
  private _unsubscribe: (() => void) | null = null;
  private _closing = false;

  constructor(config: TeamConsoleConfig) {
    this._client = config.client;
    this._terminal = config.terminal;
    this._process = config.process ?? process;
  }

  get isClosing(): boolean {
    return this._closing;
  }

  async start(): Promise<void> {
    const snapshot = await this._client.join();
    this._terminal.writeLine(green(`Joined team ${snapshot.team_id} as ${this._client.nodeId}`));
    this._terminal.writeLine(formatSnapshot(snapshot));
    this._terminal.writeLine(dim("Type a message to broadcast it. Commands: /help, /leave, /quit\n"));

    this._unsubscribe = this._client.on((event) => {
      this.printAbove(formatTeamEvent(event));
    });

    this._terminal.createReadline();
    this.updatePrompt();
    this._terminal.onLine((line) => {
      this.handleLine(line).catch((err: unknown) => this.printAbove(red(describeError(err))));
    });
    this._terminal.onClose(() => {
      this.shutdown(0).catch((err: unknown) => this._terminal.writeLine(red(describeError(err))));
    });
  }

  async handleLine(line: string): Promise<void> {
    const parsed = parseTeamCommand(line);
    if (parsed === null) {
      this.updatePrompt();
      return;
    }
    if (!parsed.ok) {
      this.printAbove(yellow(parsed.error));
      return;
    }
    try {
      const output = await this.execute(parsed.command);
      if (output !== null) this.printAbove(output);
    } catch (err) {
      this.printAbove(red(describeError(err)));
    }
  }

  /** Called when the broker connection drops underneath the console. */
  disconnected(code: number, reason: string): void {
    if (this._closing) return;
    this._terminal.writeLine(red(`Disconnected from team broker (${code}${reason ? `: ${reason}` : ""})`));
    this.shutdown(1).catch((err: unknown) => this._terminal.writeLine(red(describeError(err))));
  }

  async shutdown(code: number): Promise<void> {
    if (this._closing) return;
    this._closing = true;
    this._unsubscribe?.();
    this._unsubscribe = null;
    this._terminal.closeReadline();
    await this._client.close();
    this._process.exit(code);
  }

  private async execute(command: TeamCommand): Promise<string | null> {
    switch (command.kind) {
      case "help":
        return helpText();
      case "state": {
        const snapshot = this._client.state();
        return snapshot ? formatSnapshot(snapshot) : dim("No team state yet");
      }
      case "broadcast": {
        const result = await this._client.broadcast(command.message);
        return dim(`delivered to ${result.delivered} session(s)`);
      }
      case "mode": {
        const result = await this._client.setMode(command.mode);
        return result.changed ? `Mode is now ${result.mode}` : dim(`Mode already ${result.mode}`);
      }
      case "attach":
        return formatTeamEvent((await this._client.attach(command.repo, command.path)).event);
      case "handoff":
        return formatTeamEvent((await this._client.handoff(command.repo, command.task, command.target)).event);
      case "ledger": {
        const result = await this._client.recordLedger(command.amount, command.description);
        const line = `Ledger #${result.entry.id} ${formatAmount(result.entry.amount)} (total ${result.totals.total})`;
        return result.persisted ? line : `${line} ${yellow("not yet persisted")}`;
      }
      case "leave":
        await this._client.leave();
        this._terminal.writeLine(green("Left the team"));
        await this.shutdown(0);
        return null;
      case "quit":
        await this.shutdown(0);
        return null;
    }
  }

  private printAbove(text: string): void {
    if (this._closing) return;
    this._terminal.clearLine();
    this._terminal.writeLine(text);
    this.updatePrompt();
  }

  private updatePrompt(): void {
    this._terminal.setPrompt(teamPrompt(this._client.nodeId, this._client.state()?.mode));
    this._terminal.prompt();
  }
}

function describeError(err: unknown): string {
  if (err instanceof TeamError) return `${err.code}: ${err.message}`;
  return err instanceof Error ? err.message : String(err);
}

// ─── Real terminal ────────────────────────────────────────────────

export class RealTerminalIO implements TerminalIO {
  private _rl: readline.Interface | null = null;

  createReadline(): void {
    if (this._rl) {
      this._rl.removeAllListeners();
      this._rl.close();
    }
    this._rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  }

  closeReadline(): void {
    if (this._rl) {
      this._rl.removeAllListeners();
      this._rl.close();
      this._rl = null;
    }
  }

  setPrompt(prompt: string): void {
    if (this._rl) this._rl.setPrompt(prompt);
  }

  prompt(): void {
    if (this._rl) this._rl.prompt(true);
  }

  onLine(handler: (line: string) => void): void {
    if (this._rl) this._rl.on("line", handler);
  }

  onClose(handler: () => void): void {
    if (this._rl) this._rl.on("close", handler);
  }

  clearLine(): void {
    process.stdout.write("\r\x1b[K");
  }

  writeLine(text: string): void {
    console.log(text);
  }
}
