import { ConsoleLogger, logError } from "@teamwire/schemas";
import type { TeamLogger } from "@teamwire/schemas";

export interface HeartbeatMonitorOptions {
  intervalMs: number;
  missThreshold: number;
  /** Evicts nodes silent for longer than `timeoutMs`; resolves with the evicted ids. */
  sweep: (timeoutMs: number) => Promise<string[]>;
  logger?: TeamLogger;
}

/**
 * Periodic liveness sweep. The monitor owns only the timer; eviction
 * itself is submitted through the team authority like any other mutation.
 */
export class HeartbeatMonitor {
  readonly intervalMs: number;
  readonly timeoutMs: number;
  private sweep: (timeoutMs: number) => Promise<string[]>;
  private logger: TeamLogger;
  private timer?: ReturnType<typeof setInterval>;
  private sweeping = false;

  constructor(options: HeartbeatMonitorOptions) {
    this.intervalMs = options.intervalMs;
    this.timeoutMs = options.intervalMs * options.missThreshold;
    this.sweep = options.sweep;
    this.logger = options.logger ?? new ConsoleLogger("heartbeat");
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => logError(this.logger, "Heartbeat sweep failed", err));
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  /** Runs one sweep now. Overlapping ticks are skipped. */
  async tick(): Promise<string[]> {
    if (this.sweeping) return [];
    this.sweeping = true;
    try {
      const evicted = await this.sweep(this.timeoutMs);
      if (evicted.length > 0) {
        this.logger.warn("Evicted unresponsive nodes", { node_ids: evicted, timeout_ms: this.timeoutMs });
      }
      return evicted;
    } finally {
      this.sweeping = false;
    }
  }
}
