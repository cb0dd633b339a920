import { createServer } from "node:http";
import type { IncomingMessage, Server } from "node:http";
import type { AddressInfo } from "node:net";
import { resolve } from "node:path";
import express from "express";
import { WebSocketServer, WebSocket } from "ws";
import { v4 as uuid } from "uuid";
import { ConsoleLogger, logError } from "@teamwire/schemas";
import type { TeamEvent, TeamLogger, TeamMode, TeamPersistence } from "@teamwire/schemas";
import { NetworkEncryptor } from "@teamwire/protocol";
import { MemoryTeamStore, TeamStore } from "@teamwire/store";
import type { BrokerConfig } from "./config.js";
import { TeamAuthority } from "./team-authority.js";
import type { EventTarget, RestoreSummary } from "./team-authority.js";
import { createBrokerDispatcher } from "./broker-handlers.js";
import type { BrokerDispatcher } from "./broker-handlers.js";
import { BrokerSession, GOING_AWAY_CLOSE_CODE } from "./broker-session.js";
import { HeartbeatMonitor } from "./heartbeat-monitor.js";
import { rawDataToString } from "./ws-data.js";

export const TEAM_PATH = "/team";

export interface TeamBrokerOptions {
  config: BrokerConfig;
  /** Overrides the store chosen from `config`. */
  store?: TeamPersistence;
  logger?: TeamLogger;
  now?: () => Date;
}

export interface HealthReport {
  status: "ok";
  team_id: string;
  mode: TeamMode;
  nodes: number;
  sessions: number;
}

/**
 * The authoritative endpoint for one team: an HTTP server carrying the
 * encrypted WebSocket channel at `/team` and a `/health` probe.
 */
export class TeamBroker {
  readonly teamId: string;
  private config: BrokerConfig;
  private logger: TeamLogger;
  private encryptor: NetworkEncryptor;
  private authority: TeamAuthority;
  private dispatcher: BrokerDispatcher;
  private monitor: HeartbeatMonitor;
  private app: express.Application;
  private httpServer?: Server;
  private wss?: WebSocketServer;
  private sessions = new Map<string, BrokerSession>();

  constructor(options: TeamBrokerOptions) {
    this.config = options.config;
    this.teamId = options.config.teamId ?? uuid();
    this.logger = options.logger ?? new ConsoleLogger("team-broker");
    this.encryptor = NetworkEncryptor.fromBase64(options.config.teamKey);

    const store = options.store ?? (this.config.ephemeral
      ? new MemoryTeamStore()
      : new TeamStore(resolve(this.config.dataDir), this.teamId, { fsync: this.config.fsync, logger: this.logger }));

    this.authority = new TeamAuthority({
      teamId: this.teamId,
      store,
      logger: this.logger,
      now: options.now,
      publish: (event, target) => this.fanOut(event, target),
    });
    this.dispatcher = createBrokerDispatcher(this.authority);
    this.monitor = new HeartbeatMonitor({
      intervalMs: this.config.heartbeatIntervalMs,
      missThreshold: this.config.missThreshold,
      sweep: (timeoutMs) => this.authority.sweep(timeoutMs),
      logger: this.logger,
    });
    this.app = this.createApp();
  }

  /** Restores persisted state, then starts listening. */
  async start(): Promise<RestoreSummary> {
    if (this.httpServer) throw new Error("Team broker already started");
    const restored = await this.authority.restore();

    const server = createServer(this.app);
    await new Promise<void>((resolveListen, rejectListen) => {
      server.once("error", rejectListen);
      server.listen(this.config.port, this.config.host, () => {
        server.off("error", rejectListen);
        resolveListen();
      });
    });
    this.httpServer = server;
    this.setupWebSocket(server);
    this.monitor.start();

    this.logger.info(`Team ${this.teamId} listening on ${this.url}`, {
      heartbeat_interval_ms: this.monitor.intervalMs,
      heartbeat_timeout_ms: this.monitor.timeoutMs,
    });
    return restored;
  }

  /** Closes every session, flushes pending persistence and stops the server. */
  async stop(): Promise<void> {
    this.monitor.stop();
    for (const session of [...this.sessions.values()]) {
      session.close(GOING_AWAY_CLOSE_CODE, "Broker shutting down");
    }
    this.sessions.clear();
    if (this.wss) {
      this.wss.close();
      this.wss = undefined;
    }
    await this.authority.close();
    const server = this.httpServer;
    this.httpServer = undefined;
    if (server) {
      await new Promise<void>((resolveClose) => server.close(() => resolveClose()));
    }
  }

  get port(): number {
    const addr = this.httpServer?.address();
    return typeof addr === "object" && addr ? addr.port : this.config.port;
  }

  get url(): string {
    return `ws://${this.config.host}:${this.port}${TEAM_PATH}`;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  health(): HealthReport {
    const snapshot = this.authority.snapshot();
    return {
      status: "ok",
      team_id: this.teamId,
      mode: snapshot.mode,
      nodes: snapshot.nodes.length,
      sessions: this.sessions.size,
    };
  }

  getAuthority(): TeamAuthority {
    return this.authority;
  }

  getMonitor(): HeartbeatMonitor {
    return this.monitor;
  }

  getExpressApp(): express.Application {
    return this.app;
  }

  address(): AddressInfo | null {
    const addr = this.httpServer?.address();
    return typeof addr === "object" && addr ? addr : null;
  }

  private createApp(): express.Application {
    const app = express();
    app.disable("x-powered-by");
    app.get("/health", (_req, res) => {
      res.json(this.health());
    });
    return app;
  }

  private setupWebSocket(server: Server): void {
    const wss = new WebSocketServer({ noServer: true });
    this.wss = wss;

    server.on("upgrade", (req: IncomingMessage, socket, head) => {
      const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
      if (pathname !== TEAM_PATH) {
        socket.destroy();
        return;
      }
      wss.handleUpgrade(req, socket, head, (ws) => {
        wss.emit("connection", ws, req);
      });
    });

    wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
      const session = new BrokerSession({
        id: uuid(),
        socket: ws,
        remoteHost: req.socket.remoteAddress ?? "unknown",
        encryptor: this.encryptor,
        dispatcher: this.dispatcher,
        maxQueuedFrames: this.config.maxQueuedFrames,
        logger: this.logger,
        onClose: (closed) => this.handleSessionClosed(closed),
      });
      this.sessions.set(session.id, session);
      this.logger.debug("Session opened", { session_id: session.id, remote: session.binding.remote_host });

      ws.on("message", (data, isBinary) => {
        if (isBinary) {
          this.logger.warn("Dropped binary frame", { session_id: session.id });
          return;
        }
        session.receive(rawDataToString(data));
      });
      ws.on("close", () => session.markClosed());
      ws.on("error", (err) => {
        logError(this.logger, "Session socket error", err, { session_id: session.id });
        session.markClosed();
      });
    });
  }

  private handleSessionClosed(session: BrokerSession): void {
    this.sessions.delete(session.id);
    // the node stays registered until it leaves or times out
    this.logger.debug("Session closed", { session_id: session.id, node_id: session.nodeId });
  }

  private fanOut(event: TeamEvent, target: EventTarget): number {
    let delivered = 0;
    for (const session of this.sessions.values()) {
      if (target.exceptSession && session.id === target.exceptSession) continue;
      if (target.exceptNode !== undefined && session.nodeId === target.exceptNode) continue;
      if (session.notify(event)) delivered++;
    }
    return delivered;
  }
}
