import { Command } from "commander";
import { hostname } from "node:os";
import { ConsoleLogger, logError } from "@teamwire/schemas";
import type { TeamLogger } from "@teamwire/schemas";
import { NetworkEncryptor } from "@teamwire/protocol";
import { TeamBroker, TeamClient, validateBrokerConfig } from "@teamwire/team";
import {
  loadOptionalConfigFile,
  resolveBrokerConfig,
  resolveJoinConfig,
} from "./config.js";
import type { Env, JoinOptions, ServeOptions } from "./config.js";
import { RealTerminalIO, TeamConsole } from "./team-console.js";
import type { ProcessControl, TerminalIO } from "./team-console.js";

export const VERSION = "0.1.0";

export interface ProgramDeps {
  env?: Env;
  cwd?: string;
  writeLine?: (text: string) => void;
  logger?: TeamLogger;
  terminal?: TerminalIO;
  process?: ProcessControl;
  hostname?: () => string;
  /** Arranges for `stop` to run on shutdown; defaults to SIGINT/SIGTERM. */
  onShutdown?: (stop: () => Promise<void>) => void;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function onSignals(logger: TeamLogger): (stop: () => Promise<void>) => void {
  return (stop) => {
    const handler = () => {
      stop().then(
        () => process.exit(0),
        (err: unknown) => {
          logError(logger, "Shutdown failed", err);
          process.exit(1);
        },
      );
    };
    process.once("SIGINT", handler);
    process.once("SIGTERM", handler);
  };
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const writeLine = deps.writeLine ?? ((text: string) => console.log(text));

  const program = new Command();
  program.name("teamwire").description("Encrypted coordination for a team of nodes").version(VERSION);

  program.command("serve").description("Run the team broker")
    .option("--config <path>", "YAML config file")
    .option("-k, --key <base64>", "Shared team key (TEAMWIRE_TEAM_KEY)")
    .option("--team-id <id>", "Team id; generated when omitted")
    .option("--host <host>", "Interface to bind")
    .option("-p, --port <port>", "Port to listen on (0 picks one)")
    .option("--data-dir <dir>", "Where team state is kept")
    .option("--heartbeat-interval <ms>", "Expected heartbeat interval")
    .option("--miss-threshold <n>", "Missed heartbeats before eviction")
    .option("--max-queue <n>", "Outbound frames buffered per session")
    .option("--ephemeral", "Keep team state in memory only")
    .option("--no-fsync", "Skip fsync on persistence writes")
    .action(async (opts: ServeOptions) => {
      const file = await loadOptionalConfigFile(opts.config, env, deps.cwd);
      const config = resolveBrokerConfig(opts, env, file);
      const errors = validateBrokerConfig(config);
      if (errors.length > 0) {
        throw new Error(`Invalid broker configuration:\n  - ${errors.join("\n  - ")}`);
      }

      const logger = deps.logger ?? new ConsoleLogger("teamwire");
      const broker = new TeamBroker({ config, logger });
      const restored = await broker.start();
      writeLine(`Team ${broker.teamId} ready at ${broker.url}`);
      writeLine(`Restored ${restored.nodes} node(s), ${restored.entries} ledger entr${restored.entries === 1 ? "y" : "ies"}, mode ${restored.mode}`);

      (deps.onShutdown ?? onSignals(logger))(async () => {
        logger.info("Shutting down team broker");
        await broker.stop();
      });
    });

  program.command("join").description("Join a team and open an interactive console")
    .option("--config <path>", "YAML config file")
    .option("-u, --url <url>", "Broker URL, e.g. ws://127.0.0.1:7420/team (TEAMWIRE_URL)")
    .option("-k, --key <base64>", "Shared team key (TEAMWIRE_TEAM_KEY)")
    .option("-n, --node-id <id>", "Node id; defaults to the host name")
    .option("--name <name>", "Display name")
    .option("-r, --role <role>", "admin, editor or observer")
    .option("-c, --capability <name>", "Declared capability (repeatable)", collect, [])
    .option("--heartbeat-interval <ms>", "Heartbeat interval")
    .action(async (opts: JoinOptions) => {
      const file = await loadOptionalConfigFile(opts.config, env, deps.cwd);
      const join = resolveJoinConfig(opts, env, file, (deps.hostname ?? hostname)());
      if (join.teamKey.trim().length === 0) {
        throw new Error("Team key is required (set TEAMWIRE_TEAM_KEY or pass --key)");
      }

      const client = new TeamClient({
        url: join.url,
        teamKey: join.teamKey,
        node: join.node,
        heartbeatIntervalMs: join.heartbeatIntervalMs,
        logger: deps.logger ?? new ConsoleLogger(`teamwire:${join.node.node_id}`),
        onClose: (code, reason) => teamConsole.disconnected(code, reason),
      });
      const teamConsole = new TeamConsole({
        client,
        terminal: deps.terminal ?? new RealTerminalIO(),
        process: deps.process,
      });
      await teamConsole.start();
    });

  program.command("keygen").description("Generate a new shared team key")
    .action(() => {
      writeLine(NetworkEncryptor.generateKey());
    });

  return program;
}
