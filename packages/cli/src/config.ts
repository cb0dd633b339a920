import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { NODE_ROLES, isConfigFile, validateConfigFileData } from "@teamwire/schemas";
import type { NodeRole, RegisterParams, TeamwireConfigFile } from "@teamwire/schemas";
import { DEFAULT_BROKER_CONFIG, TEAM_PATH } from "@teamwire/team";
import type { BrokerConfig } from "@teamwire/team";

export type Env = Record<string, string | undefined>;

/** Picked up from the working directory when no --config is given. */
export const DEFAULT_CONFIG_FILE = "teamwire.yaml";

export interface ServeOptions {
  config?: string;
  key?: string;
  teamId?: string;
  host?: string;
  port?: string;
  dataDir?: string;
  heartbeatInterval?: string;
  missThreshold?: string;
  maxQueue?: string;
  ephemeral?: boolean;
  /** Commander sets this to false for --no-fsync. */
  fsync?: boolean;
}

export interface JoinOptions {
  config?: string;
  url?: string;
  key?: string;
  nodeId?: string;
  name?: string;
  role?: string;
  capability?: string[];
  heartbeatInterval?: string;
}

export interface JoinConfig {
  url: string;
  teamKey: string;
  node: RegisterParams;
  heartbeatIntervalMs: number;
}

export function parsePort(value: string, label = "port"): number {
  const port = /^\d+$/.test(value.trim()) ? parseInt(value, 10) : Number.NaN;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid ${label}: "${value}" (must be 0-65535)`);
  }
  return port;
}

export function parsePositiveInt(value: string, label: string, fallback?: number): number {
  const n = /^\d+$/.test(value.trim()) ? parseInt(value, 10) : Number.NaN;
  if (Number.isNaN(n) || n < 1) {
    if (fallback !== undefined) return fallback;
    throw new Error(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

export function parseBoolean(value: string, label: string): boolean {
  switch (value.trim().toLowerCase()) {
    case "true": case "1": case "yes": return true;
    case "false": case "0": case "no": return false;
    default: throw new Error(`Invalid ${label}: "${value}" (must be true or false)`);
  }
}

function isNodeRole(value: string): value is NodeRole {
  return NODE_ROLES.some((r) => r === value);
}

export async function loadConfigFile(filePath: string): Promise<TeamwireConfigFile> {
  if (!existsSync(filePath)) throw new Error(`Config file not found: ${filePath}`);
  const content = await readFile(filePath, "utf-8");
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (err) {
    throw new Error(`Config file "${filePath}" is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  // an empty file is an empty config
  if (data === undefined || data === null) return {};
  if (!isConfigFile(data)) {
    throw new Error(`Invalid config file "${filePath}": ${validateConfigFileData(data).errors.join(", ")}`);
  }
  return data;
}

/**
 * Loads the file named by --config or TEAMWIRE_CONFIG. Without either,
 * reads ./teamwire.yaml when it exists.
 */
export async function loadOptionalConfigFile(explicit: string | undefined, env: Env, cwd = process.cwd()): Promise<TeamwireConfigFile> {
  const named = explicit ?? env.TEAMWIRE_CONFIG;
  if (named !== undefined) return loadConfigFile(resolve(cwd, named));
  const fallback = resolve(cwd, DEFAULT_CONFIG_FILE);
  return existsSync(fallback) ? loadConfigFile(fallback) : {};
}

function intSetting(raw: string | undefined, label: string): number | undefined {
  return raw === undefined ? undefined : parsePositiveInt(raw, label);
}

function boolSetting(raw: string | undefined, label: string): boolean | undefined {
  return raw === undefined ? undefined : parseBoolean(raw, label);
}

/** Command line beats environment, environment beats the config file. */
export function resolveBrokerConfig(opts: ServeOptions, env: Env, file: TeamwireConfigFile): BrokerConfig {
  const rawPort = opts.port ?? env.TEAMWIRE_PORT;
  return {
    teamKey: opts.key ?? env.TEAMWIRE_TEAM_KEY ?? file.team_key ?? "",
    teamId: opts.teamId ?? env.TEAMWIRE_TEAM_ID ?? file.team_id,
    host: opts.host ?? env.TEAMWIRE_HOST ?? file.host ?? DEFAULT_BROKER_CONFIG.host,
    port: (rawPort === undefined ? undefined : parsePort(rawPort)) ?? file.port ?? DEFAULT_BROKER_CONFIG.port,
    dataDir: opts.dataDir ?? env.TEAMWIRE_DATA_DIR ?? file.data_dir ?? DEFAULT_BROKER_CONFIG.dataDir,
    heartbeatIntervalMs:
      intSetting(opts.heartbeatInterval ?? env.TEAMWIRE_HEARTBEAT_INTERVAL_MS, "heartbeat interval")
      ?? file.heartbeat_interval_ms ?? DEFAULT_BROKER_CONFIG.heartbeatIntervalMs,
    missThreshold:
      intSetting(opts.missThreshold ?? env.TEAMWIRE_MISS_THRESHOLD, "miss threshold")
      ?? file.miss_threshold ?? DEFAULT_BROKER_CONFIG.missThreshold,
    maxQueuedFrames:
      intSetting(opts.maxQueue ?? env.TEAMWIRE_MAX_QUEUED_FRAMES, "outbound queue bound")
      ?? file.max_queued_frames ?? DEFAULT_BROKER_CONFIG.maxQueuedFrames,
    ephemeral: (opts.ephemeral === true ? true : undefined)
      ?? boolSetting(env.TEAMWIRE_EPHEMERAL, "TEAMWIRE_EPHEMERAL")
      ?? file.ephemeral ?? DEFAULT_BROKER_CONFIG.ephemeral,
    fsync: (opts.fsync === false ? false : undefined)
      ?? boolSetting(env.TEAMWIRE_FSYNC, "TEAMWIRE_FSYNC")
      ?? file.fsync ?? DEFAULT_BROKER_CONFIG.fsync,
  };
}

export function resolveJoinConfig(opts: JoinOptions, env: Env, file: TeamwireConfigFile, fallbackNodeId: string): JoinConfig {
  const role = opts.role ?? env.TEAMWIRE_ROLE;
  if (role !== undefined && !isNodeRole(role)) {
    throw new Error(`Invalid role: "${role}" (must be one of ${NODE_ROLES.join(", ")})`);
  }

  const capabilities = opts.capability && opts.capability.length > 0
    ? opts.capability
    : (env.TEAMWIRE_CAPABILITIES ?? "").split(",").map((c) => c.trim()).filter(Boolean);

  const node: RegisterParams = { node_id: opts.nodeId ?? env.TEAMWIRE_NODE_ID ?? fallbackNodeId };
  const name = opts.name ?? env.TEAMWIRE_NODE_NAME;
  if (name !== undefined) node.name = name;
  if (role !== undefined) node.role = role;
  if (capabilities.length > 0) node.capabilities = capabilities;

  return {
    url: opts.url ?? env.TEAMWIRE_URL ?? file.broker_url
      ?? `ws://${file.host ?? DEFAULT_BROKER_CONFIG.host}:${file.port ?? DEFAULT_BROKER_CONFIG.port}${TEAM_PATH}`,
    teamKey: opts.key ?? env.TEAMWIRE_TEAM_KEY ?? file.team_key ?? "",
    node,
    heartbeatIntervalMs:
      intSetting(opts.heartbeatInterval ?? env.TEAMWIRE_HEARTBEAT_INTERVAL_MS, "heartbeat interval")
      ?? file.heartbeat_interval_ms ?? DEFAULT_BROKER_CONFIG.heartbeatIntervalMs,
  };
}
