export interface BrokerConfig {
  /** base64-encoded 32-byte shared team key */
  teamKey: string;
  /** Generated with uuid when omitted. */
  teamId?: string;
  host: string;
  /** 0 picks an ephemeral port */
  port: number;
  dataDir: string;
  heartbeatIntervalMs: number;
  missThreshold: number;
  /** Outbound frames buffered per session before it is dropped. */
  maxQueuedFrames: number;
  /** Keep team state in memory only. */
  ephemeral: boolean;
  fsync: boolean;
}

export const DEFAULT_BROKER_CONFIG: Omit<BrokerConfig, "teamKey"> = {
  host: "127.0.0.1",
  port: 7420,
  dataDir: "./.teamwire/teams",
  heartbeatIntervalMs: 5000,
  missThreshold: 5,
  maxQueuedFrames: 256,
  ephemeral: false,
  fsync: true,
};

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

const TEAM_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Validates broker configuration at startup. Returns a list of problems;
 * an empty list means the configuration is usable.
 */
export function validateBrokerConfig(config: BrokerConfig): string[] {
  const errors: string[] = [];

  const key = config.teamKey.trim();
  if (key.length === 0) {
    errors.push("Team key is required (set TEAMWIRE_TEAM_KEY or pass --key)");
  } else if (!/^[A-Za-z0-9+/_-]+={0,2}$/.test(key)) {
    errors.push("Team key must be base64 encoded");
  } else {
    const bytes = Buffer.from(key, key.includes("-") || key.includes("_") ? "base64url" : "base64").length;
    if (bytes !== 32) errors.push(`Team key must decode to 32 bytes, got ${bytes}`);
  }

  if (config.teamId !== undefined && !TEAM_ID_PATTERN.test(config.teamId)) {
    errors.push(`Team id "${config.teamId}" may only contain letters, digits, ".", "_" and "-"`);
  }
  if (config.teamId === "." || config.teamId === "..") {
    errors.push(`Team id "${config.teamId}" is reserved`);
  }
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push(`Port must be an integer between 0 and 65535, got ${config.port}`);
  }
  if (config.host.trim().length === 0) {
    errors.push("Host must not be empty");
  }
  if (!config.ephemeral && config.dataDir.trim().length === 0) {
    errors.push("Data directory must not be empty");
  }
  if (!Number.isInteger(config.heartbeatIntervalMs) || config.heartbeatIntervalMs < 10) {
    errors.push(`Heartbeat interval must be an integer of at least 10ms, got ${config.heartbeatIntervalMs}`);
  }
  if (!Number.isInteger(config.missThreshold) || config.missThreshold < 1) {
    errors.push(`Miss threshold must be a positive integer, got ${config.missThreshold}`);
  }
  if (!Number.isInteger(config.maxQueuedFrames) || config.maxQueuedFrames < 1) {
    errors.push(`Outbound queue bound must be a positive integer, got ${config.maxQueuedFrames}`);
  }

  return errors;
}
