export { TeamBroker, TEAM_PATH } from "./team-broker.js";
export type { TeamBrokerOptions, HealthReport } from "./team-broker.js";
export { TeamClient } from "./team-client.js";
export type { TeamClientOptions, TeamEventListener } from "./team-client.js";
export { TeamView } from "./team-view.js";
export { TeamAuthority } from "./team-authority.js";
export type {
  CallContext,
  SessionBinding,
  EventTarget,
  EventPublisher,
  TeamAuthorityOptions,
  RestoreSummary,
} from "./team-authority.js";
export { BrokerSession, QUEUE_OVERFLOW_CLOSE_CODE, GOING_AWAY_CLOSE_CODE } from "./broker-session.js";
export type { BrokerSessionOptions, SessionSocket } from "./broker-session.js";
export { createBrokerDispatcher } from "./broker-handlers.js";
export type { BrokerDispatcher } from "./broker-handlers.js";
export { HeartbeatMonitor } from "./heartbeat-monitor.js";
export type { HeartbeatMonitorOptions } from "./heartbeat-monitor.js";
export { NodeRegistry, normalizeCapabilities } from "./node-registry.js";
export type { RegisterOutcome } from "./node-registry.js";
export { Ledger, summarizeLedger } from "./ledger.js";
export { AttachmentMap } from "./attachment-map.js";
export { ModeState } from "./mode-state.js";
export { DEFAULT_BROKER_CONFIG, DEFAULT_REQUEST_TIMEOUT_MS, validateBrokerConfig } from "./config.js";
export type { BrokerConfig } from "./config.js";
