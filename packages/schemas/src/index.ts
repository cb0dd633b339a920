export * from "./types.js";
export {
  FrameSchema,
  RpcBodySchema,
  RegisterParamsSchema,
  BroadcastParamsSchema,
  LedgerParamsSchema,
  AttachParamsSchema,
  HandoffParamsSchema,
  ModeParamsSchema,
  NodeRefParamsSchema,
  TeamEventSchema,
  LedgerEventSchema,
  ModeEventSchema,
  LedgerEntrySchema,
  TeamNodeSchema,
  TeamSnapshotSchema,
  BroadcastResultSchema,
  LedgerResultSchema,
  AttachResultSchema,
  HandoffResultSchema,
  ModeResultSchema,
  HeartbeatResultSchema,
  LeaveResultSchema,
  ConfigFileSchema,
} from "./rpc.schema.js";
export {
  BROKER_PARAM_VALIDATORS,
  CLIENT_PARAM_VALIDATORS,
  BROKER_RESULT_VALIDATORS,
  formatErrors,
  isFrame,
  isRpcBody,
  validateFrameData,
  validateRpcBodyData,
  isLedgerEntry,
  isTeamSnapshot,
  validateTeamSnapshotData,
  isConfigFile,
  validateConfigFileData,
} from "./validator.js";
export type { ValidationResult, ParamsValidator, ParamsValidators } from "./validator.js";
export {
  TeamError,
  unknownMethod,
  invalidParams,
  unknownNode,
  unknownRepo,
  notRegistered,
  toErrorBody,
} from "./errors.js";
export { withTimeout } from "./timeout.js";
export { ConsoleLogger, logError } from "./logger.js";
