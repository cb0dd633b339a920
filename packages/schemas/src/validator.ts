import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import {
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
import type {
  Frame,
  RpcBody,
  BrokerMethodParams,
  ClientMethodParams,
  RegisterParams,
  BroadcastParams,
  LedgerParams,
  AttachParams,
  HandoffParams,
  ModeParams,
  HeartbeatParams,
  LeaveParams,
  TeamEvent,
  LedgerEvent,
  ModeEvent,
  LedgerEntry,
  TeamSnapshot,
  BrokerMethodResults,
  BroadcastResult,
  LedgerResult,
  EventResult,
  AttachEvent,
  HandoffEvent,
  ModeResult,
  HeartbeatResult,
  LeaveResult,
  TeamwireConfigFile,
} from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats has a nested .default in ESM due to CJS interop
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/** A compiled schema that narrows its input on success. */
export type ParamsValidator<T> = ValidateFunction<T>;

export type ParamsValidators<P> = { [M in keyof P]: ParamsValidator<P[M]> };

const validateFrame = ajv.compile<Frame>(FrameSchema);
const validateBody = ajv.compile<RpcBody>(RpcBodySchema);
const validateLedgerEntry = ajv.compile<LedgerEntry>(LedgerEntrySchema);
const validateSnapshot = ajv.compile<TeamSnapshot>(TeamSnapshotSchema);
const validateConfigFile = ajv.compile<TeamwireConfigFile>(ConfigFileSchema);

export const BROKER_PARAM_VALIDATORS: ParamsValidators<BrokerMethodParams> = {
  register: ajv.compile<RegisterParams>(RegisterParamsSchema),
  broadcast: ajv.compile<BroadcastParams>(BroadcastParamsSchema),
  ledger: ajv.compile<LedgerParams>(LedgerParamsSchema),
  attach: ajv.compile<AttachParams>(AttachParamsSchema),
  handoff: ajv.compile<HandoffParams>(HandoffParamsSchema),
  mode: ajv.compile<ModeParams>(ModeParamsSchema),
  heartbeat: ajv.compile<HeartbeatParams>(NodeRefParamsSchema),
  leave: ajv.compile<LeaveParams>(NodeRefParamsSchema),
};

export const CLIENT_PARAM_VALIDATORS: ParamsValidators<ClientMethodParams> = {
  "team.event": ajv.compile<TeamEvent>(TeamEventSchema),
  ledger: ajv.compile<LedgerEvent>(LedgerEventSchema),
  mode: ajv.compile<ModeEvent>(ModeEventSchema),
};

/** Checks what the broker sends back, keyed by the method that was called. */
export const BROKER_RESULT_VALIDATORS: ParamsValidators<BrokerMethodResults> = {
  register: validateSnapshot,
  broadcast: ajv.compile<BroadcastResult>(BroadcastResultSchema),
  ledger: ajv.compile<LedgerResult>(LedgerResultSchema),
  attach: ajv.compile<EventResult<AttachEvent>>(AttachResultSchema),
  handoff: ajv.compile<EventResult<HandoffEvent>>(HandoffResultSchema),
  mode: ajv.compile<ModeResult>(ModeResultSchema),
  heartbeat: ajv.compile<HeartbeatResult>(HeartbeatResultSchema),
  leave: ajv.compile<LeaveResult>(LeaveResultSchema),
};

export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  return { valid: false, errors: formatErrors(errors) };
}

export function isFrame(data: unknown): data is Frame {
  return validateFrame(data);
}

export function isRpcBody(data: unknown): data is RpcBody {
  return validateBody(data);
}

export function validateFrameData(data: unknown): ValidationResult {
  const valid = validateFrame(data);
  return toResult(valid, validateFrame.errors);
}

export function validateRpcBodyData(data: unknown): ValidationResult {
  const valid = validateBody(data);
  return toResult(valid, validateBody.errors);
}

export function isLedgerEntry(data: unknown): data is LedgerEntry {
  return validateLedgerEntry(data);
}

export function isTeamSnapshot(data: unknown): data is TeamSnapshot {
  return validateSnapshot(data);
}

export function validateTeamSnapshotData(data: unknown): ValidationResult {
  const valid = validateSnapshot(data);
  return toResult(valid, validateSnapshot.errors);
}

export function isConfigFile(data: unknown): data is TeamwireConfigFile {
  return validateConfigFile(data);
}

export function validateConfigFileData(data: unknown): ValidationResult {
  const valid = validateConfigFile(data);
  return toResult(valid, validateConfigFile.errors);
}
