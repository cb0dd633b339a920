import type { TeamErrorCode, RpcErrorBody } from "./types.js";

/**
 * Call-scoped failure with a stable code. Crosses the wire as
 * `{ error, code }` and is rebuilt on the client side.
 */
export class TeamError extends Error {
  readonly code: TeamErrorCode;

  constructor(code: TeamErrorCode, message: string) {
    super(message);
    this.name = "TeamError";
    this.code = code;
  }

  toBody(): RpcErrorBody {
    return { error: this.message, code: this.code };
  }

  static fromBody(body: RpcErrorBody): TeamError {
    return new TeamError(body.code, body.error);
  }
}

export function unknownMethod(method: string): TeamError {
  return new TeamError("UnknownMethod", `Unknown RPC method "${method}"`);
}

export function invalidParams(method: string, errors: string[]): TeamError {
  return new TeamError("InvalidParams", `Invalid params for "${method}": ${errors.join(", ")}`);
}

export function unknownNode(nodeId: string): TeamError {
  return new TeamError("UnknownNode", `Node "${nodeId}" is not registered`);
}

export function unknownRepo(repo: string): TeamError {
  return new TeamError("UnknownRepo", `Repository "${repo}" has no owner`);
}

export function notRegistered(method: string): TeamError {
  return new TeamError("NotRegistered", `"${method}" requires a registered node on this connection`);
}

/** Normalizes anything thrown by a handler into a wire error body. */
export function toErrorBody(err: unknown): RpcErrorBody {
  if (err instanceof TeamError) return err.toBody();
  const message = err instanceof Error ? err.message : String(err);
  return { error: message, code: "InternalError" };
}
