import {
  PROTOCOL_VERSION,
  TeamError,
  isFrame,
  isRpcBody,
  validateFrameData,
} from "@teamwire/schemas";
import type { Frame, RpcBody, RpcRequestBody } from "@teamwire/schemas";
import type { NetworkEncryptor } from "./network-encryptor.js";

export const MAX_FRAME_BYTES = 1024 * 1024;

export type FrameResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: TeamError };

function frameError(message: string): { ok: false; error: TeamError } {
  return { ok: false, error: new TeamError("FrameError", message) };
}

export function encodeFrame(frame: Frame): string {
  return JSON.stringify(frame);
}

export function decodeFrame(raw: string): FrameResult<Frame> {
  if (Buffer.byteLength(raw, "utf-8") > MAX_FRAME_BYTES) {
    return frameError(`Frame exceeds ${MAX_FRAME_BYTES} bytes`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return frameError("Frame is not valid JSON");
  }
  if (!isFrame(parsed)) {
    return frameError(`Malformed frame: ${validateFrameData(parsed).errors.join(", ")}`);
  }
  return { ok: true, value: parsed };
}

/** Encrypts a body into a frame; `id` is omitted for notifications. */
export function sealFrame(encryptor: NetworkEncryptor, body: RpcBody, id?: string): Frame {
  const sealed = encryptor.encrypt(JSON.stringify(body));
  const frame: Frame = {
    jsonrpc: "2.0",
    payload: {
      nonce: sealed.nonce.toString("base64"),
      ciphertext: sealed.ciphertext.toString("base64"),
    },
  };
  if (id !== undefined) frame.id = id;
  return frame;
}

/** Decrypts and validates the body carried by a frame. */
export function openFrame(encryptor: NetworkEncryptor, frame: Frame): FrameResult<RpcBody> {
  const decrypted = encryptor.decrypt(
    Buffer.from(frame.payload.nonce, "base64"),
    Buffer.from(frame.payload.ciphertext, "base64"),
  );
  if (!decrypted.ok) return { ok: false, error: decrypted.error };

  let body: unknown;
  try {
    body = JSON.parse(decrypted.plaintext.toString("utf-8"));
  } catch {
    return frameError("Decrypted body is not valid JSON");
  }
  if (!isRpcBody(body)) {
    return frameError("Decrypted body is not a request, result or error");
  }
  return { ok: true, value: body };
}

export function requestBody(method: string, params: object): RpcRequestBody {
  return { protocol_version: PROTOCOL_VERSION, method, params };
}

export function isRequestBody(body: RpcBody): body is RpcRequestBody {
  return "method" in body;
}
