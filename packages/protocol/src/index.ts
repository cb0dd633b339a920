export { NetworkEncryptor, KEY_BYTES, NONCE_BYTES, TAG_BYTES } from "./network-encryptor.js";
export type { SealedMessage, DecryptResult } from "./network-encryptor.js";
export {
  MAX_FRAME_BYTES,
  encodeFrame,
  decodeFrame,
  sealFrame,
  openFrame,
  requestBody,
  isRequestBody,
} from "./frame-codec.js";
export type { FrameResult } from "./frame-codec.js";
export { Dispatcher } from "./dispatcher.js";
export type { MethodHandler, HandlerTable } from "./dispatcher.js";
