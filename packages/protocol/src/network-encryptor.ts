import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { TeamError } from "@teamwire/schemas";

const ALGORITHM = "aes-256-gcm";
export const KEY_BYTES = 32;
export const NONCE_BYTES = 12;
export const TAG_BYTES = 16;

export interface SealedMessage {
  nonce: Buffer;
  ciphertext: Buffer;
}

export type DecryptResult =
  | { ok: true; plaintext: Buffer }
  | { ok: false; error: TeamError };

function decryptFailure(reason: string): DecryptResult {
  return { ok: false, error: new TeamError("DecryptFailure", reason) };
}

/**
 * Authenticated symmetric encryption for frame bodies, keyed by the
 * team's shared secret. Every message gets a fresh random nonce; the
 * GCM tag travels at the end of the ciphertext.
 */
export class NetworkEncryptor {
  private key: Buffer;

  constructor(key: Buffer) {
    if (key.length !== KEY_BYTES) {
      throw new Error(`Team key must be ${KEY_BYTES} bytes, got ${key.length}`);
    }
    this.key = Buffer.from(key);
  }

  static fromBase64(encoded: string): NetworkEncryptor {
    const trimmed = encoded.trim();
    if (!/^[A-Za-z0-9+/_-]+={0,2}$/.test(trimmed)) {
      throw new Error("Team key must be base64 encoded");
    }
    return new NetworkEncryptor(Buffer.from(trimmed, trimmed.includes("-") || trimmed.includes("_") ? "base64url" : "base64"));
  }

  static generateKey(): string {
    return randomBytes(KEY_BYTES).toString("base64");
  }

  encrypt(plaintext: Buffer | string): SealedMessage {
    const nonce = randomBytes(NONCE_BYTES);
    const cipher = createCipheriv(ALGORITHM, this.key, nonce, { authTagLength: TAG_BYTES });
    const body = cipher.update(typeof plaintext === "string" ? Buffer.from(plaintext, "utf-8") : plaintext);
    const ciphertext = Buffer.concat([body, cipher.final(), cipher.getAuthTag()]);
    return { nonce, ciphertext };
  }

  decrypt(nonce: Buffer, ciphertext: Buffer): DecryptResult {
    if (nonce.length !== NONCE_BYTES) {
      return decryptFailure(`Nonce must be ${NONCE_BYTES} bytes, got ${nonce.length}`);
    }
    if (ciphertext.length < TAG_BYTES) {
      return decryptFailure("Ciphertext is shorter than the authentication tag");
    }
    const tag = ciphertext.subarray(ciphertext.length - TAG_BYTES);
    const body = ciphertext.subarray(0, ciphertext.length - TAG_BYTES);
    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, nonce, { authTagLength: TAG_BYTES });
      decipher.setAuthTag(tag);
      const head = decipher.update(body);
      // final() throws on tag mismatch; nothing decrypted so far is returned
      const plaintext = Buffer.concat([head, decipher.final()]);
      return { ok: true, plaintext };
    } catch {
      return decryptFailure("Authentication failed");
    }
  }
}
