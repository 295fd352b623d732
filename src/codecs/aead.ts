/**
 * AEAD chunk framing for the encrypted-stream protocol.
 *
 * Each direction starts with a random salt, then a sequence of chunks:
 * [encrypted length (2) + tag (16)][encrypted payload (n) + tag (16)]
 *
 * The per-direction subkey is HKDF-SHA1(masterKey, salt, "ss-subkey") and the
 * 12-byte nonce is a little-endian counter incremented after every seal/open.
 */
import crypto from "crypto";

import { DecryptError } from "../errors";

export const AEAD_METHODS = [
  "aes-128-gcm",
  "aes-192-gcm",
  "aes-256-gcm",
  "chacha20-ietf-poly1305",
] as const;

export type AeadMethod = (typeof AEAD_METHODS)[number];

type CipherSpec = {
  /** node cipher name */
  algorithm: string;
  /** key size in `bytes` */
  keySize: number;
  /** salt size in `bytes` */
  saltSize: number;
};

const CIPHERS: Record<AeadMethod, CipherSpec> = {
  "aes-128-gcm": { algorithm: "aes-128-gcm", keySize: 16, saltSize: 16 },
  "aes-192-gcm": { algorithm: "aes-192-gcm", keySize: 24, saltSize: 24 },
  "aes-256-gcm": { algorithm: "aes-256-gcm", keySize: 32, saltSize: 32 },
  "chacha20-ietf-poly1305": { algorithm: "chacha20-poly1305", keySize: 32, saltSize: 32 },
};

export const NONCE_SIZE = 12;
export const TAG_SIZE = 16;
/** largest payload per chunk; the top two length bits are reserved */
export const MAX_CHUNK_PAYLOAD = 0x3fff;

const LENGTH_FIELD_SIZE = 2;
const SUBKEY_INFO = Buffer.from("ss-subkey");

export function getCipherSpec(method: AeadMethod): Readonly<CipherSpec> {
  return CIPHERS[method];
}

/**
 * OpenSSL EVP_BytesToKey with MD5 and a single iteration.
 */
export function evpBytesToKey(password: string, keySize: number): Buffer {
  const secret = Buffer.from(password, "utf8");
  const blocks: Buffer[] = [];
  let produced = 0;
  let previous = Buffer.alloc(0);
  while (produced < keySize) {
    previous = crypto.createHash("md5").update(Buffer.concat([previous, secret])).digest();
    blocks.push(previous);
    produced += previous.length;
  }
  return Buffer.concat(blocks).subarray(0, keySize);
}

export function deriveMasterKey(method: AeadMethod, password: string): Buffer {
  return evpBytesToKey(password, CIPHERS[method].keySize);
}

export function deriveSubkey(masterKey: Buffer, salt: Buffer, keySize: number): Buffer {
  return Buffer.from(crypto.hkdfSync("sha1", masterKey, salt, SUBKEY_INFO, keySize));
}

class NonceCounter {
  private readonly value = Buffer.alloc(NONCE_SIZE);

  current(): Buffer {
    return Buffer.from(this.value);
  }

  increment() {
    for (let i = 0; i < NONCE_SIZE; i++) {
      this.value[i] = (this.value[i] + 1) & 0xff;
      if (this.value[i] !== 0) return;
    }
  }
}

function isAuthenticatedCipher(cipher: crypto.Cipher): cipher is crypto.CipherGCM {
  return "getAuthTag" in cipher && typeof cipher.getAuthTag === "function";
}

function isAuthenticatedDecipher(decipher: crypto.Decipher): decipher is crypto.DecipherGCM {
  return "setAuthTag" in decipher && typeof decipher.setAuthTag === "function";
}

function seal(spec: CipherSpec, key: Buffer, nonce: Buffer, plaintext: Buffer): Buffer {
  const cipher = crypto.createCipheriv(spec.algorithm, key, nonce);
  if (!isAuthenticatedCipher(cipher)) {
    throw new Error(`cipher ${spec.algorithm} does not produce an auth tag`);
  }
  return Buffer.concat([cipher.update(plaintext), cipher.final(), cipher.getAuthTag()]);
}

function open(spec: CipherSpec, key: Buffer, nonce: Buffer, sealed: Buffer): Buffer {
  const decipher = crypto.createDecipheriv(spec.algorithm, key, nonce);
  if (!isAuthenticatedDecipher(decipher)) {
    throw new Error(`cipher ${spec.algorithm} does not verify an auth tag`);
  }
  const body = sealed.subarray(0, sealed.length - TAG_SIZE);
  decipher.setAuthTag(sealed.subarray(sealed.length - TAG_SIZE));
  try {
    return Buffer.concat([decipher.update(body), decipher.final()]);
  } catch {
    throw new DecryptError();
  }
}

/**
 * Encrypts one direction of a stream.
 *
 * The salt is emitted in front of the first output.
 */
export class AeadEncryptor {
  readonly salt: Buffer;
  private readonly spec: CipherSpec;
  private readonly key: Buffer;
  private readonly nonce = new NonceCounter();
  private saltSent = false;

  constructor(method: AeadMethod, masterKey: Buffer, salt?: Buffer) {
    this.spec = CIPHERS[method];
    this.salt = salt ?? crypto.randomBytes(this.spec.saltSize);
    if (this.salt.length !== this.spec.saltSize) {
      throw new Error(`salt must be ${this.spec.saltSize} bytes for ${method}`);
    }
    this.key = deriveSubkey(masterKey, this.salt, this.spec.keySize);
  }

  encrypt(plaintext: Buffer): Buffer {
    const parts: Buffer[] = [];
    if (!this.saltSent) {
      parts.push(this.salt);
      this.saltSent = true;
    }

    for (let offset = 0; offset < plaintext.length; offset += MAX_CHUNK_PAYLOAD) {
      const payload = plaintext.subarray(offset, offset + MAX_CHUNK_PAYLOAD);
      const length = Buffer.alloc(LENGTH_FIELD_SIZE);
      length.writeUInt16BE(payload.length, 0);
      parts.push(this.sealNext(length), this.sealNext(payload));
    }

    return Buffer.concat(parts);
  }

  private sealNext(plaintext: Buffer) {
    const out = seal(this.spec, this.key, this.nonce.current(), plaintext);
    this.nonce.increment();
    return out;
  }
}

/**
 * Decrypts one direction of a stream.
 *
 * Without a salt the first `saltSize` bytes pushed are taken as the salt.
 * Any authentication failure poisons the decryptor.
 */
export class AeadDecryptor {
  private readonly spec: CipherSpec;
  private key: Buffer | null = null;
  private saltValue: Buffer | null = null;
  private readonly nonce = new NonceCounter();
  private pending: Buffer = Buffer.alloc(0);
  /** payload length of the chunk being assembled */
  private payloadLength: number | null = null;
  private failed = false;

  constructor(
    method: AeadMethod,
    private readonly masterKey: Buffer,
    salt?: Buffer
  ) {
    this.spec = CIPHERS[method];
    if (salt) this.useSalt(salt);
  }

  get salt(): Buffer | null {
    return this.saltValue;
  }

  /**
   * Feed ciphertext; returns the payloads of every chunk completed so far.
   *
   * @throws DecryptError on a bad tag or length field
   */
  push(data: Buffer): Buffer[] {
    if (this.failed) throw new DecryptError("stream already failed authentication");
    this.pending = this.pending.length === 0 ? data : Buffer.concat([this.pending, data]);

    if (!this.key) {
      if (this.pending.length < this.spec.saltSize) return [];
      this.useSalt(this.pending.subarray(0, this.spec.saltSize));
      this.pending = this.pending.subarray(this.spec.saltSize);
    }

    const out: Buffer[] = [];
    try {
      for (;;) {
        if (this.payloadLength === null) {
          if (this.pending.length < LENGTH_FIELD_SIZE + TAG_SIZE) break;
          const length = this.openNext(this.pending.subarray(0, LENGTH_FIELD_SIZE + TAG_SIZE));
          this.pending = this.pending.subarray(LENGTH_FIELD_SIZE + TAG_SIZE);
          const payloadLength = length.readUInt16BE(0);
          if (payloadLength === 0 || payloadLength > MAX_CHUNK_PAYLOAD) {
            throw new DecryptError(`invalid chunk length ${payloadLength}`);
          }
          this.payloadLength = payloadLength;
        }

        const sealedLength = this.payloadLength + TAG_SIZE;
        if (this.pending.length < sealedLength) break;
        out.push(this.openNext(this.pending.subarray(0, sealedLength)));
        this.pending = this.pending.subarray(sealedLength);
        this.payloadLength = null;
      }
    } catch (err) {
      this.failed = true;
      this.pending = Buffer.alloc(0);
      throw err;
    }

    return out;
  }

  private useSalt(salt: Buffer) {
    if (salt.length !== this.spec.saltSize) {
      throw new DecryptError(`salt must be ${this.spec.saltSize} bytes`);
    }
    this.saltValue = Buffer.from(salt);
    this.key = deriveSubkey(this.masterKey, this.saltValue, this.spec.keySize);
  }

  private openNext(sealed: Buffer) {
    if (!this.key) throw new DecryptError("missing salt");
    const out = open(this.spec, this.key, this.nonce.current(), sealed);
    this.nonce.increment();
    return out;
  }
}
