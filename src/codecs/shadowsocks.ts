/**
 * Shadowsocks AEAD server handshake.
 *
 * The first decrypted bytes of the client stream carry the destination as an
 * address header; anything decrypted after it is initial upstream payload.
 * Failures never produce a reply: the connection is simply dropped.
 */
import type net from "net";
import { Duplex } from "stream";

import { decodeAddress } from "../address";
import { DecryptError, HandshakeError } from "../errors";
import type { HandshakeContext, HandshakeResult, ProtocolCodec } from "./codec";
import { AeadDecryptor, AeadEncryptor, deriveMasterKey, getCipherSpec, type AeadMethod } from "./aead";

/** address header upper bound: atyp + 1 + 255 + port */
const MAX_ADDRESS_HEADER = 1 + 1 + 255 + 2;

/**
 * Duplex over a client socket that decrypts reads and encrypts writes.
 */
export class AeadSocketStream extends Duplex {
  constructor(
    private readonly socket: net.Socket,
    private readonly decryptor: AeadDecryptor,
    private readonly encryptor: AeadEncryptor
  ) {
    super({ allowHalfOpen: false });

    socket.on("data", this.onData);
    socket.on("end", this.onEnd);
    socket.on("error", this.onError);
    socket.on("close", this.onClose);
  }

  /** Push plaintext decrypted during the handshake. */
  pushPlaintext(data: Buffer) {
    if (data.length > 0) this.push(data);
  }

  _read() {
    this.socket.resume();
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.socket.write(this.encryptor.encrypt(chunk), (err) => callback(err ?? null));
  }

  _final(callback: (error?: Error | null) => void) {
    this.socket.end(() => callback());
  }

  _destroy(err: Error | null, callback: (error?: Error | null) => void) {
    this.socket.off("data", this.onData);
    this.socket.off("end", this.onEnd);
    this.socket.off("error", this.onError);
    this.socket.off("close", this.onClose);
    this.socket.destroy();
    callback(err);
  }

  private readonly onData = (data: Buffer) => {
    let plaintexts: Buffer[];
    try {
      plaintexts = this.decryptor.push(data);
    } catch (err) {
      this.destroy(err instanceof Error ? err : new DecryptError());
      return;
    }
    for (const plaintext of plaintexts) {
      if (!this.push(plaintext)) this.socket.pause();
    }
  };

  private readonly onEnd = () => {
    this.push(null);
  };

  private readonly onError = (err: Error) => {
    this.destroy(err);
  };

  private readonly onClose = () => {
    if (!this.destroyed) this.destroy();
  };
}

export class ShadowsocksCodec implements ProtocolCodec {
  readonly protocol = "shadowsocks";
  private readonly masterKey: Buffer;
  private readonly saltSize: number;

  constructor(private readonly method: AeadMethod, password: string) {
    this.masterKey = deriveMasterKey(method, password);
    this.saltSize = getCipherSpec(method).saltSize;
  }

  async handshake(ctx: HandshakeContext): Promise<HandshakeResult> {
    const { reader, socket, policy, replayCache } = ctx;

    const salt = await reader.read(this.saltSize);
    if (policy.replayProtection && !replayCache.checkAndInsert(salt)) {
      throw new DecryptError("replayed salt");
    }

    const decryptor = new AeadDecryptor(this.method, this.masterKey, salt);
    let plaintext = Buffer.alloc(0);
    let decoded = decodeAddress(plaintext);
    while (!decoded) {
      if (plaintext.length >= MAX_ADDRESS_HEADER) {
        throw new HandshakeError("address header too long");
      }
      const chunks = decryptor.push(await reader.readSome());
      plaintext = Buffer.concat([plaintext, ...chunks]);
      decoded = decodeAddress(plaintext);
    }

    const encryptor = new AeadEncryptor(this.method, this.masterKey);
    if (policy.replayProtection) {
      replayCache.add(encryptor.salt);
    }

    const readAhead = reader.detach();
    const stream = new AeadSocketStream(socket, decryptor, encryptor);
    stream.pushPlaintext(Buffer.concat(readAhead.length > 0 ? decryptor.push(readAhead) : []));

    ctx.debug(`shadowsocks connect ${decoded.address.host}:${decoded.address.port}`);

    return {
      target: decoded.address,
      stream,
      head: plaintext.subarray(decoded.length),
      accept: async () => {},
      reject: async () => {},
    };
  }
}
