import type { Duplex, Writable } from "stream";

import { HandshakeError } from "./errors";

/** default cap on bytes buffered while handshaking in `bytes` */
const DEFAULT_MAX_BUFFERED_BYTES = 64 * 1024 + 512;

export type SocketReaderOptions = {
  /** fail once more than this many unread bytes are buffered in `bytes` */
  maxBufferedBytes?: number;
  /** rejects pending reads with the signal's reason */
  signal?: AbortSignal;
};

/**
 * Pull-style reader used during protocol handshakes.
 *
 * Consumes the socket in paused mode through `readable`. Once the handshake
 * is done `detach()` hands back whatever was read ahead so the relay can
 * forward it.
 */
export class SocketReader {
  private readonly chunks: Buffer[] = [];
  private totalBytes = 0;
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;
  private attached = true;
  private readonly maxBufferedBytes: number;
  private readonly signal: AbortSignal | undefined;

  constructor(
    private readonly socket: Duplex,
    options: SocketReaderOptions = {}
  ) {
    this.maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.signal = options.signal;

    socket.on("readable", this.onReadable);
    socket.on("end", this.onEnd);
    socket.on("close", this.onEnd);
    socket.on("error", this.onError);
    this.signal?.addEventListener("abort", this.onAbort);
    if (this.signal?.aborted) this.onAbort();
  }

  get length() {
    return this.totalBytes;
  }

  /** Read exactly `n` bytes. */
  async read(n: number): Promise<Buffer> {
    await this.waitFor(() => this.totalBytes >= n);
    return this.take(n);
  }

  /** Read whatever is buffered, waiting for at least one byte. */
  async readSome(): Promise<Buffer> {
    await this.waitFor(() => this.totalBytes > 0);
    return this.take(this.totalBytes);
  }

  /**
   * Read up to and including `delimiter`.
   *
   * Fails with HandshakeError when `maxBytes` are buffered without a match.
   */
  async readUntil(delimiter: Buffer, maxBytes: number): Promise<Buffer> {
    let end = -1;
    await this.waitFor(() => {
      end = this.indexOf(delimiter);
      if (end === -1 && this.totalBytes >= maxBytes) {
        throw new HandshakeError(`no delimiter within ${maxBytes} bytes`);
      }
      return end !== -1;
    });
    const length = end + delimiter.length;
    if (length > maxBytes) {
      throw new HandshakeError(`no delimiter within ${maxBytes} bytes`);
    }
    return this.take(length);
  }

  /**
   * Stop reading and return the unread bytes. Idempotent.
   */
  detach(): Buffer {
    if (this.attached) {
      this.attached = false;
      this.socket.off("readable", this.onReadable);
      this.socket.off("end", this.onEnd);
      this.socket.off("close", this.onEnd);
      this.socket.off("error", this.onError);
      this.signal?.removeEventListener("abort", this.onAbort);
    }
    return this.take(this.totalBytes);
  }

  private readonly onReadable = () => {
    let chunk: unknown;
    while ((chunk = this.socket.read()) !== null) {
      if (Buffer.isBuffer(chunk) && chunk.length > 0) {
        this.chunks.push(chunk);
        this.totalBytes += chunk.length;
      }
    }
    if (this.totalBytes > this.maxBufferedBytes && !this.failure) {
      this.failure = new HandshakeError(`handshake exceeded ${this.maxBufferedBytes} bytes`);
    }
    this.notify();
  };

  private readonly onEnd = () => {
    this.ended = true;
    this.notify();
  };

  private readonly onError = (err: Error) => {
    if (!this.failure) this.failure = err;
    this.notify();
  };

  private readonly onAbort = () => {
    if (!this.failure) {
      const reason: unknown = this.signal?.reason;
      this.failure = reason instanceof Error ? reason : new HandshakeError("handshake aborted");
    }
    this.notify();
  };

  private notify() {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private async waitFor(ready: () => boolean): Promise<void> {
    for (;;) {
      if (this.failure) throw this.failure;
      if (ready()) return;
      if (this.ended) throw new HandshakeError("connection closed during handshake");
      if (!this.attached) throw new HandshakeError("reader detached");
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private indexOf(delimiter: Buffer): number {
    if (this.chunks.length > 1) {
      const merged = Buffer.concat(this.chunks, this.totalBytes);
      this.chunks.length = 0;
      this.chunks.push(merged);
    }
    return this.chunks.length === 0 ? -1 : this.chunks[0].indexOf(delimiter);
  }

  private take(n: number): Buffer {
    if (n <= 0) return Buffer.alloc(0);
    const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.totalBytes);
    const out = all.subarray(0, n);
    const rest = all.subarray(n);
    this.chunks.length = 0;
    if (rest.length > 0) this.chunks.push(rest);
    this.totalBytes = rest.length;
    return out;
  }
}

/**
 * Write `data` and resolve once it has been handed to the kernel.
 */
export function writeAll(stream: Writable, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(data, (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
