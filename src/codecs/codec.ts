import type net from "net";
import type { Duplex } from "stream";

import type { TargetAddress } from "../address";
import type { AccessPolicy, ProtocolTag } from "../config";
import type { UpstreamConnectError } from "../errors";
import type { ReplayCache } from "../replay-cache";
import type { SocketReader } from "../socket-reader";

export type HandshakeContext = {
  socket: net.Socket;
  /** reader over `socket`; codecs detach it when the handshake completes */
  reader: SocketReader;
  policy: AccessPolicy;
  replayCache: ReplayCache;
  debug: (message: string) => void;
};

export type HandshakeResult = {
  target: TargetAddress;
  /** client side of the relay (the socket itself or a decrypting wrapper) */
  stream: Duplex;
  /** bytes to send upstream before relaying `stream` */
  head: Buffer;
  /** send the protocol's success reply */
  accept(upstream: net.Socket): Promise<void>;
  /** send the protocol's failure reply, if it has one */
  reject(err: UpstreamConnectError): Promise<void>;
};

/**
 * Server side of one proxy protocol.
 *
 * `handshake()` must throw a RelayError subclass on failure, after writing
 * whatever reply the protocol defines for it.
 */
export interface ProtocolCodec {
  readonly protocol: ProtocolTag;
  handshake(ctx: HandshakeContext): Promise<HandshakeResult>;
}
