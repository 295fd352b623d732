/**
 * SOCKS5 server handshake (RFC 1928, CONNECT only) with optional RFC 1929
 * username/password authentication.
 */
import net from "net";

import {
  ATYP_DOMAIN,
  ATYP_IPV4,
  ATYP_IPV6,
  decodeAddress,
  encodeAddress,
  isSupportedAddressType,
  type TargetAddress,
} from "../address";
import type { UserPassCredentials } from "../config";
import { AuthError, HandshakeError, UpstreamConnectError, getErrorMessage } from "../errors";
import { writeAll } from "../socket-reader";
import type { HandshakeContext, HandshakeResult, ProtocolCodec } from "./codec";
import { credentialsMatch } from "./credentials";

export const SOCKS_VERSION = 0x05;
export const AUTH_VERSION = 0x01;

export const METHOD_NO_AUTH = 0x00;
export const METHOD_USERPASS = 0x02;
export const METHOD_NO_ACCEPTABLE = 0xff;

export const CMD_CONNECT = 0x01;

export const REPLY_SUCCEEDED = 0x00;
export const REPLY_GENERAL_FAILURE = 0x01;
export const REPLY_NETWORK_UNREACHABLE = 0x03;
export const REPLY_HOST_UNREACHABLE = 0x04;
export const REPLY_CONNECTION_REFUSED = 0x05;
export const REPLY_COMMAND_NOT_SUPPORTED = 0x07;
export const REPLY_ADDRESS_TYPE_NOT_SUPPORTED = 0x08;

const UNSPECIFIED_BIND: TargetAddress = { type: "ipv4", host: "0.0.0.0", port: 0 };

/**
 * Map an upstream connect failure to its reply code.
 */
export function replyCodeForUpstreamError(err: UpstreamConnectError): number {
  switch (err.code) {
    case "ECONNREFUSED":
      return REPLY_CONNECTION_REFUSED;
    case "ENETUNREACH":
      return REPLY_NETWORK_UNREACHABLE;
    case "EHOSTUNREACH":
    case "ENOTFOUND":
    case "EAI_AGAIN":
    case "ETIMEDOUT":
      return REPLY_HOST_UNREACHABLE;
    default:
      return REPLY_GENERAL_FAILURE;
  }
}

export function encodeReply(code: number, bound: TargetAddress = UNSPECIFIED_BIND): Buffer {
  return Buffer.concat([Buffer.from([SOCKS_VERSION, code, 0x00]), encodeAddress(bound)]);
}

function boundAddressOf(upstream: net.Socket): TargetAddress {
  const host = upstream.localAddress;
  const port = upstream.localPort;
  if (!host || port === undefined) return UNSPECIFIED_BIND;
  const family = net.isIP(host);
  if (family === 4) return { type: "ipv4", host, port };
  if (family === 6) return { type: "ipv6", host, port };
  return UNSPECIFIED_BIND;
}

export class Socks5Codec implements ProtocolCodec {
  readonly protocol = "socks5";

  constructor(private readonly auth: UserPassCredentials | null) {}

  async handshake(ctx: HandshakeContext): Promise<HandshakeResult> {
    const { reader, socket } = ctx;

    const [version, methodCount] = await reader.read(2);
    if (version !== SOCKS_VERSION) {
      throw new HandshakeError(`unsupported socks version ${version}`);
    }
    const methods = await reader.read(methodCount);
    const method = this.auth ? METHOD_USERPASS : METHOD_NO_AUTH;
    if (!methods.includes(method)) {
      await writeAll(socket, Buffer.from([SOCKS_VERSION, METHOD_NO_ACCEPTABLE]));
      throw new AuthError("no acceptable authentication method");
    }
    await writeAll(socket, Buffer.from([SOCKS_VERSION, method]));

    if (this.auth) {
      await this.authenticate(ctx, this.auth);
    }

    const [requestVersion, command, , atyp] = await reader.read(4);
    if (requestVersion !== SOCKS_VERSION) {
      await this.sendReply(ctx, REPLY_GENERAL_FAILURE);
      throw new HandshakeError(`unsupported socks version ${requestVersion} in request`);
    }
    if (command !== CMD_CONNECT) {
      await this.sendReply(ctx, REPLY_COMMAND_NOT_SUPPORTED);
      throw new HandshakeError(`unsupported socks command ${command}`);
    }
    if (!isSupportedAddressType(atyp)) {
      await this.sendReply(ctx, REPLY_ADDRESS_TYPE_NOT_SUPPORTED);
      throw new HandshakeError(`unsupported address type ${atyp}`);
    }

    const target = await this.readAddress(ctx, atyp);
    ctx.debug(`socks5 connect ${target.host}:${target.port}`);

    return {
      target,
      stream: socket,
      head: reader.detach(),
      accept: (upstream) => writeAll(socket, encodeReply(REPLY_SUCCEEDED, boundAddressOf(upstream))),
      reject: (err) => this.sendReply(ctx, replyCodeForUpstreamError(err)),
    };
  }

  private async authenticate(ctx: HandshakeContext, expected: UserPassCredentials) {
    const { reader, socket } = ctx;
    const [version, usernameLength] = await reader.read(2);
    if (version !== AUTH_VERSION) {
      await writeAll(socket, Buffer.from([AUTH_VERSION, 0x01]));
      throw new AuthError(`unsupported auth version ${version}`);
    }
    const username = await reader.read(usernameLength);
    const [passwordLength] = await reader.read(1);
    const password = await reader.read(passwordLength);

    if (!credentialsMatch(expected, username, password)) {
      await writeAll(socket, Buffer.from([AUTH_VERSION, 0x01]));
      throw new AuthError("invalid username or password");
    }
    await writeAll(socket, Buffer.from([AUTH_VERSION, 0x00]));
  }

  private async readAddress(ctx: HandshakeContext, atyp: number): Promise<TargetAddress> {
    const { reader } = ctx;
    let body: Buffer;
    if (atyp === ATYP_IPV4) {
      body = await reader.read(4 + 2);
    } else if (atyp === ATYP_IPV6) {
      body = await reader.read(16 + 2);
    } else if (atyp === ATYP_DOMAIN) {
      const length = await reader.read(1);
      body = Buffer.concat([length, await reader.read(length[0] + 2)]);
    } else {
      throw new HandshakeError(`unsupported address type ${atyp}`);
    }

    let decoded: ReturnType<typeof decodeAddress>;
    try {
      decoded = decodeAddress(Buffer.concat([Buffer.from([atyp]), body]));
    } catch (err) {
      await this.sendReply(ctx, REPLY_GENERAL_FAILURE);
      throw err;
    }
    if (!decoded) {
      throw new HandshakeError("truncated address");
    }
    return decoded.address;
  }

  private async sendReply(ctx: HandshakeContext, code: number) {
    try {
      await writeAll(ctx.socket, encodeReply(code));
    } catch (err) {
      ctx.debug(`socks5 reply ${code} not delivered: ${getErrorMessage(err)}`);
    }
  }
}
