/**
 * HTTP proxy handshake: `CONNECT host:port` tunnels and plain forward
 * requests in absolute form (`GET http://host/path HTTP/1.1`).
 */
import net from "net";

import { makeTargetAddress, type TargetAddress } from "../address";
import type { UserPassCredentials } from "../config";
import { AuthError, HandshakeError, getErrorMessage } from "../errors";
import { writeAll } from "../socket-reader";
import type { HandshakeContext, HandshakeResult, ProtocolCodec } from "./codec";
import { credentialsMatch, parseBasicCredentials } from "./credentials";

export const MAX_HEAD_BYTES = 64 * 1024;

const HEAD_TERMINATOR = Buffer.from("\r\n\r\n");
const TOKEN_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const VERSION_RE = /^HTTP\/1\.[01]$/;

/** headers that only concern the proxy hop */
const PROXY_ONLY_HEADERS = new Set(["proxy-authorization", "proxy-connection"]);

export const CONNECT_ESTABLISHED = "HTTP/1.1 200 Connection Established\r\n\r\n";

export type HeaderLine = {
  name: string;
  value: string;
};

export type RequestHead = {
  method: string;
  target: string;
  version: string;
  headers: HeaderLine[];
};

export function buildResponse(status: number, reason: string, extraHeaders: string[] = []): string {
  const lines = [`HTTP/1.1 ${status} ${reason}`, ...extraHeaders, "Content-Length: 0", "Connection: close"];
  return `${lines.join("\r\n")}\r\n\r\n`;
}

/**
 * Parse a request head including the terminating blank line.
 */
export function parseRequestHead(raw: Buffer): RequestHead {
  const text = raw.toString("latin1");
  if (!text.endsWith("\r\n\r\n")) {
    throw new HandshakeError("request head is not terminated");
  }
  const lines = text.slice(0, -4).split("\r\n");
  const requestLine = lines.shift() ?? "";
  const parts = requestLine.split(" ");
  if (parts.length !== 3) {
    throw new HandshakeError("malformed request line");
  }
  const [method, target, version] = parts;
  if (!TOKEN_RE.test(method) || target.length === 0 || !VERSION_RE.test(version)) {
    throw new HandshakeError("malformed request line");
  }

  const headers: HeaderLine[] = [];
  for (const line of lines) {
    if (line.startsWith(" ") || line.startsWith("\t")) {
      throw new HandshakeError("folded header lines are not supported");
    }
    const colon = line.indexOf(":");
    if (colon <= 0) {
      throw new HandshakeError("malformed header line");
    }
    const name = line.slice(0, colon);
    if (!TOKEN_RE.test(name)) {
      throw new HandshakeError(`invalid header name: ${name}`);
    }
    headers.push({ name, value: line.slice(colon + 1).trim() });
  }

  return { method: method.toUpperCase(), target, version, headers };
}

export function getHeader(headers: HeaderLine[], name: string): string | undefined {
  const lower = name.toLowerCase();
  return headers.find((header) => header.name.toLowerCase() === lower)?.value;
}

/**
 * Parse `host`, `host:port`, `[v6]` or `[v6]:port`.
 */
export function parseAuthority(authority: string, defaultPort: number): TargetAddress {
  let host: string;
  let portText: string | undefined;

  if (authority.startsWith("[")) {
    const close = authority.indexOf("]");
    if (close === -1) throw new HandshakeError(`invalid authority: ${authority}`);
    host = authority.slice(1, close);
    const rest = authority.slice(close + 1);
    if (rest.length > 0) {
      if (!rest.startsWith(":")) throw new HandshakeError(`invalid authority: ${authority}`);
      portText = rest.slice(1);
    }
    if (!net.isIPv6(host)) throw new HandshakeError(`invalid IPv6 address: ${host}`);
  } else {
    const colon = authority.lastIndexOf(":");
    if (colon !== -1 && authority.indexOf(":") !== colon) {
      throw new HandshakeError(`IPv6 authority must be bracketed: ${authority}`);
    }
    host = colon === -1 ? authority : authority.slice(0, colon);
    portText = colon === -1 ? undefined : authority.slice(colon + 1);
  }

  if (host.length === 0) throw new HandshakeError(`missing host in ${authority}`);

  let port = defaultPort;
  if (portText !== undefined) {
    if (!/^\d{1,5}$/.test(portText)) throw new HandshakeError(`invalid port in ${authority}`);
    port = Number(portText);
    if (port < 1 || port > 65535) throw new HandshakeError(`invalid port in ${authority}`);
  }

  return makeTargetAddress(host, port);
}

/**
 * Resolve the upstream and origin-form path of a forward request.
 */
export function resolveForwardTarget(head: RequestHead): { target: TargetAddress; path: string } {
  if (head.target.startsWith("/")) {
    const host = getHeader(head.headers, "host");
    if (!host) throw new HandshakeError("origin-form request without Host header");
    return { target: parseAuthority(host, 80), path: head.target };
  }

  let url: URL;
  try {
    url = new URL(head.target);
  } catch {
    throw new HandshakeError(`invalid request target: ${head.target}`);
  }
  if (url.protocol !== "http:") {
    throw new HandshakeError(`unsupported scheme: ${url.protocol.replace(/:$/, "")}`);
  }
  const authority = url.port ? `${url.hostname}:${url.port}` : url.hostname;
  return {
    target: parseAuthority(authority, 80),
    path: `${url.pathname || "/"}${url.search}`,
  };
}

export function serializeForwardHead(head: RequestHead, path: string): Buffer {
  const lines = [`${head.method} ${path} ${head.version}`];
  for (const header of head.headers) {
    if (PROXY_ONLY_HEADERS.has(header.name.toLowerCase())) continue;
    lines.push(`${header.name}: ${header.value}`);
  }
  return Buffer.from(`${lines.join("\r\n")}\r\n\r\n`, "latin1");
}

export class HttpConnectCodec implements ProtocolCodec {
  readonly protocol = "http";

  constructor(private readonly auth: UserPassCredentials | null) {}

  async handshake(ctx: HandshakeContext): Promise<HandshakeResult> {
    const { reader, socket } = ctx;

    let raw: Buffer;
    try {
      raw = await reader.readUntil(HEAD_TERMINATOR, MAX_HEAD_BYTES);
    } catch (err) {
      if (reader.length >= MAX_HEAD_BYTES) {
        await this.respond(ctx, buildResponse(400, "Bad Request"));
      }
      throw err;
    }

    let head: RequestHead;
    let forward: { target: TargetAddress; path: string } | null = null;
    let target: TargetAddress;
    try {
      head = parseRequestHead(raw);
      if (head.method === "CONNECT") {
        target = parseAuthority(head.target, 443);
      } else {
        forward = resolveForwardTarget(head);
        target = forward.target;
      }
    } catch (err) {
      await this.respond(ctx, buildResponse(400, "Bad Request"));
      throw err;
    }

    if (this.auth && !this.authorized(head, this.auth)) {
      await this.respond(
        ctx,
        buildResponse(407, "Proxy Authentication Required", ['Proxy-Authenticate: Basic realm="proxy"'])
      );
      throw new AuthError("proxy authentication required");
    }

    const leftover = reader.detach();
    const reject = async () => {
      await this.respond(ctx, buildResponse(502, "Bad Gateway"));
    };

    if (!forward) {
      ctx.debug(`http connect ${target.host}:${target.port}`);
      return {
        target,
        stream: socket,
        head: leftover,
        accept: () => writeAll(socket, Buffer.from(CONNECT_ESTABLISHED, "latin1")),
        reject,
      };
    }

    ctx.debug(`http ${head.method} ${target.host}:${target.port}${forward.path}`);
    return {
      target,
      stream: socket,
      head: Buffer.concat([serializeForwardHead(head, forward.path), leftover]),
      accept: async () => {},
      reject,
    };
  }

  private authorized(head: RequestHead, expected: UserPassCredentials): boolean {
    const header = getHeader(head.headers, "proxy-authorization");
    if (!header) return false;
    const credentials = parseBasicCredentials(header);
    if (!credentials) return false;
    return credentialsMatch(expected, credentials.username, credentials.password);
  }

  private async respond(ctx: HandshakeContext, response: string) {
    try {
      await writeAll(ctx.socket, Buffer.from(response, "latin1"));
    } catch (err) {
      ctx.debug(`http response not delivered: ${getErrorMessage(err)}`);
    }
  }
}
