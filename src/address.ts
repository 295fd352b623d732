/**
 * SOCKS-style destination address header.
 *
 * Shared by the SOCKS5 request and the encrypted-stream handshake:
 * +------+----------+----------+
 * | ATYP | DST.ADDR | DST.PORT |
 * +------+----------+----------+
 * |  1   | Variable |    2     |
 * +------+----------+----------+
 * ATYP 0x01 = IPv4 (4 bytes), 0x03 = domain (1 length byte + name),
 * 0x04 = IPv6 (16 bytes). Port is big-endian.
 */
import net from "net";
import ipaddr from "ipaddr.js";

import { HandshakeError } from "./errors";

export const ATYP_IPV4 = 0x01;
export const ATYP_DOMAIN = 0x03;
export const ATYP_IPV6 = 0x04;

export type TargetAddressType = "ipv4" | "ipv6" | "domain";

export type TargetAddress = {
  type: TargetAddressType;
  host: string;
  port: number;
};

export type DecodedAddress = {
  address: TargetAddress;
  /** header length in `bytes` */
  length: number;
};

export function isSupportedAddressType(atyp: number) {
  return atyp === ATYP_IPV4 || atyp === ATYP_DOMAIN || atyp === ATYP_IPV6;
}

export function makeTargetAddress(host: string, port: number): TargetAddress {
  const family = net.isIP(host);
  return {
    type: family === 4 ? "ipv4" : family === 6 ? "ipv6" : "domain",
    host,
    port,
  };
}

/**
 * Decode an address header at `offset`.
 *
 * Returns null while the header is incomplete.
 */
export function decodeAddress(buf: Buffer, offset = 0): DecodedAddress | null {
  if (buf.length <= offset) return null;
  const atyp = buf[offset];

  if (atyp === ATYP_IPV4) {
    if (buf.length < offset + 7) return null;
    const host = Array.from(buf.subarray(offset + 1, offset + 5)).join(".");
    return {
      address: { type: "ipv4", host, port: buf.readUInt16BE(offset + 5) },
      length: 7,
    };
  }

  if (atyp === ATYP_IPV6) {
    if (buf.length < offset + 19) return null;
    const host = ipaddr.fromByteArray(Array.from(buf.subarray(offset + 1, offset + 17))).toString();
    return {
      address: { type: "ipv6", host, port: buf.readUInt16BE(offset + 17) },
      length: 19,
    };
  }

  if (atyp === ATYP_DOMAIN) {
    if (buf.length < offset + 2) return null;
    const nameLength = buf[offset + 1];
    if (nameLength === 0) {
      throw new HandshakeError("empty domain name in address header");
    }
    const total = 2 + nameLength + 2;
    if (buf.length < offset + total) return null;
    const host = buf.subarray(offset + 2, offset + 2 + nameLength).toString("utf8");
    return {
      address: { type: "domain", host, port: buf.readUInt16BE(offset + 2 + nameLength) },
      length: total,
    };
  }

  throw new HandshakeError(`unsupported address type ${atyp}`);
}

export function encodeAddress(address: TargetAddress): Buffer {
  const port = Buffer.alloc(2);
  port.writeUInt16BE(address.port, 0);

  if (address.type === "ipv4" || address.type === "ipv6") {
    const bytes = ipaddr.parse(address.host).toByteArray();
    const atyp = bytes.length === 4 ? ATYP_IPV4 : ATYP_IPV6;
    return Buffer.concat([Buffer.from([atyp]), Buffer.from(bytes), port]);
  }

  const name = Buffer.from(address.host, "utf8");
  if (name.length === 0 || name.length > 255) {
    throw new HandshakeError(`domain name length out of range: ${name.length}`);
  }
  return Buffer.concat([Buffer.from([ATYP_DOMAIN, name.length]), name, port]);
}

export function formatTarget(address: Pick<TargetAddress, "host" | "port">) {
  return address.host.includes(":") ? `[${address.host}]:${address.port}` : `${address.host}:${address.port}`;
}
