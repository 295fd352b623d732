import type { ListenerConfig } from "../config";
import type { ProtocolCodec } from "./codec";
import { HttpConnectCodec } from "./http-connect";
import { ShadowsocksCodec } from "./shadowsocks";
import { Socks5Codec } from "./socks5";

export type { HandshakeContext, HandshakeResult, ProtocolCodec } from "./codec";

export function createCodec(listener: ListenerConfig): ProtocolCodec {
  switch (listener.protocol) {
    case "shadowsocks":
      return new ShadowsocksCodec(listener.method, listener.password);
    case "socks5":
      return new Socks5Codec(listener.auth);
    case "http":
      return new HttpConnectCodec(listener.auth);
  }
}
