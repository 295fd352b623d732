/**
 * tcp-relay
 *
 * Multi-protocol TCP proxy relay: encrypted-stream (Shadowsocks AEAD),
 * SOCKS5 and HTTP/CONNECT front ends with access policy and accounting.
 */

// Server
export { RelayServer, type RelayServerOptions } from "./server";
export { Listener, type ListenerState, type ListenerStatus, type ListenerAddress } from "./listener";
export { Session, type SessionState, type SessionInfo, type TrafficDirection } from "./session";
export { RelayPump, type RelayPumpOptions, type RelayOutcome } from "./relay";
export { connectUpstream, type ConnectUpstreamOptions } from "./upstream";

// Configuration
export {
  type ProtocolTag,
  type ListenerConfig,
  type ShadowsocksListenerConfig,
  type Socks5ListenerConfig,
  type HttpListenerConfig,
  type UserPassCredentials,
  type AccessPolicy,
  type BandwidthScope,
  type ManagementConfig,
  type RelayConfig,
  type ConfigValidationResult,
  DEFAULT_ACCESS_POLICY,
  resolveAccessPolicy,
  validateRelayConfig,
  parseRelayConfig,
  loadRelayConfig,
  serializeRelayConfig,
} from "./config";

// Policy and accounting
export {
  AccessControl,
  parseAllowList,
  isAddressAllowed,
  normalizeAddress,
  type BandwidthLease,
  type ConnectionSlot,
} from "./access-control";
export { TokenBucket } from "./token-bucket";
export { ReplayCache, type ReplayCacheOptions } from "./replay-cache";
export {
  TrafficAccountant,
  formatBytes,
  formatDuration,
  type TrafficSnapshot,
  type ProtocolTraffic,
  type HourlyTraffic,
  type RejectionRule,
} from "./traffic";

// Codecs
export { createCodec, type ProtocolCodec, type HandshakeContext, type HandshakeResult } from "./codecs";
export {
  AEAD_METHODS,
  AeadEncryptor,
  AeadDecryptor,
  evpBytesToKey,
  deriveMasterKey,
  deriveSubkey,
  type AeadMethod,
} from "./codecs/aead";
export { ShadowsocksCodec, AeadSocketStream } from "./codecs/shadowsocks";
export { Socks5Codec } from "./codecs/socks5";
export { HttpConnectCodec } from "./codecs/http-connect";
export { decodeAddress, encodeAddress, formatTarget, type TargetAddress } from "./address";

// Management channel
export {
  ManagementServer,
  type ManagementServerOptions,
  type ManagementServerAddress,
} from "./management-server";
export type { ClientMessage, ServerMessage } from "./management-protocol";

// Errors
export {
  RelayError,
  PolicyError,
  HandshakeError,
  AuthError,
  DecryptError,
  UpstreamConnectError,
  RelayIOError,
  ListenerBindError,
  ConfigError,
  getErrorMessage,
  type CloseReason,
  type RelayErrorKind,
} from "./errors";

// Debug helpers
export { type DebugFlag, type DebugConfig, type DebugComponent, type DebugLogFn } from "./debug";
