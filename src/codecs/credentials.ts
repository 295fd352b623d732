import crypto from "crypto";

import type { UserPassCredentials } from "../config";

function digest(value: Buffer | string) {
  return crypto.createHash("sha256").update(value).digest();
}

/**
 * Constant-time comparison; digests first so lengths never leak.
 */
export function safeEqual(a: Buffer | string, b: Buffer | string): boolean {
  return crypto.timingSafeEqual(digest(a), digest(b));
}

export function credentialsMatch(
  expected: UserPassCredentials,
  username: Buffer | string,
  password: Buffer | string
): boolean {
  const userOk = safeEqual(username, expected.username);
  const passOk = safeEqual(password, expected.password);
  return userOk && passOk;
}

/**
 * Decode `Basic <base64(user:pass)>`; null when malformed.
 */
export function parseBasicCredentials(header: string): UserPassCredentials | null {
  const match = /^Basic\s+([A-Za-z0-9+/=]+)\s*$/i.exec(header.trim());
  if (!match) return null;
  const decoded = Buffer.from(match[1], "base64").toString("utf8");
  const colon = decoded.indexOf(":");
  if (colon === -1) return null;
  return { username: decoded.slice(0, colon), password: decoded.slice(colon + 1) };
}
