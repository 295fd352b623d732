import assert from "node:assert/strict";
import test from "node:test";

import {
  debugFlagsToArray,
  formatClientAddress,
  formatDebugLine,
  parseDebugEnv,
  resolveDebugFlags,
} from "../src/debug";

test("debug: parses comma lists and aliases", () => {
  assert.deepEqual(debugFlagsToArray(parseDebugEnv("net, codec,bogus")), ["codec", "net"]);
  assert.deepEqual(debugFlagsToArray(parseDebugEnv("management")), ["mgmt"]);
  assert.deepEqual(debugFlagsToArray(parseDebugEnv("")), []);
});

test("debug: wildcard values enable everything", () => {
  for (const value of ["*", "all", "1", "true"]) {
    assert.deepEqual(debugFlagsToArray(parseDebugEnv(value)), ["codec", "mgmt", "net", "policy", "relay"], value);
  }
});

test("debug: explicit config overrides the environment", () => {
  const env = parseDebugEnv("net");
  assert.deepEqual(debugFlagsToArray(resolveDebugFlags(undefined, env)), ["net"]);
  assert.deepEqual(debugFlagsToArray(resolveDebugFlags(false, env)), []);
  assert.deepEqual(debugFlagsToArray(resolveDebugFlags(["policy"], env)), ["policy"]);
  assert.equal(resolveDebugFlags(true, env).size, 5);
});

test("debug: line formatting trims one trailing newline", () => {
  assert.equal(formatDebugLine("relay", "closed\n"), "[relay] closed");
  assert.equal(formatDebugLine("error", "boom\r\n"), "[error] boom");
});

test("debug: client addresses can be redacted", () => {
  assert.equal(formatClientAddress("192.0.2.1", 4000, true), "192.0.2.1:4000");
  assert.equal(formatClientAddress("2001:db8::1", 4000, true), "[2001:db8::1]:4000");
  assert.equal(formatClientAddress("192.0.2.1", 4000, false), "[redacted]");
});
