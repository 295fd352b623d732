import assert from "node:assert/strict";
import test from "node:test";

import { TokenBucket } from "../src/token-bucket";

function createClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

test("token bucket: capacity defaults to 100ms of the rate", () => {
  assert.equal(new TokenBucket(10_000).capacity, 1000);
  assert.equal(new TokenBucket(5).capacity, 1);
  assert.equal(new TokenBucket(10_000, 64).capacity, 64);
});

test("token bucket: rejects a non-positive rate", () => {
  assert.throws(() => new TokenBucket(0), /must be positive/);
  assert.throws(() => new TokenBucket(-1), /must be positive/);
});

test("token bucket: tryTake drains and refills with time", () => {
  const clock = createClock();
  const bucket = new TokenBucket(1000, 100, clock.now);

  assert.equal(bucket.tryTake(60), true);
  assert.equal(bucket.tryTake(60), false);
  assert.equal(bucket.available(), 40);

  clock.advance(20);
  assert.equal(bucket.available(), 60);
  assert.equal(bucket.tryTake(60), true);

  clock.advance(10_000);
  assert.equal(bucket.available(), 100);
});

test("token bucket: take waits for refill", async () => {
  const bucket = new TokenBucket(10_000);
  const started = Date.now();
  // 1000 tokens up front, the remaining 4000 arrive at 10 bytes/ms
  await bucket.take(5000);
  const elapsed = Date.now() - started;
  assert.ok(elapsed >= 350, `took ${elapsed}ms`);
});

test("token bucket: take returns immediately within capacity", async () => {
  const bucket = new TokenBucket(1000, 500);
  const started = Date.now();
  await bucket.take(500);
  assert.ok(Date.now() - started < 50);
});

test("token bucket: take rejects when aborted", async () => {
  const bucket = new TokenBucket(100, 10);
  const controller = new AbortController();
  const pending = bucket.take(1000, controller.signal);
  setTimeout(() => controller.abort(), 20);
  await assert.rejects(pending, { name: "AbortError" });
});
