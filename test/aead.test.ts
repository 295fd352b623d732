import assert from "node:assert/strict";
import crypto from "node:crypto";
import test from "node:test";

import {
  AEAD_METHODS,
  AeadDecryptor,
  AeadEncryptor,
  MAX_CHUNK_PAYLOAD,
  TAG_SIZE,
  deriveMasterKey,
  deriveSubkey,
  evpBytesToKey,
  getCipherSpec,
} from "../src/codecs/aead";
import { DecryptError } from "../src/errors";

const PASSWORD = "test-secret";

test("aead: evpBytesToKey chains md5 blocks", () => {
  assert.equal(
    evpBytesToKey(PASSWORD, 32).toString("hex"),
    "2318ed020bcddb328eab6db7800b2f80390fae0db965016354aea1a8567733c4"
  );
  assert.equal(evpBytesToKey(PASSWORD, 16).toString("hex"), "2318ed020bcddb328eab6db7800b2f80");
});

test("aead: master key size follows the method", () => {
  assert.equal(deriveMasterKey("aes-128-gcm", PASSWORD).length, 16);
  assert.equal(deriveMasterKey("aes-192-gcm", PASSWORD).length, 24);
  assert.equal(deriveMasterKey("aes-256-gcm", PASSWORD).length, 32);
  assert.equal(deriveMasterKey("chacha20-ietf-poly1305", PASSWORD).length, 32);
});

test("aead: subkey is hkdf-sha1 over the salt", () => {
  const master = evpBytesToKey(PASSWORD, 32);
  const salt = Buffer.from(Array.from({ length: 32 }, (_, i) => i));
  assert.equal(
    deriveSubkey(master, salt, 32).toString("hex"),
    "3ec7f96315feef509dedb8f0cd4a327c2ed5966e32e5b0c4d537975b615e1c01"
  );
});

test("aead: every method round-trips a short message", () => {
  for (const method of AEAD_METHODS) {
    const master = deriveMasterKey(method, PASSWORD);
    const encryptor = new AeadEncryptor(method, master);
    const decryptor = new AeadDecryptor(method, master);

    const wire = encryptor.encrypt(Buffer.from("hello"));
    const { saltSize } = getCipherSpec(method);
    assert.equal(wire.length, saltSize + 2 + TAG_SIZE + 5 + TAG_SIZE, method);
    assert.deepEqual(wire.subarray(0, saltSize), encryptor.salt);

    const out = decryptor.push(wire);
    assert.deepEqual(out.map((chunk) => chunk.toString()), ["hello"], method);
    assert.deepEqual(decryptor.salt, encryptor.salt);
  }
});

test("aead: salt is only sent with the first output", () => {
  const master = deriveMasterKey("aes-128-gcm", PASSWORD);
  const encryptor = new AeadEncryptor("aes-128-gcm", master);
  const first = encryptor.encrypt(Buffer.from("a"));
  const second = encryptor.encrypt(Buffer.from("b"));
  assert.equal(first.length, 16 + 18 + 17);
  assert.equal(second.length, 18 + 17);

  const decryptor = new AeadDecryptor("aes-128-gcm", master);
  assert.deepEqual(decryptor.push(first).map(String), ["a"]);
  assert.deepEqual(decryptor.push(second).map(String), ["b"]);
});

test("aead: large writes split into maximum-size chunks", () => {
  const master = deriveMasterKey("aes-256-gcm", PASSWORD);
  const encryptor = new AeadEncryptor("aes-256-gcm", master);
  const decryptor = new AeadDecryptor("aes-256-gcm", master);
  const plaintext = crypto.randomBytes(MAX_CHUNK_PAYLOAD * 2 + 10);

  const out = decryptor.push(encryptor.encrypt(plaintext));
  assert.deepEqual(
    out.map((chunk) => chunk.length),
    [MAX_CHUNK_PAYLOAD, MAX_CHUNK_PAYLOAD, 10]
  );
  assert.deepEqual(Buffer.concat(out), plaintext);
});

test("aead: decryptor reassembles byte-at-a-time input", () => {
  const master = deriveMasterKey("chacha20-ietf-poly1305", PASSWORD);
  const encryptor = new AeadEncryptor("chacha20-ietf-poly1305", master);
  const decryptor = new AeadDecryptor("chacha20-ietf-poly1305", master);
  const wire = Buffer.concat([encryptor.encrypt(Buffer.from("split ")), encryptor.encrypt(Buffer.from("input"))]);

  const out: Buffer[] = [];
  for (const byte of wire) {
    out.push(...decryptor.push(Buffer.from([byte])));
  }
  assert.equal(Buffer.concat(out).toString(), "split input");
});

test("aead: wrong password fails authentication", () => {
  const encryptor = new AeadEncryptor("aes-256-gcm", deriveMasterKey("aes-256-gcm", PASSWORD));
  const decryptor = new AeadDecryptor("aes-256-gcm", deriveMasterKey("aes-256-gcm", "other-secret"));
  assert.throws(() => decryptor.push(encryptor.encrypt(Buffer.from("hello"))), DecryptError);
});

test("aead: tampered payload poisons the decryptor", () => {
  const master = deriveMasterKey("aes-128-gcm", PASSWORD);
  const encryptor = new AeadEncryptor("aes-128-gcm", master);
  const decryptor = new AeadDecryptor("aes-128-gcm", master);
  const wire = encryptor.encrypt(Buffer.from("hello"));
  wire[wire.length - 1] ^= 0x01;

  assert.throws(() => decryptor.push(wire), DecryptError);
  assert.throws(
    () => decryptor.push(encryptor.encrypt(Buffer.from("again"))),
    (err: unknown) => err instanceof DecryptError && err.message === "stream already failed authentication"
  );
});

test("aead: zero-length chunks are rejected", () => {
  const master = deriveMasterKey("aes-128-gcm", PASSWORD);
  const salt = crypto.randomBytes(16);
  const key = deriveSubkey(master, salt, 16);
  const cipher = crypto.createCipheriv("aes-128-gcm", key, Buffer.alloc(12));
  const sealedLength = Buffer.concat([cipher.update(Buffer.from([0, 0])), cipher.final(), cipher.getAuthTag()]);

  const decryptor = new AeadDecryptor("aes-128-gcm", master);
  assert.throws(
    () => decryptor.push(Buffer.concat([salt, sealedLength])),
    (err: unknown) => err instanceof DecryptError && err.message === "invalid chunk length 0"
  );
});

test("aead: encryptor rejects a salt of the wrong size", () => {
  const master = deriveMasterKey("aes-256-gcm", PASSWORD);
  assert.throws(() => new AeadEncryptor("aes-256-gcm", master, Buffer.alloc(16)), /salt must be 32 bytes/);
});
