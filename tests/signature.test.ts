import { test } from "node:test";
import assert from "node:assert/strict";
import crypto from "crypto";
import { verifySignature } from "../src/whatsapp/signature";

const body = Buffer.from('{"object":"whatsapp_business_account"}');
const sign = (payload: Buffer, secret: string) =>
  "sha256=" + crypto.createHmac("sha256", secret).update(payload).digest("hex");

test("accepts the signature made with the app secret", () => {
  assert.equal(verifySignature(body, sign(body, "test-secret"), "test-secret"), true);
});

test("rejects a wrong, truncated or missing signature", () => {
  assert.equal(verifySignature(body, sign(body, "other-secret"), "test-secret"), false);
  assert.equal(verifySignature(body, sign(body, "test-secret").slice(0, 20), "test-secret"), false);
  assert.equal(verifySignature(body, undefined, "test-secret"), false);
});

test("skips the check when no secret is configured", () => {
  assert.equal(verifySignature(body, undefined, undefined), true);
});
