import crypto from "crypto";

/**
 * Checks Meta's X-Hub-Signature-256 header against the raw request body.
 * Without an app secret configured every request is accepted.
 */
export function verifySignature(rawBody: Buffer | undefined, header: string | undefined, appSecret: string | undefined): boolean {
  if (!appSecret) return true;
  const signature = header ?? "";
  const expected =
    "sha256=" + crypto.createHmac("sha256", appSecret).update(rawBody ?? Buffer.alloc(0)).digest("hex");
  const given = Buffer.from(signature);
  const wanted = Buffer.from(expected);
  if (given.length !== wanted.length) return false;
  return crypto.timingSafeEqual(given, wanted);
}
