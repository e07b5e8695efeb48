import { createHmac, timingSafeEqual } from "crypto";

/** Hex HMAC-SHA256 of the raw request body. */
export const SIGNATURE_HEADER = "x-bridge-signature";

const SHA256_HEX = /^[0-9a-f]{64}$/i;

export function signBody(body: string, secret: string): string {
  return createHmac("sha256", secret).update(body, "utf8").digest("hex");
}

/**
 * Checks a signature header as it arrives on the request; repeated or missing
 * headers never match.
 */
export function verifySignature(body: string, header: string | string[] | undefined, secret: string): boolean {
  if (typeof header !== "string" || !SHA256_HEX.test(header)) {
    return false;
  }
  return timingSafeEqual(Buffer.from(signBody(body, secret), "hex"), Buffer.from(header, "hex"));
}

/** Accepts a message timestamp (epoch ms) within `maxSkewMs` of now. */
export function validateTimestamp(sentAt: number, maxSkewMs = 60_000, now = Date.now()): boolean {
  if (!Number.isFinite(sentAt)) return false;
  return Math.abs(now - sentAt) <= maxSkewMs;
}
