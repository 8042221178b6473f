import crypto from "crypto";
import { AuthError } from "../errors.js";

export const MAX_TIMESTAMP_SKEW_SECONDS = 60 * 5;

export function computeSignature(signingSecret: string, timestamp: string, rawBody: string): string {
  const base = `v0:${timestamp}:${rawBody}`;
  return "v0=" + crypto.createHmac("sha256", signingSecret).update(base).digest("hex");
}

/** Length-independent constant-time string comparison. */
export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf-8");
  const right = Buffer.from(b, "utf-8");
  if (left.length !== right.length) {
    crypto.timingSafeEqual(left, left);
    return false;
  }
  return crypto.timingSafeEqual(left, right);
}

/**
 * Verify a Slack request: HMAC-SHA256 over `v0:<timestamp>:<body>` and a
 * timestamp within five minutes of now. Throws AuthError on any failure.
 */
export function verifySlackSignature(
  signingSecret: string,
  rawBody: string,
  timestamp: string | undefined,
  signature: string | undefined,
  nowSeconds: number = Math.floor(Date.now() / 1000)
): void {
  if (!timestamp || !/^\d+$/.test(timestamp)) {
    throw new AuthError("Slack timestamp invalid");
  }
  if (Math.abs(nowSeconds - Number(timestamp)) > MAX_TIMESTAMP_SKEW_SECONDS) {
    throw new AuthError("Slack timestamp expired");
  }
  if (!signature) {
    throw new AuthError("Slack signature missing");
  }
  const expected = computeSignature(signingSecret, timestamp, rawBody);
  if (!safeEqual(expected, signature)) {
    throw new AuthError("Slack signature invalid");
  }
}
