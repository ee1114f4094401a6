import { createHash } from "node:crypto";
import { base64Schema } from "@keyrelay/shared";

export function sha256Hex(value: string): string {
  return createHash("sha256").update(value).digest("hex");
}

/** Short identity-key fingerprint used in audit rows and log lines. */
export function keyFingerprint(publicKey: string): string {
  return sha256Hex(publicKey).slice(0, 16);
}

/** Order-independent key for a 1:1 conversation between two users. */
export function pairKeyFor(userA: string, userB: string): string {
  return sha256Hex([userA, userB].sort().join(":"));
}

export function decodeBase64(value: string): Buffer | null {
  return base64Schema.safeParse(value).success ? Buffer.from(value, "base64") : null;
}
