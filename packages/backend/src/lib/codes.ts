import { randomBytes } from "node:crypto";
import { INVITE_CODE_LENGTH } from "@keyrelay/shared";

export function generateInviteCode(): string {
  return randomBytes(INVITE_CODE_LENGTH)
    .toString("base64url")
    .slice(0, INVITE_CODE_LENGTH)
    .toUpperCase();
}
