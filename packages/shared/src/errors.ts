export const ERROR_CODES = [
  "BLOCKED",
  "DEVICE_REVOKED",
  "BUNDLE_STALE",
  "PREKEYS_EXHAUSTED",
  "RELATIONSHIP_REQUIRED",
  "IDENTITY_CHANGE_BLOCKED",
  "EPOCH_STALE",
  "GROUP_FULL",
  "MAX_USES",
  "NOT_INVITED",
  "BANNED",
  "TARGET_USER_REQUIRED",
  "EXPIRY_IN_PAST",
  "VALIDATION_ERROR",
  "FEATURE_DISABLED",
  "UNAUTHORIZED",
  "FORBIDDEN",
  "NOT_FOUND",
  "NOT_MEMBER",
  "NOT_RECIPIENT",
  "SELF_CONVERSATION",
  "INVALID_PREKEY_COUNT",
  "INVALID_CIPHERTEXT",
  "MESSAGE_TOO_LARGE",
  "DEVICE_NOT_FOUND",
  "PREKEY_NOT_FOUND",
  "RATE_LIMITED",
  "GROUP_CLOSED",
  "INVITE_EXPIRED",
  "INVITE_CODE_COLLISION",
  "METRICS_UNAVAILABLE",
  "INTERNAL",
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export interface ErrorBody {
  error: string;
  code: ErrorCode;
  [key: string]: unknown;
}
