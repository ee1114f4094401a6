export const DEVICE_STATUS = ["active", "revoked"] as const;

export const IDENTITY_CHANGE_REASONS = [
  "identity_change",
  "identity_change_block",
] as const;

export const GROUP_ROLES = ["owner", "admin", "member"] as const;

export const INVITE_TYPES = ["link", "direct"] as const;

export const EPOCH_CHANGE_REASONS = [
  "member_added",
  "member_joined",
  "member_removed",
  "member_left",
  "member_banned",
] as const;

export const MAX_DEVICE_NAME_LENGTH = 100;
export const MAX_GROUP_TITLE_LENGTH = 100;
export const MAX_GROUP_ABOUT_LENGTH = 500;
export const MAX_BAN_REASON_LENGTH = 500;
export const MAX_REVOKE_REASON_LENGTH = 500;
export const MAX_PUBLIC_KEY_LENGTH = 4096;
export const MAX_CLIENT_MESSAGE_ID_LENGTH = 128;
export const MAX_ADD_MEMBERS_BATCH = 100;

// Upper bound on the request body; the configured pool size is enforced by the
// key service.
export const MAX_PREKEYS_PER_UPLOAD = 1000;

export const INVITE_CODE_LENGTH = 12;

export const DEFAULT_MESSAGE_PAGE_SIZE = 50;
export const MAX_MESSAGE_PAGE_SIZE = 100;
