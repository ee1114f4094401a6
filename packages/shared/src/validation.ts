import { z } from "zod";
import {
  MAX_DEVICE_NAME_LENGTH,
  MAX_PUBLIC_KEY_LENGTH,
  MAX_PREKEYS_PER_UPLOAD,
  MAX_REVOKE_REASON_LENGTH,
  MAX_CLIENT_MESSAGE_ID_LENGTH,
  MAX_GROUP_TITLE_LENGTH,
  MAX_GROUP_ABOUT_LENGTH,
  MAX_BAN_REASON_LENGTH,
  MAX_ADD_MEMBERS_BATCH,
  DEFAULT_MESSAGE_PAGE_SIZE,
  MAX_MESSAGE_PAGE_SIZE,
  INVITE_TYPES,
} from "./constants.js";

/** Padded standard-alphabet base64, as carried by every binary field. */
export const base64Schema = z.string().min(1).base64();

const publicKey = z.string().min(1).max(MAX_PUBLIC_KEY_LENGTH);

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

// ── Params ──

export const idParamsSchema = z.object({
  id: z.string().uuid(),
});

export const userIdParamsSchema = z.object({
  userId: z.string().uuid(),
});

export const deviceIdParamsSchema = z.object({
  deviceId: z.string().uuid(),
});

export const groupMemberParamsSchema = z.object({
  id: z.string().uuid(),
  userId: z.string().uuid(),
});

export const groupInviteParamsSchema = z.object({
  id: z.string().uuid(),
  inviteId: z.string().uuid(),
});

export const offsetPaginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

// ── Key schemas ──

export const uploadKeyBundleSchema = z.object({
  deviceId: z.string().uuid().optional(),
  deviceName: z.string().min(1).max(MAX_DEVICE_NAME_LENGTH),
  identityKey: publicKey,
  signedPrekey: publicKey,
  signedPrekeySig: publicKey,
  // Count against the pool size is checked by the key service.
  oneTimePrekeys: z.array(publicKey).max(MAX_PREKEYS_PER_UPLOAD),
});

export const fetchKeyBundleQuerySchema = z.object({
  bundleVersion: z.coerce.number().int().min(1).optional(),
});

export const revokeDeviceSchema = z.object({
  reason: z.string().max(MAX_REVOKE_REASON_LENGTH).optional(),
});

export const claimPrekeySchema = z.object({
  deviceId: z.string().uuid(),
  prekeyId: z.number().int().positive(),
});

// ── Conversation & message schemas ──

export const createConversationSchema = z.object({
  peerUserId: z.string().uuid(),
});

export const messageHistorySchema = z
  .object({
    limit: z.coerce
      .number()
      .int()
      .min(1)
      .max(MAX_MESSAGE_PAGE_SIZE)
      .default(DEFAULT_MESSAGE_PAGE_SIZE),
    before: z.string().uuid().optional(),
    after: z.string().uuid().optional(),
  })
  .refine((q) => !(q.before && q.after), {
    message: "Use either before or after, not both",
    path: ["after"],
  });

export const sendMessageSchema = z.object({
  deviceId: z.string().uuid(),
  ciphertext: z.string().min(1),
  proto: z.number().int().min(0),
  clientMessageId: z.string().min(1).max(MAX_CLIENT_MESSAGE_ID_LENGTH).optional(),
});

export const sendGroupMessageSchema = sendMessageSchema.extend({
  groupEpoch: z.number().int().min(0),
  replyToMessageId: z.string().uuid().optional(),
});

// ── Group schemas ──

export const createGroupSchema = z.object({
  title: z.string().min(1).max(MAX_GROUP_TITLE_LENGTH),
  about: z.string().max(MAX_GROUP_ABOUT_LENGTH).optional(),
});

export const updateGroupSchema = z.object({
  title: z.string().min(1).max(MAX_GROUP_TITLE_LENGTH).optional(),
  about: z.string().max(MAX_GROUP_ABOUT_LENGTH).optional(),
});

export const addMembersSchema = z.object({
  userIds: z.array(z.string().uuid()).min(1).max(MAX_ADD_MEMBERS_BATCH),
});

export const memberTargetSchema = z.object({
  userId: z.string().uuid(),
});

export const banMemberSchema = z.object({
  userId: z.string().uuid(),
  reason: z.string().max(MAX_BAN_REASON_LENGTH).optional(),
});

export const muteGroupSchema = z.object({
  muteUntil: timestamp.nullable(),
});

export const createInviteSchema = z.object({
  type: z.enum(INVITE_TYPES),
  expiresAt: timestamp.nullable().optional(),
  maxUses: z.number().int().min(1).nullable().optional(),
  targetUserId: z.string().uuid().optional(),
});

export const joinGroupSchema = z.object({
  code: z.string().min(1).max(64),
});

// ── Block schemas ──

export const blockUserSchema = z.object({
  userId: z.string().uuid(),
});

export type UploadKeyBundleInput = z.infer<typeof uploadKeyBundleSchema>;
export type ClaimPrekeyInput = z.infer<typeof claimPrekeySchema>;
export type MessageHistoryInput = z.infer<typeof messageHistorySchema>;
export type SendMessageInput = z.infer<typeof sendMessageSchema>;
export type SendGroupMessageInput = z.infer<typeof sendGroupMessageSchema>;
export type CreateGroupInput = z.infer<typeof createGroupSchema>;
export type UpdateGroupInput = z.infer<typeof updateGroupSchema>;
export type CreateInviteInput = z.infer<typeof createInviteSchema>;
