import type {
  GROUP_ROLES,
  INVITE_TYPES,
  EPOCH_CHANGE_REASONS,
} from "../constants.js";

export type GroupRole = (typeof GROUP_ROLES)[number];

export type InviteType = (typeof INVITE_TYPES)[number];

export type EpochChangeReason = (typeof EPOCH_CHANGE_REASONS)[number];

export interface Group {
  id: string;
  title: string;
  about: string;
  createdBy: string;
  maxParticipants: number;
  epoch: number;
  memberCount: number;
  isClosed: boolean;
  myRole: GroupRole;
  createdAt: Date;
  updatedAt: Date;
}

export interface GroupMember {
  userId: string;
  username: string;
  role: GroupRole;
  joinedAt: Date;
  muteUntil: Date | null;
}

export interface GroupInvite {
  id: string;
  groupId: string;
  type: InviteType;
  code: string;
  expiresAt: Date;
  maxUses: number | null;
  uses: number;
  targetUserId: string | null;
  createdAt: Date;
}
