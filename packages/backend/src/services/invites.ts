import { eq, and, desc, gt, isNull, lt, or, sql } from "drizzle-orm";
import type { CreateInviteInput, GroupInvite } from "@keyrelay/shared";
import { config } from "../config.js";
import { db } from "../db/connection.js";
import {
  groupInvites,
  groupParticipants,
  groupBans,
} from "../db/schema/groups.js";
import {
  badRequest,
  conflict,
  forbidden,
  gone,
  notFound,
} from "../errors.js";
import { generateInviteCode } from "../lib/codes.js";
import { logger } from "../logger.js";
import {
  activeMemberIds,
  announceEpoch,
  assertGroupsEnabled,
  assertOpen,
  bumpEpoch,
  findGroup,
  findParticipant,
  lockGroup,
  requireManager,
  requireMember,
} from "./groups.js";
import { userExists } from "./relationships.js";

const log = logger.child({ module: "invites" });

type InviteRow = typeof groupInvites.$inferSelect;

function toInvite(row: InviteRow): GroupInvite {
  return {
    id: row.id,
    groupId: row.groupId,
    type: row.type,
    code: row.code,
    expiresAt: row.expiresAt,
    maxUses: row.maxUses,
    uses: row.uses,
    targetUserId: row.targetUserId,
    createdAt: row.createdAt,
  };
}

export async function createInvite(
  callerId: string,
  groupId: string,
  input: CreateInviteInput
): Promise<GroupInvite> {
  assertGroupsEnabled();

  if (input.type === "direct" && !input.targetUserId) {
    throw badRequest("TARGET_USER_REQUIRED", "Direct invites need a target user");
  }
  const now = new Date();
  if (input.expiresAt && input.expiresAt.getTime() <= now.getTime()) {
    throw badRequest("EXPIRY_IN_PAST", "Invite expiry must be in the future");
  }
  const expiresAt =
    input.expiresAt ??
    new Date(now.getTime() + config.groups.inviteExpiryHours * 3_600_000);
  const targetUserId = input.type === "direct" ? input.targetUserId ?? null : null;

  const group = await findGroup(groupId);
  assertOpen(group);
  requireManager(await requireMember(db, groupId, callerId));
  if (targetUserId && !(await userExists(targetUserId))) {
    throw notFound("User not found");
  }

  for (let attempt = 1; attempt <= config.groups.inviteCodeAttempts; attempt++) {
    const [invite] = await db
      .insert(groupInvites)
      .values({
        groupId,
        createdBy: callerId,
        type: input.type,
        code: generateInviteCode(),
        expiresAt,
        maxUses: input.maxUses ?? null,
        targetUserId,
        createdAt: now,
      })
      .onConflictDoNothing({ target: groupInvites.code })
      .returning();
    if (invite) {
      log.info({ groupId, inviteId: invite.id, type: invite.type }, "invite created");
      return toInvite(invite);
    }
    log.debug({ groupId, attempt }, "invite code collision");
  }

  throw conflict(
    "INVITE_CODE_COLLISION",
    "Could not allocate a unique invite code; retry the request"
  );
}

export async function listInvites(
  callerId: string,
  groupId: string
): Promise<{ items: GroupInvite[] }> {
  assertGroupsEnabled();
  await findGroup(groupId);
  requireManager(await requireMember(db, groupId, callerId));

  const rows = await db
    .select()
    .from(groupInvites)
    .where(
      and(
        eq(groupInvites.groupId, groupId),
        gt(groupInvites.expiresAt, new Date()),
        or(isNull(groupInvites.maxUses), lt(groupInvites.uses, groupInvites.maxUses))
      )
    )
    .orderBy(desc(groupInvites.createdAt));

  return { items: rows.map(toInvite) };
}

export async function revokeInvite(
  callerId: string,
  groupId: string,
  inviteId: string
) {
  assertGroupsEnabled();
  await findGroup(groupId);
  requireManager(await requireMember(db, groupId, callerId));

  const deleted = await db
    .delete(groupInvites)
    .where(and(eq(groupInvites.id, inviteId), eq(groupInvites.groupId, groupId)))
    .returning({ id: groupInvites.id });
  if (deleted.length === 0) throw notFound("Invite not found");

  return { success: true };
}

export interface JoinResult {
  success: true;
  groupId: string;
  epoch: number;
  alreadyMember: boolean;
}

export async function joinByCode(callerId: string, code: string): Promise<JoinResult> {
  assertGroupsEnabled();

  const [found] = await db
    .select({ id: groupInvites.id, groupId: groupInvites.groupId })
    .from(groupInvites)
    .where(eq(groupInvites.code, code.trim().toUpperCase()))
    .limit(1);
  if (!found) throw notFound("Invite not found");

  const outcome = await db.transaction(async (tx) => {
    const group = await lockGroup(tx, found.groupId);
    const [invite] = await tx
      .select()
      .from(groupInvites)
      .where(eq(groupInvites.id, found.id))
      .for("update");
    if (!invite) throw notFound("Invite not found");

    if (invite.expiresAt.getTime() <= Date.now()) {
      throw gone("INVITE_EXPIRED", "Invite has expired");
    }
    if (invite.maxUses !== null && invite.uses >= invite.maxUses) {
      throw conflict("MAX_USES", "Invite has reached its maximum uses");
    }
    assertOpen(group);

    const [ban] = await tx
      .select({ id: groupBans.id })
      .from(groupBans)
      .where(and(eq(groupBans.groupId, group.id), eq(groupBans.userId, callerId)))
      .limit(1);
    if (ban) throw forbidden("BANNED", "You are banned from this group");

    const participant = await findParticipant(tx, group.id, callerId);
    const isMember = participant !== undefined && !participant.isBanned;

    if (!isMember) {
      const activeCount = (await activeMemberIds(tx, group.id)).length;
      if (activeCount + 1 > group.maxParticipants) {
        throw conflict("GROUP_FULL", "Group is at capacity", {
          details: { maxParticipants: group.maxParticipants, memberCount: activeCount },
        });
      }
    }
    if (invite.type === "direct" && invite.targetUserId !== callerId) {
      throw forbidden("NOT_INVITED", "This invite is for another user");
    }
    if (isMember) {
      return { epoch: group.groupEpoch, alreadyMember: true, change: null };
    }

    const now = new Date();
    if (participant) {
      await tx
        .update(groupParticipants)
        .set({ isBanned: false, role: "member", joinedAt: now, muteUntil: null })
        .where(eq(groupParticipants.id, participant.id));
    } else {
      await tx.insert(groupParticipants).values({
        groupId: group.id,
        userId: callerId,
        role: "member",
        joinedAt: now,
      });
    }
    await tx
      .update(groupInvites)
      .set({ uses: sql`${groupInvites.uses} + 1` })
      .where(eq(groupInvites.id, invite.id));

    const change = await bumpEpoch(tx, group.id, "member_joined");
    return { epoch: change.epoch, alreadyMember: false, change };
  });

  if (outcome.change) await announceEpoch(outcome.change);
  return {
    success: true,
    groupId: found.groupId,
    epoch: outcome.epoch,
    alreadyMember: outcome.alreadyMember,
  };
}
