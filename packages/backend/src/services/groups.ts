import { eq, and, desc, asc, inArray, sql } from "drizzle-orm";
import type {
  CreateGroupInput,
  EpochChangeReason,
  Group,
  GroupMember,
  GroupRole,
  UpdateGroupInput,
} from "@keyrelay/shared";
import { config } from "../config.js";
import { db, type Executor } from "../db/connection.js";
import {
  groups,
  groupParticipants,
  groupBans,
} from "../db/schema/groups.js";
import { users } from "../db/schema/users.js";
import { badRequest, conflict, forbidden, notFound } from "../errors.js";
import { logger } from "../logger.js";
import { publishToUsers } from "../realtime/publisher.js";

const log = logger.child({ module: "groups" });

export type GroupRow = typeof groups.$inferSelect;
export type ParticipantRow = typeof groupParticipants.$inferSelect;

export function assertGroupsEnabled() {
  if (!config.groups.enabled) {
    throw forbidden("FEATURE_DISABLED", "Groups are disabled");
  }
}

function toGroup(row: GroupRow, myRole: GroupRole): Group {
  return {
    id: row.id,
    title: row.title,
    about: row.about,
    createdBy: row.createdBy,
    maxParticipants: row.maxParticipants,
    epoch: row.groupEpoch,
    memberCount: row.memberCount,
    isClosed: row.isClosed,
    myRole,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

// ── Shared membership helpers ──

export async function findGroup(groupId: string, executor: Executor = db) {
  const [group] = await executor
    .select()
    .from(groups)
    .where(eq(groups.id, groupId))
    .limit(1);
  if (!group) throw notFound("Group not found");
  return group;
}

/** Row lock held for the rest of the transaction; serializes membership changes. */
export async function lockGroup(tx: Executor, groupId: string) {
  const [group] = await tx
    .select()
    .from(groups)
    .where(eq(groups.id, groupId))
    .for("update");
  if (!group) throw notFound("Group not found");
  return group;
}

export async function findParticipant(
  executor: Executor,
  groupId: string,
  userId: string
): Promise<ParticipantRow | undefined> {
  const [row] = await executor
    .select()
    .from(groupParticipants)
    .where(
      and(
        eq(groupParticipants.groupId, groupId),
        eq(groupParticipants.userId, userId)
      )
    )
    .limit(1);
  return row;
}

export async function requireMember(
  executor: Executor,
  groupId: string,
  userId: string
): Promise<ParticipantRow> {
  const participant = await findParticipant(executor, groupId, userId);
  if (!participant || participant.isBanned) {
    throw forbidden("NOT_MEMBER", "Not a member of this group");
  }
  return participant;
}

export function requireManager(participant: ParticipantRow) {
  if (participant.role !== "owner" && participant.role !== "admin") {
    throw forbidden("FORBIDDEN", "Only group owners and admins can do this");
  }
}

function requireOwner(participant: ParticipantRow) {
  if (participant.role !== "owner") {
    throw forbidden("FORBIDDEN", "Only the group owner can do this");
  }
}

export function assertOpen(group: GroupRow) {
  if (group.isClosed) {
    throw forbidden("GROUP_CLOSED", "Group is closed");
  }
}

export async function activeMemberIds(
  executor: Executor,
  groupId: string
): Promise<string[]> {
  const rows = await executor
    .select({ userId: groupParticipants.userId })
    .from(groupParticipants)
    .where(
      and(
        eq(groupParticipants.groupId, groupId),
        eq(groupParticipants.isBanned, false)
      )
    );
  return rows.map((r) => r.userId);
}

export interface EpochChange {
  groupId: string;
  epoch: number;
  reason: EpochChangeReason;
  audience: string[];
}

/**
 * Advances the epoch by one and recomputes member_count. Must run inside the
 * transaction that holds the group lock and after the membership rows change.
 */
export async function bumpEpoch(
  tx: Executor,
  groupId: string,
  reason: EpochChangeReason,
  departed: string[] = []
): Promise<EpochChange> {
  const members = await activeMemberIds(tx, groupId);
  const now = new Date();
  const [row] = await tx
    .update(groups)
    .set({
      groupEpoch: sql`${groups.groupEpoch} + 1`,
      memberCount: members.length,
      epochChangedAt: now,
      updatedAt: now,
    })
    .where(eq(groups.id, groupId))
    .returning({ epoch: groups.groupEpoch });
  if (!row) throw notFound("Group not found");

  return {
    groupId,
    epoch: row.epoch,
    reason,
    audience: [...members, ...departed],
  };
}

export async function announceEpoch(change: EpochChange) {
  log.info(
    { groupId: change.groupId, epoch: change.epoch, reason: change.reason },
    "group epoch advanced"
  );
  await publishToUsers(change.audience, {
    type: "epoch_changed",
    groupId: change.groupId,
    epoch: change.epoch,
    reason: change.reason,
  });
}

// ── Group CRUD ──

export async function createGroup(
  callerId: string,
  input: CreateGroupInput
): Promise<Group> {
  assertGroupsEnabled();

  const group = await db.transaction(async (tx) => {
    const now = new Date();
    const [created] = await tx
      .insert(groups)
      .values({
        title: input.title,
        about: input.about ?? "",
        createdBy: callerId,
        maxParticipants: config.groups.maxParticipants,
        memberCount: 1,
        createdAt: now,
        updatedAt: now,
      })
      .returning();
    if (!created) throw new Error("Group insert returned no row");

    await tx.insert(groupParticipants).values({
      groupId: created.id,
      userId: callerId,
      role: "owner",
      joinedAt: now,
    });
    return created;
  });

  log.info({ groupId: group.id, callerId }, "group created");
  return toGroup(group, "owner");
}

export async function listGroups(callerId: string): Promise<{ items: Group[] }> {
  assertGroupsEnabled();

  const rows = await db
    .select({ group: groups, role: groupParticipants.role })
    .from(groupParticipants)
    .innerJoin(groups, eq(groups.id, groupParticipants.groupId))
    .where(
      and(
        eq(groupParticipants.userId, callerId),
        eq(groupParticipants.isBanned, false)
      )
    )
    .orderBy(desc(groups.updatedAt));

  return { items: rows.map((r) => toGroup(r.group, r.role)) };
}

export async function getGroup(callerId: string, groupId: string): Promise<Group> {
  assertGroupsEnabled();
  const group = await findGroup(groupId);
  const me = await requireMember(db, groupId, callerId);
  return toGroup(group, me.role);
}

export async function updateGroup(
  callerId: string,
  groupId: string,
  input: UpdateGroupInput
): Promise<Group> {
  assertGroupsEnabled();

  return db.transaction(async (tx) => {
    await lockGroup(tx, groupId);
    const me = await requireMember(tx, groupId, callerId);
    requireManager(me);

    const changes: Partial<typeof groups.$inferInsert> = { updatedAt: new Date() };
    if (input.title !== undefined) changes.title = input.title;
    if (input.about !== undefined) changes.about = input.about;

    const [updated] = await tx
      .update(groups)
      .set(changes)
      .where(eq(groups.id, groupId))
      .returning();
    if (!updated) throw notFound("Group not found");
    return toGroup(updated, me.role);
  });
}

export async function closeGroup(callerId: string, groupId: string) {
  assertGroupsEnabled();

  const alreadyClosed = await db.transaction(async (tx) => {
    const group = await lockGroup(tx, groupId);
    requireOwner(await requireMember(tx, groupId, callerId));
    if (group.isClosed) return true;

    await tx
      .update(groups)
      .set({ isClosed: true, updatedAt: new Date() })
      .where(eq(groups.id, groupId));
    return false;
  });

  if (!alreadyClosed) log.info({ groupId, callerId }, "group closed");
  return { success: true, isClosed: true };
}

export async function listMembers(
  callerId: string,
  groupId: string
): Promise<{ items: GroupMember[] }> {
  assertGroupsEnabled();
  await findGroup(groupId);
  await requireMember(db, groupId, callerId);

  const rows = await db
    .select({
      userId: groupParticipants.userId,
      username: users.username,
      role: groupParticipants.role,
      joinedAt: groupParticipants.joinedAt,
      muteUntil: groupParticipants.muteUntil,
    })
    .from(groupParticipants)
    .innerJoin(users, eq(users.id, groupParticipants.userId))
    .where(
      and(
        eq(groupParticipants.groupId, groupId),
        eq(groupParticipants.isBanned, false)
      )
    )
    .orderBy(asc(groupParticipants.joinedAt), asc(users.username));

  return { items: rows };
}

// ── Membership changes (epoch-bumping) ──

export async function addMembers(
  callerId: string,
  groupId: string,
  userIds: string[]
): Promise<{ addedUserIds: string[]; epoch: number }> {
  assertGroupsEnabled();
  const requested = [...new Set(userIds)];

  const outcome = await db.transaction(async (tx) => {
    const group = await lockGroup(tx, groupId);
    assertOpen(group);
    requireManager(await requireMember(tx, groupId, callerId));

    const known = await tx
      .select({ id: users.id })
      .from(users)
      .where(inArray(users.id, requested));
    const banned = await tx
      .select({ userId: groupBans.userId })
      .from(groupBans)
      .where(and(eq(groupBans.groupId, groupId), inArray(groupBans.userId, requested)));
    const existing = await tx
      .select()
      .from(groupParticipants)
      .where(
        and(
          eq(groupParticipants.groupId, groupId),
          inArray(groupParticipants.userId, requested)
        )
      );

    const knownIds = new Set(known.map((u) => u.id));
    const bannedIds = new Set(banned.map((b) => b.userId));
    const rowsByUser = new Map(existing.map((p) => [p.userId, p]));

    const toInsert: string[] = [];
    const toReactivate: string[] = [];
    for (const userId of requested) {
      if (!knownIds.has(userId) || bannedIds.has(userId)) continue;
      const row = rowsByUser.get(userId);
      if (!row) toInsert.push(userId);
      else if (row.isBanned) toReactivate.push(userId);
    }
    const added = [...toInsert, ...toReactivate];
    if (added.length === 0) {
      return { added, epoch: group.groupEpoch, change: null };
    }

    const activeCount = (await activeMemberIds(tx, groupId)).length;
    if (activeCount + added.length > group.maxParticipants) {
      throw conflict("GROUP_FULL", "Group is at capacity", {
        details: {
          maxParticipants: group.maxParticipants,
          memberCount: activeCount,
        },
      });
    }

    const now = new Date();
    if (toReactivate.length > 0) {
      await tx
        .update(groupParticipants)
        .set({ isBanned: false, role: "member", joinedAt: now, muteUntil: null })
        .where(
          and(
            eq(groupParticipants.groupId, groupId),
            inArray(groupParticipants.userId, toReactivate)
          )
        );
    }
    if (toInsert.length > 0) {
      await tx.insert(groupParticipants).values(
        toInsert.map((userId) => ({
          groupId,
          userId,
          role: "member" as const,
          joinedAt: now,
        }))
      );
    }

    const change = await bumpEpoch(tx, groupId, "member_added");
    return { added, epoch: change.epoch, change };
  });

  if (outcome.change) await announceEpoch(outcome.change);
  return { addedUserIds: outcome.added, epoch: outcome.epoch };
}

export async function removeMember(
  callerId: string,
  groupId: string,
  targetUserId: string
) {
  assertGroupsEnabled();

  const change = await db.transaction(async (tx) => {
    await lockGroup(tx, groupId);
    requireManager(await requireMember(tx, groupId, callerId));

    const target = await findParticipant(tx, groupId, targetUserId);
    if (!target || target.isBanned) {
      throw notFound("User is not a member", "NOT_MEMBER");
    }
    if (target.role === "owner") {
      throw forbidden("FORBIDDEN", "The group owner cannot be removed");
    }

    await tx.delete(groupParticipants).where(eq(groupParticipants.id, target.id));
    return bumpEpoch(tx, groupId, "member_removed", [targetUserId]);
  });

  await announceEpoch(change);
  return { success: true, epoch: change.epoch };
}

export async function leaveGroup(callerId: string, groupId: string) {
  assertGroupsEnabled();

  const change = await db.transaction(async (tx) => {
    await lockGroup(tx, groupId);
    const me = await requireMember(tx, groupId, callerId);
    if (me.role === "owner") {
      throw forbidden(
        "FORBIDDEN",
        "The owner cannot leave; transfer ownership or close the group first"
      );
    }

    await tx.delete(groupParticipants).where(eq(groupParticipants.id, me.id));
    return bumpEpoch(tx, groupId, "member_left", [callerId]);
  });

  await announceEpoch(change);
  return { success: true, epoch: change.epoch };
}

export async function banMember(
  callerId: string,
  groupId: string,
  targetUserId: string,
  reason?: string
) {
  assertGroupsEnabled();

  const change = await db.transaction(async (tx) => {
    await lockGroup(tx, groupId);
    requireManager(await requireMember(tx, groupId, callerId));

    const [target] = await tx
      .select({ id: users.id })
      .from(users)
      .where(eq(users.id, targetUserId))
      .limit(1);
    if (!target) throw notFound("User not found");

    const participant = await findParticipant(tx, groupId, targetUserId);
    if (participant?.role === "owner") {
      throw forbidden("FORBIDDEN", "The group owner cannot be banned");
    }

    const now = new Date();
    if (participant) {
      await tx
        .update(groupParticipants)
        .set({ isBanned: true, role: "member" })
        .where(eq(groupParticipants.id, participant.id));
    } else {
      await tx.insert(groupParticipants).values({
        groupId,
        userId: targetUserId,
        role: "member",
        isBanned: true,
        joinedAt: now,
      });
    }

    await tx
      .insert(groupBans)
      .values({
        groupId,
        userId: targetUserId,
        bannedBy: callerId,
        reason: reason ?? null,
        bannedAt: now,
      })
      .onConflictDoUpdate({
        target: [groupBans.groupId, groupBans.userId],
        set: { bannedBy: callerId, reason: reason ?? null, bannedAt: now },
      });

    return bumpEpoch(tx, groupId, "member_banned", [targetUserId]);
  });

  log.warn(
    { audit: true, event: "group_ban", groupId, callerId, targetUserId },
    "user banned from group"
  );
  await announceEpoch(change);
  return { success: true, epoch: change.epoch };
}

/** Clears the ban without re-admitting; a fresh add or join is required. */
export async function unbanMember(
  callerId: string,
  groupId: string,
  targetUserId: string
) {
  assertGroupsEnabled();

  await db.transaction(async (tx) => {
    await lockGroup(tx, groupId);
    requireManager(await requireMember(tx, groupId, callerId));

    const removedBans = await tx
      .delete(groupBans)
      .where(and(eq(groupBans.groupId, groupId), eq(groupBans.userId, targetUserId)))
      .returning({ id: groupBans.id });
    const removedRows = await tx
      .delete(groupParticipants)
      .where(
        and(
          eq(groupParticipants.groupId, groupId),
          eq(groupParticipants.userId, targetUserId),
          eq(groupParticipants.isBanned, true)
        )
      )
      .returning({ id: groupParticipants.id });

    if (removedBans.length === 0 && removedRows.length === 0) {
      throw notFound("User is not banned");
    }
  });

  log.info({ groupId, callerId, targetUserId }, "user unbanned");
  return { success: true };
}

// ── Role & preference changes (epoch-neutral) ──

async function changeRole(
  callerId: string,
  groupId: string,
  targetUserId: string,
  from: GroupRole,
  to: GroupRole,
  ownerOnly: boolean
) {
  assertGroupsEnabled();

  return db.transaction(async (tx) => {
    await lockGroup(tx, groupId);
    const me = await requireMember(tx, groupId, callerId);
    if (ownerOnly) requireOwner(me);
    else requireManager(me);

    const target = await findParticipant(tx, groupId, targetUserId);
    if (!target || target.isBanned) {
      throw notFound("User is not a member", "NOT_MEMBER");
    }
    if (target.role === "owner") {
      throw forbidden("FORBIDDEN", "The owner's role cannot be changed this way");
    }
    if (target.role !== from) {
      return { success: true, role: target.role, changed: false };
    }

    await tx
      .update(groupParticipants)
      .set({ role: to })
      .where(eq(groupParticipants.id, target.id));
    return { success: true, role: to, changed: true };
  });
}

export function promoteMember(callerId: string, groupId: string, targetUserId: string) {
  return changeRole(callerId, groupId, targetUserId, "member", "admin", false);
}

export function demoteAdmin(callerId: string, groupId: string, targetUserId: string) {
  return changeRole(callerId, groupId, targetUserId, "admin", "member", true);
}

export async function transferOwnership(
  callerId: string,
  groupId: string,
  targetUserId: string
) {
  assertGroupsEnabled();
  if (callerId === targetUserId) {
    throw badRequest("VALIDATION_ERROR", "Already the group owner");
  }

  await db.transaction(async (tx) => {
    await lockGroup(tx, groupId);
    const me = await requireMember(tx, groupId, callerId);
    requireOwner(me);

    const target = await findParticipant(tx, groupId, targetUserId);
    if (!target || target.isBanned) {
      throw notFound("User is not a member", "NOT_MEMBER");
    }

    await tx
      .update(groupParticipants)
      .set({ role: "owner" })
      .where(eq(groupParticipants.id, target.id));
    await tx
      .update(groupParticipants)
      .set({ role: "admin" })
      .where(eq(groupParticipants.id, me.id));
  });

  log.info({ groupId, from: callerId, to: targetUserId }, "group ownership transferred");
  return { success: true, ownerId: targetUserId };
}

export async function muteGroup(
  callerId: string,
  groupId: string,
  muteUntil: Date | null
) {
  assertGroupsEnabled();
  await findGroup(groupId);
  const me = await requireMember(db, groupId, callerId);

  await db
    .update(groupParticipants)
    .set({ muteUntil })
    .where(eq(groupParticipants.id, me.id));
  return { success: true, muteUntil };
}
