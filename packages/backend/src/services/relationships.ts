import { eq, and, or, desc } from "drizzle-orm";
import { alias } from "drizzle-orm/pg-core";
import { db, type Executor } from "../db/connection.js";
import { users, blocks } from "../db/schema/users.js";
import { conversationParticipants } from "../db/schema/conversations.js";
import { groupParticipants } from "../db/schema/groups.js";
import { badRequest, notFound } from "../errors.js";

export async function userExists(
  userId: string,
  executor: Executor = db
): Promise<boolean> {
  const [row] = await executor
    .select({ id: users.id })
    .from(users)
    .where(eq(users.id, userId))
    .limit(1);
  return row !== undefined;
}

export async function isBlockedEitherWay(
  userA: string,
  userB: string,
  executor: Executor = db
): Promise<boolean> {
  const [row] = await executor
    .select({ id: blocks.id })
    .from(blocks)
    .where(
      or(
        and(eq(blocks.blockerId, userA), eq(blocks.blockedId, userB)),
        and(eq(blocks.blockerId, userB), eq(blocks.blockedId, userA))
      )
    )
    .limit(1);
  return row !== undefined;
}

/**
 * Users are related when they share a 1:1 conversation or are both active,
 * non-banned members of the same group.
 */
export async function hasRelationship(
  userA: string,
  userB: string,
  executor: Executor = db
): Promise<boolean> {
  const mine = alias(conversationParticipants, "mine");
  const theirs = alias(conversationParticipants, "theirs");
  const [conversation] = await executor
    .select({ id: mine.conversationId })
    .from(mine)
    .innerJoin(
      theirs,
      and(
        eq(theirs.conversationId, mine.conversationId),
        eq(theirs.userId, userB)
      )
    )
    .where(eq(mine.userId, userA))
    .limit(1);
  if (conversation) return true;

  const myGroups = alias(groupParticipants, "my_groups");
  const theirGroups = alias(groupParticipants, "their_groups");
  const [group] = await executor
    .select({ id: myGroups.groupId })
    .from(myGroups)
    .innerJoin(
      theirGroups,
      and(
        eq(theirGroups.groupId, myGroups.groupId),
        eq(theirGroups.userId, userB),
        eq(theirGroups.isBanned, false)
      )
    )
    .where(and(eq(myGroups.userId, userA), eq(myGroups.isBanned, false)))
    .limit(1);
  return group !== undefined;
}

// ── Block management ──

export async function blockUser(blockerId: string, blockedId: string) {
  if (blockerId === blockedId) {
    throw badRequest("VALIDATION_ERROR", "Cannot block yourself");
  }
  if (!(await userExists(blockedId))) {
    throw notFound("User not found");
  }

  await db
    .insert(blocks)
    .values({ blockerId, blockedId, createdAt: new Date() })
    .onConflictDoNothing();

  return { success: true, blockedUserId: blockedId };
}

export async function unblockUser(blockerId: string, blockedId: string) {
  await db
    .delete(blocks)
    .where(and(eq(blocks.blockerId, blockerId), eq(blocks.blockedId, blockedId)));
  return { success: true };
}

export async function listBlocks(blockerId: string) {
  const rows = await db
    .select({
      userId: blocks.blockedId,
      username: users.username,
      createdAt: blocks.createdAt,
    })
    .from(blocks)
    .innerJoin(users, eq(users.id, blocks.blockedId))
    .where(eq(blocks.blockerId, blockerId))
    .orderBy(desc(blocks.createdAt));
  return { items: rows };
}
