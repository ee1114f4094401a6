import { eq, and, ne, isNull, inArray, sql } from "drizzle-orm";
import { alias } from "drizzle-orm/pg-core";
import type {
  Conversation,
  ConversationParticipant,
  ConversationSummary,
} from "@keyrelay/shared";
import { db, type Executor } from "../db/connection.js";
import {
  conversations,
  conversationParticipants,
} from "../db/schema/conversations.js";
import { messages, deliveryReceipts } from "../db/schema/messages.js";
import { badRequest, forbidden, notFound } from "../errors.js";
import { pairKeyFor } from "../lib/crypto.js";
import { logger } from "../logger.js";
import { activeDeviceIds, assertE2eeEnabled } from "./keys.js";
import { userExists, isBlockedEitherWay } from "./relationships.js";

const log = logger.child({ module: "conversations" });

type ConversationRow = typeof conversations.$inferSelect;

async function findByPairKey(pairKey: string) {
  const [row] = await db
    .select()
    .from(conversations)
    .where(eq(conversations.pairKey, pairKey))
    .limit(1);
  return row;
}

// Conversations created before pair keys were stored are found through their
// participant rows and backfilled.
async function findLegacy(userA: string, userB: string, pairKey: string) {
  const a = alias(conversationParticipants, "a");
  const b = alias(conversationParticipants, "b");
  const [row] = await db
    .select({ id: conversations.id })
    .from(conversations)
    .innerJoin(a, and(eq(a.conversationId, conversations.id), eq(a.userId, userA)))
    .innerJoin(b, and(eq(b.conversationId, conversations.id), eq(b.userId, userB)))
    .where(isNull(conversations.pairKey))
    .limit(1);
  if (!row) return undefined;

  const [backfilled] = await db
    .update(conversations)
    .set({ pairKey })
    .where(and(eq(conversations.id, row.id), isNull(conversations.pairKey)))
    .returning();
  log.info({ conversationId: row.id }, "backfilled conversation pair key");
  return backfilled ?? (await findByPairKey(pairKey));
}

/** Re-derives each participant's device list and writes it back to the cache. */
async function refreshParticipants(
  conversationId: string,
  executor: Executor = db
): Promise<ConversationParticipant[]> {
  const rows = await executor
    .select({ userId: conversationParticipants.userId })
    .from(conversationParticipants)
    .where(eq(conversationParticipants.conversationId, conversationId));

  const participants: ConversationParticipant[] = [];
  for (const { userId } of rows) {
    const deviceIds = await activeDeviceIds(userId, executor);
    await executor
      .update(conversationParticipants)
      .set({ deviceIds })
      .where(
        and(
          eq(conversationParticipants.conversationId, conversationId),
          eq(conversationParticipants.userId, userId)
        )
      );
    participants.push({ userId, deviceIds });
  }
  return participants;
}

async function describe(row: ConversationRow): Promise<Conversation> {
  return {
    id: row.id,
    createdAt: row.createdAt,
    lastMessageAt: row.lastMessageAt,
    participants: await refreshParticipants(row.id),
  };
}

export async function findOrCreateConversation(
  callerId: string,
  peerUserId: string
): Promise<Conversation & { created: boolean }> {
  assertE2eeEnabled();

  if (callerId === peerUserId) {
    throw badRequest("SELF_CONVERSATION", "Cannot start a conversation with yourself");
  }
  if (!(await userExists(peerUserId))) {
    throw notFound("User not found");
  }
  if (await isBlockedEitherWay(callerId, peerUserId)) {
    throw forbidden("BLOCKED", "Cannot start a conversation with this user");
  }

  const pairKey = pairKeyFor(callerId, peerUserId);
  const existing =
    (await findByPairKey(pairKey)) ??
    (await findLegacy(callerId, peerUserId, pairKey));
  if (existing) {
    return { ...(await describe(existing)), created: false };
  }

  const outcome = await db.transaction(async (tx) => {
    const now = new Date();
    const [inserted] = await tx
      .insert(conversations)
      .values({ pairKey, createdAt: now })
      .onConflictDoNothing({ target: conversations.pairKey })
      .returning();

    if (!inserted) {
      // A concurrent create won; converge on its row.
      const [winner] = await tx
        .select()
        .from(conversations)
        .where(eq(conversations.pairKey, pairKey))
        .limit(1);
      if (!winner) throw new Error("Pair key conflict without a stored conversation");
      return { conversation: winner, created: false };
    }

    await tx.insert(conversationParticipants).values(
      [callerId, peerUserId].map((userId) => ({
        conversationId: inserted.id,
        userId,
        deviceIds: [],
        joinedAt: now,
      }))
    );
    return { conversation: inserted, created: true };
  });

  if (outcome.created) {
    log.info(
      { conversationId: outcome.conversation.id, callerId, peerUserId },
      "conversation created"
    );
  }
  return { ...(await describe(outcome.conversation)), created: outcome.created };
}

export async function listConversations(
  callerId: string,
  limit = 50,
  offset = 0
): Promise<{ items: ConversationSummary[]; hasMore: boolean }> {
  assertE2eeEnabled();

  const mine = alias(conversationParticipants, "mine");
  const peer = alias(conversationParticipants, "peer");
  const rows = await db
    .select({
      id: conversations.id,
      peerUserId: peer.userId,
      lastMessageAt: conversations.lastMessageAt,
    })
    .from(conversations)
    .innerJoin(
      mine,
      and(eq(mine.conversationId, conversations.id), eq(mine.userId, callerId))
    )
    .innerJoin(
      peer,
      and(eq(peer.conversationId, conversations.id), ne(peer.userId, callerId))
    )
    .orderBy(
      sql`coalesce(${conversations.lastMessageAt}, ${conversations.createdAt}) desc`,
      conversations.id
    )
    .limit(limit + 1)
    .offset(offset);

  const hasMore = rows.length > limit;
  const page = rows.slice(0, limit);
  if (page.length === 0) return { items: [], hasMore: false };

  const unread = await db
    .select({
      conversationId: messages.conversationId,
      count: sql<number>`count(*)::int`,
    })
    .from(deliveryReceipts)
    .innerJoin(messages, eq(messages.id, deliveryReceipts.messageId))
    .where(
      and(
        eq(deliveryReceipts.recipientUserId, callerId),
        isNull(deliveryReceipts.readAt),
        inArray(
          messages.conversationId,
          page.map((r) => r.id)
        )
      )
    )
    .groupBy(messages.conversationId);

  const unreadById = new Map<string, number>();
  for (const u of unread) {
    if (u.conversationId) unreadById.set(u.conversationId, u.count);
  }

  return {
    items: page.map((r) => ({
      ...r,
      unreadCount: unreadById.get(r.id) ?? 0,
    })),
    hasMore,
  };
}

export async function getConversation(
  callerId: string,
  conversationId: string
): Promise<Conversation> {
  assertE2eeEnabled();

  const [row] = await db
    .select({ conversation: conversations })
    .from(conversations)
    .innerJoin(
      conversationParticipants,
      and(
        eq(conversationParticipants.conversationId, conversations.id),
        eq(conversationParticipants.userId, callerId)
      )
    )
    .where(eq(conversations.id, conversationId))
    .limit(1);
  if (!row) throw notFound("Conversation not found");

  return describe(row.conversation);
}
