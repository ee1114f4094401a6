import { eq, and, ne, or, lt, gt, asc, desc, isNull, type SQL } from "drizzle-orm";
import type {
  MessageEnvelope,
  MessageHistoryInput,
  MessagePage,
  SendGroupMessageInput,
  SendMessageInput,
  SendMessageResult,
} from "@keyrelay/shared";
import { config } from "../config.js";
import { db, type Executor } from "../db/connection.js";
import { messages, deliveryReceipts } from "../db/schema/messages.js";
import {
  conversations,
  conversationParticipants,
} from "../db/schema/conversations.js";
import { groups } from "../db/schema/groups.js";
import { devices } from "../db/schema/devices.js";
import {
  ApiError,
  badRequest,
  conflict,
  forbidden,
  notFound,
  payloadTooLarge,
} from "../errors.js";
import { decodeBase64 } from "../lib/crypto.js";
import { logger } from "../logger.js";
import { publishToUsers } from "../realtime/publisher.js";
import { assertE2eeEnabled, deviceRevokedError } from "./keys.js";
import {
  activeMemberIds,
  assertGroupsEnabled,
  assertOpen,
  findGroup,
  requireMember,
} from "./groups.js";
import { isBlockedEitherWay } from "./relationships.js";
import { checkSendRate, type RateTarget } from "./rate-limit.js";

const log = logger.child({ module: "messages" });

type MessageRow = typeof messages.$inferSelect;
type NewMessage = typeof messages.$inferInsert;

// ── Shared send checks ──

async function verifySenderDevice(userId: string, deviceId: string) {
  const [device] = await db
    .select({ id: devices.id, userId: devices.userId, status: devices.status })
    .from(devices)
    .where(eq(devices.id, deviceId))
    .limit(1);
  if (!device || device.userId !== userId) {
    throw badRequest("DEVICE_NOT_FOUND", "Sending device is not registered to you");
  }
  if (device.status === "revoked") {
    throw deviceRevokedError(409, userId, deviceId);
  }
}

function targetCondition(target: RateTarget): SQL {
  return "conversationId" in target
    ? eq(messages.conversationId, target.conversationId)
    : eq(messages.groupId, target.groupId);
}

async function findByClientId(
  executor: Executor,
  senderUserId: string,
  target: RateTarget,
  clientMessageId: string
) {
  const [row] = await executor
    .select()
    .from(messages)
    .where(
      and(
        eq(messages.senderUserId, senderUserId),
        targetCondition(target),
        eq(messages.clientMessageId, clientMessageId)
      )
    )
    .limit(1);
  return row;
}

function validateCiphertext(ciphertext: string) {
  const bytes = decodeBase64(ciphertext);
  if (!bytes) {
    throw badRequest("INVALID_CIPHERTEXT", "Ciphertext must be base64 encoded");
  }
  if (bytes.length > config.messaging.maxMessageBytes) {
    throw payloadTooLarge(
      "MESSAGE_TOO_LARGE",
      `Ciphertext exceeds ${config.messaging.maxMessageBytes} bytes`
    );
  }
}

function epochStale(currentEpoch: number) {
  return conflict("EPOCH_STALE", "Group epoch has changed; rekey and resend", {
    headers: { "X-Current-Epoch": String(currentEpoch) },
    details: { currentEpoch },
  });
}

/**
 * Inserts the message and its receipts. A lost race on the idempotency index
 * resolves to the stored row.
 */
async function persist(
  tx: Executor,
  values: NewMessage,
  target: RateTarget,
  recipients: string[]
): Promise<{ message: MessageRow; duplicate: boolean }> {
  const [inserted] = await tx
    .insert(messages)
    .values(values)
    .onConflictDoNothing()
    .returning();

  if (!inserted) {
    const existing = values.clientMessageId
      ? await findByClientId(tx, values.senderUserId, target, values.clientMessageId)
      : undefined;
    if (!existing) throw new Error("Message insert conflicted without a stored row");
    return { message: existing, duplicate: true };
  }

  if (recipients.length > 0) {
    await tx.insert(deliveryReceipts).values(
      recipients.map((recipientUserId) => ({
        messageId: inserted.id,
        recipientUserId,
      }))
    );
  }
  return { message: inserted, duplicate: false };
}

async function notifyRecipients(recipients: string[], message: MessageEnvelope) {
  await publishToUsers(recipients, { type: "message", message });
}

// ── 1:1 ──

async function requireConversationParticipant(
  conversationId: string,
  userId: string
) {
  const [row] = await db
    .select({ id: conversationParticipants.id })
    .from(conversationParticipants)
    .where(
      and(
        eq(conversationParticipants.conversationId, conversationId),
        eq(conversationParticipants.userId, userId)
      )
    )
    .limit(1);
  if (!row) throw notFound("Conversation not found");
}

export async function sendDirectMessage(
  callerId: string,
  conversationId: string,
  input: SendMessageInput
): Promise<SendMessageResult> {
  assertE2eeEnabled();
  const target: RateTarget = { conversationId };

  await requireConversationParticipant(conversationId, callerId);
  await verifySenderDevice(callerId, input.deviceId);

  if (input.clientMessageId) {
    const earlier = await findByClientId(db, callerId, target, input.clientMessageId);
    if (earlier) return { ...earlier, duplicate: true };
  }

  validateCiphertext(input.ciphertext);
  await checkSendRate(callerId, target);

  const peers = (
    await db
      .select({ userId: conversationParticipants.userId })
      .from(conversationParticipants)
      .where(
        and(
          eq(conversationParticipants.conversationId, conversationId),
          ne(conversationParticipants.userId, callerId)
        )
      )
  ).map((p) => p.userId);

  for (const peer of peers) {
    if (await isBlockedEitherWay(callerId, peer)) {
      throw forbidden("BLOCKED", "Cannot message this user");
    }
  }

  const { message, duplicate } = await db.transaction(async (tx) => {
    const now = new Date();
    const result = await persist(
      tx,
      {
        conversationId,
        senderUserId: callerId,
        senderDeviceId: input.deviceId,
        ciphertext: input.ciphertext,
        proto: input.proto,
        clientMessageId: input.clientMessageId ?? null,
        createdAt: now,
      },
      target,
      peers
    );
    if (!result.duplicate) {
      await tx
        .update(conversations)
        .set({ lastMessageAt: now })
        .where(eq(conversations.id, conversationId));
    }
    return result;
  });

  if (!duplicate) {
    log.debug({ conversationId, messageId: message.id }, "direct message stored");
    await notifyRecipients(peers, message);
  }
  return { ...message, duplicate };
}

// ── Groups ──

export async function sendGroupMessage(
  callerId: string,
  groupId: string,
  input: SendGroupMessageInput
): Promise<SendMessageResult> {
  assertGroupsEnabled();
  const target: RateTarget = { groupId };

  const group = await findGroup(groupId);
  await requireMember(db, groupId, callerId);
  assertOpen(group);
  await verifySenderDevice(callerId, input.deviceId);

  if (input.clientMessageId) {
    const earlier = await findByClientId(db, callerId, target, input.clientMessageId);
    if (earlier) return { ...earlier, duplicate: true };
  }

  validateCiphertext(input.ciphertext);
  if (input.groupEpoch !== group.groupEpoch) {
    throw epochStale(group.groupEpoch);
  }
  await checkSendRate(callerId, target);

  if (input.replyToMessageId) {
    const [parent] = await db
      .select({ id: messages.id })
      .from(messages)
      .where(and(eq(messages.id, input.replyToMessageId), eq(messages.groupId, groupId)))
      .limit(1);
    if (!parent) throw notFound("Reply target not found");
  }

  const outcome = await db.transaction(async (tx) => {
    // Membership changes hold this row exclusively; re-check the epoch under it.
    const [locked] = await tx
      .select({ epoch: groups.groupEpoch })
      .from(groups)
      .where(eq(groups.id, groupId))
      .for("share");
    if (!locked) throw notFound("Group not found");
    if (locked.epoch !== input.groupEpoch) throw epochStale(locked.epoch);

    const recipients = (await activeMemberIds(tx, groupId)).filter(
      (id) => id !== callerId
    );
    const now = new Date();
    const result = await persist(
      tx,
      {
        groupId,
        senderUserId: callerId,
        senderDeviceId: input.deviceId,
        ciphertext: input.ciphertext,
        proto: input.proto,
        groupEpoch: input.groupEpoch,
        replyToMessageId: input.replyToMessageId ?? null,
        clientMessageId: input.clientMessageId ?? null,
        createdAt: now,
      },
      target,
      recipients
    );
    if (!result.duplicate) {
      await tx.update(groups).set({ updatedAt: now }).where(eq(groups.id, groupId));
    }
    return { ...result, recipients };
  });

  if (!outcome.duplicate) {
    log.debug({ groupId, messageId: outcome.message.id }, "group message stored");
    await notifyRecipients(outcome.recipients, outcome.message);
  }
  return { ...outcome.message, duplicate: outcome.duplicate };
}

// ── History ──

async function page(
  target: RateTarget,
  query: MessageHistoryInput
): Promise<MessagePage> {
  const scope = targetCondition(target);
  const { limit } = query;
  const cursorId = query.before ?? query.after;

  let cursor: { id: string; createdAt: Date } | undefined;
  if (cursorId) {
    const [row] = await db
      .select({ id: messages.id, createdAt: messages.createdAt })
      .from(messages)
      .where(and(eq(messages.id, cursorId), scope))
      .limit(1);
    if (!row) throw notFound("Cursor message not found");
    cursor = row;
  }

  if (query.after && cursor) {
    const rows = await db
      .select()
      .from(messages)
      .where(
        and(
          scope,
          or(
            gt(messages.createdAt, cursor.createdAt),
            and(eq(messages.createdAt, cursor.createdAt), gt(messages.id, cursor.id))
          )
        )
      )
      .orderBy(asc(messages.createdAt), asc(messages.id))
      .limit(limit + 1);
    const hasMore = rows.length > limit;
    const items = rows.slice(0, limit);
    return { items, cursor: hasMore ? (items[items.length - 1]?.id ?? null) : null };
  }

  const rows = await db
    .select()
    .from(messages)
    .where(
      cursor
        ? and(
            scope,
            or(
              lt(messages.createdAt, cursor.createdAt),
              and(eq(messages.createdAt, cursor.createdAt), lt(messages.id, cursor.id))
            )
          )
        : scope
    )
    .orderBy(desc(messages.createdAt), desc(messages.id))
    .limit(limit + 1);

  const hasMore = rows.length > limit;
  const items = rows.slice(0, limit).reverse();
  return { items, cursor: hasMore ? (items[0]?.id ?? null) : null };
}

export async function getDirectMessages(
  callerId: string,
  conversationId: string,
  query: MessageHistoryInput
): Promise<MessagePage> {
  assertE2eeEnabled();
  await requireConversationParticipant(conversationId, callerId);
  return page({ conversationId }, query);
}

export async function getGroupMessages(
  callerId: string,
  groupId: string,
  query: MessageHistoryInput
): Promise<MessagePage> {
  assertGroupsEnabled();
  await findGroup(groupId);
  await requireMember(db, groupId, callerId);
  return page({ groupId }, query);
}

// ── Receipts ──

type ReceiptField = "deliveredAt" | "readAt";

async function stampReceipt(
  callerId: string,
  messageId: string,
  field: ReceiptField
): Promise<Date> {
  const [message] = await db
    .select({ id: messages.id })
    .from(messages)
    .where(eq(messages.id, messageId))
    .limit(1);
  if (!message) throw notFound("Message not found");

  const [receipt] = await db
    .select()
    .from(deliveryReceipts)
    .where(
      and(
        eq(deliveryReceipts.messageId, messageId),
        eq(deliveryReceipts.recipientUserId, callerId)
      )
    )
    .limit(1);
  if (!receipt) {
    throw forbidden("NOT_RECIPIENT", "You are not a recipient of this message");
  }

  const column = deliveryReceipts[field];
  const now = new Date();
  const [stamped] = await db
    .update(deliveryReceipts)
    .set(field === "deliveredAt" ? { deliveredAt: now } : { readAt: now })
    .where(and(eq(deliveryReceipts.id, receipt.id), isNull(column)))
    .returning({ at: column });
  if (stamped?.at) return stamped.at;

  const [stored] = await db
    .select({ at: column })
    .from(deliveryReceipts)
    .where(eq(deliveryReceipts.id, receipt.id))
    .limit(1);
  if (!stored?.at) {
    throw new ApiError(500, "INTERNAL", "Receipt timestamp missing after update");
  }
  return stored.at;
}

export async function markDelivered(callerId: string, messageId: string) {
  const deliveredAt = await stampReceipt(callerId, messageId, "deliveredAt");
  return { messageId, deliveredAt };
}

export async function markRead(callerId: string, messageId: string) {
  const readAt = await stampReceipt(callerId, messageId, "readAt");
  return { messageId, readAt };
}
