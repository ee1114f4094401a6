import {
  pgTable,
  uuid,
  varchar,
  text,
  integer,
  timestamp,
  uniqueIndex,
  index,
  check,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import { users } from "./users.js";
import { devices } from "./devices.js";
import { conversations } from "./conversations.js";
import { groups } from "./groups.js";

export const messages = pgTable(
  "messages",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    conversationId: uuid("conversation_id").references(() => conversations.id, {
      onDelete: "cascade",
    }),
    groupId: uuid("group_id").references(() => groups.id, {
      onDelete: "cascade",
    }),
    senderUserId: uuid("sender_user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    senderDeviceId: uuid("sender_device_id")
      .notNull()
      .references(() => devices.id, { onDelete: "cascade" }),
    ciphertext: text("ciphertext").notNull(),
    proto: integer("proto").notNull(),
    groupEpoch: integer("group_epoch"),
    replyToMessageId: uuid("reply_to_message_id"),
    clientMessageId: varchar("client_message_id", { length: 128 }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (t) => [
    uniqueIndex("messages_dm_client_id_idx").on(
      t.senderUserId,
      t.conversationId,
      t.clientMessageId
    ),
    uniqueIndex("messages_group_client_id_idx").on(
      t.senderUserId,
      t.groupId,
      t.clientMessageId
    ),
    index("messages_conversation_idx").on(t.conversationId, t.createdAt),
    index("messages_group_idx").on(t.groupId, t.createdAt),
    index("messages_sender_idx").on(t.senderUserId, t.createdAt),
    check(
      "messages_target_check",
      sql`(${t.conversationId} IS NULL) <> (${t.groupId} IS NULL)`
    ),
  ]
);

export const deliveryReceipts = pgTable(
  "delivery_receipts",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    messageId: uuid("message_id")
      .notNull()
      .references(() => messages.id, { onDelete: "cascade" }),
    recipientUserId: uuid("recipient_user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    deliveredAt: timestamp("delivered_at", { withTimezone: true }),
    readAt: timestamp("read_at", { withTimezone: true }),
  },
  (t) => [
    uniqueIndex("delivery_receipts_recipient_idx").on(
      t.messageId,
      t.recipientUserId
    ),
    index("delivery_receipts_user_idx").on(t.recipientUserId),
  ]
);
