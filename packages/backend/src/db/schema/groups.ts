import {
  pgTable,
  pgEnum,
  uuid,
  varchar,
  text,
  integer,
  boolean,
  timestamp,
  uniqueIndex,
  index,
  check,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import { GROUP_ROLES, INVITE_TYPES } from "@keyrelay/shared";
import { users } from "./users.js";

export const groupRoleEnum = pgEnum("group_role", GROUP_ROLES);

export const inviteTypeEnum = pgEnum("invite_type", INVITE_TYPES);

export const groups = pgTable("groups", {
  id: uuid("id").primaryKey().defaultRandom(),
  title: varchar("title", { length: 100 }).notNull(),
  about: text("about").notNull().default(""),
  createdBy: uuid("created_by")
    .notNull()
    .references(() => users.id, { onDelete: "cascade" }),
  maxParticipants: integer("max_participants").notNull(),
  groupEpoch: integer("group_epoch").notNull().default(0),
  memberCount: integer("member_count").notNull().default(0),
  isClosed: boolean("is_closed").notNull().default(false),
  epochChangedAt: timestamp("epoch_changed_at", { withTimezone: true }),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const groupParticipants = pgTable(
  "group_participants",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    groupId: uuid("group_id")
      .notNull()
      .references(() => groups.id, { onDelete: "cascade" }),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    role: groupRoleEnum("role").notNull().default("member"),
    isBanned: boolean("is_banned").notNull().default(false),
    joinedAt: timestamp("joined_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    muteUntil: timestamp("mute_until", { withTimezone: true }),
  },
  (t) => [
    uniqueIndex("group_participants_member_idx").on(t.groupId, t.userId),
    index("group_participants_user_idx").on(t.userId),
  ]
);

export const groupBans = pgTable(
  "group_bans",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    groupId: uuid("group_id")
      .notNull()
      .references(() => groups.id, { onDelete: "cascade" }),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    bannedBy: uuid("banned_by").references(() => users.id, {
      onDelete: "set null",
    }),
    reason: text("reason"),
    bannedAt: timestamp("banned_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (t) => [uniqueIndex("group_bans_member_idx").on(t.groupId, t.userId)]
);

export const groupInvites = pgTable(
  "group_invites",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    groupId: uuid("group_id")
      .notNull()
      .references(() => groups.id, { onDelete: "cascade" }),
    createdBy: uuid("created_by")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    type: inviteTypeEnum("type").notNull(),
    code: varchar("code", { length: 32 }).notNull().unique(),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
    maxUses: integer("max_uses"),
    uses: integer("uses").notNull().default(0),
    targetUserId: uuid("target_user_id").references(() => users.id, {
      onDelete: "cascade",
    }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (t) => [
    index("group_invites_group_idx").on(t.groupId),
    check(
      "group_invites_target_check",
      sql`(${t.type} = 'direct') = (${t.targetUserId} IS NOT NULL)`
    ),
  ]
);
