import {
  pgTable,
  pgEnum,
  uuid,
  varchar,
  text,
  integer,
  serial,
  boolean,
  timestamp,
  index,
} from "drizzle-orm/pg-core";
import { DEVICE_STATUS, IDENTITY_CHANGE_REASONS } from "@keyrelay/shared";
import { users } from "./users.js";

export const deviceStatusEnum = pgEnum("device_status", DEVICE_STATUS);

export const identityChangeReasonEnum = pgEnum(
  "identity_change_reason",
  IDENTITY_CHANGE_REASONS
);

export const devices = pgTable(
  "devices",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    displayName: varchar("display_name", { length: 100 }).notNull(),
    status: deviceStatusEnum("status").notNull().default("active"),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    lastSeenAt: timestamp("last_seen_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (t) => [index("devices_user_idx").on(t.userId)]
);

export const deviceRevocations = pgTable("device_revocations", {
  id: uuid("id").primaryKey().defaultRandom(),
  userId: uuid("user_id")
    .notNull()
    .references(() => users.id, { onDelete: "cascade" }),
  deviceId: uuid("device_id")
    .notNull()
    .references(() => devices.id, { onDelete: "cascade" }),
  reason: text("reason"),
  revokedAt: timestamp("revoked_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const keyBundles = pgTable("key_bundles", {
  deviceId: uuid("device_id")
    .primaryKey()
    .references(() => devices.id, { onDelete: "cascade" }),
  identityKeyPub: text("identity_key_pub").notNull(),
  signedPrekeyPub: text("signed_prekey_pub").notNull(),
  signedPrekeySig: text("signed_prekey_sig").notNull(),
  bundleVersion: integer("bundle_version").notNull().default(1),
  prekeysRemaining: integer("prekeys_remaining").notNull().default(0),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const oneTimePrekeys = pgTable(
  "one_time_prekeys",
  {
    id: serial("id").primaryKey(),
    deviceId: uuid("device_id")
      .notNull()
      .references(() => devices.id, { onDelete: "cascade" }),
    prekeyPub: text("prekey_pub").notNull(),
    claimed: boolean("claimed").notNull().default(false),
    claimedByUserId: uuid("claimed_by_user_id").references(() => users.id, {
      onDelete: "set null",
    }),
    claimedAt: timestamp("claimed_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (t) => [index("one_time_prekeys_device_idx").on(t.deviceId, t.claimed)]
);

export const identityChangeEvents = pgTable(
  "identity_change_events",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    deviceId: uuid("device_id")
      .notNull()
      .references(() => devices.id, { onDelete: "cascade" }),
    reason: identityChangeReasonEnum("reason").notNull(),
    oldFingerprint: varchar("old_fingerprint", { length: 64 }),
    newFingerprint: varchar("new_fingerprint", { length: 64 }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (t) => [
    index("identity_change_events_device_idx").on(t.deviceId, t.createdAt),
  ]
);
