import { eq, and, asc, desc, gte, inArray, sql } from "drizzle-orm";
import type {
  ClaimPrekeyInput,
  ClaimPrekeyResult,
  Device,
  DeviceKeyBundle,
  UploadKeyBundleInput,
  UploadKeyBundleResult,
} from "@keyrelay/shared";
import { config } from "../config.js";
import { db, type Executor } from "../db/connection.js";
import {
  devices,
  deviceRevocations,
  keyBundles,
  oneTimePrekeys,
  identityChangeEvents,
} from "../db/schema/devices.js";
import { conversationParticipants } from "../db/schema/conversations.js";
import { ApiError, badRequest, conflict, forbidden, notFound } from "../errors.js";
import { keyFingerprint } from "../lib/crypto.js";
import { logger } from "../logger.js";
import {
  userExists,
  isBlockedEitherWay,
  hasRelationship,
} from "./relationships.js";

const log = logger.child({ module: "keys" });

function audit(event: string, fields: Record<string, unknown>, msg: string) {
  log.warn({ audit: true, event, ...fields }, msg);
}

export function assertE2eeEnabled() {
  if (!config.e2ee.enabled) {
    throw forbidden("FEATURE_DISABLED", "End-to-end encryption is disabled");
  }
}

export function deviceRevokedError(
  statusCode: 403 | 409,
  userId: string,
  deviceId: string
) {
  audit("device_revoked_rejected", { userId, deviceId }, "request from revoked device rejected");
  return new ApiError(statusCode, "DEVICE_REVOKED", "Device has been revoked");
}

async function unclaimedCount(deviceId: string, executor: Executor) {
  const [row] = await executor
    .select({ count: sql<number>`count(*)::int` })
    .from(oneTimePrekeys)
    .where(
      and(eq(oneTimePrekeys.deviceId, deviceId), eq(oneTimePrekeys.claimed, false))
    );
  return row?.count ?? 0;
}

// ── Participant device projection ──

export async function activeDeviceIds(
  userId: string,
  executor: Executor = db
): Promise<string[]> {
  const rows = await executor
    .select({ id: devices.id })
    .from(devices)
    .where(and(eq(devices.userId, userId), eq(devices.status, "active")))
    .orderBy(asc(devices.createdAt));
  return rows.map((r) => r.id);
}

/** Re-derive the cached device list on every conversation the user is in. */
export async function refreshParticipantDevices(
  userId: string,
  executor: Executor = db
): Promise<string[]> {
  const ids = await activeDeviceIds(userId, executor);
  await executor
    .update(conversationParticipants)
    .set({ deviceIds: ids })
    .where(eq(conversationParticipants.userId, userId));
  return ids;
}

// ── Upload ──

type UploadOutcome =
  | { blocked: false; result: UploadKeyBundleResult }
  | { blocked: true; deviceId: string; changes: number };

export async function uploadKeyBundle(
  userId: string,
  input: UploadKeyBundleInput
): Promise<UploadKeyBundleResult> {
  assertE2eeEnabled();

  const poolSize = config.e2ee.prekeyPoolSize;
  const prekeyCount = input.oneTimePrekeys.length;
  if (prekeyCount === 0 || prekeyCount > poolSize) {
    throw badRequest(
      "INVALID_PREKEY_COUNT",
      `Between 1 and ${poolSize} one-time prekeys are required`,
      { details: { min: 1, max: poolSize } }
    );
  }

  const outcome = await db.transaction(async (tx): Promise<UploadOutcome> => {
    const now = new Date();
    const deviceId = await resolveUploadDevice(tx, userId, input, now);

    const [existing] = await tx
      .select()
      .from(keyBundles)
      .where(eq(keyBundles.deviceId, deviceId))
      .for("update");

    if (existing && existing.identityKeyPub !== input.identityKey) {
      const changes = await recordIdentityChange(tx, {
        userId,
        deviceId,
        oldKey: existing.identityKeyPub,
        newKey: input.identityKey,
        now,
      });
      const blockAt = config.e2ee.identityChangeBlockThreshold;
      if (blockAt > 0 && changes >= blockAt) {
        await tx
          .update(devices)
          .set({ status: "revoked" })
          .where(eq(devices.id, deviceId));
        await tx.insert(deviceRevocations).values({
          userId,
          deviceId,
          reason: "identity_change_block",
          revokedAt: now,
        });
        await tx.insert(identityChangeEvents).values({
          userId,
          deviceId,
          reason: "identity_change_block",
          oldFingerprint: keyFingerprint(existing.identityKeyPub),
          newFingerprint: keyFingerprint(input.identityKey),
          createdAt: now,
        });
        return { blocked: true, deviceId, changes };
      }
    }

    const [bundle] = await tx
      .insert(keyBundles)
      .values({
        deviceId,
        identityKeyPub: input.identityKey,
        signedPrekeyPub: input.signedPrekey,
        signedPrekeySig: input.signedPrekeySig,
        bundleVersion: 1,
        prekeysRemaining: prekeyCount,
        createdAt: now,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: keyBundles.deviceId,
        set: {
          identityKeyPub: input.identityKey,
          signedPrekeyPub: input.signedPrekey,
          signedPrekeySig: input.signedPrekeySig,
          bundleVersion: sql`${keyBundles.bundleVersion} + 1`,
          prekeysRemaining: prekeyCount,
          updatedAt: now,
        },
      })
      .returning({ bundleVersion: keyBundles.bundleVersion });

    // Claimed rows stay for audit; only the unclaimed pool is replaced.
    await tx
      .delete(oneTimePrekeys)
      .where(
        and(
          eq(oneTimePrekeys.deviceId, deviceId),
          eq(oneTimePrekeys.claimed, false)
        )
      );
    await tx.insert(oneTimePrekeys).values(
      input.oneTimePrekeys.map((prekeyPub) => ({
        deviceId,
        prekeyPub,
        createdAt: now,
      }))
    );

    return {
      blocked: false,
      result: {
        deviceId,
        bundleVersion: bundle?.bundleVersion ?? 1,
        prekeysStored: prekeyCount,
      },
    };
  });

  if (outcome.blocked) {
    audit(
      "identity_change_block",
      { userId, deviceId: outcome.deviceId, changes: outcome.changes },
      "device revoked after repeated identity key changes"
    );
    throw conflict(
      "IDENTITY_CHANGE_BLOCKED",
      "Too many identity key changes; the device has been revoked",
      { details: { deviceId: outcome.deviceId } }
    );
  }

  log.info(
    {
      userId,
      deviceId: outcome.result.deviceId,
      bundleVersion: outcome.result.bundleVersion,
      prekeys: prekeyCount,
    },
    "key bundle stored"
  );
  return outcome.result;
}

async function resolveUploadDevice(
  tx: Executor,
  userId: string,
  input: UploadKeyBundleInput,
  now: Date
): Promise<string> {
  if (!input.deviceId) {
    const [created] = await tx
      .insert(devices)
      .values({
        userId,
        displayName: input.deviceName,
        createdAt: now,
        lastSeenAt: now,
      })
      .returning({ id: devices.id });
    if (!created) throw new Error("Device insert returned no row");
    return created.id;
  }

  await tx
    .insert(devices)
    .values({
      id: input.deviceId,
      userId,
      displayName: input.deviceName,
      createdAt: now,
      lastSeenAt: now,
    })
    .onConflictDoNothing();

  const [device] = await tx
    .select()
    .from(devices)
    .where(eq(devices.id, input.deviceId))
    .for("update");
  if (!device) throw new Error("Device vanished during upload");

  if (device.userId !== userId) {
    throw forbidden("FORBIDDEN", "Device belongs to another user");
  }
  if (device.status === "revoked") {
    throw deviceRevokedError(403, userId, device.id);
  }

  await tx
    .update(devices)
    .set({ displayName: input.deviceName, lastSeenAt: now })
    .where(eq(devices.id, device.id));
  return device.id;
}

/** Appends an identity-change event and returns the device's count in the window. */
async function recordIdentityChange(
  tx: Executor,
  change: {
    userId: string;
    deviceId: string;
    oldKey: string;
    newKey: string;
    now: Date;
  }
): Promise<number> {
  const { userId, deviceId, now } = change;
  const oldFingerprint = keyFingerprint(change.oldKey);
  const newFingerprint = keyFingerprint(change.newKey);

  await tx.insert(identityChangeEvents).values({
    userId,
    deviceId,
    reason: "identity_change",
    oldFingerprint,
    newFingerprint,
    createdAt: now,
  });

  const windowStart = new Date(
    now.getTime() - config.e2ee.identityChangeWindowHours * 3_600_000
  );
  const [row] = await tx
    .select({ count: sql<number>`count(*)::int` })
    .from(identityChangeEvents)
    .where(
      and(
        eq(identityChangeEvents.deviceId, deviceId),
        eq(identityChangeEvents.reason, "identity_change"),
        gte(identityChangeEvents.createdAt, windowStart)
      )
    );
  const changes = row?.count ?? 0;

  audit(
    "identity_change",
    { userId, deviceId, oldFingerprint, newFingerprint, changes },
    "identity key changed"
  );

  const alertAt = config.e2ee.identityChangeAlertThreshold;
  if (alertAt > 0 && changes >= alertAt) {
    audit(
      "identity_change_alert",
      { userId, deviceId, changes },
      "identity key change rate above alert threshold"
    );
  }
  return changes;
}

// ── Fetch ──

export async function fetchKeyBundle(
  callerId: string,
  targetUserId: string,
  knownBundleVersion?: number
): Promise<{ devices: DeviceKeyBundle[] }> {
  assertE2eeEnabled();

  if (!(await userExists(targetUserId))) {
    throw notFound("User not found");
  }
  if (callerId !== targetUserId) {
    if (await isBlockedEitherWay(callerId, targetUserId)) {
      throw forbidden("BLOCKED", "Cannot fetch keys for this user");
    }
    if (!(await hasRelationship(callerId, targetUserId))) {
      throw forbidden(
        "RELATIONSHIP_REQUIRED",
        "A conversation or shared group is required before fetching keys"
      );
    }
  }

  await refreshParticipantDevices(targetUserId);

  const rows = await db
    .select({
      deviceId: devices.id,
      name: devices.displayName,
      identityKey: keyBundles.identityKeyPub,
      signedPrekey: keyBundles.signedPrekeyPub,
      signedPrekeySig: keyBundles.signedPrekeySig,
      bundleVersion: keyBundles.bundleVersion,
    })
    .from(devices)
    .innerJoin(keyBundles, eq(keyBundles.deviceId, devices.id))
    .where(and(eq(devices.userId, targetUserId), eq(devices.status, "active")))
    .orderBy(asc(devices.createdAt));

  if (knownBundleVersion !== undefined && rows.length > 0) {
    const current = Math.max(...rows.map((r) => r.bundleVersion));
    if (knownBundleVersion < current) {
      throw conflict("BUNDLE_STALE", "Key bundle version is stale", {
        headers: { "X-Bundle-Version": String(current) },
        details: { bundleVersion: current },
      });
    }
  }

  const deviceIds = rows.map((r) => r.deviceId);
  const available = new Map<string, number>();
  const offered = new Map<string, { id: number; publicKey: string }>();

  if (deviceIds.length > 0) {
    const counts = await db
      .select({
        deviceId: oneTimePrekeys.deviceId,
        count: sql<number>`count(*)::int`,
      })
      .from(oneTimePrekeys)
      .where(
        and(
          inArray(oneTimePrekeys.deviceId, deviceIds),
          eq(oneTimePrekeys.claimed, false)
        )
      )
      .groupBy(oneTimePrekeys.deviceId);
    for (const c of counts) available.set(c.deviceId, c.count);

    const oldest = await db
      .selectDistinctOn([oneTimePrekeys.deviceId], {
        deviceId: oneTimePrekeys.deviceId,
        id: oneTimePrekeys.id,
        publicKey: oneTimePrekeys.prekeyPub,
      })
      .from(oneTimePrekeys)
      .where(
        and(
          inArray(oneTimePrekeys.deviceId, deviceIds),
          eq(oneTimePrekeys.claimed, false)
        )
      )
      .orderBy(oneTimePrekeys.deviceId, asc(oneTimePrekeys.id));
    for (const p of oldest) {
      offered.set(p.deviceId, { id: p.id, publicKey: p.publicKey });
    }
  }

  return {
    devices: rows.map((r) => ({
      ...r,
      prekeysAvailable: available.get(r.deviceId) ?? 0,
      prekey: offered.get(r.deviceId) ?? null,
    })),
  };
}

// ── Device registry ──

export async function listDevices(userId: string): Promise<{ devices: Device[] }> {
  assertE2eeEnabled();

  const rows = await db
    .select({
      id: devices.id,
      name: devices.displayName,
      status: devices.status,
      createdAt: devices.createdAt,
      lastSeenAt: devices.lastSeenAt,
      bundleVersion: keyBundles.bundleVersion,
      prekeysRemaining: keyBundles.prekeysRemaining,
    })
    .from(devices)
    .leftJoin(keyBundles, eq(keyBundles.deviceId, devices.id))
    .where(eq(devices.userId, userId))
    .orderBy(desc(devices.createdAt));

  return { devices: rows };
}

export async function revokeDevice(
  userId: string,
  deviceId: string,
  reason?: string
) {
  assertE2eeEnabled();

  const alreadyRevoked = await db.transaction(async (tx) => {
    const [device] = await tx
      .select()
      .from(devices)
      .where(and(eq(devices.id, deviceId), eq(devices.userId, userId)))
      .for("update");
    if (!device) throw notFound("Device not found", "DEVICE_NOT_FOUND");
    if (device.status === "revoked") return true;

    const now = new Date();
    await tx
      .update(devices)
      .set({ status: "revoked" })
      .where(eq(devices.id, deviceId));
    await tx.insert(deviceRevocations).values({
      userId,
      deviceId,
      reason: reason ?? null,
      revokedAt: now,
    });
    await refreshParticipantDevices(userId, tx);
    return false;
  });

  if (!alreadyRevoked) {
    audit("device_revoked", { userId, deviceId, reason }, "device revoked");
  }
  return { success: true, alreadyRevoked };
}

// ── One-time prekey pool ──

export async function claimPrekey(
  callerId: string,
  input: ClaimPrekeyInput
): Promise<ClaimPrekeyResult> {
  assertE2eeEnabled();
  const { deviceId, prekeyId } = input;

  const [device] = await db
    .select()
    .from(devices)
    .where(eq(devices.id, deviceId))
    .limit(1);
  if (!device) throw notFound("Device not found", "DEVICE_NOT_FOUND");
  if (device.status === "revoked") {
    throw deviceRevokedError(409, callerId, device.id);
  }
  if (device.userId !== callerId) {
    if (await isBlockedEitherWay(callerId, device.userId)) {
      throw forbidden("BLOCKED", "Cannot claim keys for this user");
    }
    if (!(await hasRelationship(callerId, device.userId))) {
      throw forbidden(
        "RELATIONSHIP_REQUIRED",
        "A conversation or shared group is required before claiming keys"
      );
    }
  }

  return db.transaction(async (tx): Promise<ClaimPrekeyResult> => {
    // Serializes claims per device so the recomputed count is exact.
    const [bundle] = await tx
      .select({ bundleVersion: keyBundles.bundleVersion })
      .from(keyBundles)
      .where(eq(keyBundles.deviceId, deviceId))
      .for("update");

    const [claimed] = await tx
      .update(oneTimePrekeys)
      .set({ claimed: true, claimedByUserId: callerId, claimedAt: new Date() })
      .where(
        and(
          eq(oneTimePrekeys.id, prekeyId),
          eq(oneTimePrekeys.deviceId, deviceId),
          eq(oneTimePrekeys.claimed, false)
        )
      )
      .returning({ id: oneTimePrekeys.id, publicKey: oneTimePrekeys.prekeyPub });

    const remaining = await unclaimedCount(deviceId, tx);

    if (!claimed) {
      if (remaining === 0) {
        throw conflict("PREKEYS_EXHAUSTED", "No one-time prekeys remain", {
          headers: bundle
            ? { "X-Bundle-Version": String(bundle.bundleVersion) }
            : {},
          details: { bundleVersion: bundle?.bundleVersion ?? null },
        });
      }
      throw notFound("Prekey not found or already claimed", "PREKEY_NOT_FOUND");
    }

    await tx
      .update(keyBundles)
      .set({ prekeysRemaining: remaining })
      .where(eq(keyBundles.deviceId, deviceId));

    if (remaining <= config.e2ee.otpkCriticalWatermark) {
      log.warn({ deviceId, remaining }, "one-time prekey pool critical");
    }

    return {
      claimed: true,
      prekeyId: claimed.id,
      publicKey: claimed.publicKey,
      prekeysRemaining: remaining,
    };
  });
}
