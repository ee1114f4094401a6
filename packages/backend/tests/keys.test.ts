import { describe, it, expect, beforeEach, vi } from "vitest";
import { and, eq } from "drizzle-orm";
import { db } from "../src/db/connection.js";
import { conversationParticipants } from "../src/db/schema/conversations.js";
import {
  deviceRevocations,
  identityChangeEvents,
} from "../src/db/schema/devices.js";
import { config } from "../src/config.js";
import {
  claimPrekey,
  fetchKeyBundle,
  listDevices,
  revokeDevice,
} from "../src/services/keys.js";
import { findOrCreateConversation } from "../src/services/conversations.js";
import { blockUser } from "../src/services/relationships.js";
import { b64, createUser, resetDb, uploadBundle } from "./helpers/fixtures.js";

vi.mock("../src/db/connection.js", async () => {
  const { createTestDb } = await import("./helpers/db.js");
  return createTestDb();
});

const { logLines } = vi.hoisted(() => {
  const lines: string[] = [];
  return { logLines: lines };
});

vi.mock("../src/logger.js", async () => {
  const { pino } = await import("pino");
  return {
    logger: pino({ level: "warn" }, {
      write: (line: string) => {
        logLines.push(line);
      },
    }),
  };
});

describe("Key distribution", () => {
  let alice: { id: string };
  let bob: { id: string };

  beforeEach(async () => {
    await resetDb();
    alice = await createUser("alice");
    bob = await createUser("bob");
  });

  describe("uploadKeyBundle", () => {
    it("should register a new device with version 1", async () => {
      const result = await uploadBundle(alice.id, { prekeys: 3 });

      expect(result.bundleVersion).toBe(1);
      expect(result.prekeysStored).toBe(3);

      const { devices } = await listDevices(alice.id);
      expect(devices).toHaveLength(1);
      expect(devices[0]).toMatchObject({
        id: result.deviceId,
        name: "laptop",
        status: "active",
        bundleVersion: 1,
        prekeysRemaining: 3,
      });
    });

    it("should bump the version and replace the unclaimed pool on re-upload", async () => {
      const first = await uploadBundle(alice.id, { prekeys: 3 });
      const second = await uploadBundle(alice.id, {
        deviceId: first.deviceId,
        prekeys: 5,
      });

      expect(second.deviceId).toBe(first.deviceId);
      expect(second.bundleVersion).toBe(2);

      const bundle = await fetchKeyBundle(alice.id, alice.id);
      expect(bundle.devices[0]?.prekeysAvailable).toBe(5);
    });

    it("should reject an empty or oversized prekey batch", async () => {
      await expect(uploadBundle(alice.id, { prekeys: 0 })).rejects.toMatchObject({
        statusCode: 400,
        code: "INVALID_PREKEY_COUNT",
      });

      config.e2ee.prekeyPoolSize = 2;
      expect((await uploadBundle(alice.id, { prekeys: 2 })).prekeysStored).toBe(2);
      await expect(uploadBundle(alice.id, { prekeys: 3 })).rejects.toMatchObject({
        statusCode: 400,
        code: "INVALID_PREKEY_COUNT",
        details: { min: 1, max: 2 },
      });
    });

    it("should refuse a device id owned by another user", async () => {
      const { deviceId } = await uploadBundle(alice.id);

      await expect(uploadBundle(bob.id, { deviceId })).rejects.toMatchObject({
        statusCode: 403,
        code: "FORBIDDEN",
      });
    });

    it("should refuse uploads when encryption is disabled", async () => {
      config.e2ee.enabled = false;

      await expect(uploadBundle(alice.id)).rejects.toMatchObject({
        statusCode: 403,
        code: "FEATURE_DISABLED",
      });
    });
  });

  describe("identity key changes", () => {
    it("should revoke the device once the block threshold is reached", async () => {
      config.e2ee.identityChangeAlertThreshold = 2;
      config.e2ee.identityChangeBlockThreshold = 3;
      const keyA = b64("identity-a");
      const keyB = b64("identity-b");

      const { deviceId } = await uploadBundle(alice.id, { identityKey: keyA });
      await uploadBundle(alice.id, { deviceId, identityKey: keyB });
      await uploadBundle(alice.id, { deviceId, identityKey: keyA });

      await expect(
        uploadBundle(alice.id, { deviceId, identityKey: keyB })
      ).rejects.toMatchObject({
        statusCode: 409,
        code: "IDENTITY_CHANGE_BLOCKED",
        details: { deviceId },
      });

      const { devices } = await listDevices(alice.id);
      expect(devices[0]?.status).toBe("revoked");

      const events = await db
        .select({ reason: identityChangeEvents.reason })
        .from(identityChangeEvents)
        .where(eq(identityChangeEvents.deviceId, deviceId));
      expect(events.filter((e) => e.reason === "identity_change")).toHaveLength(3);
      expect(events.filter((e) => e.reason === "identity_change_block")).toHaveLength(1);

      const revocations = await db
        .select({ reason: deviceRevocations.reason })
        .from(deviceRevocations)
        .where(eq(deviceRevocations.deviceId, deviceId));
      expect(revocations).toEqual([{ reason: "identity_change_block" }]);

      await expect(
        uploadBundle(alice.id, { deviceId, identityKey: keyA })
      ).rejects.toMatchObject({ statusCode: 403, code: "DEVICE_REVOKED" });
    });

    it("should never block when the threshold is zero", async () => {
      config.e2ee.identityChangeBlockThreshold = 0;
      const { deviceId } = await uploadBundle(alice.id, { identityKey: b64("k0") });

      for (let i = 1; i <= 6; i++) {
        await uploadBundle(alice.id, { deviceId, identityKey: b64(`k${i}`) });
      }

      const { devices } = await listDevices(alice.id);
      expect(devices[0]).toMatchObject({ status: "active", bundleVersion: 7 });
    });
  });

  describe("fetchKeyBundle", () => {
    it("should require a relationship with the target", async () => {
      await uploadBundle(bob.id);

      await expect(fetchKeyBundle(alice.id, bob.id)).rejects.toMatchObject({
        statusCode: 403,
        code: "RELATIONSHIP_REQUIRED",
      });
    });

    it("should report a block before the relationship check", async () => {
      await uploadBundle(bob.id);
      await blockUser(bob.id, alice.id);

      await expect(fetchKeyBundle(alice.id, bob.id)).rejects.toMatchObject({
        statusCode: 403,
        code: "BLOCKED",
      });
    });

    it("should offer the oldest prekey without claiming it", async () => {
      const { deviceId } = await uploadBundle(bob.id, { prekeys: 3 });
      await findOrCreateConversation(alice.id, bob.id);

      const first = await fetchKeyBundle(alice.id, bob.id);
      const again = await fetchKeyBundle(alice.id, bob.id);

      expect(first.devices).toHaveLength(1);
      expect(first.devices[0]).toMatchObject({
        deviceId,
        bundleVersion: 1,
        prekeysAvailable: 3,
        prekey: { publicKey: b64("otpk-0") },
      });
      expect(again.devices[0]?.prekey?.id).toBe(first.devices[0]?.prekey?.id);
      expect(again.devices[0]?.prekeysAvailable).toBe(3);
    });

    it("should answer a stale version with the current one", async () => {
      const { deviceId } = await uploadBundle(bob.id);
      await uploadBundle(bob.id, { deviceId });
      await findOrCreateConversation(alice.id, bob.id);

      await expect(fetchKeyBundle(alice.id, bob.id, 1)).rejects.toMatchObject({
        statusCode: 409,
        code: "BUNDLE_STALE",
        headers: { "X-Bundle-Version": "2" },
      });

      const current = await fetchKeyBundle(alice.id, bob.id, 2);
      expect(current.devices[0]?.bundleVersion).toBe(2);
    });

    it("should return 404 for an unknown user", async () => {
      await expect(
        fetchKeyBundle(alice.id, "00000000-0000-4000-8000-000000000000")
      ).rejects.toMatchObject({ statusCode: 404, code: "NOT_FOUND" });
    });
  });

  describe("revokeDevice", () => {
    it("should revoke once and report repeats", async () => {
      const { deviceId } = await uploadBundle(alice.id);

      expect(await revokeDevice(alice.id, deviceId, "lost")).toEqual({
        success: true,
        alreadyRevoked: false,
      });
      expect(await revokeDevice(alice.id, deviceId)).toEqual({
        success: true,
        alreadyRevoked: true,
      });

      const rows = await db
        .select({ reason: deviceRevocations.reason })
        .from(deviceRevocations)
        .where(eq(deviceRevocations.deviceId, deviceId));
      expect(rows).toEqual([{ reason: "lost" }]);
    });

    it("should hide another user's device", async () => {
      const { deviceId } = await uploadBundle(alice.id);

      await expect(revokeDevice(bob.id, deviceId)).rejects.toMatchObject({
        statusCode: 404,
        code: "DEVICE_NOT_FOUND",
      });
    });

    it("should drop the device from bundles and conversation device lists", async () => {
      const phone = await uploadBundle(bob.id);
      const laptop = await uploadBundle(bob.id);
      const conversation = await findOrCreateConversation(alice.id, bob.id);

      await revokeDevice(bob.id, phone.deviceId);

      const bundle = await fetchKeyBundle(alice.id, bob.id);
      expect(bundle.devices.map((d) => d.deviceId)).toEqual([laptop.deviceId]);

      const [row] = await db
        .select({ deviceIds: conversationParticipants.deviceIds })
        .from(conversationParticipants)
        .where(
          and(
            eq(conversationParticipants.conversationId, conversation.id),
            eq(conversationParticipants.userId, bob.id)
          )
        );
      expect(row?.deviceIds).toEqual([laptop.deviceId]);
    });
  });

  describe("claimPrekey", () => {
    it("should hand each prekey out once", async () => {
      const { deviceId } = await uploadBundle(bob.id, { prekeys: 3 });
      await findOrCreateConversation(alice.id, bob.id);
      const offered = (await fetchKeyBundle(alice.id, bob.id)).devices[0]?.prekey;
      if (!offered) throw new Error("expected an offered prekey");

      const claim = await claimPrekey(alice.id, { deviceId, prekeyId: offered.id });
      expect(claim).toEqual({
        claimed: true,
        prekeyId: offered.id,
        publicKey: b64("otpk-0"),
        prekeysRemaining: 2,
      });

      await expect(
        claimPrekey(alice.id, { deviceId, prekeyId: offered.id })
      ).rejects.toMatchObject({ statusCode: 404, code: "PREKEY_NOT_FOUND" });

      const { devices } = await listDevices(bob.id);
      expect(devices[0]?.prekeysRemaining).toBe(2);
    });

    it("should count a claim out of the next fetch", async () => {
      const { deviceId } = await uploadBundle(bob.id, { prekeys: 2 });
      await findOrCreateConversation(alice.id, bob.id);

      const before = (await fetchKeyBundle(alice.id, bob.id)).devices[0];
      expect(before).toMatchObject({ prekeysAvailable: 2, bundleVersion: 1 });
      if (!before?.prekey) throw new Error("expected an offered prekey");

      await claimPrekey(alice.id, { deviceId, prekeyId: before.prekey.id });

      const after = (await fetchKeyBundle(alice.id, bob.id)).devices[0];
      expect(after?.prekeysAvailable).toBe(1);
      expect(after?.prekey?.id).not.toBe(before.prekey.id);
    });

    it("should let exactly one of two racing claims win", async () => {
      const { deviceId } = await uploadBundle(bob.id, { prekeys: 2 });
      await findOrCreateConversation(alice.id, bob.id);
      const carol = await createUser("carol");
      await findOrCreateConversation(carol.id, bob.id);
      const offered = (await fetchKeyBundle(alice.id, bob.id)).devices[0]?.prekey;
      if (!offered) throw new Error("expected an offered prekey");

      const results = await Promise.allSettled([
        claimPrekey(alice.id, { deviceId, prekeyId: offered.id }),
        claimPrekey(carol.id, { deviceId, prekeyId: offered.id }),
      ]);

      expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
      const failures = results.flatMap((r) =>
        r.status === "rejected" ? [r.reason] : []
      );
      expect(failures).toHaveLength(1);
      expect(failures[0]).toMatchObject({ code: "PREKEY_NOT_FOUND" });
    });

    it("should signal exhaustion with the bundle version", async () => {
      const { deviceId } = await uploadBundle(bob.id, { prekeys: 1 });
      await findOrCreateConversation(alice.id, bob.id);
      const offered = (await fetchKeyBundle(alice.id, bob.id)).devices[0]?.prekey;
      if (!offered) throw new Error("expected an offered prekey");

      await claimPrekey(alice.id, { deviceId, prekeyId: offered.id });

      await expect(
        claimPrekey(alice.id, { deviceId, prekeyId: offered.id })
      ).rejects.toMatchObject({
        statusCode: 409,
        code: "PREKEYS_EXHAUSTED",
        headers: { "X-Bundle-Version": "1" },
      });
    });

    it("should reject claims against a revoked device", async () => {
      const { deviceId } = await uploadBundle(bob.id);
      await findOrCreateConversation(alice.id, bob.id);
      await revokeDevice(bob.id, deviceId);

      await expect(
        claimPrekey(alice.id, { deviceId, prekeyId: 1 })
      ).rejects.toMatchObject({ statusCode: 409, code: "DEVICE_REVOKED" });
    });

    it("should audit a revoked-device claim against the caller", async () => {
      const { deviceId } = await uploadBundle(bob.id);
      await findOrCreateConversation(alice.id, bob.id);
      await revokeDevice(bob.id, deviceId);
      logLines.length = 0;

      await expect(
        claimPrekey(alice.id, { deviceId, prekeyId: 1 })
      ).rejects.toMatchObject({ code: "DEVICE_REVOKED" });

      const entries: unknown[] = logLines.map((line) => JSON.parse(line));
      expect(entries).toEqual([
        expect.objectContaining({
          audit: true,
          event: "device_revoked_rejected",
          module: "keys",
          userId: alice.id,
          deviceId,
        }),
      ]);
    });

    it("should report an unknown device", async () => {
      await expect(
        claimPrekey(alice.id, {
          deviceId: "00000000-0000-4000-8000-000000000000",
          prekeyId: 1,
        })
      ).rejects.toMatchObject({ statusCode: 404, code: "DEVICE_NOT_FOUND" });
    });
  });
});
