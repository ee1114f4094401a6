import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { RealtimeEvent } from "@keyrelay/shared";
import { config } from "../src/config.js";
import { setPublisher } from "../src/realtime/publisher.js";
import {
  addMembers,
  banMember,
  closeGroup,
  createGroup,
  demoteAdmin,
  getGroup,
  leaveGroup,
  listGroups,
  listMembers,
  muteGroup,
  promoteMember,
  removeMember,
  transferOwnership,
  unbanMember,
  updateGroup,
} from "../src/services/groups.js";
import { createUser, resetDb } from "./helpers/fixtures.js";

vi.mock("../src/db/connection.js", async () => {
  const { createTestDb } = await import("./helpers/db.js");
  return createTestDb();
});

describe("Groups", () => {
  let owner: { id: string };
  let alice: { id: string };
  let bob: { id: string };
  let published: { topic: string; event: RealtimeEvent }[];

  beforeEach(async () => {
    await resetDb();
    owner = await createUser("owner");
    alice = await createUser("alice");
    bob = await createUser("bob");
    published = [];
    setPublisher((topic, event) => {
      published.push({ topic, event });
    });
  });

  afterEach(() => {
    setPublisher(null);
  });

  async function groupWithMembers(...memberIds: string[]) {
    const group = await createGroup(owner.id, { title: "Book club" });
    if (memberIds.length > 0) await addMembers(owner.id, group.id, memberIds);
    published = [];
    return group;
  }

  describe("createGroup", () => {
    it("should start at epoch 0 with the creator as owner", async () => {
      const group = await createGroup(owner.id, { title: "Book club", about: "monthly" });

      expect(group).toMatchObject({
        title: "Book club",
        about: "monthly",
        epoch: 0,
        memberCount: 1,
        isClosed: false,
        myRole: "owner",
        maxParticipants: config.groups.maxParticipants,
      });
      expect((await listGroups(owner.id)).items.map((g) => g.id)).toEqual([group.id]);
    });

    it("should refuse when groups are disabled", async () => {
      config.groups.enabled = false;

      await expect(createGroup(owner.id, { title: "x" })).rejects.toMatchObject({
        statusCode: 403,
        code: "FEATURE_DISABLED",
      });
    });
  });

  describe("updateGroup", () => {
    it("should let managers edit and leave the epoch alone", async () => {
      const group = await groupWithMembers(alice.id);

      const updated = await updateGroup(owner.id, group.id, { title: "Reading circle" });
      expect(updated).toMatchObject({ title: "Reading circle", about: "", epoch: 1 });

      await expect(
        updateGroup(alice.id, group.id, { title: "Mine now" })
      ).rejects.toMatchObject({ statusCode: 403, code: "FORBIDDEN" });
    });
  });

  describe("addMembers", () => {
    it("should admit new members and advance the epoch once", async () => {
      const group = await groupWithMembers();

      const result = await addMembers(owner.id, group.id, [alice.id, bob.id, alice.id]);

      expect(result).toEqual({ addedUserIds: [alice.id, bob.id], epoch: 1 });
      expect(await getGroup(alice.id, group.id)).toMatchObject({
        epoch: 1,
        memberCount: 3,
        myRole: "member",
      });
      expect(published.map((p) => p.topic).sort()).toEqual(
        [`user:${owner.id}`, `user:${alice.id}`, `user:${bob.id}`].sort()
      );
      expect(published[0]?.event).toEqual({
        type: "epoch_changed",
        groupId: group.id,
        epoch: 1,
        reason: "member_added",
      });
    });

    it("should not advance the epoch when nobody new is added", async () => {
      const group = await groupWithMembers(alice.id);

      const result = await addMembers(owner.id, group.id, [alice.id, owner.id]);

      expect(result).toEqual({ addedUserIds: [], epoch: 1 });
      expect(published).toEqual([]);
    });

    it("should only let managers add", async () => {
      const group = await groupWithMembers(alice.id);

      await expect(addMembers(alice.id, group.id, [bob.id])).rejects.toMatchObject({
        statusCode: 403,
        code: "FORBIDDEN",
      });
    });

    it("should enforce the participant cap", async () => {
      config.groups.maxParticipants = 2;
      const group = await groupWithMembers();

      await expect(
        addMembers(owner.id, group.id, [alice.id, bob.id])
      ).rejects.toMatchObject({
        statusCode: 409,
        code: "GROUP_FULL",
        details: { maxParticipants: 2, memberCount: 1 },
      });
      expect((await getGroup(owner.id, group.id)).epoch).toBe(0);
    });

    it("should refuse additions to a closed group", async () => {
      const group = await groupWithMembers();
      await closeGroup(owner.id, group.id);

      await expect(addMembers(owner.id, group.id, [alice.id])).rejects.toMatchObject({
        statusCode: 403,
        code: "GROUP_CLOSED",
      });
    });
  });

  describe("removeMember and leaveGroup", () => {
    it("should remove a member and notify them of the new epoch", async () => {
      const group = await groupWithMembers(alice.id, bob.id);

      expect(await removeMember(owner.id, group.id, alice.id)).toEqual({
        success: true,
        epoch: 2,
      });

      expect(published.map((p) => p.topic)).toContain(`user:${alice.id}`);
      await expect(getGroup(alice.id, group.id)).rejects.toMatchObject({
        statusCode: 403,
        code: "NOT_MEMBER",
      });
      expect((await getGroup(owner.id, group.id)).memberCount).toBe(2);
    });

    it("should protect the owner", async () => {
      const group = await groupWithMembers(alice.id);
      await promoteMember(owner.id, group.id, alice.id);

      await expect(removeMember(alice.id, group.id, owner.id)).rejects.toMatchObject({
        statusCode: 403,
        code: "FORBIDDEN",
      });
      await expect(leaveGroup(owner.id, group.id)).rejects.toMatchObject({
        statusCode: 403,
        code: "FORBIDDEN",
      });
    });

    it("should advance the epoch when a member leaves", async () => {
      const group = await groupWithMembers(alice.id);

      expect(await leaveGroup(alice.id, group.id)).toEqual({ success: true, epoch: 2 });
      expect(published[0]?.event).toMatchObject({ reason: "member_left", epoch: 2 });
    });
  });

  describe("banMember and unbanMember", () => {
    it("should ban a member and keep them out until unbanned and re-added", async () => {
      const group = await groupWithMembers(alice.id, bob.id);

      expect(await banMember(owner.id, group.id, alice.id, "spam")).toEqual({
        success: true,
        epoch: 2,
      });
      const members = await listMembers(owner.id, group.id);
      expect(members.items.map((m) => m.userId).sort()).toEqual(
        [owner.id, bob.id].sort()
      );

      expect(await addMembers(owner.id, group.id, [alice.id])).toEqual({
        addedUserIds: [],
        epoch: 2,
      });

      expect(await unbanMember(owner.id, group.id, alice.id)).toEqual({ success: true });
      expect((await getGroup(owner.id, group.id)).epoch).toBe(2);
      await expect(getGroup(alice.id, group.id)).rejects.toMatchObject({
        code: "NOT_MEMBER",
      });

      expect(await addMembers(owner.id, group.id, [alice.id])).toEqual({
        addedUserIds: [alice.id],
        epoch: 3,
      });
    });

    it("should advance the epoch when banning a non-member", async () => {
      const group = await groupWithMembers(alice.id);

      expect(await banMember(owner.id, group.id, bob.id)).toEqual({
        success: true,
        epoch: 2,
      });
      expect((await getGroup(owner.id, group.id)).memberCount).toBe(2);
    });

    it("should report an unban for someone who is not banned", async () => {
      const group = await groupWithMembers(alice.id);

      await expect(unbanMember(owner.id, group.id, bob.id)).rejects.toMatchObject({
        statusCode: 404,
      });
    });
  });

  describe("roles", () => {
    it("should promote once and treat a repeat as a no-op", async () => {
      const group = await groupWithMembers(alice.id);

      expect(await promoteMember(owner.id, group.id, alice.id)).toEqual({
        success: true,
        role: "admin",
        changed: true,
      });
      expect(await promoteMember(owner.id, group.id, alice.id)).toEqual({
        success: true,
        role: "admin",
        changed: false,
      });
      expect((await getGroup(owner.id, group.id)).epoch).toBe(1);
      expect(published).toEqual([]);
    });

    it("should reserve demotion for the owner", async () => {
      const group = await groupWithMembers(alice.id, bob.id);
      await promoteMember(owner.id, group.id, alice.id);
      await promoteMember(owner.id, group.id, bob.id);

      await expect(demoteAdmin(alice.id, group.id, bob.id)).rejects.toMatchObject({
        statusCode: 403,
        code: "FORBIDDEN",
      });
      expect(await demoteAdmin(owner.id, group.id, bob.id)).toEqual({
        success: true,
        role: "member",
        changed: true,
      });
      expect((await getGroup(owner.id, group.id)).epoch).toBe(1);
      expect(published).toEqual([]);
    });

    it("should not change the owner's role through promote", async () => {
      const group = await groupWithMembers(alice.id);
      await promoteMember(owner.id, group.id, alice.id);

      await expect(promoteMember(alice.id, group.id, owner.id)).rejects.toMatchObject({
        statusCode: 403,
        code: "FORBIDDEN",
      });
    });

    it("should transfer ownership without a rekey", async () => {
      const group = await groupWithMembers(alice.id);

      expect(await transferOwnership(owner.id, group.id, alice.id)).toEqual({
        success: true,
        ownerId: alice.id,
      });

      expect(await getGroup(alice.id, group.id)).toMatchObject({
        myRole: "owner",
        epoch: 1,
      });
      expect((await getGroup(owner.id, group.id)).myRole).toBe("admin");
      expect(published).toEqual([]);
    });
  });

  describe("muteGroup and closeGroup", () => {
    it("should store a mute deadline for the caller only", async () => {
      const group = await groupWithMembers(alice.id);
      const until = new Date("2030-01-01T00:00:00Z");

      expect(await muteGroup(alice.id, group.id, until)).toEqual({
        success: true,
        muteUntil: until,
      });

      const members = await listMembers(owner.id, group.id);
      const byUser = new Map(members.items.map((m) => [m.userId, m.muteUntil]));
      expect(byUser.get(alice.id)).toEqual(until);
      expect(byUser.get(owner.id)).toBeNull();
      expect((await getGroup(alice.id, group.id)).epoch).toBe(1);
      expect(published).toEqual([]);
    });

    it("should report an unknown group before checking membership", async () => {
      await expect(
        muteGroup(alice.id, "00000000-0000-4000-8000-000000000000", null)
      ).rejects.toMatchObject({ statusCode: 404 });
    });

    it("should only let the owner close the group", async () => {
      const group = await groupWithMembers(alice.id);
      await promoteMember(owner.id, group.id, alice.id);

      await expect(closeGroup(alice.id, group.id)).rejects.toMatchObject({
        code: "FORBIDDEN",
      });
      expect(await closeGroup(owner.id, group.id)).toEqual({
        success: true,
        isClosed: true,
      });
      expect((await getGroup(alice.id, group.id)).isClosed).toBe(true);
    });
  });
});
