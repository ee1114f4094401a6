import { describe, it, expect, beforeEach, vi } from "vitest";
import { config } from "../src/config.js";
import { generateInviteCode } from "../src/lib/codes.js";
import { createGroup } from "../src/services/groups.js";
import { createInvite } from "../src/services/invites.js";
import { createUser, resetDb } from "./helpers/fixtures.js";

vi.mock("../src/db/connection.js", async () => {
  const { createTestDb } = await import("./helpers/db.js");
  return createTestDb();
});

vi.mock("../src/lib/codes.js", () => ({
  generateInviteCode: vi.fn(() => "AAAAAAAAAAAA"),
}));

describe("Invite code allocation", () => {
  let ownerId: string;
  let groupId: string;

  beforeEach(async () => {
    await resetDb();
    vi.mocked(generateInviteCode).mockClear();
    ownerId = (await createUser("owner")).id;
    groupId = (await createGroup(ownerId, { title: "Chess" })).id;
  });

  it("should retry with a fresh code after a collision", async () => {
    await createInvite(ownerId, groupId, { type: "link" });
    vi.mocked(generateInviteCode)
      .mockReturnValueOnce("AAAAAAAAAAAA")
      .mockReturnValueOnce("BBBBBBBBBBBB");

    const invite = await createInvite(ownerId, groupId, { type: "link" });

    expect(invite.code).toBe("BBBBBBBBBBBB");
    expect(generateInviteCode).toHaveBeenCalledTimes(3);
  });

  it("should give up after the configured number of attempts", async () => {
    config.groups.inviteCodeAttempts = 3;
    await createInvite(ownerId, groupId, { type: "link" });

    await expect(
      createInvite(ownerId, groupId, { type: "link" })
    ).rejects.toMatchObject({ statusCode: 409, code: "INVITE_CODE_COLLISION" });
    expect(generateInviteCode).toHaveBeenCalledTimes(4);
  });
});
