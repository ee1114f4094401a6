import type { FastifyInstance } from "fastify";
import {
  createGroupSchema,
  updateGroupSchema,
  idParamsSchema,
  groupMemberParamsSchema,
  addMembersSchema,
  memberTargetSchema,
  banMemberSchema,
  muteGroupSchema,
  messageHistorySchema,
  sendGroupMessageSchema,
} from "@keyrelay/shared";
import { authMiddleware } from "../../../middleware/auth.js";
import {
  createGroup,
  listGroups,
  getGroup,
  updateGroup,
  closeGroup,
  listMembers,
  addMembers,
  removeMember,
  leaveGroup,
  banMember,
  unbanMember,
  promoteMember,
  demoteAdmin,
  transferOwnership,
  muteGroup,
} from "../../../services/groups.js";
import {
  getGroupMessages,
  sendGroupMessage,
} from "../../../services/messages.js";

export async function groupRoutes(app: FastifyInstance) {
  app.addHook("preHandler", authMiddleware);

  app.post("/api/v1/groups", async (request, reply) => {
    const input = createGroupSchema.parse(request.body);
    const group = await createGroup(request.user!.userId, input);
    return reply.status(201).send(group);
  });

  app.get("/api/v1/groups", async (request) => {
    return listGroups(request.user!.userId);
  });

  app.get("/api/v1/groups/:id", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return getGroup(request.user!.userId, id);
  });

  app.patch("/api/v1/groups/:id", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const input = updateGroupSchema.parse(request.body);
    return updateGroup(request.user!.userId, id, input);
  });

  // Closing keeps history readable but stops adds, joins and sends
  app.delete("/api/v1/groups/:id", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return closeGroup(request.user!.userId, id);
  });

  // ── Members ──

  app.get("/api/v1/groups/:id/members", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return listMembers(request.user!.userId, id);
  });

  app.post("/api/v1/groups/:id/members", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const { userIds } = addMembersSchema.parse(request.body);
    return addMembers(request.user!.userId, id, userIds);
  });

  app.delete("/api/v1/groups/:id/members/:userId", async (request) => {
    const { id, userId } = groupMemberParamsSchema.parse(request.params);
    return removeMember(request.user!.userId, id, userId);
  });

  app.post("/api/v1/groups/:id/leave", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return leaveGroup(request.user!.userId, id);
  });

  app.post("/api/v1/groups/:id/promote", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const { userId } = memberTargetSchema.parse(request.body);
    return promoteMember(request.user!.userId, id, userId);
  });

  app.post("/api/v1/groups/:id/demote", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const { userId } = memberTargetSchema.parse(request.body);
    return demoteAdmin(request.user!.userId, id, userId);
  });

  app.post("/api/v1/groups/:id/transfer", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const { userId } = memberTargetSchema.parse(request.body);
    return transferOwnership(request.user!.userId, id, userId);
  });

  app.post("/api/v1/groups/:id/mute", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const { muteUntil } = muteGroupSchema.parse(request.body);
    return muteGroup(request.user!.userId, id, muteUntil);
  });

  app.post("/api/v1/groups/:id/ban", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const { userId, reason } = banMemberSchema.parse(request.body);
    return banMember(request.user!.userId, id, userId, reason);
  });

  app.delete("/api/v1/groups/:id/ban/:userId", async (request) => {
    const { id, userId } = groupMemberParamsSchema.parse(request.params);
    return unbanMember(request.user!.userId, id, userId);
  });

  // ── Messages ──

  app.get("/api/v1/groups/:id/messages", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const query = messageHistorySchema.parse(request.query);
    return getGroupMessages(request.user!.userId, id, query);
  });

  app.post("/api/v1/groups/:id/messages", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const input = sendGroupMessageSchema.parse(request.body);
    const message = await sendGroupMessage(request.user!.userId, id, input);
    return reply.status(message.duplicate ? 200 : 201).send(message);
  });
}
