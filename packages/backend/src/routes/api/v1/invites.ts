import type { FastifyInstance } from "fastify";
import {
  createInviteSchema,
  idParamsSchema,
  groupInviteParamsSchema,
  joinGroupSchema,
} from "@keyrelay/shared";
import { authMiddleware } from "../../../middleware/auth.js";
import {
  createInvite,
  listInvites,
  revokeInvite,
  joinByCode,
} from "../../../services/invites.js";

export async function inviteRoutes(app: FastifyInstance) {
  app.addHook("preHandler", authMiddleware);

  app.post("/api/v1/groups/:id/invites", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const input = createInviteSchema.parse(request.body);
    const invite = await createInvite(request.user!.userId, id, input);
    return reply.status(201).send(invite);
  });

  app.get("/api/v1/groups/:id/invites", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return listInvites(request.user!.userId, id);
  });

  app.delete("/api/v1/groups/:id/invites/:inviteId", async (request) => {
    const { id, inviteId } = groupInviteParamsSchema.parse(request.params);
    return revokeInvite(request.user!.userId, id, inviteId);
  });

  app.post("/api/v1/groups/join", async (request) => {
    const { code } = joinGroupSchema.parse(request.body);
    return joinByCode(request.user!.userId, code);
  });
}
