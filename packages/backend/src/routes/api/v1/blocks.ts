import type { FastifyInstance } from "fastify";
import { blockUserSchema, userIdParamsSchema } from "@keyrelay/shared";
import { authMiddleware } from "../../../middleware/auth.js";
import {
  blockUser,
  unblockUser,
  listBlocks,
} from "../../../services/relationships.js";

export async function blockRoutes(app: FastifyInstance) {
  app.addHook("preHandler", authMiddleware);

  app.get("/api/v1/blocks", async (request) => {
    return listBlocks(request.user!.userId);
  });

  app.post("/api/v1/blocks", async (request, reply) => {
    const { userId } = blockUserSchema.parse(request.body);
    const result = await blockUser(request.user!.userId, userId);
    return reply.status(201).send(result);
  });

  app.delete("/api/v1/blocks/:userId", async (request) => {
    const { userId } = userIdParamsSchema.parse(request.params);
    return unblockUser(request.user!.userId, userId);
  });
}
