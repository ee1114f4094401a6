import type { FastifyInstance } from "fastify";
import { idParamsSchema } from "@keyrelay/shared";
import { authMiddleware } from "../../../middleware/auth.js";
import { markDelivered, markRead } from "../../../services/messages.js";

export async function messageRoutes(app: FastifyInstance) {
  app.addHook("preHandler", authMiddleware);

  app.post("/api/v1/messages/:id/delivered", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return markDelivered(request.user!.userId, id);
  });

  app.post("/api/v1/messages/:id/read", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return markRead(request.user!.userId, id);
  });
}
