import type { FastifyInstance } from "fastify";
import {
  createConversationSchema,
  idParamsSchema,
  offsetPaginationSchema,
  messageHistorySchema,
  sendMessageSchema,
} from "@keyrelay/shared";
import { authMiddleware } from "../../../middleware/auth.js";
import {
  findOrCreateConversation,
  listConversations,
  getConversation,
} from "../../../services/conversations.js";
import {
  getDirectMessages,
  sendDirectMessage,
} from "../../../services/messages.js";

export async function conversationRoutes(app: FastifyInstance) {
  app.addHook("preHandler", authMiddleware);

  app.get("/api/v1/conversations", async (request) => {
    const { limit, offset } = offsetPaginationSchema.parse(request.query);
    return listConversations(request.user!.userId, limit, offset);
  });

  // Find the 1:1 conversation with a peer, creating it on first contact
  app.post("/api/v1/conversations", async (request, reply) => {
    const { peerUserId } = createConversationSchema.parse(request.body);
    const conversation = await findOrCreateConversation(
      request.user!.userId,
      peerUserId
    );
    return reply.status(conversation.created ? 201 : 200).send(conversation);
  });

  app.get("/api/v1/conversations/:id", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return getConversation(request.user!.userId, id);
  });

  app.get("/api/v1/conversations/:id/messages", async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const query = messageHistorySchema.parse(request.query);
    return getDirectMessages(request.user!.userId, id, query);
  });

  app.post("/api/v1/conversations/:id/messages", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const input = sendMessageSchema.parse(request.body);
    const message = await sendDirectMessage(request.user!.userId, id, input);
    return reply.status(message.duplicate ? 200 : 201).send(message);
  });
}
