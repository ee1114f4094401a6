import Fastify, { type FastifyBaseLogger } from "fastify";
import cors from "@fastify/cors";
import { logger } from "./logger.js";
import { errorHandler } from "./middleware/error-handler.js";
import { keyRoutes } from "./routes/api/v1/keys.js";
import { conversationRoutes } from "./routes/api/v1/conversations.js";
import { messageRoutes } from "./routes/api/v1/messages.js";
import { groupRoutes } from "./routes/api/v1/groups.js";
import { inviteRoutes } from "./routes/api/v1/invites.js";
import { blockRoutes } from "./routes/api/v1/blocks.js";
import { metricsRoutes } from "./routes/api/v1/metrics.js";
import { streamRoutes } from "./routes/api/v1/stream.js";

const httpLogger: FastifyBaseLogger = logger.child({ module: "http" });

export async function buildApp() {
  const app = Fastify({ loggerInstance: httpLogger });

  // CORS
  await app.register(cors, {
    origin: true,
    credentials: true,
    methods: ["GET", "HEAD", "PUT", "PATCH", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
    exposedHeaders: [
      "X-Error-Code",
      "X-Bundle-Version",
      "X-Current-Epoch",
      "X-Metrics-Stale",
      "X-RateLimit-Limit",
      "X-RateLimit-Remaining",
      "Retry-After",
    ],
  });

  // Error handler
  app.setErrorHandler(errorHandler);

  // Routes
  await app.register(keyRoutes);
  await app.register(conversationRoutes);
  await app.register(messageRoutes);
  await app.register(groupRoutes);
  await app.register(inviteRoutes);
  await app.register(blockRoutes);
  await app.register(metricsRoutes);
  await app.register(streamRoutes);

  // Health check
  app.get("/health", async () => ({ status: "ok", version: "0.1.0" }));

  return app;
}
