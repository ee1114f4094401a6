import type { FastifyInstance } from "fastify";
import { authMiddleware } from "../../../middleware/auth.js";
import { addClient } from "../../../realtime/sse.js";

export async function streamRoutes(app: FastifyInstance) {
  app.get(
    "/api/v1/sse",
    { preHandler: [authMiddleware] },
    async (request, reply) => {
      reply.hijack();
      reply.raw.writeHead(200, {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
        "X-Accel-Buffering": "no",
      });

      addClient(request.user!.userId, reply);

      // Heartbeat keeps proxies from closing an idle stream
      const heartbeat = setInterval(() => {
        reply.raw.write(": heartbeat\n\n");
      }, 30_000);

      request.raw.on("close", () => {
        clearInterval(heartbeat);
      });
    }
  );
}
