import type { FastifyInstance } from "fastify";
import { authMiddleware } from "../../../middleware/auth.js";
import { getMetrics } from "../../../services/metrics.js";

export async function metricsRoutes(app: FastifyInstance) {
  app.get(
    "/api/v1/metrics",
    { preHandler: [authMiddleware] },
    async (request, reply) => {
      const metrics = await getMetrics(request.user!.userId);
      if (metrics.stale) reply.header("X-Metrics-Stale", "true");
      return metrics;
    }
  );
}
