import type { FastifyInstance } from "fastify";
import type { CostsResponse, RecommendationsResponse } from "@gpubroker/shared";

export default async function costRoutes(fastify: FastifyInstance) {
  const tracker = fastify.costTracker;

  // GET /api/costs: latest sample; ?refresh=true samples now
  fastify.get<{ Querystring: { refresh?: string } }>("/api/costs", async (request, reply) => {
    const snapshot =
      request.query.refresh === "true" ? await tracker.sample() : tracker.latestSnapshot();
    return reply.send({ snapshot } satisfies CostsResponse);
  });

  // GET /api/recommendations: results of the last re-quote pass
  fastify.get("/api/recommendations", async (_request, reply) => {
    return reply.send({ recommendations: tracker.recommendations() } satisfies RecommendationsResponse);
  });
}
