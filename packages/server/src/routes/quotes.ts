import type { FastifyInstance } from "fastify";
import type { QuotesResponse } from "@gpubroker/shared";
import { quoteQuerySchema } from "./schemas.js";
import { sendBrokerError, sendValidationError } from "./http-errors.js";

export default async function quoteRoutes(fastify: FastifyInstance) {
  // GET /api/quotes?gpuType=&region=&pricingMode=: one aggregation round
  fastify.get("/api/quotes", async (request, reply) => {
    const parsed = quoteQuerySchema.safeParse(request.query);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    try {
      const round = await fastify.broker.quote(parsed.data);
      return reply.send({ round } satisfies QuotesResponse);
    } catch (err) {
      return sendBrokerError(reply, err);
    }
  });
}
