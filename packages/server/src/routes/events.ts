import type { FastifyInstance } from "fastify";

export default async function eventRoutes(fastify: FastifyInstance) {
  // GET /api/events[?jobId=]: SSE stream of broker events
  fastify.get<{ Querystring: { jobId?: string } }>("/api/events", async (request, reply) => {
    reply.hijack();
    reply.raw.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });

    fastify.sseManager.addClient(reply, request.query.jobId ?? null);

    // Held open until the client disconnects; the manager drops it on close
    await new Promise<void>((resolve) => {
      reply.raw.on("close", () => resolve());
    });
  });
}
