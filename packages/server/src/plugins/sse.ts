import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import { SSEManager } from "../services/sse-manager.js";

declare module "fastify" {
  interface FastifyInstance {
    sseManager: SSEManager;
  }
}

/** Requires the broker plugin: every hub event is broadcast to SSE clients. */
export default fp(async function ssePlugin(
  fastify: FastifyInstance,
  opts: { heartbeatMs?: number },
) {
  const manager = new SSEManager(opts.heartbeatMs);
  const unsubscribe = fastify.jobEvents.subscribe((event) => manager.broadcast(event));

  fastify.decorate("sseManager", manager);

  fastify.addHook("onClose", () => {
    unsubscribe();
    manager.stop();
  });
});
