import Fastify from "fastify";
import { loadConfig, validateConfig, type ServerConfig } from "./config.js";
import { loadSettings } from "./settings.js";
import redisPlugin from "./plugins/redis.js";
import corsPlugin from "./plugins/cors.js";
import authPlugin from "./plugins/auth.js";
import brokerPlugin from "./plugins/broker.js";
import ssePlugin from "./plugins/sse.js";
import jobRoutes from "./routes/jobs.js";
import quoteRoutes from "./routes/quotes.js";
import costRoutes from "./routes/costs.js";
import eventRoutes from "./routes/events.js";

declare module "fastify" {
  interface FastifyInstance {
    serverConfig: ServerConfig;
  }
}

async function main() {
  const config = loadConfig();

  // Validate config before constructing the server
  const issues = validateConfig(config);
  for (const issue of issues) {
    if (issue.level === "error") {
      console.error(`Config error: ${issue.message}`);
    } else {
      console.warn(`Config warning: ${issue.message}`);
    }
  }
  if (issues.some((i) => i.level === "error")) {
    process.exit(1);
  }

  const settings = await loadSettings(config.settingsPath);

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      transport: {
        target: "pino-pretty",
        options: { translateTime: "HH:MM:ss Z", ignore: "pid,hostname" },
      },
    },
  });

  fastify.decorate("serverConfig", config);

  // Plugins (order matters: redis before broker, broker before sse, all before routes)
  await fastify.register(corsPlugin);
  await fastify.register(redisPlugin, {
    url: config.stateBackend === "redis" ? config.redisUrl : null,
  });
  await fastify.register(authPlugin);
  await fastify.register(brokerPlugin, { settings });
  await fastify.register(ssePlugin, { heartbeatMs: settings.sse.heartbeatMs });

  // API routes
  await fastify.register(jobRoutes);
  await fastify.register(quoteRoutes);
  await fastify.register(costRoutes);
  await fastify.register(eventRoutes);

  fastify.setNotFoundHandler(async (_request, reply) => {
    return reply.status(404).send({ error: "Not found" });
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      fastify.log.info({ signal }, "Shutting down");
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error({ err }, "Shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  // Start
  await fastify.listen({ port: config.port, host: config.host });
  fastify.log.info(`GPU broker listening on http://localhost:${config.port}`);
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
