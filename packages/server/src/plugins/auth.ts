import fp from "fastify-plugin";
import { timingSafeEqual } from "node:crypto";
import { jwtVerify } from "jose";
import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";

// ---------------------------------------------------------------------------
// Type augmentation: request.user is set by verifyAuth
// ---------------------------------------------------------------------------

export interface BearerUser {
  type: "bearer";
}

export interface JwtUser {
  type: "jwt";
  subject: string;
}

export type AuthUser = BearerUser | JwtUser;

declare module "fastify" {
  interface FastifyRequest {
    user?: AuthUser;
  }
  interface FastifyInstance {
    verifyAuth: (
      request: FastifyRequest,
      reply: FastifyReply,
    ) => Promise<void>;
  }
}

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

export default fp(async function authPlugin(fastify: FastifyInstance) {
  const configToken = fastify.serverConfig.authToken;
  const jwtSecret = fastify.serverConfig.jwtSecret;

  // Encode JWT secret once for jose
  const jwtKey = jwtSecret ? new TextEncoder().encode(jwtSecret) : null;

  async function verifyAuth(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<void> {
    // Dev mode bypass
    if (fastify.serverConfig.devMode) {
      request.user = { type: "jwt", subject: "dev" };
      return;
    }

    const header = request.headers.authorization;
    const provided = header?.startsWith("Bearer ") ? header.slice(7) : null;

    if (provided !== null) {
      // 1. Static operator token
      if (configToken) {
        const a = Buffer.from(provided, "utf-8");
        const b = Buffer.from(configToken, "utf-8");

        if (a.length === b.length && timingSafeEqual(a, b)) {
          request.user = { type: "bearer" };
          return;
        }
      }

      // 2. HS256 JWT signed with the configured secret
      if (jwtKey) {
        try {
          const { payload } = await jwtVerify(provided, jwtKey, { algorithms: ["HS256"] });
          request.user = { type: "jwt", subject: payload.sub ?? "unknown" };
          return;
        } catch (err) {
          request.log.debug({ err: err instanceof Error ? err.message : String(err) }, "JWT rejected");
        }
      }
    }

    reply
      .status(401)
      .send({ error: "Missing or invalid authentication credentials" });
  }

  fastify.decorate("verifyAuth", verifyAuth);
});
