import { describe, it } from "node:test";
import assert from "node:assert/strict";
import Fastify from "fastify";
import { SignJWT } from "jose";
import type { FastifyInstance } from "fastify";
import type { ServerConfig } from "../../config.js";
import authPlugin from "../auth.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const TEST_TOKEN = "test-bearer-token";
const JWT_SECRET = "test-secret-test-secret-test-secret";

async function buildApp(opts: {
  authToken?: string | null;
  jwtSecret?: string | null;
  devMode?: boolean;
}): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });

  app.decorate("serverConfig", {
    authToken: opts.authToken ?? null,
    jwtSecret: opts.jwtSecret ?? null,
    devMode: opts.devMode ?? false,
  } as unknown as ServerConfig);

  await app.register(authPlugin);

  app.get("/api/test", { preHandler: [app.verifyAuth] }, async (request) => {
    return { user: request.user };
  });

  return app;
}

async function createJwt(
  secret: string,
  payload: Record<string, unknown>,
  expiresIn = "1h",
): Promise<string> {
  const key = new TextEncoder().encode(secret);
  return new SignJWT(payload)
    .setProtectedHeader({ alg: "HS256" })
    .setIssuedAt()
    .setExpirationTime(expiresIn)
    .sign(key);
}

function bearer(token: string) {
  return { authorization: `Bearer ${token}` };
}

// ---------------------------------------------------------------------------
// Static token
// ---------------------------------------------------------------------------

describe("Auth plugin: static token", () => {
  it("accepts the configured token", async () => {
    const app = await buildApp({ authToken: TEST_TOKEN });

    const resp = await app.inject({ method: "GET", url: "/api/test", headers: bearer(TEST_TOKEN) });

    assert.equal(resp.statusCode, 200);
    assert.deepEqual(resp.json().user, { type: "bearer" });

    await app.close();
  });

  it("rejects a different token", async () => {
    const app = await buildApp({ authToken: TEST_TOKEN });

    const resp = await app.inject({ method: "GET", url: "/api/test", headers: bearer("wrong-token") });

    assert.equal(resp.statusCode, 401);
    assert.deepEqual(resp.json(), { error: "Missing or invalid authentication credentials" });

    await app.close();
  });

  it("rejects a header without the Bearer scheme", async () => {
    const app = await buildApp({ authToken: TEST_TOKEN });

    const resp = await app.inject({
      method: "GET",
      url: "/api/test",
      headers: { authorization: TEST_TOKEN },
    });

    assert.equal(resp.statusCode, 401);

    await app.close();
  });
});

// ---------------------------------------------------------------------------
// JWT
// ---------------------------------------------------------------------------

describe("Auth plugin: JWT", () => {
  it("accepts a JWT signed with the secret", async () => {
    const app = await buildApp({ jwtSecret: JWT_SECRET });
    const token = await createJwt(JWT_SECRET, { sub: "ops-1" });

    const resp = await app.inject({ method: "GET", url: "/api/test", headers: bearer(token) });

    assert.equal(resp.statusCode, 200);
    assert.deepEqual(resp.json().user, { type: "jwt", subject: "ops-1" });

    await app.close();
  });

  it("rejects an expired JWT", async () => {
    const app = await buildApp({ jwtSecret: JWT_SECRET });
    const key = new TextEncoder().encode(JWT_SECRET);
    const token = await new SignJWT({ sub: "ops-1" })
      .setProtectedHeader({ alg: "HS256" })
      .setIssuedAt(Math.floor(Date.now() / 1000) - 7200)
      .setExpirationTime(Math.floor(Date.now() / 1000) - 3600)
      .sign(key);

    const resp = await app.inject({ method: "GET", url: "/api/test", headers: bearer(token) });

    assert.equal(resp.statusCode, 401);

    await app.close();
  });

  it("rejects a JWT signed with another secret", async () => {
    const app = await buildApp({ jwtSecret: JWT_SECRET });
    const token = await createJwt("another-test-secret-another-test", { sub: "ops-1" });

    const resp = await app.inject({ method: "GET", url: "/api/test", headers: bearer(token) });

    assert.equal(resp.statusCode, 401);

    await app.close();
  });

  it("falls back to the JWT check when both are configured", async () => {
    const app = await buildApp({ authToken: TEST_TOKEN, jwtSecret: JWT_SECRET });
    const token = await createJwt(JWT_SECRET, { sub: "ops-2" });

    const viaJwt = await app.inject({ method: "GET", url: "/api/test", headers: bearer(token) });
    const viaToken = await app.inject({ method: "GET", url: "/api/test", headers: bearer(TEST_TOKEN) });

    assert.equal(viaJwt.json().user.type, "jwt");
    assert.equal(viaToken.json().user.type, "bearer");

    await app.close();
  });
});

// ---------------------------------------------------------------------------
// Nothing configured / dev mode
// ---------------------------------------------------------------------------

describe("Auth plugin: no credentials configured", () => {
  it("returns 401", async () => {
    const app = await buildApp({});

    const resp = await app.inject({ method: "GET", url: "/api/test", headers: bearer("anything") });

    assert.equal(resp.statusCode, 401);

    await app.close();
  });
});

describe("Auth plugin: dev mode", () => {
  it("bypasses auth and sets the dev user", async () => {
    const app = await buildApp({ authToken: TEST_TOKEN, devMode: true });

    const resp = await app.inject({ method: "GET", url: "/api/test" });

    assert.equal(resp.statusCode, 200);
    assert.deepEqual(resp.json().user, { type: "jwt", subject: "dev" });

    await app.close();
  });
});
