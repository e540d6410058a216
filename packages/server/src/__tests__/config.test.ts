import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { loadConfig, validateConfig } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    assert.equal(config.port, 4500);
    assert.equal(config.host, "0.0.0.0");
    assert.equal(config.stateBackend, "redis");
    assert.equal(config.redisUrl, "redis://localhost:6379");
    assert.deepEqual(config.digitaloceanRegions, ["tor1"]);
    assert.equal(config.devMode, false);
    assert.equal(config.settingsPath, null);
  });

  it("reads provider credentials and lists", () => {
    const config = loadConfig({
      PORT: "8080",
      STATE_BACKEND: "memory",
      DO_API_KEY: "test-key",
      DO_REGION: "nyc2, tor1,,",
      BROKER_DEV_MODE: "1",
    });

    assert.equal(config.port, 8080);
    assert.equal(config.stateBackend, "memory");
    assert.equal(config.digitaloceanApiKey, "test-key");
    assert.deepEqual(config.digitaloceanRegions, ["nyc2", "tor1"]);
    assert.equal(config.devMode, true);
  });

  it("marks an unknown state backend", () => {
    assert.equal(loadConfig({ STATE_BACKEND: "etcd" }).stateBackend, null);
  });
});

describe("validateConfig", () => {
  it("errors without any provider credentials", () => {
    const issues = validateConfig(loadConfig({ BROKER_AUTH_TOKEN: "test-token" }));

    assert.deepEqual(issues, [
      {
        level: "error",
        message: "No provider credentials: set at least one of VASTAI_API_KEY, DO_API_KEY, LAMBDA_API_KEY",
      },
    ]);
  });

  it("warns when no auth is configured", () => {
    const issues = validateConfig(loadConfig({ VASTAI_API_KEY: "test-key" }));

    assert.deepEqual(
      issues.map((i) => i.level),
      ["warn"],
    );
    assert.match(issues[0].message, /BROKER_AUTH_TOKEN/);
  });

  it("rejects a bad port and state backend", () => {
    const issues = validateConfig(
      loadConfig({ PORT: "abc", STATE_BACKEND: "etcd", VASTAI_API_KEY: "test-key", BROKER_AUTH_TOKEN: "t" }),
    );

    assert.deepEqual(
      issues.map((i) => i.message),
      ["PORT must be an integer between 1 and 65535", "STATE_BACKEND must be redis or memory"],
    );
  });

  it("passes a complete configuration", () => {
    const issues = validateConfig(
      loadConfig({ LAMBDA_API_KEY: "test-key", BROKER_JWT_SECRET: "test-secret" }),
    );

    assert.deepEqual(issues, []);
  });
});
