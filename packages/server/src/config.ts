export type StateBackendKind = "redis" | "memory";

export interface ConfigWarning {
  level: "warn" | "error";
  message: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
  redisUrl: string;
  /** null when STATE_BACKEND holds an unknown value. */
  stateBackend: StateBackendKind | null;
  priceDbPath: string;
  settingsPath: string | null;
  authToken: string | null;
  jwtSecret: string | null;
  devMode: boolean;
  vastaiApiKey: string | null;
  digitaloceanApiKey: string | null;
  digitaloceanRegions: string[];
  lambdaApiKey: string | null;
  lambdaSshKeyName: string | null;
}

/**
 * Validate server config at startup. Returns a list of warnings/errors.
 * Callers should log warnings and exit on errors.
 */
export function validateConfig(config: ServerConfig): ConfigWarning[] {
  const issues: ConfigWarning[] = [];

  if (!Number.isInteger(config.port) || config.port <= 0 || config.port > 65535) {
    issues.push({ level: "error", message: "PORT must be an integer between 1 and 65535" });
  }

  if (config.stateBackend === null) {
    issues.push({ level: "error", message: "STATE_BACKEND must be redis or memory" });
  } else if (config.stateBackend === "memory") {
    issues.push({
      level: "warn",
      message: "STATE_BACKEND is memory; job state is lost on restart and not shared between processes",
    });
  }

  if (!config.vastaiApiKey && !config.digitaloceanApiKey && !config.lambdaApiKey) {
    issues.push({
      level: "error",
      message: "No provider credentials: set at least one of VASTAI_API_KEY, DO_API_KEY, LAMBDA_API_KEY",
    });
  }

  if (config.devMode) {
    issues.push({ level: "warn", message: "BROKER_DEV_MODE is on; authentication is bypassed" });
  } else if (!config.authToken && !config.jwtSecret) {
    issues.push({
      level: "warn",
      message: "Neither BROKER_AUTH_TOKEN nor BROKER_JWT_SECRET is set; every authenticated request will be rejected",
    });
  }

  if (config.digitaloceanApiKey && config.digitaloceanRegions.length === 0) {
    issues.push({ level: "error", message: "DO_API_KEY is set but DO_REGION lists no regions" });
  }

  return issues;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT ?? "4500", 10),
    host: env.HOST ?? "0.0.0.0",
    logLevel: env.LOG_LEVEL ?? "info",
    redisUrl: env.REDIS_URL ?? "redis://localhost:6379",
    stateBackend: parseStateBackend(env.STATE_BACKEND),
    priceDbPath: env.PRICE_DB_PATH ?? "price-history.db",
    settingsPath: env.BROKER_SETTINGS ?? null,
    authToken: env.BROKER_AUTH_TOKEN ?? null,
    jwtSecret: env.BROKER_JWT_SECRET ?? null,
    devMode: env.BROKER_DEV_MODE === "true" || env.BROKER_DEV_MODE === "1",
    vastaiApiKey: env.VASTAI_API_KEY ?? null,
    digitaloceanApiKey: env.DO_API_KEY ?? null,
    digitaloceanRegions: (env.DO_REGION ?? "tor1")
      .split(",")
      .map((r) => r.trim())
      .filter((r) => r.length > 0),
    lambdaApiKey: env.LAMBDA_API_KEY ?? null,
    lambdaSshKeyName: env.LAMBDA_SSH_KEY_NAME ?? null,
  };
}

function parseStateBackend(raw: string | undefined): StateBackendKind | null {
  if (raw === undefined || raw === "redis") return "redis";
  if (raw === "memory") return "memory";
  return null;
}
