import fsp from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const unit = z.number().min(0).max(1);
const positiveInt = z.number().int().positive();
const durationMs = z.number().int().nonnegative();

const callPolicySchema = z
  .object({
    requestsPerSecond: z.number().positive(),
    burst: positiveInt,
    maxAttempts: positiveInt,
    baseBackoffMs: durationMs,
    maxBackoffMs: durationMs,
    quoteTimeoutMs: positiveInt,
    provisionTimeoutMs: positiveInt,
    controlTimeoutMs: positiveInt,
  })
  .partial()
  .strict();

export const settingsSchema = z
  .object({
    aggregator: z
      .object({
        quoteConcurrency: positiveInt,
        quoteTimeoutMs: positiveInt,
        minConfidence: unit,
        maxRiskScore: unit,
        providerPriority: z.array(z.string()),
      })
      .partial()
      .strict()
      .default({}),
    riskModel: z
      .object({
        volatilityWindow: z.number().int().min(2),
        volatilityPrior: z.object({ spot: unit, "on-demand": unit }),
        minObservations: z.number().int().min(2),
        reliabilityWindowMs: positiveInt,
        reliabilityPrior: unit,
        referenceDepth: z.number().positive(),
      })
      .partial()
      .strict()
      .default({}),
    scoring: z
      .object({
        riskAversion: z.number().nonnegative(),
        confidence: z.object({ reliability: z.number().nonnegative(), liquidity: z.number().nonnegative() }),
        risk: z.object({
          volatility: z.number().nonnegative(),
          unreliability: z.number().nonnegative(),
          illiquidity: z.number().nonnegative(),
        }),
      })
      .partial()
      .strict()
      .default({}),
    optimizer: z
      .object({
        exchangeTolerance: z.number().nonnegative(),
        maxExchanges: z.number().int().nonnegative(),
      })
      .partial()
      .strict()
      .default({}),
    orchestrator: z
      .object({
        provisionConcurrency: positiveInt,
        unitAttempts: positiveInt,
        unitBackoffMs: durationMs,
        unitMaxBackoffMs: durationMs,
        readinessPollMs: positiveInt,
        readinessTimeoutMs: positiveInt,
        jobDeadlineMs: positiveInt,
      })
      .partial()
      .strict()
      .default({}),
    store: z
      .object({
        historyLimit: positiveInt,
        lockTimeoutMs: positiveInt,
        lockStaleMs: positiveInt,
        lockPollMs: positiveInt,
      })
      .partial()
      .strict()
      .default({}),
    costTracker: z
      .object({
        sampleIntervalMs: positiveInt,
        requoteIntervalMs: positiveInt,
        minSavingsFraction: unit,
        ledgerLimit: positiveInt,
      })
      .partial()
      .strict()
      .default({}),
    priceHistory: z
      .object({ retentionMs: positiveInt })
      .partial()
      .strict()
      .default({}),
    sse: z.object({ heartbeatMs: positiveInt }).partial().strict().default({}),
    budgetPolicy: z.enum(["warn", "abort"]).default("warn"),
    /** Call policy per provider id. */
    providers: z.record(callPolicySchema).default({}),
  })
  .strict();

export type BrokerSettings = z.infer<typeof settingsSchema>;

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}

/** Parse YAML settings text. Empty text yields all defaults. */
export function parseSettings(raw: string, source = "settings"): BrokerSettings {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new SettingsError(`Failed to parse ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = settingsSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const at = issue?.path.length ? issue.path.join(".") : "(root)";
    throw new SettingsError(`Invalid ${source} at ${at}: ${issue?.message ?? "unknown"}`);
  }
  return result.data;
}

/** Load settings from `path`, or defaults when no path is configured. */
export async function loadSettings(path: string | null): Promise<BrokerSettings> {
  if (path === null) return settingsSchema.parse({});

  let raw: string;
  try {
    raw = await fsp.readFile(path, "utf-8");
  } catch (err) {
    throw new SettingsError(`Failed to read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseSettings(raw, path);
}
