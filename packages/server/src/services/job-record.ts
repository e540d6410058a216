import { createHash } from "node:crypto";
import { z } from "zod";
import type { Job } from "@gpubroker/shared";

export const SCHEMA_VERSION = 1;

const pricingMode = z.enum(["spot", "on-demand"]);
const providerErrorKind = z.enum(["auth", "quota", "unavailable", "timeout", "rejected"]);

export const jobRequestSchema = z.object({
  gpuType: z.string().min(1),
  count: z.number().int().positive(),
  budgetPerHour: z.number().finite().positive().optional(),
  durationHours: z.number().finite().positive().optional(),
  minFulfillment: z.number().int().nonnegative().optional(),
  region: z.string().min(1).optional(),
  pricingMode: pricingMode.optional(),
  diversificationLimit: z.number().finite().gt(0).lte(1).optional(),
});

const allocationPlanSchema = z.object({
  roundId: z.string(),
  lines: z.array(
    z.object({
      provider: z.string(),
      instanceType: z.string(),
      region: z.string(),
      pricingMode,
      count: z.number().int().positive(),
      unitPrice: z.number().finite(),
      adjustedUnitPrice: z.number().finite(),
    }),
  ),
  requestedCount: z.number().int(),
  allocatedCount: z.number().int(),
  shortfall: z.number().int(),
  totalCostPerHour: z.number().finite(),
  adjustedCostPerHour: z.number().finite(),
  estimatedTotalCost: z.number().finite().nullable(),
  baselineCostPerHour: z.number().finite().nullable(),
  expectedSavingsPerHour: z.number().finite(),
  exchanges: z.array(
    z.object({ fromProvider: z.string(), toProvider: z.string(), costDelta: z.number().finite() }),
  ),
  budgetExceeded: z.boolean(),
});

const instanceSchema = z.object({
  instanceId: z.string(),
  unitKey: z.string(),
  provider: z.string(),
  instanceType: z.string(),
  region: z.string(),
  remoteId: z.string().nullable(),
  address: z.string().nullable(),
  state: z.enum(["requested", "provisioning", "running", "stopping", "terminated", "failed"]),
  pricePerHour: z.number().finite(),
  accruedCost: z.number().finite().nonnegative(),
  attempts: z.number().int().nonnegative(),
  startedAt: z.number().finite().nullable(),
  endedAt: z.number().finite().nullable(),
  error: z.string().optional(),
});

const reportSchema = z.object({
  startedAt: z.number().finite(),
  completedAt: z.number().finite(),
  requested: z.number().int(),
  achieved: z.number().int(),
  minRequired: z.number().int(),
  outcomes: z.array(
    z.object({
      unitKey: z.string(),
      provider: z.string(),
      instanceType: z.string(),
      status: z.enum(["running", "skipped", "failed", "cancelled", "rolled-back"]),
      attempts: z.number().int(),
      errorKind: providerErrorKind.optional(),
      error: z.string().optional(),
    }),
  ),
  rolledBack: z.boolean(),
  terminateCalls: z.number().int(),
  terminateFailures: z.array(z.string()),
  providerFailures: z.record(z.array(z.string())),
});

export const jobSchema = z.object({
  jobId: z.string().min(1),
  request: jobRequestSchema,
  status: z.enum(["pending", "provisioning", "running", "partially-fulfilled", "failed", "cancelled"]),
  plan: allocationPlanSchema.nullable(),
  instances: z.array(instanceSchema),
  costLedger: z.array(
    z.object({
      jobId: z.string(),
      instanceId: z.string(),
      timestamp: z.number().finite(),
      cumulativeCost: z.number().finite().nonnegative(),
    }),
  ),
  version: z.number().int().positive(),
  createdAt: z.number().finite(),
  updatedAt: z.number().finite(),
  completedAt: z.number().finite().optional(),
  restoredFrom: z.number().int().optional(),
  warnings: z.array(z.string()),
  error: z.string().optional(),
  report: reportSchema.optional(),
});

const envelopeSchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSION),
  checksum: z.string().regex(/^[0-9a-f]{64}$/),
  job: z.unknown(),
});

export type DecodeResult = { ok: true; job: Job } | { ok: false; reason: string };

export function checksum(serializedJob: string): string {
  return createHash("sha256").update(serializedJob).digest("hex");
}

export function encodeRecord(job: Job): string {
  const serialized = JSON.stringify(job);
  return `{"schemaVersion":${SCHEMA_VERSION},"checksum":"${checksum(serialized)}","job":${serialized}}`;
}

/** Parses and verifies one persisted record. Never throws. */
export function decodeRecord(raw: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, reason: "invalid JSON" };
  }

  const envelope = envelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return { ok: false, reason: `invalid envelope: ${envelope.error.issues[0]?.message ?? "unknown"}` };
  }
  if (typeof envelope.data.job !== "object" || envelope.data.job === null) {
    return { ok: false, reason: "invalid envelope: missing job" };
  }
  if (checksum(JSON.stringify(envelope.data.job)) !== envelope.data.checksum) {
    return { ok: false, reason: "checksum mismatch" };
  }

  const job = jobSchema.safeParse(envelope.data.job);
  if (!job.success) {
    const issue = job.error.issues[0];
    return { ok: false, reason: `schema violation at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "unknown"}` };
  }
  return { ok: true, job: job.data };
}
