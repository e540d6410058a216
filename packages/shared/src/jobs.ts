import type { PricingMode, ProviderId } from "./quotes.js";

// ── Job & instance enums ─────────────────────────────────────────────

export type JobStatus =
  | "pending"
  | "provisioning"
  | "running"
  | "partially-fulfilled"
  | "failed"
  | "cancelled";

export type InstanceState =
  | "requested"
  | "provisioning"
  | "running"
  | "stopping"
  | "terminated"
  | "failed";

// ── Request ──────────────────────────────────────────────────────────

export interface JobRequest {
  gpuType: string;
  count: number;
  /** Soft ceiling on the plan's cost per hour. */
  budgetPerHour?: number;
  durationHours?: number;
  /** Minimum units for the job to count as a success. Defaults to `count`. */
  minFulfillment?: number;
  region?: string;
  pricingMode?: PricingMode;
  /** Max fraction (0..1] of `count` a single provider may carry. */
  diversificationLimit?: number;
}

// ── Allocation plan ──────────────────────────────────────────────────

export interface AllocationLine {
  provider: ProviderId;
  instanceType: string;
  region: string;
  pricingMode: PricingMode;
  count: number;
  unitPrice: number;
  adjustedUnitPrice: number;
}

export interface AllocationExchange {
  fromProvider: ProviderId;
  toProvider: ProviderId;
  costDelta: number;
}

export interface AllocationPlan {
  roundId: string;
  lines: AllocationLine[];
  requestedCount: number;
  allocatedCount: number;
  shortfall: number;
  totalCostPerHour: number;
  adjustedCostPerHour: number;
  /** Total base cost for `durationHours`, when given. */
  estimatedTotalCost: number | null;
  /** Cheapest adjusted cost of placing every allocated unit on one provider. */
  baselineCostPerHour: number | null;
  expectedSavingsPerHour: number;
  exchanges: AllocationExchange[];
  budgetExceeded: boolean;
}

// ── Instances & cost ─────────────────────────────────────────────────

export interface Instance {
  instanceId: string;
  /** `${provider}:${instanceType}:${region}:${index}`, one per plan unit. */
  unitKey: string;
  provider: ProviderId;
  instanceType: string;
  region: string;
  remoteId: string | null;
  address: string | null;
  state: InstanceState;
  pricePerHour: number;
  accruedCost: number;
  attempts: number;
  startedAt: number | null;
  endedAt: number | null;
  error?: string;
}

export interface CostRecord {
  jobId: string;
  instanceId: string;
  timestamp: number;
  cumulativeCost: number;
}

// ── Provisioning report ──────────────────────────────────────────────

export type UnitStatus = "running" | "skipped" | "failed" | "cancelled" | "rolled-back";

export type ProviderErrorKind = "auth" | "quota" | "unavailable" | "timeout" | "rejected";

export interface UnitOutcome {
  unitKey: string;
  provider: ProviderId;
  instanceType: string;
  status: UnitStatus;
  attempts: number;
  errorKind?: ProviderErrorKind;
  error?: string;
}

export interface ProvisionReport {
  startedAt: number;
  completedAt: number;
  requested: number;
  achieved: number;
  minRequired: number;
  outcomes: UnitOutcome[];
  rolledBack: boolean;
  terminateCalls: number;
  terminateFailures: string[];
  /** provider → error messages, for providers that failed any unit. */
  providerFailures: Record<string, string[]>;
}

// ── Job record ───────────────────────────────────────────────────────

export interface Job {
  jobId: string;
  request: JobRequest;
  status: JobStatus;
  plan: AllocationPlan | null;
  instances: Instance[];
  costLedger: CostRecord[];
  version: number;
  createdAt: number;
  updatedAt: number;
  completedAt?: number;
  restoredFrom?: number;
  warnings: string[];
  error?: string;
  report?: ProvisionReport;
}

export interface JobVersionSummary {
  version: number;
  status: JobStatus;
  updatedAt: number;
  current: boolean;
}
