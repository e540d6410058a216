import type { ProviderId, Quote } from "./quotes.js";

export interface CostAggregate {
  instances: number;
  costPerHour: number;
  accruedCost: number;
}

/** Result of one cost sampling pass. */
export interface CostSnapshot {
  sampledAt: number;
  byJob: Record<string, CostAggregate>;
  byProvider: Record<string, CostAggregate>;
  total: CostAggregate;
}

/** Advisory only; nothing is migrated automatically. */
export interface MigrationRecommendation {
  jobId: string;
  instanceId: string;
  provider: ProviderId;
  instanceType: string;
  region: string;
  lockedPricePerHour: number;
  alternative: Quote;
  savingsFraction: number;
  roundId: string;
  createdAt: number;
}
