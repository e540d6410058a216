// ── Providers & pricing ──────────────────────────────────────────────

export type ProviderId = "vastai" | "digitalocean" | "lambdalabs" | (string & {});

export type PricingMode = "spot" | "on-demand";

/** What the aggregator asks every adapter for. */
export interface QuoteRequest {
  gpuType: string;
  region?: string;
  pricingMode?: PricingMode;
}

/** A single provider's price/availability offer. Immutable once captured. */
export interface Quote {
  provider: ProviderId;
  instanceType: string;
  gpuType: string;
  /** Normalized to USD per hour per unit. */
  pricePerHour: number;
  pricingMode: PricingMode;
  region: string;
  availableCapacity: number;
  observedAt: number;
}

// ── Scoring ──────────────────────────────────────────────────────────

export interface RiskProfile {
  /** 0 = flat price history, 1 = extremely volatile. */
  volatilityIndex: number;
  /** 0..1 historical success of calls against the provider. */
  reliabilityScore: number;
  /** 0..1 depth of available capacity. */
  liquidity: number;
  /** Price observations the volatility was computed from. */
  observations: number;
}

export type RejectionReason = "low-confidence" | "high-risk" | "no-capacity";

export interface Candidate {
  quote: Quote;
  risk: RiskProfile;
  riskAdjustedPrice: number;
  confidence: number;
  riskScore: number;
  eligible: boolean;
  rejectionReasons: RejectionReason[];
}

// ── Aggregation rounds ───────────────────────────────────────────────

export type ProviderRoundStatus =
  | "ok"
  | "timeout"
  | "error"
  | "quota-exceeded"
  | "auth-error";

export interface ProviderRoundOutcome {
  provider: ProviderId;
  status: ProviderRoundStatus;
  quoteCount: number;
  latencyMs: number;
  error?: string;
}

export interface AggregationRound {
  roundId: string;
  request: QuoteRequest;
  startedAt: number;
  completedAt: number;
  /** Eligible candidates, ranked. */
  candidates: Candidate[];
  /** Candidates excluded by the filters, kept for reporting. */
  rejected: Candidate[];
  providers: ProviderRoundOutcome[];
}
