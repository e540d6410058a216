import type { PricingMode, Quote, RiskProfile } from "@gpubroker/shared";
import type { PriceHistory, OutcomeCounts } from "./price-history.js";

export interface RiskModelConfig {
  /** Ticks considered for realized volatility. */
  volatilityWindow: number;
  /** Used until a series has at least `minObservations` ticks. */
  volatilityPrior: Record<PricingMode, number>;
  minObservations: number;
  reliabilityWindowMs: number;
  /** Used for an outcome category with no recorded calls. */
  reliabilityPrior: number;
  /** Capacity at which liquidity saturates at 1. */
  referenceDepth: number;
}

export const DEFAULT_RISK_MODEL: RiskModelConfig = {
  volatilityWindow: 50,
  volatilityPrior: { spot: 0.3, "on-demand": 0.05 },
  minObservations: 3,
  reliabilityWindowMs: 7 * 24 * 60 * 60 * 1000,
  reliabilityPrior: 0.8,
  referenceDepth: 8,
};

export interface ScoringWeights {
  riskAversion: number;
  confidence: { reliability: number; liquidity: number };
  risk: { volatility: number; unreliability: number; illiquidity: number };
}

export const DEFAULT_SCORING: ScoringWeights = {
  riskAversion: 1,
  confidence: { reliability: 0.7, liquidity: 0.3 },
  risk: { volatility: 0.5, unreliability: 0.3, illiquidity: 0.2 },
};

export interface Score {
  riskAdjustedPrice: number;
  confidence: number;
  riskScore: number;
}

/** Produces the RiskProfile attached to a quote at scoring time. */
export interface RiskModel {
  profile(quote: Quote): RiskProfile;
}

/** Derives adjusted price, confidence and composite risk from a profile. */
export interface ScoringStrategy {
  score(quote: Quote, risk: RiskProfile): Score;
}

export class HistoricalRiskModel implements RiskModel {
  private config: RiskModelConfig;

  constructor(
    private history: PriceHistory,
    config: Partial<RiskModelConfig> = {},
  ) {
    this.config = { ...DEFAULT_RISK_MODEL, ...config };
  }

  profile(quote: Quote): RiskProfile {
    const series = this.history.priceSeries(quote, this.config.volatilityWindow);
    const volatilityIndex =
      series.length >= this.config.minObservations
        ? clamp01(realizedVolatility(series))
        : this.config.volatilityPrior[quote.pricingMode];

    const outcomes = this.history.outcomes(quote.provider, this.config.reliabilityWindowMs);
    const prior = this.config.reliabilityPrior;
    const reliabilityScore =
      0.5 * successRate(outcomes.provision, prior) +
      0.3 * successRate(outcomes.quote, prior) +
      0.2 * successRate(outcomes.other, prior);

    return {
      volatilityIndex,
      reliabilityScore: clamp01(reliabilityScore),
      liquidity: clamp01(quote.availableCapacity / this.config.referenceDepth),
      observations: series.length,
    };
  }
}

export class WeightedScoringStrategy implements ScoringStrategy {
  constructor(private weights: ScoringWeights = DEFAULT_SCORING) {}

  score(quote: Quote, risk: RiskProfile): Score {
    const { confidence: cw, risk: rw } = this.weights;
    return {
      riskAdjustedPrice: quote.pricePerHour * (1 + risk.volatilityIndex * this.weights.riskAversion),
      confidence: weightedMean([
        [risk.reliabilityScore, cw.reliability],
        [risk.liquidity, cw.liquidity],
      ]),
      riskScore: weightedMean([
        [risk.volatilityIndex, rw.volatility],
        [1 - risk.reliabilityScore, rw.unreliability],
        [1 - risk.liquidity, rw.illiquidity],
      ]),
    };
  }
}

/** Sample standard deviation of log returns. */
export function realizedVolatility(prices: readonly number[]): number {
  const returns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    if (prices[i - 1] > 0 && prices[i] > 0) returns.push(Math.log(prices[i] / prices[i - 1]));
  }
  if (returns.length < 2) return 0;

  const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
  const variance = returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / (returns.length - 1);
  return Math.sqrt(variance);
}

function successRate(counts: OutcomeCounts, prior: number): number {
  return counts.attempts > 0 ? counts.successes / counts.attempts : prior;
}

function weightedMean(pairs: Array<[value: number, weight: number]>): number {
  const total = pairs.reduce((sum, [, w]) => sum + w, 0);
  if (total <= 0) return 0;
  return clamp01(pairs.reduce((sum, [v, w]) => sum + v * w, 0) / total);
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
