import type {
  AllocationExchange,
  AllocationLine,
  AllocationPlan,
  Candidate,
  JobRequest,
  ProviderId,
} from "@gpubroker/shared";

export interface OptimizerConfig {
  /** Fractional cost increase over the greedy plan the exchange pass may accept. */
  exchangeTolerance: number;
  maxExchanges: number;
}

export const DEFAULT_OPTIMIZER: OptimizerConfig = {
  exchangeTolerance: 0.05,
  maxExchanges: 64,
};

export interface RoundInput {
  roundId: string;
  /** Eligible candidates, already ranked. */
  candidates: readonly Candidate[];
}

const EPSILON = 1e-9;

/**
 * Greedy fill in ranked order, then (when a diversification limit is set) a
 * bounded exchange pass that moves single units off over-concentrated
 * providers. Pure and deterministic.
 */
export class AllocationOptimizer {
  readonly config: OptimizerConfig;

  constructor(config: Partial<OptimizerConfig> = {}) {
    this.config = { ...DEFAULT_OPTIMIZER, ...config };
  }

  plan(request: JobRequest, round: RoundInput): AllocationPlan {
    const candidates = round.candidates.filter((c) => c.eligible && c.quote.availableCapacity > 0);
    const counts = greedyFill(candidates, request.count);

    const exchanges: AllocationExchange[] = [];
    if (request.diversificationLimit !== undefined && request.diversificationLimit < 1) {
      const cap = Math.max(1, Math.floor(request.diversificationLimit * request.count));
      this.diversify(candidates, counts, cap, exchanges);
    }

    const lines: AllocationLine[] = [];
    candidates.forEach((c, i) => {
      if (counts[i] === 0) return;
      lines.push({
        provider: c.quote.provider,
        instanceType: c.quote.instanceType,
        region: c.quote.region,
        pricingMode: c.quote.pricingMode,
        count: counts[i],
        unitPrice: c.quote.pricePerHour,
        adjustedUnitPrice: c.riskAdjustedPrice,
      });
    });

    const allocatedCount = sum(lines.map((l) => l.count));
    const totalCostPerHour = sum(lines.map((l) => l.count * l.unitPrice));
    const adjustedCostPerHour = sum(lines.map((l) => l.count * l.adjustedUnitPrice));
    const baselineCostPerHour = singleProviderBaseline(candidates, allocatedCount);

    return {
      roundId: round.roundId,
      lines,
      requestedCount: request.count,
      allocatedCount,
      shortfall: request.count - allocatedCount,
      totalCostPerHour,
      adjustedCostPerHour,
      estimatedTotalCost:
        request.durationHours !== undefined ? totalCostPerHour * request.durationHours : null,
      baselineCostPerHour,
      expectedSavingsPerHour:
        baselineCostPerHour !== null ? Math.max(0, baselineCostPerHour - adjustedCostPerHour) : 0,
      exchanges,
      budgetExceeded:
        request.budgetPerHour !== undefined && totalCostPerHour > request.budgetPerHour + EPSILON,
    };
  }

  private diversify(
    candidates: readonly Candidate[],
    counts: number[],
    cap: number,
    exchanges: AllocationExchange[],
  ): void {
    const greedyCost = adjustedCost(candidates, counts);
    const ceiling = greedyCost * (1 + this.config.exchangeTolerance) + EPSILON;
    let cost = greedyCost;

    while (exchanges.length < this.config.maxExchanges) {
      const perProvider = providerTotals(candidates, counts);
      const over = [...perProvider.entries()]
        .filter(([, n]) => n > cap)
        .sort(([pa, na], [pb, nb]) => nb - na || (pa < pb ? -1 : pa > pb ? 1 : 0))[0];
      if (!over) return;
      const [fromProvider] = over;

      // Most expensive unit of the over-concentrated provider.
      let from = -1;
      candidates.forEach((c, i) => {
        if (c.quote.provider === fromProvider && counts[i] > 0) from = i;
      });

      // Cheapest spare unit of a provider still under its cap.
      const to = candidates.findIndex(
        (c, i) =>
          c.quote.provider !== fromProvider &&
          (perProvider.get(c.quote.provider) ?? 0) < cap &&
          counts[i] < c.quote.availableCapacity,
      );
      if (from === -1 || to === -1) return;

      const delta = candidates[to].riskAdjustedPrice - candidates[from].riskAdjustedPrice;
      if (cost + delta > ceiling) return;

      counts[from] -= 1;
      counts[to] += 1;
      cost += delta;
      exchanges.push({
        fromProvider,
        toProvider: candidates[to].quote.provider,
        costDelta: delta,
      });
    }
  }
}

function greedyFill(candidates: readonly Candidate[], wanted: number): number[] {
  let remaining = Math.max(0, wanted);
  return candidates.map((c) => {
    const take = Math.min(remaining, Math.max(0, Math.floor(c.quote.availableCapacity)));
    remaining -= take;
    return take;
  });
}

/** Cheapest adjusted cost of placing `count` units on one provider alone. */
function singleProviderBaseline(candidates: readonly Candidate[], count: number): number | null {
  if (count === 0) return null;
  const byProvider = new Map<ProviderId, Candidate[]>();
  for (const c of candidates) {
    const list = byProvider.get(c.quote.provider) ?? [];
    list.push(c);
    byProvider.set(c.quote.provider, list);
  }

  let best: number | null = null;
  for (const list of byProvider.values()) {
    const counts = greedyFill(list, count);
    if (sum(counts) < count) continue;
    const cost = adjustedCost(list, counts);
    if (best === null || cost < best) best = cost;
  }
  return best;
}

function providerTotals(candidates: readonly Candidate[], counts: readonly number[]): Map<ProviderId, number> {
  const totals = new Map<ProviderId, number>();
  candidates.forEach((c, i) => {
    totals.set(c.quote.provider, (totals.get(c.quote.provider) ?? 0) + counts[i]);
  });
  return totals;
}

function adjustedCost(candidates: readonly Candidate[], counts: readonly number[]): number {
  return sum(candidates.map((c, i) => c.riskAdjustedPrice * counts[i]));
}

function sum(values: readonly number[]): number {
  return values.reduce((total, v) => total + v, 0);
}
