import { nanoid } from "nanoid";
import type { FastifyBaseLogger } from "fastify";
import type {
  AggregationRound,
  Candidate,
  ProviderErrorKind,
  ProviderId,
  ProviderRoundOutcome,
  ProviderRoundStatus,
  Quote,
  QuoteRequest,
  RejectionReason,
} from "@gpubroker/shared";
import type { AdapterRegistry, ProviderAdapter } from "./provider-adapter.js";
import type { RiskModel, ScoringStrategy } from "./risk-model.js";
import type { PriceHistory } from "./price-history.js";
import { abortReason, runBounded, withTimeout } from "./concurrency.js";
import { toProviderError } from "./provider-gate.js";
import { gpuMatches } from "./providers/provider-http.js";
import { errorMessage } from "../errors.js";

export interface AggregatorConfig {
  quoteConcurrency: number;
  /** Bounds one adapter's whole quote call, gate retries included. */
  quoteTimeoutMs: number;
  minConfidence: number;
  maxRiskScore: number;
  /** Earlier providers win ties on adjusted price and confidence. */
  providerPriority: ProviderId[];
}

export const DEFAULT_AGGREGATOR: AggregatorConfig = {
  quoteConcurrency: 8,
  quoteTimeoutMs: 15_000,
  minConfidence: 0.5,
  maxRiskScore: 0.6,
  providerPriority: [],
};

export interface AggregatorDeps {
  registry: AdapterRegistry;
  riskModel: RiskModel;
  scoring: ScoringStrategy;
  history: PriceHistory | null;
  log: FastifyBaseLogger;
  config?: Partial<AggregatorConfig>;
  now?: () => number;
}

interface AdapterResult {
  outcome: ProviderRoundOutcome;
  quotes: Quote[];
}

/**
 * Fans a quote request out to every adapter and turns the answers into a
 * ranked, filtered candidate list. Providers that fail or time out are
 * absent from the round.
 */
export class PriceAggregator {
  readonly config: AggregatorConfig;
  private registry: AdapterRegistry;
  private riskModel: RiskModel;
  private scoring: ScoringStrategy;
  private history: PriceHistory | null;
  private log: FastifyBaseLogger;
  private now: () => number;

  constructor(deps: AggregatorDeps) {
    this.registry = deps.registry;
    this.riskModel = deps.riskModel;
    this.scoring = deps.scoring;
    this.history = deps.history;
    this.log = deps.log;
    this.now = deps.now ?? Date.now;
    this.config = { ...DEFAULT_AGGREGATOR, ...deps.config };
  }

  async aggregate(request: QuoteRequest, signal?: AbortSignal): Promise<AggregationRound> {
    const roundId = nanoid(12);
    const startedAt = this.now();

    const results = await runBounded(this.registry.all(), this.config.quoteConcurrency, (adapter) =>
      this.quoteOne(adapter, request, signal),
    );
    if (signal?.aborted) throw abortReason(signal);

    const quotes = results.flatMap((r) => normalize(r.quotes, request));
    this.history?.recordQuotes(quotes);

    const scored = quotes.map((q) => this.score(q));
    const compare = compareCandidates(this.config.providerPriority);
    const candidates = scored.filter((c) => c.eligible).sort(compare);
    const rejected = scored.filter((c) => !c.eligible).sort(compare);

    const round: AggregationRound = {
      roundId,
      request,
      startedAt,
      completedAt: this.now(),
      candidates,
      rejected,
      providers: results.map((r) => r.outcome),
    };

    this.log.info(
      {
        roundId,
        gpuType: request.gpuType,
        eligible: candidates.length,
        rejected: rejected.length,
        providers: round.providers.map((p) => `${p.provider}:${p.status}`),
      },
      "Aggregation round complete",
    );
    return round;
  }

  private async quoteOne(
    adapter: ProviderAdapter,
    request: QuoteRequest,
    signal?: AbortSignal,
  ): Promise<AdapterResult> {
    const started = this.now();
    try {
      const quotes = await withTimeout(
        (s) => adapter.quote(request, s),
        this.config.quoteTimeoutMs,
        signal,
      );
      const latencyMs = this.now() - started;
      this.history?.recordEvent({ provider: adapter.id, operation: "quote", success: true, latencyMs });
      return {
        quotes,
        outcome: { provider: adapter.id, status: "ok", quoteCount: quotes.length, latencyMs },
      };
    } catch (err) {
      const latencyMs = this.now() - started;
      if (signal?.aborted) {
        return {
          quotes: [],
          outcome: { provider: adapter.id, status: "error", quoteCount: 0, latencyMs, error: errorMessage(err) },
        };
      }

      const mapped = toProviderError(adapter.id, err);
      this.history?.recordEvent({
        provider: adapter.id,
        operation: "quote",
        success: false,
        latencyMs,
        errorKind: mapped.kind,
      });
      const status = roundStatus(mapped.kind);
      this.log.warn({ provider: adapter.id, status, err: mapped.message }, "Provider dropped from round");
      return {
        quotes: [],
        outcome: { provider: adapter.id, status, quoteCount: 0, latencyMs, error: mapped.message },
      };
    }
  }

  private score(quote: Quote): Candidate {
    const risk = this.riskModel.profile(quote);
    const { riskAdjustedPrice, confidence, riskScore } = this.scoring.score(quote, risk);

    const rejectionReasons: RejectionReason[] = [];
    if (quote.availableCapacity <= 0) rejectionReasons.push("no-capacity");
    if (confidence < this.config.minConfidence) rejectionReasons.push("low-confidence");
    if (riskScore > this.config.maxRiskScore) rejectionReasons.push("high-risk");

    return {
      quote,
      risk,
      riskAdjustedPrice,
      confidence,
      riskScore,
      eligible: rejectionReasons.length === 0,
      rejectionReasons,
    };
  }
}

function roundStatus(kind: ProviderErrorKind): ProviderRoundStatus {
  switch (kind) {
    case "timeout":
      return "timeout";
    case "auth":
      return "auth-error";
    case "quota":
      return "quota-exceeded";
    default:
      return "error";
  }
}

/** Drop quotes that cannot be compared with the rest of the round. */
export function normalize(quotes: readonly Quote[], request: QuoteRequest): Quote[] {
  const mode = request.pricingMode ?? "on-demand";
  const region = request.region?.toLowerCase();
  return quotes.filter(
    (q) =>
      Number.isFinite(q.pricePerHour) &&
      q.pricePerHour > 0 &&
      Number.isFinite(q.availableCapacity) &&
      q.pricingMode === mode &&
      gpuMatches(request.gpuType, q.gpuType) &&
      (region === undefined || q.region.toLowerCase().includes(region)),
  );
}

/**
 * Adjusted price ascending, confidence descending, configured provider
 * priority, then provider / instance type / region lexically.
 */
export function compareCandidates(priority: readonly ProviderId[]) {
  const rank = (provider: ProviderId) => {
    const i = priority.indexOf(provider);
    return i === -1 ? priority.length : i;
  };
  return (a: Candidate, b: Candidate): number =>
    a.riskAdjustedPrice - b.riskAdjustedPrice ||
    b.confidence - a.confidence ||
    rank(a.quote.provider) - rank(b.quote.provider) ||
    lexical(a.quote.provider, b.quote.provider) ||
    lexical(a.quote.instanceType, b.quote.instanceType) ||
    lexical(a.quote.region, b.quote.region);
}

function lexical(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
