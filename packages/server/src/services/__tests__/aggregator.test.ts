import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import pino from "pino";
import type { ProviderId, Quote, QuoteRequest } from "@gpubroker/shared";
import { PriceAggregator, type AggregatorConfig } from "../aggregator.js";
import { AdapterRegistry, type ProviderAdapter } from "../provider-adapter.js";
import { HistoricalRiskModel, WeightedScoringStrategy } from "../risk-model.js";
import { PriceHistory } from "../price-history.js";
import { AuthenticationError, QuotaExceededError } from "../../errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeQuote(provider: ProviderId, price: number, overrides: Partial<Quote> = {}): Quote {
  return {
    provider,
    instanceType: `${provider}-h100`,
    gpuType: "H100",
    pricePerHour: price,
    pricingMode: "on-demand",
    region: "us-east",
    availableCapacity: 4,
    observedAt: 0,
    ...overrides,
  };
}

/** Adapter whose quote() is scripted; provisioning is never exercised here. */
function fakeAdapter(
  id: ProviderId,
  quote: (req: QuoteRequest, signal?: AbortSignal) => Promise<Quote[]>,
): ProviderAdapter {
  return {
    id,
    quote,
    provision: () => Promise.reject(new Error("not used")),
    status: () => Promise.reject(new Error("not used")),
    terminate: () => Promise.reject(new Error("not used")),
  };
}

/** Never answers; settles only when its signal aborts. */
function hangingAdapter(id: ProviderId): ProviderAdapter {
  return fakeAdapter(
    id,
    (_req, signal) =>
      new Promise<Quote[]>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      }),
  );
}

describe("PriceAggregator", () => {
  let history: PriceHistory;

  beforeEach(() => {
    history = new PriceHistory(":memory:", () => 1_000_000);
  });

  afterEach(() => {
    history.close();
  });

  function makeAggregator(adapters: ProviderAdapter[], config: Partial<AggregatorConfig> = {}) {
    return new PriceAggregator({
      registry: new AdapterRegistry(adapters),
      riskModel: new HistoricalRiskModel(history),
      scoring: new WeightedScoringStrategy(),
      history,
      log: pino({ level: "silent" }),
      config: { quoteTimeoutMs: 50, ...config },
    });
  }

  it("ranks candidates by risk-adjusted price", async () => {
    const aggregator = makeAggregator([
      fakeAdapter("vastai", async () => [makeQuote("vastai", 2.5)]),
      fakeAdapter("lambdalabs", async () => [makeQuote("lambdalabs", 2.0)]),
    ]);

    const round = await aggregator.aggregate({ gpuType: "H100" });

    assert.deepEqual(
      round.candidates.map((c) => c.quote.provider),
      ["lambdalabs", "vastai"],
    );
    // on-demand volatility prior 0.05 with risk aversion 1
    assert.ok(Math.abs(round.candidates[0].riskAdjustedPrice - 2.1) < 1e-9);
    assert.deepEqual(
      round.providers.map((p) => [p.provider, p.status, p.quoteCount]),
      [
        ["vastai", "ok", 1],
        ["lambdalabs", "ok", 1],
      ],
    );
  });

  it("breaks price ties by provider priority", async () => {
    const aggregator = makeAggregator(
      [
        fakeAdapter("lambdalabs", async () => [makeQuote("lambdalabs", 2.0)]),
        fakeAdapter("vastai", async () => [makeQuote("vastai", 2.0)]),
      ],
      { providerPriority: ["vastai"] },
    );

    const round = await aggregator.aggregate({ gpuType: "H100" });

    assert.deepEqual(
      round.candidates.map((c) => c.quote.provider),
      ["vastai", "lambdalabs"],
    );
  });

  it("leaves a timed-out provider out of the round", async () => {
    const aggregator = makeAggregator([
      hangingAdapter("digitalocean"),
      fakeAdapter("vastai", async () => [makeQuote("vastai", 2.0)]),
    ]);

    const round = await aggregator.aggregate({ gpuType: "H100" });

    assert.deepEqual(
      round.candidates.map((c) => c.quote.provider),
      ["vastai"],
    );
    assert.equal(round.rejected.length, 0);
    const outcome = round.providers.find((p) => p.provider === "digitalocean");
    assert.equal(outcome?.status, "timeout");
    assert.equal(outcome?.quoteCount, 0);
  });

  it("reports auth and quota failures per provider", async () => {
    const aggregator = makeAggregator([
      fakeAdapter("vastai", () => Promise.reject(new AuthenticationError("vastai", "bad key"))),
      fakeAdapter("lambdalabs", () => Promise.reject(new QuotaExceededError("lambdalabs", "quota"))),
      fakeAdapter("digitalocean", () => Promise.reject(new Error("socket hang up"))),
    ]);

    const round = await aggregator.aggregate({ gpuType: "H100" });

    assert.deepEqual(
      round.providers.map((p) => p.status),
      ["auth-error", "quota-exceeded", "error"],
    );
    assert.deepEqual(round.candidates, []);
  });

  it("discards quotes that cannot be compared", async () => {
    const aggregator = makeAggregator([
      fakeAdapter("vastai", async () => [
        makeQuote("vastai", 0),
        makeQuote("vastai", Number.NaN),
        makeQuote("vastai", 1.5, { pricingMode: "spot" }),
        makeQuote("vastai", 1.5, { gpuType: "A100" }),
        makeQuote("vastai", 1.5, { region: "eu-west" }),
        makeQuote("vastai", 1.8),
      ]),
    ]);

    const round = await aggregator.aggregate({ gpuType: "H100", region: "us-east" });

    assert.equal(round.candidates.length, 1);
    assert.equal(round.candidates[0].quote.pricePerHour, 1.8);
  });

  it("keeps filtered candidates for reporting", async () => {
    const aggregator = makeAggregator(
      [
        fakeAdapter("vastai", async () => [
          makeQuote("vastai", 1.0, { availableCapacity: 0 }),
          makeQuote("vastai", 2.0, { instanceType: "deep", availableCapacity: 8 }),
          makeQuote("vastai", 1.5, { instanceType: "shallow", availableCapacity: 1 }),
        ]),
      ],
      { minConfidence: 0.7 },
    );

    const round = await aggregator.aggregate({ gpuType: "H100" });

    // reliability 0.86 after one successful quote; confidence = 0.7 × 0.86 + 0.3 × capacity / 8
    assert.deepEqual(
      round.candidates.map((c) => c.quote.instanceType),
      ["deep"],
    );
    assert.deepEqual(
      round.rejected.map((c) => [c.quote.instanceType, c.rejectionReasons]),
      [
        ["vastai-h100", ["no-capacity", "low-confidence"]],
        ["shallow", ["low-confidence"]],
      ],
    );
  });

  it("records ticks and provider events", async () => {
    const aggregator = makeAggregator([
      fakeAdapter("vastai", async () => [makeQuote("vastai", 2.0)]),
      fakeAdapter("lambdalabs", () => Promise.reject(new AuthenticationError("lambdalabs", "nope"))),
    ]);

    await aggregator.aggregate({ gpuType: "H100" });

    assert.deepEqual(
      history.priceSeries({
        provider: "vastai",
        instanceType: "vastai-h100",
        region: "us-east",
        pricingMode: "on-demand",
      }),
      [2.0],
    );
    assert.deepEqual(history.outcomes("lambdalabs", 60_000).quote, { attempts: 1, successes: 0 });
    assert.deepEqual(history.outcomes("vastai", 60_000).quote, { attempts: 1, successes: 1 });
  });
});
