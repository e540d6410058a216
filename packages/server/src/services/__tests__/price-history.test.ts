import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type { Quote } from "@gpubroker/shared";
import { PriceHistory } from "../price-history.js";

function makeQuote(pricePerHour: number, observedAt: number, overrides: Partial<Quote> = {}): Quote {
  return {
    provider: "vastai",
    instanceType: "RTX4090",
    gpuType: "RTX4090",
    pricePerHour,
    pricingMode: "on-demand",
    region: "US",
    availableCapacity: 3,
    observedAt,
    ...overrides,
  };
}

describe("PriceHistory", () => {
  let clock = 1_000_000;
  let history: PriceHistory;

  beforeEach(() => {
    clock = 1_000_000;
    history = new PriceHistory(":memory:", () => clock);
  });

  afterEach(() => {
    history.close();
  });

  it("returns a series oldest first", () => {
    history.recordQuotes([makeQuote(0.5, 10), makeQuote(0.7, 30), makeQuote(0.6, 20)]);

    const series = history.priceSeries({
      provider: "vastai",
      instanceType: "RTX4090",
      region: "US",
      pricingMode: "on-demand",
    });

    assert.deepEqual(series, [0.5, 0.6, 0.7]);
  });

  it("keeps only the most recent ticks up to the limit", () => {
    history.recordQuotes([1, 2, 3, 4, 5].map((p) => makeQuote(p, p * 10)));

    const series = history.priceSeries(
      { provider: "vastai", instanceType: "RTX4090", region: "US", pricingMode: "on-demand" },
      3,
    );

    assert.deepEqual(series, [3, 4, 5]);
  });

  it("separates series by region and pricing mode", () => {
    history.recordQuotes([
      makeQuote(0.5, 10),
      makeQuote(0.3, 11, { pricingMode: "spot" }),
      makeQuote(0.9, 12, { region: "EU" }),
    ]);

    const spot = history.priceSeries({
      provider: "vastai",
      instanceType: "RTX4090",
      region: "US",
      pricingMode: "spot",
    });

    assert.deepEqual(spot, [0.3]);
  });

  it("counts call outcomes per operation inside the window", () => {
    history.recordEvent({ provider: "lambdalabs", operation: "provision", success: true, latencyMs: 100 });
    history.recordEvent({ provider: "lambdalabs", operation: "provision", success: false, latencyMs: 100, errorKind: "timeout" });
    history.recordEvent({ provider: "lambdalabs", operation: "quote", success: true, latencyMs: 20 });
    history.recordEvent({ provider: "lambdalabs", operation: "status", success: true, latencyMs: 20 });
    history.recordEvent({ provider: "lambdalabs", operation: "terminate", success: false, latencyMs: 20 });
    history.recordEvent({ provider: "vastai", operation: "quote", success: false, latencyMs: 20 });
    history.recordEvent({ provider: "lambdalabs", operation: "quote", success: false, latencyMs: 20, at: clock - 5000 });

    const outcomes = history.outcomes("lambdalabs", 1000);

    assert.deepEqual(outcomes, {
      provision: { attempts: 2, successes: 1 },
      quote: { attempts: 1, successes: 1 },
      other: { attempts: 2, successes: 1 },
    });
  });

  it("prunes rows older than the retention age", () => {
    history.recordQuotes([makeQuote(0.5, clock - 10_000), makeQuote(0.6, clock - 10)]);
    history.recordEvent({ provider: "vastai", operation: "quote", success: true, latencyMs: 5, at: clock - 10_000 });

    const removed = history.prune(1000);

    assert.equal(removed, 2);
    assert.deepEqual(
      history.priceSeries({ provider: "vastai", instanceType: "RTX4090", region: "US", pricingMode: "on-demand" }),
      [0.6],
    );
  });
});
