import BetterSqlite3 from "better-sqlite3";
import type { PricingMode, ProviderErrorKind, ProviderId, Quote } from "@gpubroker/shared";
import type { ProviderOperation } from "./provider-gate.js";

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

interface PriceRow {
  price_per_hour: number;
}

interface OutcomeRow {
  operation: ProviderOperation;
  attempts: number;
  successes: number;
}

export interface ProviderEvent {
  provider: ProviderId;
  operation: ProviderOperation;
  success: boolean;
  latencyMs: number;
  errorKind?: ProviderErrorKind;
  at?: number;
}

export interface SeriesKey {
  provider: ProviderId;
  instanceType: string;
  region: string;
  pricingMode: PricingMode;
}

export interface OutcomeCounts {
  attempts: number;
  successes: number;
}

export interface ProviderOutcomes {
  provision: OutcomeCounts;
  quote: OutcomeCounts;
  /** status and terminate calls */
  other: OutcomeCounts;
}

// ---------------------------------------------------------------------------
// Price history
// ---------------------------------------------------------------------------

/**
 * Observed quote prices and provider call outcomes. Feeds realized
 * volatility and provider reliability to the risk model.
 */
export class PriceHistory {
  private db: BetterSqlite3.Database;
  private stmts: ReturnType<PriceHistory["prepareStatements"]>;

  constructor(
    dbPath: string,
    private now: () => number = Date.now,
  ) {
    this.db = new BetterSqlite3(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();
    this.stmts = this.prepareStatements();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS price_ticks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        provider TEXT NOT NULL,
        instance_type TEXT NOT NULL,
        region TEXT NOT NULL,
        pricing_mode TEXT NOT NULL,
        gpu_type TEXT NOT NULL,
        price_per_hour REAL NOT NULL,
        available_capacity INTEGER NOT NULL,
        observed_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_price_ticks_series
        ON price_ticks(provider, instance_type, region, pricing_mode, observed_at);

      CREATE TABLE IF NOT EXISTS provider_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        provider TEXT NOT NULL,
        operation TEXT NOT NULL,
        success INTEGER NOT NULL,
        latency_ms INTEGER NOT NULL,
        error_kind TEXT,
        at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_provider_events_provider
        ON provider_events(provider, at);
    `);
  }

  private prepareStatements() {
    return {
      insertTick: this.db.prepare(`
        INSERT INTO price_ticks (provider, instance_type, region, pricing_mode, gpu_type, price_per_hour, available_capacity, observed_at)
        VALUES (@provider, @instanceType, @region, @pricingMode, @gpuType, @pricePerHour, @availableCapacity, @observedAt)
      `),
      recentPrices: this.db.prepare(`
        SELECT price_per_hour FROM price_ticks
        WHERE provider = @provider AND instance_type = @instanceType
          AND region = @region AND pricing_mode = @pricingMode
        ORDER BY observed_at DESC, id DESC
        LIMIT @limit
      `),
      insertEvent: this.db.prepare(`
        INSERT INTO provider_events (provider, operation, success, latency_ms, error_kind, at)
        VALUES (@provider, @operation, @success, @latencyMs, @errorKind, @at)
      `),
      outcomes: this.db.prepare(`
        SELECT operation, COUNT(*) AS attempts, SUM(success) AS successes
        FROM provider_events
        WHERE provider = @provider AND at >= @since
        GROUP BY operation
      `),
      pruneTicks: this.db.prepare("DELETE FROM price_ticks WHERE observed_at < ?"),
      pruneEvents: this.db.prepare("DELETE FROM provider_events WHERE at < ?"),
    };
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  recordQuotes(quotes: readonly Quote[]): void {
    const insert = this.db.transaction((rows: readonly Quote[]) => {
      for (const q of rows) {
        this.stmts.insertTick.run({
          provider: q.provider,
          instanceType: q.instanceType,
          region: q.region,
          pricingMode: q.pricingMode,
          gpuType: q.gpuType,
          pricePerHour: q.pricePerHour,
          availableCapacity: q.availableCapacity,
          observedAt: q.observedAt,
        });
      }
    });
    insert(quotes);
  }

  recordEvent(event: ProviderEvent): void {
    this.stmts.insertEvent.run({
      provider: event.provider,
      operation: event.operation,
      success: event.success ? 1 : 0,
      latencyMs: Math.round(event.latencyMs),
      errorKind: event.errorKind ?? null,
      at: event.at ?? this.now(),
    });
  }

  /** Delete ticks and events older than `maxAgeMs`. Returns rows removed. */
  prune(maxAgeMs: number): number {
    const cutoff = this.now() - maxAgeMs;
    return this.stmts.pruneTicks.run(cutoff).changes + this.stmts.pruneEvents.run(cutoff).changes;
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  /** Most recent prices for one series, oldest first. */
  priceSeries(key: SeriesKey, limit = 50): number[] {
    const rows = this.stmts.recentPrices.all({
      provider: key.provider,
      instanceType: key.instanceType,
      region: key.region,
      pricingMode: key.pricingMode,
      limit,
    }) as PriceRow[];
    return rows.map((r) => r.price_per_hour).reverse();
  }

  outcomes(provider: ProviderId, windowMs: number): ProviderOutcomes {
    const rows = this.stmts.outcomes.all({
      provider,
      since: this.now() - windowMs,
    }) as OutcomeRow[];

    const result: ProviderOutcomes = {
      provision: { attempts: 0, successes: 0 },
      quote: { attempts: 0, successes: 0 },
      other: { attempts: 0, successes: 0 },
    };
    for (const row of rows) {
      const bucket =
        row.operation === "provision" ? result.provision : row.operation === "quote" ? result.quote : result.other;
      bucket.attempts += row.attempts;
      bucket.successes += row.successes;
    }
    return result;
  }

  close(): void {
    this.db.close();
  }
}
