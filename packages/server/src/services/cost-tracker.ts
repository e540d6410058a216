import type { FastifyBaseLogger } from "fastify";
import type {
  Candidate,
  CostAggregate,
  CostRecord,
  CostSnapshot,
  Instance,
  Job,
  MigrationRecommendation,
  QuoteRequest,
} from "@gpubroker/shared";
import type { JobStateStore } from "./job-state-store.js";
import type { PriceAggregator } from "./aggregator.js";
import type { JobEventHub } from "./job-events.js";
import { errorMessage } from "../errors.js";

export interface CostTrackerConfig {
  sampleIntervalMs: number;
  requoteIntervalMs: number;
  /** Fraction of the locked price an alternative must undercut by. */
  minSavingsFraction: number;
  /** Newest cost records kept per job. */
  ledgerLimit: number;
}

export const DEFAULT_COST_TRACKER: CostTrackerConfig = {
  sampleIntervalMs: 60_000,
  requoteIntervalMs: 900_000,
  minSavingsFraction: 0.1,
  ledgerLimit: 500,
};

const MS_PER_HOUR = 3_600_000;
const EPSILON = 1e-9;

export interface CostTrackerDeps {
  store: JobStateStore;
  aggregator: Pick<PriceAggregator, "aggregate">;
  hub: JobEventHub | null;
  log: FastifyBaseLogger;
  config?: Partial<CostTrackerConfig>;
  now?: () => number;
}

/** Runtime × locked price, stopping at the instance's end time. */
export function accruedCost(instance: Instance, now: number): number {
  if (instance.startedAt === null) return 0;
  const end = Math.min(instance.endedAt ?? now, now);
  return (Math.max(0, end - instance.startedAt) / MS_PER_HOUR) * instance.pricePerHour;
}

/**
 * Samples accrued cost of every instance on one timer and re-quotes the GPU
 * mix of running jobs on another. Re-quoting only produces recommendations;
 * nothing is terminated or migrated here.
 */
export class CostTracker {
  readonly config: CostTrackerConfig;
  private store: JobStateStore;
  private aggregator: Pick<PriceAggregator, "aggregate">;
  private hub: JobEventHub | null;
  private log: FastifyBaseLogger;
  private now: () => number;
  private sampleTimer: ReturnType<typeof setInterval> | null = null;
  private requoteTimer: ReturnType<typeof setInterval> | null = null;
  private snapshot: CostSnapshot | null = null;
  private latest: MigrationRecommendation[] = [];
  // A tick that finds its previous run still going is skipped.
  private sampling = false;
  private requoting = false;

  constructor(deps: CostTrackerDeps) {
    this.store = deps.store;
    this.aggregator = deps.aggregator;
    this.hub = deps.hub;
    this.log = deps.log;
    this.now = deps.now ?? Date.now;
    this.config = { ...DEFAULT_COST_TRACKER, ...deps.config };
  }

  start(): void {
    this.sampleTimer = setInterval(() => this.sampleTick(), this.config.sampleIntervalMs);
    this.requoteTimer = setInterval(() => this.requoteTick(), this.config.requoteIntervalMs);
  }

  stop(): void {
    if (this.sampleTimer) {
      clearInterval(this.sampleTimer);
      this.sampleTimer = null;
    }
    if (this.requoteTimer) {
      clearInterval(this.requoteTimer);
      this.requoteTimer = null;
    }
  }

  latestSnapshot(): CostSnapshot | null {
    return this.snapshot;
  }

  recommendations(): MigrationRecommendation[] {
    return [...this.latest];
  }

  async sample(): Promise<CostSnapshot> {
    const sampledAt = this.now();
    const byJob: Record<string, CostAggregate> = {};
    const byProvider: Record<string, CostAggregate> = {};
    const total = emptyAggregate();

    for (const listed of await this.store.list()) {
      let job: Job = listed;
      if (job.instances.some((i) => accruedCost(i, sampledAt) > i.accruedCost + EPSILON)) {
        job = await this.store.update(job.jobId, (j) => this.accrue(j, sampledAt), {
          recordHistory: false,
        });
      }

      const perJob = emptyAggregate();
      for (const instance of job.instances) {
        const provider = (byProvider[instance.provider] ??= emptyAggregate());
        for (const agg of [perJob, provider, total]) add(agg, instance);
      }
      if (job.instances.length > 0) byJob[job.jobId] = perJob;
    }

    this.snapshot = { sampledAt, byJob, byProvider, total };
    this.log.debug({ jobs: Object.keys(byJob).length, costPerHour: total.costPerHour }, "Cost sample taken");
    return this.snapshot;
  }

  /** Re-quote every running job's GPU type, region and pricing mode. */
  async requote(): Promise<MigrationRecommendation[]> {
    const jobs = (await this.store.list()).filter((j) => j.instances.some((i) => i.state === "running"));
    const groups = new Map<string, { request: QuoteRequest; jobs: Job[] }>();
    for (const job of jobs) {
      const request: QuoteRequest = {
        gpuType: job.request.gpuType,
        region: job.request.region,
        pricingMode: job.request.pricingMode,
      };
      const key = `${request.gpuType}|${request.region ?? ""}|${request.pricingMode ?? "on-demand"}`;
      const group = groups.get(key) ?? { request, jobs: [] };
      group.jobs.push(job);
      groups.set(key, group);
    }

    const recommendations: MigrationRecommendation[] = [];
    for (const { request, jobs: grouped } of groups.values()) {
      try {
        const round = await this.aggregator.aggregate(request);
        for (const job of grouped) {
          recommendations.push(...this.compare(job, round.candidates, round.roundId));
        }
      } catch (err) {
        this.log.warn({ gpuType: request.gpuType, err: errorMessage(err) }, "Re-quote failed");
      }
    }

    this.latest = recommendations;
    for (const recommendation of recommendations) {
      this.hub?.emit({ type: "recommendation", data: recommendation });
    }
    if (recommendations.length > 0) {
      this.log.info({ count: recommendations.length }, "Migration recommendations available");
    }
    return recommendations;
  }

  private compare(job: Job, candidates: readonly Candidate[], roundId: string): MigrationRecommendation[] {
    const out: MigrationRecommendation[] = [];
    for (const instance of job.instances) {
      if (instance.state !== "running" || instance.pricePerHour <= 0) continue;

      const alternative = cheapest(
        candidates.filter(
          (c) =>
            c.quote.availableCapacity > 0 &&
            !(
              c.quote.provider === instance.provider &&
              c.quote.instanceType === instance.instanceType &&
              c.quote.region === instance.region
            ),
        ),
      );
      if (!alternative) continue;

      const savingsFraction =
        (instance.pricePerHour - alternative.quote.pricePerHour) / instance.pricePerHour;
      if (savingsFraction <= this.config.minSavingsFraction + EPSILON) continue;

      out.push({
        jobId: job.jobId,
        instanceId: instance.instanceId,
        provider: instance.provider,
        instanceType: instance.instanceType,
        region: instance.region,
        lockedPricePerHour: instance.pricePerHour,
        alternative: alternative.quote,
        savingsFraction,
        roundId,
        createdAt: this.now(),
      });
    }
    return out;
  }

  private accrue(job: Job, now: number): Job {
    const records: CostRecord[] = [];
    const instances = job.instances.map((instance) => {
      const cost = accruedCost(instance, now);
      if (cost <= instance.accruedCost + EPSILON) return instance;
      records.push({ jobId: job.jobId, instanceId: instance.instanceId, timestamp: now, cumulativeCost: cost });
      return { ...instance, accruedCost: cost };
    });
    return {
      ...job,
      instances,
      costLedger: [...job.costLedger, ...records].slice(-this.config.ledgerLimit),
    };
  }

  private async sampleTick(): Promise<void> {
    if (this.sampling) return;
    this.sampling = true;
    try {
      await this.sample();
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, "Cost sampling failed");
    } finally {
      this.sampling = false;
    }
  }

  private async requoteTick(): Promise<void> {
    if (this.requoting) {
      this.log.debug("Previous re-quote still running; tick skipped");
      return;
    }
    this.requoting = true;
    try {
      await this.requote();
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, "Re-quote loop failed");
    } finally {
      this.requoting = false;
    }
  }
}

/** Lowest base price; ranking order breaks ties. */
function cheapest(candidates: readonly Candidate[]): Candidate | undefined {
  let best: Candidate | undefined;
  for (const c of candidates) {
    if (!best || c.quote.pricePerHour < best.quote.pricePerHour) best = c;
  }
  return best;
}

function emptyAggregate(): CostAggregate {
  return { instances: 0, costPerHour: 0, accruedCost: 0 };
}

function add(aggregate: CostAggregate, instance: Instance): void {
  aggregate.accruedCost += instance.accruedCost;
  if (instance.state === "running") {
    aggregate.instances += 1;
    aggregate.costPerHour += instance.pricePerHour;
  }
}
