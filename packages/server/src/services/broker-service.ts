import type { FastifyBaseLogger } from "fastify";
import type {
  AggregationRound,
  Job,
  JobRequest,
  JobVersionSummary,
  ProvisionReport,
  QuoteRequest,
} from "@gpubroker/shared";
import type { JobStateStore } from "./job-state-store.js";
import type { PriceAggregator } from "./aggregator.js";
import type { AllocationOptimizer } from "./optimizer.js";
import type { ProvisioningOrchestrator } from "./orchestrator.js";
import type { CancellationRegistry } from "./cancellation.js";
import { minimumFor } from "./orchestrator.js";
import { isActive, isFinal } from "./instance-lifecycle.js";
import { BudgetInfeasibleError, InvalidJobStateError, errorMessage } from "../errors.js";

export type BudgetPolicy = "warn" | "abort";

export interface BrokerServiceDeps {
  store: JobStateStore;
  aggregator: PriceAggregator;
  optimizer: AllocationOptimizer;
  orchestrator: ProvisioningOrchestrator;
  cancellations: CancellationRegistry;
  log: FastifyBaseLogger;
  budgetPolicy?: BudgetPolicy;
  now?: () => number;
}

/**
 * Submission interface over the broker: plans a job from one aggregation
 * round, runs provisioning in the background and exposes the operator
 * actions on existing jobs.
 */
export class BrokerService {
  private store: JobStateStore;
  private aggregator: PriceAggregator;
  private optimizer: AllocationOptimizer;
  private orchestrator: ProvisioningOrchestrator;
  private cancellations: CancellationRegistry;
  private log: FastifyBaseLogger;
  private budgetPolicy: BudgetPolicy;
  private now: () => number;
  private runs = new Map<string, Promise<void>>();

  constructor(deps: BrokerServiceDeps) {
    this.store = deps.store;
    this.aggregator = deps.aggregator;
    this.optimizer = deps.optimizer;
    this.orchestrator = deps.orchestrator;
    this.cancellations = deps.cancellations;
    this.log = deps.log;
    this.budgetPolicy = deps.budgetPolicy ?? "warn";
    this.now = deps.now ?? Date.now;
  }

  quote(request: QuoteRequest, signal?: AbortSignal): Promise<AggregationRound> {
    return this.aggregator.aggregate(request, signal);
  }

  /**
   * Create the job, plan it and start provisioning in the background.
   * Throws BudgetInfeasibleError (after failing the job) when the budget
   * policy is "abort" and the plan is over budget. A job cancelled while it
   * was being quoted stays cancelled and is not launched.
   */
  async submit(request: JobRequest): Promise<Job> {
    const created = await this.store.create(request);
    const jobId = created.jobId;
    this.log.info({ jobId, gpuType: request.gpuType, count: request.count }, "Job submitted");

    let round: AggregationRound;
    try {
      round = await this.aggregator.aggregate({
        gpuType: request.gpuType,
        region: request.region,
        pricingMode: request.pricingMode,
      });
    } catch (err) {
      return this.failPlanning(jobId, `Quoting failed: ${errorMessage(err)}`, null);
    }

    const plan = this.optimizer.plan(request, { roundId: round.roundId, candidates: round.candidates });
    const warnings = round.providers
      .filter((p) => p.status !== "ok")
      .map((p) => `${p.provider}: ${p.status}${p.error ? ` (${p.error})` : ""}`);

    if (plan.allocatedCount === 0) {
      return this.failPlanning(jobId, `No eligible capacity for ${request.gpuType}`, round, warnings);
    }
    if (plan.budgetExceeded && request.budgetPerHour !== undefined) {
      const budgetError = new BudgetInfeasibleError(plan, request.budgetPerHour);
      if (this.budgetPolicy === "abort") {
        // A cancel that landed while quoting stands.
        const aborted = await this.store.update(jobId, (j) =>
          j.status === "cancelled"
            ? { ...j, plan }
            : {
                ...j,
                plan,
                status: "failed",
                error: budgetError.message,
                completedAt: this.now(),
                warnings: [...j.warnings, ...warnings],
              },
        );
        if (aborted.status === "cancelled") return aborted;
        this.log.warn({ jobId, costPerHour: plan.totalCostPerHour }, "Job aborted over budget");
        throw budgetError;
      }
      warnings.push(`${budgetError.message}; proceeding best-effort`);
    }
    if (plan.shortfall > 0) {
      warnings.push(`Only ${plan.allocatedCount} of ${plan.requestedCount} units available this round`);
    }
    if (plan.allocatedCount < minimumFor(request)) {
      warnings.push(`Plan covers ${plan.allocatedCount} units, below the minimum of ${minimumFor(request)}`);
    }

    const job = await this.store.update(jobId, (j) => ({
      ...j,
      plan,
      warnings: [...j.warnings, ...warnings],
    }));
    this.log.info(
      { jobId, roundId: plan.roundId, lines: plan.lines.length, costPerHour: plan.totalCostPerHour },
      "Job planned",
    );
    if (job.status !== "cancelled") this.launch(jobId);
    return job;
  }

  status(jobId: string): Promise<Job> {
    return this.store.require(jobId);
  }

  list(): Promise<Job[]> {
    return this.store.list();
  }

  versions(jobId: string): Promise<JobVersionSummary[]> {
    return this.store.listVersions(jobId);
  }

  /**
   * Cancel a pending or provisioning job. Resolves once its run has
   * released every instance it held.
   */
  async cancel(jobId: string): Promise<Job> {
    if (this.cancellations.cancel(jobId)) {
      this.log.info({ jobId }, "Cancellation requested");
      await this.settled(jobId);
      return this.store.require(jobId);
    }

    const job = await this.store.require(jobId);
    if (job.status !== "pending") {
      throw new InvalidJobStateError(`Job ${jobId} is ${job.status} and cannot be cancelled`);
    }
    return this.store.update(jobId, (j) => ({
      ...j,
      status: "cancelled",
      completedAt: this.now(),
    }));
  }

  /** Re-provision missing or failed units of a planned job. */
  async repair(jobId: string): Promise<Job> {
    const job = await this.store.require(jobId);
    if (!job.plan) throw new InvalidJobStateError(`Job ${jobId} has no allocation plan`);
    if (job.status === "cancelled") throw new InvalidJobStateError(`Job ${jobId} was cancelled`);
    if (this.cancellations.isRunning(jobId)) {
      throw new InvalidJobStateError(`Job ${jobId} is already provisioning`);
    }
    this.launch(jobId);
    return job;
  }

  async terminate(jobId: string): Promise<Job> {
    const { job } = await this.orchestrator.terminate(jobId);
    return job;
  }

  /**
   * Restore retained `version`. Instances the current record holds but the
   * restored one does not are terminated first; instances that already
   * ended stay ended.
   */
  async rollback(jobId: string, version: number): Promise<Job> {
    if (this.cancellations.isRunning(jobId)) {
      throw new InvalidJobStateError(`Job ${jobId} is provisioning; cancel it before rolling back`);
    }
    const target = await this.store.getVersion(jobId, version);
    if (!target) {
      throw new InvalidJobStateError(`Version ${version} of job ${jobId} is not retained`);
    }

    const kept = new Set(target.instances.map((i) => i.instanceId));
    await this.orchestrator.terminate(jobId, (i) => !kept.has(i.instanceId));

    const job = await this.store.rollback(jobId, version, (restored, current) => {
      const byId = new Map(current.instances.map((i) => [i.instanceId, i]));
      const instances = restored.instances.map((r) => {
        const now = byId.get(r.instanceId);
        return now && isFinal(now.state) ? now : r;
      });
      const dropped = current.instances.filter((i) => !kept.has(i.instanceId));
      return {
        ...restored,
        instances: [...instances, ...dropped],
        warnings: [...restored.warnings, `Rolled back from version ${current.version} to ${version}`],
      };
    });

    if (job.status === "provisioning") this.launch(jobId);
    return job;
  }

  async remove(jobId: string): Promise<void> {
    await this.store.remove(jobId);
    this.log.info({ jobId }, "Job removed");
  }

  /** Resume jobs a previous process left mid-provisioning. */
  async recover(): Promise<string[]> {
    const jobIds = await this.orchestrator.interruptedJobs();
    for (const jobId of jobIds) {
      this.log.warn({ jobId }, "Resuming interrupted provisioning");
      this.launch(jobId);
    }
    return jobIds;
  }

  /** Resolves when the job's in-process run (if any) has finished. */
  async settled(jobId: string): Promise<void> {
    await this.runs.get(jobId);
  }

  /** Jobs with live instances, for shutdown logging. */
  async activeJobs(): Promise<string[]> {
    return (await this.store.list()).filter((j) => j.instances.some(isActive)).map((j) => j.jobId);
  }

  private launch(jobId: string): void {
    if (this.runs.has(jobId)) return;
    const run = this.orchestrator
      .execute(jobId)
      .then(
        (job) => {
          this.log.info({ jobId, status: job.status }, "Job run settled");
        },
        (err: unknown) => {
          this.log.error({ jobId, err: errorMessage(err) }, "Job run failed");
        },
      )
      .finally(() => {
        this.runs.delete(jobId);
      });
    this.runs.set(jobId, run);
  }

  private async failPlanning(
    jobId: string,
    error: string,
    round: AggregationRound | null,
    warnings: string[] = [],
  ): Promise<Job> {
    const now = this.now();
    const providerFailures: Record<string, string[]> = {};
    for (const p of round?.providers ?? []) {
      if (p.status !== "ok") providerFailures[p.provider] = [p.error ?? p.status];
    }
    const job = await this.store.update(jobId, (j) => {
      if (j.status === "cancelled") return j;
      const report: ProvisionReport = {
        startedAt: now,
        completedAt: now,
        requested: j.request.count,
        achieved: 0,
        minRequired: minimumFor(j.request),
        outcomes: [],
        rolledBack: false,
        terminateCalls: 0,
        terminateFailures: [],
        providerFailures,
      };
      return {
        ...j,
        status: "failed",
        error,
        report,
        completedAt: now,
        warnings: [...j.warnings, ...warnings],
      };
    });
    if (job.status === "failed") this.log.warn({ jobId, error }, "Job could not be planned");
    return job;
  }
}
