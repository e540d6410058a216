import { setTimeout as sleep } from "node:timers/promises";
import { nanoid } from "nanoid";
import type { FastifyBaseLogger } from "fastify";
import type {
  AllocationLine,
  AllocationPlan,
  Instance,
  InstanceState,
  Job,
  JobRequest,
  JobStatus,
  ProviderId,
  ProvisionReport,
  UnitOutcome,
} from "@gpubroker/shared";
import type { JobStateStore } from "./job-state-store.js";
import type {
  AdapterRegistry,
  InstanceSpec,
  ProviderAdapter,
  ProvisionedInstance,
  RemoteStatus,
} from "./provider-adapter.js";
import type { PriceHistory } from "./price-history.js";
import type { CancellationRegistry } from "./cancellation.js";
import type { ProviderOperation } from "./provider-gate.js";
import { toProviderError } from "./provider-gate.js";
import { abortReason, runBounded } from "./concurrency.js";
import { isActive, isFinal, transition } from "./instance-lifecycle.js";
import {
  AuthenticationError,
  BrokerError,
  InvalidJobStateError,
  JobCancelledError,
  JobDeadlineError,
  PartialFulfillmentError,
  ProviderError,
  ProviderRejectedError,
  TransientProviderError,
  errorMessage,
} from "../errors.js";

export interface OrchestratorConfig {
  provisionConcurrency: number;
  /** Tries per unit, including the first. */
  unitAttempts: number;
  unitBackoffMs: number;
  unitMaxBackoffMs: number;
  readinessPollMs: number;
  /** How long a provisioned instance may take to report Running. */
  readinessTimeoutMs: number;
  jobDeadlineMs: number;
}

export const DEFAULT_ORCHESTRATOR: OrchestratorConfig = {
  provisionConcurrency: 6,
  unitAttempts: 3,
  unitBackoffMs: 2_000,
  unitMaxBackoffMs: 30_000,
  readinessPollMs: 5_000,
  readinessTimeoutMs: 600_000,
  jobDeadlineMs: 1_800_000,
};

export interface OrchestratorDeps {
  store: JobStateStore;
  registry: AdapterRegistry;
  history: PriceHistory | null;
  cancellations: CancellationRegistry;
  log: FastifyBaseLogger;
  config?: Partial<OrchestratorConfig>;
  now?: () => number;
}

export interface PlannedUnit {
  unitKey: string;
  line: AllocationLine;
}

export interface TerminateTally {
  calls: number;
  /** Instance ids whose terminate call failed. */
  failures: string[];
}

interface RunContext {
  jobId: string;
  gpuType: string;
  signal: AbortSignal;
  /** Providers that failed authentication during this run. */
  blocked: Set<ProviderId>;
  tally: TerminateTally;
}

/** One unit per plan slot, keyed `provider:instanceType:region:index`. */
export function expandPlan(plan: AllocationPlan): PlannedUnit[] {
  const seen = new Map<string, number>();
  return plan.lines.flatMap((line) =>
    Array.from({ length: line.count }, () => {
      const base = `${line.provider}:${line.instanceType}:${line.region}`;
      const index = seen.get(base) ?? 0;
      seen.set(base, index + 1);
      return { unitKey: `${base}:${index}`, line };
    }),
  );
}

/** Units needed for success, clamped to 1..count. */
export function minimumFor(request: JobRequest): number {
  return Math.min(request.count, Math.max(1, request.minFulfillment ?? request.count));
}

/** The newest instance record for a unit. */
export function currentRecord(job: Job, unitKey: string): Instance | undefined {
  let found: Instance | undefined;
  for (const instance of job.instances) {
    if (instance.unitKey === unitKey) found = instance;
  }
  return found;
}

/**
 * Executes an allocation plan as independent per-unit tasks. Each task
 * provisions, waits for readiness and retries on its own; the job outcome
 * is decided once every task has settled.
 */
export class ProvisioningOrchestrator {
  readonly config: OrchestratorConfig;
  private store: JobStateStore;
  private registry: AdapterRegistry;
  private history: PriceHistory | null;
  private cancellations: CancellationRegistry;
  private log: FastifyBaseLogger;
  private now: () => number;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.history = deps.history;
    this.cancellations = deps.cancellations;
    this.log = deps.log;
    this.now = deps.now ?? Date.now;
    this.config = { ...DEFAULT_ORCHESTRATOR, ...deps.config };
  }

  /**
   * Provision every plan unit that is not already Running. A job whose
   * units are all Running is returned as is, without remote calls.
   */
  async execute(jobId: string, signal?: AbortSignal): Promise<Job> {
    // Registered before the first await so a cancel right after launch finds it.
    const controller = this.cancellations.begin(jobId);
    const onAbort = () => controller.abort(abortReason(signal));
    if (signal?.aborted) onAbort();
    signal?.addEventListener("abort", onAbort, { once: true });
    const deadline = setTimeout(() => {
      controller.abort(new JobDeadlineError(jobId, this.config.jobDeadlineMs));
    }, this.config.jobDeadlineMs);

    try {
      const job = await this.store.require(jobId);
      if (!job.plan) {
        throw new InvalidJobStateError(`Job ${jobId} has no allocation plan`);
      }
      if (job.status === "cancelled") {
        throw new InvalidJobStateError(`Job ${jobId} was cancelled`);
      }

      const units = expandPlan(job.plan);
      if (isSettled(job, units)) {
        this.log.info({ jobId }, "Every unit already running; nothing to provision");
        return job;
      }

      try {
        return await this.run(job, units, controller);
      } catch (err) {
        controller.abort(err);
        this.log.error({ jobId, err: errorMessage(err) }, "Provisioning run failed");
        return await this.failAfterError(jobId, err);
      }
    } finally {
      clearTimeout(deadline);
      signal?.removeEventListener("abort", onAbort);
      this.cancellations.end(jobId, controller);
    }
  }

  /**
   * Terminate the job's active instances (all, or those `filter` selects).
   * The job keeps its status.
   */
  async terminate(
    jobId: string,
    filter: (instance: Instance) => boolean = () => true,
  ): Promise<{ job: Job; tally: TerminateTally }> {
    if (this.cancellations.isRunning(jobId)) {
      throw new InvalidJobStateError(`Job ${jobId} is provisioning; cancel it instead`);
    }
    const tally: TerminateTally = { calls: 0, failures: [] };
    await this.terminateActive(jobId, tally, filter);
    this.log.info({ jobId, calls: tally.calls, failures: tally.failures.length }, "Instances terminated");
    return { job: await this.store.require(jobId), tally };
  }

  /** Jobs a previous process left in Provisioning. */
  async interruptedJobs(): Promise<string[]> {
    const jobs = await this.store.list();
    return jobs
      .filter((j) => j.status === "provisioning" && !this.cancellations.isRunning(j.jobId))
      .map((j) => j.jobId);
  }

  // ── run ────────────────────────────────────────────────────────────

  private async run(job: Job, units: PlannedUnit[], controller: AbortController): Promise<Job> {
    const jobId = job.jobId;
    const startedAt = this.now();
    const ctx: RunContext = {
      jobId,
      gpuType: job.request.gpuType,
      signal: controller.signal,
      blocked: new Set(),
      tally: { calls: 0, failures: [] },
    };
    this.log.info({ jobId, units: units.length }, "Provisioning started");

    await this.store.update(jobId, (j) => ({
      ...j,
      status: "provisioning",
      error: undefined,
      completedAt: undefined,
    }));

    // Records left mid-flight by an interrupted run: adopt if running, else release.
    const stale = job.instances.filter(
      (i) => isActive(i) && i.state !== "running" && i.remoteId !== null,
    );
    // A failed worker stops its siblings; the rollback waits until they settle.
    const stopOnError = <R>(work: Promise<R>): Promise<R> =>
      work.catch((err: unknown) => {
        controller.abort(err);
        throw err;
      });
    await runBounded(stale, this.config.provisionConcurrency, (i) =>
      stopOnError(this.reconcile(ctx, i)),
    );

    const pending = await this.preparePending(jobId, units);
    const results = await runBounded(pending, this.config.provisionConcurrency, (p) =>
      stopOnError(this.runUnit(ctx, p.unit, p.instanceId, p.attempts)),
    );
    const byKey = new Map(results.map((o) => [o.unitKey, o]));

    const snapshot = await this.store.require(jobId);
    const outcomes = units.map((unit): UnitOutcome => {
      const outcome = byKey.get(unit.unitKey);
      if (outcome) return outcome;
      return {
        unitKey: unit.unitKey,
        provider: unit.line.provider,
        instanceType: unit.line.instanceType,
        status: "skipped",
        attempts: currentRecord(snapshot, unit.unitKey)?.attempts ?? 0,
      };
    });
    return this.finish(ctx, units, outcomes, startedAt);
  }

  /** Creates (or reuses) a requested record for every unit not yet running. */
  private async preparePending(
    jobId: string,
    units: PlannedUnit[],
  ): Promise<Array<{ unit: PlannedUnit; instanceId: string; attempts: number }>> {
    const pending: Array<{ unit: PlannedUnit; instanceId: string; attempts: number }> = [];
    await this.store.update(jobId, (j) => {
      const added: Instance[] = [];
      for (const unit of units) {
        const record = currentRecord(j, unit.unitKey);
        if (record?.state === "running") continue;
        if (record?.state === "requested") {
          pending.push({ unit, instanceId: record.instanceId, attempts: record.attempts });
          continue;
        }
        const fresh = this.newInstance(unit, 0);
        added.push(fresh);
        pending.push({ unit, instanceId: fresh.instanceId, attempts: 0 });
      }
      return { ...j, instances: [...j.instances, ...added] };
    });
    return pending;
  }

  private async finish(
    ctx: RunContext,
    units: PlannedUnit[],
    outcomes: UnitOutcome[],
    startedAt: number,
  ): Promise<Job> {
    const { jobId, signal, tally } = ctx;
    const snapshot = await this.store.require(jobId);
    const achieved = units.filter((u) => currentRecord(snapshot, u.unitKey)?.state === "running").length;
    const requested = snapshot.request.count;
    const minRequired = minimumFor(snapshot.request);
    const reason = signal.aborted ? abortReason(signal) : null;
    const cancelled = reason instanceof JobCancelledError;
    const succeeded = reason === null && achieved >= minRequired;

    if (!succeeded) await this.terminateActive(jobId, tally);

    const report: ProvisionReport = {
      startedAt,
      completedAt: this.now(),
      requested,
      achieved,
      minRequired,
      outcomes: succeeded
        ? outcomes
        : outcomes.map((o) =>
            o.status === "running" || o.status === "skipped" ? { ...o, status: "rolled-back" } : o,
          ),
      rolledBack: !succeeded,
      terminateCalls: tally.calls,
      terminateFailures: [...tally.failures],
      providerFailures: providerFailures(outcomes),
    };

    let status: JobStatus;
    let error: string | undefined;
    const warnings: string[] = [];
    if (cancelled) {
      status = "cancelled";
      error = reason.message;
    } else if (!succeeded) {
      status = "failed";
      const shortfall = new PartialFulfillmentError(report).message;
      error = reason ? `${reason.message}; ${shortfall}` : shortfall;
    } else if (achieved >= requested) {
      status = "running";
    } else {
      status = "partially-fulfilled";
      warnings.push(`Accepted ${achieved} of ${requested} units (minimum ${minRequired})`);
    }
    if (tally.failures.length > 0) {
      warnings.push(`Terminate failed for instances: ${tally.failures.join(", ")}`);
    }

    const job = await this.store.update(jobId, (j) => ({
      ...j,
      status,
      error,
      report,
      completedAt: report.completedAt,
      warnings: [...j.warnings, ...warnings],
    }));
    this.log.info(
      { jobId, status, achieved, requested, minRequired, terminateCalls: tally.calls },
      "Provisioning finished",
    );
    return job;
  }

  private async failAfterError(jobId: string, err: unknown): Promise<Job> {
    const tally: TerminateTally = { calls: 0, failures: [] };
    await this.terminateActive(jobId, tally);
    return this.store.update(jobId, (j) => ({
      ...j,
      status: "failed",
      error: errorMessage(err),
      completedAt: this.now(),
    }));
  }

  // ── units ──────────────────────────────────────────────────────────

  private async runUnit(
    ctx: RunContext,
    unit: PlannedUnit,
    instanceId: string,
    priorAttempts: number,
  ): Promise<UnitOutcome> {
    const { provider } = unit.line;
    const maxAttempts = Math.max(1, this.config.unitAttempts);
    let current = instanceId;
    let attempts = priorAttempts;

    for (let attempt = 1; ; attempt++) {
      if (ctx.signal.aborted) {
        return this.abandon(ctx, unit, current, attempts, abortReason(ctx.signal));
      }
      if (ctx.blocked.has(provider)) {
        const blocked = new AuthenticationError(
          provider,
          `${provider} is blocked for job ${ctx.jobId} after an authentication failure`,
        );
        return this.abandon(ctx, unit, current, attempts, blocked);
      }
      const adapter = this.registry.get(provider);
      if (!adapter) {
        const missing = new ProviderRejectedError(provider, `Provider ${provider} is not configured`);
        return this.abandon(ctx, unit, current, attempts, missing);
      }

      try {
        attempts += 1;
        await this.attemptUnit(ctx, adapter, unit, current, attempts);
        return {
          unitKey: unit.unitKey,
          provider,
          instanceType: unit.line.instanceType,
          status: "running",
          attempts,
        };
      } catch (err) {
        if (ctx.signal.aborted) {
          return this.abandon(ctx, unit, current, attempts, abortReason(ctx.signal));
        }
        if (err instanceof BrokerError && !(err instanceof ProviderError)) throw err;

        const mapped = toProviderError(provider, err);
        if (mapped.kind === "auth") ctx.blocked.add(provider);
        if (!mapped.retryable || attempt >= maxAttempts) {
          return this.abandon(ctx, unit, current, attempts, mapped);
        }
        this.log.warn(
          { jobId: ctx.jobId, unitKey: unit.unitKey, attempt, err: mapped.message },
          "Unit attempt failed; retrying",
        );
        current = await this.nextInstance(ctx.jobId, unit, current, attempts);
      }

      try {
        await sleep(this.backoff(attempt), undefined, { signal: ctx.signal });
      } catch {
        return this.abandon(ctx, unit, current, attempts, abortReason(ctx.signal));
      }
    }
  }

  private async attemptUnit(
    ctx: RunContext,
    adapter: ProviderAdapter,
    unit: PlannedUnit,
    instanceId: string,
    attempts: number,
  ): Promise<void> {
    const { line } = unit;
    const spec: InstanceSpec = {
      jobId: ctx.jobId,
      unitKey: unit.unitKey,
      gpuType: ctx.gpuType,
      instanceType: line.instanceType,
      region: line.region,
      pricingMode: line.pricingMode,
      maxPricePerHour: line.unitPrice,
    };

    let provisioned: ProvisionedInstance;
    const started = this.now();
    try {
      // Not tied to the job signal: a create the provider accepted must come
      // back with its remote id so it can be terminated.
      provisioned = await adapter.provision(spec);
      this.recordEvent(adapter.id, "provision", started);
    } catch (err) {
      this.recordEvent(adapter.id, "provision", started, err);
      await this.patchInstance(ctx.jobId, instanceId, (i) => ({
        ...i,
        attempts,
        error: errorMessage(err),
      }));
      throw err;
    }

    try {
      await this.patchInstance(ctx.jobId, instanceId, (i) => ({
        ...transition(i, "provisioning", this.now()),
        remoteId: provisioned.remoteId,
        address: provisioned.address,
        pricePerHour: provisioned.pricePerHour,
        attempts,
        error: undefined,
      }));
    } catch (err) {
      await this.discard(ctx, adapter, provisioned.remoteId, err);
      throw err;
    }
    if (ctx.signal.aborted) throw abortReason(ctx.signal);

    let ready: RemoteStatus;
    try {
      ready =
        provisioned.state === "running"
          ? provisioned
          : await this.waitReady(adapter, provisioned.remoteId, ctx.signal);
    } catch (err) {
      const cause = ctx.signal.aborted ? abortReason(ctx.signal) : err;
      await this.release(ctx.jobId, instanceId, ctx.tally, `Not ready: ${errorMessage(cause)}`);
      throw err;
    }

    await this.patchInstance(ctx.jobId, instanceId, (i) => ({
      ...transition(i, "running", this.now()),
      address: ready.address ?? i.address,
    }));
  }

  /** Terminates a created instance whose remote id never reached the store. */
  private async discard(
    ctx: RunContext,
    adapter: ProviderAdapter,
    remoteId: string,
    cause: unknown,
  ): Promise<void> {
    this.log.error(
      { jobId: ctx.jobId, provider: adapter.id, remoteId, err: errorMessage(cause) },
      "Could not record a created instance; terminating it",
    );
    ctx.tally.calls += 1;
    const started = this.now();
    try {
      await adapter.terminate(remoteId);
      this.recordEvent(adapter.id, "terminate", started);
    } catch (err) {
      this.recordEvent(adapter.id, "terminate", started, err);
      ctx.tally.failures.push(remoteId);
      this.log.error(
        { jobId: ctx.jobId, provider: adapter.id, remoteId, err: errorMessage(err) },
        "Terminate failed for an unrecorded instance",
      );
    }
  }

  private async waitReady(
    adapter: ProviderAdapter,
    remoteId: string,
    signal: AbortSignal,
  ): Promise<RemoteStatus> {
    const deadline = this.now() + this.config.readinessTimeoutMs;
    for (;;) {
      const started = this.now();
      let status: RemoteStatus;
      try {
        status = await adapter.status(remoteId, signal);
        this.recordEvent(adapter.id, "status", started);
      } catch (err) {
        this.recordEvent(adapter.id, "status", started, err);
        throw err;
      }

      if (status.state === "running") return status;
      if (isFinal(status.state) || status.state === "stopping") {
        throw new TransientProviderError(
          adapter.id,
          "unavailable",
          `Instance ${remoteId} went ${status.state} before it was ready`,
        );
      }
      if (this.now() >= deadline) {
        throw new TransientProviderError(
          adapter.id,
          "timeout",
          `Instance ${remoteId} not ready after ${this.config.readinessTimeoutMs}ms`,
        );
      }
      await sleep(this.config.readinessPollMs, undefined, { signal });
    }
  }

  /** Marks a still-requested record failed and reports the unit. */
  private async abandon(
    ctx: RunContext,
    unit: PlannedUnit,
    instanceId: string,
    attempts: number,
    cause: Error,
  ): Promise<UnitOutcome> {
    await this.patchInstance(ctx.jobId, instanceId, (i) =>
      i.state === "requested"
        ? { ...transition(i, "failed", this.now()), attempts, error: cause.message }
        : i,
    );
    return {
      unitKey: unit.unitKey,
      provider: unit.line.provider,
      instanceType: unit.line.instanceType,
      status: cause instanceof JobCancelledError ? "cancelled" : "failed",
      attempts,
      errorKind: cause instanceof ProviderError ? cause.kind : undefined,
      error: cause.message,
    };
  }

  /** The record for the next attempt: reused while still requested, else a fresh one. */
  private async nextInstance(
    jobId: string,
    unit: PlannedUnit,
    current: string,
    attempts: number,
  ): Promise<string> {
    const job = await this.store.require(jobId);
    const record = job.instances.find((i) => i.instanceId === current);
    if (record?.state === "requested") return current;

    const fresh = this.newInstance(unit, attempts);
    await this.store.update(jobId, (j) => ({ ...j, instances: [...j.instances, fresh] }));
    return fresh.instanceId;
  }

  private async reconcile(ctx: RunContext, instance: Instance): Promise<void> {
    const adapter = this.registry.get(instance.provider);
    if (adapter && instance.remoteId !== null && instance.state === "provisioning") {
      const started = this.now();
      try {
        const status = await adapter.status(instance.remoteId, ctx.signal);
        this.recordEvent(adapter.id, "status", started);
        if (status.state === "running") {
          await this.patchInstance(ctx.jobId, instance.instanceId, (i) => ({
            ...transition(i, "running", this.now()),
            address: status.address ?? i.address,
          }));
          this.log.info({ jobId: ctx.jobId, instanceId: instance.instanceId }, "Adopted running instance");
          return;
        }
      } catch (err) {
        this.recordEvent(adapter.id, "status", started, err);
        this.log.warn(
          { jobId: ctx.jobId, instanceId: instance.instanceId, err: errorMessage(err) },
          "Status check of interrupted instance failed",
        );
      }
    }
    await this.release(ctx.jobId, instance.instanceId, ctx.tally, "Left unfinished by an interrupted run");
  }

  // ── termination ────────────────────────────────────────────────────

  private async terminateActive(
    jobId: string,
    tally: TerminateTally,
    filter: (instance: Instance) => boolean = () => true,
  ): Promise<void> {
    const job = await this.store.require(jobId);
    const targets = job.instances.filter((i) => isActive(i) && filter(i)).map((i) => i.instanceId);
    await runBounded(targets, this.config.provisionConcurrency, (id) =>
      this.release(jobId, id, tally, "Released"),
    );
  }

  /**
   * Terminate one instance's remote resource. Terminate is called without
   * the job signal so a cancelled job still releases what it holds.
   */
  private async release(
    jobId: string,
    instanceId: string,
    tally: TerminateTally,
    reason: string,
  ): Promise<void> {
    const job = await this.store.require(jobId);
    const instance = job.instances.find((i) => i.instanceId === instanceId);
    if (!instance || !isActive(instance)) return;

    if (instance.remoteId === null) {
      await this.patchInstance(jobId, instanceId, (i) => settle(i, "failed", this.now(), reason));
      return;
    }

    const adapter = this.registry.get(instance.provider);
    if (!adapter) {
      tally.failures.push(instanceId);
      this.log.error({ jobId, instanceId, provider: instance.provider }, "No adapter to terminate instance");
      await this.patchInstance(jobId, instanceId, (i) =>
        settle(i, "failed", this.now(), `Provider ${i.provider} is not configured`),
      );
      return;
    }

    await this.patchInstance(jobId, instanceId, (i) => settle(i, "stopping", this.now()));
    tally.calls += 1;
    this.log.debug({ jobId, instanceId, reason }, "Terminating instance");
    const started = this.now();
    try {
      await adapter.terminate(instance.remoteId);
      this.recordEvent(adapter.id, "terminate", started);
      await this.patchInstance(jobId, instanceId, (i) => settle(i, "terminated", this.now()));
    } catch (err) {
      this.recordEvent(adapter.id, "terminate", started, err);
      tally.failures.push(instanceId);
      this.log.error({ jobId, instanceId, err: errorMessage(err) }, "Terminate failed");
      await this.patchInstance(jobId, instanceId, (i) =>
        settle(i, "failed", this.now(), `Terminate failed: ${errorMessage(err)}`),
      );
    }
  }

  // ── helpers ────────────────────────────────────────────────────────

  private async patchInstance(
    jobId: string,
    instanceId: string,
    patch: (instance: Instance) => Instance,
  ): Promise<void> {
    await this.store.update(jobId, (j) => ({
      ...j,
      instances: j.instances.map((i) => (i.instanceId === instanceId ? patch(i) : i)),
    }));
  }

  private newInstance(unit: PlannedUnit, attempts: number): Instance {
    return {
      instanceId: nanoid(10),
      unitKey: unit.unitKey,
      provider: unit.line.provider,
      instanceType: unit.line.instanceType,
      region: unit.line.region,
      remoteId: null,
      address: null,
      state: "requested",
      pricePerHour: unit.line.unitPrice,
      accruedCost: 0,
      attempts,
      startedAt: null,
      endedAt: null,
    };
  }

  private backoff(attempt: number): number {
    return Math.min(this.config.unitMaxBackoffMs, this.config.unitBackoffMs * 2 ** (attempt - 1));
  }

  private recordEvent(
    provider: ProviderId,
    operation: ProviderOperation,
    started: number,
    err?: unknown,
  ): void {
    try {
      this.history?.recordEvent({
        provider,
        operation,
        success: err === undefined,
        latencyMs: this.now() - started,
        errorKind: err === undefined ? undefined : toProviderError(provider, err).kind,
      });
    } catch (writeErr) {
      // advisory only
      this.log.warn({ provider, operation, err: errorMessage(writeErr) }, "Could not record provider event");
    }
  }
}

function isSettled(job: Job, units: PlannedUnit[]): boolean {
  return (
    (job.status === "running" || job.status === "partially-fulfilled") &&
    units.every((u) => currentRecord(job, u.unitKey)?.state === "running")
  );
}

/** Moves a live instance toward `to`; final records are left alone. */
function settle(instance: Instance, to: InstanceState, now: number, error?: string): Instance {
  if (isFinal(instance.state)) return instance;
  const moved = transition(instance, to, now);
  return error !== undefined ? { ...moved, error } : moved;
}

function providerFailures(outcomes: UnitOutcome[]): Record<string, string[]> {
  const failures: Record<string, string[]> = {};
  for (const o of outcomes) {
    if (o.status !== "failed" || o.error === undefined) continue;
    (failures[o.provider] ??= []).push(`${o.unitKey}: ${o.error}`);
  }
  return failures;
}
