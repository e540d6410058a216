import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import pino from "pino";
import type { JobRequest, ProviderId, Quote, RiskProfile } from "@gpubroker/shared";
import { BrokerService, type BudgetPolicy } from "../broker-service.js";
import { PriceAggregator } from "../aggregator.js";
import { AllocationOptimizer } from "../optimizer.js";
import { ProvisioningOrchestrator } from "../orchestrator.js";
import { CancellationRegistry } from "../cancellation.js";
import { JobStateStore } from "../job-state-store.js";
import { MemoryStateBackend } from "../state-backend.js";
import { AdapterRegistry } from "../provider-adapter.js";
import type { InstanceSpec, ProviderAdapter, ProvisionedInstance, RemoteStatus } from "../provider-adapter.js";
import { WeightedScoringStrategy } from "../risk-model.js";
import {
  AuthenticationError,
  BudgetInfeasibleError,
  InvalidJobStateError,
  JobNotFoundError,
} from "../../errors.js";

const log = pino({ level: "silent" });

/** Every quote scores at face value: no volatility, full confidence. */
const flatRisk = {
  profile: (): RiskProfile => ({ volatilityIndex: 0, reliabilityScore: 1, liquidity: 1, observations: 0 }),
};

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

function deferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Holds a call open: `entered` fires on arrival, the call answers once `release` resolves. */
interface Hold {
  entered: () => void;
  release: Promise<void>;
}

class FakeProvider implements ProviderAdapter {
  provisionCalls = 0;
  terminated: string[] = [];
  quoteError: Error | null = null;
  quoteHold: Hold | null = null;
  provisionHold: Hold | null = null;

  constructor(
    readonly id: ProviderId,
    private price: number,
    private capacity: number,
  ) {}

  async quote(): Promise<Quote[]> {
    if (this.quoteHold) {
      this.quoteHold.entered();
      await this.quoteHold.release;
    }
    if (this.quoteError) throw this.quoteError;
    return [
      {
        provider: this.id,
        instanceType: `${this.id}-h100`,
        gpuType: "H100",
        pricePerHour: this.price,
        pricingMode: "on-demand",
        region: "us-east",
        availableCapacity: this.capacity,
        observedAt: 0,
      },
    ];
  }

  async provision(spec: InstanceSpec): Promise<ProvisionedInstance> {
    this.provisionCalls += 1;
    const call = this.provisionCalls;
    if (this.provisionHold) {
      this.provisionHold.entered();
      await this.provisionHold.release;
    }
    return {
      remoteId: `${this.id}-${call}`,
      address: null,
      state: "running",
      pricePerHour: spec.maxPricePerHour,
    };
  }

  async status(): Promise<RemoteStatus> {
    return { state: "running", address: null };
  }

  async terminate(remoteId: string): Promise<void> {
    this.terminated.push(remoteId);
  }
}

const REQUEST: JobRequest = { gpuType: "H100", count: 3 };

describe("BrokerService", () => {
  let store: JobStateStore;
  let cancellations: CancellationRegistry;
  let vast: FakeProvider;
  let lambda: FakeProvider;

  beforeEach(() => {
    store = new JobStateStore(new MemoryStateBackend(), log, { lockPollMs: 1 });
    cancellations = new CancellationRegistry();
    vast = new FakeProvider("vastai", 2, 2);
    lambda = new FakeProvider("lambdalabs", 2.5, 5);
  });

  function broker(budgetPolicy: BudgetPolicy = "warn") {
    const registry = new AdapterRegistry([vast, lambda]);
    const orchestrator = new ProvisioningOrchestrator({
      store,
      registry,
      history: null,
      cancellations,
      log,
      config: { provisionConcurrency: 1, unitBackoffMs: 1, unitMaxBackoffMs: 1, readinessPollMs: 1 },
    });
    return new BrokerService({
      store,
      aggregator: new PriceAggregator({
        registry,
        riskModel: flatRisk,
        scoring: new WeightedScoringStrategy(),
        history: null,
        log,
      }),
      optimizer: new AllocationOptimizer(),
      orchestrator,
      cancellations,
      log,
      budgetPolicy,
    });
  }

  it("plans from one round and provisions in the background", async () => {
    const service = broker();

    const submitted = await service.submit(REQUEST);
    await service.settled(submitted.jobId);

    assert.equal(submitted.status, "pending");
    assert.deepEqual(
      submitted.plan?.lines.map((l) => [l.provider, l.count]),
      [
        ["vastai", 2],
        ["lambdalabs", 1],
      ],
    );
    assert.equal(submitted.plan?.totalCostPerHour, 6.5);

    const job = await service.status(submitted.jobId);
    assert.equal(job.status, "running");
    assert.equal(job.instances.length, 3);
  });

  it("fails the job and throws when over budget under the abort policy", async () => {
    const service = broker("abort");

    await assert.rejects(service.submit({ ...REQUEST, budgetPerHour: 5 }), BudgetInfeasibleError);

    const [job] = await service.list();
    assert.equal(job.status, "failed");
    assert.equal(job.error, "Cheapest plan costs $6.50/hr, over the $5.00/hr budget");
    assert.equal(vast.provisionCalls, 0);
  });

  it("warns and proceeds when over budget under the warn policy", async () => {
    const service = broker("warn");

    const job = await service.submit({ ...REQUEST, budgetPerHour: 5 });
    await service.settled(job.jobId);

    assert.deepEqual(job.warnings, [
      "Cheapest plan costs $6.50/hr, over the $5.00/hr budget; proceeding best-effort",
    ]);
    assert.equal((await service.status(job.jobId)).status, "running");
  });

  it("fails a job no provider can serve, with the providers' reasons", async () => {
    vast.quoteError = new AuthenticationError("vastai", "bad key");
    lambda = new FakeProvider("lambdalabs", 2.5, 0);
    const service = broker();

    const job = await service.submit(REQUEST);

    assert.equal(job.status, "failed");
    assert.equal(job.error, "No eligible capacity for H100");
    assert.deepEqual(job.warnings, ["vastai: auth-error (bad key)"]);
    assert.deepEqual(job.report?.providerFailures, { vastai: ["bad key"] });
    assert.equal(job.report?.achieved, 0);
  });

  it("notes a plan that cannot reach the full request", async () => {
    lambda = new FakeProvider("lambdalabs", 2.5, 0);
    const service = broker();

    const job = await service.submit({ ...REQUEST, minFulfillment: 2 });
    await service.settled(job.jobId);

    assert.deepEqual(job.warnings, ["Only 2 of 3 units available this round"]);
    assert.equal((await service.status(job.jobId)).status, "partially-fulfilled");
  });

  it("cancels an in-flight job and terminates the create it was waiting on", async () => {
    const entered = deferred();
    const release = deferred();
    vast.provisionHold = { entered: entered.resolve, release: release.promise };
    const service = broker();
    const submitted = await service.submit({ gpuType: "H100", count: 1 });
    await entered.promise;

    const cancelling = service.cancel(submitted.jobId);
    release.resolve();
    const job = await cancelling;

    assert.equal(job.status, "cancelled");
    assert.deepEqual(vast.terminated, ["vastai-1"]);
    assert.deepEqual(
      job.instances.map((i) => [i.remoteId, i.state]),
      [["vastai-1", "terminated"]],
    );
  });

  it("keeps a job cancelled while its quote round was in flight", async () => {
    vast = new FakeProvider("vastai", 2, 0);
    lambda = new FakeProvider("lambdalabs", 2.5, 0);
    const entered = deferred();
    const release = deferred();
    vast.quoteHold = { entered: entered.resolve, release: release.promise };
    const service = broker();

    const submitting = service.submit(REQUEST);
    await entered.promise;
    const [pending] = await store.list();
    assert.equal((await service.cancel(pending.jobId)).status, "cancelled");
    release.resolve();
    const job = await submitting;

    assert.equal(job.status, "cancelled");
    assert.equal(job.error, undefined);
    assert.equal((await service.status(job.jobId)).status, "cancelled");
  });

  it("does not fail an over-budget job that was cancelled while quoting", async () => {
    const entered = deferred();
    const release = deferred();
    vast.quoteHold = { entered: entered.resolve, release: release.promise };
    const service = broker("abort");

    const submitting = service.submit({ gpuType: "H100", count: 1, budgetPerHour: 1 });
    await entered.promise;
    const [pending] = await store.list();
    await service.cancel(pending.jobId);
    release.resolve();
    const job = await submitting;

    assert.equal(job.status, "cancelled");
    assert.equal(job.plan?.budgetExceeded, true);
    await service.settled(job.jobId);
    assert.equal(vast.provisionCalls + lambda.provisionCalls, 0);
  });

  it("cancels a pending job with no run and refuses finished ones", async () => {
    const service = broker();
    await store.create(REQUEST, "job-p");

    assert.equal((await service.cancel("job-p")).status, "cancelled");
    await assert.rejects(service.cancel("job-p"), InvalidJobStateError);
  });

  it("rolls back to the planned version, terminating instances it did not hold", async () => {
    const service = broker();
    const submitted = await service.submit(REQUEST);
    await service.settled(submitted.jobId);

    const job = await service.rollback(submitted.jobId, 2);

    // v11 after provisioning, two writes per terminated instance, then the restore
    assert.equal(job.status, "pending");
    assert.equal(job.restoredFrom, 2);
    assert.equal(job.version, 18);
    assert.deepEqual(vast.terminated, ["vastai-1", "vastai-2"]);
    assert.deepEqual(lambda.terminated, ["lambdalabs-1"]);
    assert.deepEqual(
      job.instances.map((i) => i.state),
      ["terminated", "terminated", "terminated"],
    );
    assert.deepEqual(job.warnings, ["Rolled back from version 17 to 2"]);
  });

  it("terminates a running job and then removes it", async () => {
    const service = broker();
    const submitted = await service.submit(REQUEST);
    await service.settled(submitted.jobId);

    await assert.rejects(service.remove(submitted.jobId), InvalidJobStateError);
    const job = await service.terminate(submitted.jobId);
    assert.equal(job.status, "running");
    assert.ok(job.instances.every((i) => i.state === "terminated"));

    await service.remove(submitted.jobId);
    await assert.rejects(service.status(submitted.jobId), JobNotFoundError);
  });

  it("resumes jobs left in Provisioning", async () => {
    const first = broker();
    const submitted = await first.submit(REQUEST);
    await first.settled(submitted.jobId);
    await store.update(submitted.jobId, (j) => ({
      ...j,
      status: "provisioning",
      instances: j.instances.slice(0, 2),
    }));

    const service = broker();
    const resumed = await service.recover();
    await service.settled(submitted.jobId);

    assert.deepEqual(resumed, [submitted.jobId]);
    const job = await service.status(submitted.jobId);
    assert.equal(job.status, "running");
    assert.equal(lambda.provisionCalls, 2);
  });
});
