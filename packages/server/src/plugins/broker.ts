import fp from "fastify-plugin";
import type { FastifyBaseLogger, FastifyInstance } from "fastify";
import type { ServerConfig } from "../config.js";
import type { BrokerSettings } from "../settings.js";
import { AdapterRegistry, type ProviderAdapter } from "../services/provider-adapter.js";
import { VastAIProvider } from "../services/providers/vastai-provider.js";
import { DigitalOceanProvider } from "../services/providers/digitalocean-provider.js";
import { LambdaLabsProvider } from "../services/providers/lambdalabs-provider.js";
import { PriceHistory } from "../services/price-history.js";
import { HistoricalRiskModel, WeightedScoringStrategy, DEFAULT_SCORING } from "../services/risk-model.js";
import { PriceAggregator } from "../services/aggregator.js";
import { AllocationOptimizer } from "../services/optimizer.js";
import { JobStateStore } from "../services/job-state-store.js";
import { MemoryStateBackend, RedisStateBackend, type StateBackend } from "../services/state-backend.js";
import { JobEventHub } from "../services/job-events.js";
import { CancellationRegistry } from "../services/cancellation.js";
import { ProvisioningOrchestrator } from "../services/orchestrator.js";
import { BrokerService } from "../services/broker-service.js";
import { CostTracker } from "../services/cost-tracker.js";
import { errorMessage } from "../errors.js";

declare module "fastify" {
  interface FastifyInstance {
    broker: BrokerService;
    costTracker: CostTracker;
    jobEvents: JobEventHub;
  }
}

const DEFAULT_RETENTION_MS = 30 * 24 * 60 * 60 * 1000;
const PRUNE_INTERVAL_MS = 60 * 60 * 1000;

/** One adapter per provider that has credentials configured. */
export function buildAdapters(
  config: ServerConfig,
  settings: BrokerSettings,
  log: FastifyBaseLogger,
): ProviderAdapter[] {
  const adapters: ProviderAdapter[] = [];
  if (config.vastaiApiKey) {
    adapters.push(
      new VastAIProvider({
        apiKey: config.vastaiApiKey,
        log,
        policy: settings.providers["vastai"],
      }),
    );
  }
  if (config.digitaloceanApiKey) {
    adapters.push(
      new DigitalOceanProvider({
        apiKey: config.digitaloceanApiKey,
        log,
        regions: config.digitaloceanRegions,
        policy: settings.providers["digitalocean"],
      }),
    );
  }
  if (config.lambdaApiKey) {
    adapters.push(
      new LambdaLabsProvider({
        apiKey: config.lambdaApiKey,
        log,
        sshKeyName: config.lambdaSshKeyName,
        policy: settings.providers["lambdalabs"],
      }),
    );
  }
  return adapters;
}

export interface BrokerPluginOptions {
  settings: BrokerSettings;
  /** Defaults to the adapters built from server config. */
  adapters?: ProviderAdapter[];
}

export default fp(async function brokerPlugin(
  fastify: FastifyInstance,
  opts: BrokerPluginOptions,
) {
  const config = fastify.serverConfig;
  const { settings } = opts;
  const log = fastify.log;

  const registry = new AdapterRegistry(opts.adapters ?? buildAdapters(config, settings, log));
  const history = new PriceHistory(config.priceDbPath);
  const retentionMs = settings.priceHistory.retentionMs ?? DEFAULT_RETENTION_MS;
  const prune = () => {
    try {
      const removed = history.prune(retentionMs);
      if (removed > 0) log.info({ removed }, "Pruned price history");
    } catch (err) {
      log.error({ err: errorMessage(err) }, "Price history prune failed");
    }
  };
  prune();
  const pruneTimer = setInterval(prune, PRUNE_INTERVAL_MS);

  const aggregator = new PriceAggregator({
    registry,
    riskModel: new HistoricalRiskModel(history, settings.riskModel),
    scoring: new WeightedScoringStrategy({ ...DEFAULT_SCORING, ...settings.scoring }),
    history,
    log,
    config: settings.aggregator,
  });

  const backend: StateBackend =
    config.stateBackend === "memory" ? new MemoryStateBackend() : new RedisStateBackend(fastify.redis);
  const store = new JobStateStore(backend, log, settings.store);

  const hub = new JobEventHub(fastify.redis, log);
  const detach = hub.attach(store);
  await hub.listen((jobId) => store.get(jobId));

  const cancellations = new CancellationRegistry();
  const orchestrator = new ProvisioningOrchestrator({
    store,
    registry,
    history,
    cancellations,
    log,
    config: settings.orchestrator,
  });
  const broker = new BrokerService({
    store,
    aggregator,
    optimizer: new AllocationOptimizer(settings.optimizer),
    orchestrator,
    cancellations,
    log,
    budgetPolicy: settings.budgetPolicy,
  });
  const costTracker = new CostTracker({
    store,
    aggregator,
    hub,
    log,
    config: settings.costTracker,
  });

  fastify.decorate("broker", broker);
  fastify.decorate("costTracker", costTracker);
  fastify.decorate("jobEvents", hub);

  log.info({ providers: registry.all().map((a) => a.id) }, "Broker ready");

  fastify.addHook("onReady", async () => {
    try {
      const resumed = await broker.recover();
      if (resumed.length > 0) log.warn({ jobIds: resumed }, "Resumed interrupted jobs");
    } catch (err) {
      log.error({ err: errorMessage(err) }, "Could not scan for interrupted jobs");
    }
    costTracker.start();
  });

  fastify.addHook("onClose", async () => {
    clearInterval(pruneTimer);
    costTracker.stop();
    try {
      const active = await broker.activeJobs();
      if (active.length > 0) {
        log.warn({ jobIds: active }, "Shutting down with live instances; they keep running");
      }
    } catch (err) {
      log.warn({ err: errorMessage(err) }, "Could not list active jobs at shutdown");
    }
    detach();
    hub.stop();
    history.close();
  });
});
