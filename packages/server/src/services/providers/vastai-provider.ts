import type { FastifyBaseLogger } from "fastify";
import type { InstanceState, PricingMode, Quote, QuoteRequest } from "@gpubroker/shared";
import type {
  InstanceSpec,
  ProviderAdapter,
  ProvisionedInstance,
  RemoteStatus,
} from "../provider-adapter.js";
import { AuthenticationError, TransientProviderError } from "../../errors.js";
import { ProviderGate, type CallPolicy } from "../provider-gate.js";
import { assertOk, gpuMatches, normalizeGpuName } from "./provider-http.js";

const VASTAI_API = "https://console.vast.ai/api/v0";
const MIN_RELIABILITY = 0.95;
const SEARCH_LIMIT = 64;
const DEFAULT_DOCKER_IMAGE = "pytorch/pytorch:2.7.0-cuda12.8-cudnn9-runtime";
const DEFAULT_REGION = "global";

const STATE_BY_STATUS: Record<string, InstanceState> = {
  created: "provisioning",
  scheduling: "provisioning",
  loading: "provisioning",
  running: "running",
  stopping: "stopping",
  exited: "terminated",
  offline: "failed",
  error: "failed",
};

export interface VastAIProviderConfig {
  apiKey: string | null;
  log: FastifyBaseLogger;
  dockerImage?: string;
  diskGb?: number;
  onStartScript?: string;
  policy?: Partial<CallPolicy>;
}

interface VastOffer {
  id: number;
  gpu_name: string;
  dph_total: number;
  min_bid?: number;
  rentable: boolean;
  num_gpus: number;
  geolocation?: string;
  reliability2?: number;
}

interface VastInstanceBody {
  actual_status?: string;
  public_ipaddr?: string;
}

export class VastAIProvider implements ProviderAdapter {
  readonly id = "vastai";

  private apiKey: string | null;
  private log: FastifyBaseLogger;
  private dockerImage: string;
  private diskGb: number;
  private onStartScript: string | undefined;
  private gate: ProviderGate;

  constructor(config: VastAIProviderConfig) {
    this.apiKey = config.apiKey;
    this.log = config.log;
    this.dockerImage = config.dockerImage ?? DEFAULT_DOCKER_IMAGE;
    this.diskGb = config.diskGb ?? 20;
    this.onStartScript = config.onStartScript;
    this.gate = new ProviderGate(this.id, config.log, config.policy);
  }

  async quote(request: QuoteRequest, signal?: AbortSignal): Promise<Quote[]> {
    const mode = request.pricingMode ?? "on-demand";
    const offers = await this.gate.run(
      "quote",
      (s) => this.findOffers(request.gpuType, mode, s),
      { signal },
    );
    const observedAt = Date.now();

    // One quote per (model, region, price): capacity is the number of offers.
    const groups = new Map<string, Quote>();
    for (const offer of offers) {
      const region = offer.geolocation ?? DEFAULT_REGION;
      if (request.region && !regionMatches(request.region, region)) continue;

      const price = offerPrice(offer, mode);
      const instanceType = normalizeGpuName(offer.gpu_name);
      const key = `${instanceType}|${region}|${price.toFixed(2)}`;
      const existing = groups.get(key);
      if (existing) {
        groups.set(key, {
          ...existing,
          pricePerHour: Math.max(existing.pricePerHour, price),
          availableCapacity: existing.availableCapacity + 1,
        });
      } else {
        groups.set(key, {
          provider: this.id,
          instanceType,
          gpuType: request.gpuType,
          pricePerHour: price,
          pricingMode: mode,
          region,
          availableCapacity: 1,
          observedAt,
        });
      }
    }

    return [...groups.values()].sort((a, b) => a.pricePerHour - b.pricePerHour);
  }

  async provision(spec: InstanceSpec, signal?: AbortSignal): Promise<ProvisionedInstance> {
    return this.gate.run(
      "provision",
      async (s) => {
        const offers = (await this.findOffers(spec.gpuType, spec.pricingMode, s)).filter(
          (o) =>
            normalizeGpuName(o.gpu_name) === spec.instanceType &&
            regionMatches(spec.region, o.geolocation ?? DEFAULT_REGION) &&
            offerPrice(o, spec.pricingMode) <= spec.maxPricePerHour + 1e-9,
        );
        if (offers.length === 0) {
          throw new TransientProviderError(
            this.id,
            "unavailable",
            `No vast.ai offers for ${spec.instanceType} at or under $${spec.maxPricePerHour}/hr`,
          );
        }

        // Stale offers may vanish between search and create; try the next
        for (const offer of offers) {
          this.log.info(
            { offerId: offer.id, gpu: offer.gpu_name, cost: offer.dph_total, unitKey: spec.unitKey },
            "Trying vast.ai offer",
          );
          const contract = await this.createInstance(offer, spec, s);
          if (contract === null) {
            this.log.warn({ offerId: offer.id }, "Offer unavailable, trying next");
            continue;
          }
          return {
            remoteId: String(contract),
            address: null,
            state: "provisioning",
            pricePerHour: offerPrice(offer, spec.pricingMode),
          };
        }

        throw new TransientProviderError(this.id, "unavailable", "All vast.ai offers exhausted");
      },
      { signal },
    );
  }

  async status(remoteId: string, signal?: AbortSignal): Promise<RemoteStatus> {
    return this.gate.run(
      "status",
      async (s) => {
        const res = await fetch(`${VASTAI_API}/instances/${remoteId}/`, {
          headers: this.headers(),
          signal: s,
        });
        if (res.status === 404) return { state: "terminated", address: null };
        await assertOk(this.id, res, "instance status");

        const data = (await res.json()) as VastInstanceBody & { instances?: VastInstanceBody };
        const body = data.instances ?? data;
        const state = body.actual_status
          ? STATE_BY_STATUS[body.actual_status] ?? "provisioning"
          : "provisioning";
        return { state, address: body.public_ipaddr ?? null };
      },
      { signal },
    );
  }

  async terminate(remoteId: string, signal?: AbortSignal): Promise<void> {
    await this.gate.run(
      "terminate",
      async (s) => {
        const res = await fetch(`${VASTAI_API}/instances/${remoteId}/`, {
          method: "DELETE",
          headers: this.headers(),
          signal: s,
        });
        if (res.status === 404) return;
        await assertOk(this.id, res, "terminate");
      },
      { signal },
    );
  }

  private headers(): Record<string, string> {
    if (!this.apiKey) {
      throw new AuthenticationError(this.id, "vast.ai API key not configured");
    }
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  private async findOffers(
    gpuType: string,
    mode: PricingMode,
    signal: AbortSignal,
  ): Promise<VastOffer[]> {
    const query = JSON.stringify({
      rentable: { eq: true },
      num_gpus: { eq: 1 },
      reliability2: { gte: MIN_RELIABILITY },
      order: [["dph_total", "asc"]],
      type: mode === "spot" ? "bid" : "on-demand",
      limit: SEARCH_LIMIT,
    });

    const res = await fetch(`${VASTAI_API}/bundles?q=${encodeURIComponent(query)}`, {
      headers: this.headers(),
      signal,
    });
    await assertOk(this.id, res, "offer search");

    const data = (await res.json()) as { offers?: VastOffer[] };
    return (data.offers ?? [])
      .filter((o) => o.rentable && gpuMatches(gpuType, o.gpu_name))
      .filter((o) => Number.isFinite(offerPrice(o, mode)) && offerPrice(o, mode) > 0)
      .sort((a, b) => offerPrice(a, mode) - offerPrice(b, mode) || a.id - b.id);
  }

  /** Returns the new contract id, or null when the offer is gone. */
  private async createInstance(
    offer: VastOffer,
    spec: InstanceSpec,
    signal: AbortSignal,
  ): Promise<number | null> {
    const res = await fetch(`${VASTAI_API}/asks/${offer.id}/`, {
      method: "PUT",
      headers: { ...this.headers(), "Content-Type": "application/json" },
      body: JSON.stringify({
        client_id: "me",
        image: this.dockerImage,
        disk: this.diskGb,
        label: `gpubroker-${spec.jobId}-${spec.unitKey}`,
        ...(spec.pricingMode === "spot" ? { price: offerPrice(offer, "spot") } : {}),
        ...(this.onStartScript ? { onstart: this.onStartScript } : {}),
      }),
      signal,
    });

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      if (body.includes("no_such_ask")) return null;
      // Re-wrap with the consumed body so the taxonomy mapping still sees it.
      await assertOk(this.id, new Response(body, { status: res.status }), "create instance");
    }

    const data = (await res.json()) as { new_contract?: number };
    if (!data.new_contract) {
      throw new TransientProviderError(this.id, "unavailable", "vast.ai did not return an instance ID");
    }
    return data.new_contract;
  }
}

function offerPrice(offer: VastOffer, mode: PricingMode): number {
  return mode === "spot" ? offer.min_bid ?? offer.dph_total : offer.dph_total;
}

function regionMatches(requested: string, offered: string): boolean {
  return offered.toLowerCase().includes(requested.toLowerCase()) || requested === DEFAULT_REGION;
}
