import type { FastifyBaseLogger } from "fastify";
import type { InstanceState, Quote, QuoteRequest } from "@gpubroker/shared";
import type {
  InstanceSpec,
  ProviderAdapter,
  ProvisionedInstance,
  RemoteStatus,
} from "../provider-adapter.js";
import {
  AuthenticationError,
  ProviderRejectedError,
  TransientProviderError,
} from "../../errors.js";
import { ProviderGate, type CallPolicy } from "../provider-gate.js";
import { assertOk, gpuMatches } from "./provider-http.js";

const DO_API = "https://api.digitalocean.com";
const DEFAULT_IMAGE = "gpu-h100x1-base";

const STATE_BY_STATUS: Record<string, InstanceState> = {
  new: "provisioning",
  active: "running",
  off: "stopping",
  archive: "terminated",
};

export interface DigitalOceanProviderConfig {
  apiKey: string | null;
  log: FastifyBaseLogger;
  /** Regions to quote in; a request region narrows this further. */
  regions: string[];
  sshKey?: string | null;
  image?: string;
  /**
   * DigitalOcean does not publish stock, so each available size/region is
   * quoted with this many units.
   */
  assumedCapacity?: number;
  policy?: Partial<CallPolicy>;
}

interface DOSize {
  slug: string;
  vcpus: number;
  price_hourly: number;
  regions: string[];
  available: boolean;
  gpu_info?: {
    count: number;
    vram: { amount: number; unit: string };
    model: string;
  };
}

interface DODroplet {
  id?: number;
  status?: string;
  networks?: { v4?: Array<{ ip_address: string; type: string }> };
}

export class DigitalOceanProvider implements ProviderAdapter {
  readonly id = "digitalocean";

  private apiKey: string | null;
  private log: FastifyBaseLogger;
  private regions: string[];
  private sshKey: string | null;
  private image: string;
  private assumedCapacity: number;
  private gate: ProviderGate;

  constructor(config: DigitalOceanProviderConfig) {
    this.apiKey = config.apiKey;
    this.log = config.log;
    this.regions = config.regions;
    this.sshKey = config.sshKey ?? null;
    this.image = config.image ?? DEFAULT_IMAGE;
    this.assumedCapacity = config.assumedCapacity ?? 2;
    this.gate = new ProviderGate(this.id, config.log, config.policy);
  }

  async quote(request: QuoteRequest, signal?: AbortSignal): Promise<Quote[]> {
    // Droplets are billed on-demand only.
    if (request.pricingMode === "spot") return [];

    const sizes = await this.gate.run("quote", (s) => this.findGpuSizes(request.gpuType, s), {
      signal,
    });
    const observedAt = Date.now();
    const wanted = request.region ? [request.region] : this.regions;

    const quotes: Quote[] = [];
    for (const size of sizes) {
      for (const region of size.regions) {
        if (!wanted.includes(region)) continue;
        quotes.push({
          provider: this.id,
          instanceType: size.slug,
          gpuType: request.gpuType,
          pricePerHour: size.price_hourly,
          pricingMode: "on-demand",
          region,
          availableCapacity: this.assumedCapacity,
          observedAt,
        });
      }
    }
    return quotes;
  }

  async provision(spec: InstanceSpec, signal?: AbortSignal): Promise<ProvisionedInstance> {
    return this.gate.run(
      "provision",
      async (s) => {
        const sizes = await this.findGpuSizes(spec.gpuType, s);
        const size = sizes.find(
          (candidate) => candidate.slug === spec.instanceType && candidate.regions.includes(spec.region),
        );
        if (!size) {
          throw new TransientProviderError(
            this.id,
            "unavailable",
            `Size ${spec.instanceType} is not available in ${spec.region}`,
          );
        }
        if (size.price_hourly > spec.maxPricePerHour + 1e-9) {
          throw new ProviderRejectedError(
            this.id,
            `Size ${size.slug} now costs $${size.price_hourly}/hr, above the accepted $${spec.maxPricePerHour}/hr`,
          );
        }

        this.log.info(
          { slug: size.slug, region: spec.region, cost: size.price_hourly, unitKey: spec.unitKey },
          "Creating DigitalOcean GPU droplet",
        );
        const droplet = await this.createDroplet(spec, s);
        return {
          remoteId: String(droplet.id),
          address: publicAddress(droplet),
          state: STATE_BY_STATUS[droplet.status ?? "new"] ?? "provisioning",
          pricePerHour: size.price_hourly,
        };
      },
      { signal },
    );
  }

  async status(remoteId: string, signal?: AbortSignal): Promise<RemoteStatus> {
    return this.gate.run(
      "status",
      async (s) => {
        const res = await fetch(`${DO_API}/v2/droplets/${remoteId}`, {
          headers: this.headers(),
          signal: s,
        });
        if (res.status === 404) return { state: "terminated", address: null };
        await assertOk(this.id, res, "droplet status");

        const data = (await res.json()) as { droplet?: DODroplet };
        if (!data.droplet?.status) {
          throw new TransientProviderError(this.id, "unavailable", "DigitalOcean returned no droplet status");
        }
        return {
          state: STATE_BY_STATUS[data.droplet.status] ?? "provisioning",
          address: publicAddress(data.droplet),
        };
      },
      { signal },
    );
  }

  async terminate(remoteId: string, signal?: AbortSignal): Promise<void> {
    await this.gate.run(
      "terminate",
      async (s) => {
        const res = await fetch(`${DO_API}/v2/droplets/${remoteId}`, {
          method: "DELETE",
          headers: this.headers(),
          signal: s,
        });
        if (res.status === 404) return;
        await assertOk(this.id, res, "delete droplet");
      },
      { signal },
    );
  }

  private headers(): Record<string, string> {
    if (!this.apiKey) {
      throw new AuthenticationError(this.id, "DigitalOcean API key not configured");
    }
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  private async findGpuSizes(gpuType: string, signal: AbortSignal): Promise<DOSize[]> {
    const res = await fetch(`${DO_API}/v2/sizes?per_page=200`, {
      headers: this.headers(),
      signal,
    });
    await assertOk(this.id, res, "sizes request");

    const data = (await res.json()) as { sizes?: DOSize[] };
    return (data.sizes ?? [])
      .filter((s) => s.available && s.gpu_info !== undefined && gpuMatches(gpuType, s.gpu_info.model))
      .sort((a, b) => a.price_hourly - b.price_hourly || a.slug.localeCompare(b.slug));
  }

  private async createDroplet(spec: InstanceSpec, signal: AbortSignal): Promise<DODroplet> {
    const res = await fetch(`${DO_API}/v2/droplets`, {
      method: "POST",
      headers: { ...this.headers(), "Content-Type": "application/json" },
      body: JSON.stringify({
        name: `gpubroker-${spec.jobId}-${spec.unitKey.split(":").pop() ?? "0"}`,
        region: spec.region,
        size: spec.instanceType,
        image: this.image,
        tags: ["gpubroker", `job-${spec.jobId}`],
        ...(this.sshKey ? { ssh_keys: [this.sshKey] } : {}),
      }),
      signal,
    });
    await assertOk(this.id, res, "create droplet");

    const data = (await res.json()) as { droplet?: DODroplet };
    if (!data.droplet?.id) {
      throw new TransientProviderError(this.id, "unavailable", "DigitalOcean did not return a droplet ID");
    }
    return data.droplet;
  }
}

function publicAddress(droplet: DODroplet): string | null {
  return droplet.networks?.v4?.find((n) => n.type === "public")?.ip_address ?? null;
}
