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

const LAMBDA_API = "https://cloud.lambdalabs.com/api/v1";

const STATE_BY_STATUS: Record<string, InstanceState> = {
  booting: "provisioning",
  active: "running",
  unhealthy: "failed",
  terminating: "stopping",
  terminated: "terminated",
};

export interface LambdaLabsProviderConfig {
  apiKey: string | null;
  log: FastifyBaseLogger;
  sshKeyName?: string | null;
  /** Lambda reports capacity per region as a yes/no; each yes counts as this many units. */
  assumedCapacity?: number;
  policy?: Partial<CallPolicy>;
}

interface LambdaInstanceType {
  instance_type: {
    name: string;
    price_cents_per_hour: number;
    specs?: { gpus?: Array<{ description?: string }> };
  };
  regions_with_capacity_available: Array<{ name: string }>;
}

interface LambdaInstance {
  id: string;
  status?: string;
  ip?: string | null;
}

export class LambdaLabsProvider implements ProviderAdapter {
  readonly id = "lambdalabs";

  private apiKey: string | null;
  private log: FastifyBaseLogger;
  private sshKeyName: string | null;
  private assumedCapacity: number;
  private gate: ProviderGate;

  constructor(config: LambdaLabsProviderConfig) {
    this.apiKey = config.apiKey;
    this.log = config.log;
    this.sshKeyName = config.sshKeyName ?? null;
    this.assumedCapacity = config.assumedCapacity ?? 4;
    this.gate = new ProviderGate(this.id, config.log, config.policy);
  }

  async quote(request: QuoteRequest, signal?: AbortSignal): Promise<Quote[]> {
    if (request.pricingMode === "spot") return [];

    const types = await this.gate.run("quote", (s) => this.instanceTypes(request.gpuType, s), {
      signal,
    });
    const observedAt = Date.now();

    return types.flatMap((t) =>
      t.regions_with_capacity_available
        .filter((r) => !request.region || r.name === request.region)
        .map((r) => ({
          provider: this.id,
          instanceType: t.instance_type.name,
          gpuType: request.gpuType,
          pricePerHour: t.instance_type.price_cents_per_hour / 100,
          pricingMode: "on-demand" as const,
          region: r.name,
          availableCapacity: this.assumedCapacity,
          observedAt,
        })),
    );
  }

  async provision(spec: InstanceSpec, signal?: AbortSignal): Promise<ProvisionedInstance> {
    return this.gate.run(
      "provision",
      async (s) => {
        const type = (await this.instanceTypes(spec.gpuType, s)).find(
          (t) => t.instance_type.name === spec.instanceType,
        );
        if (!type || !type.regions_with_capacity_available.some((r) => r.name === spec.region)) {
          throw new TransientProviderError(
            this.id,
            "unavailable",
            `No Lambda capacity for ${spec.instanceType} in ${spec.region}`,
          );
        }
        const price = type.instance_type.price_cents_per_hour / 100;
        if (price > spec.maxPricePerHour + 1e-9) {
          throw new ProviderRejectedError(
            this.id,
            `${spec.instanceType} now costs $${price}/hr, above the accepted $${spec.maxPricePerHour}/hr`,
          );
        }

        const res = await fetch(`${LAMBDA_API}/instance-operations/launch`, {
          method: "POST",
          headers: { ...this.headers(), "Content-Type": "application/json" },
          body: JSON.stringify({
            region_name: spec.region,
            instance_type_name: spec.instanceType,
            ssh_key_names: this.sshKeyName ? [this.sshKeyName] : [],
            quantity: 1,
            name: `gpubroker-${spec.jobId}`,
          }),
          signal: s,
        });
        await assertOk(this.id, res, "launch");

        const data = (await res.json()) as { data?: { instance_ids?: string[] } };
        const remoteId = data.data?.instance_ids?.[0];
        if (!remoteId) {
          throw new TransientProviderError(this.id, "unavailable", "Lambda did not return an instance ID");
        }
        this.log.info({ remoteId, unitKey: spec.unitKey, region: spec.region }, "Launched Lambda instance");
        return { remoteId, address: null, state: "provisioning", pricePerHour: price };
      },
      { signal },
    );
  }

  async status(remoteId: string, signal?: AbortSignal): Promise<RemoteStatus> {
    return this.gate.run(
      "status",
      async (s) => {
        const res = await fetch(`${LAMBDA_API}/instances/${remoteId}`, {
          headers: this.headers(),
          signal: s,
        });
        if (res.status === 404) return { state: "terminated", address: null };
        await assertOk(this.id, res, "instance status");

        const data = (await res.json()) as { data?: LambdaInstance };
        return {
          state: STATE_BY_STATUS[data.data?.status ?? "booting"] ?? "provisioning",
          address: data.data?.ip ?? null,
        };
      },
      { signal },
    );
  }

  async terminate(remoteId: string, signal?: AbortSignal): Promise<void> {
    await this.gate.run(
      "terminate",
      async (s) => {
        const res = await fetch(`${LAMBDA_API}/instance-operations/terminate`, {
          method: "POST",
          headers: { ...this.headers(), "Content-Type": "application/json" },
          body: JSON.stringify({ instance_ids: [remoteId] }),
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
      throw new AuthenticationError(this.id, "Lambda API key not configured");
    }
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  private async instanceTypes(gpuType: string, signal: AbortSignal): Promise<LambdaInstanceType[]> {
    const res = await fetch(`${LAMBDA_API}/instance-types`, {
      headers: this.headers(),
      signal,
    });
    await assertOk(this.id, res, "instance types");

    const data = (await res.json()) as { data?: Record<string, LambdaInstanceType> };
    return Object.values(data.data ?? {})
      .filter((t) => gpuMatches(gpuType, t.instance_type.specs?.gpus?.[0]?.description ?? ""))
      .sort(
        (a, b) =>
          a.instance_type.price_cents_per_hour - b.instance_type.price_cents_per_hour ||
          a.instance_type.name.localeCompare(b.instance_type.name),
      );
  }
}
