import type {
  InstanceState,
  PricingMode,
  ProviderId,
  Quote,
  QuoteRequest,
} from "@gpubroker/shared";

export interface InstanceSpec {
  jobId: string;
  unitKey: string;
  gpuType: string;
  instanceType: string;
  region: string;
  pricingMode: PricingMode;
  /** Highest unit price the plan accepted for this unit. */
  maxPricePerHour: number;
}

export interface ProvisionedInstance {
  remoteId: string;
  address: string | null;
  state: InstanceState;
  pricePerHour: number;
}

export interface RemoteStatus {
  state: InstanceState;
  address: string | null;
}

/**
 * Uniform capability over one external GPU source. Implementations map every
 * failure into the provider error taxonomy and enforce their own rate limit.
 */
export interface ProviderAdapter {
  readonly id: ProviderId;
  quote(request: QuoteRequest, signal?: AbortSignal): Promise<Quote[]>;
  /** The orchestrator sends no signal here; a create ends only at its call timeout. */
  provision(spec: InstanceSpec, signal?: AbortSignal): Promise<ProvisionedInstance>;
  status(remoteId: string, signal?: AbortSignal): Promise<RemoteStatus>;
  /** Resolves once the provider acknowledged; an already-gone instance counts as acknowledged. */
  terminate(remoteId: string, signal?: AbortSignal): Promise<void>;
}

export class AdapterRegistry {
  private byId: Map<ProviderId, ProviderAdapter>;

  constructor(adapters: ProviderAdapter[]) {
    this.byId = new Map(adapters.map((a) => [a.id, a]));
  }

  get(id: ProviderId): ProviderAdapter | undefined {
    return this.byId.get(id);
  }

  all(): ProviderAdapter[] {
    return [...this.byId.values()];
  }
}
