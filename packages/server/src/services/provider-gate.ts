import pRetry, { AbortError } from "p-retry";
import type { FastifyBaseLogger } from "fastify";
import type { ProviderId } from "@gpubroker/shared";
import {
  CallTimeoutError,
  ProviderError,
  TransientProviderError,
  errorMessage,
} from "../errors.js";
import { TokenBucket } from "./token-bucket.js";
import { withTimeout } from "./concurrency.js";

export interface CallPolicy {
  requestsPerSecond: number;
  burst: number;
  /** Total tries per gate call, including the first. */
  maxAttempts: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  quoteTimeoutMs: number;
  provisionTimeoutMs: number;
  /** Timeout for status and terminate calls. */
  controlTimeoutMs: number;
}

export const DEFAULT_CALL_POLICY: CallPolicy = {
  requestsPerSecond: 5,
  burst: 10,
  maxAttempts: 3,
  baseBackoffMs: 500,
  maxBackoffMs: 30_000,
  quoteTimeoutMs: 10_000,
  provisionTimeoutMs: 300_000,
  controlTimeoutMs: 30_000,
};

export type ProviderOperation = "quote" | "provision" | "status" | "terminate";

export interface GateCallOptions {
  signal?: AbortSignal;
  /** Defaults to the policy timeout for the operation. */
  timeoutMs?: number;
}

/**
 * Per-provider call discipline: rate limit, per-call timeout, retry with
 * exponential backoff, and mapping of every failure into the provider error
 * taxonomy. Provision is never retried here.
 */
export class ProviderGate {
  readonly policy: CallPolicy;
  private bucket: TokenBucket;

  constructor(
    readonly provider: ProviderId,
    private log: FastifyBaseLogger,
    policy?: Partial<CallPolicy>,
  ) {
    this.policy = { ...DEFAULT_CALL_POLICY, ...policy };
    this.bucket = new TokenBucket({
      capacity: Math.max(1, this.policy.burst),
      refillIntervalMs: Math.max(1, Math.round(1000 / this.policy.requestsPerSecond)),
    });
  }

  async run<T>(
    op: ProviderOperation,
    fn: (signal: AbortSignal) => Promise<T>,
    options: GateCallOptions = {},
  ): Promise<T> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? this.timeoutFor(op);
    const attempts = op === "provision" ? 1 : Math.max(1, this.policy.maxAttempts);

    return pRetry(
      async () => {
        await this.bucket.take(signal);
        try {
          return await withTimeout(fn, timeoutMs, signal);
        } catch (err) {
          if (signal?.aborted) throw new AbortError(toError(err));
          const mapped = toProviderError(this.provider, err);
          if (!mapped.retryable) throw new AbortError(mapped);
          throw mapped;
        }
      },
      {
        retries: attempts - 1,
        factor: 2,
        minTimeout: this.policy.baseBackoffMs,
        maxTimeout: this.policy.maxBackoffMs,
        signal,
        onFailedAttempt: (err) => {
          this.log.warn(
            {
              provider: this.provider,
              op,
              attempt: err.attemptNumber,
              retriesLeft: err.retriesLeft,
              err: err.message,
            },
            "Provider call failed",
          );
        },
      },
    );
  }

  private timeoutFor(op: ProviderOperation): number {
    switch (op) {
      case "quote":
        return this.policy.quoteTimeoutMs;
      case "provision":
        return this.policy.provisionTimeoutMs;
      default:
        return this.policy.controlTimeoutMs;
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function toProviderError(provider: ProviderId, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  if (err instanceof CallTimeoutError) {
    return new TransientProviderError(provider, "timeout", `${provider}: ${err.message}`);
  }
  // fetch() network failures, DNS errors, resets
  return new TransientProviderError(provider, "unavailable", `${provider}: ${errorMessage(err)}`);
}
