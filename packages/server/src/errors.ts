import type {
  AllocationPlan,
  ProviderErrorKind,
  ProviderId,
  ProvisionReport,
} from "@gpubroker/shared";

export type BrokerErrorCode =
  | "provider-error"
  | "budget-infeasible"
  | "partial-fulfillment"
  | "state-corruption"
  | "lock-timeout"
  | "state-unavailable"
  | "job-not-found"
  | "invalid-job-state"
  | "invalid-transition";

export class BrokerError extends Error {
  constructor(
    readonly code: BrokerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// ── Provider taxonomy ────────────────────────────────────────────────

export class ProviderError extends BrokerError {
  constructor(
    readonly provider: ProviderId,
    readonly kind: ProviderErrorKind,
    readonly retryable: boolean,
    message: string,
  ) {
    super("provider-error", message);
  }
}

/** Bad or missing credentials. Ends the provider's participation. */
export class AuthenticationError extends ProviderError {
  constructor(provider: ProviderId, message: string) {
    super(provider, "auth", false, message);
  }
}

/** Provider refused for quota; its capacity counts as zero this round. */
export class QuotaExceededError extends ProviderError {
  constructor(provider: ProviderId, message: string) {
    super(provider, "quota", false, message);
  }
}

export class TransientProviderError extends ProviderError {
  constructor(
    provider: ProviderId,
    kind: "unavailable" | "timeout",
    message: string,
  ) {
    super(provider, kind, true, message);
  }
}

/** Provider rejected the request itself (non-quota 4xx). Not retried. */
export class ProviderRejectedError extends ProviderError {
  constructor(provider: ProviderId, message: string) {
    super(provider, "rejected", false, message);
  }
}

// ── Planning & fulfillment ───────────────────────────────────────────

export class BudgetInfeasibleError extends BrokerError {
  constructor(
    readonly plan: AllocationPlan,
    readonly budgetPerHour: number,
  ) {
    super(
      "budget-infeasible",
      `Cheapest plan costs $${plan.totalCostPerHour.toFixed(2)}/hr, over the $${budgetPerHour.toFixed(2)}/hr budget`,
    );
  }
}

export class PartialFulfillmentError extends BrokerError {
  constructor(readonly report: ProvisionReport) {
    super(
      "partial-fulfillment",
      `Provisioned ${report.achieved} of ${report.requested} units (minimum ${report.minRequired})`,
    );
  }
}

// ── State ────────────────────────────────────────────────────────────

export class StateCorruptionError extends BrokerError {
  constructor(
    readonly jobId: string,
    readonly detail: string,
  ) {
    super(
      "state-corruption",
      `Job ${jobId} record is corrupt (${detail}); roll back to a retained version or remove the record`,
    );
  }
}

export class LockTimeoutError extends BrokerError {
  constructor(
    readonly jobId: string,
    timeoutMs: number,
  ) {
    super("lock-timeout", `Timed out after ${timeoutMs}ms waiting for the lock on job ${jobId}`);
  }
}

export class StateUnavailableError extends BrokerError {
  constructor(message = "Job state backend unavailable") {
    super("state-unavailable", message);
  }
}

export class JobNotFoundError extends BrokerError {
  constructor(readonly jobId: string) {
    super("job-not-found", `Job not found: ${jobId}`);
  }
}

export class InvalidJobStateError extends BrokerError {
  constructor(message: string) {
    super("invalid-job-state", message);
  }
}

export class InvalidTransitionError extends BrokerError {
  constructor(from: string, to: string) {
    super("invalid-transition", `Instance cannot move from ${from} to ${to}`);
  }
}

/** Raised by withTimeout; mapped to a TransientProviderError at the gate. */
export class CallTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Call timed out after ${timeoutMs}ms`);
    this.name = "CallTimeoutError";
  }
}

/** Abort reason for a job cancelled by its owner. */
export class JobCancelledError extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} was cancelled`);
    this.name = "JobCancelledError";
  }
}

/** Abort reason for a job that ran past its overall deadline. */
export class JobDeadlineError extends Error {
  constructor(
    readonly jobId: string,
    readonly deadlineMs: number,
  ) {
    super(`Job ${jobId} exceeded its ${deadlineMs}ms provisioning deadline`);
    this.name = "JobDeadlineError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
