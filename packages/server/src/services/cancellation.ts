import { InvalidJobStateError, JobCancelledError } from "../errors.js";

/**
 * One AbortController per job with a provisioning run in this process.
 * Cancelling stops the run; a create already sent finishes and is rolled back.
 */
export class CancellationRegistry {
  private controllers = new Map<string, AbortController>();

  begin(jobId: string): AbortController {
    if (this.controllers.has(jobId)) {
      throw new InvalidJobStateError(`Job ${jobId} is already provisioning`);
    }
    const controller = new AbortController();
    this.controllers.set(jobId, controller);
    return controller;
  }

  end(jobId: string, controller: AbortController): void {
    if (this.controllers.get(jobId) === controller) this.controllers.delete(jobId);
  }

  isRunning(jobId: string): boolean {
    return this.controllers.has(jobId);
  }

  /** Returns false when the job has no run in this process. */
  cancel(jobId: string): boolean {
    const controller = this.controllers.get(jobId);
    if (!controller) return false;
    controller.abort(new JobCancelledError(jobId));
    return true;
  }
}
