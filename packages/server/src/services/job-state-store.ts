import { setTimeout as sleep } from "node:timers/promises";
import { nanoid } from "nanoid";
import type { FastifyBaseLogger } from "fastify";
import type { Job, JobRequest, JobVersionSummary } from "@gpubroker/shared";
import type { StateBackend } from "./state-backend.js";
import { decodeRecord, encodeRecord } from "./job-record.js";
import { KeyedMutex } from "./concurrency.js";
import { isActive } from "./instance-lifecycle.js";
import {
  InvalidJobStateError,
  JobNotFoundError,
  LockTimeoutError,
  StateCorruptionError,
  errorMessage,
} from "../errors.js";

export interface JobStateStoreConfig {
  /** Versions retained per job. */
  historyLimit: number;
  lockTimeoutMs: number;
  /** A lock held longer than this is presumed abandoned and reclaimed. */
  lockStaleMs: number;
  lockPollMs: number;
}

export const DEFAULT_STORE: JobStateStoreConfig = {
  historyLimit: 50,
  lockTimeoutMs: 10_000,
  lockStaleMs: 30_000,
  lockPollMs: 50,
};

export interface UpdateOptions {
  /** Defaults to true. Cost samples skip history so they do not consume retention. */
  recordHistory?: boolean;
}

export type JobMutator = (job: Job) => Job;
export type JobListener = (job: Job, previous: Job | null) => void;

/**
 * Versioned per-job records with an exclusive writer per job id, bounded
 * history, rollback and repair of corrupt records.
 */
export class JobStateStore {
  readonly config: JobStateStoreConfig;
  private mutex = new KeyedMutex();
  private listeners = new Set<JobListener>();

  constructor(
    private backend: StateBackend,
    private log: FastifyBaseLogger,
    config: Partial<JobStateStoreConfig> = {},
    private now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_STORE, ...config };
  }

  subscribe(listener: JobListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async create(request: JobRequest, jobId: string = nanoid(12)): Promise<Job> {
    return this.withLock(jobId, async () => {
      if ((await this.backend.read(jobId)) !== null) {
        throw new InvalidJobStateError(`Job ${jobId} already exists`);
      }
      const now = this.now();
      const job: Job = {
        jobId,
        request,
        status: "pending",
        plan: null,
        instances: [],
        costLedger: [],
        version: 1,
        createdAt: now,
        updatedAt: now,
        warnings: [],
      };
      await this.persist(job, null, true);
      return job;
    });
  }

  /** Returns the current record, repairing it from history if corrupt. */
  async get(jobId: string): Promise<Job | null> {
    const raw = await this.backend.read(jobId);
    if (raw === null) return null;
    const decoded = decodeRecord(raw);
    if (decoded.ok) return decoded.job;
    return this.withLock(jobId, () => this.load(jobId));
  }

  async require(jobId: string): Promise<Job> {
    const job = await this.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  /**
   * Apply `mutator` to the current record under the job lock and persist
   * the result as the next version.
   */
  async update(jobId: string, mutator: JobMutator, options: UpdateOptions = {}): Promise<Job> {
    return this.withLock(jobId, async () => {
      const current = await this.load(jobId);
      if (!current) throw new JobNotFoundError(jobId);

      const next: Job = {
        ...mutator(structuredClone(current)),
        jobId,
        version: current.version + 1,
        updatedAt: this.now(),
      };
      await this.persist(next, current, options.recordHistory ?? true);
      return next;
    });
  }

  async listVersions(jobId: string): Promise<JobVersionSummary[]> {
    const current = await this.require(jobId);
    const byVersion = new Map<number, JobVersionSummary>();
    byVersion.set(current.version, {
      version: current.version,
      status: current.status,
      updatedAt: current.updatedAt,
      current: true,
    });
    for (const job of await this.retained(jobId)) {
      if (byVersion.has(job.version)) continue;
      byVersion.set(job.version, {
        version: job.version,
        status: job.status,
        updatedAt: job.updatedAt,
        current: false,
      });
    }
    return [...byVersion.values()].sort((a, b) => b.version - a.version);
  }

  async getVersion(jobId: string, version: number): Promise<Job | null> {
    return (await this.retained(jobId)).find((j) => j.version === version) ?? null;
  }

  /**
   * Write retained `version` back as a new version. `reconcile` may adjust
   * the restored snapshot against the record it replaces.
   */
  async rollback(
    jobId: string,
    version: number,
    reconcile: (restored: Job, current: Job) => Job = (restored) => restored,
  ): Promise<Job> {
    return this.withLock(jobId, async () => {
      const current = await this.load(jobId);
      if (!current) throw new JobNotFoundError(jobId);
      const target = (await this.retained(jobId)).find((j) => j.version === version);
      if (!target) {
        throw new InvalidJobStateError(`Version ${version} of job ${jobId} is not retained`);
      }

      const next: Job = {
        ...reconcile(structuredClone(target), current),
        jobId,
        version: current.version + 1,
        updatedAt: this.now(),
        restoredFrom: version,
      };
      await this.persist(next, current, true);
      this.log.info({ jobId, from: current.version, restoredFrom: version }, "Job rolled back");
      return next;
    });
  }

  async list(): Promise<Job[]> {
    const jobs: Job[] = [];
    for (const jobId of await this.backend.ids()) {
      try {
        const job = await this.get(jobId);
        if (job) jobs.push(job);
      } catch (err) {
        this.log.error({ jobId, err: errorMessage(err) }, "Skipping unreadable job record");
      }
    }
    return jobs.sort((a, b) => a.createdAt - b.createdAt || (a.jobId < b.jobId ? -1 : 1));
  }

  /** Removes a finished job's record, history and lock. */
  async remove(jobId: string): Promise<void> {
    await this.withLock(jobId, async () => {
      const job = await this.load(jobId);
      if (!job) throw new JobNotFoundError(jobId);
      if (job.status === "provisioning" || job.instances.some(isActive)) {
        throw new InvalidJobStateError(
          `Job ${jobId} still has active instances or is provisioning; terminate it first`,
        );
      }
      await this.backend.remove(jobId);
    });
  }

  // ── internals ──────────────────────────────────────────────────────

  /** Caller holds the job lock. */
  private async load(jobId: string): Promise<Job | null> {
    const raw = await this.backend.read(jobId);
    if (raw === null) return null;
    const decoded = decodeRecord(raw);
    if (decoded.ok) return decoded.job;
    return this.repair(jobId, decoded.reason);
  }

  private async repair(jobId: string, reason: string): Promise<Job> {
    const good = (await this.retained(jobId))[0];
    if (!good) {
      this.log.error({ jobId, reason }, "Job record corrupt with no retained version");
      throw new StateCorruptionError(jobId, reason);
    }

    const restored: Job = {
      ...good,
      version: good.version + 1,
      updatedAt: this.now(),
      restoredFrom: good.version,
      warnings: [...good.warnings, `Record repaired from version ${good.version} (${reason})`],
    };
    await this.persist(restored, null, true);
    this.log.warn({ jobId, reason, restoredFrom: good.version }, "Repaired corrupt job record");
    return restored;
  }

  /** Decodable history entries, newest first. */
  private async retained(jobId: string): Promise<Job[]> {
    const jobs: Job[] = [];
    for (const raw of await this.backend.history(jobId)) {
      const decoded = decodeRecord(raw);
      if (decoded.ok) jobs.push(decoded.job);
    }
    return jobs;
  }

  private async persist(job: Job, previous: Job | null, recordHistory: boolean): Promise<void> {
    const raw = encodeRecord(job);
    await this.backend.write(job.jobId, raw);
    if (recordHistory) {
      await this.backend.pushHistory(job.jobId, raw, this.config.historyLimit);
    }
    for (const listener of this.listeners) {
      try {
        listener(job, previous);
      } catch (err) {
        this.log.error({ jobId: job.jobId, err: errorMessage(err) }, "Job listener failed");
      }
    }
  }

  private async withLock<T>(jobId: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.run(jobId, async () => {
      const token = await this.acquire(jobId);
      try {
        return await fn();
      } finally {
        const released = await this.backend.releaseLock(jobId, token);
        if (!released) {
          this.log.debug({ jobId }, "Job lock already gone at release");
        }
      }
    });
  }

  private async acquire(jobId: string): Promise<string> {
    const token = nanoid();
    const deadline = this.now() + this.config.lockTimeoutMs;

    for (;;) {
      const acquired = await this.backend.tryLock(
        jobId,
        { token, acquiredAt: this.now() },
        this.config.lockStaleMs * 2,
      );
      if (acquired) return token;

      const holder = await this.backend.readLock(jobId);
      if (holder && Math.max(0, this.now() - holder.acquiredAt) > this.config.lockStaleMs) {
        this.log.warn({ jobId, acquiredAt: holder.acquiredAt }, "Reclaiming stale job lock");
        await this.backend.releaseLock(jobId, holder.token);
        continue;
      }

      if (this.now() >= deadline) {
        throw new LockTimeoutError(jobId, this.config.lockTimeoutMs);
      }
      await sleep(this.config.lockPollMs);
    }
  }
}
