import { nanoid } from "nanoid";
import type { Redis } from "ioredis";
import type { FastifyBaseLogger } from "fastify";
import type { BrokerEvent, Job } from "@gpubroker/shared";
import type { JobStateStore } from "./job-state-store.js";
import { errorMessage } from "../errors.js";

export type BrokerEventListener = (event: BrokerEvent) => void;

export interface JobEventHubConfig {
  /** Redis pub/sub channel shared by every broker process. */
  updatesChannel: string;
}

const DEFAULT_CONFIG: JobEventHubConfig = {
  updatesChannel: "broker:job:updates",
};

interface UpdateMessage {
  origin: string;
  jobId: string;
}

/**
 * Fans job events out to in-process listeners. With Redis, job updates are
 * also announced on a channel so other broker processes can forward them.
 */
export class JobEventHub {
  private listeners = new Set<BrokerEventListener>();
  private subscriber: Redis | null = null;
  private origin = nanoid(8);
  private config: JobEventHubConfig;

  constructor(
    private redis: Redis | null,
    private log: FastifyBaseLogger,
    config?: Partial<JobEventHubConfig>,
    private now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /** Emit transitions and updates for every write to `store`. */
  attach(store: JobStateStore): () => void {
    return store.subscribe((job, previous) => this.onJobWritten(job, previous));
  }

  subscribe(listener: BrokerEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: BrokerEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.log.error({ type: event.type, err: errorMessage(err) }, "Event listener failed");
      }
    }
  }

  /** Forward updates announced by other processes; `loadJob` reads the current record. */
  async listen(loadJob: (jobId: string) => Promise<Job | null>): Promise<void> {
    if (!this.redis || this.subscriber) return;
    try {
      // ioredis needs a dedicated connection in subscriber mode
      this.subscriber = this.redis.duplicate();
      await this.subscriber.subscribe(this.config.updatesChannel);
      this.subscriber.on("message", (_channel: string, message: string) => {
        const update = parseUpdate(message);
        if (!update || update.origin === this.origin) return;
        loadJob(update.jobId).then(
          (job) => {
            if (job) this.emit({ type: "job-update", data: job });
          },
          (err: unknown) => {
            this.log.warn({ jobId: update.jobId, err: errorMessage(err) }, "Could not load announced job");
          },
        );
      });
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, "Redis pub/sub unavailable; events stay in process");
      this.subscriber?.disconnect();
      this.subscriber = null;
    }
  }

  stop(): void {
    this.subscriber?.disconnect();
    this.subscriber = null;
  }

  private onJobWritten(job: Job, previous: Job | null): void {
    if (previous === null || previous.status !== job.status) {
      this.emit({
        type: "job-transition",
        data: {
          jobId: job.jobId,
          status: job.status,
          previousStatus: previous?.status ?? null,
          version: job.version,
          timestamp: this.now(),
        },
      });
    }
    this.emit({ type: "job-update", data: job });
    this.announce(job.jobId);
  }

  private announce(jobId: string): void {
    if (!this.redis) return;
    const message: UpdateMessage = { origin: this.origin, jobId };
    this.redis.publish(this.config.updatesChannel, JSON.stringify(message)).catch((err: unknown) => {
      this.log.warn({ jobId, err: errorMessage(err) }, "Publishing job update failed");
    });
  }
}

function parseUpdate(message: string): UpdateMessage | null {
  try {
    const value: unknown = JSON.parse(message);
    if (
      typeof value === "object" &&
      value !== null &&
      "origin" in value &&
      "jobId" in value &&
      typeof value.origin === "string" &&
      typeof value.jobId === "string"
    ) {
      return { origin: value.origin, jobId: value.jobId };
    }
    return null;
  } catch {
    return null;
  }
}
