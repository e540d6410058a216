import type { Job, JobStatus } from "./jobs.js";
import type { MigrationRecommendation } from "./costs.js";

export interface JobTransition {
  jobId: string;
  status: JobStatus;
  previousStatus: JobStatus | null;
  version: number;
  timestamp: number;
}

/** SSE event types sent by GET /api/events */
export type BrokerEvent =
  | { type: "job-transition"; data: JobTransition }
  | { type: "job-update"; data: Job }
  | { type: "recommendation"; data: MigrationRecommendation }
  | { type: "heartbeat"; data: { timestamp: number } };

export type BrokerEventType = BrokerEvent["type"];
