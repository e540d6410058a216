import type { Job, JobRequest, JobStatus, JobVersionSummary } from "./jobs.js";
import type { AggregationRound } from "./quotes.js";
import type { CostSnapshot, MigrationRecommendation } from "./costs.js";

/** POST /api/jobs */
export type CreateJobRequest = JobRequest;

export interface CreateJobResponse {
  job: Job;
}

/** GET /api/jobs */
export interface JobsListResponse {
  jobs: Job[];
}

/** GET /api/jobs/:jobId */
export interface JobResponse {
  job: Job;
}

/** GET /api/jobs/:jobId/versions */
export interface JobVersionsResponse {
  jobId: string;
  versions: JobVersionSummary[];
}

/** POST /api/jobs/:jobId/rollback */
export interface RollbackRequest {
  version: number;
}

/** POST /api/jobs/:jobId/{cancel,repair,terminate,rollback} */
export interface JobActionResponse {
  ok: boolean;
  status: JobStatus;
  version: number;
}

/** GET /api/quotes */
export interface QuotesResponse {
  round: AggregationRound;
}

/** GET /api/costs */
export interface CostsResponse {
  snapshot: CostSnapshot | null;
}

/** GET /api/recommendations */
export interface RecommendationsResponse {
  recommendations: MigrationRecommendation[];
}

export interface ErrorResponse {
  error: string;
  code?: string;
  details?: unknown;
}
