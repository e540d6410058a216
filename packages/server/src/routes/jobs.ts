import type { FastifyInstance } from "fastify";
import type {
  CreateJobResponse,
  Job,
  JobActionResponse,
  JobResponse,
  JobsListResponse,
  JobVersionsResponse,
} from "@gpubroker/shared";
import { jobRequestSchema, rollbackSchema } from "./schemas.js";
import { sendBrokerError, sendValidationError } from "./http-errors.js";

type JobParams = { Params: { jobId: string } };

function action(job: Job): JobActionResponse {
  return { ok: true, status: job.status, version: job.version };
}

export default async function jobRoutes(fastify: FastifyInstance) {
  const broker = fastify.broker;
  const auth = { preHandler: [fastify.verifyAuth] };

  // POST /api/jobs: plan a job and start provisioning it
  fastify.post("/api/jobs", auth, async (request, reply) => {
    const parsed = jobRequestSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    try {
      const job = await broker.submit(parsed.data);
      return reply.status(201).send({ job } satisfies CreateJobResponse);
    } catch (err) {
      return sendBrokerError(reply, err);
    }
  });

  // GET /api/jobs
  fastify.get("/api/jobs", async (_request, reply) => {
    try {
      const jobs = await broker.list();
      return reply.send({ jobs } satisfies JobsListResponse);
    } catch (err) {
      return sendBrokerError(reply, err);
    }
  });

  // GET /api/jobs/:jobId
  fastify.get<JobParams>("/api/jobs/:jobId", async (request, reply) => {
    try {
      const job = await broker.status(request.params.jobId);
      return reply.send({ job } satisfies JobResponse);
    } catch (err) {
      return sendBrokerError(reply, err);
    }
  });

  // GET /api/jobs/:jobId/versions: retained history, newest first
  fastify.get<JobParams>("/api/jobs/:jobId/versions", async (request, reply) => {
    const { jobId } = request.params;
    try {
      const versions = await broker.versions(jobId);
      return reply.send({ jobId, versions } satisfies JobVersionsResponse);
    } catch (err) {
      return sendBrokerError(reply, err);
    }
  });

  fastify.post<JobParams>("/api/jobs/:jobId/cancel", auth, async (request, reply) => {
    try {
      return reply.send(action(await broker.cancel(request.params.jobId)));
    } catch (err) {
      return sendBrokerError(reply, err);
    }
  });

  // Re-provision units that are missing or no longer running
  fastify.post<JobParams>("/api/jobs/:jobId/repair", auth, async (request, reply) => {
    try {
      return reply.status(202).send(action(await broker.repair(request.params.jobId)));
    } catch (err) {
      return sendBrokerError(reply, err);
    }
  });

  fastify.post<JobParams>("/api/jobs/:jobId/terminate", auth, async (request, reply) => {
    try {
      return reply.send(action(await broker.terminate(request.params.jobId)));
    } catch (err) {
      return sendBrokerError(reply, err);
    }
  });

  fastify.post<JobParams>("/api/jobs/:jobId/rollback", auth, async (request, reply) => {
    const parsed = rollbackSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    try {
      const job = await broker.rollback(request.params.jobId, parsed.data.version);
      return reply.send(action(job));
    } catch (err) {
      return sendBrokerError(reply, err);
    }
  });

  // DELETE /api/jobs/:jobId: drop the record once no instance is live
  fastify.delete<JobParams>("/api/jobs/:jobId", auth, async (request, reply) => {
    try {
      await broker.remove(request.params.jobId);
      return reply.status(204).send();
    } catch (err) {
      return sendBrokerError(reply, err);
    }
  });
}
