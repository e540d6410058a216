import type { FastifyReply } from "fastify";
import type { ZodError } from "zod";
import type { ErrorResponse } from "@gpubroker/shared";
import { BrokerError, type BrokerErrorCode } from "../errors.js";

const STATUS_BY_CODE: Record<BrokerErrorCode, number> = {
  "job-not-found": 404,
  "invalid-job-state": 409,
  "lock-timeout": 409,
  "invalid-transition": 409,
  "partial-fulfillment": 409,
  "budget-infeasible": 422,
  "state-corruption": 500,
  "provider-error": 502,
  "state-unavailable": 503,
};

/**
 * Reply with the status for a BrokerError; anything else is rethrown to
 * Fastify's error handler.
 */
export function sendBrokerError(reply: FastifyReply, err: unknown): FastifyReply {
  if (!(err instanceof BrokerError)) throw err;
  const status = STATUS_BY_CODE[err.code];
  if (status >= 500) reply.log.error({ code: err.code, err: err.message }, "Request failed");
  return reply.status(status).send({ error: err.message, code: err.code } satisfies ErrorResponse);
}

export function sendValidationError(reply: FastifyReply, error: ZodError): FastifyReply {
  const [issue] = error.issues;
  const at = issue?.path.length ? `${issue.path.join(".")}: ` : "";
  return reply.status(400).send({
    error: `Invalid request: ${at}${issue?.message ?? "unknown"}`,
    code: "invalid-request",
    details: error.issues,
  } satisfies ErrorResponse);
}
