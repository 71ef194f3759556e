import type { FastifyReply, FastifyRequest } from "fastify";
import { toAgentError } from "../errors.js";

export interface ApiSuccessEnvelope<T> {
  code: "OK";
  message: string;
  requestId: string;
  data: T;
}

export interface ApiErrorEnvelope {
  code: string;
  message: string;
  requestId: string;
  details?: Record<string, unknown>;
}

export function ok<T>(request: FastifyRequest, data: T, message = "ok"): ApiSuccessEnvelope<T> {
  return {
    code: "OK",
    message,
    requestId: request.id,
    data
  };
}

/** Writes any thrown value as an error envelope, using the AgentError status and code when present. */
export function fail(request: FastifyRequest, reply: FastifyReply, error: unknown): ApiErrorEnvelope {
  const failure = toAgentError(error);
  if (failure.code === "INTERNAL_ERROR") {
    request.log.error({ err: error }, "request failed");
  }
  const body: ApiErrorEnvelope = {
    code: failure.code,
    message: failure.message,
    requestId: request.id,
    details: failure.details
  };
  reply.status(failure.statusCode);
  return body;
}
