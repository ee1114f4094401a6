import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { ZodError } from "zod";
import type { ErrorBody } from "@keyrelay/shared";
import { ApiError } from "../errors.js";

export function errorHandler(
  error: FastifyError | ApiError | ZodError,
  request: FastifyRequest,
  reply: FastifyReply
) {
  if (error instanceof ZodError) {
    return reply.status(400).header("X-Error-Code", "VALIDATION_ERROR").send({
      error: "Validation error",
      code: "VALIDATION_ERROR",
      details: error.errors.map((e) => ({
        path: e.path.join("."),
        message: e.message,
      })),
    } satisfies ErrorBody);
  }

  if (error instanceof ApiError) {
    if (error.statusCode >= 500) {
      request.log.error({ err: error }, "request failed");
    }
    return reply
      .status(error.statusCode)
      .headers({ ...error.headers, "X-Error-Code": error.code })
      .send({ ...error.details, error: error.message, code: error.code } satisfies ErrorBody);
  }

  const statusCode = error.statusCode ?? 500;
  if (statusCode >= 500) {
    request.log.error({ err: error }, "unhandled error");
    return reply
      .status(500)
      .send({ error: "Internal server error", code: "INTERNAL" } satisfies ErrorBody);
  }

  // Fastify's own 4xx errors (malformed JSON, body too large, ...)
  return reply.status(statusCode).send({
    error: error.message,
    code: statusCode === 413 ? "MESSAGE_TOO_LARGE" : "VALIDATION_ERROR",
  } satisfies ErrorBody);
}
