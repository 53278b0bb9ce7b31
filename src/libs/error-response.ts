import { STATUS_CODES } from "node:http";
import type { FastifyReply } from "fastify";

export type ApiErrorBody = {
  description: string;
  status: number;
  message: string;
  details?: unknown;
};

export function apiError(
  status: number,
  message: string,
  details?: unknown,
): ApiErrorBody {
  const base: ApiErrorBody = {
    description: STATUS_CODES[status] ?? "Error",
    status,
    message,
  };

  if (details !== undefined) {
    base.details = details;
  }

  return base;
}

export function sendApiError(
  reply: FastifyReply,
  status: number,
  message: string,
  details?: unknown,
) {
  return reply.code(status).send(apiError(status, message, details));
}
