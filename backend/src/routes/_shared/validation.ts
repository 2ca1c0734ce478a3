import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';
import { ERROR_MESSAGES, errorResponse } from '../../util/error-messages.js';

export function parseRequestQuery<S extends z.ZodTypeAny>(
  schema: S,
  req: FastifyRequest,
  reply: FastifyReply,
): z.infer<S> | undefined {
  const result = schema.safeParse(req.query);
  if (!result.success) {
    reply.code(400).send(errorResponse(ERROR_MESSAGES.invalidQuery));
    return undefined;
  }
  return result.data;
}
