import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RATE_LIMITS } from '../rate-limit.js';
import { readSignalLog } from '../repos/signal-log.js';
import { parseRequestQuery } from './_shared/validation.js';

const signalsQuerySchema = z
  .object({
    limit: z.coerce.number().int().min(1).max(500).default(50),
  })
  .strict();

export default async function signalsRoute(app: FastifyInstance) {
  app.get(
    '/signals',
    {
      config: { rateLimit: RATE_LIMITS.MODERATE },
    },
    async (req, reply) => {
      const query = parseRequestQuery(signalsQuerySchema, req, reply);
      if (!query) return reply;
      const entries = await readSignalLog(
        app.agent.signalLogPath,
        query.limit,
        req.log,
      );
      return { entries };
    },
  );
}
