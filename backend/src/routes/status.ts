import type { FastifyInstance } from 'fastify';
import { RATE_LIMITS } from '../rate-limit.js';
import { isSignalAnalysisRunning } from '../workflows/signal-analysis.js';

export default async function statusRoute(app: FastifyInstance) {
  app.get(
    '/status',
    {
      config: { rateLimit: RATE_LIMITS.LAX },
    },
    async () => {
      const { agent } = app;
      return {
        trackedAssets: agent.config.trackedAssets,
        referenceAssets: agent.config.referenceAssets,
        latestPrices: agent.latestPrices,
        detectorState: agent.detectorState,
        cooldowns: agent.ledger.toEntries(),
        lastRuns: {
          signalAnalysis: agent.lastRuns.signalAnalysis?.toISOString() ?? null,
          priceMonitor: agent.lastRuns.priceMonitor?.toISOString() ?? null,
        },
        signalAnalysisRunning: isSignalAnalysisRunning(),
      };
    },
  );
}
