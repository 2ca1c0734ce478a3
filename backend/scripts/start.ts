import { schedule, type ScheduledTask } from 'node-cron';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import buildServer from '../src/server.js';
import { env } from '../src/util/env.js';
import { loadAgentConfig, type AgentConfig } from '../src/util/agent-config.js';
import { hoursToCron, secondsToCron } from '../src/util/cron.js';
import {
  createDefaultAgentContext,
  type AgentContext,
} from '../src/workflows/agent-context.js';
import runSignalAnalysis from '../src/workflows/signal-analysis.js';
import runPriceMonitor from '../src/jobs/price-monitor.js';

function logStartupBanner(log: FastifyBaseLogger, config: AgentConfig) {
  log.info(
    {
      trackedAssets: config.trackedAssets,
      referenceAssets: config.referenceAssets,
      runEveryHours: config.runEveryHours,
      priceCheckIntervalSeconds: config.priceCheckIntervalSeconds,
      alertScoreThreshold: config.alertScoreThreshold,
      cooldownHours: config.cooldownHours,
      summaryReportTimeUtc: config.summaryReportTime,
      dataDir: env.DATA_DIR,
      webhookConfigured: Boolean(env.DISCORD_WEBHOOK_URL),
    },
    'market monitoring agent starting',
  );
}

async function main() {
  let app: FastifyInstance | undefined;
  const cronTasks: ScheduledTask[] = [];
  let isShuttingDown = false;

  const registerCron = (expression: string, job: () => Promise<unknown>) => {
    const task = schedule(expression, () => {
      void job();
    });
    cronTasks.push(task);
    return task;
  };

  const stopCronJobs = (log?: FastifyBaseLogger) => {
    while (cronTasks.length > 0) {
      const task = cronTasks.pop();
      if (!task) continue;
      try {
        task.stop();
      } catch (err) {
        log?.error({ err }, 'failed to stop cron job');
      }
    }
  };

  const shutdown = async (signal: NodeJS.Signals) => {
    if (isShuttingDown) {
      return;
    }

    isShuttingDown = true;
    const logger = app?.log;

    logger?.info({ signal }, 'received shutdown signal');
    stopCronJobs(logger);

    try {
      if (app) {
        await app.agent.detectorStore.save(app.agent.detectorState);
        await app.close();
        logger?.info('server stopped');
      }
    } catch (err) {
      logger?.error({ err }, 'error during shutdown');
    } finally {
      process.exit(0);
    }
  };

  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const config = loadAgentConfig(env.AGENT_CONFIG_PATH);
    app = await buildServer((log) => createDefaultAgentContext(config, log));
    const { agent, log } = app;
    logStartupBanner(log, config);

    const runCycle = async (
      name: string,
      cycle: (ctx: AgentContext, log: FastifyBaseLogger) => Promise<boolean>,
    ) => {
      try {
        await cycle(agent, log);
      } catch (err) {
        log.error({ err, cycle: name }, 'cycle failed');
      }
    };

    registerCron(hoursToCron(config.runEveryHours), () =>
      runCycle('signal-analysis', runSignalAnalysis),
    );
    registerCron(secondsToCron(config.priceCheckIntervalSeconds), () =>
      runCycle('price-monitor', runPriceMonitor),
    );

    await app.listen({ port: env.PORT, host: env.HOST });
    app.isStarted = true;
    log.info('server started');

    // first comprehensive pass at boot
    void runCycle('signal-analysis', runSignalAnalysis);
  } catch (err) {
    stopCronJobs(app?.log);

    if (app) {
      app.log.error(err);
    } else {
      console.error(err);
    }

    if (!app?.isStarted) {
      process.exit(1);
    }
  }
}

void main();
