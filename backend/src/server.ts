import Fastify, {
  type FastifyBaseLogger,
  type FastifyInstance,
  type FastifyPluginAsync,
} from 'fastify';
import pino from 'pino';
import rateLimit from '@fastify/rate-limit';
import helmet from '@fastify/helmet';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { RATE_LIMITS } from './rate-limit.js';
import { ERROR_MESSAGES, errorResponse } from './util/error-messages.js';
import type { AgentContext } from './workflows/agent-context.js';

declare module 'fastify' {
  interface FastifyInstance {
    /** Indicates whether the HTTP server finished booting */
    isStarted: boolean;
    agent: AgentContext;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isPlugin(value: unknown): value is FastifyPluginAsync {
  return typeof value === 'function';
}

function isRouteModule(file: string): boolean {
  const isScript = /\.([tj])s$/.test(file);
  const isTypes = /\.d\.([tj])s$/.test(file) || /\.types\.([tj])s$/.test(file);
  const isTest = /\.(spec|test)\.([tj])s$/.test(file);
  return isScript && !isTypes && !isTest;
}

export interface ServerOptions {
  routesDir?: string;
  /** `false` silences the logger. */
  logger?: boolean;
}

/** `createAgent` receives the server's logger so every job logs through pino. */
export default async function buildServer(
  createAgent: (log: FastifyBaseLogger) => Promise<AgentContext>,
  opts: ServerOptions = {},
): Promise<FastifyInstance> {
  const routesDir =
    opts.routesDir ??
    path.join(path.dirname(fileURLToPath(import.meta.url)), 'routes');
  const app = Fastify({
    logger:
      opts.logger === false
        ? false
        : {
            base: undefined,
            timestamp: pino.stdTimeFunctions.isoTime,
            formatters: {
              level: (label) => ({ level: label.toUpperCase() }),
            },
          },
    disableRequestLogging: true,
  });

  app.decorate('isStarted', false);
  app.decorate('agent', await createAgent(app.log));

  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    frameguard: { action: 'deny' },
    referrerPolicy: { policy: 'no-referrer' },
  });

  await app.register(rateLimit, {
    global: false,
    ...RATE_LIMITS.LAX,
    errorResponseBuilder: (_req, context) => ({
      statusCode: 429,
      ...errorResponse(`Too many requests, please try again in ${context.after}.`),
    }),
  });

  for (const file of fs.readdirSync(routesDir)) {
    if (fs.statSync(path.join(routesDir, file)).isDirectory()) continue;
    if (!isRouteModule(file)) continue;

    let plugin: FastifyPluginAsync;
    try {
      const mod: unknown = await import(pathToFileURL(path.join(routesDir, file)).href);
      const candidate = isRecord(mod) && 'default' in mod ? mod.default : mod;
      if (!isPlugin(candidate)) {
        const available = isRecord(mod) ? Object.keys(mod) : [];
        app.log.error({ file, exports: available }, 'route module must export a Fastify plugin');
        throw new Error(`Route ${file} does not export a Fastify plugin.`);
      }
      plugin = candidate;
    } catch (err) {
      app.log.error({ err, file }, 'failed to load route module');
      throw err instanceof Error ? err : new Error(String(err));
    }

    try {
      await app.register(plugin, { prefix: '/api' });
    } catch (err) {
      app.log.error({ err, file }, 'failed to register route module');
      throw err instanceof Error ? err : new Error(String(err));
    }
  }

  app.addHook('preHandler', (req, _reply, done) => {
    req.log.info({ route: req.routeOptions.url, query: req.query }, 'request start');
    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    if (reply.statusCode < 400) {
      req.log.info(
        { route: req.routeOptions.url, statusCode: reply.statusCode },
        'request success',
      );
    }
    done();
  });

  app.setErrorHandler((err, req, reply) => {
    req.log.error({ err, route: req.routeOptions.url }, 'request error');
    const status = err.statusCode ?? 500;
    reply
      .code(status)
      .send(errorResponse(status >= 500 ? ERROR_MESSAGES.internal : err.message));
  });

  app.setNotFoundHandler((_req, reply) => {
    reply.code(404).send(errorResponse(ERROR_MESSAGES.notFound));
  });

  app.log.info('Server initialized');
  return app;
}
