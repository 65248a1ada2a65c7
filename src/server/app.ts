import Fastify, { type FastifyInstance } from 'fastify';
import type { SessionManager } from '../browser/session-manager.js';
import { config } from '../config.js';
import type { ToolDispatcher } from '../tools/dispatcher.js';
import { logger } from '../utils/logger.js';
import errorHandler from './middleware/error-handler.js';
import security, { type SecurityOptions } from './middleware/security.js';
import { sessionRoutes } from './routes/sessions.js';
import { toolRoutes } from './routes/tools.js';

declare module 'fastify' {
  interface FastifyInstance {
    sessionManager: SessionManager;
    dispatcher: ToolDispatcher;
  }
}

export interface AppOptions {
  sessionManager: SessionManager;
  dispatcher: ToolDispatcher;
  security?: Partial<SecurityOptions>;
}

export function buildApp({ sessionManager, dispatcher, security: overrides = {} }: AppOptions): FastifyInstance {
  const app = Fastify({
    logger: false, // We use our own pino logger
    disableRequestLogging: true,
    // Unknown body keys are a protocol error, not something to strip silently.
    ajv: { customOptions: { removeAdditional: false } },
  });

  app.decorate('sessionManager', sessionManager);
  app.decorate('dispatcher', dispatcher);

  app.register(errorHandler);
  app.register(security, {
    corsOrigins: overrides.corsOrigins ?? config.corsOrigins,
    rateLimitMax: overrides.rateLimitMax ?? config.rateLimitMax,
    rateLimitWindowMs: overrides.rateLimitWindowMs ?? config.rateLimitWindowMs,
  });

  app.get('/health', async () => {
    return {
      status: 'ok',
      sessions: sessionManager.size,
      tools: dispatcher.allowedTools,
      config: {
        maxSessions: config.maxSessions,
        sessionTimeoutMs: config.sessionTimeoutMs,
        toolTimeoutMs: config.toolTimeoutMs,
      },
    };
  });

  app.register(sessionRoutes, { prefix: '/sessions' });
  app.register(toolRoutes, { prefix: '/tools' });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'request completed',
    );
    done();
  });

  return app;
}
