import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';

export interface SecurityOptions {
  /** Allowed browser origins; empty admits any origin. */
  corsOrigins: readonly string[];
  /** Requests per client per window. */
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

async function securityPlugin(fastify: FastifyInstance, options: SecurityOptions): Promise<void> {
  await fastify.register(cors, {
    origin: options.corsOrigins.length > 0 ? [...options.corsOrigins] : true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  // Health checks are never limited.
  await fastify.register(rateLimit, {
    max: options.rateLimitMax,
    timeWindow: options.rateLimitWindowMs,
    allowList: (request) => request.url === '/health',
  });
}

export default fp(securityPlugin, {
  name: 'security',
});
