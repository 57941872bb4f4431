import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import type { ClaimPolicy } from './auth/claims.js';
import type { SigningKey } from './auth/signingKey.js';
import { buildAuthHook } from './middleware/auth.js';
import { healthRoute } from './routes/health.js';
import { registerRoutes, type RouteDefinition } from './routes/index.js';
import { profileRoute } from './routes/profile.js';

export const defaultRoutes: readonly RouteDefinition[] = [healthRoute, profileRoute];

export interface BuildAppOptions {
  key: SigningKey;
  policy: Readonly<ClaimPolicy>;
  maxTokenLength?: number;
  clock?: () => Date;
  logger?: FastifyServerOptions['logger'];
  corsOrigins?: readonly string[];
  routes?: readonly RouteDefinition[];
}

/**
 * Wires the request pipeline in order: CORS, bearer authentication, then the
 * route table. Nothing here listens; `server.ts` does that.
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? false });

  const origins = options.corsOrigins ?? ['*'];
  await app.register(cors, {
    origin: origins.includes('*') ? true : [...origins],
    methods: ['GET', 'POST', 'DELETE', 'PUT', 'PATCH', 'OPTIONS'],
    allowedHeaders: ['Authorization', 'Content-Type'],
    exposedHeaders: ['WWW-Authenticate'],
  });

  app.decorateRequest('auth', undefined);

  app.addHook('onRequest', async (request, reply) => {
    // Propagate request identifier to clients for easier debugging/correlation
    reply.header('x-request-id', request.id);
  });

  app.addHook(
    'onRequest',
    buildAuthHook({
      key: options.key,
      policy: options.policy,
      maxTokenLength: options.maxTokenLength,
      clock: options.clock,
    }),
  );

  registerRoutes(app, options.routes ?? defaultRoutes);

  return app;
}
