import type { FastifyInstance, FastifyReply, FastifyRequest, HTTPMethods } from 'fastify';
import type { AuthenticationContext } from '../auth/context.js';
import { sendUnauthorized } from '../utils/errors.js';

export const MISSING_TOKEN_MESSAGE = 'missing token';

type Handler<TAuth> = (auth: TAuth, request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;

export type RouteDefinition =
  | { method: HTTPMethods; url: string; auth: 'required'; handler: Handler<AuthenticationContext> }
  | { method: HTTPMethods; url: string; auth: 'optional'; handler: Handler<AuthenticationContext | undefined> };

/**
 * Registers routes from an explicit table. Handlers receive the request's
 * authentication context as their first argument instead of reading it from
 * ambient state.
 */
export function registerRoutes(app: FastifyInstance, routes: readonly RouteDefinition[]): void {
  for (const route of routes) {
    app.route({
      method: route.method,
      url: route.url,
      handler: async (request, reply) => {
        if (route.auth === 'optional') {
          return route.handler(request.auth, request, reply);
        }
        if (!request.auth) {
          request.log.warn({ path: route.url }, 'Missing bearer token');
          return sendUnauthorized(reply, MISSING_TOKEN_MESSAGE);
        }
        return route.handler(request.auth, request, reply);
      },
    });
  }
}
