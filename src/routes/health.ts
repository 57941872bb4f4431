import type { RouteDefinition } from './index.js';

export const healthRoute: RouteDefinition = {
  method: 'GET',
  url: '/health',
  auth: 'optional',
  handler: async (auth) => ({ status: 'ok' as const, authenticated: auth !== undefined }),
};
