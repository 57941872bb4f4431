import 'fastify';
import type { AuthenticationContext } from '../auth/context.js';

declare module 'fastify' {
  interface FastifyRequest {
    auth?: AuthenticationContext;
  }
}
