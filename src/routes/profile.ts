import type { RouteDefinition } from './index.js';

export const profileRoute: RouteDefinition = {
  method: 'GET',
  url: '/auth/profile',
  auth: 'required',
  handler: async (auth) => ({
    user: {
      subject: auth.subject,
      authorities: [...auth.authorities].sort(),
      issuedAt: auth.issuedAt?.toISOString() ?? null,
      expiresAt: auth.expiresAt.toISOString(),
    },
  }),
};
