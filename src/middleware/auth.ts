import type { FastifyBaseLogger, FastifyReply, FastifyRequest } from 'fastify';
import type { ClaimPolicy } from '../auth/claims.js';
import type { AuthenticationContext } from '../auth/context.js';
import type { TokenErrorCode } from '../auth/errors.js';
import { validateToken } from '../auth/pipeline.js';
import type { SigningKey } from '../auth/signingKey.js';
import { sendUnauthorized } from '../utils/errors.js';

type OnRequestHook = (request: FastifyRequest, reply: FastifyReply) => Promise<void | FastifyReply>;

export const BEARER_PREFIX = 'Bearer ';

export const MALFORMED_HEADER_MESSAGE = 'malformed authorization header';
export const INVALID_TOKEN_MESSAGE = 'invalid token';

export type RejectionReason = TokenErrorCode | 'VerificationFailed';

export type InterceptOutcome =
  | { kind: 'authenticated'; context: AuthenticationContext }
  | { kind: 'pass-through' }
  | { kind: 'rejected'; status: 401; message: string; reason: RejectionReason; detail?: string };

export interface InterceptOptions {
  key: SigningKey;
  now: Date;
  policy: Readonly<ClaimPolicy>;
  maxTokenLength?: number;
}

export interface AuthHookOptions {
  key: SigningKey;
  policy: Readonly<ClaimPolicy>;
  maxTokenLength?: number;
  clock?: () => Date;
}

function reject(message: string, reason: RejectionReason, detail?: string): InterceptOutcome {
  return { kind: 'rejected', status: 401, message, reason, detail };
}

/**
 * Runs one request's credential through the pipeline. Whether an anonymous
 * request may reach its route is decided by the router, so a missing header
 * passes through rather than failing here.
 */
export async function interceptRequest(
  authorization: string | undefined,
  options: InterceptOptions,
): Promise<InterceptOutcome> {
  if (authorization === undefined) {
    return { kind: 'pass-through' };
  }

  if (!authorization.startsWith(BEARER_PREFIX)) {
    return reject(MALFORMED_HEADER_MESSAGE, 'MissingOrMalformedHeader');
  }

  const token = authorization.slice(BEARER_PREFIX.length);

  try {
    const outcome = await validateToken(token, {
      key: options.key,
      now: options.now,
      policy: options.policy,
      maxTokenLength: options.maxTokenLength,
    });

    if (outcome.kind === 'rejected') {
      return reject(INVALID_TOKEN_MESSAGE, outcome.reason, outcome.detail);
    }
    return { kind: 'authenticated', context: outcome.context };
  } catch (error) {
    return reject(INVALID_TOKEN_MESSAGE, 'VerificationFailed', error instanceof Error ? error.message : String(error));
  }
}

function readAuthorizationHeader(request: FastifyRequest): string | undefined {
  const value = request.headers.authorization;
  return typeof value === 'string' ? value : undefined;
}

export function buildAuthHook(options: AuthHookOptions): OnRequestHook {
  const clock = options.clock ?? (() => new Date());

  return async function authHook(request: FastifyRequest, reply: FastifyReply) {
    // Skip auth for CORS preflight
    if (request.method.toUpperCase() === 'OPTIONS') {
      return;
    }

    const outcome = await interceptRequest(readAuthorizationHeader(request), {
      key: options.key,
      policy: options.policy,
      maxTokenLength: options.maxTokenLength,
      now: clock(),
    });

    switch (outcome.kind) {
      case 'pass-through':
        return;
      case 'authenticated':
        request.auth = outcome.context;
        return;
      case 'rejected': {
        const logFields = { reason: outcome.reason, detail: outcome.detail, path: request.url.split('?')[0] };
        if (outcome.reason === 'VerificationFailed') {
          request.log.error(logFields, 'Token verification failed unexpectedly');
        } else {
          request.log.warn(logFields, 'Rejected bearer token');
        }
        return sendUnauthorized(reply, outcome.message, 'Bearer error="invalid_token"');
      }
    }
  };
}

export interface AuthStartupDetails {
  algorithm: string;
  issuer?: string;
  audiences: readonly string[];
  authoritiesPaths: readonly string[];
  clockSkewMs: number;
}

export function logAuthStartupDetails(logger: FastifyBaseLogger, details: AuthStartupDetails): void {
  logger.info(
    {
      algorithm: details.algorithm,
      issuer: details.issuer ?? null,
      audiences: details.audiences,
      authoritiesPaths: details.authoritiesPaths,
      clockSkewMs: details.clockSkewMs,
    },
    'Bearer token authentication enabled',
  );
  if (!details.issuer && details.audiences.length === 0) {
    logger.warn('No AUTH_ISSUER or AUTH_AUDIENCE configured; tokens from any issuer signed with the key are accepted');
  }
}
