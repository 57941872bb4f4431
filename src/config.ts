import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_AUTHORITIES_PATHS, parseList } from './auth/claimPaths.js';
import { DEFAULT_MAX_TOKEN_LENGTH } from './auth/codec.js';
import { isHmacAlgorithm, SUPPORTED_ALGORITHMS } from './auth/signingKey.js';

const MIN_SECRET_LENGTH = 32;

function readOptionalFile(filePath: string | undefined): string | undefined {
  if (!filePath) {
    return undefined;
  }
  return readFileSync(filePath, 'utf8').trim();
}

function emptyToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

const ConfigSchema = z.object({
  nodeEnv: z.string().default('development'),
  port: z.coerce.number().int().positive().default(8080),
  host: z.string().min(1).default('0.0.0.0'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  corsOrigins: z.array(z.string().min(1)).default(['*']),
  auth: z
    .object({
      algorithm: z.enum(SUPPORTED_ALGORITHMS),
      secret: z.string().optional(),
      publicKey: z.string().optional(),
      issuer: z.string().optional(),
      audiences: z.array(z.string().min(1)),
      clockSkewMs: z.coerce.number().int().nonnegative().default(0),
      authoritiesPaths: z.array(z.string().min(1)).nonempty(),
      maxTokenLength: z.coerce.number().int().positive().default(DEFAULT_MAX_TOKEN_LENGTH),
    })
    .superRefine((value, ctx) => {
      if (isHmacAlgorithm(value.algorithm)) {
        if (!value.secret) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['secret'],
            message: `AUTH_SECRET (or AUTH_SECRET_FILE) is required for ${value.algorithm}`,
          });
        } else if (value.secret.length < MIN_SECRET_LENGTH) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['secret'],
            message: `AUTH_SECRET must be at least ${MIN_SECRET_LENGTH} characters`,
          });
        }
        return;
      }

      if (!value.publicKey) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['publicKey'],
          message: `AUTH_PUBLIC_KEY (or AUTH_PUBLIC_KEY_FILE) is required for ${value.algorithm}`,
        });
      }
    }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const authoritiesPaths = parseList(env.AUTH_AUTHORITIES_PATHS);

  return ConfigSchema.parse({
    nodeEnv: emptyToUndefined(env.NODE_ENV),
    port: emptyToUndefined(env.PORT),
    host: emptyToUndefined(env.HOST),
    logLevel: emptyToUndefined(env.LOG_LEVEL),
    corsOrigins: env.CORS_ORIGINS ? parseList(env.CORS_ORIGINS) : undefined,
    auth: {
      algorithm: emptyToUndefined(env.AUTH_ALGORITHM) ?? 'HS256',
      secret: emptyToUndefined(env.AUTH_SECRET) ?? readOptionalFile(emptyToUndefined(env.AUTH_SECRET_FILE)),
      publicKey: emptyToUndefined(env.AUTH_PUBLIC_KEY) ?? readOptionalFile(emptyToUndefined(env.AUTH_PUBLIC_KEY_FILE)),
      issuer: emptyToUndefined(env.AUTH_ISSUER),
      audiences: parseList(env.AUTH_AUDIENCE),
      clockSkewMs: emptyToUndefined(env.AUTH_CLOCK_SKEW_MS),
      authoritiesPaths: authoritiesPaths.length ? authoritiesPaths : DEFAULT_AUTHORITIES_PATHS,
      maxTokenLength: emptyToUndefined(env.AUTH_MAX_TOKEN_LENGTH),
    },
  });
}
