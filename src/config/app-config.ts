/**
 * Rotation configuration - parse, don't validate.
 *
 * - Single source of truth for the env surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type IamUserName = Brand<string, 'IamUserName'>;
export type RetryDelayMs = Brand<number, 'RetryDelayMs'>;

export interface AppConfig {
  /** IAM user whose access key is rotated; also the identity the new key must resolve to. */
  readonly userName: IamUserName;
  readonly aws: {
    readonly region: string | null;
    readonly secretsManagerEndpoint: string | null;
  };
  readonly verification: {
    readonly maxAttempts: number;
    readonly retryDelayMs: RetryDelayMs;
  };
  readonly logLevel: LogLevel;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const optionalNumber = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)));

const EnvSchema = z.object({
  USERNAME: z.string().trim().min(1, 'USERNAME is required (IAM user that owns the SMTP access key)'),

  SECRETS_MANAGER_ENDPOINT: z.string().url('SECRETS_MANAGER_ENDPOINT must be a URL').optional(),

  AWS_REGION: z.string().trim().min(1).optional(),

  VERIFY_MAX_ATTEMPTS: optionalNumber.pipe(
    z
      .number()
      .int('VERIFY_MAX_ATTEMPTS must be an integer')
      .min(1, 'VERIFY_MAX_ATTEMPTS must be >= 1')
      .max(20, 'VERIFY_MAX_ATTEMPTS must be <= 20')
      .default(5)
  ),

  VERIFY_RETRY_DELAY_MS: optionalNumber.pipe(
    z
      .number()
      .min(0, 'VERIFY_RETRY_DELAY_MS cannot be negative')
      .max(60_000, 'VERIFY_RETRY_DELAY_MS cannot exceed 60000')
      .default(5_000)
  ),

  ROTATION_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info')),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data)));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    userName: env.USERNAME as IamUserName,
    aws: {
      region: env.AWS_REGION ?? null,
      secretsManagerEndpoint: env.SECRETS_MANAGER_ENDPOINT ?? null,
    },
    verification: {
      maxAttempts: env.VERIFY_MAX_ATTEMPTS,
      retryDelayMs: env.VERIFY_RETRY_DELAY_MS as RetryDelayMs,
    },
    logLevel: env.ROTATION_LOG_LEVEL,
  };
}

export function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
