import type { SecretId, VersionId } from '../domain/ids.js';
import type { StageLabel } from '../domain/stages.js';
import { assertNever } from '../../runtime/assert-never.js';

export type UpstreamService = 'secret_store' | 'identity_provider' | 'identity_check';

/**
 * Every failure names the secret and the request token so operators can line it up
 * with the orchestrator's view of the rotation.
 */
type RotationErrorContext = {
  readonly secretId: SecretId;
  readonly token: VersionId;
  readonly message: string;
};

export type RotationError =
  | (RotationErrorContext & { readonly code: 'NOT_CONFIGURED' })
  | (RotationErrorContext & { readonly code: 'UNKNOWN_VERSION' })
  | (RotationErrorContext & { readonly code: 'INVALID_STAGE'; readonly stages: readonly string[] })
  | (RotationErrorContext & { readonly code: 'UNKNOWN_PHASE'; readonly phase: string })
  | (RotationErrorContext & {
      readonly code: 'SCHEMA_VIOLATION';
      readonly stage: StageLabel;
      readonly issues: readonly string[];
    })
  | (RotationErrorContext & {
      readonly code: 'VERIFICATION_FAILED';
      readonly expectedIdentity: string;
      readonly resolvedIdentity: string;
    })
  | (RotationErrorContext & {
      readonly code: 'VERIFICATION_EXHAUSTED';
      readonly attempts: number;
      readonly lastFailure: string;
    })
  | (RotationErrorContext & {
      readonly code: 'UPSTREAM_FAILED';
      readonly service: UpstreamService;
      readonly upstreamMessage: string;
    });

export type RotationErrorCode = RotationError['code'];

export interface RotationTarget {
  readonly secretId: SecretId;
  readonly token: VersionId;
}

export const RotationErr = {
  notConfigured: (t: RotationTarget): RotationError => ({
    code: 'NOT_CONFIGURED',
    ...t,
    message: `Secret ${t.secretId} is not enabled for rotation`,
  }),

  unknownVersion: (t: RotationTarget, detail?: string): RotationError => ({
    code: 'UNKNOWN_VERSION',
    ...t,
    message: detail ?? `Secret version ${t.token} has no stage for rotation of secret ${t.secretId}`,
  }),

  invalidStage: (t: RotationTarget, stages: readonly string[], detail?: string): RotationError => ({
    code: 'INVALID_STAGE',
    ...t,
    stages,
    message: detail ?? `Secret version ${t.token} not set as AWSPENDING for rotation of secret ${t.secretId}`,
  }),

  unknownPhase: (t: RotationTarget, phase: string): RotationError => ({
    code: 'UNKNOWN_PHASE',
    ...t,
    phase,
    message: `Invalid step parameter: ${JSON.stringify(phase)}`,
  }),

  schemaViolation: (t: RotationTarget, stage: StageLabel, issues: readonly string[]): RotationError => ({
    code: 'SCHEMA_VIOLATION',
    ...t,
    stage,
    issues,
    message: `${stage} value of secret ${t.secretId} violates the payload schema: ${issues.join('; ')}`,
  }),

  verificationFailed: (t: RotationTarget, expectedIdentity: string, resolvedIdentity: string): RotationError => ({
    code: 'VERIFICATION_FAILED',
    ...t,
    expectedIdentity,
    resolvedIdentity,
    message: `Authenticated as ${resolvedIdentity} (expected ${expectedIdentity}) for AWSPENDING stage of version ${t.token} for secret ${t.secretId}`,
  }),

  verificationExhausted: (t: RotationTarget, attempts: number, lastFailure: string): RotationError => ({
    code: 'VERIFICATION_EXHAUSTED',
    ...t,
    attempts,
    lastFailure,
    message: `Unable to authenticate using the generated access key after ${attempts} attempts`,
  }),

  upstream: (t: RotationTarget, service: UpstreamService, upstreamMessage: string): RotationError => ({
    code: 'UPSTREAM_FAILED',
    ...t,
    service,
    upstreamMessage,
    message: `${service} call failed: ${upstreamMessage}`,
  }),
} as const;

export function formatRotationError(error: RotationError): string {
  const where = `secret=${error.secretId} token=${error.token}`;
  switch (error.code) {
    case 'NOT_CONFIGURED':
    case 'UNKNOWN_VERSION':
    case 'UNKNOWN_PHASE':
    case 'VERIFICATION_FAILED':
    case 'SCHEMA_VIOLATION':
    case 'UPSTREAM_FAILED':
      return `[${error.code}] ${error.message} (${where})`;
    case 'INVALID_STAGE':
      return `[${error.code}] ${error.message} (${where}; stages=${error.stages.join(',') || 'none'})`;
    case 'VERIFICATION_EXHAUSTED':
      return `[${error.code}] ${error.message}; last failure: ${error.lastFailure} (${where})`;
    default:
      return assertNever(error);
  }
}
