import { ResultAsync as RA, err, errAsync, ok } from 'neverthrow';
import type { Result, ResultAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { CandidateCredentials, IdentityCheckPort } from '../ports/identity-check.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';

export interface VerificationPolicy {
  /** Total identity-check calls, the first one included. */
  readonly maxAttempts: number;
  readonly retryDelayMs: number;
}

export const DEFAULT_VERIFICATION_POLICY: VerificationPolicy = { maxAttempts: 5, retryDelayMs: 5_000 };

export interface VerifiedIdentity {
  /** Trailing segment of the principal ARN (the IAM user name). */
  readonly identity: string;
  readonly principalArn: string;
  readonly attempts: number;
}

export type VerificationError =
  | { readonly code: 'VERIFICATION_MALFORMED_INPUT'; readonly message: string }
  | { readonly code: 'VERIFICATION_UNEXPECTED_PRINCIPAL'; readonly message: string; readonly principalArn: string }
  | { readonly code: 'VERIFICATION_REQUEST_FAILED'; readonly message: string }
  | {
      readonly code: 'VERIFICATION_EXHAUSTED';
      readonly message: string;
      readonly attempts: number;
      readonly lastFailure: string;
    };

/**
 * `arn:aws:iam::123456789012:user/ses/relay-user` → `relay-user`.
 * Null when the ARN carries no path segment to take.
 */
export function identityFromPrincipalArn(principalArn: string): string | null {
  const slash = principalArn.lastIndexOf('/');
  if (slash < 0 || slash === principalArn.length - 1) return null;
  return principalArn.slice(slash + 1);
}

/**
 * Authenticates with a freshly minted key until the identity provider accepts it.
 *
 * New IAM keys take a few seconds to propagate, so rejected credentials are retried on a
 * fixed delay up to `maxAttempts` calls in total. Anything else (no service answer, an
 * unparseable principal) ends verification immediately. Whether the resolved identity is
 * the right one is the caller's decision.
 */
export class LiveVerifier {
  constructor(
    private readonly identityCheck: IdentityCheckPort,
    private readonly clock: TimeClockPort,
    private readonly logger: Logger,
    private readonly policy: VerificationPolicy = DEFAULT_VERIFICATION_POLICY
  ) {}

  verify(candidate: CandidateCredentials): ResultAsync<VerifiedIdentity, VerificationError> {
    if (candidate.accessKeyId.trim() === '' || candidate.secretAccessKey.trim() === '') {
      return errAsync({
        code: 'VERIFICATION_MALFORMED_INPUT',
        message: 'Candidate access key id and secret must be non-empty',
      } satisfies VerificationError);
    }

    return RA.fromSafePromise(this.attemptUntilAccepted(candidate)).andThen((result) => result);
  }

  private async attemptUntilAccepted(candidate: CandidateCredentials): Promise<Result<VerifiedIdentity, VerificationError>> {
    const startedAt = this.clock.nowMs();
    let lastFailure = 'no attempt made';

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      const outcome = await this.identityCheck.getCallerIdentity(candidate);

      if (outcome.isOk()) {
        const identity = identityFromPrincipalArn(outcome.value.principalArn);
        if (identity === null) {
          return err({
            code: 'VERIFICATION_UNEXPECTED_PRINCIPAL',
            message: `Cannot extract an identity from principal ${outcome.value.principalArn}`,
            principalArn: outcome.value.principalArn,
          });
        }
        this.logger.debug(
          { accessKeyId: candidate.accessKeyId, attempt, elapsedMs: this.clock.nowMs() - startedAt },
          'Authenticated with candidate access key'
        );
        return ok({ identity, principalArn: outcome.value.principalArn, attempts: attempt });
      }

      if (outcome.error.code === 'IDENTITY_CHECK_REQUEST_FAILED') {
        return err({ code: 'VERIFICATION_REQUEST_FAILED', message: outcome.error.message });
      }

      lastFailure = outcome.error.message;
      const remaining = this.policy.maxAttempts - attempt;
      this.logger.warn(
        { accessKeyId: candidate.accessKeyId, attempt, remaining, reason: lastFailure },
        `Failed to authenticate with access key; ${remaining} attempts remaining`
      );

      if (remaining > 0) {
        await this.clock.sleepMs(this.policy.retryDelayMs);
      }
    }

    return err({
      code: 'VERIFICATION_EXHAUSTED',
      message: `Unable to authenticate using the generated access key after ${this.policy.maxAttempts} attempts`,
      attempts: this.policy.maxAttempts,
      lastFailure,
    });
  }
}
