import type { ResultAsync } from 'neverthrow';
import { errAsync, okAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import { assertNever } from '../../runtime/assert-never.js';
import type { AccessKeyId, VersionId } from '../domain/ids.js';
import { asSecretId, asVersionId } from '../domain/ids.js';
import type { RotationStep } from '../domain/rotation-step.js';
import { parseRotationStep } from '../domain/rotation-step.js';
import type { StageLabel } from '../domain/stages.js';
import { STAGE, hasStage, versionsWithStage } from '../domain/stages.js';
import type { SecretPayload } from '../domain/secret-payload.js';
import type { DerivationCodec } from '../domain/transport-password.js';
import { deriveTransportPassword } from '../domain/transport-password.js';
import type { IdentityProviderPort } from '../ports/identity-provider.port.js';
import type { SecretDescription, SecretStorePort } from '../ports/secret-store.port.js';
import type { LiveVerifier, VerificationError } from './live-verification.js';
import type { RotationError, RotationTarget } from './rotation-error.js';
import { RotationErr } from './rotation-error.js';
import type { SecretRecordError } from './secret-record-access.js';
import { SecretRecordAccess } from './secret-record-access.js';

/**
 * Raw invocation as the orchestrator sends it; validated by `advance`.
 */
export interface RotationRequest {
  readonly secretId: string;
  readonly token: string;
  readonly phase: string;
}

export type RotationOutcome =
  /** `phase` is echoed as received; it is not parsed for a version already current. */
  | { readonly kind: 'already_current'; readonly phase: string }
  | { readonly kind: 'pending_exists' }
  | {
      readonly kind: 'pending_created';
      readonly accessKeyId: AccessKeyId;
      readonly deletedAccessKeyIds: readonly AccessKeyId[];
    }
  | { readonly kind: 'set_skipped' }
  | { readonly kind: 'verified'; readonly identity: string; readonly attempts: number }
  | { readonly kind: 'promoted'; readonly previousVersionId: VersionId | null };

/**
 * Everything one rotation needs, handed over at construction.
 */
export interface RotationContext {
  readonly secretStore: SecretStorePort;
  readonly identityProvider: IdentityProviderPort;
  readonly verifier: LiveVerifier;
  readonly codec: DerivationCodec;
  /** IAM user that owns the key, and the identity a new key must authenticate as. */
  readonly userName: string;
  readonly logger: Logger;
}

/**
 * Four-phase access key rotation driver.
 *
 * Every phase is safe to re-run with the same token: the orchestrator re-invokes after
 * crashes and timeouts. Each invocation reads store state fresh; nothing is cached
 * between phases or invocations.
 */
export class RotationStateMachine {
  private readonly records: SecretRecordAccess;

  constructor(private readonly ctx: RotationContext) {
    this.records = new SecretRecordAccess(ctx.secretStore);
  }

  /**
   * Stage preconditions run before the phase is parsed: a version already in AWSCURRENT
   * is a no-op whatever the phase says.
   */
  advance(request: RotationRequest): ResultAsync<RotationOutcome, RotationError> {
    const target: RotationTarget = { secretId: asSecretId(request.secretId), token: asVersionId(request.token) };
    const log = this.ctx.logger.child({ secretId: target.secretId, requestToken: target.token });
    const phase = request.phase;

    return this.checkStaging(target, log)
      .andThen((staging) => {
        if (staging === 'already_current') {
          log.info({ phase }, `Secret version ${target.token} already set as AWSCURRENT`);
          return okAsync<RotationOutcome, RotationError>({ kind: 'already_current', phase });
        }

        const step = parseRotationStep(phase);
        if (step.isErr()) {
          return errAsync<RotationOutcome, RotationError>(RotationErr.unknownPhase(target, phase));
        }
        return this.runStep(step.value, target, log.child({ step: step.value }));
      })
      .map((outcome) => {
        log.info({ phase, outcome: outcome.kind }, `${phase} completed`);
        return outcome;
      })
      .mapErr((error) => {
        log.error({ phase, code: error.code }, error.message);
        return error;
      });
  }

  private runStep(step: RotationStep, target: RotationTarget, log: Logger): ResultAsync<RotationOutcome, RotationError> {
    switch (step) {
      case 'createSecret':
        return this.createSecret(target, log);
      case 'setSecret':
        return this.setSecret(log);
      case 'testSecret':
        return this.testSecret(target, log);
      case 'finishSecret':
        return this.finishSecret(target, log);
      default:
        return assertNever(step);
    }
  }

  // ---------------------------------------------------------------------------
  // Preconditions
  // ---------------------------------------------------------------------------

  private checkStaging(target: RotationTarget, log: Logger): ResultAsync<'already_current' | 'pending', RotationError> {
    return this.describe(target).andThen((description) => {
      if (!description.rotationEnabled) {
        return errAsync(RotationErr.notConfigured(target));
      }

      const stages = description.versionStages.get(target.token);
      if (stages === undefined) {
        return errAsync(RotationErr.unknownVersion(target));
      }
      if (stages.has(STAGE.current)) {
        return okAsync('already_current' as const);
      }
      if (!stages.has(STAGE.pending)) {
        return errAsync(RotationErr.invalidStage(target, [...stages]));
      }

      log.debug({ stages: [...stages] }, 'Version staged for rotation');
      return okAsync('pending' as const);
    });
  }

  // ---------------------------------------------------------------------------
  // Phases
  // ---------------------------------------------------------------------------

  /**
   * Mint a new access key and store it, with its SMTP password, as AWSPENDING.
   * Keys other than the one in AWSCURRENT are deleted first so the user never holds
   * more than the current key plus the new one.
   */
  private createSecret(target: RotationTarget, log: Logger): ResultAsync<RotationOutcome, RotationError> {
    return this.records
      .exists(target.secretId, { stage: STAGE.pending, versionId: target.token })
      .mapErr((e) => recordError(target, e))
      .andThen((exists) => {
        if (exists) {
          log.info('createSecret: AWSPENDING value already exists for this version');
          return okAsync<RotationOutcome, RotationError>({ kind: 'pending_exists' });
        }
        return this.mintPending(target, log);
      });
  }

  private mintPending(target: RotationTarget, log: Logger): ResultAsync<RotationOutcome, RotationError> {
    const { identityProvider, userName, codec } = this.ctx;

    return this.records
      .read(target.secretId, { stage: STAGE.current })
      .mapErr((e) => currentRecordError(target, e))
      .andThen((current) =>
        this.deleteStaleKeys(target, current.payload.username, log).andThen((deleted) =>
          identityProvider
            .createAccessKey(userName)
            .mapErr((e) => RotationErr.upstream(target, 'identity_provider', e.message))
            .andThen((key) => {
              log.info({ accessKeyId: key.accessKeyId, userName }, 'createSecret: created access key');

              const pending: SecretPayload = {
                ...current.payload,
                username: key.accessKeyId,
                secretMaterial: key.secretAccessKey,
                derivedPassword: deriveTransportPassword(key.secretAccessKey, current.payload.region, codec),
              };

              return this.records
                .writePending(target.secretId, target.token, pending)
                .mapErr((e) => recordError(target, e, STAGE.pending))
                .map((): RotationOutcome => {
                  log.info('createSecret: put AWSPENDING value');
                  return { kind: 'pending_created', accessKeyId: key.accessKeyId, deletedAccessKeyIds: deleted };
                });
            })
        )
      );
  }

  private deleteStaleKeys(
    target: RotationTarget,
    keep: AccessKeyId,
    log: Logger
  ): ResultAsync<readonly AccessKeyId[], RotationError> {
    const { identityProvider, userName } = this.ctx;

    return identityProvider
      .listAccessKeys(userName)
      .mapErr((e) => RotationErr.upstream(target, 'identity_provider', e.message))
      .andThen((keys) =>
        keys
          .filter((key) => key.accessKeyId !== keep)
          .reduce<ResultAsync<readonly AccessKeyId[], RotationError>>(
            (acc, key) =>
              acc.andThen((deleted) =>
                identityProvider
                  .deleteAccessKey(userName, key.accessKeyId)
                  .mapErr((e) => RotationErr.upstream(target, 'identity_provider', e.message))
                  .map(() => {
                    log.info({ accessKeyId: key.accessKeyId, userName }, 'createSecret: deleted previous access key');
                    return [...deleted, key.accessKeyId];
                  })
              ),
            okAsync([])
          )
      );
  }

  /**
   * IAM issues the key material itself, so there is nothing to push anywhere.
   */
  private setSecret(log: Logger): ResultAsync<RotationOutcome, RotationError> {
    log.debug('setSecret: nothing to set for provider-issued access keys');
    return okAsync({ kind: 'set_skipped' });
  }

  private testSecret(target: RotationTarget, log: Logger): ResultAsync<RotationOutcome, RotationError> {
    const expected = this.ctx.userName;

    return this.records
      .read(target.secretId, { stage: STAGE.pending, versionId: target.token })
      .mapErr((e) => recordError(target, e))
      .andThen((pending) =>
        this.ctx.verifier
          .verify({ accessKeyId: pending.payload.username, secretAccessKey: pending.payload.secretMaterial })
          .mapErr((e) => verificationError(target, expected, e))
      )
      .andThen((verified) => {
        if (verified.identity !== expected) {
          return errAsync(RotationErr.verificationFailed(target, expected, verified.identity));
        }
        log.info({ identity: verified.identity, attempts: verified.attempts }, 'testSecret: authenticated as expected user');
        return okAsync<RotationOutcome, RotationError>({
          kind: 'verified',
          identity: verified.identity,
          attempts: verified.attempts,
        });
      });
  }

  /**
   * The only place AWSCURRENT moves. Re-describes the secret: time has passed since the
   * precondition check and another rotation attempt may have finished in between.
   */
  private finishSecret(target: RotationTarget, log: Logger): ResultAsync<RotationOutcome, RotationError> {
    return this.describe(target).andThen((description) => {
      if (hasStage(description.versionStages, target.token, STAGE.current)) {
        log.info('finishSecret: version already marked as AWSCURRENT');
        return okAsync<RotationOutcome, RotationError>({ kind: 'already_current', phase: 'finishSecret' });
      }

      const currents = versionsWithStage(description.versionStages, STAGE.current);
      if (currents.length > 1) {
        return errAsync(
          RotationErr.invalidStage(
            target,
            [STAGE.current],
            `Secret ${target.secretId} has ${currents.length} versions staged AWSCURRENT: ${currents.join(', ')}`
          )
        );
      }
      const previous = currents[0] ?? null;

      return this.ctx.secretStore
        .updateVersionStage(target.secretId, {
          stage: STAGE.current,
          moveToVersionId: target.token,
          removeFromVersionId: previous,
        })
        .mapErr((e) => RotationErr.upstream(target, 'secret_store', e.message))
        .map((): RotationOutcome => {
          log.info({ previousVersionId: previous }, `finishSecret: set AWSCURRENT stage to version ${target.token}`);
          return { kind: 'promoted', previousVersionId: previous };
        });
    });
  }

  private describe(target: RotationTarget): ResultAsync<SecretDescription, RotationError> {
    return this.ctx.secretStore
      .describeSecret(target.secretId)
      .mapErr((e) =>
        e.code === 'SECRET_STORE_NOT_FOUND'
          ? RotationErr.upstream(target, 'secret_store', `Secret ${target.secretId} not found`)
          : RotationErr.upstream(target, 'secret_store', e.message)
      );
  }
}

function recordError(target: RotationTarget, e: SecretRecordError, stageHint?: StageLabel): RotationError {
  switch (e.code) {
    case 'RECORD_SCHEMA_VIOLATION':
      return RotationErr.schemaViolation(target, e.stage, e.issues);
    case 'RECORD_NOT_FOUND':
    case 'RECORD_VERSION_MISMATCH':
      return RotationErr.unknownVersion(target, e.message);
    case 'RECORD_STORE_FAILED':
      return RotationErr.upstream(
        target,
        'secret_store',
        stageHint === undefined ? e.message : `${stageHint} write: ${e.message}`
      );
    default:
      return assertNever(e);
  }
}

/** The secret always has an AWSCURRENT value; its absence is a store fault, not a bad token. */
function currentRecordError(target: RotationTarget, e: SecretRecordError): RotationError {
  if (e.code === 'RECORD_NOT_FOUND') {
    return RotationErr.upstream(target, 'secret_store', e.message);
  }
  return recordError(target, e);
}

function verificationError(target: RotationTarget, expected: string, e: VerificationError): RotationError {
  switch (e.code) {
    case 'VERIFICATION_MALFORMED_INPUT':
      return RotationErr.schemaViolation(target, STAGE.pending, [e.message]);
    case 'VERIFICATION_UNEXPECTED_PRINCIPAL':
      return RotationErr.verificationFailed(target, expected, e.principalArn);
    case 'VERIFICATION_REQUEST_FAILED':
      return RotationErr.upstream(target, 'identity_check', e.message);
    case 'VERIFICATION_EXHAUSTED':
      return RotationErr.verificationExhausted(target, e.attempts, e.lastFailure);
    default:
      return assertNever(e);
  }
}
