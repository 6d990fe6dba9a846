import type { ResultAsync } from 'neverthrow';
import { errAsync, okAsync } from 'neverthrow';
import type { SecretId, VersionId } from '../domain/ids.js';
import type { StageLabel } from '../domain/stages.js';
import { STAGE } from '../domain/stages.js';
import type { SecretPayload } from '../domain/secret-payload.js';
import { parseSecretPayload, serializeSecretPayload } from '../domain/secret-payload.js';
import type { SecretStorePort } from '../ports/secret-store.port.js';

export type SecretRecordError =
  | {
      readonly code: 'RECORD_SCHEMA_VIOLATION';
      readonly message: string;
      readonly stage: StageLabel;
      readonly issues: readonly string[];
    }
  | { readonly code: 'RECORD_NOT_FOUND'; readonly message: string; readonly stage: StageLabel }
  | {
      readonly code: 'RECORD_VERSION_MISMATCH';
      readonly message: string;
      readonly stage: StageLabel;
      readonly expected: VersionId;
      readonly actual: VersionId;
    }
  | { readonly code: 'RECORD_STORE_FAILED'; readonly message: string };

export interface SecretRecordSelector {
  readonly stage: StageLabel;
  /** When given, the value must belong to exactly this version. */
  readonly versionId?: VersionId;
}

export interface VersionedSecretPayload {
  readonly versionId: VersionId;
  readonly payload: SecretPayload;
}

/**
 * Typed access to the secret JSON for a version/stage pair.
 *
 * Every read is validated against the payload schema before a caller sees it, and the
 * only write is a brand-new AWSPENDING version.
 */
export class SecretRecordAccess {
  constructor(private readonly store: SecretStorePort) {}

  read(secretId: SecretId, selector: SecretRecordSelector): ResultAsync<VersionedSecretPayload, SecretRecordError> {
    return this.store
      .getSecretValue(secretId, selector)
      .mapErr((e): SecretRecordError =>
        e.code === 'SECRET_STORE_NOT_FOUND'
          ? { code: 'RECORD_NOT_FOUND', message: describeMissing(secretId, selector), stage: selector.stage }
          : { code: 'RECORD_STORE_FAILED', message: e.message }
      )
      .andThen((stored) => {
        if (selector.versionId !== undefined && stored.versionId !== selector.versionId) {
          return errAsync<VersionedSecretPayload, SecretRecordError>({
            code: 'RECORD_VERSION_MISMATCH',
            message: `Expected ${selector.stage} version ${selector.versionId} of secret ${secretId}, store returned ${stored.versionId}`,
            stage: selector.stage,
            expected: selector.versionId,
            actual: stored.versionId,
          });
        }

        const parsed = parseSecretPayload(stored.secretString);
        if (parsed.isErr()) {
          return errAsync<VersionedSecretPayload, SecretRecordError>({
            code: 'RECORD_SCHEMA_VIOLATION',
            message: parsed.error.message,
            stage: selector.stage,
            issues: parsed.error.issues,
          });
        }

        return okAsync({ versionId: stored.versionId, payload: parsed.value });
      });
  }

  /**
   * True when a value exists for the selector. Content is not validated:
   * an existing AWSPENDING value means a previous createSecret already ran for this token.
   */
  exists(secretId: SecretId, selector: SecretRecordSelector): ResultAsync<boolean, SecretRecordError> {
    return this.store
      .getSecretValue(secretId, selector)
      .map(() => true)
      .orElse((e) =>
        e.code === 'SECRET_STORE_NOT_FOUND'
          ? okAsync(false)
          : errAsync<boolean, SecretRecordError>({ code: 'RECORD_STORE_FAILED', message: e.message })
      );
  }

  writePending(secretId: SecretId, versionId: VersionId, payload: SecretPayload): ResultAsync<void, SecretRecordError> {
    return this.store
      .putSecretValue(secretId, {
        versionId,
        secretString: serializeSecretPayload(payload),
        stages: [STAGE.pending],
      })
      .mapErr((e): SecretRecordError => ({ code: 'RECORD_STORE_FAILED', message: e.message }));
  }
}

function describeMissing(secretId: SecretId, selector: SecretRecordSelector): string {
  return selector.versionId === undefined
    ? `No ${selector.stage} value for secret ${secretId}`
    : `No ${selector.stage} value for version ${selector.versionId} of secret ${secretId}`;
}
