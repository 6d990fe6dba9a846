import type { ResultAsync } from 'neverthrow';
import type { SecretId, VersionId } from '../domain/ids.js';
import type { StageLabel, VersionStageMap } from '../domain/stages.js';

export interface SecretDescription {
  readonly secretId: SecretId;
  readonly rotationEnabled: boolean;
  readonly versionStages: VersionStageMap;
}

export interface StoredSecretValue {
  readonly versionId: VersionId;
  readonly secretString: string;
}

export type SecretStoreError =
  | { readonly code: 'SECRET_STORE_NOT_FOUND'; readonly message: string }
  | { readonly code: 'SECRET_STORE_REQUEST_FAILED'; readonly message: string };

/**
 * Port: versioned secret store (Secrets Manager).
 *
 * Purpose:
 * - Expose version → stage bookkeeping owned by the store
 * - Read/write raw secret strings for a version/stage pair
 *
 * Guarantees expected from implementations:
 * - getSecretValue() with both versionId and stage fails with SECRET_STORE_NOT_FOUND
 *   unless that exact version carries that stage
 * - updateVersionStage() moves the label atomically (the store owns mutual exclusion)
 * - Nothing is cached; every call observes current store state
 */
export interface SecretStorePort {
  describeSecret(secretId: SecretId): ResultAsync<SecretDescription, SecretStoreError>;

  getSecretValue(
    secretId: SecretId,
    selector: { readonly stage: StageLabel; readonly versionId?: VersionId }
  ): ResultAsync<StoredSecretValue, SecretStoreError>;

  putSecretValue(
    secretId: SecretId,
    value: { readonly versionId: VersionId; readonly secretString: string; readonly stages: readonly StageLabel[] }
  ): ResultAsync<void, SecretStoreError>;

  /**
   * Move `stage` onto `moveToVersionId`, removing it from `removeFromVersionId`
   * (null when no version holds the stage yet).
   */
  updateVersionStage(
    secretId: SecretId,
    move: { readonly stage: StageLabel; readonly moveToVersionId: VersionId; readonly removeFromVersionId: VersionId | null }
  ): ResultAsync<void, SecretStoreError>;
}
