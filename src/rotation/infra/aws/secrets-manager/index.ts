import {
  DescribeSecretCommand,
  GetSecretValueCommand,
  PutSecretValueCommand,
  ResourceNotFoundException,
  SecretsManagerClient,
  UpdateSecretVersionStageCommand,
} from '@aws-sdk/client-secrets-manager';
import type {
  DescribeSecretCommandInput,
  DescribeSecretCommandOutput,
  GetSecretValueCommandInput,
  GetSecretValueCommandOutput,
  PutSecretValueCommandInput,
  PutSecretValueCommandOutput,
  UpdateSecretVersionStageCommandInput,
  UpdateSecretVersionStageCommandOutput,
} from '@aws-sdk/client-secrets-manager';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, errAsync, okAsync } from 'neverthrow';
import type { SecretId, VersionId } from '../../../domain/ids.js';
import { asVersionId } from '../../../domain/ids.js';
import type { StageLabel } from '../../../domain/stages.js';
import { versionStageMapFrom } from '../../../domain/stages.js';
import type {
  SecretDescription,
  SecretStoreError,
  SecretStorePort,
  StoredSecretValue,
} from '../../../ports/secret-store.port.js';
import { awsErrorName, describeAwsError } from '../service-error.js';

/**
 * The four Secrets Manager operations the rotation uses.
 * Tests substitute a stub; production wraps an SDK client with `secretsManagerApi`.
 */
export interface SecretsManagerApi {
  describeSecret(input: DescribeSecretCommandInput): Promise<DescribeSecretCommandOutput>;
  getSecretValue(input: GetSecretValueCommandInput): Promise<GetSecretValueCommandOutput>;
  putSecretValue(input: PutSecretValueCommandInput): Promise<PutSecretValueCommandOutput>;
  updateSecretVersionStage(input: UpdateSecretVersionStageCommandInput): Promise<UpdateSecretVersionStageCommandOutput>;
}

export interface SecretsManagerClientOptions {
  readonly region: string | null;
  /** Custom endpoint (VPC endpoint, LocalStack); SDK default when null. */
  readonly endpoint: string | null;
}

export function createSecretsManagerClient(options: SecretsManagerClientOptions): SecretsManagerClient {
  return new SecretsManagerClient({
    ...(options.region !== null ? { region: options.region } : {}),
    ...(options.endpoint !== null ? { endpoint: options.endpoint } : {}),
  });
}

export function secretsManagerApi(client: SecretsManagerClient): SecretsManagerApi {
  return {
    describeSecret: (input) => client.send(new DescribeSecretCommand(input)),
    getSecretValue: (input) => client.send(new GetSecretValueCommand(input)),
    putSecretValue: (input) => client.send(new PutSecretValueCommand(input)),
    updateSecretVersionStage: (input) => client.send(new UpdateSecretVersionStageCommand(input)),
  };
}

function mapSecretsManagerError(e: unknown, secretId: SecretId): SecretStoreError {
  if (e instanceof ResourceNotFoundException || awsErrorName(e) === 'ResourceNotFoundException') {
    return { code: 'SECRET_STORE_NOT_FOUND', message: `Not found: ${secretId}: ${describeAwsError(e)}` };
  }
  return { code: 'SECRET_STORE_REQUEST_FAILED', message: `Secrets Manager error for ${secretId}: ${describeAwsError(e)}` };
}

export class SecretsManagerSecretStore implements SecretStorePort {
  constructor(private readonly api: SecretsManagerApi) {}

  describeSecret(secretId: SecretId): ResultAsync<SecretDescription, SecretStoreError> {
    return RA.fromPromise(this.api.describeSecret({ SecretId: secretId }), (e) => mapSecretsManagerError(e, secretId)).map(
      (out): SecretDescription => ({
        secretId,
        rotationEnabled: out.RotationEnabled === true,
        versionStages: versionStageMapFrom(out.VersionIdsToStages ?? {}),
      })
    );
  }

  getSecretValue(
    secretId: SecretId,
    selector: { readonly stage: StageLabel; readonly versionId?: VersionId }
  ): ResultAsync<StoredSecretValue, SecretStoreError> {
    return RA.fromPromise(
      this.api.getSecretValue({ SecretId: secretId, VersionStage: selector.stage, VersionId: selector.versionId }),
      (e) => mapSecretsManagerError(e, secretId)
    ).andThen((out) => {
      if (out.VersionId === undefined) {
        return errAsync<StoredSecretValue, SecretStoreError>({
          code: 'SECRET_STORE_REQUEST_FAILED',
          message: `Secrets Manager returned no version id for ${secretId} (${selector.stage})`,
        });
      }
      // Binary secrets have no SecretString; an empty string fails payload parsing downstream.
      return okAsync({ versionId: asVersionId(out.VersionId), secretString: out.SecretString ?? '' });
    });
  }

  putSecretValue(
    secretId: SecretId,
    value: { readonly versionId: VersionId; readonly secretString: string; readonly stages: readonly StageLabel[] }
  ): ResultAsync<void, SecretStoreError> {
    return RA.fromPromise(
      this.api.putSecretValue({
        SecretId: secretId,
        ClientRequestToken: value.versionId,
        SecretString: value.secretString,
        VersionStages: [...value.stages],
      }),
      (e) => mapSecretsManagerError(e, secretId)
    ).map(() => undefined);
  }

  updateVersionStage(
    secretId: SecretId,
    move: { readonly stage: StageLabel; readonly moveToVersionId: VersionId; readonly removeFromVersionId: VersionId | null }
  ): ResultAsync<void, SecretStoreError> {
    return RA.fromPromise(
      this.api.updateSecretVersionStage({
        SecretId: secretId,
        VersionStage: move.stage,
        MoveToVersionId: move.moveToVersionId,
        ...(move.removeFromVersionId !== null ? { RemoveFromVersionId: move.removeFromVersionId } : {}),
      }),
      (e) => mapSecretsManagerError(e, secretId)
    ).map(() => undefined);
  }
}
