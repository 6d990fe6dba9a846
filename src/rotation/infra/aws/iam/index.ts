import {
  CreateAccessKeyCommand,
  DeleteAccessKeyCommand,
  IAMClient,
  ListAccessKeysCommand,
} from '@aws-sdk/client-iam';
import type {
  CreateAccessKeyCommandInput,
  CreateAccessKeyCommandOutput,
  DeleteAccessKeyCommandInput,
  DeleteAccessKeyCommandOutput,
  ListAccessKeysCommandInput,
  ListAccessKeysCommandOutput,
} from '@aws-sdk/client-iam';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, errAsync, okAsync } from 'neverthrow';
import type { AccessKeyId } from '../../../domain/ids.js';
import { asAccessKeyId } from '../../../domain/ids.js';
import type {
  AccessKeySummary,
  IdentityProviderError,
  IdentityProviderPort,
  IssuedAccessKey,
} from '../../../ports/identity-provider.port.js';
import { describeAwsError } from '../service-error.js';

export interface IamApi {
  listAccessKeys(input: ListAccessKeysCommandInput): Promise<ListAccessKeysCommandOutput>;
  deleteAccessKey(input: DeleteAccessKeyCommandInput): Promise<DeleteAccessKeyCommandOutput>;
  createAccessKey(input: CreateAccessKeyCommandInput): Promise<CreateAccessKeyCommandOutput>;
}

export function createIamClient(options: { readonly region: string | null }): IAMClient {
  return new IAMClient(options.region !== null ? { region: options.region } : {});
}

export function iamApi(client: IAMClient): IamApi {
  return {
    listAccessKeys: (input) => client.send(new ListAccessKeysCommand(input)),
    deleteAccessKey: (input) => client.send(new DeleteAccessKeyCommand(input)),
    createAccessKey: (input) => client.send(new CreateAccessKeyCommand(input)),
  };
}

/** Upper bound on ListAccessKeys pages; IAM allows two keys per user, so one page is the norm. */
const MAX_LIST_PAGES = 20;

function requestFailed(operation: string, userName: string, e: unknown): IdentityProviderError {
  return { code: 'IDENTITY_PROVIDER_REQUEST_FAILED', message: `IAM ${operation} for ${userName} failed: ${describeAwsError(e)}` };
}

export class IamIdentityProvider implements IdentityProviderPort {
  constructor(private readonly api: IamApi) {}

  listAccessKeys(userName: string): ResultAsync<readonly AccessKeySummary[], IdentityProviderError> {
    return RA.fromPromise(this.collectPages(userName), (e) => requestFailed('ListAccessKeys', userName, e));
  }

  deleteAccessKey(userName: string, accessKeyId: AccessKeyId): ResultAsync<void, IdentityProviderError> {
    return RA.fromPromise(this.api.deleteAccessKey({ UserName: userName, AccessKeyId: accessKeyId }), (e) =>
      requestFailed('DeleteAccessKey', userName, e)
    ).map(() => undefined);
  }

  createAccessKey(userName: string): ResultAsync<IssuedAccessKey, IdentityProviderError> {
    return RA.fromPromise(this.api.createAccessKey({ UserName: userName }), (e) =>
      requestFailed('CreateAccessKey', userName, e)
    ).andThen((out) => {
      const key = out.AccessKey;
      if (key?.AccessKeyId === undefined || key.SecretAccessKey === undefined) {
        return errAsync<IssuedAccessKey, IdentityProviderError>({
          code: 'IDENTITY_PROVIDER_REQUEST_FAILED',
          message: `IAM CreateAccessKey for ${userName} returned no key material`,
        });
      }
      return okAsync({ accessKeyId: asAccessKeyId(key.AccessKeyId), secretAccessKey: key.SecretAccessKey });
    });
  }

  private async collectPages(userName: string): Promise<readonly AccessKeySummary[]> {
    const keys: AccessKeySummary[] = [];
    let marker: string | undefined;

    for (let page = 0; page < MAX_LIST_PAGES; page++) {
      const out = await this.api.listAccessKeys({ UserName: userName, ...(marker !== undefined ? { Marker: marker } : {}) });
      for (const meta of out.AccessKeyMetadata ?? []) {
        if (meta.AccessKeyId !== undefined) {
          keys.push({ accessKeyId: asAccessKeyId(meta.AccessKeyId) });
        }
      }
      if (out.IsTruncated !== true || out.Marker === undefined) return keys;
      marker = out.Marker;
    }

    throw new Error(`ListAccessKeys did not finish within ${MAX_LIST_PAGES} pages`);
  }
}
