import type { ResultAsync } from 'neverthrow';
import type { AccessKeyId } from '../domain/ids.js';

export interface AccessKeySummary {
  readonly accessKeyId: AccessKeyId;
}

export interface IssuedAccessKey {
  readonly accessKeyId: AccessKeyId;
  readonly secretAccessKey: string;
}

export type IdentityProviderError = { readonly code: 'IDENTITY_PROVIDER_REQUEST_FAILED'; readonly message: string };

/**
 * Port: access key lifecycle for one IAM user.
 *
 * The provider mints key material; this system never chooses it.
 */
export interface IdentityProviderPort {
  listAccessKeys(userName: string): ResultAsync<readonly AccessKeySummary[], IdentityProviderError>;
  deleteAccessKey(userName: string, accessKeyId: AccessKeyId): ResultAsync<void, IdentityProviderError>;
  createAccessKey(userName: string): ResultAsync<IssuedAccessKey, IdentityProviderError>;
}
