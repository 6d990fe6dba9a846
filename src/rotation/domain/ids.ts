import type { Brand } from '../../runtime/brand.js';

export type SecretId = Brand<string, 'rotation.SecretId'>; // ARN or friendly name
export type VersionId = Brand<string, 'rotation.VersionId'>; // == ClientRequestToken of the rotation
export type AccessKeyId = Brand<string, 'rotation.AccessKeyId'>;

export function asSecretId(value: string): SecretId {
  return value as SecretId;
}

export function asVersionId(value: string): VersionId {
  return value as VersionId;
}

export function asAccessKeyId(value: string): AccessKeyId {
  return value as AccessKeyId;
}
