import type { ResultAsync } from 'neverthrow';

export interface CandidateCredentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
}

export interface CallerIdentity {
  /** Principal ARN, e.g. `arn:aws:iam::123456789012:user/ses/relay-user` */
  readonly principalArn: string;
}

/**
 * AUTH_FAILED: the service answered and rejected the credentials (not yet propagated,
 * invalid, disabled). REQUEST_FAILED: the call never got a service answer (network,
 * client-side failure). Only the former is worth retrying.
 */
export type IdentityCheckError =
  | { readonly code: 'IDENTITY_CHECK_AUTH_FAILED'; readonly message: string }
  | { readonly code: 'IDENTITY_CHECK_REQUEST_FAILED'; readonly message: string };

/**
 * Port: authenticate with arbitrary credentials and report who they belong to (STS).
 */
export interface IdentityCheckPort {
  getCallerIdentity(credentials: CandidateCredentials): ResultAsync<CallerIdentity, IdentityCheckError>;
}
