import { GetCallerIdentityCommand, STSClient, STSServiceException } from '@aws-sdk/client-sts';
import type { GetCallerIdentityCommandOutput } from '@aws-sdk/client-sts';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, errAsync, okAsync } from 'neverthrow';
import type {
  CallerIdentity,
  CandidateCredentials,
  IdentityCheckError,
  IdentityCheckPort,
} from '../../../ports/identity-check.port.js';
import { describeAwsError, isServiceAnswer } from '../service-error.js';

/** Calls GetCallerIdentity signed with exactly the given credentials. */
export type CallerIdentityLookup = (credentials: CandidateCredentials) => Promise<GetCallerIdentityCommandOutput>;

/**
 * Fresh client per call: the candidate key is the only credential source,
 * never the ambient role of the process.
 */
export function stsCallerIdentityLookup(options: { readonly region: string | null }): CallerIdentityLookup {
  return (credentials) => {
    const client = new STSClient({
      ...(options.region !== null ? { region: options.region } : {}),
      credentials: { accessKeyId: credentials.accessKeyId, secretAccessKey: credentials.secretAccessKey },
    });
    return client.send(new GetCallerIdentityCommand({})).finally(() => client.destroy());
  };
}

function mapStsError(e: unknown): IdentityCheckError {
  if (e instanceof STSServiceException || isServiceAnswer(e)) {
    return { code: 'IDENTITY_CHECK_AUTH_FAILED', message: describeAwsError(e) };
  }
  return { code: 'IDENTITY_CHECK_REQUEST_FAILED', message: describeAwsError(e) };
}

export class StsIdentityCheck implements IdentityCheckPort {
  constructor(private readonly lookup: CallerIdentityLookup) {}

  getCallerIdentity(credentials: CandidateCredentials): ResultAsync<CallerIdentity, IdentityCheckError> {
    return RA.fromPromise(this.lookup(credentials), mapStsError).andThen((out) =>
      out.Arn === undefined
        ? errAsync<CallerIdentity, IdentityCheckError>({
            code: 'IDENTITY_CHECK_REQUEST_FAILED',
            message: 'GetCallerIdentity returned no Arn',
          })
        : okAsync({ principalArn: out.Arn })
    );
  }
}
