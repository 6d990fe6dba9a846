/**
 * Error classification shared by the AWS adapters.
 *
 * SDK v3 service exceptions carry `$metadata.httpStatusCode` (and `$fault`). Errors raised
 * before a response arrives (DNS, socket, credential resolution) do not.
 */
export function awsErrorName(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('name' in e)) return undefined;
  return typeof e.name === 'string' ? e.name : undefined;
}

export function awsHttpStatus(e: unknown): number | undefined {
  if (typeof e !== 'object' || e === null || !('$metadata' in e)) return undefined;
  const metadata = e.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) return undefined;
  return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
}

/** True when the service answered the request (with an error). */
export function isServiceAnswer(e: unknown): boolean {
  return awsHttpStatus(e) !== undefined;
}

export function describeAwsError(e: unknown): string {
  const name = awsErrorName(e);
  const message = e instanceof Error ? e.message : String(e);
  return name !== undefined && name !== 'Error' && !message.startsWith(name) ? `${name}: ${message}` : message;
}
