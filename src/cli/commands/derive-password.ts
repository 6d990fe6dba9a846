/**
 * Derive Password Command
 *
 * Prints the SMTP password for a secret access key and region. The secret is read from
 * an environment variable, never from argv, so it stays out of shell history.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, misuse } from '../types/cli-result.js';
import type { DerivationCodec } from '../../rotation/domain/transport-password.js';
import { deriveTransportPassword } from '../../rotation/domain/transport-password.js';

export const DEFAULT_SECRET_ENV = 'SMTP_SECRET_ACCESS_KEY';

export interface DerivePasswordCommandDeps {
  readonly env: Record<string, string | undefined>;
  readonly codec: DerivationCodec;
}

export interface DerivePasswordCommandOptions {
  readonly region: string;
  readonly secretEnv?: string;
}

export function executeDerivePasswordCommand(
  options: DerivePasswordCommandOptions,
  deps: DerivePasswordCommandDeps
): CliResult {
  const variable = options.secretEnv ?? DEFAULT_SECRET_ENV;
  const region = options.region.trim();

  if (region === '') {
    return misuse('Region must not be empty', ['Pass the SES region, e.g. --region eu-west-1']);
  }

  const secret = deps.env[variable];
  if (secret === undefined || secret === '') {
    return misuse(`Environment variable ${variable} is not set`, [
      `Export the secret access key as ${variable}, or name another variable with --secret-env`,
    ]);
  }

  return success({
    message: `SMTP password for region ${region}`,
    details: [deriveTransportPassword(secret, region, deps.codec)],
  });
}
