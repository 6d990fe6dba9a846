/**
 * Advance Command
 *
 * Runs one rotation phase for a secret, exactly as the Lambda handler would.
 * Pure function with dependency injection.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { RotationError } from '../../rotation/usecases/rotation-error.js';
import type { RotationOutcome, RotationRequest } from '../../rotation/usecases/rotation-state-machine.js';
import { assertNever } from '../../runtime/assert-never.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface AdvanceCommandDeps {
  readonly advance: (request: RotationRequest) => ResultAsync<RotationOutcome, RotationError>;
}

export interface AdvanceCommandOptions {
  readonly secretId: string;
  readonly token: string;
  readonly step: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeAdvanceCommand(
  options: AdvanceCommandOptions,
  deps: AdvanceCommandDeps
): Promise<CliResult> {
  const result = await deps.advance({ secretId: options.secretId, token: options.token, phase: options.step });

  return result.match(
    (outcome) => describeOutcome(outcome, options),
    (error) => describeError(error)
  );
}

function describeOutcome(outcome: RotationOutcome, options: AdvanceCommandOptions): CliResult {
  switch (outcome.kind) {
    case 'already_current':
      return success({ message: `Version ${options.token} is already AWSCURRENT; ${outcome.phase} skipped` });

    case 'pending_exists':
      return success({ message: `AWSPENDING value already exists for version ${options.token}` });

    case 'pending_created':
      return success({
        message: `Created access key ${outcome.accessKeyId} and stored it as AWSPENDING`,
        details: outcome.deletedAccessKeyIds.length
          ? outcome.deletedAccessKeyIds.map((id) => `Deleted previous access key ${id}`)
          : undefined,
      });

    case 'set_skipped':
      return success({ message: 'Nothing to set: the identity provider issues the key material' });

    case 'verified':
      return success({
        message: `Authenticated as ${outcome.identity} after ${outcome.attempts} attempt${outcome.attempts === 1 ? '' : 's'}`,
      });

    case 'promoted':
      return success({
        message: `Version ${options.token} is now AWSCURRENT`,
        details: outcome.previousVersionId !== null ? [`Previous version: ${outcome.previousVersionId}`] : undefined,
      });

    default:
      return assertNever(outcome);
  }
}

function describeError(error: RotationError): CliResult {
  const where = `secret ${error.secretId}, token ${error.token}`;

  switch (error.code) {
    case 'NOT_CONFIGURED':
      return failure(error.message, { suggestions: ['Enable rotation on the secret before advancing it'] });

    case 'UNKNOWN_VERSION':
      return failure(error.message, { details: [where] });

    case 'INVALID_STAGE':
      return failure(error.message, {
        details: [where, `Stages on version: ${error.stages.join(', ') || 'none'}`],
      });

    case 'UNKNOWN_PHASE':
      return failure(error.message, {
        exitCode: { kind: 'misuse' },
        suggestions: ['Use one of: createSecret, setSecret, testSecret, finishSecret'],
      });

    case 'SCHEMA_VIOLATION':
      return failure(error.message, { details: [where, ...error.issues] });

    case 'VERIFICATION_FAILED':
      return failure(error.message, {
        suggestions: ['Check that USERNAME names the IAM user that owns the access key'],
      });

    case 'VERIFICATION_EXHAUSTED':
      return failure(error.message, {
        details: [where, `Last failure: ${error.lastFailure}`],
        suggestions: ['Re-run testSecret; new access keys can take a while to propagate'],
      });

    case 'UPSTREAM_FAILED':
      return failure(error.message, { details: [where] });

    default:
      return assertNever(error);
  }
}
