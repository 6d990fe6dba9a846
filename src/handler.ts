/**
 * Lambda composition root.
 *
 * Secrets Manager invokes this once per rotation phase. A failed phase must surface as a
 * failed invocation, so every error is thrown as a RotationFailure.
 */

import { z } from 'zod';
import { initializeContainer, resolveService } from './di/container.js';
import { DI } from './di/tokens.js';
import type { AppError } from './errors/app-error.js';
import { Err } from './errors/factories.js';
import { formatAppError } from './errors/formatter.js';
import { toConfigIssues } from './config/app-config.js';
import { createBootstrapLogger } from './core/logging/index.js';
import type { RotationError } from './rotation/usecases/rotation-error.js';
import { formatRotationError } from './rotation/usecases/rotation-error.js';
import type { RotationOutcome, RotationStateMachine } from './rotation/usecases/rotation-state-machine.js';

export const RotationEventSchema = z.object({
  SecretId: z.string().min(1, 'SecretId is required'),
  ClientRequestToken: z.string().min(1, 'ClientRequestToken is required'),
  Step: z.string(),
});

export type RotationEvent = z.infer<typeof RotationEventSchema>;

export type RotationFailureCause =
  | { readonly kind: 'app'; readonly error: AppError }
  | { readonly kind: 'rotation'; readonly error: RotationError };

export class RotationFailure extends Error {
  constructor(readonly failure: RotationFailureCause) {
    super(failure.kind === 'app' ? formatAppError(failure.error) : formatRotationError(failure.error));
    this.name = 'RotationFailure';
  }
}

export async function handler(event: unknown): Promise<RotationOutcome> {
  const log = createBootstrapLogger('handler');

  const parsed = RotationEventSchema.safeParse(event);
  if (!parsed.success) {
    const error = Err.invalidEvent(toConfigIssues(parsed.error));
    log.error({ issues: error.issues }, error.message);
    throw new RotationFailure({ kind: 'app', error });
  }

  const init = await initializeContainer({ runtimeMode: { kind: 'lambda' } });
  if (init.isErr()) {
    log.error({ tag: init.error._tag }, formatAppError(init.error));
    throw new RotationFailure({ kind: 'app', error: init.error });
  }

  const machine = resolveService<RotationStateMachine>(DI.Rotation.StateMachine, 'the rotation state machine');
  if (machine.isErr()) {
    log.error({ tag: machine.error._tag }, formatAppError(machine.error));
    throw new RotationFailure({ kind: 'app', error: machine.error });
  }

  const result = await machine.value.advance({
    secretId: parsed.data.SecretId,
    token: parsed.data.ClientRequestToken,
    phase: parsed.data.Step,
  });

  if (result.isErr()) {
    throw new RotationFailure({ kind: 'rotation', error: result.error });
  }
  return result.value;
}
