import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

export type RotationStep = 'createSecret' | 'setSecret' | 'testSecret' | 'finishSecret';

export const ROTATION_STEPS: readonly RotationStep[] = ['createSecret', 'setSecret', 'testSecret', 'finishSecret'];

const STEP_ALIASES: Readonly<Record<string, RotationStep>> = {
  createSecret: 'createSecret',
  setSecret: 'setSecret',
  testSecret: 'testSecret',
  finishSecret: 'finishSecret',
  create: 'createSecret',
  set: 'setSecret',
  test: 'testSecret',
  finish: 'finishSecret',
};

/**
 * Accepts the orchestrator's step names and their short aliases (used by the CLI).
 */
export function parseRotationStep(raw: string): Result<RotationStep, { readonly phase: string }> {
  const step = Object.prototype.hasOwnProperty.call(STEP_ALIASES, raw) ? STEP_ALIASES[raw] : undefined;
  return step === undefined ? err({ phase: raw }) : ok(step);
}
