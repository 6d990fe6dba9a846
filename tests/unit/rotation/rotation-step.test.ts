import { describe, it, expect } from 'vitest';
import { ROTATION_STEPS, parseRotationStep } from '../../../src/rotation/domain/rotation-step.js';

describe('parseRotationStep', () => {
  it.each(ROTATION_STEPS)('accepts %s', (step) => {
    expect(parseRotationStep(step)._unsafeUnwrap()).toBe(step);
  });

  it.each([
    ['create', 'createSecret'],
    ['set', 'setSecret'],
    ['test', 'testSecret'],
    ['finish', 'finishSecret'],
  ])('maps alias %s to %s', (alias, step) => {
    expect(parseRotationStep(alias)._unsafeUnwrap()).toBe(step);
  });

  it.each(['', 'CreateSecret', 'rollback', 'toString', '__proto__'])('rejects %j', (raw) => {
    expect(parseRotationStep(raw)._unsafeUnwrapErr()).toEqual({ phase: raw });
  });
});
