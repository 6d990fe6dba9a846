import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { handler, RotationFailure } from '../../src/handler.js';
import { container, resetContainer } from '../../src/di/container.js';
import { DI } from '../../src/di/tokens.js';
import { InMemoryIdentityProvider, InMemorySecretStore } from '../fakes/rotation/index.js';
import { setupTest, TEST_USER_NAME } from '../di/test-container.js';

const SECRET_ID = 'test/smtp-credentials';

const currentPayload = {
  SMTP_HOST: 'email-smtp.eu-west-1.amazonaws.com',
  SMTP_USERNAME: 'AKIATESTCURRENT00001',
  SMTP_SECRET: 'current-secret',
  SMTP_PASSWORD: 'BItOkpd9svlsH+Xc4wecKD/TE/7O4F68oV2VTedOLj8I',
  SMTP_REGION: 'eu-west-1',
};

async function rejectionOf(promise: Promise<unknown>): Promise<RotationFailure> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof RotationFailure) return e;
    throw e;
  }
  throw new Error('Expected the handler to throw');
}

describe('handler', () => {
  let store: InMemorySecretStore;
  let provider: InMemoryIdentityProvider;

  beforeEach(async () => {
    store = new InMemorySecretStore(SECRET_ID)
      .seedVersion('v-current', JSON.stringify(currentPayload), ['AWSCURRENT'])
      .seedVersion('v-next', null, ['AWSPENDING']);
    provider = new InMemoryIdentityProvider().seedKey(TEST_USER_NAME, 'AKIATESTCURRENT00001', 'current-secret');
    await setupTest({ secretStore: store, identityProvider: provider });
  });

  afterEach(() => {
    resetContainer();
  });

  it('runs the requested phase against the container', async () => {
    const outcome = await handler({ SecretId: SECRET_ID, ClientRequestToken: 'v-next', Step: 'createSecret' });

    expect(outcome).toEqual({
      kind: 'pending_created',
      accessKeyId: 'AKIATESTNEWKEY000001',
      deletedAccessKeyIds: [],
    });
    expect(store.stagesOf('v-next')).toEqual(['AWSPENDING']);
  });

  it('ignores extra event fields', async () => {
    const outcome = await handler({
      SecretId: SECRET_ID,
      ClientRequestToken: 'v-current',
      Step: 'finishSecret',
      RotationToken: 'ignored',
    });

    expect(outcome).toEqual({ kind: 'already_current', phase: 'finishSecret' });
  });

  it('throws an app failure for a malformed event', async () => {
    const failure = await rejectionOf(handler({ SecretId: '', Step: 'createSecret' }));

    expect(failure.failure.kind).toBe('app');
    if (failure.failure.kind !== 'app') return;
    expect(failure.failure.error._tag).toBe('InvalidEvent');
    expect(failure.name).toBe('RotationFailure');
  });

  it('throws a rotation failure for an unknown step', async () => {
    const failure = await rejectionOf(
      handler({ SecretId: SECRET_ID, ClientRequestToken: 'v-next', Step: 'rotateSecret' })
    );

    expect(failure.failure.kind).toBe('rotation');
    if (failure.failure.kind !== 'rotation') return;
    expect(failure.failure.error.code).toBe('UNKNOWN_PHASE');
    expect(failure.message).toBe(
      '[UNKNOWN_PHASE] Invalid step parameter: "rotateSecret" (secret=test/smtp-credentials token=v-next)'
    );
  });

  it('throws a rotation failure when rotation is disabled', async () => {
    store.rotationEnabled = false;

    const failure = await rejectionOf(
      handler({ SecretId: SECRET_ID, ClientRequestToken: 'v-next', Step: 'createSecret' })
    );

    expect(failure.failure.kind).toBe('rotation');
    if (failure.failure.kind !== 'rotation') return;
    expect(failure.failure.error.code).toBe('NOT_CONFIGURED');
  });

  it('throws an app failure when the state machine cannot be built', async () => {
    container.register(DI.Rotation.StateMachine, {
      useFactory: () => {
        throw new Error('wiring broken');
      },
    });

    const failure = await rejectionOf(
      handler({ SecretId: SECRET_ID, ClientRequestToken: 'v-next', Step: 'createSecret' })
    );

    expect(failure.failure.kind).toBe('app');
    if (failure.failure.kind !== 'app') return;
    expect(failure.failure.error._tag).toBe('Unexpected');
    expect(failure.message).toBe('Failed to resolve the rotation state machine\nCause: Error: wiring broken');
    expect(store.calls).toEqual([]);
  });
});
