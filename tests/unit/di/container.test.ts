import { describe, it, expect, afterEach } from 'vitest';
import {
  container,
  initializeContainer,
  isInitialized,
  resetContainer,
  resolveService,
} from '../../../src/di/container.js';
import { DI } from '../../../src/di/tokens.js';
import type { RuntimeMode } from '../../../src/runtime/runtime-mode.js';
import type { ProcessTerminator } from '../../../src/runtime/ports/process-terminator.js';
import { ThrowingProcessTerminator } from '../../../src/runtime/adapters/throwing-process-terminator.js';
import { RotationStateMachine } from '../../../src/rotation/usecases/rotation-state-machine.js';
import { LiveVerifier } from '../../../src/rotation/usecases/live-verification.js';
import { SecretsManagerSecretStore } from '../../../src/rotation/infra/aws/secrets-manager/index.js';
import { IamIdentityProvider } from '../../../src/rotation/infra/aws/iam/index.js';
import { StsIdentityCheck } from '../../../src/rotation/infra/aws/sts/index.js';
import { InMemorySecretStore } from '../../fakes/rotation/index.js';
import { setupTest } from '../../di/test-container.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const ENV = { USERNAME: 'smtp-relay-user', AWS_REGION: 'eu-west-1', ROTATION_LOG_LEVEL: 'silent' };

describe('DI container', () => {
  afterEach(() => {
    resetContainer();
  });

  it('wires the AWS adapters and the state machine from the environment', async () => {
    resetContainer();

    expectOk(await initializeContainer({ env: ENV, runtimeMode: { kind: 'test' } }), 'init');

    expect(isInitialized()).toBe(true);
    expect(container.resolve(DI.Aws.SecretStore)).toBeInstanceOf(SecretsManagerSecretStore);
    expect(container.resolve(DI.Aws.IdentityProvider)).toBeInstanceOf(IamIdentityProvider);
    expect(container.resolve(DI.Aws.IdentityCheck)).toBeInstanceOf(StsIdentityCheck);
    expect(container.resolve(DI.Rotation.Verifier)).toBeInstanceOf(LiveVerifier);
    expect(container.resolve(DI.Rotation.StateMachine)).toBeInstanceOf(RotationStateMachine);
  });

  it('resolves singletons', async () => {
    resetContainer();
    expectOk(await initializeContainer({ env: ENV, runtimeMode: { kind: 'test' } }), 'init');

    expect(container.resolve(DI.Rotation.StateMachine)).toBe(container.resolve(DI.Rotation.StateMachine));
  });

  it('detects test mode from the environment and installs a throwing terminator', async () => {
    resetContainer();
    expectOk(await initializeContainer({ env: { ...ENV, VITEST: 'true' } }), 'init');

    expect(container.resolve<RuntimeMode>(DI.Runtime.Mode)).toEqual({ kind: 'test' });
    expect(container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator)).toBeInstanceOf(ThrowingProcessTerminator);
  });

  it('detects lambda mode from AWS_LAMBDA_FUNCTION_NAME', async () => {
    resetContainer();
    expectOk(await initializeContainer({ env: { ...ENV, AWS_LAMBDA_FUNCTION_NAME: 'smtp-key-rotation' } }), 'init');

    expect(container.resolve<RuntimeMode>(DI.Runtime.Mode)).toEqual({ kind: 'lambda' });
  });

  it('fails with ConfigInvalid when USERNAME is missing', async () => {
    resetContainer();

    const error = expectErr(await initializeContainer({ env: {}, runtimeMode: { kind: 'test' } }), 'missing USERNAME');

    expect(error._tag).toBe('ConfigInvalid');
    expect(isInitialized()).toBe(false);
  });

  it('shares one initialization between calls', async () => {
    resetContainer();

    const first = initializeContainer({ env: ENV, runtimeMode: { kind: 'test' } });
    const second = initializeContainer({ env: {}, runtimeMode: { kind: 'test' } });

    expect(second).toBe(first);
    expectOk(await second, 'memoized init');
  });

  it('keeps adapters registered before initialization', async () => {
    const store = new InMemorySecretStore();
    await setupTest({ secretStore: store });

    expect(container.resolve(DI.Aws.SecretStore)).toBe(store);
  });

  it('resolves a registered service as Ok', async () => {
    await setupTest();

    const machine = expectOk(
      resolveService<RotationStateMachine>(DI.Rotation.StateMachine, 'the rotation state machine'),
      'resolving the state machine'
    );

    expect(machine).toBeInstanceOf(RotationStateMachine);
  });

  it('reports a throwing factory as an Unexpected error', () => {
    resetContainer();
    const wiringError = new Error('wiring broken');
    container.register(DI.Rotation.StateMachine, {
      useFactory: () => {
        throw wiringError;
      },
    });

    const error = expectErr(
      resolveService<RotationStateMachine>(DI.Rotation.StateMachine, 'the rotation state machine'),
      'throwing factory'
    );

    expect(error).toEqual({
      _tag: 'Unexpected',
      message: 'Failed to resolve the rotation state machine',
      cause: wiringError,
    });
  });
});
