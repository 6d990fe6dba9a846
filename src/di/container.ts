import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { ok, err, fromThrowable } from 'neverthrow';
import type { Result } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import type { HmacSha256Port } from '../rotation/ports/hmac-sha256.port.js';
import type { Base64Port } from '../rotation/ports/base64.port.js';
import type { TimeClockPort } from '../rotation/ports/time-clock.port.js';
import type { SecretStorePort } from '../rotation/ports/secret-store.port.js';
import type { IdentityProviderPort } from '../rotation/ports/identity-provider.port.js';
import type { IdentityCheckPort } from '../rotation/ports/identity-check.port.js';
import type { DerivationCodec } from '../rotation/domain/transport-password.js';
import { LiveVerifier } from '../rotation/usecases/live-verification.js';
import { RotationStateMachine } from '../rotation/usecases/rotation-state-machine.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initializationPromise: Promise<Result<void, AppError>> | null = null;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Environment to read configuration from. Defaults to process.env. */
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(env: Record<string, string | undefined>): RuntimeMode {
  // Env access is allowed here (composition root), but must not leak into services.
  if (env['VITEST'] || env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  if (env['AWS_LAMBDA_FUNCTION_NAME']) {
    return { kind: 'lambda' };
  }
  return { kind: 'cli' };
}

function registerRuntime(mode: RuntimeMode): void {
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): Result<ValidatedConfig, AppError> {
  // Tests may inject config before initialization; never overwrite it.
  if (container.isRegistered(DI.Config.App)) {
    return ok(container.resolve<ValidatedConfig>(DI.Config.App));
  }

  return loadConfig({ env }).map((config) => {
    container.register<ValidatedConfig>(DI.Config.App, { useValue: config });
    return config;
  });
}

function registerLogging(config: ValidatedConfig): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory(() => new PinoLoggerFactory(config.logLevel)),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PRIMITIVES + AWS ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Register a factory unless a test already provided the token.
 */
function registerDefault<T>(token: symbol, factory: (c: DependencyContainer) => T): void {
  if (!container.isRegistered(token)) {
    container.register<T>(token, { useFactory: instanceCachingFactory<T>(factory) });
  }
}

async function registerPrimitives(): Promise<void> {
  const { NodeHmacSha256 } = await import('../rotation/infra/local/hmac-sha256/index.js');
  const { NodeBase64 } = await import('../rotation/infra/local/base64/index.js');
  const { NodeTimeClock } = await import('../rotation/infra/local/time-clock/index.js');

  registerDefault<HmacSha256Port>(DI.Primitives.HmacSha256, () => new NodeHmacSha256());
  registerDefault<Base64Port>(DI.Primitives.Base64, () => new NodeBase64());
  registerDefault<TimeClockPort>(DI.Primitives.TimeClock, () => new NodeTimeClock());
}

/**
 * SDK modules are imported lazily: tests that stub every adapter never load them.
 */
async function registerAwsAdapters(config: ValidatedConfig): Promise<void> {
  const region = config.aws.region;

  if (!container.isRegistered(DI.Aws.SecretStore)) {
    const sm = await import('../rotation/infra/aws/secrets-manager/index.js');
    registerDefault<SecretStorePort>(
      DI.Aws.SecretStore,
      () =>
        new sm.SecretsManagerSecretStore(
          sm.secretsManagerApi(
            sm.createSecretsManagerClient({ region, endpoint: config.aws.secretsManagerEndpoint })
          )
        )
    );
  }

  if (!container.isRegistered(DI.Aws.IdentityProvider)) {
    const iam = await import('../rotation/infra/aws/iam/index.js');
    registerDefault<IdentityProviderPort>(
      DI.Aws.IdentityProvider,
      () => new iam.IamIdentityProvider(iam.iamApi(iam.createIamClient({ region })))
    );
  }

  if (!container.isRegistered(DI.Aws.IdentityCheck)) {
    const sts = await import('../rotation/infra/aws/sts/index.js');
    registerDefault<IdentityCheckPort>(
      DI.Aws.IdentityCheck,
      () => new sts.StsIdentityCheck(sts.stsCallerIdentityLookup({ region }))
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// ROTATION
// ═══════════════════════════════════════════════════════════════════════════

function registerRotation(config: ValidatedConfig): void {
  registerDefault<DerivationCodec>(DI.Rotation.Codec, (c) => ({
    hmac: c.resolve<HmacSha256Port>(DI.Primitives.HmacSha256),
    base64: c.resolve<Base64Port>(DI.Primitives.Base64),
  }));

  registerDefault<LiveVerifier>(
    DI.Rotation.Verifier,
    (c) =>
      new LiveVerifier(
        c.resolve<IdentityCheckPort>(DI.Aws.IdentityCheck),
        c.resolve<TimeClockPort>(DI.Primitives.TimeClock),
        c.resolve<ILoggerFactory>(DI.Logging.Factory).create('LiveVerifier'),
        { maxAttempts: config.verification.maxAttempts, retryDelayMs: config.verification.retryDelayMs }
      )
  );

  registerDefault<RotationStateMachine>(
    DI.Rotation.StateMachine,
    (c) =>
      new RotationStateMachine({
        secretStore: c.resolve<SecretStorePort>(DI.Aws.SecretStore),
        identityProvider: c.resolve<IdentityProviderPort>(DI.Aws.IdentityProvider),
        verifier: c.resolve<LiveVerifier>(DI.Rotation.Verifier),
        codec: c.resolve<DerivationCodec>(DI.Rotation.Codec),
        userName: config.userName,
        logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('RotationStateMachine'),
      })
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

async function doInitialize(options: ContainerInitOptions): Promise<Result<void, AppError>> {
  const env = options.env ?? process.env;
  registerRuntime(options.runtimeMode ?? detectRuntimeMode(env));

  const config = registerConfig(env);
  if (config.isErr()) return err(config.error);

  try {
    registerLogging(config.value);
    await registerPrimitives();
    await registerAwsAdapters(config.value);
    registerRotation(config.value);
  } catch (e) {
    return err(Err.startupFailed('container', e instanceof Error ? e.message : String(e), e));
  }

  initialized = true;
  return ok(undefined);
}

/**
 * Initialize the DI container.
 *
 * Idempotent: concurrent and repeated calls share one initialization, including a
 * failed one. Call resetContainer() before trying again.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Promise<Result<void, AppError>> {
  if (initializationPromise === null) {
    initializationPromise = doInitialize(options);
  }
  return initializationPromise;
}

/**
 * Resolve a registered service, reporting a throwing factory as an Unexpected error.
 */
export function resolveService<T>(token: symbol, description: string): Result<T, AppError> {
  return fromThrowable(
    () => container.resolve<T>(token),
    (e) => Err.unexpected(`Failed to resolve ${description}`, e)
  )();
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  initializationPromise = null;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
