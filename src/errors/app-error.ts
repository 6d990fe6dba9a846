import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/** The orchestrator (or an operator) sent an invocation that does not match the event contract. */
export type InvalidEventError = Readonly<{
  readonly _tag: 'InvalidEvent';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: string;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | InvalidEventError | StartupFailedError | UnexpectedError;

/**
 * Branded config type: only `loadConfig` (or a test helper) can produce one.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
