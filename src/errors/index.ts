export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  InvalidEventError,
  StartupFailedError,
  UnexpectedError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError, safeToString } from './formatter.js';
