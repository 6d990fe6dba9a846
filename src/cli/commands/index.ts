/**
 * CLI Commands - Public API
 */

export { executeAdvanceCommand, type AdvanceCommandDeps, type AdvanceCommandOptions } from './advance.js';
export {
  executeDerivePasswordCommand,
  DEFAULT_SECRET_ENV,
  type DerivePasswordCommandDeps,
  type DerivePasswordCommandOptions,
} from './derive-password.js';
