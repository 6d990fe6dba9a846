// Lambda entry point
export { handler, RotationFailure, RotationEventSchema } from './handler.js';
export type { RotationEvent, RotationFailureCause } from './handler.js';

// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';

// Rotation core
export { RotationStateMachine } from './rotation/usecases/rotation-state-machine.js';
export type { RotationContext, RotationOutcome, RotationRequest } from './rotation/usecases/rotation-state-machine.js';
export { LiveVerifier, DEFAULT_VERIFICATION_POLICY } from './rotation/usecases/live-verification.js';
export type { VerificationPolicy, VerifiedIdentity } from './rotation/usecases/live-verification.js';
export { RotationErr, formatRotationError } from './rotation/usecases/rotation-error.js';
export type { RotationError, RotationErrorCode } from './rotation/usecases/rotation-error.js';
export { deriveTransportPassword, SMTP_PASSWORD_DERIVATION } from './rotation/domain/transport-password.js';
export type { DerivationCodec } from './rotation/domain/transport-password.js';
export { parseSecretPayload, serializeSecretPayload, PAYLOAD_KEYS } from './rotation/domain/secret-payload.js';
export type { SecretPayload } from './rotation/domain/secret-payload.js';

// Ports
export type { SecretStorePort } from './rotation/ports/secret-store.port.js';
export type { IdentityProviderPort } from './rotation/ports/identity-provider.port.js';
export type { IdentityCheckPort } from './rotation/ports/identity-check.port.js';

// Configuration
export { loadConfig } from './config/app-config.js';
export type { AppConfig, ValidatedConfig } from './config/app-config.js';
