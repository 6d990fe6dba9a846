/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by layer, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the appropriate namespace
 * 2. Register a factory in di/container.ts (no decorators; constructors stay plain)
 * 3. Resolve with container.resolve<T>(DI.Namespace.Token) at a composition root
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (lambda/cli/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process terminator (CLI composition root only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // PRIMITIVES (no dependencies)
  // ═══════════════════════════════════════════════════════════════════
  Primitives: {
    HmacSha256: Symbol('Primitives.HmacSha256'),
    Base64: Symbol('Primitives.Base64'),
    TimeClock: Symbol('Primitives.TimeClock'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // AWS ADAPTERS (ports backed by SDK v3 clients)
  // ═══════════════════════════════════════════════════════════════════
  Aws: {
    /** Secrets Manager-backed SecretStorePort */
    SecretStore: Symbol('Aws.SecretStore'),
    /** IAM-backed IdentityProviderPort */
    IdentityProvider: Symbol('Aws.IdentityProvider'),
    /** STS-backed IdentityCheckPort */
    IdentityCheck: Symbol('Aws.IdentityCheck'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // ROTATION
  // ═══════════════════════════════════════════════════════════════════
  Rotation: {
    /** Password derivation codec (HMAC + base64) */
    Codec: Symbol('Rotation.Codec'),
    /** Live verification with bounded retry */
    Verifier: Symbol('Rotation.Verifier'),
    /** Four-phase rotation driver */
    StateMachine: Symbol('Rotation.StateMachine'),
  },
} as const;
