/**
 * Port: HMAC-SHA256 (SMTP password derivation chain).
 *
 * Guarantees:
 * - Deterministic (same key + message → same 32-byte digest)
 * - Pure (no I/O, no global state)
 */
export interface HmacSha256Port {
  hmacSha256(key: Uint8Array, message: Uint8Array): Uint8Array; // 32 bytes
}
