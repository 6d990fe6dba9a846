/**
 * Standard-alphabet, padded base64 (RFC 4648 §4), as expected by SMTP AUTH clients.
 */
export interface Base64Port {
  encodeBase64(bytes: Uint8Array): string;
}
