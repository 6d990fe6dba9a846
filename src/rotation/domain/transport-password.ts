import type { HmacSha256Port } from '../ports/hmac-sha256.port.js';
import type { Base64Port } from '../ports/base64.port.js';

/**
 * SES SMTP password derivation (SigV4-style key chain).
 *
 * These are protocol constants fixed by the mail relay, not configuration:
 * a derived password is only accepted when every link matches bit for bit.
 */
export const SMTP_PASSWORD_DERIVATION = Object.freeze({
  keyPrefix: 'AWS4',
  dateStamp: '11111111',
  service: 'ses',
  terminator: 'aws4_request',
  message: 'SendRawEmail',
  versionByte: 0x04,
} as const);

/** 1 version byte + 32-byte HMAC-SHA256 digest. */
export const DERIVED_PASSWORD_BYTE_LENGTH = 33;

export interface DerivationCodec {
  readonly hmac: HmacSha256Port;
  readonly base64: Base64Port;
}

const utf8 = new TextEncoder();

/**
 * Derive the SMTP password for a secret access key in `region`.
 *
 * k = HMAC("AWS4" + secret, date) → region → service → terminator → message,
 * then base64([version] ++ k). Pure: no I/O, same inputs give the same output.
 */
export function deriveTransportPassword(secretMaterial: string, region: string, codec: DerivationCodec): string {
  const d = SMTP_PASSWORD_DERIVATION;
  const chain = [d.dateStamp, region, d.service, d.terminator, d.message];

  let signature: Uint8Array = utf8.encode(`${d.keyPrefix}${secretMaterial}`);
  for (const link of chain) {
    signature = codec.hmac.hmacSha256(signature, utf8.encode(link));
  }

  const versioned = new Uint8Array(1 + signature.length);
  versioned[0] = d.versionByte;
  versioned.set(signature, 1);

  return codec.base64.encodeBase64(versioned);
}
