import { z } from 'zod';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { AccessKeyId } from './ids.js';
import { asAccessKeyId } from './ids.js';

/**
 * Wire keys of the secret JSON consumed by the mail-relay client.
 */
export const PAYLOAD_KEYS = {
  username: 'SMTP_USERNAME',
  secretMaterial: 'SMTP_SECRET',
  derivedPassword: 'SMTP_PASSWORD',
  region: 'SMTP_REGION',
} as const;

const requiredField = (key: string) => z.string({ required_error: `${key} is missing` }).min(1, `${key} is empty`);

const SecretPayloadWireSchema = z
  .object({
    SMTP_USERNAME: requiredField(PAYLOAD_KEYS.username),
    SMTP_SECRET: requiredField(PAYLOAD_KEYS.secretMaterial),
    SMTP_PASSWORD: requiredField(PAYLOAD_KEYS.derivedPassword),
    SMTP_REGION: requiredField(PAYLOAD_KEYS.region),
  })
  .passthrough();

/**
 * Structured secret record.
 *
 * `extra` keeps any key the secret carries beyond the four we own, so a version built
 * from a template round-trips fields written by other tooling.
 */
export interface SecretPayload {
  readonly username: AccessKeyId;
  readonly secretMaterial: string;
  readonly derivedPassword: string;
  readonly region: string;
  readonly extra: Readonly<Record<string, unknown>>;
}

export type PayloadSchemaError = {
  readonly code: 'PAYLOAD_SCHEMA_VIOLATION';
  readonly message: string;
  readonly issues: readonly string[];
};

export function parseSecretPayload(secretString: string): Result<SecretPayload, PayloadSchemaError> {
  let raw: unknown;
  try {
    raw = JSON.parse(secretString);
  } catch {
    return err({ code: 'PAYLOAD_SCHEMA_VIOLATION', message: 'Secret value is not valid JSON', issues: ['(root): invalid JSON'] });
  }

  const parsed = SecretPayloadWireSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`);
    return err({ code: 'PAYLOAD_SCHEMA_VIOLATION', message: `Secret value violates payload schema: ${issues.join('; ')}`, issues });
  }

  const { SMTP_USERNAME, SMTP_SECRET, SMTP_PASSWORD, SMTP_REGION, ...extra } = parsed.data;
  return ok({
    username: asAccessKeyId(SMTP_USERNAME),
    secretMaterial: SMTP_SECRET,
    derivedPassword: SMTP_PASSWORD,
    region: SMTP_REGION,
    extra,
  });
}

export function serializeSecretPayload(payload: SecretPayload): string {
  return JSON.stringify({
    ...payload.extra,
    [PAYLOAD_KEYS.username]: payload.username,
    [PAYLOAD_KEYS.secretMaterial]: payload.secretMaterial,
    [PAYLOAD_KEYS.derivedPassword]: payload.derivedPassword,
    [PAYLOAD_KEYS.region]: payload.region,
  });
}
