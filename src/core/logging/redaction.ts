/**
 * Redaction configuration for pino.
 *
 * Secret access keys and derived SMTP passwords must never reach a log line,
 * whether logged as a domain record, a raw payload or an SDK response.
 */
export const REDACTION_CONFIG = {
  paths: [
    // Domain record fields
    'secretMaterial',
    'derivedPassword',
    '*.secretMaterial',
    '*.derivedPassword',

    // IAM / STS credential shapes
    'secretAccessKey',
    'SecretAccessKey',
    '*.secretAccessKey',
    '*.SecretAccessKey',

    // Wire payload keys
    'SMTP_SECRET',
    'SMTP_PASSWORD',
    '*.SMTP_SECRET',
    '*.SMTP_PASSWORD',
    'secretString',
    '*.secretString',

    // Generic
    'password',
    'secret',
    '*.password',
    '*.secret',
  ],
  censor: '[REDACTED]',
};
