import { describe, it, expect, beforeEach } from 'vitest';
import { ok } from 'neverthrow';
import {
  LiveVerifier,
  identityFromPrincipalArn,
} from '../../../src/rotation/usecases/live-verification.js';
import { FakeIdentityCheck, FakeTimeClock } from '../../fakes/rotation/index.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const candidate = { accessKeyId: 'AKIATESTNEWKEY000001', secretAccessKey: 'test-secret-1' };

describe('identityFromPrincipalArn', () => {
  it('takes the segment after the last slash', () => {
    expect(identityFromPrincipalArn('arn:aws:iam::123456789012:user/ses/smtp-relay-user')).toBe('smtp-relay-user');
    expect(identityFromPrincipalArn('arn:aws:iam::123456789012:user/smtp-relay-user')).toBe('smtp-relay-user');
  });

  it('returns null without a usable segment', () => {
    expect(identityFromPrincipalArn('arn:aws:iam::123456789012:root')).toBeNull();
    expect(identityFromPrincipalArn('arn:aws:iam::123456789012:user/')).toBeNull();
  });
});

describe('LiveVerifier', () => {
  let clock: FakeTimeClock;
  let log: FakeLogger;

  beforeEach(() => {
    clock = new FakeTimeClock();
    log = new FakeLogger();
  });

  it('succeeds on the first attempt without sleeping', async () => {
    const check = FakeIdentityCheck.acceptingAs('smtp-relay-user');
    const verifier = new LiveVerifier(check, clock, log.logger);

    const verified = expectOk(await verifier.verify(candidate), 'immediate acceptance');

    expect(verified).toEqual({
      identity: 'smtp-relay-user',
      principalArn: 'arn:aws:iam::123456789012:user/ses/smtp-relay-user',
      attempts: 1,
    });
    expect(check.calls).toEqual([candidate]);
    expect(clock.sleeps).toEqual([]);
  });

  it('retries rejected credentials until the key propagates', async () => {
    const check = FakeIdentityCheck.propagatingAfter(3, 'smtp-relay-user');
    const verifier = new LiveVerifier(check, clock, log.logger);

    const verified = expectOk(await verifier.verify(candidate), 'eventual acceptance');

    expect(verified.attempts).toBe(4);
    expect(check.calls).toHaveLength(4);
    expect(clock.sleeps).toEqual([5_000, 5_000, 5_000]);
    expect(log.getEntries('warn').map((e) => e.msg)).toEqual([
      'Failed to authenticate with access key; 4 attempts remaining',
      'Failed to authenticate with access key; 3 attempts remaining',
      'Failed to authenticate with access key; 2 attempts remaining',
    ]);
  });

  it('gives up after exactly five attempts and four sleeps', async () => {
    const check = FakeIdentityCheck.rejecting('InvalidClientTokenId: token invalid');
    const verifier = new LiveVerifier(check, clock, log.logger);

    const error = expectErr(await verifier.verify(candidate), 'persistent rejection');

    expect(error).toEqual({
      code: 'VERIFICATION_EXHAUSTED',
      message: 'Unable to authenticate using the generated access key after 5 attempts',
      attempts: 5,
      lastFailure: 'InvalidClientTokenId: token invalid',
    });
    expect(check.calls).toHaveLength(5);
    expect(clock.sleeps).toEqual([5_000, 5_000, 5_000, 5_000]);
  });

  it('honours a custom policy', async () => {
    const check = FakeIdentityCheck.rejecting();
    const verifier = new LiveVerifier(check, clock, log.logger, { maxAttempts: 2, retryDelayMs: 10 });

    const error = expectErr(await verifier.verify(candidate), 'custom policy');

    expect(error.code).toBe('VERIFICATION_EXHAUSTED');
    expect(check.calls).toHaveLength(2);
    expect(clock.sleeps).toEqual([10]);
  });

  it('does not retry when the identity check gets no answer', async () => {
    const check = FakeIdentityCheck.unreachable('connect ETIMEDOUT');
    const verifier = new LiveVerifier(check, clock, log.logger);

    const error = expectErr(await verifier.verify(candidate), 'unreachable service');

    expect(error).toEqual({ code: 'VERIFICATION_REQUEST_FAILED', message: 'connect ETIMEDOUT' });
    expect(check.calls).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('does not retry a principal it cannot read an identity from', async () => {
    const check = new FakeIdentityCheck(() => ok({ principalArn: 'arn:aws:iam::123456789012:root' }));
    const verifier = new LiveVerifier(check, clock, log.logger);

    const error = expectErr(await verifier.verify(candidate), 'root principal');

    expect(error).toEqual({
      code: 'VERIFICATION_UNEXPECTED_PRINCIPAL',
      message: 'Cannot extract an identity from principal arn:aws:iam::123456789012:root',
      principalArn: 'arn:aws:iam::123456789012:root',
    });
    expect(check.calls).toHaveLength(1);
  });

  it('rejects empty candidate credentials without calling the service', async () => {
    const check = FakeIdentityCheck.acceptingAs('smtp-relay-user');
    const verifier = new LiveVerifier(check, clock, log.logger);

    const error = expectErr(await verifier.verify({ accessKeyId: ' ', secretAccessKey: 'test-secret-1' }), 'empty id');

    expect(error.code).toBe('VERIFICATION_MALFORMED_INPUT');
    expect(check.calls).toEqual([]);
  });

  it('never logs the secret access key', async () => {
    const verifier = new LiveVerifier(FakeIdentityCheck.propagatingAfter(1, 'smtp-relay-user'), clock, log.logger);

    expectOk(await verifier.verify(candidate), 'verification with one retry');

    expect(log.lines.length).toBeGreaterThan(0);
    expect(log.lines.some((line) => line.includes('test-secret-1'))).toBe(false);
  });
});
