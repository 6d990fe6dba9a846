import { describe, it, expect, beforeEach } from 'vitest';
import { SecretRecordAccess } from '../../../src/rotation/usecases/secret-record-access.js';
import { asSecretId, asVersionId, asAccessKeyId } from '../../../src/rotation/domain/ids.js';
import { STAGE } from '../../../src/rotation/domain/stages.js';
import { InMemorySecretStore } from '../../fakes/rotation/index.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const SECRET_ID = asSecretId('test/smtp-credentials');

const currentValue = JSON.stringify({
  SMTP_USERNAME: 'AKIATESTCURRENT00001',
  SMTP_SECRET: 'current-secret',
  SMTP_PASSWORD: 'BItOkpd9svlsH+Xc4wecKD/TE/7O4F68oV2VTedOLj8I',
  SMTP_REGION: 'eu-west-1',
});

describe('SecretRecordAccess', () => {
  let store: InMemorySecretStore;
  let records: SecretRecordAccess;

  beforeEach(() => {
    store = new InMemorySecretStore().seedVersion('v-current', currentValue, [STAGE.current]);
    records = new SecretRecordAccess(store);
  });

  describe('read', () => {
    it('returns the parsed payload with its version', async () => {
      const record = expectOk(await records.read(SECRET_ID, { stage: STAGE.current }), 'reading AWSCURRENT');

      expect(record.versionId).toBe('v-current');
      expect(record.payload.username).toBe('AKIATESTCURRENT00001');
      expect(record.payload.region).toBe('eu-west-1');
    });

    it('reports a missing stage as RECORD_NOT_FOUND', async () => {
      const error = expectErr(
        await records.read(SECRET_ID, { stage: STAGE.pending, versionId: asVersionId('v-next') }),
        'reading absent AWSPENDING'
      );

      expect(error).toEqual({
        code: 'RECORD_NOT_FOUND',
        message: 'No AWSPENDING value for version v-next of secret test/smtp-credentials',
        stage: STAGE.pending,
      });
    });

    it('reports schema violations with their issues', async () => {
      store.seedVersion('v-broken', '{"SMTP_USERNAME":"AKIATESTBROKEN000001"}', [STAGE.pending]);

      const error = expectErr(
        await records.read(SECRET_ID, { stage: STAGE.pending, versionId: asVersionId('v-broken') }),
        'reading malformed AWSPENDING'
      );

      expect(error.code).toBe('RECORD_SCHEMA_VIOLATION');
      if (error.code === 'RECORD_SCHEMA_VIOLATION') {
        expect(error.stage).toBe(STAGE.pending);
        expect(error.issues).toEqual([
          'SMTP_SECRET: SMTP_SECRET is missing',
          'SMTP_PASSWORD: SMTP_PASSWORD is missing',
          'SMTP_REGION: SMTP_REGION is missing',
        ]);
      }
    });

    it('maps other store failures to RECORD_STORE_FAILED', async () => {
      store.failNext('getSecretValue', { code: 'SECRET_STORE_REQUEST_FAILED', message: 'throttled' });

      const error = expectErr(await records.read(SECRET_ID, { stage: STAGE.current }), 'throttled read');
      expect(error).toEqual({ code: 'RECORD_STORE_FAILED', message: 'throttled' });
    });
  });

  describe('exists', () => {
    it('is false for a version staged AWSPENDING without a value', async () => {
      store.seedVersion('v-next', null, [STAGE.pending]);

      const exists = expectOk(
        await records.exists(SECRET_ID, { stage: STAGE.pending, versionId: asVersionId('v-next') }),
        'checking unwritten AWSPENDING'
      );
      expect(exists).toBe(false);
    });

    it('is true once a value exists, without validating it', async () => {
      store.seedVersion('v-next', 'not json', [STAGE.pending]);

      const exists = expectOk(
        await records.exists(SECRET_ID, { stage: STAGE.pending, versionId: asVersionId('v-next') }),
        'checking written AWSPENDING'
      );
      expect(exists).toBe(true);
    });
  });

  describe('writePending', () => {
    it('stores the serialized payload as AWSPENDING on the given version', async () => {
      store.seedVersion('v-next', null, [STAGE.pending]);

      expectOk(
        await records.writePending(SECRET_ID, asVersionId('v-next'), {
          username: asAccessKeyId('AKIATESTNEWKEY000001'),
          secretMaterial: 'test-secret-1',
          derivedPassword: 'BOnuoKRo86zCWnWjhTtAIuNqabWTU2v88EnKSHiunjfC',
          region: 'eu-west-1',
          extra: {},
        }),
        'writing AWSPENDING'
      );

      expect(store.stagesOf('v-next')).toEqual([STAGE.pending]);
      expect(JSON.parse(store.valueOf('v-next') ?? 'null')).toEqual({
        SMTP_USERNAME: 'AKIATESTNEWKEY000001',
        SMTP_SECRET: 'test-secret-1',
        SMTP_PASSWORD: 'BOnuoKRo86zCWnWjhTtAIuNqabWTU2v88EnKSHiunjfC',
        SMTP_REGION: 'eu-west-1',
      });
    });
  });
});
