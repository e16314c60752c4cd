import { describe, it, expect } from 'vitest';
import { FakeExecutor } from './helpers/fake-executor.js';
import { profileEnvOrAmbient, resolveProfileEnv, verifyCredentials } from '../src/exec/aws-credentials.js';
import { createMemoryLogger } from '../src/lib/logger.js';
import { ErrorCode, InstallerError } from '../src/lib/errors.js';

function exporting(output: string): FakeExecutor {
  return new FakeExecutor().on('aws', ['configure', 'export-credentials'], () => output);
}

describe('resolveProfileEnv', () => {
  it('maps exported credentials to environment variables', async () => {
    const executor = exporting(
      JSON.stringify({ Version: 1, AccessKeyId: 'test-access-key', SecretAccessKey: 'test-secret', SessionToken: 'test-session' }),
    );

    expect(await resolveProfileEnv(executor, 'sts')).toEqual({
      status: 'available',
      env: {
        AWS_ACCESS_KEY_ID: 'test-access-key',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        AWS_SESSION_TOKEN: 'test-session',
      },
    });
    expect(executor.argsOf('aws')).toEqual(['configure export-credentials --profile sts --format process']);
  });

  it('omits the session token for long-lived keys', async () => {
    const executor = exporting(JSON.stringify({ AccessKeyId: 'test-access-key', SecretAccessKey: 'test-secret' }));

    expect(await resolveProfileEnv(executor, 'default')).toEqual({
      status: 'available',
      env: { AWS_ACCESS_KEY_ID: 'test-access-key', AWS_SECRET_ACCESS_KEY: 'test-secret' },
    });
  });

  it('is unavailable when the aws CLI fails', async () => {
    const executor = new FakeExecutor().fail('aws', ['configure'], 255, 'profile not found');

    expect(await resolveProfileEnv(executor, 'missing')).toEqual({
      status: 'unavailable',
      reason: 'aws configure export-credentials --profile missing --format process exited with code 255: profile not found',
    });
  });

  it('is unavailable for non-JSON output', async () => {
    expect(await resolveProfileEnv(exporting('AKIA...'), 'default')).toEqual({
      status: 'unavailable',
      reason: 'aws CLI returned non-JSON credentials',
    });
  });

  it('is unavailable for incomplete credentials', async () => {
    expect(await resolveProfileEnv(exporting('{"AccessKeyId":"test-access-key"}'), 'default')).toEqual({
      status: 'unavailable',
      reason: 'aws CLI returned incomplete credentials',
    });
  });
});

describe('profileEnvOrAmbient', () => {
  it('logs the fallback at debug level', async () => {
    const log = createMemoryLogger();

    const env = await profileEnvOrAmbient(exporting(''), log, 'sts');

    expect(env).toBeUndefined();
    expect(log.lines).toEqual([
      "[DEBUG] Could not read AWS credentials from profile 'sts': aws CLI returned non-JSON credentials",
      '[DEBUG] Proceeding without setting AWS credentials from profile',
    ]);
  });
});

describe('verifyCredentials', () => {
  it('calls sts get-caller-identity for the profile', async () => {
    const executor = new FakeExecutor();
    await verifyCredentials(executor, 'sts');
    expect(executor.argsOf('aws')).toEqual(['sts get-caller-identity --profile sts']);
  });

  it('throws a preflight error when the profile cannot authenticate', async () => {
    const executor = new FakeExecutor().fail('aws', ['sts'], 254, 'ExpiredToken');

    const err = await verifyCredentials(executor, 'sts').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InstallerError);
    expect(err instanceof InstallerError && err.code).toBe(ErrorCode.CREDENTIALS_INVALID);
    expect(err instanceof InstallerError && err.isPreflight).toBe(true);
    expect(err instanceof InstallerError && err.hint).toBe('Check the profile with: aws sts get-caller-identity --profile sts');
  });
});
