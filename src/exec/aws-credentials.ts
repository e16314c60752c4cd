import { z } from 'zod';
import { InstallerError, ErrorCode, errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { CommandExecutor } from './executor.js';

/** Shape printed by `aws configure export-credentials --format process` */
const exportedCredentialsSchema = z.object({
  Version: z.number().optional(),
  AccessKeyId: z.string().min(1),
  SecretAccessKey: z.string().min(1),
  SessionToken: z.string().optional(),
  Expiration: z.string().optional(),
});

export type CredentialResolution =
  | { status: 'available'; env: Record<string, string> }
  | { status: 'unavailable'; reason: string };

/**
 * Resolve a named AWS profile into environment variables for child processes.
 *
 * Never throws: an unusable profile comes back as `unavailable` and callers
 * fall back to whatever credentials the child would find on its own.
 */
export async function resolveProfileEnv(
  executor: CommandExecutor,
  profile: string,
): Promise<CredentialResolution> {
  let output: string;
  try {
    output = await executor.execute('aws', [
      'configure',
      'export-credentials',
      '--profile',
      profile,
      '--format',
      'process',
    ]);
  } catch (err) {
    return { status: 'unavailable', reason: errorMessage(err) };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch {
    return { status: 'unavailable', reason: 'aws CLI returned non-JSON credentials' };
  }

  const parsed = exportedCredentialsSchema.safeParse(raw);
  if (!parsed.success) {
    return { status: 'unavailable', reason: 'aws CLI returned incomplete credentials' };
  }

  const env: Record<string, string> = {
    AWS_ACCESS_KEY_ID: parsed.data.AccessKeyId,
    AWS_SECRET_ACCESS_KEY: parsed.data.SecretAccessKey,
  };
  if (parsed.data.SessionToken) {
    env.AWS_SESSION_TOKEN = parsed.data.SessionToken;
  }
  return { status: 'available', env };
}

/** Resolve profile env, logging the fallback at debug level */
export async function profileEnvOrAmbient(
  executor: CommandExecutor,
  log: Logger,
  profile: string,
): Promise<Record<string, string> | undefined> {
  const resolution = await resolveProfileEnv(executor, profile);
  switch (resolution.status) {
    case 'available':
      return resolution.env;
    case 'unavailable':
      log.debug(`Could not read AWS credentials from profile '${profile}': ${resolution.reason}`);
      log.debug('Proceeding without setting AWS credentials from profile');
      return undefined;
  }
}

/** Fail fast when the profile cannot authenticate at all */
export async function verifyCredentials(executor: CommandExecutor, profile: string): Promise<void> {
  try {
    await executor.execute('aws', ['sts', 'get-caller-identity', '--profile', profile]);
  } catch (err) {
    throw new InstallerError(
      ErrorCode.CREDENTIALS_INVALID,
      `AWS credential validation failed for profile '${profile}': ${errorMessage(err)}`,
      `Check the profile with: aws sts get-caller-identity --profile ${profile}`,
    );
  }
}
