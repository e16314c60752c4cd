import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Configuration } from '../config/types.js';
import type { CommandExecutor } from '../exec/executor.js';
import { verifyCredentials } from '../exec/aws-credentials.js';
import type { Logger } from '../lib/logger.js';
import { InstallerError, ErrorCode } from '../lib/errors.js';
import { ArtifactStore } from '../artifacts/store.js';
import { dirExists, fileExists } from '../artifacts/predicates.js';

const pullSecretSchema = z.object({
  auths: z.record(z.object({ auth: z.string().optional() }).passthrough()),
});

/**
 * Refuse to start over an existing cluster directory unless the operator
 * asked to resume, so a typo never mixes two clusters' artifacts.
 */
export function assertClusterDirAvailable(
  config: Pick<Configuration, 'clusterName' | 'resume' | 'startFromStep'>,
  store: ArtifactStore,
): void {
  const dir = store.clusterDir(config.clusterName);
  if (!dirExists(dir) || config.resume || config.startFromStep > 0) return;
  throw new InstallerError(
    ErrorCode.CLUSTER_EXISTS,
    `cluster directory already exists: ${dir}`,
    'Pass --resume to continue this installation, or choose another --cluster-name',
  );
}

export function validatePullSecret(path: string): void {
  if (!fileExists(path)) {
    throw new InstallerError(
      ErrorCode.PULL_SECRET_MISSING,
      `pull secret not found: ${path}`,
      'Download it from https://console.redhat.com/openshift/install/pull-secret',
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    throw new InstallerError(ErrorCode.PULL_SECRET_INVALID, `pull secret is not valid JSON: ${path}`);
  }

  if (!pullSecretSchema.safeParse(raw).success) {
    throw new InstallerError(ErrorCode.PULL_SECRET_INVALID, `pull secret has no "auths" section: ${path}`);
  }
}

export interface PreflightOptions {
  executor: CommandExecutor;
  log: Logger;
  store: ArtifactStore;
  skipCredentialsCheck?: boolean;
}

export async function runPreflight(config: Configuration, options: PreflightOptions): Promise<void> {
  const { log } = options;

  assertClusterDirAvailable(config, options.store);
  validatePullSecret(config.pullSecretPath);

  if (options.skipCredentialsCheck) {
    log.debug('Skipping AWS credential validation');
    return;
  }
  log.info(`Validating AWS credentials for profile '${config.awsProfile}'...`);
  await verifyCredentials(options.executor, config.awsProfile);
  log.completeStep('AWS credentials are valid');
}
