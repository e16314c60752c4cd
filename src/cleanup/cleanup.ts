import { join } from 'node:path';
import type { CommandExecutor } from '../exec/executor.js';
import { runCommand } from '../exec/executor.js';
import { profileEnvOrAmbient, verifyCredentials } from '../exec/aws-credentials.js';
import type { Logger } from '../lib/logger.js';
import { InstallerError, ErrorCode, errorMessage } from '../lib/errors.js';
import { ArtifactStore } from '../artifacts/store.js';
import { dirExists, fileExists } from '../artifacts/predicates.js';
import { tryExtractVersionArch } from '../artifacts/release.js';
import { CLUSTER_METADATA_FILE, readClusterMetadata, readInstallMetadata } from '../artifacts/metadata.js';

export interface CleanupOptions {
  clusterName?: string;
  region?: string;
  releaseImage?: string;
  /** Cluster directory whose metadata.json names the cluster and region */
  fromArtifacts?: string;
  yes?: boolean;
  awsProfile: string;
  artifactsDir: string;
}

export interface CleanupDeps {
  executor: CommandExecutor;
  log: Logger;
  confirm: (question: string) => Promise<boolean>;
  store?: ArtifactStore;
  skipCredentialsCheck?: boolean;
}

export interface CleanupTarget {
  clusterName: string;
  region: string;
  /** Directory holding metadata.json for `openshift-install destroy`, when known */
  clusterDir: string | null;
  versionArch: string | null;
}

export type CleanupResult = 'completed' | 'cancelled';

function releaseImageFrom(clusterDir: string): string | undefined {
  try {
    return readInstallMetadata(clusterDir).releaseImage;
  } catch {
    return undefined;
  }
}

/** Work out what to delete from flags, or from a cluster directory's metadata */
export function resolveCleanupTarget(options: CleanupOptions, store: ArtifactStore): CleanupTarget {
  if (options.fromArtifacts) {
    const dir = options.fromArtifacts;
    let clusterName: string;
    let region: string;
    try {
      const metadata = readClusterMetadata(dir);
      clusterName = options.clusterName || metadata.clusterName;
      region = options.region || metadata.aws.region;
    } catch (err) {
      throw new InstallerError(
        ErrorCode.METADATA_NOT_FOUND,
        `could not find cluster name and region in ${dir}: ${errorMessage(err)}`,
        'Provide them instead: openshift-sts-installer cleanup --cluster-name=my-cluster --region=us-east-2',
      );
    }
    if (!region) {
      throw new InstallerError(
        ErrorCode.REGION_UNKNOWN,
        `${CLUSTER_METADATA_FILE} in ${dir} has no AWS region`,
        'Pass --region',
      );
    }
    const releaseImage = options.releaseImage || releaseImageFrom(dir);
    return {
      clusterName,
      region,
      clusterDir: dir,
      versionArch: releaseImage ? tryExtractVersionArch(releaseImage) : null,
    };
  }

  if (!options.clusterName || !options.region) {
    throw new InstallerError(
      ErrorCode.CONFIG_INVALID,
      'Either --from-artifacts must be provided, or both --cluster-name and --region are required',
      'Examples:\n  openshift-sts-installer cleanup --from-artifacts=artifacts/clusters/my-cluster\n' +
        '  openshift-sts-installer cleanup --cluster-name=my-cluster --region=us-east-2',
    );
  }

  const candidate = store.clusterDir(options.clusterName);
  const clusterDir = dirExists(candidate) ? candidate : null;
  const releaseImage = options.releaseImage || (clusterDir ? releaseImageFrom(clusterDir) : undefined);
  return {
    clusterName: options.clusterName,
    region: options.region,
    clusterDir,
    versionArch: releaseImage ? tryExtractVersionArch(releaseImage) : null,
  };
}

/**
 * Delete what an installation created on AWS: first the cluster
 * infrastructure via `openshift-install destroy`, then the IAM roles, OIDC
 * provider and bucket via `ccoctl aws delete`.
 *
 * A failed destroy is reported and cleanup carries on; a failed
 * `ccoctl aws delete` is thrown.
 */
export async function runCleanup(options: CleanupOptions, deps: CleanupDeps): Promise<CleanupResult> {
  const { executor, log } = deps;
  const store = deps.store ?? new ArtifactStore(options.artifactsDir);

  if (options.fromArtifacts) {
    log.info(`Reading cluster information from ${options.fromArtifacts}`);
  }
  const target = resolveCleanupTarget(options, store);
  log.info(`Cluster Name: ${target.clusterName}`);
  log.info(`AWS Region: ${target.region}`);

  if (!deps.skipCredentialsCheck) {
    log.info(`Validating AWS credentials for profile '${options.awsProfile}'...`);
    await verifyCredentials(executor, options.awsProfile);
    log.completeStep('AWS credentials are valid');
  }

  if (!options.yes) {
    const proceed = await deps.confirm(
      `This will delete AWS resources for cluster '${target.clusterName}' in region '${target.region}'. Continue?`,
    );
    if (!proceed) {
      log.info('Cleanup cancelled.');
      return 'cancelled';
    }
  }

  const env = await profileEnvOrAmbient(executor, log, options.awsProfile);

  // ── Infrastructure ──
  const installer = target.versionArch ? store.binary(target.versionArch, 'openshift-install') : null;
  if (!target.clusterDir || !fileExists(join(target.clusterDir, CLUSTER_METADATA_FILE))) {
    log.info('No cluster metadata found, skipping openshift-install destroy');
  } else if (!installer || !fileExists(installer)) {
    log.info('openshift-install binary for this release not found, skipping openshift-install destroy');
    log.info(`If infrastructure remains, run: openshift-install destroy cluster --dir ${target.clusterDir}`);
  } else {
    log.startStep('Destroy OpenShift infrastructure');
    try {
      await executor.executeInteractive(
        installer,
        ['destroy', 'cluster', '--dir', target.clusterDir, '--log-level=debug'],
        { env },
      );
      log.completeStep('Destroy OpenShift infrastructure');
    } catch (err) {
      log.failStep('Destroy OpenShift infrastructure');
      log.error(`Failed to destroy infrastructure: ${errorMessage(err)}`);
      log.info('Continuing with ccoctl cleanup...');
    }
  }

  // ── IAM roles, OIDC provider, bucket ──
  const versionCcoctl = target.versionArch ? store.binary(target.versionArch, 'ccoctl') : null;
  const ccoctl = versionCcoctl && fileExists(versionCcoctl) ? versionCcoctl : 'ccoctl';

  log.startStep('Clean up IAM roles and S3 bucket');
  try {
    await runCommand(
      executor,
      log,
      ccoctl,
      ['aws', 'delete', '--name', target.clusterName, '--region', target.region],
      { env },
    );
  } catch (err) {
    log.failStep('Clean up IAM roles and S3 bucket');
    log.info('You may need to manually delete AWS resources.');
    throw err;
  }
  log.completeStep('Clean up IAM roles and S3 bucket');
  log.info('All AWS resources have been deleted.');
  return 'completed';
}
