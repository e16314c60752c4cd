import { runCommand } from '../exec/executor.js';
import { profileEnvOrAmbient } from '../exec/aws-credentials.js';
import { findRegion } from '../artifacts/install-config.js';
import { InstallerError, ErrorCode } from '../lib/errors.js';
import type { Step, StepContext } from './types.js';

// ── 6. manifests ──

export class CreateManifestsStep implements Step {
  readonly name = 'Create manifests';

  constructor(private readonly ctx: StepContext) {}

  async execute(): Promise<void> {
    const { store, config, versionArch } = this.ctx;
    await runCommand(this.ctx.executor, this.ctx.log, store.binary(versionArch, 'openshift-install'), [
      'create',
      'manifests',
      '--dir',
      store.clusterDir(config.clusterName),
    ]);
  }
}

// ── 7. IAM roles, OIDC provider and bucket ──

/**
 * The configured region wins. Otherwise read it back from install-config.yaml,
 * or from the backup once `create manifests` has consumed the original.
 */
export function resolveRegion(ctx: StepContext): string {
  const { config, store } = ctx;
  if (config.region) return config.region;

  const region = findRegion([
    store.installConfig(config.clusterName),
    store.installConfigBackup(config.clusterName),
  ]);
  if (!region) {
    throw new InstallerError(
      ErrorCode.REGION_UNKNOWN,
      'AWS region is not configured and could not be read from install-config.yaml',
      'Pass --region or set awsRegion in the config file',
    );
  }
  return region;
}

export class CreateAwsResourcesStep implements Step {
  readonly name = 'Create AWS resources';

  constructor(private readonly ctx: StepContext) {}

  async execute(): Promise<void> {
    const { store, config, versionArch, executor, log } = this.ctx;
    const region = resolveRegion(this.ctx);

    const args = [
      'aws',
      'create-all',
      '--name',
      config.clusterName,
      '--region',
      region,
      '--credentials-requests-dir',
      store.credReqsDir(versionArch),
      '--output-dir',
      store.stagingDir(config.clusterName),
    ];
    if (config.privateBucket) {
      args.push('--create-private-s3-bucket');
    }

    const env = await profileEnvOrAmbient(executor, log, config.awsProfile);
    await runCommand(executor, log, store.binary(versionArch, 'ccoctl'), args, { env });
  }
}

// ── 10. create cluster ──

export class DeployClusterStep implements Step {
  readonly name = 'Deploy cluster';

  constructor(private readonly ctx: StepContext) {}

  async execute(): Promise<void> {
    const { store, config, versionArch, executor, log } = this.ctx;
    const env = await profileEnvOrAmbient(executor, log, config.awsProfile);

    log.info('Cluster creation typically takes 30-45 minutes');
    await executor.executeInteractive(
      store.binary(versionArch, 'openshift-install'),
      ['create', 'cluster', '--dir', store.clusterDir(config.clusterName), '--log-level=debug'],
      { env },
    );
  }
}
