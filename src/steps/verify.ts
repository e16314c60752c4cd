import { fileExists } from '../artifacts/predicates.js';
import { CommandError, InstallerError, ErrorCode, errorMessage } from '../lib/errors.js';
import type { Step, StepContext } from './types.js';

/** Fields an STS-style credentials secret carries instead of static keys */
const STS_MARKERS = ['role_arn', 'web_identity_token_file'] as const;

export function mentionsStsCredentials(secretJson: string): boolean {
  return STS_MARKERS.some((marker) => secretJson.includes(marker));
}

/** oc reports a missing object as `Error from server (NotFound): ...` */
export function isNotFound(err: unknown): boolean {
  return err instanceof CommandError && err.stderr.includes('NotFound');
}

// ── 11. verify ──

/**
 * Post-install sanity checks. Only a missing kubeconfig fails the step;
 * the cluster checks report warnings.
 */
export class VerifyInstallationStep implements Step {
  readonly name = 'Verify installation';

  constructor(private readonly ctx: StepContext) {}

  async execute(): Promise<void> {
    const { store, config, executor, log } = this.ctx;
    const kubeconfig = store.kubeconfig(config.clusterName);
    if (!fileExists(kubeconfig)) {
      throw new InstallerError(
        ErrorCode.KUBECONFIG_MISSING,
        `kubeconfig not found at ${kubeconfig}`,
        'Run the deploy step first (--start-from-step 10)',
      );
    }
    const env = { KUBECONFIG: kubeconfig };

    // Root credentials must not exist in manual mode
    try {
      await executor.execute('oc', ['get', 'secrets', '-n', 'kube-system', 'aws-creds'], { env });
      log.warn('Secret kube-system/aws-creds exists; the cluster may not be using manual credentials');
    } catch (err) {
      if (isNotFound(err)) {
        log.info('No root AWS credentials secret found (expected)');
      } else {
        log.warn(`Could not check for kube-system/aws-creds: ${errorMessage(err)}`);
      }
    }

    try {
      const secret = await executor.execute(
        'oc',
        ['get', 'secrets', '-n', 'openshift-image-registry', 'installer-cloud-credentials', '-o', 'json'],
        { env },
      );
      if (mentionsStsCredentials(secret)) {
        log.info('Component secrets use short-lived STS credentials');
      } else {
        log.warn('installer-cloud-credentials does not reference an IAM role');
      }
    } catch {
      log.warn('Could not read openshift-image-registry/installer-cloud-credentials');
    }

    log.info(`Cluster ready. export KUBECONFIG=${kubeconfig}`);
  }
}
