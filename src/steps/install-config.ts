import { readFileSync } from 'node:fs';
import { InstallerError, ErrorCode, errorMessage } from '../lib/errors.js';
import { ensureDir, fileExists, writeFileAtomic } from '../artifacts/predicates.js';
import { patchInstallConfig, renderInstallConfig } from '../artifacts/install-config.js';
import type { Step, StepContext } from './types.js';

function readText(path: string, what: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    throw new InstallerError(ErrorCode.ARTIFACT_READ_FAILED, `failed to read ${what} ${path}: ${errorMessage(err)}`);
  }
}

// ── 4. create install-config.yaml ──

export class CreateInstallConfigStep implements Step {
  readonly name = 'Create install-config.yaml';

  constructor(private readonly ctx: StepContext) {}

  async execute(): Promise<void> {
    const { config, store, log } = this.ctx;
    const clusterDir = store.clusterDir(config.clusterName);
    ensureDir(clusterDir);

    const { baseDomain, region, sshKeyPath } = config;
    if (baseDomain && region && sshKeyPath && fileExists(config.pullSecretPath)) {
      log.debug('All install-config values available, generating install-config.yaml');
      const content = renderInstallConfig({
        clusterName: config.clusterName,
        baseDomain,
        region,
        sshKey: readText(sshKeyPath, 'SSH public key'),
        pullSecret: readText(config.pullSecretPath, 'pull secret'),
        instanceType: config.instanceType,
      });
      writeFileAtomic(store.installConfig(config.clusterName), content);
      return;
    }

    // The installer prompts for whatever is missing
    await this.ctx.executor.executeInteractive(
      store.binary(this.ctx.versionArch, 'openshift-install'),
      ['create', 'install-config', '--dir', clusterDir],
    );
  }
}

// ── 5. credentialsMode: Manual ──

export class SetManualCredentialsStep implements Step {
  readonly name = 'Set credentialsMode to Manual';

  constructor(private readonly ctx: StepContext) {}

  async execute(): Promise<void> {
    const { config, store, log } = this.ctx;
    const path = store.installConfig(config.clusterName);

    const { content, changes } = patchInstallConfig(readText(path, 'install config'), config.instanceType);
    if (changes.length === 0) {
      log.debug(`${path} already conforms`);
      return;
    }

    for (const change of changes) {
      log.debug(`install-config.yaml: set ${change}`);
    }
    try {
      writeFileAtomic(path, content);
    } catch (err) {
      throw new InstallerError(ErrorCode.ARTIFACT_WRITE_FAILED, `failed to write ${path}: ${errorMessage(err)}`);
    }
  }
}
