import { rmSync } from 'node:fs';
import { copyDir } from '../artifacts/predicates.js';
import { InstallerError, ErrorCode, errorMessage } from '../lib/errors.js';
import type { Step, StepContext } from './types.js';

function copyStaged(src: string, dst: string): void {
  try {
    copyDir(src, dst);
  } catch (err) {
    throw new InstallerError(ErrorCode.ARTIFACT_WRITE_FAILED, `failed to copy ${src} to ${dst}: ${errorMessage(err)}`);
  }
}

// ── 8. manifests ──

export class CopyManifestsStep implements Step {
  readonly name = 'Copy manifests';

  constructor(private readonly ctx: StepContext) {}

  async execute(): Promise<void> {
    const { store, config } = this.ctx;
    copyStaged(store.stagingManifests(config.clusterName), store.manifestsDir(config.clusterName));
  }
}

// ── 9. TLS ──

export type RemoveTree = (path: string) => void;

const removeTreeSync: RemoveTree = (path) => rmSync(path, { recursive: true, force: true });

export class CopyTlsStep implements Step {
  readonly name = 'Copy TLS files';

  constructor(
    private readonly ctx: StepContext,
    private readonly removeTree: RemoveTree = removeTreeSync,
  ) {}

  async execute(): Promise<void> {
    const { store, config, log } = this.ctx;
    copyStaged(store.stagingTls(config.clusterName), store.tlsDir(config.clusterName));

    // Staging output is no longer needed; leftovers only cost disk space
    const staging = store.stagingDir(config.clusterName);
    try {
      this.removeTree(staging);
    } catch (err) {
      log.debug(`Could not remove ${staging}: ${errorMessage(err)}`);
    }
  }
}
