import { chmodSync, constants, copyFileSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { runCommand } from '../exec/executor.js';
import { ensureDir } from '../artifacts/predicates.js';
import { InstallerError, ErrorCode, errorMessage } from '../lib/errors.js';
import type { Step, StepContext } from './types.js';

const EXECUTABLE_MODE = 0o755;
const CCOCTL_IMAGE_PATH = '/usr/bin/ccoctl';

/** Absolute path, since step 3 runs `oc` from a scratch directory */
function registryConfig(ctx: StepContext): string {
  return `--registry-config=${resolve(ctx.config.pullSecretPath)}`;
}

const MISSING_BINARY_HINT =
  'Check that the pull secret can read the release image and that the release ships this architecture';

/** Extraction exits 0 even when the image holds nothing at the requested path */
function missingBinary(path: string, producedBy: string, err: unknown): InstallerError {
  return new InstallerError(
    ErrorCode.ARTIFACT_READ_FAILED,
    `${producedBy} did not produce ${path}: ${errorMessage(err)}`,
    MISSING_BINARY_HINT,
  );
}

function makeExecutable(path: string, producedBy: string): void {
  try {
    chmodSync(path, EXECUTABLE_MODE);
  } catch (err) {
    throw missingBinary(path, producedBy, err);
  }
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

// ── 1. credentials requests ──

export class ExtractCredentialsRequestsStep implements Step {
  readonly name = 'Extract credentials requests';

  constructor(private readonly ctx: StepContext) {}

  async execute(): Promise<void> {
    const { store, versionArch, config } = this.ctx;
    const dir = store.credReqsDir(versionArch);
    ensureDir(dir);

    await runCommand(this.ctx.executor, this.ctx.log, 'oc', [
      'adm',
      'release',
      'extract',
      '--credentials-requests',
      '--cloud=aws',
      `--to=${dir}`,
      registryConfig(this.ctx),
      config.releaseImage,
    ]);
  }
}

// ── 2. openshift-install ──

export class ExtractInstallerStep implements Step {
  readonly name = 'Extract openshift-install binary';

  constructor(private readonly ctx: StepContext) {}

  async execute(): Promise<void> {
    const { store, versionArch, config } = this.ctx;
    const binDir = store.binDir(versionArch);
    ensureDir(binDir);

    await runCommand(this.ctx.executor, this.ctx.log, 'oc', [
      'adm',
      'release',
      'extract',
      '--command=openshift-install',
      `--to=${binDir}`,
      registryConfig(this.ctx),
      config.releaseImage,
    ]);

    makeExecutable(store.binary(versionArch, 'openshift-install'), 'oc adm release extract');
  }
}

// ── 3. ccoctl ──

/**
 * ccoctl ships inside the cloud-credential-operator image rather than the
 * release payload, so this step first resolves that image, extracts the
 * binary into a private scratch directory, then moves it into place.
 */
export class ExtractCcoctlStep implements Step {
  readonly name = 'Extract ccoctl binary';

  constructor(private readonly ctx: StepContext) {}

  async execute(): Promise<void> {
    const { store, versionArch, config, executor, log } = this.ctx;
    const binDir = store.binDir(versionArch);
    ensureDir(binDir);

    const ccoImage = (
      await runCommand(executor, log, 'oc', [
        'adm',
        'release',
        'info',
        '--image-for=cloud-credential-operator',
        registryConfig(this.ctx),
        config.releaseImage,
      ])
    ).trim();
    log.debug(`cloud-credential-operator image: ${ccoImage}`);

    const scratch = mkdtempSync(join(tmpdir(), 'ccoctl-extract-'));
    try {
      await runCommand(
        executor,
        log,
        'oc',
        ['image', 'extract', ccoImage, `--file=${CCOCTL_IMAGE_PATH}`, registryConfig(this.ctx)],
        { cwd: scratch },
      );

      const extracted = join(scratch, 'ccoctl');
      const target = store.binary(versionArch, 'ccoctl');
      try {
        copyFileSync(extracted, target, constants.COPYFILE_EXCL);
      } catch (err) {
        if (!isAlreadyExists(err)) throw missingBinary(extracted, 'oc image extract', err);
        log.debug(`ccoctl already present at ${target}, keeping existing binary`);
      }
      makeExecutable(target, 'oc image extract');
    } finally {
      try {
        rmSync(scratch, { recursive: true, force: true });
      } catch (err) {
        log.debug(`Could not remove ${scratch}: ${errorMessage(err)}`);
      }
    }
  }
}
