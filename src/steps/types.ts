import type { Configuration } from '../config/types.js';
import type { CommandExecutor } from '../exec/executor.js';
import type { Logger } from '../lib/logger.js';
import { ArtifactStore } from '../artifacts/store.js';
import { extractVersionArch } from '../artifacts/release.js';

// ── Step ──

/** One unit of installer work. Idempotent when re-run after a partial failure. */
export interface Step {
  readonly name: string;
  execute(): Promise<void>;
}

/** Everything a step may touch, resolved once per pipeline run */
export interface StepContext {
  readonly config: Configuration;
  readonly versionArch: string;
  readonly executor: CommandExecutor;
  readonly log: Logger;
  readonly store: ArtifactStore;
}

export interface StepContextOptions {
  executor: CommandExecutor;
  log: Logger;
  store?: ArtifactStore;
}

/** Throws InstallerError(RELEASE_IMAGE_INVALID) when the image has no usable tag */
export function createStepContext(config: Configuration, options: StepContextOptions): StepContext {
  return {
    config,
    versionArch: extractVersionArch(config.releaseImage),
    executor: options.executor,
    log: options.log,
    store: options.store ?? new ArtifactStore(config.artifactsDir),
  };
}

// ── Catalog ──

export interface CatalogEntry {
  /** Stable 1-based step number; shown to operators and accepted by --start-from-step */
  readonly number: number;
  readonly name: string;
  readonly create: (ctx: StepContext) => Step;
  /** Advisory follow-ups run after the step succeeds */
  readonly bridges?: readonly Bridge[];
}

export interface Bridge {
  readonly name: string;
  run(ctx: StepContext): void;
}
