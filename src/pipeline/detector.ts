import type { Configuration } from '../config/types.js';
import { ArtifactStore } from '../artifacts/store.js';
import { tryExtractVersionArch } from '../artifacts/release.js';
import { dirExistsWithFiles, fileContains, fileExists } from '../artifacts/predicates.js';
import { MANUAL_CREDENTIALS_MARKER } from '../artifacts/install-config.js';

export type SkipReason = 'completed' | 'resume-point' | 'user-choice';

type DetectorConfig = Pick<Configuration, 'releaseImage' | 'clusterName' | 'startFromStep' | 'artifactsDir'>;

/**
 * Decides from on-disk artifacts whether a step's work is already done.
 *
 * Read-only: never creates, modifies or deletes anything. Any read error
 * makes a predicate answer false, so the step runs again.
 */
export class CompletionDetector {
  private readonly versionArch: string | null;
  private readonly store: ArtifactStore;

  constructor(
    private readonly config: DetectorConfig,
    store?: ArtifactStore,
  ) {
    this.versionArch = tryExtractVersionArch(config.releaseImage);
    this.store = store ?? new ArtifactStore(config.artifactsDir);
  }

  shouldSkip(stepNumber: number): boolean {
    return this.skipReason(stepNumber) !== null;
  }

  /** Why a step would be skipped, or null when it should run */
  skipReason(stepNumber: number): Exclude<SkipReason, 'user-choice'> | null {
    const { startFromStep } = this.config;
    if (startFromStep > 0 && stepNumber < startFromStep) return 'resume-point';
    return this.isComplete(stepNumber) ? 'completed' : null;
  }

  /** The marker predicate alone, ignoring any resume override */
  isComplete(stepNumber: number): boolean {
    const { clusterName } = this.config;
    const store = this.store;
    const va = this.versionArch;

    switch (stepNumber) {
      case 1:
        return va !== null && dirExistsWithFiles(store.credReqsDir(va));
      case 2:
        return va !== null && fileExists(store.binary(va, 'openshift-install'));
      case 3:
        return va !== null && fileExists(store.binary(va, 'ccoctl'));
      case 4:
        return fileExists(store.installConfig(clusterName));
      case 5:
        return fileContains(store.installConfig(clusterName), MANUAL_CREDENTIALS_MARKER);
      case 6:
        return dirExistsWithFiles(store.stagingManifests(clusterName));
      case 7:
        return (
          dirExistsWithFiles(store.stagingManifests(clusterName)) &&
          dirExistsWithFiles(store.stagingTls(clusterName))
        );
      // Copy steps are done once their staging source has gone away
      case 8:
        return !dirExistsWithFiles(store.stagingManifests(clusterName));
      case 9:
        return !dirExistsWithFiles(store.stagingTls(clusterName));
      default:
        // 10 and 11 leave no reliable marker; unknown numbers always run
        return false;
    }
  }
}
