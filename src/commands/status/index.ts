import { Command } from 'commander';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { globalOptions } from '../../lib/command/global-options.js';
import { CONFIG_DEFAULTS, loadConfigFile, loadConfigFromEnv, mergeLayers } from '../../config/index.js';
import { ArtifactStore } from '../../artifacts/store.js';
import { readInstallMetadata } from '../../artifacts/metadata.js';
import { tryExtractVersionArch } from '../../artifacts/release.js';
import { CompletionDetector } from '../../pipeline/index.js';
import { STEP_CATALOG } from '../../steps/catalog.js';
import type { CatalogEntry } from '../../steps/types.js';

/** Steps whose predicate can only be satisfied by --start-from-step */
const UNDETECTABLE = new Set([10, 11]);

export type StepVerdict = 'complete' | 'pending' | 'unknown';

export interface StatusReport {
  cluster: string;
  releaseImage: string | null;
  versionArch: string | null;
  steps: { number: number; name: string; verdict: StepVerdict }[];
  /** First step a plain `install --resume` would run */
  next: number | null;
}

export function buildStatusReport(
  clusterName: string,
  releaseImage: string | null,
  store: ArtifactStore,
  catalog: readonly CatalogEntry[] = STEP_CATALOG,
): StatusReport {
  const detector = new CompletionDetector(
    { clusterName, releaseImage: releaseImage ?? '', startFromStep: 0, artifactsDir: store.root },
    store,
  );

  const steps = catalog.map((entry) => ({
    number: entry.number,
    name: entry.name,
    verdict: UNDETECTABLE.has(entry.number)
      ? ('unknown' as const)
      : detector.isComplete(entry.number)
        ? ('complete' as const)
        : ('pending' as const),
  }));

  return {
    cluster: clusterName,
    releaseImage,
    versionArch: releaseImage ? tryExtractVersionArch(releaseImage) : null,
    steps,
    next: steps.find((s) => s.verdict !== 'complete')?.number ?? null,
  };
}

function verdictIcon(verdict: StepVerdict): string {
  switch (verdict) {
    case 'complete': return chalk.green('✓');
    case 'pending': return chalk.dim('○');
    case 'unknown': return chalk.dim('?');
  }
}

function printReport(report: StatusReport): void {
  console.log(`Cluster: ${chalk.bold(report.cluster)}`);
  console.log(`Release: ${report.releaseImage ?? chalk.dim('unknown')}`);
  console.log('');
  for (const s of report.steps) {
    console.log(`  ${verdictIcon(s.verdict)} ${String(s.number).padStart(2)}. ${s.name.padEnd(34)} ${chalk.dim(s.verdict)}`);
  }
  if (report.next !== null) {
    console.log('');
    console.log(chalk.dim(`  Next: step ${report.next}. Run: openshift-sts-installer install --cluster-name ${report.cluster} --resume`));
  }
}

export const statusCommand = new Command('status')
  .description('Show which installation steps are already complete on disk')
  .requiredOption('--cluster-name <name>', 'Cluster to inspect')
  .option('--release-image <image>', 'Release image (default: from install-metadata.json)')
  .option('--artifacts-dir <dir>', 'Root of the artifact tree (default: artifacts)')
  .option('--json', 'Output result as JSON')
  .action(
    withErrorHandler(async (
      options: { clusterName: string; releaseImage?: string; artifactsDir?: string; json?: boolean },
      command: Command,
    ) => {
      const shared = mergeLayers(loadConfigFromEnv(), loadConfigFile(globalOptions(command).config));
      const store = new ArtifactStore(options.artifactsDir ?? shared.artifactsDir ?? CONFIG_DEFAULTS.artifactsDir);

      let releaseImage = options.releaseImage ?? null;
      if (!releaseImage) {
        try {
          releaseImage = readInstallMetadata(store.clusterDir(options.clusterName)).releaseImage;
        } catch {
          releaseImage = shared.releaseImage ?? null;
        }
      }

      const report = buildStatusReport(options.clusterName, releaseImage, store);
      if (options.json) {
        console.log(JSON.stringify(report));
        return;
      }
      printReport(report);
    }),
  );
