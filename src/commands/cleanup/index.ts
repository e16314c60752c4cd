import { Command } from 'commander';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { commandLogger, globalOptions } from '../../lib/command/global-options.js';
import { confirm } from '../../lib/utils/prompt-utils.js';
import { CONFIG_DEFAULTS, loadConfigFile, loadConfigFromEnv, mergeLayers } from '../../config/index.js';
import { NodeCommandExecutor } from '../../exec/executor.js';
import { runCleanup } from '../../cleanup/cleanup.js';

interface CleanupCommandOptions {
  clusterName?: string;
  region?: string;
  releaseImage?: string;
  fromArtifacts?: string;
  yes?: boolean;
}

export const cleanupCommand = new Command('cleanup')
  .description('Delete AWS resources (infrastructure, IAM roles, OIDC provider, S3 bucket) created by an installation')
  .option('--cluster-name <name>', 'Cluster name (not needed with --from-artifacts)')
  .option('--region <region>', 'AWS region (not needed with --from-artifacts)')
  .option('--release-image <image>', 'Release image, used to locate the matching binaries')
  .option('--from-artifacts <dir>', 'Cluster artifact directory, e.g. artifacts/clusters/my-cluster')
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(
    withErrorHandler(async (options: CleanupCommandOptions, command: Command) => {
      const log = commandLogger(command);
      const shared = mergeLayers(loadConfigFromEnv(), loadConfigFile(globalOptions(command).config));

      await runCleanup(
        {
          clusterName: options.clusterName,
          region: options.region,
          releaseImage: options.releaseImage,
          fromArtifacts: options.fromArtifacts,
          yes: options.yes,
          awsProfile: shared.awsProfile ?? CONFIG_DEFAULTS.awsProfile,
          artifactsDir: shared.artifactsDir ?? CONFIG_DEFAULTS.artifactsDir,
        },
        { executor: new NodeCommandExecutor(log), log, confirm },
      );
    }),
  );
