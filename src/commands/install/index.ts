import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { commandLogger, globalOptions, parseStepNumber } from '../../lib/command/global-options.js';
import { loadConfiguration } from '../../config/index.js';
import { NodeCommandExecutor } from '../../exec/executor.js';
import { ArtifactStore } from '../../artifacts/store.js';
import { extractVersionArch } from '../../artifacts/release.js';
import { EventLog, runPipeline, runPreflight } from '../../pipeline/index.js';
import { LAST_STEP, STEP_CATALOG } from '../../steps/catalog.js';

interface InstallOptions {
  clusterName: string;
  releaseImage?: string;
  awsProfile?: string;
  pullSecret?: string;
  region?: string;
  baseDomain?: string;
  sshKey?: string;
  instanceType?: string;
  privateBucket?: boolean;
  startFromStep?: number;
  confirmEachStep?: boolean;
  resume?: boolean;
  artifactsDir?: string;
  eventLog?: string;
  skipCredentialsCheck?: boolean;
}

export const installCommand = new Command('install')
  .description('Install an OpenShift cluster on AWS with STS (manual) credentials')
  .requiredOption('--cluster-name <name>', 'Cluster name; also names the cluster artifact directory')
  .option('--release-image <image>', 'OpenShift release image, e.g. quay.io/openshift-release-dev/ocp-release:4.12.0-x86_64')
  .option('--aws-profile <profile>', 'AWS profile (default: "default")')
  .option('--pull-secret <file>', 'Pull secret file (default: pull-secret.json)')
  .option('--region <region>', 'AWS region')
  .option('--base-domain <domain>', 'Route 53 base domain')
  .option('--ssh-key <file>', 'SSH public key file')
  .option('--instance-type <type>', 'EC2 instance type for control plane and compute (default: m5.4xlarge)')
  .option('--private-bucket', 'Create a private S3 bucket behind CloudFront for the OIDC provider')
  .option('--start-from-step <n>', `Skip steps before <n> (1-${LAST_STEP})`, parseStepNumber(LAST_STEP))
  .option('--confirm-each-step', 'Ask before running each step')
  .option('--resume', 'Continue an installation in an existing cluster directory')
  .option('--artifacts-dir <dir>', 'Root of the artifact tree (default: artifacts)')
  .option('--event-log <file>', 'Append step events as JSON lines to <file>')
  .option('--skip-credentials-check', 'Do not validate AWS credentials before starting')
  .action(
    withErrorHandler(async (options: InstallOptions, command: Command) => {
      const log = commandLogger(command);
      const config = loadConfiguration({
        configFile: globalOptions(command).config,
        flags: {
          clusterName: options.clusterName,
          releaseImage: options.releaseImage,
          awsProfile: options.awsProfile,
          pullSecretPath: options.pullSecret,
          region: options.region,
          baseDomain: options.baseDomain,
          sshKeyPath: options.sshKey,
          instanceType: options.instanceType,
          privateBucket: options.privateBucket,
          startFromStep: options.startFromStep,
          confirmEachStep: options.confirmEachStep,
          resume: options.resume,
          artifactsDir: options.artifactsDir,
        },
      });

      const store = new ArtifactStore(config.artifactsDir);
      const executor = new NodeCommandExecutor(log);

      console.log(`Cluster: ${chalk.bold(config.clusterName)}`);
      console.log(`  Release: ${config.releaseImage} (${extractVersionArch(config.releaseImage)})`);
      console.log(`  Artifacts: ${store.clusterDir(config.clusterName)}`);
      if (config.startFromStep > 0) {
        console.log(`  Starting from step ${config.startFromStep}`);
      }
      console.log('');

      await runPreflight(config, {
        executor,
        log,
        store,
        skipCredentialsCheck: options.skipCredentialsCheck,
      });

      const eventLog = options.eventLog ? new EventLog(resolve(options.eventLog), config.clusterName) : undefined;
      const summary = await runPipeline(config, STEP_CATALOG, {
        executor,
        log,
        store,
        onEvent: eventLog ? (event) => eventLog.append(event) : undefined,
      });

      console.log(summary.toString());
      if (summary.hasFailures()) {
        process.exit(1);
      }
    }),
  );
