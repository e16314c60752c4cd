import { backupInstallConfigBridge, saveInstallMetadataBridge } from '../pipeline/bridges.js';
import { CopyManifestsStep, CopyTlsStep } from './copy.js';
import { CreateAwsResourcesStep, CreateManifestsStep, DeployClusterStep } from './deploy.js';
import { ExtractCcoctlStep, ExtractCredentialsRequestsStep, ExtractInstallerStep } from './extract.js';
import { CreateInstallConfigStep, SetManualCredentialsStep } from './install-config.js';
import { VerifyInstallationStep } from './verify.js';
import type { CatalogEntry } from './types.js';
import { LAST_STEP } from '../config/types.js';

/**
 * The installer workflow in execution order. Step numbers are a stable
 * contract: operators pass them to --start-from-step.
 */
export const STEP_CATALOG: readonly CatalogEntry[] = [
  {
    number: 1,
    name: 'Extract credentials requests',
    create: (ctx) => new ExtractCredentialsRequestsStep(ctx),
    bridges: [saveInstallMetadataBridge],
  },
  { number: 2, name: 'Extract openshift-install binary', create: (ctx) => new ExtractInstallerStep(ctx) },
  { number: 3, name: 'Extract ccoctl binary', create: (ctx) => new ExtractCcoctlStep(ctx) },
  { number: 4, name: 'Create install-config.yaml', create: (ctx) => new CreateInstallConfigStep(ctx) },
  {
    number: 5,
    name: 'Set credentialsMode to Manual',
    create: (ctx) => new SetManualCredentialsStep(ctx),
    bridges: [backupInstallConfigBridge],
  },
  { number: 6, name: 'Create manifests', create: (ctx) => new CreateManifestsStep(ctx) },
  { number: 7, name: 'Create AWS resources', create: (ctx) => new CreateAwsResourcesStep(ctx) },
  { number: 8, name: 'Copy manifests', create: (ctx) => new CopyManifestsStep(ctx) },
  { number: 9, name: 'Copy TLS files', create: (ctx) => new CopyTlsStep(ctx) },
  { number: 10, name: 'Deploy cluster', create: (ctx) => new DeployClusterStep(ctx) },
  { number: 11, name: 'Verify installation', create: (ctx) => new VerifyInstallationStep(ctx) },
];

export { LAST_STEP };

export function stepLabel(entry: Pick<CatalogEntry, 'number' | 'name'>): string {
  return `[Step ${entry.number}] ${entry.name}`;
}
