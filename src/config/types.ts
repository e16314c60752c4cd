import { z } from 'zod';
import { tryExtractVersionArch } from '../artifacts/release.js';
import { DEFAULT_INSTANCE_TYPE } from '../artifacts/install-config.js';

// ── Reusable primitives ──

/** Highest step number in the installer catalog */
export const LAST_STEP = 11;

const resumePoint = z
  .number()
  .int()
  .min(0)
  .max(LAST_STEP, `startFromStep must be a step number between 1 and ${LAST_STEP}`);

/** DNS label: becomes both a cluster-scoped directory name and a resource prefix */
const clusterName = z
  .string({ required_error: 'cluster name is required (use --cluster-name flag)' })
  .min(1, 'cluster name is required (use --cluster-name flag)')
  .max(63)
  .regex(/^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/, 'cluster name must be lowercase letters, digits and dashes');

const releaseImage = z
  .string({ required_error: 'release image is required (use --release-image or releaseImage in the config file)' })
  .min(1, 'release image is required (use --release-image or releaseImage in the config file)')
  .refine((image) => tryExtractVersionArch(image) !== null, {
    message: 'release image must carry a version tag, e.g. quay.io/openshift-release-dev/ocp-release:4.12.0-x86_64',
  });

// ── Config file ──

/** Keys accepted in openshift-sts-installer.yaml. clusterName is deliberately absent. */
export const configFileSchema = z.object({
  releaseImage: z.string().optional(),
  awsRegion: z.string().optional(),
  baseDomain: z.string().optional(),
  sshKeyPath: z.string().optional(),
  awsProfile: z.string().optional(),
  pullSecretPath: z.string().optional(),
  privateBucket: z.boolean().optional(),
  startFromStep: resumePoint.optional(),
  confirmEachStep: z.boolean().optional(),
  instanceType: z.string().optional(),
  artifactsDir: z.string().optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

// ── Merge layers ──

/** One configuration source before merging. Empty values never override. */
export interface ConfigLayer {
  releaseImage?: string;
  clusterName?: string;
  region?: string;
  baseDomain?: string;
  sshKeyPath?: string;
  awsProfile?: string;
  pullSecretPath?: string;
  instanceType?: string;
  privateBucket?: boolean;
  startFromStep?: number;
  confirmEachStep?: boolean;
  resume?: boolean;
  artifactsDir?: string;
}

/** Sources other than explicit flags may not name the cluster */
export type SharedConfigLayer = Omit<ConfigLayer, 'clusterName'>;

// ── Final configuration ──

export const CONFIG_DEFAULTS = {
  awsProfile: 'default',
  pullSecretPath: 'pull-secret.json',
  instanceType: DEFAULT_INSTANCE_TYPE,
  artifactsDir: 'artifacts',
  configFile: 'openshift-sts-installer.yaml',
} as const;

export const configurationSchema = z.object({
  releaseImage,
  clusterName,
  region: z.string().min(1).optional(),
  baseDomain: z.string().min(1).optional(),
  sshKeyPath: z.string().min(1).optional(),
  awsProfile: z.string().min(1).default(CONFIG_DEFAULTS.awsProfile),
  pullSecretPath: z.string().min(1).default(CONFIG_DEFAULTS.pullSecretPath),
  instanceType: z.string().min(1).default(CONFIG_DEFAULTS.instanceType),
  privateBucket: z.boolean().default(false),
  startFromStep: resumePoint.default(0),
  confirmEachStep: z.boolean().default(false),
  resume: z.boolean().default(false),
  artifactsDir: z.string().min(1).default(CONFIG_DEFAULTS.artifactsDir),
});

/** Merged, validated, defaulted configuration. Never mutated after construction. */
export type Configuration = Readonly<z.infer<typeof configurationSchema>>;
