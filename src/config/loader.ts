import { readFileSync } from 'node:fs';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { InstallerError, ErrorCode } from '../lib/errors.js';
import { fileExists } from '../artifacts/predicates.js';
import {
  configFileSchema,
  configurationSchema,
  CONFIG_DEFAULTS,
  type ConfigLayer,
  type Configuration,
  type SharedConfigLayer,
} from './types.js';

const ENV_PREFIX = 'OPENSHIFT_STS_';

// ── Error formatting ──

export function formatConfigError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('\n  ');
}

// ── Sources ──

/** Read OPENSHIFT_STS_* variables. The cluster name is never taken from the environment. */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SharedConfigLayer {
  const read = (name: string) => env[ENV_PREFIX + name] || undefined;
  const flag = (name: string) => (read(name) === 'true' ? true : undefined);

  return {
    releaseImage: read('RELEASE_IMAGE'),
    region: read('AWS_REGION'),
    baseDomain: read('BASE_DOMAIN'),
    sshKeyPath: read('SSH_KEY_PATH'),
    awsProfile: read('AWS_PROFILE'),
    pullSecretPath: read('PULL_SECRET_PATH'),
    privateBucket: flag('PRIVATE_BUCKET'),
    confirmEachStep: flag('CONFIRM_EACH_STEP'),
    instanceType: read('INSTANCE_TYPE'),
  };
}

/** Parse a YAML config file body. Throws InstallerError on failure. */
export function parseConfigYaml(content: string, source = 'config file'): SharedConfigLayer {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new InstallerError(
      ErrorCode.CONFIG_INVALID,
      `Invalid YAML in ${source}: ${err instanceof Error ? err.message : String(err)}`,
      'Check the file for syntax errors (indentation, colons, etc.)',
    );
  }

  // An empty file is an empty layer
  if (raw === null || raw === undefined) return {};

  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new InstallerError(
      ErrorCode.CONFIG_INVALID,
      `Invalid ${source}:\n  ${formatConfigError(result.error)}`,
    );
  }

  const file = result.data;
  return {
    releaseImage: file.releaseImage,
    region: file.awsRegion,
    baseDomain: file.baseDomain,
    sshKeyPath: file.sshKeyPath,
    awsProfile: file.awsProfile,
    pullSecretPath: file.pullSecretPath,
    privateBucket: file.privateBucket,
    startFromStep: file.startFromStep,
    confirmEachStep: file.confirmEachStep,
    instanceType: file.instanceType,
    artifactsDir: file.artifactsDir,
  };
}

/**
 * Load the config file. A missing default file is not an error;
 * a missing file the operator named explicitly is.
 */
export function loadConfigFile(path: string | undefined): SharedConfigLayer {
  const target = path ?? CONFIG_DEFAULTS.configFile;
  if (!fileExists(target)) {
    if (path) {
      throw new InstallerError(
        ErrorCode.CONFIG_NOT_FOUND,
        `config file not found: ${path}`,
        `Omit --config to use ./${CONFIG_DEFAULTS.configFile} when present`,
      );
    }
    return {};
  }

  return parseConfigYaml(readFileSync(target, 'utf-8'), target);
}

// ── Merge ──

function override<T extends string | number | boolean>(current: T | undefined, next: T | undefined): T | undefined {
  return next === undefined || next === '' || next === false || next === 0 ? current : next;
}

/** Merge layers left to right; later non-empty values win */
export function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
  return layers.reduce<ConfigLayer>(
    (merged, layer) => ({
      releaseImage: override(merged.releaseImage, layer.releaseImage),
      clusterName: override(merged.clusterName, layer.clusterName),
      region: override(merged.region, layer.region),
      baseDomain: override(merged.baseDomain, layer.baseDomain),
      sshKeyPath: override(merged.sshKeyPath, layer.sshKeyPath),
      awsProfile: override(merged.awsProfile, layer.awsProfile),
      pullSecretPath: override(merged.pullSecretPath, layer.pullSecretPath),
      instanceType: override(merged.instanceType, layer.instanceType),
      privateBucket: override(merged.privateBucket, layer.privateBucket),
      startFromStep: override(merged.startFromStep, layer.startFromStep),
      confirmEachStep: override(merged.confirmEachStep, layer.confirmEachStep),
      resume: override(merged.resume, layer.resume),
      artifactsDir: override(merged.artifactsDir, layer.artifactsDir),
    }),
    {},
  );
}

/** Apply defaults and validate. Throws InstallerError(CONFIG_INVALID). */
export function buildConfiguration(layer: ConfigLayer): Configuration {
  const result = configurationSchema.safeParse(layer);
  if (!result.success) {
    throw new InstallerError(
      ErrorCode.CONFIG_INVALID,
      `Configuration error:\n  ${formatConfigError(result.error)}`,
      'Run: openshift-sts-installer install --help',
    );
  }
  return Object.freeze(result.data);
}

export interface LoadConfigurationOptions {
  /** Values from command-line flags; the only source allowed to set clusterName */
  flags: ConfigLayer;
  configFile?: string;
  env?: NodeJS.ProcessEnv;
}

/** Precedence: flags > config file > environment > defaults */
export function loadConfiguration(options: LoadConfigurationOptions): Configuration {
  const envLayer = loadConfigFromEnv(options.env);
  const fileLayer = loadConfigFile(options.configFile);
  return buildConfiguration(mergeLayers(envLayer, fileLayer, options.flags));
}
