import { readFileSync } from 'node:fs';
import YAML, { Document, YAMLMap, isMap, isScalar, isSeq } from 'yaml';
import { z } from 'zod';
import { InstallerError, ErrorCode, errorMessage } from '../lib/errors.js';
import { fileExists } from './predicates.js';

export const DEFAULT_INSTANCE_TYPE = 'm5.4xlarge';
export const MANUAL_CREDENTIALS_MARKER = 'credentialsMode: Manual';

// ── In-place patch ──

export interface PatchResult {
  content: string;
  /** Dotted paths that were added; empty when the document already conformed */
  changes: string[];
}

function childMap(parent: YAMLMap, key: string): YAMLMap {
  const node = parent.get(key);
  if (isMap(node)) return node;
  const created = new YAMLMap();
  parent.set(key, created);
  return created;
}

/** Set platform.aws.type on a machine pool unless the operator already chose one */
function ensurePoolType(pool: YAMLMap, instanceType: string): boolean {
  const aws = childMap(childMap(pool, 'platform'), 'aws');
  const current: unknown = aws.get('type');
  if (current !== undefined && current !== null && current !== '') return false;
  aws.set('type', instanceType);
  return true;
}

/**
 * Switch an install-config document to manual (STS) credentials and pin
 * instance types on every machine pool.
 *
 * Only absent values are filled in. Comments, key order and untouched
 * fields survive, and a conforming document is returned byte-for-byte.
 */
export function patchInstallConfig(source: string, instanceType: string): PatchResult {
  const doc = YAML.parseDocument(source);
  const [parseError] = doc.errors;
  if (parseError) {
    throw new InstallerError(
      ErrorCode.INSTALL_CONFIG_INVALID,
      `failed to parse install-config.yaml: ${parseError.message}`,
    );
  }

  const root = doc.contents;
  if (!isMap(root)) {
    throw new InstallerError(
      ErrorCode.INSTALL_CONFIG_INVALID,
      'install-config.yaml must contain a YAML mapping at the top level',
    );
  }

  const type = instanceType.trim() || DEFAULT_INSTANCE_TYPE;
  const changes: string[] = [];

  if (!root.has('credentialsMode')) {
    doc.set('credentialsMode', 'Manual');
    changes.push('credentialsMode');
  }

  const controlPlane = root.get('controlPlane');
  if (isMap(controlPlane) && ensurePoolType(controlPlane, type)) {
    changes.push('controlPlane.platform.aws.type');
  }

  const compute = root.get('compute');
  if (isSeq(compute)) {
    compute.items.forEach((pool, i) => {
      if (isMap(pool) && ensurePoolType(pool, type)) {
        changes.push(`compute[${i}].platform.aws.type`);
      }
    });
  }

  return {
    content: changes.length > 0 ? doc.toString() : source,
    changes,
  };
}

// ── Field extraction ──

const installConfigFieldsSchema = z
  .object({
    baseDomain: z.string().optional(),
    metadata: z.object({ name: z.string().optional() }).passthrough().optional(),
    platform: z
      .object({
        aws: z.object({ region: z.string().optional() }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export interface InstallConfigFields {
  clusterName?: string;
  region?: string;
  baseDomain?: string;
}

export function readInstallConfigFields(path: string): InstallConfigFields {
  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new InstallerError(
      ErrorCode.ARTIFACT_READ_FAILED,
      `failed to read ${path}: ${errorMessage(err)}`,
    );
  }

  const result = installConfigFieldsSchema.safeParse(raw);
  if (!result.success) {
    throw new InstallerError(
      ErrorCode.INSTALL_CONFIG_INVALID,
      `unexpected structure in ${path}: ${result.error.issues[0]?.message ?? 'invalid document'}`,
    );
  }

  const data = result.data;
  return {
    clusterName: data.metadata?.name || undefined,
    region: data.platform?.aws?.region || undefined,
    baseDomain: data.baseDomain || undefined,
  };
}

/** First region found in the candidate install-config files, or null */
export function findRegion(candidates: readonly string[]): string | null {
  for (const path of candidates) {
    if (!fileExists(path)) continue;
    try {
      const { region } = readInstallConfigFields(path);
      if (region) return region;
    } catch {
      // Unreadable candidate: try the next one
    }
  }
  return null;
}

// ── Non-interactive generation ──

export interface InstallConfigValues {
  clusterName: string;
  baseDomain: string;
  region: string;
  sshKey: string;
  pullSecret: string;
  instanceType?: string;
}

function machinePool(name: string, instanceType: string): Record<string, unknown> {
  return {
    architecture: 'amd64',
    hyperthreading: 'Enabled',
    name,
    platform: { aws: { type: instanceType } },
    replicas: 3,
  };
}

/** Render a complete install-config.yaml for an AWS cluster */
export function renderInstallConfig(values: InstallConfigValues): string {
  const instanceType = values.instanceType?.trim() || DEFAULT_INSTANCE_TYPE;

  const doc = new Document({
    additionalTrustBundlePolicy: 'Proxyonly',
    apiVersion: 'v1',
    baseDomain: values.baseDomain,
    compute: [machinePool('worker', instanceType)],
    controlPlane: machinePool('master', instanceType),
    metadata: {
      creationTimestamp: null,
      name: values.clusterName,
    },
    networking: {
      clusterNetwork: [{ cidr: '10.128.0.0/14', hostPrefix: 23 }],
      machineNetwork: [{ cidr: '10.0.0.0/16' }],
      networkType: 'OVNKubernetes',
      serviceNetwork: ['172.30.0.0/16'],
    },
    platform: {
      aws: {
        region: values.region,
        vpc: {},
      },
    },
    publish: 'External',
    pullSecret: values.pullSecret.trim(),
    sshKey: values.sshKey.trim(),
  });

  const sshKey = doc.get('sshKey', true);
  if (isScalar(sshKey)) {
    sshKey.type = 'BLOCK_LITERAL';
  }

  return doc.toString();
}
