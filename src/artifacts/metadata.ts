import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { InstallerError, ErrorCode, errorMessage } from '../lib/errors.js';
import { fileExists, writeFileAtomic } from './predicates.js';

export const INSTALL_METADATA_FILE = 'install-metadata.json';
export const CLUSTER_METADATA_FILE = 'metadata.json';

/** Written by the installer right after the first step */
export const installMetadataSchema = z.object({
  releaseImage: z.string().min(1),
});

/** Written by openshift-install when the cluster is created */
export const clusterMetadataSchema = z.object({
  clusterName: z.string().min(1),
  clusterID: z.string().default(''),
  infraID: z.string().default(''),
  aws: z
    .object({
      region: z.string().default(''),
    })
    .default({}),
});

export type InstallMetadata = z.infer<typeof installMetadataSchema>;
export type ClusterMetadata = z.infer<typeof clusterMetadataSchema>;

function readJsonRecord<S extends z.ZodTypeAny>(path: string, schema: S, label: string): z.infer<S> {
  if (!fileExists(path)) {
    throw new InstallerError(ErrorCode.METADATA_NOT_FOUND, `${label} not found at ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new InstallerError(
      ErrorCode.ARTIFACT_READ_FAILED,
      `failed to read ${label} at ${path}: ${errorMessage(err)}`,
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new InstallerError(
      ErrorCode.ARTIFACT_READ_FAILED,
      `invalid ${label} at ${path}: ${issues.join('; ')}`,
    );
  }
  return result.data;
}

export function saveInstallMetadata(clusterDir: string, releaseImage: string): string {
  const path = join(clusterDir, INSTALL_METADATA_FILE);
  const record: InstallMetadata = { releaseImage };
  try {
    writeFileAtomic(path, JSON.stringify(record, null, 2) + '\n');
  } catch (err) {
    throw new InstallerError(
      ErrorCode.ARTIFACT_WRITE_FAILED,
      `failed to write ${INSTALL_METADATA_FILE}: ${errorMessage(err)}`,
    );
  }
  return path;
}

export function readInstallMetadata(clusterDir: string): InstallMetadata {
  return readJsonRecord(join(clusterDir, INSTALL_METADATA_FILE), installMetadataSchema, INSTALL_METADATA_FILE);
}

export function readClusterMetadata(clusterDir: string): ClusterMetadata {
  return readJsonRecord(join(clusterDir, CLUSTER_METADATA_FILE), clusterMetadataSchema, CLUSTER_METADATA_FILE);
}
