import { join, resolve } from 'node:path';

export type SharedBinary = 'openshift-install' | 'ccoctl';

export const INSTALL_CONFIG_FILE = 'install-config.yaml';
export const STAGING_DIR = 'ccoctl-output';

/**
 * Artifact layout.
 *
 *   <root>/shared/<versionArch>/bin/{openshift-install,ccoctl}
 *   <root>/shared/<versionArch>/credreqs/*
 *   <root>/clusters/<clusterName>/{install-config.yaml, install-config.yaml.backup,
 *     ccoctl-output/{manifests,tls}, manifests/, tls/, auth/kubeconfig,
 *     metadata.json, install-metadata.json}
 *
 * Shared paths are reused by every cluster of the same release; cluster paths
 * belong to one cluster run.
 */
export class ArtifactStore {
  readonly root: string;

  constructor(root = 'artifacts') {
    this.root = resolve(root);
  }

  // ── shared, version-scoped ──

  sharedDir(versionArch: string): string {
    return join(this.root, 'shared', versionArch);
  }

  binDir(versionArch: string): string {
    return join(this.sharedDir(versionArch), 'bin');
  }

  binary(versionArch: string, name: SharedBinary): string {
    return join(this.binDir(versionArch), name);
  }

  credReqsDir(versionArch: string): string {
    return join(this.sharedDir(versionArch), 'credreqs');
  }

  // ── cluster-scoped ──

  clusterDir(clusterName: string): string {
    return join(this.root, 'clusters', clusterName);
  }

  clusterPath(clusterName: string, ...segments: string[]): string {
    return join(this.clusterDir(clusterName), ...segments);
  }

  installConfig(clusterName: string): string {
    return this.clusterPath(clusterName, INSTALL_CONFIG_FILE);
  }

  installConfigBackup(clusterName: string): string {
    return `${this.installConfig(clusterName)}.backup`;
  }

  stagingDir(clusterName: string): string {
    return this.clusterPath(clusterName, STAGING_DIR);
  }

  stagingManifests(clusterName: string): string {
    return this.clusterPath(clusterName, STAGING_DIR, 'manifests');
  }

  stagingTls(clusterName: string): string {
    return this.clusterPath(clusterName, STAGING_DIR, 'tls');
  }

  manifestsDir(clusterName: string): string {
    return this.clusterPath(clusterName, 'manifests');
  }

  tlsDir(clusterName: string): string {
    return this.clusterPath(clusterName, 'tls');
  }

  kubeconfig(clusterName: string): string {
    return this.clusterPath(clusterName, 'auth', 'kubeconfig');
  }

  clusterMetadata(clusterName: string): string {
    return this.clusterPath(clusterName, 'metadata.json');
  }

  installMetadata(clusterName: string): string {
    return this.clusterPath(clusterName, 'install-metadata.json');
  }
}
