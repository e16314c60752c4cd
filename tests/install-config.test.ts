import { describe, it, expect } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import YAML from 'yaml';
import { testContext } from './helpers/test-context.js';
import {
  MANUAL_CREDENTIALS_MARKER,
  findRegion,
  patchInstallConfig,
  readInstallConfigFields,
  renderInstallConfig,
} from '../src/artifacts/install-config.js';
import { ErrorCode, InstallerError } from '../src/lib/errors.js';

const ctx = testContext();

const INTERACTIVE_OUTPUT = `apiVersion: v1
baseDomain: example.com
# worker pool
compute:
- name: worker
  platform: {}
  replicas: 3
controlPlane:
  name: master
  platform: {}
  replicas: 3
metadata:
  name: demo
platform:
  aws:
    region: us-east-2
`;

const SIZED = `apiVersion: v1
controlPlane:
  name: master
  platform:
    aws:
      type: m6i.2xlarge
compute:
- name: worker
  platform:
    aws:
      type: ''
`;

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof InstallerError ? err.code : undefined;
  }
  return undefined;
}

// ── patchInstallConfig ──

describe('patchInstallConfig', () => {
  it('switches to manual credentials and sizes every pool', () => {
    const { content, changes } = patchInstallConfig(INTERACTIVE_OUTPUT, 'm5.4xlarge');

    expect(changes).toEqual([
      'credentialsMode',
      'controlPlane.platform.aws.type',
      'compute[0].platform.aws.type',
    ]);
    expect(content).toContain(MANUAL_CREDENTIALS_MARKER);

    const parsed = YAML.parse(content);
    expect(parsed.credentialsMode).toBe('Manual');
    expect(parsed.controlPlane.platform.aws.type).toBe('m5.4xlarge');
    expect(parsed.compute[0].platform.aws.type).toBe('m5.4xlarge');
    expect(parsed.platform.aws.region).toBe('us-east-2');
  });

  it('keeps comments', () => {
    const { content } = patchInstallConfig(INTERACTIVE_OUTPUT, 'm5.4xlarge');
    expect(content).toContain('# worker pool');
  });

  it('is idempotent', () => {
    const first = patchInstallConfig(INTERACTIVE_OUTPUT, 'm5.4xlarge');
    const second = patchInstallConfig(first.content, 'm5.4xlarge');

    expect(second.changes).toEqual([]);
    expect(second.content).toBe(first.content);
  });

  it('never overwrites an explicit instance type', () => {
    const { content, changes } = patchInstallConfig(SIZED, 'm5.4xlarge');
    const parsed = YAML.parse(content);

    expect(parsed.controlPlane.platform.aws.type).toBe('m6i.2xlarge');
    expect(parsed.compute[0].platform.aws.type).toBe('m5.4xlarge');
    expect(changes).toEqual(['credentialsMode', 'compute[0].platform.aws.type']);
  });

  it('leaves an existing credentialsMode alone', () => {
    const source = 'apiVersion: v1\ncredentialsMode: Mint\n';
    const { content, changes } = patchInstallConfig(source, 'm5.4xlarge');

    expect(changes).toEqual([]);
    expect(content).toBe(source);
  });

  it('falls back to the default instance type for a blank value', () => {
    const { content } = patchInstallConfig('controlPlane:\n  name: master\n', '  ');
    expect(YAML.parse(content).controlPlane.platform.aws.type).toBe('m5.4xlarge');
  });

  it('rejects unparseable YAML', () => {
    expect(codeOf(() => patchInstallConfig('compute: [\n', 'm5.4xlarge'))).toBe(ErrorCode.INSTALL_CONFIG_INVALID);
  });

  it('rejects a document that is not a mapping', () => {
    expect(codeOf(() => patchInstallConfig('- a\n- b\n', 'm5.4xlarge'))).toBe(ErrorCode.INSTALL_CONFIG_INVALID);
  });
});

// ── field extraction ──

describe('readInstallConfigFields', () => {
  it('extracts name, region and base domain', () => {
    const path = join(ctx.createTempDir(), 'install-config.yaml');
    writeFileSync(path, INTERACTIVE_OUTPUT);

    expect(readInstallConfigFields(path)).toEqual({
      clusterName: 'demo',
      region: 'us-east-2',
      baseDomain: 'example.com',
    });
  });
});

describe('findRegion', () => {
  it('uses the first candidate that names a region', () => {
    const dir = ctx.createTempDir();
    const backup = join(dir, 'install-config.yaml.backup');
    writeFileSync(backup, 'platform:\n  aws:\n    region: eu-west-1\n');

    expect(findRegion([join(dir, 'install-config.yaml'), backup])).toBe('eu-west-1');
  });

  it('skips unreadable candidates', () => {
    const dir = ctx.createTempDir();
    const broken = join(dir, 'broken.yaml');
    const good = join(dir, 'good.yaml');
    writeFileSync(broken, 'platform: [\n');
    writeFileSync(good, 'platform:\n  aws:\n    region: ap-south-1\n');

    expect(findRegion([broken, good])).toBe('ap-south-1');
  });

  it('returns null when no candidate has a region', () => {
    expect(findRegion([])).toBeNull();
  });
});

// ── generation ──

describe('renderInstallConfig', () => {
  const rendered = renderInstallConfig({
    clusterName: 'demo',
    baseDomain: 'example.com',
    region: 'us-east-2',
    sshKey: 'ssh-ed25519 AAAAtestkey user@example\n',
    pullSecret: '{"auths":{"registry.example.com":{"auth":"dGVzdDp0ZXN0"}}}\n',
  });
  const parsed = YAML.parse(rendered);

  it('fills in cluster identity and platform', () => {
    expect(parsed.apiVersion).toBe('v1');
    expect(parsed.metadata.name).toBe('demo');
    expect(parsed.baseDomain).toBe('example.com');
    expect(parsed.platform.aws.region).toBe('us-east-2');
    expect(parsed.publish).toBe('External');
  });

  it('uses the default instance type on both pools', () => {
    expect(parsed.controlPlane.platform.aws.type).toBe('m5.4xlarge');
    expect(parsed.compute[0].platform.aws.type).toBe('m5.4xlarge');
    expect(parsed.compute[0].replicas).toBe(3);
  });

  it('trims the pull secret and SSH key', () => {
    expect(parsed.pullSecret).toBe('{"auths":{"registry.example.com":{"auth":"dGVzdDp0ZXN0"}}}');
    expect(parsed.sshKey).toBe('ssh-ed25519 AAAAtestkey user@example');
  });

  it('writes the SSH key as a literal block', () => {
    expect(rendered).toMatch(/^sshKey: \|-?$/m);
  });

  it('uses the standard network ranges', () => {
    expect(parsed.networking.clusterNetwork).toEqual([{ cidr: '10.128.0.0/14', hostPrefix: 23 }]);
    expect(parsed.networking.serviceNetwork).toEqual(['172.30.0.0/16']);
    expect(parsed.networking.networkType).toBe('OVNKubernetes');
  });
});
