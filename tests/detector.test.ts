import { describe, it, expect } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { testContext } from './helpers/test-context.js';
import { CompletionDetector } from '../src/pipeline/detector.js';
import type { ArtifactStore } from '../src/artifacts/store.js';

const ctx = testContext();

const RELEASE = 'registry/repo:4.12.0-x86_64';
const VA = '4.12.0-x86_64';

function detectorFor(store: ArtifactStore, startFromStep = 0, releaseImage = RELEASE): CompletionDetector {
  return new CompletionDetector({ releaseImage, clusterName: 'demo', startFromStep, artifactsDir: store.root }, store);
}

function touch(path: string, content = 'x'): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

function skipped(detector: CompletionDetector): number[] {
  return Array.from({ length: 11 }, (_, i) => i + 1).filter((n) => detector.shouldSkip(n));
}

describe('CompletionDetector', () => {
  it('on an empty tree only the staging-consumer steps count as done', () => {
    const store = ctx.createStore();
    expect(skipped(detectorFor(store))).toEqual([8, 9]);
  });

  it('resolves shared paths from the release tag', () => {
    const store = ctx.createStore();
    touch(join(store.root, 'shared', VA, 'bin', 'openshift-install'));
    expect(detectorFor(store).shouldSkip(2)).toBe(true);
  });

  it('never touches the filesystem', () => {
    const store = ctx.createStore();
    skipped(detectorFor(store));
    expect(existsSync(store.root)).toBe(false);
  });

  it('step 1 needs a non-empty credreqs directory', () => {
    const store = ctx.createStore();
    const detector = detectorFor(store);

    mkdirSync(store.credReqsDir(VA), { recursive: true });
    expect(detector.shouldSkip(1)).toBe(false);
    touch(join(store.credReqsDir(VA), '0000_cloud-credential.yaml'));
    expect(detector.shouldSkip(1)).toBe(true);
    rmSync(store.credReqsDir(VA), { recursive: true });
    expect(detector.shouldSkip(1)).toBe(false);
  });

  it('steps 2 and 3 look for the extracted binaries', () => {
    const store = ctx.createStore();
    const detector = detectorFor(store);

    touch(store.binary(VA, 'ccoctl'));
    expect(detector.shouldSkip(2)).toBe(false);
    expect(detector.shouldSkip(3)).toBe(true);
  });

  it('steps 4 and 5 look at install-config.yaml', () => {
    const store = ctx.createStore();
    const detector = detectorFor(store);
    const path = store.installConfig('demo');

    touch(path, 'apiVersion: v1\n');
    expect(detector.shouldSkip(4)).toBe(true);
    expect(detector.shouldSkip(5)).toBe(false);

    touch(path, 'apiVersion: v1\ncredentialsMode: Manual\n');
    expect(detector.shouldSkip(5)).toBe(true);

    rmSync(path);
    expect(detector.shouldSkip(4)).toBe(false);
    expect(detector.shouldSkip(5)).toBe(false);
  });

  it('steps 6 to 9 follow the ccoctl staging directory', () => {
    const store = ctx.createStore();
    const detector = detectorFor(store);

    touch(join(store.stagingManifests('demo'), 'cluster-authentication-02-config.yaml'));
    expect([6, 7, 8, 9].map((n) => detector.shouldSkip(n))).toEqual([true, false, false, true]);

    touch(join(store.stagingTls('demo'), 'bound-service-account-signing-key.key'));
    expect([6, 7, 8, 9].map((n) => detector.shouldSkip(n))).toEqual([true, true, false, false]);

    rmSync(store.stagingDir('demo'), { recursive: true });
    expect([6, 7, 8, 9].map((n) => detector.shouldSkip(n))).toEqual([false, false, true, true]);
  });

  it('never auto-skips deploy and verify', () => {
    const store = ctx.createStore();
    touch(store.kubeconfig('demo'));
    touch(store.clusterMetadata('demo'), '{"clusterName":"demo"}');

    const detector = detectorFor(store);
    expect(detector.shouldSkip(10)).toBe(false);
    expect(detector.shouldSkip(11)).toBe(false);
  });

  it('the resume point overrides the filesystem', () => {
    const store = ctx.createStore();
    const detector = detectorFor(store, 7);

    for (let n = 1; n < 7; n++) {
      expect(detector.skipReason(n)).toBe('resume-point');
    }
    expect(detector.skipReason(7)).toBeNull();
    expect(detector.skipReason(8)).toBe('completed');
    expect(detector.skipReason(10)).toBeNull();
  });

  it('the resume point covers deploy when set past it', () => {
    const detector = detectorFor(ctx.createStore(), 11);
    expect(detector.skipReason(10)).toBe('resume-point');
    expect(detector.skipReason(11)).toBeNull();
  });

  it('an unusable release image makes shared steps run', () => {
    const store = ctx.createStore();
    touch(store.binary(VA, 'openshift-install'));

    const detector = detectorFor(store, 0, 'registry/repo');
    expect(detector.shouldSkip(2)).toBe(false);
  });

  it('isComplete ignores the resume point', () => {
    const detector = detectorFor(ctx.createStore(), 5);
    expect(detector.shouldSkip(1)).toBe(true);
    expect(detector.isComplete(1)).toBe(false);
  });
});
