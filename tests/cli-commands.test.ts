import { describe, it, expect } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { testContext } from './helpers/test-context.js';
import { buildStatusReport } from '../src/commands/status/index.js';
import { parseStepNumber } from '../src/lib/command/global-options.js';
import { isAffirmative } from '../src/lib/utils/prompt-utils.js';
import { describeError, exitCodeFor } from '../src/lib/command/with-error-handler.js';
import { CommandError, ErrorCode, InstallerError } from '../src/lib/errors.js';

const ctx = testContext();

const RELEASE = 'registry/repo:4.12.0-x86_64';

function touch(path: string, content = 'x'): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

// ── status ──

describe('buildStatusReport', () => {
  it('on an empty tree only the copy steps read as complete', () => {
    const store = ctx.createStore();

    const report = buildStatusReport('demo', RELEASE, store);

    expect(report.cluster).toBe('demo');
    expect(report.versionArch).toBe('4.12.0-x86_64');
    expect(report.steps.map((s) => [s.number, s.verdict])).toEqual([
      [1, 'pending'],
      [2, 'pending'],
      [3, 'pending'],
      [4, 'pending'],
      [5, 'pending'],
      [6, 'pending'],
      [7, 'pending'],
      [8, 'complete'],
      [9, 'complete'],
      [10, 'unknown'],
      [11, 'unknown'],
    ]);
    expect(report.next).toBe(1);
  });

  it('points at the first incomplete step', () => {
    const store = ctx.createStore();
    touch(join(store.credReqsDir('4.12.0-x86_64'), '0000_50_cloud-credential-operator.yaml'));
    touch(store.binary('4.12.0-x86_64', 'openshift-install'));
    touch(store.binary('4.12.0-x86_64', 'ccoctl'));
    touch(store.installConfig('demo'), 'apiVersion: v1\n');

    const report = buildStatusReport('demo', RELEASE, store);

    expect(report.steps.slice(0, 5).map((s) => s.verdict)).toEqual([
      'complete',
      'complete',
      'complete',
      'complete',
      'pending',
    ]);
    expect(report.next).toBe(5);
  });

  it('without a release image the shared steps stay pending', () => {
    const store = ctx.createStore();
    touch(store.installConfig('demo'), 'apiVersion: v1\n');

    const report = buildStatusReport('demo', null, store);

    expect(report.releaseImage).toBeNull();
    expect(report.versionArch).toBeNull();
    expect(report.steps[0]?.verdict).toBe('pending');
    expect(report.steps[3]?.verdict).toBe('complete');
  });
});

// ── option parsing ──

describe('parseStepNumber', () => {
  const parse = parseStepNumber(11);

  it('accepts step numbers in range', () => {
    expect(parse('1')).toBe(1);
    expect(parse('11')).toBe(11);
  });

  it('rejects anything else', () => {
    for (const value of ['0', '12', '2.5', 'seven', '']) {
      expect(() => parse(value)).toThrow(InvalidArgumentError);
    }
    expect(() => parse('12')).toThrow('must be a step number between 1 and 11');
  });
});

describe('isAffirmative', () => {
  it('only y and yes approve', () => {
    expect(['y', 'Y', ' yes ', 'YES'].map(isAffirmative)).toEqual([true, true, true, true]);
    expect(['', 'n', 'no', 'yep', 'sure'].map(isAffirmative)).toEqual([false, false, false, false, false]);
  });
});

// ── error reporting ──

const plain = (lines: string[]) => lines.map((l) => l.replace(/\u001b\[\d+m/g, ''));

describe('exitCodeFor', () => {
  it('uses 3 for configuration and precondition errors', () => {
    expect(exitCodeFor(new InstallerError(ErrorCode.CONFIG_INVALID, 'bad'))).toBe(3);
    expect(exitCodeFor(new InstallerError(ErrorCode.CLUSTER_EXISTS, 'exists'))).toBe(3);
  });

  it('uses 1 for everything else', () => {
    expect(exitCodeFor(new CommandError('oc', 1, ''))).toBe(1);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });
});

describe('describeError', () => {
  it('prints the message and hint', () => {
    const err = new InstallerError(ErrorCode.CLUSTER_EXISTS, 'cluster directory already exists', 'Pass --resume');
    expect(plain(describeError(err))).toEqual(['✗ cluster directory already exists', '  Pass --resume']);
    expect(plain(describeError(err, true))).toEqual([
      '✗ cluster directory already exists',
      '  Pass --resume',
      '  [CLUSTER_EXISTS]',
    ]);
  });

  it('handles plain errors and other values', () => {
    expect(plain(describeError(new Error('boom')))).toEqual(['✗ boom']);
    expect(plain(describeError(42))).toEqual(['✗ An unexpected error occurred']);
  });
});
