import { describe, it, expect } from 'vitest';
import { Summary } from '../src/pipeline/summary.js';

const STEPS = [
  { number: 1, name: 'Extract credentials requests' },
  { number: 2, name: 'Extract openshift-install binary' },
  { number: 3, name: 'Extract ccoctl binary' },
];

describe('Summary', () => {
  it('starts with every step pending', () => {
    const summary = new Summary(STEPS);
    expect(summary.all().map((r) => r.status)).toEqual(['pending', 'pending', 'pending']);
    expect(summary.records()).toEqual([]);
    expect(summary.hasFailures()).toBe(false);
  });

  it('allows exactly one transition per step', () => {
    const summary = new Summary(STEPS);
    summary.record(1, { status: 'succeeded', durationMs: 10 });
    expect(() => summary.record(1, { status: 'failed', error: 'late' })).toThrow('step 1 already succeeded');
  });

  it('rejects unknown step numbers', () => {
    expect(() => new Summary(STEPS).record(12, { status: 'skipped', skipReason: 'completed' })).toThrow(
      'unknown step 12',
    );
  });

  it('renders one line per finished step and a total', () => {
    const summary = new Summary(STEPS);
    summary.record(1, { status: 'succeeded', durationMs: 5000 });
    summary.record(2, { status: 'skipped', skipReason: 'completed' });
    summary.record(3, { status: 'failed', error: 'oc exited with code 1', durationMs: 40 });

    expect(summary.toString()).toBe(
      [
        '',
        'Installation summary:',
        '  ✓ [Step 1] Extract credentials requests (5s)',
        '  ⏭ [Step 2] Extract openshift-install binary (completed)',
        '  ✗ [Step 3] Extract ccoctl binary: oc exited with code 1',
        '',
        '1 succeeded, 1 skipped, 1 failed',
      ].join('\n'),
    );
    expect(summary.hasFailures()).toBe(true);
  });

  it('counts steps that never ran', () => {
    const summary = new Summary(STEPS);
    summary.record(1, { status: 'failed', error: 'boom' });

    expect(summary.toString().split('\n').at(-1)).toBe('0 succeeded, 0 skipped, 1 failed, 2 not run');
  });
});
