import { formatDuration } from '../lib/utils/format.js';
import type { SkipReason } from './detector.js';

export type StepStatus = 'pending' | 'skipped' | 'succeeded' | 'failed';

export interface StepRecord {
  readonly number: number;
  readonly name: string;
  readonly status: StepStatus;
  readonly skipReason?: SkipReason;
  readonly error?: string;
  readonly durationMs?: number;
}

type Outcome =
  | { status: 'skipped'; skipReason: SkipReason }
  | { status: 'succeeded'; durationMs: number }
  | { status: 'failed'; error: string; durationMs?: number };

const ICON: Record<StepStatus, string> = {
  pending: '·',
  skipped: '⏭',
  succeeded: '✓',
  failed: '✗',
};

/** Outcome of one pipeline run. Each record leaves `pending` at most once. */
export class Summary {
  private readonly byNumber = new Map<number, StepRecord>();

  constructor(steps: readonly { number: number; name: string }[]) {
    for (const { number, name } of steps) {
      this.byNumber.set(number, { number, name, status: 'pending' });
    }
  }

  record(number: number, outcome: Outcome): StepRecord {
    const current = this.byNumber.get(number);
    if (!current) {
      throw new Error(`unknown step ${number}`);
    }
    if (current.status !== 'pending') {
      throw new Error(`step ${number} already ${current.status}`);
    }
    const next: StepRecord = { number: current.number, name: current.name, ...outcome };
    this.byNumber.set(number, next);
    return next;
  }

  get(number: number): StepRecord | undefined {
    return this.byNumber.get(number);
  }

  /** Every record in step order, pending ones included */
  all(): StepRecord[] {
    return [...this.byNumber.values()].sort((a, b) => a.number - b.number);
  }

  /** Records that reached a final status */
  records(): StepRecord[] {
    return this.all().filter((r) => r.status !== 'pending');
  }

  count(status: StepStatus): number {
    return this.all().filter((r) => r.status === status).length;
  }

  hasFailures(): boolean {
    return this.count('failed') > 0;
  }

  toString(): string {
    const lines = ['', 'Installation summary:'];
    for (const r of this.records()) {
      let detail = '';
      if (r.status === 'skipped' && r.skipReason) detail = ` (${r.skipReason})`;
      else if (r.status === 'failed' && r.error) detail = `: ${r.error}`;
      else if (r.durationMs !== undefined) detail = ` (${formatDuration(r.durationMs)})`;
      lines.push(`  ${ICON[r.status]} [Step ${r.number}] ${r.name}${detail}`);
    }

    const pending = this.count('pending');
    lines.push(
      '',
      `${this.count('succeeded')} succeeded, ${this.count('skipped')} skipped, ${this.count('failed')} failed` +
        (pending > 0 ? `, ${pending} not run` : ''),
    );
    return lines.join('\n');
  }
}
