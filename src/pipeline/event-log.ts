import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { formatDuration } from '../lib/utils/format.js';
import type { SkipReason } from './detector.js';

// ── Event types ──

export type StepEvent =
  | { type: 'skipped'; number: number; name: string; reason: SkipReason }
  | { type: 'start'; number: number; name: string }
  | { type: 'complete'; number: number; name: string; durationMs: number }
  | { type: 'fail'; number: number; name: string; error: string; durationMs?: number };

export type LoggedStepEvent = StepEvent & { seq: number; ts: string; cluster: string };

// ── Writer ──

/**
 * Append-only JSONL record of a run, for audit. Never read back to decide
 * whether a step is complete; that stays with the on-disk markers.
 */
export class EventLog {
  private seq = 0;

  constructor(
    readonly path: string,
    private readonly cluster: string,
  ) {}

  append(event: StepEvent): LoggedStepEvent {
    const logged: LoggedStepEvent = {
      ...event,
      seq: this.seq++,
      ts: new Date().toISOString(),
      cluster: this.cluster,
    };
    mkdirSync(dirname(this.path), { recursive: true });
    appendFileSync(this.path, JSON.stringify(logged) + '\n');
    return logged;
  }
}

// ── Message formatting ──

export function formatStepEvent(event: StepEvent): string {
  const label = `[Step ${event.number}] ${event.name}`;
  switch (event.type) {
    case 'skipped':
      return `skipped ${label} (${event.reason})`;
    case 'start':
      return `start ${label}`;
    case 'complete':
      return `complete ${label} (${formatDuration(event.durationMs)})`;
    case 'fail':
      return `fail ${label}: ${event.error}`;
  }
}
