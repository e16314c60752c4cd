import type { Configuration } from '../config/types.js';
import type { CommandExecutor } from '../exec/executor.js';
import type { Logger } from '../lib/logger.js';
import { InstallerError, errorMessage } from '../lib/errors.js';
import { confirm as promptConfirm } from '../lib/utils/prompt-utils.js';
import { ArtifactStore } from '../artifacts/store.js';
import { createStepContext, type CatalogEntry, type Step, type StepContext } from '../steps/types.js';
import { stepLabel } from '../steps/catalog.js';
import { CompletionDetector, type SkipReason } from './detector.js';
import { formatStepEvent, type StepEvent } from './event-log.js';
import { Summary } from './summary.js';

export interface PipelineOptions {
  executor: CommandExecutor;
  log: Logger;
  store?: ArtifactStore;
  detector?: Pick<CompletionDetector, 'skipReason'>;
  /** Asked before each step when confirmEachStep is set; defaults to a terminal prompt */
  confirm?: (question: string) => Promise<boolean>;
  onEvent?: (event: StepEvent) => void;
  /** Clock for durations */
  now?: () => number;
}

const SKIP_MESSAGE: Record<SkipReason, string> = {
  completed: 'already completed',
  'resume-point': 'before resume point',
  'user-choice': 'user choice',
};

/**
 * Run the catalog in order, skipping work already on disk.
 *
 * Stops at the first step that fails; steps after it stay pending in the
 * returned summary. A step that cannot be constructed is recorded as
 * failed and evaluation moves on to the next one.
 */
export async function runPipeline(
  config: Configuration,
  catalog: readonly CatalogEntry[],
  options: PipelineOptions,
): Promise<Summary> {
  const { executor, log } = options;
  const store = options.store ?? new ArtifactStore(config.artifactsDir);
  const detector = options.detector ?? new CompletionDetector(config, store);
  const confirm = options.confirm ?? promptConfirm;
  const now = options.now ?? Date.now;
  const summary = new Summary(catalog);

  // Event sinks are audit-only; a failing sink never changes the run
  const emit = (event: StepEvent) => {
    log.debug(formatStepEvent(event));
    try {
      options.onEvent?.(event);
    } catch (err) {
      log.debug(`Could not record ${event.type} event for step ${event.number}: ${errorMessage(err)}`);
    }
  };

  for (const entry of [...catalog].sort((a, b) => a.number - b.number)) {
    const { number, name } = entry;
    const label = stepLabel(entry);

    // ── Construct ──
    let ctx: StepContext;
    let step: Step;
    try {
      ctx = createStepContext(config, { executor, log, store });
      step = entry.create(ctx);
    } catch (err) {
      const error = errorMessage(err);
      log.error(`Failed to create ${label}: ${error}`);
      summary.record(number, { status: 'failed', error });
      emit({ type: 'fail', number, name, error });
      continue;
    }

    // ── Skip? ──
    const reason = detector.skipReason(number);
    if (reason) {
      log.skipStep(label, SKIP_MESSAGE[reason]);
      summary.record(number, { status: 'skipped', skipReason: reason });
      emit({ type: 'skipped', number, name, reason });
      continue;
    }

    if (config.confirmEachStep && !(await confirm(`Proceed with ${label}?`))) {
      log.skipStep(label, SKIP_MESSAGE['user-choice']);
      summary.record(number, { status: 'skipped', skipReason: 'user-choice' });
      emit({ type: 'skipped', number, name, reason: 'user-choice' });
      continue;
    }

    // ── Execute ──
    log.startStep(label);
    emit({ type: 'start', number, name });
    const started = now();
    try {
      await step.execute();
    } catch (err) {
      const durationMs = now() - started;
      const error = errorMessage(err);
      log.failStep(label);
      log.error(error);
      if (err instanceof InstallerError && err.hint) {
        log.info(err.hint);
      }
      summary.record(number, { status: 'failed', error, durationMs });
      emit({ type: 'fail', number, name, error, durationMs });
      break;
    }

    const durationMs = now() - started;
    log.completeStep(label);
    summary.record(number, { status: 'succeeded', durationMs });
    emit({ type: 'complete', number, name, durationMs });

    for (const bridge of entry.bridges ?? []) {
      try {
        bridge.run(ctx);
      } catch (err) {
        log.debug(`Could not ${bridge.name}: ${errorMessage(err)}`);
      }
    }
  }

  return summary;
}
