import chalk from 'chalk';
import { InstallerError } from '../errors.js';
import { resolveLogLevel } from '../logger.js';

export const EXIT_FAILURE = 1;
export const EXIT_PRECONDITION = 3;

/** Configuration and precondition errors exit 3; anything else exits 1 */
export function exitCodeFor(err: unknown): number {
  return err instanceof InstallerError && err.isPreflight ? EXIT_PRECONDITION : EXIT_FAILURE;
}

/** Lines printed for an error that escaped a command handler */
export function describeError(err: unknown, debug = false): string[] {
  if (err instanceof InstallerError) {
    const lines = [chalk.red(`✗ ${err.message}`)];
    if (err.hint) lines.push(chalk.dim(`  ${err.hint}`));
    if (debug) lines.push(chalk.dim(`  [${err.code}]`));
    return lines;
  }
  if (err instanceof Error) {
    const lines = [chalk.red(`✗ ${err.message}`)];
    if (debug && err.stack) lines.push(chalk.dim(err.stack));
    return lines;
  }
  return [chalk.red('✗ An unexpected error occurred')];
}

/**
 * Wrap a commander action so every failure ends as a printed message and
 * an exit status instead of an unhandled rejection.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      const debug = resolveLogLevel(process.argv.includes('--verbose')) === 'debug';
      for (const line of describeError(err, debug)) {
        console.error(line);
      }
      process.exit(exitCodeFor(err));
    }
  };
}
