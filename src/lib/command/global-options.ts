import { InvalidArgumentError, type Command } from 'commander';
import { z } from 'zod';
import { createLogger, resolveLogLevel, type Logger } from '../logger.js';

const globalOptionsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof globalOptionsSchema>;

/** Options declared on the root program, as seen from a subcommand */
export function globalOptions(command: Command): GlobalOptions {
  return globalOptionsSchema.parse(command.optsWithGlobals());
}

export function commandLogger(command: Command): Logger {
  return createLogger({ level: resolveLogLevel(globalOptions(command).verbose) });
}

/** commander argument parser for step numbers */
export function parseStepNumber(max: number) {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1 || n > max) {
      throw new InvalidArgumentError(`must be a step number between 1 and ${max}`);
    }
    return n;
  };
}
