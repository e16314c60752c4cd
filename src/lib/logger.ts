import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  startStep(label: string): void;
  completeStep(label: string): void;
  failStep(label: string): void;
  skipStep(label: string, reason: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Line sink; defaults to stderr so captured tool output on stdout stays clean */
  write?: (line: string) => void;
  /** Force colour on or off; defaults to what chalk detected for the terminal */
  color?: boolean;
}

/** Resolve the log level from the --verbose flag and OPENSHIFT_STS_DEBUG */
export function resolveLogLevel(
  verbose: boolean | undefined,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  if (verbose) return 'debug';
  const flag = env.OPENSHIFT_STS_DEBUG ?? '';
  return flag !== '' && flag !== '0' && flag !== 'false' ? 'debug' : 'info';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
  const c: ChalkInstance =
    options.color === undefined ? chalk : new Chalk({ level: options.color ? 1 : 0 });

  const enabled = (l: LogLevel) => LEVEL_RANK[l] >= LEVEL_RANK[level];

  return {
    level,
    debug(message) {
      if (enabled('debug')) write(c.dim(`[DEBUG] ${message}`));
    },
    info(message) {
      if (enabled('info')) write(message);
    },
    warn(message) {
      if (enabled('warn')) write(c.yellow(`⚠ ${message}`));
    },
    error(message) {
      write(c.red(`✗ ${message}`));
    },
    startStep(label) {
      if (enabled('info')) write(c.bold(`▶ ${label}`));
    },
    completeStep(label) {
      if (enabled('info')) write(c.green(`✓ ${label}`));
    },
    failStep(label) {
      write(c.red(`✗ ${label}`));
    },
    skipStep(label, reason) {
      if (enabled('info')) write(c.dim(`⏭ Skipping ${label} (${reason})`));
    },
  };
}

/** Logger that records lines in memory; used by tests and dry runs */
export function createMemoryLogger(level: LogLevel = 'debug'): Logger & { lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({ level, color: false, write: (line) => lines.push(line) });
  return Object.assign(logger, { lines });
}
