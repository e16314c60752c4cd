import { spawn } from 'node:child_process';
import { CommandError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { formatCommand, maskSecrets } from '../lib/utils/format.js';

export interface ExecOptions {
  /** Extra environment variables layered over the current process environment */
  env?: Record<string, string>;
  cwd?: string;
}

/**
 * Runs external programs one at a time.
 *
 * `execute` captures stdout and resolves with it; `executeInteractive` hands
 * the terminal to the child (prompts, live output) and resolves on exit 0.
 * Both reject with CommandError on a non-zero exit.
 */
export interface CommandExecutor {
  execute(command: string, args: readonly string[], options?: ExecOptions): Promise<string>;
  executeInteractive(command: string, args: readonly string[], options?: ExecOptions): Promise<void>;
}

const STDERR_TAIL_CHARS = 500;

export class NodeCommandExecutor implements CommandExecutor {
  constructor(private readonly log?: Logger) {}

  execute(command: string, args: readonly string[], options: ExecOptions = {}): Promise<string> {
    const line = formatCommand(command, args);
    this.log?.debug(`exec: ${line}`);

    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (err) => {
        reject(new CommandError(line, null, err.message));
      });
      child.on('close', (code, signal) => {
        const out = Buffer.concat(stdout).toString('utf-8');
        if (code === 0) {
          resolve(out);
          return;
        }
        const err = maskSecrets(Buffer.concat(stderr).toString('utf-8').slice(-STDERR_TAIL_CHARS));
        reject(new CommandError(line, code, err, signal));
      });
    });
  }

  executeInteractive(command: string, args: readonly string[], options: ExecOptions = {}): Promise<void> {
    const line = formatCommand(command, args);
    this.log?.debug(`exec (interactive): ${line}`);

    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: 'inherit',
      });

      child.on('error', (err) => {
        reject(new CommandError(line, null, err.message));
      });
      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new CommandError(line, code, '', signal));
        }
      });
    });
  }
}

/** Run a command, log its captured output at debug level, and return it */
export async function runCommand(
  executor: CommandExecutor,
  log: Logger,
  command: string,
  args: readonly string[],
  options?: ExecOptions,
): Promise<string> {
  const output = await executor.execute(command, args, options);
  const trimmed = output.trim();
  if (trimmed) {
    log.debug(trimmed);
  }
  return output;
}
