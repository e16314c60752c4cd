/** Error categories for the installer */
export const ErrorCode = {
  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  RELEASE_IMAGE_INVALID: 'RELEASE_IMAGE_INVALID',

  // Precondition errors
  CLUSTER_EXISTS: 'CLUSTER_EXISTS',
  PULL_SECRET_MISSING: 'PULL_SECRET_MISSING',
  PULL_SECRET_INVALID: 'PULL_SECRET_INVALID',
  CREDENTIALS_INVALID: 'CREDENTIALS_INVALID',

  // Execution errors
  COMMAND_FAILED: 'COMMAND_FAILED',
  ARTIFACT_READ_FAILED: 'ARTIFACT_READ_FAILED',
  ARTIFACT_WRITE_FAILED: 'ARTIFACT_WRITE_FAILED',
  INSTALL_CONFIG_INVALID: 'INSTALL_CONFIG_INVALID',
  REGION_UNKNOWN: 'REGION_UNKNOWN',
  KUBECONFIG_MISSING: 'KUBECONFIG_MISSING',
  METADATA_NOT_FOUND: 'METADATA_NOT_FOUND',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Codes that abort before any step runs (exit code 3) */
const PREFLIGHT_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.CONFIG_INVALID,
  ErrorCode.CONFIG_NOT_FOUND,
  ErrorCode.RELEASE_IMAGE_INVALID,
  ErrorCode.CLUSTER_EXISTS,
  ErrorCode.PULL_SECRET_MISSING,
  ErrorCode.PULL_SECRET_INVALID,
  ErrorCode.CREDENTIALS_INVALID,
]);

/** Installer error with code and optional remediation hint */
export class InstallerError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'InstallerError';
  }

  get isPreflight(): boolean {
    return PREFLIGHT_CODES.has(this.code);
  }
}

/** An external command exited non-zero or could not be started */
export class CommandError extends InstallerError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly signal: string | null = null,
  ) {
    const status =
      exitCode !== null
        ? `exited with code ${exitCode}`
        : signal
          ? `was terminated by ${signal}`
          : 'could not be started';
    const tail = stderr.trim() ? `: ${stderr.trim()}` : '';
    super(ErrorCode.COMMAND_FAILED, `${command} ${status}${tail}`);
    this.name = 'CommandError';
  }
}

/** Render any thrown value as a one-line message */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
