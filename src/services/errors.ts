export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class RecognizerOutputError extends Error {
  constructor(message: string, readonly documentId?: string) {
    super(message);
    this.name = 'RecognizerOutputError';
  }
}

export class ExternalProcessError extends Error {
  constructor(
    message: string,
    readonly command: string,
    readonly exitCode?: number | null,
    readonly stderr?: string
  ) {
    super(message);
    this.name = 'ExternalProcessError';
  }
}

/** Wraps a failed child process, keeping its exit code and stderr. */
export function processFailure(err: unknown, message: string, command: string): ExternalProcessError {
  const stderr = typeof err === 'object' && err !== null && 'stderr' in err ? String(err.stderr) : undefined;
  const code = typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number' ? err.code : null;
  return new ExternalProcessError(`${message}: ${errorMessage(err)}`, command, code, stderr);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
