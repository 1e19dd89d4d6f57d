export class XackerError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'XackerError';
  }
}

/** A logging level name that maps to no known level. Aborts startup. */
export class ConfigurationError extends XackerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'ConfigurationError';
  }
}

/** A subcommand was selected without the fields it needs. */
export class NoArgumentsError extends XackerError {
  constructor(
    readonly command: string,
    readonly missing: readonly string[],
  ) {
    super(`No arguments passed to the ${command} command`, { command, missing });
    this.name = 'NoArgumentsError';
  }
}

/** The runtime binary could not be spawned at all. */
export class InvocationError extends XackerError {
  readonly code: string | undefined;

  constructor(
    readonly bin: string,
    cause: Error,
  ) {
    const code =
      'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
    super(`Failed to execute ${bin}: ${cause.message}`, { bin, code }, { cause });
    this.name = 'InvocationError';
    this.code = code;
  }

  /** Shell-style exit status: 127 for a missing binary, 126 for one we may not run. */
  get exitCode(): number {
    if (this.code === 'ENOENT') return 127;
    if (this.code === 'EACCES') return 126;
    return 1;
  }
}
