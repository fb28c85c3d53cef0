/**
 * Errors that abort a run. Failures local to one individual are reported
 * as exercise outcomes instead.
 */

export class FastenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FastenError';
  }
}

export class UsageError extends FastenError {
  constructor(
    message: string,
    readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'UsageError';
  }
}

export class DirectoryNotFoundError extends FastenError {
  constructor(readonly directory: string) {
    super(`Directory not found: ${directory}`);
    this.name = 'DirectoryNotFoundError';
  }
}

export class InvalidFastenerError extends FastenError {
  constructor(
    readonly path: string,
    readonly line: number,
    readonly reason: string
  ) {
    super(`Invalid FASTENABLE literal at ${path}:${line}: ${reason}`);
    this.name = 'InvalidFastenerError';
  }
}

export class CommandLaunchError extends FastenError {
  constructor(
    readonly command: string,
    readonly launchError: Error
  ) {
    super(`Command failed to launch: ${command}\n${launchError.message}`);
    this.name = 'CommandLaunchError';
  }
}

export class CommandFailedError extends FastenError {
  constructor(
    readonly command: string,
    readonly detail: string
  ) {
    super(`Command failed: ${command}${detail ? `\n${detail}` : ''}`);
    this.name = 'CommandFailedError';
  }
}

export class RunAbortedError extends FastenError {
  constructor(readonly command: string) {
    super(`Run aborted while waiting for: ${command}`);
    this.name = 'RunAbortedError';
  }
}

export class EmptyGenerationError extends FastenError {
  constructor(
    readonly generation: number,
    readonly evaluated: number
  ) {
    super(
      `Generation ${generation} produced no fitness results (${evaluated} individuals evaluated)`
    );
    this.name = 'EmptyGenerationError';
  }
}

export class GenomeMismatchError extends FastenError {
  constructor(message: string) {
    super(message);
    this.name = 'GenomeMismatchError';
  }
}

/**
 * The errno code of a system error, if the value carries one
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
