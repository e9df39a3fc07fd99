/**
 * Payload is structurally invalid or comes from another host.
 * Deployment never starts.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Requesting address is not in the configured allow-list. */
export class AccessDeniedError extends Error {
  constructor(readonly remoteIp: string) {
    super(`Client IP ${remoteIp} not in valid range.`);
    this.name = 'AccessDeniedError';
  }
}

/** A git step exited non-zero. Keeps the command and everything it printed. */
export class DeployError extends Error {
  constructor(
    readonly command: string,
    readonly output: string,
    readonly exitCode: number,
  ) {
    super(`Failed to run command "${command}". Output: ${output}`);
    this.name = 'DeployError';
  }
}

/** The target directory could not be created, e.g. a file sits at its path. */
export class TargetDirectoryError extends Error {
  constructor(
    readonly targetDirectory: string,
    readonly reason: string,
  ) {
    super(`Could not create target directory ${targetDirectory}: ${reason}`);
    this.name = 'TargetDirectoryError';
  }
}

/** Another deploy holds the lock for the same target directory. */
export class DeployLockedError extends Error {
  constructor(readonly targetDirectory: string) {
    super(`A deploy is already running for ${targetDirectory}`);
    this.name = 'DeployLockedError';
  }
}

export class UnknownProviderError extends Error {
  constructor(readonly provider: string) {
    super(`Unknown provider: ${provider}`);
    this.name = 'UnknownProviderError';
  }
}
