/**
 * Errors raised by core operations. The CLI maps `exitCode` to the process exit status.
 */
export class X100Error extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Unknown names, bad arguments, or running outside an x100 project. */
export class UsageError extends X100Error {
  constructor(message: string) {
    super(message, 1);
  }
}

/** Config file that cannot be read or does not match the expected shape. */
export class ConfigError extends X100Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${path})`, 2, options);
    this.path = path;
  }
}

/** Filesystem failure while copying, deleting or writing project files. */
export class FileSystemError extends X100Error {
  constructor(action: string, path: string, cause: unknown) {
    super(`Failed to ${action} ${path}: ${errorMessage(cause)}`, 2, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function exitCodeFor(err: unknown, fallback: number): number {
  return err instanceof X100Error ? err.exitCode : fallback;
}
