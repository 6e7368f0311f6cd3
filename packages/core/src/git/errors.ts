/**
 * Custom Error Classes for the git refresh step
 */

/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command exits non-zero.
 *
 * The message, stderr and command never contain the access token; callers
 * pass already-redacted text.
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly exitCode: number;
  public readonly command?: string | undefined;

  constructor(message: string, stderr: string = '', exitCode: number = 1, command?: string | undefined) {
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.exitCode = exitCode;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}
