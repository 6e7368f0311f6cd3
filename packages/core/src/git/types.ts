/**
 * Type Definitions for the git refresh step
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds */
  timeout?: number;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by GitRefresher
 */
export type GitRefresherDependencies = {
  /** Function to execute shell commands (required) */
  execCommand: ExecCommand;
  /** Test hook; default checks the filesystem */
  folderExists?: (folder: string) => Promise<boolean>;
};

export type RefreshOptions = {
  /** `github.com/org/repo.git` or a full https URL */
  repoUrl: string;
  /** Personal access token embedded in the clone URL */
  token: string;
  branch: string;
  localFolder: string;
  /** Upper bound for each git command; unbounded when omitted */
  timeoutMs?: number;
};

export type RefreshResult = {
  action: 'cloned' | 'updated';
  /** Commit the working tree is at after the refresh */
  head: string;
};
