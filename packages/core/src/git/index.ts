/**
 * Git refresh
 *
 * @module git
 */

export { GitRefresher, buildAuthenticatedUrl, redactToken } from './git_refresher';
export { createExecCommand } from './exec_command';
export { GitError, GitCommandError } from './errors';
export type {
  ExecOptions,
  ExecResult,
  ExecCommand,
  GitRefresherDependencies,
  RefreshOptions,
  RefreshResult,
} from './types';
