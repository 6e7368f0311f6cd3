/**
 * GitRefresher - brings a local checkout to the tip of a remote branch
 *
 * Existing folder: re-point origin, fetch the branch, hard reset to it.
 * Missing folder: shallow single-branch clone.
 *
 * @module git/git_refresher
 */

import * as fs from 'fs/promises';
import { GitCommandError } from './errors';
import type {
  ExecCommand,
  GitRefresherDependencies,
  RefreshOptions,
  RefreshResult,
} from './types';
import { createLogger } from '../logger';
import type { Logger } from '../logger';

const logger: Logger = createLogger('[GitRefresher] ');

const REDACTED = '***';

/**
 * Builds the clone URL with the token as userinfo.
 *
 * Accepts `host/path.git` (scheme implied) or a full `https://` URL.
 */
export function buildAuthenticatedUrl(repoUrl: string, token: string): string {
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(repoUrl) ? repoUrl : `https://${repoUrl}`;
  const url = new URL(withScheme);
  url.username = encodeURIComponent(token);
  url.password = '';
  return url.toString();
}

/**
 * Replaces every occurrence of the token (raw or URL-encoded) in text.
 */
export function redactToken(text: string, token: string): string {
  if (!token) return text;
  let result = text.split(token).join(REDACTED);
  const encoded = encodeURIComponent(token);
  if (encoded !== token) {
    result = result.split(encoded).join(REDACTED);
  }
  return result;
}

async function defaultFolderExists(folder: string): Promise<boolean> {
  try {
    await fs.access(folder);
    return true;
  } catch {
    return false;
  }
}

export class GitRefresher {
  private readonly execCommand: ExecCommand;
  private readonly folderExists: (folder: string) => Promise<boolean>;

  constructor(dependencies: GitRefresherDependencies) {
    this.execCommand = dependencies.execCommand;
    this.folderExists = dependencies.folderExists ?? defaultFolderExists;
  }

  async refresh(options: RefreshOptions): Promise<RefreshResult> {
    const { repoUrl, token, branch, localFolder } = options;
    const run = (args: string[]) => this.git(args, token, options.timeoutMs);
    const authUrl = buildAuthenticatedUrl(repoUrl, token);

    let action: RefreshResult['action'];
    if (await this.folderExists(localFolder)) {
      logger.info(`Updating ${localFolder} to origin/${branch}`);
      await run(['-C', localFolder, 'remote', 'set-url', 'origin', authUrl]);
      await run(['-C', localFolder, 'fetch', 'origin', branch]);
      await run(['-C', localFolder, 'reset', '--hard', `origin/${branch}`]);
      action = 'updated';
    } else {
      logger.info(`Cloning ${branch} into ${localFolder}`);
      await run(['clone', '-b', branch, '--single-branch', '--depth', '1', authUrl, localFolder]);
      action = 'cloned';
    }

    const head = (await run(['-C', localFolder, 'rev-parse', 'HEAD'])).trim();
    return { action, head };
  }

  /**
   * Runs git and returns stdout. Throws GitCommandError on non-zero exit,
   * with the token removed from everything it carries.
   */
  private async git(args: string[], token: string, timeoutMs?: number): Promise<string> {
    const result = await this.execCommand('git', args, {
      env: { GIT_TERMINAL_PROMPT: '0' },
      ...(timeoutMs !== undefined ? { timeout: timeoutMs } : {}),
    });

    if (result.exitCode !== 0) {
      const command = redactToken(`git ${args.join(' ')}`, token);
      const stderr = redactToken(result.stderr.trim(), token);
      throw new GitCommandError(
        `${command} failed with exit code ${result.exitCode}${stderr ? `: ${stderr}` : ''}`,
        stderr,
        result.exitCode,
        command
      );
    }

    return result.stdout;
  }
}
