/**
 * WorkingTree Interface
 *
 * Read-only view of a local checkout: the regular files under a root,
 * addressed by `/`-separated paths relative to it.
 *
 * @module working_tree
 */

/**
 * Error codes for WorkingTree operations.
 */
export type WorkingTreeErrorCode =
  | 'ROOT_NOT_FOUND'
  | 'NOT_A_DIRECTORY'
  | 'READ_ERROR';

/**
 * Error thrown when the tree cannot be listed or a file cannot be read.
 */
export class WorkingTreeError extends Error {
  constructor(
    message: string,
    public readonly code: WorkingTreeErrorCode,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'WorkingTreeError';
    Object.setPrototypeOf(this, WorkingTreeError.prototype);
  }
}

export interface WorkingTree {
  /** Absolute root directory */
  readonly root: string;

  /**
   * Every regular file under the root, sorted, excluding anything with a
   * `.git` path component. A symbolic link is listed when it resolves to a regular file.
   *
   * @throws WorkingTreeError when the root is missing or not a directory
   */
  list(): Promise<string[]>;

  /** Absolute local path of a relative path. */
  resolve(relativePath: string): string;

  /**
   * Full byte content of a file.
   *
   * @throws WorkingTreeError with code READ_ERROR
   */
  read(relativePath: string): Promise<Buffer>;
}

export type FsWorkingTreeOptions = {
  root: string;
  /** Extra glob patterns (relative to root) left out of the listing */
  exclude?: string[];
};
