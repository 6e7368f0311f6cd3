export type { WorkingTree, WorkingTreeErrorCode, FsWorkingTreeOptions } from './working_tree';
export { WorkingTreeError } from './working_tree';
export { FsWorkingTree } from './fs';
