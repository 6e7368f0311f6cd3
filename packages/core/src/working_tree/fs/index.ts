export { FsWorkingTree } from './fs_working_tree';
