export { createFsChangelist, changelistDirName } from './fs_changelist';
