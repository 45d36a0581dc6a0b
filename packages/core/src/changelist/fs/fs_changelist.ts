import * as path from 'path';
import type { GUN } from '../../trust_types';
import { FsRecordStore } from '../../record_store/fs/fs_record_store';
import { DetailedValidationError } from '../../trust_errors';
import { RecordChangelist, loadStoredChange } from '../record_changelist';
import type { StoredChange } from '../changelist.types';

/**
 * Directory name for a GUN's changelist. GUNs usually contain `/`, which is
 * percent-encoded so each GUN maps to one directory.
 */
export function changelistDirName(gun: GUN): string {
  const encoded = encodeURIComponent(gun);
  if (!encoded || encoded === '.' || encoded === '..') {
    throw new DetailedValidationError('GUN', [{ field: 'gun', message: 'cannot be used as a directory name', value: gun }]);
  }
  return encoded;
}

/**
 * Filesystem changelist at {changelistRoot}/{encoded gun}/, one JSON file
 * per change.
 */
export function createFsChangelist(changelistRoot: string, gun: GUN): RecordChangelist {
  const basePath = path.join(changelistRoot, changelistDirName(gun));
  const store = new FsRecordStore<StoredChange>({ basePath, decode: loadStoredChange });
  return new RecordChangelist(store, basePath);
}
