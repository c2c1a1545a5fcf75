/**
 * Wire shape of lock.json as it appears on disk. Every key is optional and
 * nullable here: a key that is absent or null is reported as "missing" by
 * the validation engine, not rejected as malformed.
 */

export type ReposType = 'git' | 'static';

export function isReposType(value: string): value is ReposType {
  return value === 'git' || value === 'static';
}

export interface LockDocumentRepos {
  type?: string | null;
  trx_id?: number | null;
  path?: string | null;
  version?: string | null;
}

export interface LockDocumentProfile {
  name?: string | null;
  repos_path?: (string | null)[] | null;
  load_vimrc?: boolean | null;
  load_gvimrc?: boolean | null;
}

export interface LockDocument {
  version?: number | null;
  trx_id?: number | null;
  active_profile?: string | null;
  load_vimrc?: boolean | null;
  load_gvimrc?: boolean | null;
  repos?: LockDocumentRepos[] | null;
  profiles?: LockDocumentProfile[] | null;
}
