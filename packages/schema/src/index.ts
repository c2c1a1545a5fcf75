export type {
  ReposType,
  LockDocument,
  LockDocumentRepos,
  LockDocumentProfile,
} from './lock.js';
export { isReposType } from './lock.js';
export { checkLockDocument, getLockSchemaPath } from './validate.js';
export type { LockDocumentCheck } from './validate.js';
