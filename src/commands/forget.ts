import chalk from 'chalk';
import {
  findResourceByPath,
  nextTransactionID,
  profileContainsPath,
  removeFirstMemberPath,
  removeResourceByPath,
} from '../core/lock-accessors.js';
import { loadLockState, saveLockState } from '../core/lock-store.js';
import { icons } from '../utils/output.js';
import type { LockStoreOptions } from '../core/lock-store.js';

/**
 * Drops a repos entry and every profile reference to it. The directory on
 * disk is left alone.
 */
export async function forget(
  reposPath: string,
  store: LockStoreOptions = {},
): Promise<void> {
  const state = await loadLockState(store);

  // Unknown paths fail here, before any profile is edited
  findResourceByPath(state.resources, reposPath);

  let removedFrom = 0;
  while (state.profiles.some((p) => profileContainsPath(p, reposPath))) {
    removeFirstMemberPath(state.profiles, reposPath);
    removedFrom++;
  }
  removeResourceByPath(state.resources, reposPath);
  nextTransactionID(state);

  await saveLockState(state, store);

  const suffix = removedFrom === 1 ? '' : 's';
  console.log(
    `${icons.success} ${chalk.green(`Forgot ${reposPath}`)} (removed from ${removedFrom} profile${suffix})`,
  );
}
