import chalk from 'chalk';
import { createLockPaths } from '../core/lock-paths.js';
import {
  createInitialLockState,
  lockfileExists,
  saveLockState,
} from '../core/lock-store.js';
import { icons, label } from '../utils/output.js';
import type { LockStoreOptions } from '../core/lock-store.js';

export async function init(store: LockStoreOptions = {}): Promise<void> {
  const lockfile = (store.paths ?? createLockPaths(store.env)).lockfileLocation();

  if (await lockfileExists(store)) {
    console.log(`${icons.info} Lockfile already exists: ${lockfile}`);
    console.log('');
    console.log(`  ${label('Check it:')} repolock validate`);
    return;
  }

  await saveLockState(createInitialLockState(), store);
  console.log(`${icons.success} ${chalk.green(`Created ${lockfile}`)}`);
}
