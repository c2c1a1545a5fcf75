import { dirname } from 'node:path';
import { nodeFilesystem } from './lock-filesystem.js';
import { createLockPaths } from './lock-paths.js';
import { parseLockfile, serializeLockState } from './lock-codec.js';
import { validateLockState } from './lock-validator.js';
import type { LockFilesystem } from './lock-filesystem.js';
import type { LockPathResolver } from './lock-paths.js';
import type { ValidationContext } from './lock-validator.js';
import type { LockState } from '../types/lock-state.js';

export interface LockStoreOptions {
  env?: NodeJS.ProcessEnv;
  paths?: LockPathResolver;
  fs?: LockFilesystem;
}

function resolveContext(options?: LockStoreOptions): ValidationContext {
  return {
    paths: options?.paths ?? createLockPaths(options?.env),
    fs: options?.fs ?? nodeFilesystem,
  };
}

/** State used when no lockfile exists yet. Returns a fresh object on every call. */
export function createInitialLockState(): LockState {
  return {
    schemaVersion: 1,
    transactionID: 1,
    activeProfile: 'default',
    loadPrimaryConfig: true,
    loadSecondaryConfig: true,
    resources: [],
    profiles: [
      {
        name: 'default',
        memberPaths: [],
        loadPrimaryConfig: true,
        loadSecondaryConfig: true,
      },
    ],
  };
}

export async function lockfileExists(options?: LockStoreOptions): Promise<boolean> {
  const { paths, fs } = resolveContext(options);
  return fs.exists(paths.lockfileLocation());
}

export async function loadLockState(options?: LockStoreOptions): Promise<LockState> {
  const context = resolveContext(options);
  const lockfile = context.paths.lockfileLocation();

  if (!(await context.fs.exists(lockfile))) {
    return createInitialLockState();
  }

  const raw = await context.fs.readFile(lockfile);
  const draft = parseLockfile(raw, lockfile);
  return validateLockState(draft, context);
}

/** Validates, then replaces the lockfile. Nothing is written when validation fails. */
export async function saveLockState(
  state: LockState,
  options?: LockStoreOptions,
): Promise<void> {
  const context = resolveContext(options);
  await validateLockState(state, context);

  const lockfile = context.paths.lockfileLocation();
  const dir = dirname(lockfile);
  if (!(await context.fs.exists(dir))) {
    await context.fs.makeDirectories(dir);
  }
  await context.fs.writeFile(lockfile, serializeLockState(state));
}
