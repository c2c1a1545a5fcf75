import { join } from 'node:path';
import os from 'node:os';

export interface LockPathResolver {
  lockfileLocation(): string;
  /** Maps a slash-separated resource path to its absolute directory. */
  resolveResourcePath(resourcePath: string): string;
}

export function resolveHomeDir(env?: NodeJS.ProcessEnv): string {
  const e = env ?? process.env;
  const raw = e.HOME ?? e.USERPROFILE;
  if (raw) return raw;
  return os.homedir();
}

export function resolveLockRoot(env?: NodeJS.ProcessEnv): string {
  const e = env ?? process.env;
  const explicit = e.REPOLOCK_HOME;
  if (explicit) {
    if (explicit.startsWith('~')) {
      return join(os.homedir(), explicit.slice(1));
    }
    return explicit;
  }
  return join(resolveHomeDir(env), '.repolock');
}

export function resolveLockfilePath(env?: NodeJS.ProcessEnv): string {
  const e = env ?? process.env;
  if (e.REPOLOCK_LOCKFILE) return e.REPOLOCK_LOCKFILE;
  return join(resolveLockRoot(env), 'lock.json');
}

export function resolveReposDir(env?: NodeJS.ProcessEnv): string {
  return join(resolveLockRoot(env), 'repos');
}

export function resolveResourceDir(
  resourcePath: string,
  env?: NodeJS.ProcessEnv,
): string {
  return join(resolveReposDir(env), ...resourcePath.split('/'));
}

export function createLockPaths(env?: NodeJS.ProcessEnv): LockPathResolver {
  return {
    lockfileLocation: () => resolveLockfilePath(env),
    resolveResourcePath: (resourcePath) => resolveResourceDir(resourcePath, env),
  };
}
