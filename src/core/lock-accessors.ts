import type { LockState, Profile, Resource } from '../types/lock-state.js';

export class LockEntryNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LockEntryNotFoundError';
  }
}

// ── Profiles ──

export function findProfileByName(profiles: Profile[], name: string): Profile {
  const profile = profiles.find((p) => p.name === name);
  if (!profile) {
    throw new LockEntryNotFoundError(`profile '${name}' does not exist`);
  }
  return profile;
}

export function findProfileIndexByName(profiles: Profile[], name: string): number {
  return profiles.findIndex((p) => p.name === name);
}

/**
 * Removes the first occurrence of `reposPath`, scanning profiles in order and
 * each profile's repos_path in order. Later occurrences are left in place.
 */
export function removeFirstMemberPath(profiles: Profile[], reposPath: string): void {
  for (const profile of profiles) {
    const j = profileIndexOfPath(profile, reposPath);
    if (j >= 0) {
      profile.memberPaths.splice(j, 1);
      return;
    }
  }
  throw new LockEntryNotFoundError(
    `no matching profiles[]/repos_path[]: ${reposPath}`,
  );
}

export function profileIndexOfPath(profile: Profile, reposPath: string): number {
  return profile.memberPaths.indexOf(reposPath);
}

export function profileContainsPath(profile: Profile, reposPath: string): boolean {
  return profileIndexOfPath(profile, reposPath) >= 0;
}

// ── Repos ──

export function findResourceByPath(resources: Resource[], reposPath: string): Resource {
  const resource = resources.find((r) => r.path === reposPath);
  if (!resource) {
    throw new LockEntryNotFoundError(`repos '${reposPath}' does not exist`);
  }
  return resource;
}

export function removeResourceByPath(resources: Resource[], reposPath: string): void {
  const i = resources.findIndex((r) => r.path === reposPath);
  if (i < 0) {
    throw new LockEntryNotFoundError(`no matching repos[]/path: ${reposPath}`);
  }
  resources.splice(i, 1);
}

/** Resolves a profile's repos_path entries to repos, in profile order. */
export function resourcesForProfile(state: LockState, profile: Profile): Resource[] {
  return profile.memberPaths.map((p) => findResourceByPath(state.resources, p));
}

/** Bumps the root trx_id and returns the new value. */
export function nextTransactionID(state: LockState): number {
  state.transactionID += 1;
  return state.transactionID;
}
