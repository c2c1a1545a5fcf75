import { describe, it, expect } from 'vitest';
import {
  findProfileByName,
  findProfileIndexByName,
  findResourceByPath,
  nextTransactionID,
  profileContainsPath,
  profileIndexOfPath,
  removeFirstMemberPath,
  removeResourceByPath,
  resourcesForProfile,
  LockEntryNotFoundError,
} from '../../src/core/lock-accessors.js';
import type { LockState, Profile } from '../../src/types/lock-state.js';

function profile(name: string, memberPaths: string[]): Profile {
  return { name, memberPaths, loadPrimaryConfig: true, loadSecondaryConfig: true };
}

function makeState(): LockState {
  return {
    schemaVersion: 1,
    transactionID: 5,
    activeProfile: 'default',
    loadPrimaryConfig: true,
    loadSecondaryConfig: true,
    resources: [
      { kind: 'git', transactionID: 2, path: 'a', versionLabel: 'v1' },
      { kind: 'static', transactionID: 3, path: 'b', versionLabel: '' },
      { kind: 'git', transactionID: 5, path: 'c', versionLabel: 'v2' },
    ],
    profiles: [profile('default', ['a', 'b']), profile('work', ['c', 'a'])],
  };
}

describe('lock-accessors', () => {
  // ─── profiles ─────────────────────────────────────────────────────
  describe('profiles', () => {
    it('finds a profile by name', () => {
      const state = makeState();
      expect(findProfileByName(state.profiles, 'work')).toBe(state.profiles[1]);
      expect(findProfileIndexByName(state.profiles, 'work')).toBe(1);
    });

    it('reports a missing profile', () => {
      const state = makeState();
      expect(() => findProfileByName(state.profiles, 'nope')).toThrow(LockEntryNotFoundError);
      expect(() => findProfileByName(state.profiles, 'nope')).toThrow(
        "profile 'nope' does not exist",
      );
      expect(findProfileIndexByName(state.profiles, 'nope')).toBe(-1);
    });

    it('looks up member paths', () => {
      const work = makeState().profiles[1];
      expect(profileIndexOfPath(work, 'a')).toBe(1);
      expect(profileIndexOfPath(work, 'b')).toBe(-1);
      expect(profileContainsPath(work, 'c')).toBe(true);
      expect(profileContainsPath(work, 'b')).toBe(false);
    });
  });

  // ─── removeFirstMemberPath ────────────────────────────────────────
  describe('removeFirstMemberPath', () => {
    it('removes only the first occurrence across profiles', () => {
      const state = makeState();
      removeFirstMemberPath(state.profiles, 'a');
      expect(state.profiles[0].memberPaths).toEqual(['b']);
      expect(state.profiles[1].memberPaths).toEqual(['c', 'a']);

      removeFirstMemberPath(state.profiles, 'a');
      expect(state.profiles[1].memberPaths).toEqual(['c']);
    });

    it('keeps the order of the remaining members', () => {
      const profiles = [profile('p', ['x', 'y', 'z'])];
      removeFirstMemberPath(profiles, 'y');
      expect(profiles[0].memberPaths).toEqual(['x', 'z']);
    });

    it('fails when no profile holds the path', () => {
      const state = makeState();
      expect(() => removeFirstMemberPath(state.profiles, 'zzz')).toThrow(
        'no matching profiles[]/repos_path[]: zzz',
      );
    });
  });

  // ─── repos ────────────────────────────────────────────────────────
  describe('repos', () => {
    it('finds a repo by path', () => {
      const state = makeState();
      expect(findResourceByPath(state.resources, 'b')).toBe(state.resources[1]);
    });

    it('reports a missing repo', () => {
      const state = makeState();
      expect(() => findResourceByPath(state.resources, 'nope')).toThrow("repos 'nope' does not exist");
    });

    it('removes a repo by path', () => {
      const state = makeState();
      removeResourceByPath(state.resources, 'b');
      expect(state.resources.map((r) => r.path)).toEqual(['a', 'c']);
    });

    it('fails to remove an unknown repo', () => {
      const state = makeState();
      expect(() => removeResourceByPath(state.resources, 'nope')).toThrow(
        'no matching repos[]/path: nope',
      );
      expect(state.resources).toHaveLength(3);
    });
  });

  // ─── resourcesForProfile ──────────────────────────────────────────
  describe('resourcesForProfile', () => {
    it('resolves members in profile order', () => {
      const state = makeState();
      const repos = resourcesForProfile(state, state.profiles[1]);
      expect(repos.map((r) => r.path)).toEqual(['c', 'a']);
    });

    it('returns an empty list for an empty profile', () => {
      expect(resourcesForProfile(makeState(), profile('empty', []))).toEqual([]);
    });

    it('propagates the first unresolved member', () => {
      const state = makeState();
      expect(() => resourcesForProfile(state, profile('broken', ['a', 'x', 'y']))).toThrow(
        "repos 'x' does not exist",
      );
    });
  });

  describe('nextTransactionID', () => {
    it('increments the root trx_id', () => {
      const state = makeState();
      expect(nextTransactionID(state)).toBe(6);
      expect(state.transactionID).toBe(6);
    });
  });
});
